export type ConstSet<T> = Pick<Set<T>, 'size' | 'has'> & Iterable<T>;

/**
 * An immutable set of state ids. Two NumberSets with the same members
 * produce the same hash regardless of insertion order, which is what lets
 * closures and subsets be used as keys.
 */
export class NumberSet implements ConstSet<number> {
  private data: Set<number>;
  constructor(items: Iterable<number> = []) {
    this.data = new Set(items);
  }
  get size(): number {
    return this.data.size;
  }

  [Symbol.iterator]() {
    return this.data[Symbol.iterator]();
  }

  has(a: number): boolean {
    return this.data.has(a);
  }

  /**
   * Members in ascending order.
   */
  sorted(): number[] {
    return Array.from(this.data).sort((a, b) => a - b);
  }

  /**
   * The smallest member, or undefined for the empty set.
   */
  min(): number | undefined {
    return this.sorted()[0];
  }

  intersects(other: ConstSet<number>): boolean {
    for (const a of this.data) {
      if (other.has(a)) {
        return true;
      }
    }
    return false;
  }

  intersection(other: ConstSet<number>): NumberSet {
    return new NumberSet(this.sorted().filter((a) => other.has(a)));
  }

  difference(other: ConstSet<number>): NumberSet {
    return new NumberSet(this.sorted().filter((a) => !other.has(a)));
  }

  hash(): string {
    return `{${this.sorted().join(',')}}`;
  }
}

/**
 * A map whose keys are compared by a hash string instead of by identity.
 */
export class HashMap<K, V> {
  private hasher: (item: K) => string;
  private data: Map<string, V> = new Map();
  constructor(hasher: (item: K) => string) {
    this.hasher = hasher;
  }
  get(key: K): V | undefined {
    return this.data.get(this.hasher(key));
  }
  set(key: K, value: V): this {
    this.data.set(this.hasher(key), value);
    return this;
  }
}

/**
 * A HashMap keyed by sets of state ids.
 */
export function numberSetMap<V>(): HashMap<NumberSet, V> {
  return new HashMap((set) => set.hash());
}
