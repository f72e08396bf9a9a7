import { Table } from '../data-structures/table.js';
import type { IHaveDebugStr } from '../utils/debug.js';
import type { StateID } from './label.js';

/**
 * An outgoing edge: the label it is traversed on and the state it leads to.
 */
export type Edge<L> = readonly [label: L, to: StateID];

export type AutomatonKind = 'epsilon-nfa' | 'nfa' | 'dfa';

/**
 * Read-only view of an automaton, shared by all three stages of the
 * pipeline. L is the label type of its edges.
 */
export interface ConstAutomaton<L> extends IHaveDebugStr {
  readonly kind: AutomatonKind;
  readonly start: StateID;
  readonly accept: ReadonlySet<StateID>;

  /**
   * Every state referenced by the automaton (the start state, accepting
   * states, and every edge source and target), in ascending order.
   */
  getStates(): StateID[];

  /**
   * Outgoing edges of the given state, in the order they were added.
   */
  getEdges(state: StateID): readonly Edge<L>[];

  isAcceptingState(state: StateID): boolean;

  labelToString(label: L): string;
}

export abstract class Automaton<L> implements ConstAutomaton<L> {
  abstract readonly kind: AutomatonKind;
  readonly start: StateID;
  readonly accept: ReadonlySet<StateID>;
  private readonly edges: ReadonlyMap<StateID, readonly Edge<L>[]>;
  private states?: StateID[];

  protected constructor(
    start: StateID,
    accept: Iterable<StateID>,
    edges: Iterable<readonly [StateID, Iterable<Edge<L>>]>
  ) {
    this.start = start;
    this.accept = new Set(accept);
    const copy: Map<StateID, readonly Edge<L>[]> = new Map();
    for (const [from, out] of edges) {
      copy.set(from, Object.freeze([...out]));
    }
    this.edges = copy;
  }

  abstract labelToString(label: L): string;

  get numStates(): number {
    return this.getStates().length;
  }

  getStates(): StateID[] {
    if (!this.states) {
      const states = new Set([this.start, ...this.accept]);
      for (const [from, out] of this.edges) {
        states.add(from);
        for (const [, to] of out) {
          states.add(to);
        }
      }
      this.states = [...states].sort((a, b) => a - b);
    }
    return [...this.states];
  }

  getEdges(state: StateID): readonly Edge<L>[] {
    return this.edges.get(state) ?? [];
  }

  isAcceptingState(state: StateID): boolean {
    return this.accept.has(state);
  }

  /**
   * Every edge of the automaton as a [from, label, to] triple, ordered by
   * source state.
   */
  *edgeList(): IterableIterator<[StateID, L, StateID]> {
    for (const from of this.getStates()) {
      for (const [l, to] of this.getEdges(from)) {
        yield [from, l, to];
      }
    }
  }

  toDebugStr(): string {
    const columns: string[] = [];
    for (const [, l] of this.edgeList()) {
      const key = this.labelToString(l);
      if (columns.indexOf(key) == -1) {
        columns.push(key);
      }
    }
    columns.sort();
    // the silent column always goes last
    const epsilonIndex = columns.indexOf('ε');
    if (epsilonIndex >= 0) {
      columns.splice(epsilonIndex, 1);
      columns.push('ε');
    }

    const stateLabel = (s: StateID) => {
      let out = 's' + s;
      if (this.isAcceptingState(s)) {
        out = '*' + out;
      }
      if (s == this.start) {
        out = '>' + out;
      }
      return out;
    };

    const table: Table<string> = new Table(columns.length + 1);
    table.addRow(['δ', ...columns]);
    for (const state of this.getStates()) {
      const row = [stateLabel(state) + ':'];
      for (const column of columns) {
        const targets = this.getEdges(state)
          .filter(([l]) => this.labelToString(l) == column)
          .map(([, to]) => stateLabel(to));
        row.push(targets.length > 0 ? targets.join(',') : '_');
      }
      table.addRow(row);
    }
    return table.toDebugStr();
  }
}
