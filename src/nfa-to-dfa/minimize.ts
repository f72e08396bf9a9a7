import { scopedLog } from '../utils/debug.js';
import { NumberSet } from '../utils/sets.js';
import { DFA, pruneUnreachable } from './dfa.js';
import type { InputSymbol, StateID } from './label.js';

const log = scopedLog('minimize');

export type MinimizeOptions = {
  /**
   * Drop states that can't be reached from the start state before
   * minimizing. Without this, unreachable states survive as their own
   * classes unless they are indistinguishable from reachable ones.
   */
  prune?: boolean;
};

/**
 * The classes of states being refined. Classes are kept in the order they
 * were created, which is also the numbering of the minimized states.
 */
class Partition {
  classes: NumberSet[];
  constructor(classes: NumberSet[]) {
    this.classes = classes.filter((c) => c.size > 0);
  }

  /**
   * Split every class that has members both inside and outside of
   * `predecessors`.
   *
   * @returns the smaller half of each split.
   */
  splitBy(predecessors: NumberSet): NumberSet[] {
    const smaller: NumberSet[] = [];
    const next: NumberSet[] = [];
    for (const cls of this.classes) {
      const inside = cls.intersection(predecessors);
      const outside = cls.difference(predecessors);
      if (inside.size > 0 && outside.size > 0) {
        next.push(inside, outside);
        smaller.push(inside.size <= outside.size ? inside : outside);
      } else {
        next.push(cls);
      }
    }
    this.classes = next;
    return smaller;
  }

  classOf(): Map<StateID, number> {
    const index: Map<StateID, number> = new Map();
    for (const [ci, cls] of this.classes.entries()) {
      for (const state of cls) {
        index.set(state, ci);
      }
    }
    return index;
  }
}

/**
 * For every symbol, a map from each state to the states that reach it
 * by consuming that symbol.
 */
function inverseTransitions(
  dfa: DFA,
  states: StateID[]
): Map<InputSymbol, Map<StateID, StateID[]>> {
  const inverse: Map<InputSymbol, Map<StateID, StateID[]>> = new Map();
  for (const from of states) {
    for (const [symbol, to] of dfa.getEdges(from)) {
      let bySymbol = inverse.get(symbol);
      if (!bySymbol) {
        bySymbol = new Map();
        inverse.set(symbol, bySymbol);
      }
      let sources = bySymbol.get(to);
      if (!sources) {
        sources = [];
        bySymbol.set(to, sources);
      }
      sources.push(from);
    }
  }
  return inverse;
}

/**
 * Minimize a DFA by partition refinement, a simplified form of Hopcroft's
 * algorithm.
 *
 * States start out split into accepting and non-accepting classes. A
 * class S splits every other class into the states that reach S on some
 * symbol and the ones that don't, until no class can split any other.
 * Every class then becomes one state of the result, numbered by its
 * position in the partition.
 */
export function minimize(source: DFA, options: MinimizeOptions = {}): DFA {
  const dfa = options.prune ? pruneUnreachable(source) : source;
  const states = dfa.getStates();
  const alphabet = dfa.getAlphabet();
  const inverse = inverseTransitions(dfa, states);

  const predecessors = (splitter: NumberSet, symbol: InputSymbol) => {
    const result: Set<StateID> = new Set();
    const bySymbol = inverse.get(symbol);
    if (bySymbol) {
      for (const target of splitter) {
        for (const from of bySymbol.get(target) ?? []) {
          result.add(from);
        }
      }
    }
    return new NumberSet(result);
  };

  const partition = new Partition([
    new NumberSet(states.filter((s) => !dfa.isAcceptingState(s))),
    new NumberSet(states.filter((s) => dfa.isAcceptingState(s))),
  ]);

  /**
   * Refine the partition with the given splitter, queueing the smaller
   * half of every split.
   *
   * @returns whether any class was split.
   */
  const refine = (splitter: NumberSet, queue: NumberSet[]): boolean => {
    let changed = false;
    for (const symbol of alphabet) {
      const preds = predecessors(splitter, symbol);
      if (preds.size == 0) {
        continue;
      }
      const halves = partition.splitBy(preds);
      queue.push(...halves);
      changed = changed || halves.length > 0;
    }
    return changed;
  };

  const queue = [...partition.classes];
  let rounds = 0;
  let stable = false;
  while (!stable) {
    rounds++;
    for (let splitter = queue.shift(); splitter; splitter = queue.shift()) {
      refine(splitter, queue);
    }
    // The queue only holds the smaller half of each split, so confirm the
    // fixpoint by trying every current class as a splitter.
    stable = true;
    for (const cls of [...partition.classes]) {
      if (refine(cls, queue)) {
        stable = false;
      }
    }
  }

  const classOf = partition.classOf();
  const classIndex = (state: StateID): number => {
    const index = classOf.get(state);
    if (index === undefined) {
      throw new Error(`State ${state} is not in any class`);
    }
    return index;
  };

  const transitions: Map<StateID, Map<InputSymbol, StateID>> = new Map();
  const accept: Set<StateID> = new Set();
  for (const [ci, cls] of partition.classes.entries()) {
    // every member of a class behaves the same, so any one will do
    const representative = cls.min();
    if (representative === undefined) {
      throw new Error(`Class ${ci} is empty`);
    }
    const row: Map<InputSymbol, StateID> = new Map();
    for (const [symbol, to] of dfa.getEdges(representative)) {
      row.set(symbol, classIndex(to));
    }
    transitions.set(ci, row);
    if (cls.intersects(dfa.accept)) {
      accept.add(ci);
    }
  }

  log(
    `${states.length} dfa states -> ${partition.classes.length} classes after ${rounds} round(s)`
  );
  return new DFA(classIndex(dfa.start), accept, transitions);
}
