import { NumberSet } from '../utils/sets.js';
import { Automaton, type Edge } from './automaton.js';
import type { InputSymbol, StateID } from './label.js';
import { renumberParts } from './renumber.js';

/**
 * A deterministic automaton: at most one edge per symbol out of every
 * state. A missing edge means the input is rejected.
 */
export class DFA extends Automaton<InputSymbol> {
  readonly kind = 'dfa' as const;
  private readonly table: Map<StateID, Map<InputSymbol, StateID>> = new Map();

  /**
   * @param transitions for every state, its outgoing edges. A
   * `Map<StateID, Map<InputSymbol, StateID>>` works as is.
   */
  constructor(
    start: StateID,
    accept: Iterable<StateID>,
    transitions: Iterable<readonly [StateID, Iterable<Edge<InputSymbol>>]>
  ) {
    super(start, accept, transitions);
    for (const from of this.getStates()) {
      const row: Map<InputSymbol, StateID> = new Map();
      for (const [symbol, to] of this.getEdges(from)) {
        const existing = row.get(symbol);
        if (existing !== undefined && existing != to) {
          throw new Error(
            `There is already an edge from ${from} to ${existing} via ${symbol}`
          );
        }
        row.set(symbol, to);
      }
      this.table.set(from, row);
    }
  }

  labelToString(symbol: InputSymbol): string {
    return symbol;
  }

  getNextState(state: StateID, symbol: InputSymbol): StateID | null {
    return this.table.get(state)?.get(symbol) ?? null;
  }

  /**
   * Every symbol that labels some edge, in ascending order.
   */
  getAlphabet(): InputSymbol[] {
    const alphabet: Set<InputSymbol> = new Set();
    for (const row of this.table.values()) {
      for (const symbol of row.keys()) {
        alphabet.add(symbol);
      }
    }
    return [...alphabet].sort();
  }

  /**
   * Whether the whole input is in the language of this automaton.
   */
  accepts(input: string): boolean {
    let state = this.start;
    for (const symbol of input) {
      const next = this.getNextState(state, symbol);
      if (next === null) {
        return false;
      }
      state = next;
    }
    return this.isAcceptingState(state);
  }

  /**
   * States that some input (possibly empty) leads to from the start state.
   */
  reachableStates(): NumberSet {
    const visited: Set<StateID> = new Set([this.start]);
    const queue = [this.start];
    for (let i = 0; i < queue.length; i++) {
      for (const [, to] of this.getEdges(queue[i])) {
        if (!visited.has(to)) {
          visited.add(to);
          queue.push(to);
        }
      }
    }
    return new NumberSet(visited);
  }

  renumbered(): DFA {
    return new DFA(...renumberParts(this));
  }
}

/**
 * Run the dfa over the input, one symbol at a time.
 */
export function accepts(dfa: DFA, input: string): boolean {
  return dfa.accepts(input);
}

/**
 * Drop every state that can't be reached from the start state. State ids
 * are kept as they are.
 */
export function pruneUnreachable(dfa: DFA): DFA {
  const reachable = dfa.reachableStates();
  const transitions: [StateID, Edge<InputSymbol>[]][] = [];
  for (const state of reachable.sorted()) {
    transitions.push([state, [...dfa.getEdges(state)]]);
  }
  return new DFA(
    dfa.start,
    [...dfa.accept].filter((s) => reachable.has(s)),
    transitions
  );
}
