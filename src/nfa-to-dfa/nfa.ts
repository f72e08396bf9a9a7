import { Automaton, type Edge } from './automaton.js';
import type { InputSymbol, StateID } from './label.js';
import { renumberParts } from './renumber.js';

/**
 * An epsilon-free automaton. A state may have several edges labeled with
 * the same symbol.
 */
export class NFA extends Automaton<InputSymbol> {
  readonly kind = 'nfa' as const;

  constructor(
    start: StateID,
    accept: Iterable<StateID>,
    edges: Iterable<readonly [StateID, Iterable<Edge<InputSymbol>>]>
  ) {
    super(start, accept, edges);
  }

  labelToString(symbol: InputSymbol): string {
    return symbol;
  }

  /**
   * Get all the states you can get to from the given state by consuming
   * the given symbol.
   */
  getNextStates(state: StateID, symbol: InputSymbol): StateID[] {
    const next: StateID[] = [];
    for (const [l, to] of this.getEdges(state)) {
      if (l == symbol && next.indexOf(to) == -1) {
        next.push(to);
      }
    }
    return next;
  }

  /**
   * Every symbol that labels some edge, in ascending order.
   */
  getAlphabet(): InputSymbol[] {
    const alphabet: Set<InputSymbol> = new Set();
    for (const [, symbol] of this.edgeList()) {
      alphabet.add(symbol);
    }
    return [...alphabet].sort();
  }

  /**
   * Simulate the automaton on the input by tracking every state it could
   * be in at once.
   */
  accepts(input: string): boolean {
    let current = new Set([this.start]);
    for (const symbol of input) {
      const next: Set<StateID> = new Set();
      for (const state of current) {
        for (const to of this.getNextStates(state, symbol)) {
          next.add(to);
        }
      }
      if (next.size == 0) {
        return false;
      }
      current = next;
    }
    for (const state of current) {
      if (this.isAcceptingState(state)) {
        return true;
      }
    }
    return false;
  }

  renumbered(): NFA {
    return new NFA(...renumberParts(this));
  }
}
