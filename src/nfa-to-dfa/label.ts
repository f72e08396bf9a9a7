/**
 * Dense, non-negative handle for a state within one automaton.
 */
export type StateID = number;

/**
 * A single input character.
 */
export type InputSymbol = string;

export type TransitionLabel =
  | { kind: 'epsilon' }
  | { kind: 'symbol'; symbol: InputSymbol };

export const EPSILON: TransitionLabel = { kind: 'epsilon' };

export function label(symbol: InputSymbol): TransitionLabel {
  if ([...symbol].length != 1) {
    throw new Error(`A label must be a single character. Given: ${symbol}`);
  }
  return { kind: 'symbol', symbol };
}

export function isEpsilon(
  l: TransitionLabel
): l is { kind: 'epsilon' } {
  return l.kind == 'epsilon';
}

export function labelToString(l: TransitionLabel): string {
  return l.kind == 'epsilon' ? 'ε' : l.symbol;
}

/**
 * Hands out state ids in increasing order, starting at 0.
 */
export class StateAllocator {
  private next: StateID = 0;

  allocate(): StateID {
    return this.next++;
  }

  /**
   * Number of states allocated so far.
   */
  get count(): number {
    return this.next;
  }
}
