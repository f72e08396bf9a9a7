import { DFA } from './nfa-to-dfa/dfa.js';

/**
 * Every string over the alphabet with at most maxLength characters,
 * shortest first.
 */
export function allStrings(alphabet: string[], maxLength: number): string[] {
  const out = [''];
  let previous = [''];
  for (let length = 1; length <= maxLength; length++) {
    const next: string[] = [];
    for (const prefix of previous) {
      for (const symbol of alphabet) {
        next.push(prefix + symbol);
      }
    }
    out.push(...next);
    previous = next;
  }
  return out;
}

/**
 * (a+b)*abb, as the subset construction produces it: states 0 and 2 are
 * equivalent.
 */
export function redundantABB(): DFA {
  return new DFA(
    0,
    [4],
    new Map([
      [0, new Map([['a', 1], ['b', 2]])],
      [1, new Map([['a', 1], ['b', 3]])],
      [2, new Map([['a', 1], ['b', 2]])],
      [3, new Map([['a', 1], ['b', 4]])],
      [4, new Map([['a', 1], ['b', 2]])],
    ])
  );
}
