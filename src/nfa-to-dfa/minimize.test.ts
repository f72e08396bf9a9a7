import { parseRegex } from '../regex-compiler/parser.js';
import { allStrings, redundantABB } from '../test-util.js';
import { DFA } from './dfa.js';
import { eliminateEpsilon } from './eliminate.js';
import { buildEpsilonNFA } from './epsilon-nfa.js';
import { minimize } from './minimize.js';
import { determinize } from './subset.js';

const compile = (pattern: string) =>
  determinize(eliminateEpsilon(buildEpsilonNFA(parseRegex(pattern))));

describe('minimize', () => {
  test('a single state stays a single state', () => {
    const min = minimize(new DFA(0, [0], [[0, [['a', 0]]]]));
    expect(min.numStates).toBe(1);
    expect([...min.accept]).toEqual([0]);
    expect(min.getNextState(0, 'a')).toBe(0);
  });

  test('an already minimal DFA keeps its size', () => {
    const abb = new DFA(
      0,
      [3],
      new Map([
        [0, new Map([['a', 1], ['b', 0]])],
        [1, new Map([['a', 1], ['b', 2]])],
        [2, new Map([['a', 1], ['b', 3]])],
        [3, new Map([['a', 1], ['b', 0]])],
      ])
    );
    expect(minimize(abb).numStates).toBe(4);
  });

  test('equivalent accepting states merge', () => {
    const min = minimize(
      new DFA(
        0,
        [1, 2],
        [
          [0, [['a', 1], ['b', 2]]],
          [1, []],
          [2, []],
        ]
      )
    );
    expect(min.numStates).toBe(2);
    expect(min.start).toBe(0);
    expect([...min.accept]).toEqual([1]);
    expect(min.getNextState(0, 'a')).toBe(1);
    expect(min.getNextState(0, 'b')).toBe(1);
  });

  test('equivalent non-accepting states merge', () => {
    const dfa = redundantABB();
    const min = minimize(dfa);
    expect(min.numStates).toBe(4);
    for (const input of allStrings(['a', 'b'], 6)) {
      expect([input, min.accepts(input)]).toEqual([input, dfa.accepts(input)]);
    }
  });

  test('without accepting states everything merges', () => {
    const min = minimize(
      new DFA(
        0,
        [],
        [
          [0, [['a', 1]]],
          [1, [['a', 0]]],
        ]
      )
    );
    expect(min.numStates).toBe(1);
    expect(min.accept.size).toBe(0);
    expect(min.accepts('aa')).toBe(false);
  });

  test('a missing edge tells states apart', () => {
    // 0 and 1 both reject, but only 0 can move on
    const min = minimize(
      new DFA(
        0,
        [],
        [
          [0, [['a', 1]]],
          [1, []],
        ]
      )
    );
    expect(min.numStates).toBe(2);
  });

  describe('unreachable states', () => {
    const dfa = new DFA(
      0,
      [1],
      [
        [0, [['a', 1]]],
        [1, []],
        [2, [['b', 1]]],
      ]
    );

    test('are kept by default', () => {
      const min = minimize(dfa);
      expect(min.numStates).toBe(3);
      expect(min.start).toBe(0);
      expect([...min.accept]).toEqual([2]);
      expect(min.getNextState(0, 'a')).toBe(2);
      expect(min.getNextState(1, 'b')).toBe(2);
    });

    test('are dropped with prune', () => {
      const min = minimize(dfa, { prune: true });
      expect(min.numStates).toBe(2);
      expect([...min.accept]).toEqual([1]);
      expect(min.getNextState(0, 'a')).toBe(1);
    });
  });

  test('(a+b)*c', () => {
    const min = minimize(compile('(a+b)*c'));
    expect(min.numStates).toBe(2);
    expect([...min.accept]).toEqual([1]);
    expect(min.getEdges(0)).toEqual([
      ['a', 0],
      ['b', 0],
      ['c', 1],
    ]);
    expect(min.getEdges(1)).toEqual([]);
  });

  test('a*', () => {
    const min = minimize(compile('a*'));
    expect(min.numStates).toBe(1);
    expect([...min.accept]).toEqual([0]);
    expect(min.getNextState(0, 'a')).toBe(0);
  });

  test.each(['(a+b)*c', '(ab+a)*', 'a(b+c)*d', '(a*b*)*', '(a+ab)(b+ba)*'])(
    '%s: preserves the language and is idempotent',
    (pattern) => {
      const dfa = compile(pattern);
      const min = minimize(dfa);
      expect(min.numStates).toBeLessThanOrEqual(dfa.numStates);
      expect(minimize(min).numStates).toBe(min.numStates);
      for (const input of allStrings([...dfa.getAlphabet(), 'x'], 5)) {
        expect([input, min.accepts(input)]).toEqual([input, dfa.accepts(input)]);
      }
    }
  );
});
