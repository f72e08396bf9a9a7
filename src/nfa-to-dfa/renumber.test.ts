import { DFA } from './dfa.js';
import { depthFirstNumbering, renumberParts } from './renumber.js';

describe('depthFirstNumbering', () => {
  // state 4 can't be reached
  const dfa = new DFA(
    0,
    [3],
    [
      [0, [['b', 2], ['a', 1]]],
      [1, [['a', 3]]],
      [2, [['a', 1]]],
      [3, []],
      [4, [['a', 0]]],
    ]
  );

  test('explores the first edge first', () => {
    expect([...depthFirstNumbering(dfa)]).toEqual([
      [0, 0],
      [2, 1],
      [1, 2],
      [3, 3],
    ]);
  });

  test('renumberParts() rewrites every edge', () => {
    const [start, accept, edges] = renumberParts(dfa);
    expect(start).toBe(0);
    expect(accept).toEqual([3]);
    expect([...edges]).toEqual([
      [0, [['b', 1], ['a', 2]]],
      [1, [['a', 2]]],
      [2, [['a', 3]]],
      [3, []],
    ]);
  });

  test('renumbering twice changes nothing', () => {
    const once = dfa.renumbered();
    const twice = once.renumbered();
    expect([...twice.edgeList()]).toEqual([...once.edgeList()]);
    expect([...twice.accept]).toEqual([...once.accept]);
  });
});
