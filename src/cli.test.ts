import { runPattern, type RunOptions } from './cli.js';

function run(options: RunOptions) {
  const lines: string[] = [];
  const code = runPattern(options, (line) => lines.push(line));
  return { code, lines };
}

describe('runPattern', () => {
  test('reports each input', () => {
    expect(run({ pattern: 'a+b', inputs: ['a', 'ab', 'b'] })).toEqual({
      code: 0,
      lines: ['accept a', 'reject ab', 'accept b'],
    });
  });

  test('verbose prints the size of every stage', () => {
    expect(run({ pattern: 'a+b', inputs: [], verbose: true })).toEqual({
      code: 0,
      lines: [
        'epsilon: 6 states',
        'nfa: 3 states',
        'dfa: 3 states',
        'min: 2 states',
      ],
    });
  });

  test('dot prints the chosen stage', () => {
    expect(run({ pattern: 'a', inputs: [''], dot: 'min' })).toEqual({
      code: 0,
      lines: [
        [
          'digraph DFA {',
          '  rankdir=LR;',
          '  node [shape=circle];',
          '  start [shape=point];',
          '  start -> 0;',
          '  1 [shape=doublecircle];',
          '  0 -> 1 [label="a"];',
          '}',
        ].join('\n'),
        'reject ',
      ],
    });
  });

  test('syntax errors point at the pattern', () => {
    expect(run({ pattern: 'a)', inputs: ['a'] })).toEqual({
      code: 1,
      lines: ["ParseError at 1: unexpected token ')'", '  a)', '  -^'],
    });
  });
});
