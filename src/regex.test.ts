import { Regex } from './regex.js';
import { UnexpectedEndError } from './regex-compiler/errors.js';

const cases: [string, { matches: string[]; fails?: string[] }][] = [
  [
    '(a+b)*abb',
    {
      matches: ['abb', 'ababb', 'aaaaabb', 'bbaabaababababb'],
      fails: ['ab', 'abba'],
    },
  ],
  ['ab*b', { matches: ['ab', 'abbb'], fails: ['a', 'abc'] }],
  ['(ab)(ab)*', { matches: ['ab', 'abababab'], fails: ['', 'aba'] }],
  ['0+1(0+1)*', { matches: ['0', '1', '10', '1101'], fails: ['01', '00'] }],
  ['a b', { matches: ['ab'], fails: ['a b'] }],
];

describe('Regex', () => {
  for (const [pattern, { matches, fails = [] }] of cases) {
    const regex = new Regex(pattern);
    for (const input of matches) {
      test(`${pattern} matches ${input}`, () => {
        expect(regex.test(input)).toBe(true);
      });
    }
    for (const input of fails) {
      test(`${pattern} does not match ${input}`, () => {
        expect(regex.test(input)).toBe(false);
      });
    }
  }

  test('minDFA', () => {
    expect(new Regex('(a+b)*c').minDFA.numStates).toBe(2);
    expect(new Regex('(a+b)*abb').minDFA.numStates).toBe(4);
  });

  test('throws on a bad pattern', () => {
    expect(() => new Regex('a+')).toThrow(UnexpectedEndError);
  });
});
