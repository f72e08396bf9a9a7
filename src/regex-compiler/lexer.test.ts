import { LexError } from './errors.js';
import { Lexer, Token } from './lexer.js';

describe('Lexer', () => {
  test('tokens', () => {
    const tokens = Lexer.lexOrThrow('(a+b)*c');
    expect(tokens.map((t) => t.token)).toEqual([
      Token.OPEN_PAREN,
      Token.CHAR,
      Token.PLUS,
      Token.CHAR,
      Token.CLOSE_PAREN,
      Token.STAR,
      Token.CHAR,
    ]);
    expect(tokens.map((t) => t.substr).join('')).toEqual('(a+b)*c');
  });

  test('whitespace is skipped but counts toward offsets', () => {
    const tokens = Lexer.lexOrThrow(' a\tb ');
    expect(tokens.map((t) => [t.substr, t.span])).toEqual([
      ['a', { from: 1, to: 2 }],
      ['b', { from: 3, to: 4 }],
    ]);
  });

  test('letters and digits outside ASCII are literals', () => {
    const tokens = Lexer.lexOrThrow('ß9ж');
    expect(tokens.map((t) => t.token)).toEqual([
      Token.CHAR,
      Token.CHAR,
      Token.CHAR,
    ]);
  });

  test('offsets count characters, not code units', () => {
    const error = Lexer.lex('𝐀.')._unsafeUnwrapErr();
    expect(error.offset).toBe(1);
    expect(error.char).toBe('.');
  });

  test('anything else is an error', () => {
    const error = Lexer.lex('ab-c')._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(LexError);
    expect(error.name).toBe('LexError');
    expect(error.message).toBe("LexError at 2: unexpected character '-'");
    expect(() => Lexer.lexOrThrow('|')).toThrow(
      "LexError at 0: unexpected character '|'"
    );
  });

  test('toString()', () => {
    expect(Lexer.lexOrThrow('a*').map((t) => t.toString())).toEqual([
      '<CHAR>a</CHAR>',
      '<STAR>*</STAR>',
    ]);
  });
});
