import { err, ok, type Result } from 'neverthrow';
import { colors } from '../utils/debug.js';
import { LexError } from './errors.js';

export enum Token {
  CHAR = 'CHAR',
  PLUS = 'PLUS',
  STAR = 'STAR',
  OPEN_PAREN = 'OPEN_PAREN',
  CLOSE_PAREN = 'CLOSE_PAREN',
}

/**
 * Character offsets into the pattern, end exclusive.
 */
export type Span = { from: number; to: number };

/**
 * One token of a pattern and the text it was read from.
 */
export class Lexeme {
  readonly token: Token;
  readonly span: Span;
  readonly substr: string;

  constructor(token: Token, offset: number, substr: string) {
    this.token = token;
    this.span = { from: offset, to: offset + [...substr].length };
    this.substr = substr;
  }

  toString() {
    return (
      colors.green(`<${this.token}>`) +
      this.substr +
      colors.green(`</${this.token}>`)
    );
  }
}

const OPERATORS: { [char: string]: Token } = {
  '+': Token.PLUS,
  '*': Token.STAR,
  '(': Token.OPEN_PAREN,
  ')': Token.CLOSE_PAREN,
};

const LITERAL = /^[\p{L}\p{N}]$/u;
const WHITESPACE = /^\s$/u;

export class Lexer {
  /**
   * Split a pattern into tokens. Letters and digits are literals,
   * whitespace is skipped, and anything else is an error.
   *
   * Offsets count characters (code points), not UTF-16 code units.
   */
  static lex(input: string): Result<Lexeme[], LexError> {
    const tokens: Lexeme[] = [];
    const chars = [...input];
    for (let offset = 0; offset < chars.length; offset++) {
      const char = chars[offset];
      const operator = OPERATORS[char];
      if (operator !== undefined) {
        tokens.push(new Lexeme(operator, offset, char));
      } else if (LITERAL.test(char)) {
        tokens.push(new Lexeme(Token.CHAR, offset, char));
      } else if (!WHITESPACE.test(char)) {
        return err(new LexError(offset, char));
      }
    }
    return ok(tokens);
  }

  static lexOrThrow(input: string): Lexeme[] {
    const result = Lexer.lex(input);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }
}
