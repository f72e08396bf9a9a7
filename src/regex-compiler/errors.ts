import type { Lexeme } from './lexer.js';

/**
 * Base class of everything that can go wrong turning a pattern into an AST.
 */
export class RegexSyntaxError extends Error {
  /**
   * Index of the offending character in the pattern.
   */
  readonly offset: number;

  constructor(offset: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.offset = offset;
  }

  /**
   * Lines pointing at the offending character of the given pattern.
   */
  atSource(pattern: string): string[] {
    return [pattern, '^'.padStart(this.offset + 1, '-')];
  }
}

export class LexError extends RegexSyntaxError {
  readonly char: string;
  constructor(offset: number, char: string) {
    super(offset, `LexError at ${offset}: unexpected character '${char}'`);
    this.char = char;
  }
}

export class UnexpectedTokenError extends RegexSyntaxError {
  readonly token: Lexeme;
  constructor(token: Lexeme) {
    super(
      token.span.from,
      `ParseError at ${token.span.from}: unexpected token '${token.substr}'`
    );
    this.token = token;
  }
}

export class UnexpectedEndError extends RegexSyntaxError {
  constructor(offset: number) {
    super(offset, `ParseError at ${offset}: unexpected end of input`);
  }
}
