import { err, ok, type Result } from 'neverthrow';
import {
  charNode,
  concatNode,
  type RegexNode,
  starNode,
  unionNode,
} from './ast.js';
import {
  RegexSyntaxError,
  UnexpectedEndError,
  UnexpectedTokenError,
} from './errors.js';
import { type Lexeme, Lexer, Token } from './lexer.js';

/**
 * Recursive descent parser for patterns. From loosest to tightest binding:
 *
 *   expr    := term ('+' term)*
 *   term    := factor factor*
 *   factor  := primary '*'*
 *   primary := CHAR | '(' expr ')'
 *
 * Union and concatenation associate to the left.
 */
export class RegexParser {
  private tokens: Lexeme[];
  private pos: number = 0;
  private endOffset: number;

  private constructor(tokens: Lexeme[], endOffset: number) {
    this.tokens = tokens;
    this.endOffset = endOffset;
  }

  static parse(input: string | Lexeme[]): Result<RegexNode, RegexSyntaxError> {
    let tokens: Lexeme[];
    let endOffset: number;
    if (typeof input == 'string') {
      const lexed = Lexer.lex(input);
      if (lexed.isErr()) {
        return err(lexed.error);
      }
      tokens = lexed.value;
      endOffset = [...input].length;
    } else {
      tokens = input;
      endOffset = input.length > 0 ? input[input.length - 1].span.to : 0;
    }
    try {
      return ok(new RegexParser(tokens, endOffset).parseAll());
    } catch (e) {
      if (e instanceof RegexSyntaxError) {
        return err(e);
      }
      throw e;
    }
  }

  static parseOrThrow(input: string | Lexeme[]): RegexNode {
    const result = RegexParser.parse(input);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }

  private peek(): Lexeme | undefined {
    return this.tokens[this.pos];
  }

  private consume(): Lexeme {
    const token = this.tokens[this.pos];
    if (token === undefined) {
      throw new UnexpectedEndError(this.endOffset);
    }
    this.pos++;
    return token;
  }

  private expect(kind: Token): Lexeme {
    const token = this.consume();
    if (token.token != kind) {
      throw new UnexpectedTokenError(token);
    }
    return token;
  }

  private parseAll(): RegexNode {
    const node = this.parseExpr();
    const leftover = this.peek();
    if (leftover) {
      throw new UnexpectedTokenError(leftover);
    }
    return node;
  }

  private parseExpr(): RegexNode {
    let node = this.parseTerm();
    while (this.peek()?.token == Token.PLUS) {
      this.consume();
      node = unionNode(node, this.parseTerm());
    }
    return node;
  }

  private parseTerm(): RegexNode {
    let node = this.parseFactor();
    for (
      let next = this.peek()?.token;
      next == Token.CHAR || next == Token.OPEN_PAREN;
      next = this.peek()?.token
    ) {
      node = concatNode(node, this.parseFactor());
    }
    return node;
  }

  private parseFactor(): RegexNode {
    let node = this.parsePrimary();
    while (this.peek()?.token == Token.STAR) {
      this.consume();
      node = starNode(node);
    }
    return node;
  }

  private parsePrimary(): RegexNode {
    const token = this.consume();
    switch (token.token) {
      case Token.CHAR:
        return charNode(token.substr);
      case Token.OPEN_PAREN: {
        const node = this.parseExpr();
        this.expect(Token.CLOSE_PAREN);
        return node;
      }
      default:
        throw new UnexpectedTokenError(token);
    }
  }
}

export const parseRegex = RegexParser.parseOrThrow;
