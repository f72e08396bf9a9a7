import type { DFA } from './nfa-to-dfa/dfa.js';
import { compileAST, type PipelineOptions } from './pipeline.js';
import { RegexParser } from './regex-compiler/parser.js';

export class Regex {
  pattern: string;
  private dfa: DFA;

  /**
   * @throws RegexSyntaxError if the pattern can't be parsed
   */
  constructor(pattern: string, options: PipelineOptions = {}) {
    this.pattern = pattern;
    const node = RegexParser.parseOrThrow(this.pattern);
    this.dfa = compileAST(node, options).minDFA;
  }

  get minDFA(): DFA {
    return this.dfa;
  }

  /**
   * Whether the whole input matches the pattern.
   */
  test(input: string): boolean {
    return this.dfa.accepts(input);
  }
}
