import { err, ok, type Result } from 'neverthrow';
import { eliminateEpsilon, type NFAFromEpsilonNFA } from './nfa-to-dfa/eliminate.js';
import { buildEpsilonNFA, type EpsilonNFA } from './nfa-to-dfa/epsilon-nfa.js';
import type { DFA } from './nfa-to-dfa/dfa.js';
import { toDot } from './nfa-to-dfa/dot.js';
import { minimize, type MinimizeOptions } from './nfa-to-dfa/minimize.js';
import { determinize, type DFAFromNFA } from './nfa-to-dfa/subset.js';
import type { RegexNode } from './regex-compiler/ast.js';
import type { RegexSyntaxError } from './regex-compiler/errors.js';
import { RegexParser } from './regex-compiler/parser.js';

export type PipelineOptions = MinimizeOptions;

/**
 * Every stage the pipeline went through, from the AST to the minimal DFA.
 */
export type PipelineOutput = {
  ast: RegexNode;
  epsilonNFA: EpsilonNFA;
  nfa: NFAFromEpsilonNFA;
  dfa: DFAFromNFA;
  minDFA: DFA;
};

export type Stage = 'epsilon' | 'nfa' | 'dfa' | 'min';

export function compileAST(
  ast: RegexNode,
  options: PipelineOptions = {}
): PipelineOutput {
  const epsilonNFA = buildEpsilonNFA(ast);
  const nfa = eliminateEpsilon(epsilonNFA);
  const dfa = determinize(nfa);
  const minDFA = minimize(dfa, options);
  return { ast, epsilonNFA, nfa, dfa, minDFA };
}

export function compileRegex(
  pattern: string,
  options: PipelineOptions = {}
): Result<PipelineOutput, RegexSyntaxError> {
  const parsed = RegexParser.parse(pattern);
  if (parsed.isErr()) {
    return err(parsed.error);
  }
  return ok(compileAST(parsed.value, options));
}

/**
 * Pick the automaton of one stage out of the pipeline output.
 */
export function stageAutomaton(output: PipelineOutput, stage: Stage) {
  switch (stage) {
    case 'epsilon':
      return output.epsilonNFA;
    case 'nfa':
      return output.nfa;
    case 'dfa':
      return output.dfa;
    case 'min':
      return output.minDFA;
  }
}

/**
 * Render the automaton of one stage as a Graphviz digraph.
 */
export function stageDot(output: PipelineOutput, stage: Stage): string {
  switch (stage) {
    case 'epsilon':
      return toDot(output.epsilonNFA);
    case 'nfa':
      return toDot(output.nfa);
    case 'dfa':
      return toDot(output.dfa);
    case 'min':
      return toDot(output.minDFA);
  }
}
