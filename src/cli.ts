import {
  compileRegex,
  stageAutomaton,
  stageDot,
  type Stage,
} from './pipeline.js';
import { colors, scopedLog } from './utils/debug.js';

const log = scopedLog('cli');

export const STAGES: readonly Stage[] = ['epsilon', 'nfa', 'dfa', 'min'];

export type RunOptions = {
  pattern: string;
  inputs: string[];
  dot?: Stage;
  prune?: boolean;
  verbose?: boolean;
};

/**
 * Compile the pattern and test every input against it, writing one line
 * per input to `print`.
 *
 * @returns the process exit code
 */
export function runPattern(
  options: RunOptions,
  print: (line: string) => void = console.log
): number {
  const { pattern, inputs, dot, prune = false, verbose = false } = options;
  const compiled = compileRegex(pattern, { prune });
  if (compiled.isErr()) {
    const error = compiled.error;
    print(colors.red(error.message));
    for (const line of error.atSource(pattern)) {
      print('  ' + line);
    }
    return 1;
  }
  const output = compiled.value;
  log(`compiled ${pattern}`);

  if (verbose) {
    for (const stage of STAGES) {
      print(`${stage}: ${stageAutomaton(output, stage).numStates} states`);
    }
  }
  if (dot) {
    print(stageDot(output, dot).trimEnd());
  }
  for (const input of inputs) {
    if (output.minDFA.accepts(input)) {
      print(`${colors.green('accept')} ${input}`);
    } else {
      print(`${colors.red('reject')} ${input}`);
    }
  }
  return 0;
}
