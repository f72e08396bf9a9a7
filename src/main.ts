#!/usr/bin/env node
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { runPattern, STAGES } from './cli.js';
import { useColors } from './utils/debug.js';

yargs(hideBin(process.argv))
  .command({
    command: '$0 <pattern> [inputs..]',
    describe: 'test inputs against a pattern',
    builder: (y) =>
      y
        .positional('pattern', {
          type: 'string',
          describe: 'pattern to compile, e.g. (a+b)*c',
          demandOption: true,
        })
        .positional('inputs', {
          type: 'string',
          array: true,
          describe: 'strings to test against the pattern',
          default: [] as string[],
        })
        .option('dot', {
          choices: STAGES,
          description:
            'print the automaton of the given stage as a graphviz digraph',
        })
        .option('prune', {
          type: 'boolean',
          description: 'drop unreachable states before minimizing',
          default: false,
        })
        .option('verbose', {
          alias: 'v',
          type: 'boolean',
          description: 'print the number of states of every stage',
          default: false,
        })
        .option('color', {
          type: 'boolean',
          description: 'color the output',
          default: process.stdout.isTTY === true,
        }),
    handler: (args) => {
      useColors(args.color);
      process.exitCode = runPattern({
        pattern: args.pattern,
        inputs: args.inputs,
        dot: args.dot,
        prune: args.prune,
        verbose: args.verbose,
      });
    },
  })
  .strict()
  .parseSync();
