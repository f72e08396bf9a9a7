import type { ConstAutomaton } from './automaton.js';

const GRAPH_NAMES = {
  'epsilon-nfa': 'ENFA',
  nfa: 'NFA',
  dfa: 'DFA',
};

function escape(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Render an automaton as a Graphviz digraph, laid out left to right.
 * Accepting states are drawn as double circles and an invisible point
 * node marks the start.
 */
export function toDot<L>(
  automaton: ConstAutomaton<L>,
  name: string = GRAPH_NAMES[automaton.kind]
): string {
  const lines: string[] = [];
  lines.push(`digraph ${name} {`);
  lines.push('  rankdir=LR;');
  lines.push('  node [shape=circle];');
  lines.push('  start [shape=point];');
  lines.push(`  start -> ${automaton.start};`);
  for (const state of automaton.getStates()) {
    if (automaton.isAcceptingState(state)) {
      lines.push(`  ${state} [shape=doublecircle];`);
    }
  }
  for (const from of automaton.getStates()) {
    for (const [l, to] of automaton.getEdges(from)) {
      lines.push(
        `  ${from} -> ${to} [label="${escape(automaton.labelToString(l))}"];`
      );
    }
  }
  lines.push('}');
  return lines.join('\n') + '\n';
}
