import type { ConstAutomaton, Edge } from './automaton.js';
import type { StateID } from './label.js';

/**
 * Compute a depth-first numbering of the states reachable from the start
 * state. The start state becomes 0 and the first edge out of a state is
 * explored before the others.
 *
 * @returns a mapping from old state ids to new ones. States that can't be
 * reached from the start state have no entry.
 */
export function depthFirstNumbering<L>(
  automaton: ConstAutomaton<L>
): Map<StateID, StateID> {
  const oldToNew: Map<StateID, StateID> = new Map();
  const stack: StateID[] = [automaton.start];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || oldToNew.has(current)) {
      continue;
    }
    oldToNew.set(current, oldToNew.size);
    const edges = automaton.getEdges(current);
    for (let i = edges.length - 1; i >= 0; i--) {
      const [, to] = edges[i];
      if (!oldToNew.has(to)) {
        stack.push(to);
      }
    }
  }
  return oldToNew;
}

/**
 * Rewrite an automaton's start state, accepting states and edges through a
 * depth-first numbering, dropping unreachable states. The result can be
 * passed straight to the constructor of the automaton's class.
 */
export function renumberParts<L>(
  automaton: ConstAutomaton<L>
): [StateID, StateID[], Map<StateID, Edge<L>[]>] {
  const oldToNew = depthFirstNumbering(automaton);
  const edges: Map<StateID, Edge<L>[]> = new Map();
  const accept: StateID[] = [];
  for (const [oldState, newState] of oldToNew) {
    const out: Edge<L>[] = [];
    for (const [l, to] of automaton.getEdges(oldState)) {
      const newTo = oldToNew.get(to);
      if (newTo !== undefined) {
        out.push([l, newTo]);
      }
    }
    edges.set(newState, out);
    if (automaton.isAcceptingState(oldState)) {
      accept.push(newState);
    }
  }
  return [0, accept, edges];
}
