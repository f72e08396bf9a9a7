import { scopedLog } from '../utils/debug.js';
import { NumberSet, numberSetMap } from '../utils/sets.js';
import type { ConstAutomaton, Edge } from './automaton.js';
import type { EpsilonNFA } from './epsilon-nfa.js';
import type { InputSymbol, StateID, TransitionLabel } from './label.js';
import { NFA } from './nfa.js';

const log = scopedLog('eliminate');

type EpsilonAutomaton = ConstAutomaton<TransitionLabel>;

const EMPTY = new NumberSet();

/**
 * compute the epsilon closure of a single state.
 *
 * @returns the set of states reachable from the given state by only
 * traversing epsilon edges, including the state itself.
 */
export function epsilonClosure(
  automaton: EpsilonAutomaton,
  state: StateID
): NumberSet {
  return epsilonClosureOfSet(automaton, [state]);
}

/**
 * compute the epsilon closure of a set of states with a single breadth
 * first traversal, so states shared between closures are only visited once.
 */
export function epsilonClosureOfSet(
  automaton: EpsilonAutomaton,
  states: Iterable<StateID>
): NumberSet {
  const visited: Set<StateID> = new Set();
  const queue: StateID[] = [];
  for (const state of states) {
    if (!visited.has(state)) {
      visited.add(state);
      queue.push(state);
    }
  }
  for (let i = 0; i < queue.length; i++) {
    for (const [l, to] of automaton.getEdges(queue[i])) {
      if (l.kind == 'epsilon' && !visited.has(to)) {
        visited.add(to);
        queue.push(to);
      }
    }
  }
  return new NumberSet(visited);
}

/**
 * move(T,a)
 *
 * Set of states to which there is a transition on input symbol a from some
 * state s in T. Epsilon edges are not followed.
 */
export function move(
  automaton: EpsilonAutomaton,
  states: Iterable<StateID>,
  symbol: InputSymbol
): NumberSet {
  const next: Set<StateID> = new Set();
  for (const state of states) {
    for (const [l, to] of automaton.getEdges(state)) {
      if (l.kind == 'symbol' && l.symbol == symbol) {
        next.add(to);
      }
    }
  }
  return next.size == 0 ? EMPTY : new NumberSet(next);
}

/**
 * An epsilon-free NFA that remembers which epsilon closure each of its
 * states stands for.
 */
export class NFAFromEpsilonNFA extends NFA {
  readonly closures: readonly NumberSet[];

  constructor(
    closures: NumberSet[],
    accept: Iterable<StateID>,
    edges: Iterable<readonly [StateID, Iterable<Edge<InputSymbol>>]>
  ) {
    super(0, accept, edges);
    this.closures = closures;
  }

  override toDebugStr() {
    let out = 'NFAFromEpsilonNFA:\n' + super.toDebugStr();
    out += '\n';
    out += 'Mapping from NFA state to epsilon closure:\n';
    for (const [si, closure] of this.closures.entries()) {
      out += `s${si}: ${closure.hash()}\n`;
    }
    return out;
  }
}

/**
 * Remove epsilon transitions from an automaton.
 *
 * Each state of the result is an epsilon closure of the source. Closures
 * are keyed by their sorted members, so the same closure reached along
 * different paths becomes a single state. State 0 is the closure of the
 * source's start state.
 */
export function eliminateEpsilon(source: EpsilonNFA): NFAFromEpsilonNFA {
  const alphabet = source.getAlphabet();
  const closureIds = numberSetMap<StateID>();
  const closures: NumberSet[] = [];
  const edges: Map<StateID, Edge<InputSymbol>[]> = new Map();

  const idFor = (closure: NumberSet): StateID => {
    let id = closureIds.get(closure);
    if (id === undefined) {
      id = closures.length;
      closures.push(closure);
      closureIds.set(closure, id);
      edges.set(id, []);
    }
    return id;
  };

  idFor(epsilonClosure(source, source.start));
  // closures is appended to while we walk it
  for (let current = 0; current < closures.length; current++) {
    const closure = closures[current];
    for (const symbol of alphabet) {
      const target = epsilonClosureOfSet(
        source,
        move(source, closure, symbol)
      );
      if (target.size == 0) {
        continue;
      }
      const targetId = idFor(target);
      const out = edges.get(current) ?? [];
      if (!out.some(([l, to]) => l == symbol && to == targetId)) {
        out.push([symbol, targetId]);
      }
      edges.set(current, out);
    }
  }

  const accept: StateID[] = [];
  for (const [id, closure] of closures.entries()) {
    if (closure.intersects(source.accept)) {
      accept.push(id);
    }
  }

  log(`${source.numStates} epsilon-nfa states -> ${closures.length} nfa states`);
  return new NFAFromEpsilonNFA(closures, accept, edges);
}
