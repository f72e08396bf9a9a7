import { scopedLog } from '../utils/debug.js';
import { NumberSet, numberSetMap } from '../utils/sets.js';
import { DFA } from './dfa.js';
import type { InputSymbol, StateID } from './label.js';
import type { NFA } from './nfa.js';

const log = scopedLog('determinize');

/**
 * A DFA that remembers which set of NFA states each of its states stands
 * for.
 */
export class DFAFromNFA extends DFA {
  readonly nfaStateMap: readonly NumberSet[];

  constructor(
    nfaStateMap: NumberSet[],
    accept: Iterable<StateID>,
    transitions: Map<StateID, Map<InputSymbol, StateID>>
  ) {
    super(0, accept, transitions);
    this.nfaStateMap = nfaStateMap;
  }

  getStatesForSourceNFAState(sourceNFAState: StateID): StateID[] {
    const states: StateID[] = [];
    for (const [si, sourceNFAStates] of this.nfaStateMap.entries()) {
      if (sourceNFAStates.has(sourceNFAState)) {
        states.push(si);
      }
    }
    return states;
  }

  override toDebugStr() {
    let out = 'DFAFromNFA:\n' + super.toDebugStr();
    out += '\n';
    out += 'Mapping from DFA state to source NFA states:\n';
    for (const [si, nfaStates] of this.nfaStateMap.entries()) {
      out += `s${si}: ${nfaStates.hash()}\n`;
    }
    return out;
  }
}

/**
 * Convert an NFA to a DFA with the subset construction. See page 47 of
 * Engineering a Compiler (Cooper & Torczon).
 *
 * Each DFA state is a set of NFA states the NFA could be in after reading
 * some input. Sets are numbered in the order a breadth first traversal
 * discovers them, starting with {start} as state 0.
 */
export function determinize(nfa: NFA): DFAFromNFA {
  const alphabet = nfa.getAlphabet();
  const subsetIds = numberSetMap<StateID>();
  const subsets: NumberSet[] = [];
  const transitions: Map<StateID, Map<InputSymbol, StateID>> = new Map();

  const idFor = (subset: NumberSet): StateID => {
    let id = subsetIds.get(subset);
    if (id === undefined) {
      id = subsets.length;
      subsets.push(subset);
      subsetIds.set(subset, id);
      transitions.set(id, new Map());
    }
    return id;
  };

  idFor(new NumberSet([nfa.start]));
  for (let current = 0; current < subsets.length; current++) {
    const row = transitions.get(current) ?? new Map<InputSymbol, StateID>();
    for (const symbol of alphabet) {
      const target: Set<StateID> = new Set();
      for (const state of subsets[current]) {
        for (const to of nfa.getNextStates(state, symbol)) {
          target.add(to);
        }
      }
      if (target.size == 0) {
        continue;
      }
      row.set(symbol, idFor(new NumberSet(target)));
    }
    transitions.set(current, row);
  }

  const accept: StateID[] = [];
  for (const [id, subset] of subsets.entries()) {
    if (subset.intersects(nfa.accept)) {
      accept.push(id);
    }
  }

  log(`${nfa.numStates} nfa states -> ${subsets.length} dfa states`);
  return new DFAFromNFA(subsets, accept, transitions);
}
