export * from './label.js';
export * from './automaton.js';
export * from './epsilon-nfa.js';
export * from './eliminate.js';
export * from './nfa.js';
export * from './subset.js';
export * from './dfa.js';
export * from './minimize.js';
export * from './renumber.js';
export * from './dot.js';
