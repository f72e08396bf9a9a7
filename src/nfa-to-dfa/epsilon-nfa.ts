/**
 * This file implements the McNaughton-Yamada-Thompson algorithm
 * for converting regular expressions to NFAs. You can find a
 * description in Section 3.7.4 of the dragon book (p. 159):
 * "Construction of an NFA from a Regular Expression"
 */
import { NodeKind, type RegexNode } from '../regex-compiler/ast.js';
import { scopedLog } from '../utils/debug.js';
import { Automaton, type Edge } from './automaton.js';
import {
  EPSILON,
  label,
  labelToString,
  StateAllocator,
  type InputSymbol,
  type StateID,
  type TransitionLabel,
} from './label.js';
import { epsilonClosure, epsilonClosureOfSet, move } from './eliminate.js';
import { renumberParts } from './renumber.js';

const log = scopedLog('epsilon-nfa');

/**
 * An automaton whose edges may be silent (epsilon) or consume one symbol.
 */
export class EpsilonNFA extends Automaton<TransitionLabel> {
  readonly kind = 'epsilon-nfa' as const;

  constructor(
    start: StateID,
    accept: Iterable<StateID>,
    edges: Iterable<readonly [StateID, Iterable<Edge<TransitionLabel>>]>
  ) {
    super(start, accept, edges);
  }

  labelToString(l: TransitionLabel): string {
    return labelToString(l);
  }

  /**
   * Every symbol that labels some edge, in ascending order.
   */
  getAlphabet(): InputSymbol[] {
    const alphabet: Set<InputSymbol> = new Set();
    for (const [, l] of this.edgeList()) {
      if (l.kind == 'symbol') {
        alphabet.add(l.symbol);
      }
    }
    return [...alphabet].sort();
  }

  /**
   * Simulate the automaton on the input, following epsilon edges after
   * every step.
   */
  accepts(input: string): boolean {
    let current = epsilonClosure(this, this.start);
    for (const symbol of input) {
      current = epsilonClosureOfSet(this, move(this, current, symbol));
      if (current.size == 0) {
        return false;
      }
    }
    return current.intersects(this.accept);
  }

  renumbered(): EpsilonNFA {
    return new EpsilonNFA(...renumberParts(this));
  }
}

/**
 * A sub-automaton under construction. Nothing outside the fragment points
 * at start, and nothing inside it leaves accept.
 */
type Fragment = { start: StateID; accept: StateID };

/**
 * Compiles a regex AST into an {@link EpsilonNFA}. Each builder owns the
 * automaton it grows, so a builder is used for exactly one AST.
 */
export class EpsilonNFABuilder {
  private readonly allocator = new StateAllocator();
  private readonly edges: Map<StateID, Edge<TransitionLabel>[]> = new Map();

  private constructor() {}

  static build(ast: RegexNode): EpsilonNFA {
    const builder = new EpsilonNFABuilder();
    const { start, accept } = builder.fragment(ast);
    log(`built ${builder.allocator.count} states from ${ast.kind} root`);
    return new EpsilonNFA(start, [accept], builder.edges);
  }

  private addState(): StateID {
    const state = this.allocator.allocate();
    this.edges.set(state, []);
    return state;
  }

  private addEdge(from: StateID, l: TransitionLabel, to: StateID) {
    const out = this.edges.get(from) ?? [];
    out.push([l, to]);
    this.edges.set(from, out);
  }

  private fragment(node: RegexNode): Fragment {
    switch (node.kind) {
      case NodeKind.CHAR: {
        const start = this.addState();
        const accept = this.addState();
        this.addEdge(start, label(node.props.char), accept);
        return { start, accept };
      }
      case NodeKind.CONCAT: {
        const left = this.fragment(node.props.left);
        const right = this.fragment(node.props.right);
        this.addEdge(left.accept, EPSILON, right.start);
        return { start: left.start, accept: right.accept };
      }
      case NodeKind.UNION: {
        const left = this.fragment(node.props.left);
        const right = this.fragment(node.props.right);
        const start = this.addState();
        const accept = this.addState();
        this.addEdge(start, EPSILON, left.start);
        this.addEdge(start, EPSILON, right.start);
        this.addEdge(left.accept, EPSILON, accept);
        this.addEdge(right.accept, EPSILON, accept);
        return { start, accept };
      }
      case NodeKind.STAR: {
        const inner = this.fragment(node.props.child);
        const start = this.addState();
        const accept = this.addState();
        // enter, loop back, skip, exit
        this.addEdge(start, EPSILON, inner.start);
        this.addEdge(inner.accept, EPSILON, inner.start);
        this.addEdge(start, EPSILON, accept);
        this.addEdge(inner.accept, EPSILON, accept);
        return { start, accept };
      }
    }
  }
}

export const buildEpsilonNFA = EpsilonNFABuilder.build;
