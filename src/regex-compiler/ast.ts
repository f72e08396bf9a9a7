export enum NodeKind {
  CHAR = 'CHAR',
  CONCAT = 'CONCAT',
  UNION = 'UNION',
  STAR = 'STAR',
}

export abstract class RNode<Props = unknown> {
  abstract kind: NodeKind;
  readonly props: Props;
  constructor(props: Props) {
    this.props = props;
  }
}

/**
 * A regex AST. Only these four node kinds exist.
 */
export type RegexNode = CharNode | ConcatNode | UnionNode | StarNode;

export class CharNode extends RNode<{ char: string }> {
  kind: NodeKind.CHAR = NodeKind.CHAR;
}

export class ConcatNode extends RNode<{ left: RegexNode; right: RegexNode }> {
  kind: NodeKind.CONCAT = NodeKind.CONCAT;
}

export class UnionNode extends RNode<{ left: RegexNode; right: RegexNode }> {
  kind: NodeKind.UNION = NodeKind.UNION;
}

export class StarNode extends RNode<{ child: RegexNode }> {
  kind: NodeKind.STAR = NodeKind.STAR;
}

export function charNode(char: string) {
  return new CharNode({ char });
}
export function concatNode(left: RegexNode, right: RegexNode) {
  return new ConcatNode({ left, right });
}
export function unionNode(left: RegexNode, right: RegexNode) {
  return new UnionNode({ left, right });
}
export function starNode(child: RegexNode) {
  return new StarNode({ child });
}

/**
 * Render a node back into pattern syntax, adding parentheses only where
 * precedence requires them.
 */
export function nodeToString(node: RegexNode): string {
  switch (node.kind) {
    case NodeKind.CHAR:
      return node.props.char;
    case NodeKind.UNION:
      return `${nodeToString(node.props.left)}+${nodeToString(
        node.props.right
      )}`;
    case NodeKind.CONCAT: {
      const { left, right } = node.props;
      const wrap = (n: RegexNode) =>
        n.kind == NodeKind.UNION ? `(${nodeToString(n)})` : nodeToString(n);
      return wrap(left) + wrap(right);
    }
    case NodeKind.STAR: {
      const { child } = node.props;
      const inner =
        child.kind == NodeKind.CHAR || child.kind == NodeKind.STAR
          ? nodeToString(child)
          : `(${nodeToString(child)})`;
      return inner + '*';
    }
  }
}

/**
 * Number of nodes in the tree.
 */
export function nodeCount(node: RegexNode): number {
  switch (node.kind) {
    case NodeKind.CHAR:
      return 1;
    case NodeKind.CONCAT:
    case NodeKind.UNION:
      return 1 + nodeCount(node.props.left) + nodeCount(node.props.right);
    case NodeKind.STAR:
      return 1 + nodeCount(node.props.child);
  }
}
