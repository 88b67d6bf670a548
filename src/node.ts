import { MalformedFormError } from './errors.js';

/**
 * Generic n-ary syntax tree in first-child/next-sibling encoding.
 *
 * `(op a b)` is a composite node (empty `content`) whose `first` child is
 * the leaf `op`, followed by the siblings `a` and `b`.
 */

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
}

export interface Node {
  readonly content: string;
  readonly first?: Node;
  readonly next?: Node;
  readonly loc?: SourceLocation;
}

export function leaf(content: string, loc?: SourceLocation): Node {
  if (content === '') {
    throw new MalformedFormError({ content }, 'Leaf nodes need non-empty content');
  }
  return loc ? { content, loc } : { content };
}

/**
 * Build a composite node. Children are copied so that their `next` links
 * describe this chain only.
 */
export function form(...items: Node[]): Node {
  return formAt(items);
}

export function formAt(items: Node[], loc?: SourceLocation): Node {
  const first = link(items);
  const node: { content: string; first?: Node; loc?: SourceLocation } = { content: '' };
  if (first) node.first = first;
  if (loc) node.loc = loc;
  return node;
}

function link(items: Node[]): Node | undefined {
  let next: Node | undefined;
  for (let i = items.length - 1; i >= 0; i--) {
    const { next: _discarded, ...rest } = items[i];
    next = next ? { ...rest, next } : rest;
  }
  return next;
}

export function siblings(first: Node | undefined): Node[] {
  const out: Node[] = [];
  for (let n = first; n; n = n.next) {
    out.push(n);
  }
  return out;
}

export function children(node: Node): Node[] {
  return siblings(node.first);
}

export function isLeaf(node: Node): boolean {
  return node.content !== '';
}

// Canonical s-expression text; used in diagnostics and trace events.
export function formatNode(node: Node): string {
  if (isLeaf(node)) {
    return node.content;
  }
  return `(${children(node).map(formatNode).join(' ')})`;
}
