import { isLeaf, leaf, type Node } from './node.js';
import { MalformedFormError, UnknownContextError, UnknownFormError } from './errors.js';

// top: outermost declarations of a file
// action: statement sequences (function and block bodies)
// value: anywhere a single value is expected
export const EMIT_CONTEXTS = ['top', 'action', 'value'] as const;

export type EmitContext = (typeof EMIT_CONTEXTS)[number];

export function isEmitContext(name: string): name is EmitContext {
  return EMIT_CONTEXTS.some((context) => context === name);
}

export function parseContext(name: string): EmitContext {
  if (!isEmitContext(name)) {
    throw new UnknownContextError(name);
  }
  return name;
}

export type TopForm =
  | { kind: 'header'; head: Node }
  | { kind: 'import'; head: Node }
  | { kind: 'group'; head: Node }
  | { kind: 'func'; head: Node };

export type ActionForm =
  | { kind: 'assign'; head: Node }
  | { kind: 'incdec'; head: Node }
  | { kind: 'control'; head: Node }
  | { kind: 'header'; head: Node }
  | { kind: 'call'; head: Node };

export type ValueForm =
  | { kind: 'literal'; node: Node }
  | { kind: 'binary'; head: Node }
  | { kind: 'call'; head: Node };

type Keyed<F> = F extends { kind: string; head: Node } ? F['kind'] : never;

function table<K extends string>(entries: ReadonlyArray<readonly [K, readonly string[]]>): ReadonlyMap<string, K> {
  const map = new Map<string, K>();
  for (const [kind, keywords] of entries) {
    for (const keyword of keywords) {
      map.set(keyword, kind);
    }
  }
  return map;
}

export const TOP_KEYWORDS = table<Keyed<TopForm>>([
  ['header', ['package']],
  ['import', ['import']],
  ['group', ['const', 'var']],
  ['func', ['func']]
]);

export const ACTION_KEYWORDS = table<Exclude<Keyed<ActionForm>, 'call'>>([
  ['assign', ['=', ':=', '+=', '-=', '*=', '/=']],
  ['incdec', ['++', '--']],
  ['control', ['if', 'for', 'switch', 'select']],
  ['header', ['return', 'goto', 'break', 'continue']]
]);

export const VALUE_KEYWORDS = table<Exclude<Keyed<ValueForm>, 'call'>>([
  ['binary', ['+', '-', '*', '/', '==', '!=', '>=', '<=', '<', '>']]
]);

/**
 * Find the node carrying the operative keyword of a composite form.
 * Every emitter receives this node, never the enclosing form.
 */
function headOf(node: Node): Node {
  if (!node.first) {
    throw new MalformedFormError(node, 'Empty form has no operator');
  }
  return node.first;
}

export function classifyTop(node: Node): TopForm {
  if (isLeaf(node)) {
    throw new UnknownFormError(node, 'top', `Expected a declaration form, got '${node.content}'`);
  }
  const head = headOf(node);
  const kind = isLeaf(head) ? TOP_KEYWORDS.get(head.content) : undefined;
  if (!kind) {
    const found = isLeaf(head) ? `'${head.content}'` : 'a nested form';
    throw new UnknownFormError(node, 'top', `Unknown top-level form: ${found}`);
  }
  return { kind, head };
}

export function classifyAction(node: Node): ActionForm {
  // A bare leaf statement is a form with no arguments; detach it from the
  // statements that follow it.
  const head = isLeaf(node) ? leaf(node.content, node.loc) : headOf(node);
  const kind = isLeaf(head) ? ACTION_KEYWORDS.get(head.content) : undefined;
  return { kind: kind ?? 'call', head };
}

export function classifyValue(node: Node): ValueForm {
  if (isLeaf(node)) {
    return { kind: 'literal', node };
  }
  const head = headOf(node);
  const kind = isLeaf(head) ? VALUE_KEYWORDS.get(head.content) : undefined;
  return { kind: kind ?? 'call', head };
}
