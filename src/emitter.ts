import { children, formatNode, isLeaf, siblings, type Node } from './node.js';
import {
  classifyAction,
  classifyTop,
  classifyValue,
  type EmitContext
} from './contexts.js';
import {
  MalformedFormError,
  RenderError,
  TraceSinkError,
  UnimplementedConstructError,
  UnknownContextError
} from './errors.js';
import type { TraceSink } from './trace.js';

export interface EmitterOptions {
  trace?: TraceSink;
}

/** Join statement or declaration fragments so that each ends its own line. */
export function terminate(fragments: string[]): string {
  return fragments.map((fragment) => `${fragment}\n`).join('');
}

function unreachable(form: never): never {
  throw new Error(`Unhandled form: ${JSON.stringify(form)}`);
}

export class Emitter {
  private readonly trace?: TraceSink;
  private readonly dispatch: Record<EmitContext, (node: Node) => string>;

  constructor(options: EmitterOptions = {}) {
    this.trace = options.trace;
    this.dispatch = {
      top: (node) => this.emitTop(node),
      action: (node) => this.emitAction(node),
      value: (node) => this.emitValue(node)
    };
  }

  /** Render the children of a file root as top-level declarations. */
  emitFile(root: Node): string {
    return terminate(this.render(root.first, 'top'));
  }

  /**
   * Render `first` and every sibling after it in `context`, one fragment per
   * node. Joining is left to the caller.
   */
  render(first: Node | undefined, context: EmitContext): string[] {
    return siblings(first).map((node) => this.renderNode(node, context));
  }

  renderNode(node: Node, context: EmitContext): string {
    const emit = this.lookup(context);
    try {
      return emit(node);
    } catch (error) {
      if (error instanceof UnknownContextError || error instanceof TraceSinkError) {
        throw error;
      }
      throw new RenderError(context, node, error);
    }
  }

  private lookup(context: EmitContext): (node: Node) => string {
    if (!Object.hasOwn(this.dispatch, context)) {
      throw new UnknownContextError(context);
    }
    return this.dispatch[context];
  }

  private traceForm(context: EmitContext, node: Node, form: string): void {
    if (!this.trace) {
      return;
    }
    try {
      this.trace({ context, form, node: formatNode(node) });
    } catch (error) {
      throw new TraceSinkError(error);
    }
  }

  // ==========================================================================
  // Top level
  // ==========================================================================

  private emitTop(node: Node): string {
    const form = classifyTop(node);
    this.traceForm('top', node, form.kind);

    switch (form.kind) {
      case 'header':
        this.expectArgs(form.head, 1, 1);
        return this.emitHeader(form.head);
      case 'import':
        return this.emitImport(form.head);
      case 'group':
        return this.emitGroup(form.head);
      case 'func':
        return this.emitFunc(form.head);
      default:
        return unreachable(form);
    }
  }

  // (import "fmt" (str "strings")) → import ("fmt"\nstr "strings"\n)
  private emitImport(head: Node): string {
    const specs = siblings(head.next).map((spec) => this.words(spec));
    return `${head.content} (${terminate(specs)})`;
  }

  // (const (x 1) (y 2)) → const(x 1 \ny 2 \n)
  private emitGroup(head: Node): string {
    const lines = siblings(head.next).map((decl) => `${this.declarator(decl)} \n`);
    return `${head.content}(${lines.join('')})`;
  }

  private declarator(decl: Node): string {
    if (isLeaf(decl)) {
      return decl.content;
    }
    if (!decl.first) {
      throw new MalformedFormError(decl, 'Empty declarator');
    }
    return this.render(decl.first, 'value').join(' ');
  }

  // (func name (params) (results) (body...)) → func name(params)(results){body}
  private emitFunc(head: Node): string {
    const slots = siblings(head);
    if (slots.length !== 5) {
      throw new MalformedFormError(
        head,
        `Function declaration expects 5 slots (func name params results body), got ${slots.length}`
      );
    }
    const [, name, params, results, body] = slots;

    if (!isLeaf(name)) {
      throw new MalformedFormError(name, 'Function name must be an identifier');
    }
    for (const [slot, label] of [[params, 'parameters'], [results, 'results'], [body, 'body']] as const) {
      if (isLeaf(slot)) {
        throw new MalformedFormError(slot, `Function ${label} must be a list, got '${slot.content}'`);
      }
    }

    const statements = terminate(this.render(body.first, 'action'));
    return `${head.content} ${name.content}(${this.fieldList(params)})(${this.fieldList(results)}){${statements}}`;
  }

  /**
   * Parameter and result lists. A run of bare names is one group, a nested
   * list is a group of its own, and groups are comma-separated:
   * `(a int)` → `a int`, `((a int) (b string))` → `a int, b string`.
   */
  private fieldList(list: Node): string {
    const groups: string[][] = [];
    let run: string[] | undefined;
    for (const item of children(list)) {
      if (isLeaf(item)) {
        if (!run) {
          run = [];
          groups.push(run);
        }
        run.push(item.content);
      } else {
        run = undefined;
        groups.push([this.words(item)]);
      }
    }
    return groups.map((group) => group.join(' ')).join(', ');
  }

  // Space-joined names of a flat list; a leaf stands for itself.
  private words(node: Node): string {
    if (isLeaf(node)) {
      return node.content;
    }
    return children(node)
      .map((item) => {
        if (!isLeaf(item)) {
          throw new MalformedFormError(item, `Expected a name, got ${formatNode(item)}`);
        }
        return item.content;
      })
      .join(' ');
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  private emitAction(node: Node): string {
    const form = classifyAction(node);
    this.traceForm('action', node, form.kind);

    switch (form.kind) {
      case 'assign':
        return this.emitAssign(form.head);
      case 'incdec':
        return this.emitIncDec(form.head);
      case 'control':
        throw new UnimplementedConstructError(form.head.content, form.head);
      case 'header':
        return this.emitHeader(form.head);
      case 'call':
        return this.emitCall(form.head);
      default:
        return unreachable(form);
    }
  }

  // (:= x (+ 1 2)) → x := (1 + 2)
  private emitAssign(head: Node): string {
    this.expectArgs(head, 2);
    const [target, firstValue] = siblings(head.next);
    const lhs = this.renderNode(target, 'value');
    const rhs = this.render(firstValue, 'value').join(', ');
    return `${lhs} ${head.content} ${rhs}`;
  }

  // (++ i) → i++
  private emitIncDec(head: Node): string {
    this.expectArgs(head, 1, 1);
    const [operand] = siblings(head.next);
    return `${this.renderNode(operand, 'value')}${head.content}`;
  }

  // (return a b) → return a, b
  private emitHeader(head: Node): string {
    return `${head.content} ${this.render(head.next, 'value').join(', ')}`;
  }

  // ==========================================================================
  // Values
  // ==========================================================================

  private emitValue(node: Node): string {
    const form = classifyValue(node);
    this.traceForm('value', node, form.kind);

    switch (form.kind) {
      case 'literal':
        return form.node.content;
      case 'binary':
        return this.emitBinary(form.head);
      case 'call':
        return this.emitCall(form.head);
      default:
        return unreachable(form);
    }
  }

  // (+ a b c) → ((a + b) + c)
  private emitBinary(head: Node): string {
    this.expectArgs(head, 2);
    const operands = this.render(head.next, 'value');
    return operands.reduce((lhs, rhs) => `(${lhs} ${head.content} ${rhs})`);
  }

  // (f a b) → f(a, b)
  private emitCall(head: Node): string {
    const callee = isLeaf(head) ? head.content : this.renderNode(head, 'value');
    const args = this.render(head.next, 'value');
    return `${callee}(${args.join(', ')})`;
  }

  private expectArgs(head: Node, min: number, max = Infinity): void {
    const count = siblings(head.next).length;
    if (count >= min && count <= max) {
      return;
    }
    const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
    const noun = min === 1 && max === 1 ? 'argument' : 'arguments';
    throw new MalformedFormError(head, `'${head.content}' expects ${expected} ${noun}, got ${count}`);
  }
}
