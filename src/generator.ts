import type { Node } from './node.js';
import type { EmitContext } from './contexts.js';
import type { TraceSink } from './trace.js';
import { Emitter, terminate } from './emitter.js';
import { parseSexp } from './parser.js';

export interface GenerateOptions {
  /** Context the root's children are rendered in; `top` renders a whole file. */
  context?: EmitContext;
  trace?: TraceSink;
}

/**
 * Generate Go source from a tree.
 *
 * @param root - composite node whose children are the forms to render
 * @returns Go source, one line per rendered form
 */
export function generateGo(root: Node, options: GenerateOptions = {}): string {
  const emitter = new Emitter({ trace: options.trace });
  const context = options.context ?? 'top';
  if (context === 'top') {
    return emitter.emitFile(root);
  }
  return terminate(emitter.render(root.first, context));
}

export function transpile(source: string, options: GenerateOptions = {}): string {
  return generateGo(parseSexp(source), options);
}
