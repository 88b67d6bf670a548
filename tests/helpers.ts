import { parseSexp } from '../src/parser.js';
import { children, type Node } from '../src/node.js';
import { Emitter } from '../src/emitter.js';
import { RenderError } from '../src/errors.js';
import type { EmitContext } from '../src/contexts.js';

/** First top-level form of `source`. */
export function read(source: string): Node {
  const [node] = children(parseSexp(source));
  return node;
}

/** Render every form of `source` in `context`, one fragment each. */
export function emit(source: string, context: EmitContext): string[] {
  return new Emitter().render(parseSexp(source).first, context);
}

/** Render the single form of `source` in `context`. */
export function emitOne(source: string, context: EmitContext): string {
  return new Emitter().renderNode(read(source), context);
}

/** Run `fn`, which must fail with a RenderError, and return that error. */
export function renderFailure(fn: () => unknown): RenderError {
  try {
    fn();
  } catch (error) {
    if (error instanceof RenderError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected rendering to fail');
}
