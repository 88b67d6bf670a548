import { formatNode, type Node } from './node.js';
import type { EmitContext } from './contexts.js';

function formatLocation(node: Node | undefined): string {
  return node?.loc ? ` at ${node.loc.line}:${node.loc.column}` : '';
}

export class UnknownContextError extends Error {
  public readonly context: string;
  public readonly code = 'E_UNKNOWN_CONTEXT';

  constructor(context: string) {
    super(`Unknown emit context: ${context}`);
    this.name = 'UnknownContextError';
    this.context = context;
  }
}

export class UnknownFormError extends Error {
  public readonly node: Node;
  public readonly context: EmitContext;
  public readonly code = 'E_UNKNOWN_FORM';

  constructor(node: Node, context: EmitContext, message: string) {
    super(`${message}${formatLocation(node)}`);
    this.name = 'UnknownFormError';
    this.node = node;
    this.context = context;
  }
}

/**
 * A form the dispatch tables recognize but no emitter exists for yet.
 * Kept apart from {@link UnknownFormError} so callers can tell
 * "not supported yet" from "malformed input".
 */
export class UnimplementedConstructError extends Error {
  public readonly construct: string;
  public readonly node: Node;
  public readonly code = 'E_UNIMPLEMENTED';

  constructor(construct: string, node: Node) {
    super(`Control construct '${construct}' is not implemented${formatLocation(node)}`);
    this.name = 'UnimplementedConstructError';
    this.construct = construct;
    this.node = node;
  }
}

export class MalformedFormError extends Error {
  public readonly node: Node;
  public readonly code = 'E_MALFORMED_FORM';

  constructor(node: Node, message: string) {
    super(`${message}${formatLocation(node)}`);
    this.name = 'MalformedFormError';
    this.node = node;
  }
}

export class RenderError extends Error {
  public readonly context: EmitContext;
  public readonly node: Node;
  public readonly code = 'E_RENDER';

  constructor(context: EmitContext, node: Node, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not render ${formatNode(node)} as ${context}: ${reason}`, { cause });
    this.name = 'RenderError';
    this.context = context;
    this.node = node;
  }

  /** The error that started the failure, below every wrapping layer. */
  get rootCause(): unknown {
    let current: unknown = this.cause;
    while (current instanceof RenderError) {
      current = current.cause;
    }
    return current;
  }
}

/** A trace sink failed; rendering stops without blaming the input. */
export class TraceSinkError extends Error {
  public readonly code = 'E_TRACE_SINK';

  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Trace sink failed: ${reason}`, { cause });
    this.name = 'TraceSinkError';
  }
}

export class ReaderError extends Error {
  public readonly line: number;
  public readonly column: number;
  public readonly code = 'E_READ';

  constructor(message: string, line: number, column: number) {
    super(`${message} (${line}:${column})`);
    this.name = 'ReaderError';
    this.line = line;
    this.column = column;
  }
}

export class ConfigError extends Error {
  public readonly issues: string[];
  public readonly code = 'E_CONFIG';

  constructor(message: string, issues: string[]) {
    super(issues.length > 0 ? `${message}:\n${issues.join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
