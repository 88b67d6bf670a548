import type { SourceLocation } from './node.js';
import {
  MalformedFormError,
  ReaderError,
  RenderError,
  UnimplementedConstructError,
  UnknownFormError
} from './errors.js';

/** Innermost source location carried anywhere along the error's cause chain. */
export function errorLocation(error: unknown): SourceLocation | undefined {
  let found: SourceLocation | undefined;
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof ReaderError) {
      found = { line: current.line, column: current.column };
    } else if (
      current instanceof RenderError ||
      current instanceof MalformedFormError ||
      current instanceof UnknownFormError ||
      current instanceof UnimplementedConstructError
    ) {
      found = current.node.loc ?? found;
    }
    current = current.cause;
  }
  return found;
}

/**
 * Lines describing a failed run: message, error code, location and a
 * caret under the offending column of the source.
 */
export function formatFailure(error: unknown, source: string, inputFile: string): string[] {
  const lines: string[] = [];
  const message = error instanceof Error ? error.message : String(error);
  lines.push(`Error: ${message}`, '');

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    lines.push(`Error Code: ${error.code}`);
  }

  const loc = errorLocation(error);
  if (loc) {
    lines.push(`Location: ${inputFile}:${loc.line}:${loc.column}`, '');

    const sourceLines = source.split('\n');
    if (loc.line <= sourceLines.length) {
      const lineNumStr = String(loc.line);
      const indent = ' '.repeat(lineNumStr.length);
      lines.push(`${lineNumStr} | ${sourceLines[loc.line - 1]}`);
      lines.push(`${indent} | ${' '.repeat(loc.column)}^`);
      lines.push('');
    }
  }

  return lines;
}
