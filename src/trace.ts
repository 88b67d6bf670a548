import type { EmitContext } from './contexts.js';

export interface TraceEvent {
  context: EmitContext;
  /** Kind of the form the classifier selected, e.g. `func` or `binary`. */
  form: string;
  node: string;
}

export type TraceSink = (event: TraceEvent) => void;

export const consoleTraceSink: TraceSink = (event) => {
  console.error(`[${event.context}] ${event.form}: ${event.node}`);
};
