export { leaf, form, formAt, siblings, children, isLeaf, formatNode } from './node.js';
export type { Node, SourceLocation } from './node.js';
export { parseSexp } from './parser.js';
export {
  EMIT_CONTEXTS,
  isEmitContext,
  parseContext,
  classifyTop,
  classifyAction,
  classifyValue,
  TOP_KEYWORDS,
  ACTION_KEYWORDS,
  VALUE_KEYWORDS
} from './contexts.js';
export type { EmitContext, TopForm, ActionForm, ValueForm } from './contexts.js';
export { Emitter, terminate } from './emitter.js';
export type { EmitterOptions } from './emitter.js';
export { generateGo, transpile } from './generator.js';
export type { GenerateOptions } from './generator.js';
export { consoleTraceSink } from './trace.js';
export type { TraceEvent, TraceSink } from './trace.js';
export { ConfigSchema, loadConfig } from './config.js';
export type { Config, LoadConfigOptions, PartialConfig } from './config.js';
export { parseArgs } from './cli-args.js';
export type { CliOptions, ParsedArgs } from './cli-args.js';
export {
  UnknownContextError,
  UnknownFormError,
  UnimplementedConstructError,
  MalformedFormError,
  RenderError,
  ReaderError,
  TraceSinkError,
  ConfigError
} from './errors.js';
