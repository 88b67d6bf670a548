import { isEmitContext } from './contexts.js';
import type { PartialConfig } from './config.js';

export interface CliOptions {
  inputFile: string;
  outputFile?: string;
  configFile?: string;
  /** Config values set by flags; only the flags that were given. */
  overrides: PartialConfig;
  verbose: boolean;
}

export type ParsedArgs =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'usage-error'; message: string };

/**
 * Read the command line (without the node and script entries). Never exits;
 * the caller decides what a help request or a usage error does.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  let inputFile: string | undefined;
  let outputFile: string | undefined;
  let configFile: string | undefined;
  let verbose = false;
  const overrides: PartialConfig = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    }
    if (arg === '--no-header') {
      overrides.header = false;
      continue;
    }
    if (arg === '--verbose' || arg === '-v') {
      verbose = true;
      overrides.trace = true;
      continue;
    }
    if (!arg.startsWith('-')) {
      inputFile = arg;
      continue;
    }

    if (arg !== '--output' && arg !== '-o' && arg !== '--context' && arg !== '-c' && arg !== '--config') {
      return { kind: 'usage-error', message: `Unknown option: ${arg}` };
    }
    const value = args[++i];
    if (value === undefined) {
      return { kind: 'usage-error', message: `Missing value for ${arg}` };
    }
    if (arg === '--config') {
      configFile = value;
    } else if (arg === '--output' || arg === '-o') {
      outputFile = value;
    } else if (isEmitContext(value)) {
      overrides.context = value;
    } else {
      return { kind: 'usage-error', message: `Unknown emit context: ${value}` };
    }
  }

  if (inputFile === undefined) {
    return { kind: 'usage-error', message: 'Error: No input file specified' };
  }
  return { kind: 'run', options: { inputFile, outputFile, configFile, overrides, verbose } };
}
