import * as fs from 'fs';
import { z } from 'zod';
import { EMIT_CONTEXTS } from './contexts.js';
import { ConfigError } from './errors.js';

export const ConfigSchema = z
  .object({
    context: z.enum(EMIT_CONTEXTS).default('top'),
    header: z.boolean().default(true),
    trace: z.boolean().default(false)
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

const PartialConfigSchema = ConfigSchema.partial();

export type PartialConfig = z.infer<typeof PartialConfigSchema>;

export interface LoadConfigOptions {
  /** JSON config file. */
  file?: string;
  env?: NodeJS.ProcessEnv;
  /** Values from the command line; they win over everything else. */
  overrides?: PartialConfig;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function readConfigFile(file: string): PartialConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read config file ${file}`, [reason]);
  }
  const parsed = PartialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${file}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

function readEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const trace = env.SEXP_TO_GO_TRACE;
  if (trace === undefined || trace === '') {
    return {};
  }
  return { trace: trace === '1' || trace.toLowerCase() === 'true' };
}

// Precedence, lowest first: defaults, config file, environment, overrides.
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const merged = {
    ...(options.file ? readConfigFile(options.file) : {}),
    ...readEnv(options.env ?? process.env),
    ...options.overrides
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}
