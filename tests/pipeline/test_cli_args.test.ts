import { describe, test, expect } from 'vitest';
import { parseArgs } from '../../src/cli-args.js';

describe('CLI: Arguments', () => {
  test('Input file alone', () => {
    expect(parseArgs(['main.sexp'])).toEqual({
      kind: 'run',
      options: {
        inputFile: 'main.sexp',
        outputFile: undefined,
        configFile: undefined,
        overrides: {},
        verbose: false
      }
    });
  });

  test('Every flag, short and long', () => {
    const parsed = parseArgs(['-c', 'action', '--no-header', '--config', 'opts.json', '-o', 'out.go', '-v', 'body.sexp']);
    expect(parsed).toEqual({
      kind: 'run',
      options: {
        inputFile: 'body.sexp',
        outputFile: 'out.go',
        configFile: 'opts.json',
        overrides: { context: 'action', header: false, trace: true },
        verbose: true
      }
    });
  });

  test('Long context and output flags', () => {
    const parsed = parseArgs(['--context', 'value', '--output', 'x.go', '--verbose', 'x.sexp']);
    expect(parsed.kind).toBe('run');
    if (parsed.kind === 'run') {
      expect(parsed.options.overrides).toEqual({ context: 'value', trace: true });
      expect(parsed.options.outputFile).toBe('x.go');
    }
  });

  test('Help wins over everything after it', () => {
    expect(parseArgs(['-h', '--bogus'])).toEqual({ kind: 'help' });
    expect(parseArgs(['main.sexp', '--help'])).toEqual({ kind: 'help' });
  });

  test('Missing flag value', () => {
    expect(parseArgs(['main.sexp', '-c'])).toEqual({ kind: 'usage-error', message: 'Missing value for -c' });
    expect(parseArgs(['main.sexp', '--config'])).toEqual({ kind: 'usage-error', message: 'Missing value for --config' });
  });

  test('Unknown option', () => {
    expect(parseArgs(['--bogus', 'main.sexp'])).toEqual({ kind: 'usage-error', message: 'Unknown option: --bogus' });
  });

  test('Unknown context name', () => {
    expect(parseArgs(['-c', 'statement', 'main.sexp'])).toEqual({
      kind: 'usage-error',
      message: 'Unknown emit context: statement'
    });
  });

  test('No input file', () => {
    expect(parseArgs(['--no-header'])).toEqual({ kind: 'usage-error', message: 'Error: No input file specified' });
  });
});
