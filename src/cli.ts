#!/usr/bin/env node

import * as fs from 'fs';
import { parseSexp } from './parser.js';
import { generateGo } from './generator.js';
import { formatNode } from './node.js';
import { loadConfig } from './config.js';
import { parseArgs } from './cli-args.js';
import { consoleTraceSink } from './trace.js';
import { formatFailure } from './report.js';

function showUsage(): void {
  console.error('Usage: sexp-to-go <input.sexp> [options]');
  console.error('');
  console.error('Options:');
  console.error('  -o, --output <file>     Write output to file instead of stdout');
  console.error('  -c, --context <name>    Render the input as top (default), action or value forms');
  console.error('      --config <file>     Read options from a JSON config file');
  console.error('      --no-header         Omit the "Transpiled from" header comment');
  console.error('  -v, --verbose           Show the tree and emitter trace');
  console.error('  -h, --help              Show this help message');
}

function main(): void {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    showUsage();
    process.exit(0);
  }
  if (parsed.kind === 'usage-error') {
    console.error(parsed.message);
    showUsage();
    process.exit(1);
  }
  const { inputFile, outputFile, configFile, overrides, verbose } = parsed.options;

  let source: string;
  try {
    source = fs.readFileSync(inputFile, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Error reading file: ${reason}`);
    process.exit(1);
  }

  try {
    const config = loadConfig({ file: configFile, overrides });

    const root = parseSexp(source);

    if (verbose) {
      console.error('=== S-expression tree ===');
      console.error(formatNode(root));
      console.error('');
      console.error('=== Emitter trace ===');
    }

    const goCode = generateGo(root, {
      context: config.context,
      trace: config.trace ? consoleTraceSink : undefined
    });

    if (verbose) {
      console.error('');
    }

    const header = config.header ? `// Transpiled from ${inputFile}\n\n` : '';
    const output = header + goCode;

    if (outputFile) {
      fs.writeFileSync(outputFile, output);
      console.error(`Wrote to ${outputFile}`);
    } else {
      process.stdout.write(output);
    }
  } catch (error) {
    console.error('');
    formatFailure(error, source, inputFile).forEach((line) => console.error(line));

    if (verbose && error instanceof Error && error.stack) {
      console.error('Stack trace:');
      console.error(error.stack);
      console.error('');
    }

    process.exit(1);
  }
}

main();
