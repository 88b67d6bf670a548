/**
 * Golden Test Runner
 *
 * Compares transpiled output against expected golden files.
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { runGoldenSuite } from './golden.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function main(): void {
  const goldenDir = process.argv[2] ?? path.join(__dirname, '..', 'tests', 'golden');
  const results = runGoldenSuite(goldenDir);
  const failures: string[] = [];

  for (const result of results) {
    if (result.passed) {
      console.log(`✓ ${result.name}`);
    } else if (result.error !== undefined) {
      console.log(`✗ ${result.name} (error: ${result.error})`);
      failures.push(`${result.name}: ${result.error}`);
    } else {
      console.log(`✗ ${result.name}`);
      failures.push(`${result.name}:\n  Expected:\n${result.expected}\n  Actual:\n${result.actual}`);
    }
  }

  const failed = failures.length;
  console.log('');
  console.log(`Results: ${results.length - failed} passed, ${failed} failed`);

  if (failed > 0) {
    console.log('');
    console.log('Failures:');
    failures.forEach((f) => console.log(f));
  }

  process.exit(failed > 0 ? 1 : 0);
}

main();
