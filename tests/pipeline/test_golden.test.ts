import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { runGoldenSuite } from '../../src/golden.js';

const goldenDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'golden');

describe('Golden Files', () => {
  test('Every checked-in case matches', () => {
    const results = runGoldenSuite(goldenDir);
    expect(results.map((r) => r.name)).toEqual([
      'basics/declarations.sexp',
      'basics/hello.sexp',
      'functions/arith.sexp'
    ]);
    for (const result of results) {
      expect(result.actual, result.name).toBe(result.expected);
    }
  });
});

describe('Golden Runner', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sexp-to-go-golden-'));
    fs.mkdirSync(path.join(tmpDir, 'cases'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeCase(name: string, source: string, expected?: string): void {
    fs.writeFileSync(path.join(tmpDir, 'cases', `${name}.sexp`), source);
    if (expected !== undefined) {
      fs.writeFileSync(path.join(tmpDir, 'cases', `${name}.go`), expected);
    }
  }

  test('Reports mismatches, errors and skips cases without a .go file', () => {
    writeCase('good', '(package main)', 'package main\n');
    writeCase('wrong', '(package main)', 'package other\n');
    writeCase('broken', '(while x)', 'anything\n');
    writeCase('orphan', '(package main)');

    const results = runGoldenSuite(tmpDir);
    expect(results.map((r) => [r.name, r.passed])).toEqual([
      ['cases/broken.sexp', false],
      ['cases/good.sexp', true],
      ['cases/wrong.sexp', false]
    ]);
    expect(results[0].error).toBe("Could not render (while x) as top: Unknown top-level form: 'while' at 1:0");
    expect(results[2].actual).toBe('package main');
  });
});
