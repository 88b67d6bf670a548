import * as fs from 'fs';
import * as path from 'path';
import { transpile } from './generator.js';

export interface GoldenResult {
  /** `<group>/<file>.sexp` relative to the golden directory. */
  name: string;
  passed: boolean;
  expected?: string;
  actual?: string;
  error?: string;
}

/**
 * Transpile every `<group>/<name>.sexp` under `goldenDir` and compare it with
 * the `<name>.go` file beside it. Cases without a `.go` file are skipped.
 */
export function runGoldenSuite(goldenDir: string): GoldenResult[] {
  const results: GoldenResult[] = [];

  for (const dir of fs.readdirSync(goldenDir).sort()) {
    const dirPath = path.join(goldenDir, dir);
    if (!fs.statSync(dirPath).isDirectory()) continue;

    const sources = fs.readdirSync(dirPath).filter((f) => f.endsWith('.sexp')).sort();
    for (const sourceFile of sources) {
      const name = `${dir}/${sourceFile}`;
      const goPath = path.join(dirPath, sourceFile.replace(/\.sexp$/, '.go'));
      if (!fs.existsSync(goPath)) continue;

      const expected = fs.readFileSync(goPath, 'utf8').trim();
      try {
        const actual = transpile(fs.readFileSync(path.join(dirPath, sourceFile), 'utf8')).trim();
        results.push({ name, passed: actual === expected, expected, actual });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        results.push({ name, passed: false, expected, error: message });
      }
    }
  }

  return results;
}
