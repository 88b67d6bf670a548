import { formAt, leaf, type Node, type SourceLocation } from './node.js';
import { ReaderError } from './errors.js';

const DELIMITERS = new Set(['(', ')', '"', '`', ';']);

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

/**
 * Read s-expression source into a tree.
 *
 * @param source - zero or more forms; `;` comments run to end of line
 * @returns composite root whose children are the top-level forms
 */
export function parseSexp(source: string): Node {
  return new Reader(source).readAll();
}

class Reader {
  private source: string;
  private pos = 0;
  private line = 1;
  private column = 0;

  constructor(source: string) {
    this.source = source;
  }

  readAll(): Node {
    const items: Node[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.atEnd()) {
        return formAt(items, { line: 1, column: 0 });
      }
      if (this.peek() === ')') {
        throw new ReaderError("Unexpected ')'", this.line, this.column);
      }
      items.push(this.readDatum());
    }
  }

  private readDatum(): Node {
    const loc = this.location();
    const ch = this.peek();
    if (ch === '(') {
      this.advance();
      return this.readList(loc);
    }
    if (ch === '"' || ch === '`') {
      return leaf(this.readString(ch, loc), loc);
    }
    return leaf(this.readAtom(), loc);
  }

  private readList(loc: SourceLocation): Node {
    const items: Node[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.atEnd()) {
        throw new ReaderError('Unclosed list', loc.line, loc.column);
      }
      if (this.peek() === ')') {
        this.advance();
        return formAt(items, loc);
      }
      items.push(this.readDatum());
    }
  }

  // Quotes and escapes are kept verbatim: the text is already Go source.
  private readString(quote: string, loc: SourceLocation): string {
    let text = this.advance();
    for (;;) {
      if (this.atEnd()) {
        throw new ReaderError('Unterminated string', loc.line, loc.column);
      }
      const ch = this.advance();
      text += ch;
      if (ch === quote) {
        return text;
      }
      if (ch === '\\' && quote === '"' && !this.atEnd()) {
        text += this.advance();
      }
    }
  }

  private readAtom(): string {
    let text = '';
    while (!this.atEnd() && !isWhitespace(this.peek()) && !DELIMITERS.has(this.peek())) {
      text += this.advance();
    }
    return text;
  }

  private skipTrivia(): void {
    while (!this.atEnd()) {
      const ch = this.peek();
      if (isWhitespace(ch)) {
        this.advance();
      } else if (ch === ';') {
        while (!this.atEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  private location(): SourceLocation {
    return { line: this.line, column: this.column };
  }

  private atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    return this.source[this.pos];
  }

  private advance(): string {
    const ch = this.source[this.pos++];
    if (ch === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return ch;
  }
}
