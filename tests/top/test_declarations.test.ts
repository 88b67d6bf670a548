/**
 * Top level: package headers, import groups, const/var groups and function
 * declarations.
 */

import { describe, test, expect } from 'vitest';
import { transpile } from '../../src/generator.js';
import { MalformedFormError, UnknownFormError } from '../../src/errors.js';
import { emitOne, renderFailure } from '../helpers.js';

describe('Top: Package', () => {
  test('Package header', () => {
    expect(transpile('(package main)')).toBe('package main\n');
  });

  test('Package needs exactly one name', () => {
    const error = renderFailure(() => transpile('(package)'));
    expect(error.rootCause).toBeInstanceOf(MalformedFormError);
    expect(error.message).toBe("Could not render (package) as top: 'package' expects 1 argument, got 0 at 1:1");
  });
});

describe('Top: Imports', () => {
  test('One import path per line', () => {
    expect(emitOne('(import "fmt" "os")', 'top')).toBe('import ("fmt"\n"os"\n)');
  });

  test('Aliased import', () => {
    expect(emitOne('(import "fmt" (str "strings"))', 'top')).toBe('import ("fmt"\nstr "strings"\n)');
  });

  test('Empty import group', () => {
    expect(emitOne('(import)', 'top')).toBe('import ()');
  });
});

describe('Top: Declaration Groups', () => {
  test('const group wraps declarator lines', () => {
    expect(emitOne('(const (x 1) (y 2))', 'top')).toBe('const(x 1 \ny 2 \n)');
  });

  test('Declarator values are rendered as expressions', () => {
    expect(emitOne('(var (x int (+ 1 2)) count)', 'top')).toBe('var(x int (1 + 2) \ncount \n)');
  });

  test('Empty group', () => {
    expect(emitOne('(const)', 'top')).toBe('const()');
  });

  test('Empty declarator is malformed', () => {
    const error = renderFailure(() => emitOne('(const ())', 'top'));
    expect(error.message).toBe('Could not render (const ()) as top: Empty declarator at 1:7');
  });
});

describe('Top: Functions', () => {
  test('Five-slot layout with action body', () => {
    expect(emitOne('(func main () () ((return)))', 'top')).toBe('func main()(){return \n}');
  });

  test('Parameter groups and results', () => {
    expect(emitOne('(func add ((a int) (b int)) (int) ((return (+ a b))))', 'top')).toBe(
      'func add(a int, b int)(int){return (a + b)\n}'
    );
  });

  test('Bare names in a parameter list form one group', () => {
    expect(emitOne('(func f (a int) () ())', 'top')).toBe('func f(a int)(){}');
  });

  test('Body statements each end a line', () => {
    expect(emitOne('(func main () () ((:= x 1) (fmt.Println x)))', 'top')).toBe(
      'func main()(){x := 1\nfmt.Println(x)\n}'
    );
  });

  test('Missing slot is malformed', () => {
    const error = renderFailure(() => emitOne('(func main () ())', 'top'));
    expect(error.rootCause).toBeInstanceOf(MalformedFormError);
    expect(error.message).toBe(
      'Could not render (func main () ()) as top: Function declaration expects 5 slots (func name params results body), got 4 at 1:1'
    );
  });

  test('Name must be a leaf', () => {
    const error = renderFailure(() => emitOne('(func (main) () () ())', 'top'));
    expect(error.message).toBe('Could not render (func (main) () () ()) as top: Function name must be an identifier at 1:6');
  });

  test('Parameters must be a list', () => {
    const error = renderFailure(() => emitOne('(func main x () ())', 'top'));
    expect(error.message).toBe("Could not render (func main x () ()) as top: Function parameters must be a list, got 'x' at 1:11");
  });
});

describe('Top: Unknown Forms', () => {
  test('Unknown keyword', () => {
    const error = renderFailure(() => transpile('(while x)'));
    expect(error.rootCause).toBeInstanceOf(UnknownFormError);
    expect(error.message).toBe("Could not render (while x) as top: Unknown top-level form: 'while' at 1:0");
  });

  test('Bare leaf at top level', () => {
    const error = renderFailure(() => transpile('main'));
    expect(error.message).toBe("Could not render main as top: Expected a declaration form, got 'main' at 1:0");
  });

  test('Nested head', () => {
    const error = renderFailure(() => transpile('((package) main)'));
    expect(error.message).toBe('Could not render ((package) main) as top: Unknown top-level form: a nested form at 1:0');
  });
});

describe('Top: Whole Files', () => {
  test('Hello world', () => {
    const source = `
      (package main)
      (import "fmt")
      (func main () ()
        ((:= msg "hello")
         (fmt.Println msg)))
    `;
    expect(transpile(source)).toBe(
      'package main\nimport ("fmt"\n)\nfunc main()(){msg := "hello"\nfmt.Println(msg)\n}\n'
    );
  });

  test('Empty file', () => {
    expect(transpile('; nothing here\n')).toBe('');
  });
});
