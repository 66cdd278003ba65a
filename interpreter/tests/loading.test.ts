/**
 * Tests for program loading: the struct registry, the function table and
 * the built-in functions.
 */

import { getBuiltin, isBuiltin } from '../src/builtins';
import { QuillNameError, QuillTypeError } from '../src/errors';
import { FunctionTable, formatSignature } from '../src/functions';
import { BufferedIO } from '../src/io';
import { parse } from '../src/parser';
import { StructRegistry } from '../src/structs';
import { structType } from '../src/types';
import { mkInt, mkNil, mkString, mkStructRef, mkVoid } from '../src/values';

function structsOf(source: string): StructRegistry {
  return StructRegistry.build(parse(source).structs);
}

function functionsOf(source: string): FunctionTable {
  const program = parse(source);
  return FunctionTable.build(program.functions, StructRegistry.build(program.structs));
}

// ==================================================================
// Struct registry tests
// ==================================================================

describe('StructRegistry', () => {
  test('records fields in declaration order', () => {
    const registry = structsOf('struct Point { x: int; y: int; label: string; }');
    expect(registry.names).toEqual(['Point']);
    expect(registry.describe('Point')).toBe('Point { x: int; y: int; label: string }');
  });

  test('fields may refer to structs declared later', () => {
    const registry = structsOf('struct A { b: B; } struct B { a: A; }');
    expect(registry.fieldType('A', 'b')).toEqual(structType('B'));
    expect(registry.fieldType('A', 'missing')).toBeUndefined();
  });

  test('instances start at field defaults', () => {
    const registry = structsOf('struct Node { val: int; name: string; next: Node; }');
    const node = registry.instantiate('Node');
    expect(node.typeName).toBe('Node');
    expect(node.get('val')).toEqual(mkInt(0));
    expect(node.get('name')).toEqual(mkString(''));
    expect(node.get('next')).toEqual(mkStructRef('Node', null));
  });

  test('rejects duplicate structs and fields', () => {
    expect(() => structsOf('struct A { x: int; } struct A { y: int; }')).toThrow(
      'NameError [line 1, col 22]: Duplicate struct definition: A',
    );
    expect(() => structsOf('struct A { x: int; x: bool; }')).toThrow('Duplicate field name x in struct A');
  });

  test('rejects missing and unknown field types', () => {
    expect(() => structsOf('struct A { x; }')).toThrow(QuillTypeError);
    expect(() => structsOf('struct A { x; }')).toThrow('No type given for field A.x');
    expect(() => structsOf('struct A { x: Missing; }')).toThrow('Unknown type Missing for field A.x');
    expect(() => structsOf('struct A { x: void; }')).toThrow('Unknown type void for field A.x');
  });

  test('instantiating an unknown struct is a type error', () => {
    expect(() => new StructRegistry().instantiate('Ghost')).toThrow('TypeError: Struct Ghost not found');
  });
});

// ==================================================================
// Function table tests
// ==================================================================

describe('FunctionTable', () => {
  test('overloads by arity', () => {
    const table = functionsOf(`
      func f(): int { return 0; }
      func f(a: int): int { return a; }
      func f(a: int, b: bool): bool { return b; }
    `);
    expect(table.has('f', 1)).toBe(true);
    expect(table.has('f', 3)).toBe(false);
    expect(table.resolve('f', 2).params.map(p => p.name)).toEqual(['a', 'b']);
    expect(table.signatures().map(formatSignature)).toEqual([
      'func f(): int',
      'func f(a: int): int',
      'func f(a: int, b: bool): bool',
    ]);
  });

  test('resolve reports missing names and arities', () => {
    const table = functionsOf('func f(a: int): int { return a; }');
    expect(() => table.resolve('g', 0)).toThrow('NameError: Function g not found');
    expect(() => table.resolve('f', 2)).toThrow('NameError: Function f taking 2 params not found');
  });

  test('signatures are sorted by name', () => {
    const table = functionsOf('func main(): void { } func helper(n: Node): Node { return n; } struct Node { v: int; }');
    expect(table.signatures().map(formatSignature)).toEqual([
      'func helper(n: Node): Node',
      'func main(): void',
    ]);
  });

  test('rejects duplicate definitions', () => {
    expect(() => functionsOf('func f(a: int): int { } func f(b: bool): int { }')).toThrow(
      'Duplicate definition of function f taking 1 params',
    );
    expect(() => functionsOf('func f(a: int, a: bool): int { }')).toThrow(QuillNameError);
    expect(() => functionsOf('func f(a: int, a: bool): int { }')).toThrow('Duplicate parameter a in function f');
  });

  test('built-ins cannot be redefined', () => {
    expect(() => functionsOf('func print(s: string): void { }')).toThrow(
      'NameError [line 1, col 1]: Cannot redefine built-in function print',
    );
  });

  test('rejects bad parameter and return types', () => {
    expect(() => functionsOf('func f(a): int { }')).toThrow('Parameter a can not be of type none');
    expect(() => functionsOf('func f(a: void): int { }')).toThrow('Parameter a can not be of type void');
    expect(() => functionsOf('func f() { }')).toThrow('No return type for function f');
    expect(() => functionsOf('func f(): Ghost { }')).toThrow('Unknown return type Ghost for function f');
  });
});

// ==================================================================
// Built-in tests
// ==================================================================

describe('Builtins', () => {
  function builtin(name: string) {
    const found = getBuiltin(name);
    if (found === undefined) throw new Error(`missing builtin ${name}`);
    return found;
  }

  test('the built-in names', () => {
    expect(isBuiltin('print')).toBe(true);
    expect(isBuiltin('inputi')).toBe(true);
    expect(isBuiltin('inputs')).toBe(true);
    expect(isBuiltin('main')).toBe(false);
  });

  test('print joins its arguments on one line', () => {
    const io = new BufferedIO();
    const result = builtin('print').fn([mkString('n = '), mkInt(3), mkNil()], io);
    expect(io.lines).toEqual(['n = 3nil']);
    expect(result).toEqual(mkNil());
  });

  test('print refuses void', () => {
    expect(() => builtin('print').fn([mkVoid()], new BufferedIO())).toThrow(
      'TypeError: Cannot print the result of a void function',
    );
  });

  test('inputi prints the prompt and parses an integer', () => {
    const io = new BufferedIO([' -12 ']);
    expect(builtin('inputi').fn([mkString('Number?')], io)).toEqual(mkInt(-12));
    expect(io.lines).toEqual(['Number?']);
  });

  test('inputi rejects non-integers and end of input', () => {
    expect(() => builtin('inputi').fn([], new BufferedIO(['abc']))).toThrow("inputi() expected an integer, got 'abc'");
    expect(() => builtin('inputi').fn([], new BufferedIO())).toThrow('inputi() reached end of input');
  });

  test('inputs reads a line, or an empty string at end of input', () => {
    const io = new BufferedIO(['hello']);
    expect(builtin('inputs').fn([], io)).toEqual(mkString('hello'));
    expect(builtin('inputs').fn([], io)).toEqual(mkString(''));
  });
});
