/**
 * Tests for the front end: lexer, parser and JSON program trees.
 */

import { QuillSyntaxError } from '../src/errors';
import { tokenize } from '../src/lexer';
import { parse, parseExpression } from '../src/parser';
import { parseProgramJson } from '../src/schema';

// ==================================================================
// Lexer tests
// ==================================================================

describe('Lexer', () => {
  test('classifies tokens', () => {
    const tokens = tokenize('var x: int;');
    expect(tokens.map(t => [t.type, t.text])).toEqual([
      ['keyword', 'var'],
      ['identifier', 'x'],
      ['punctuation', ':'],
      ['identifier', 'int'],
      ['punctuation', ';'],
      ['eof', ''],
    ]);
  });

  test('prefers two-character operators', () => {
    const ops = tokenize('a <= b == c != !d').filter(t => t.type === 'operator').map(t => t.text);
    expect(ops).toEqual(['<=', '==', '!=', '!']);
  });

  test('records line and column', () => {
    const tokens = tokenize('func\n  main');
    expect(tokens[1].position).toEqual({ line: 2, column: 3 });
  });

  test('decodes string escapes', () => {
    const [token] = tokenize('"a\\tb\\n\\"q\\""');
    expect(token.type).toBe('string');
    expect(token.value).toBe('a\tb\n"q"');
  });

  test('skips comments', () => {
    const tokens = tokenize('x // trailing\n/* block\ncomment */ y');
    expect(tokens.map(t => t.text)).toEqual(['x', 'y', '']);
    expect(tokens[1].position).toEqual({ line: 3, column: 12 });
  });

  test('rejects malformed input', () => {
    expect(() => tokenize('"open')).toThrow('SyntaxError [line 1, col 1]: Unterminated string literal');
    expect(() => tokenize('"\\q"')).toThrow("Unknown escape sequence '\\q'");
    expect(() => tokenize('12ab')).toThrow("Malformed number '12a'");
    expect(() => tokenize('x # y')).toThrow("SyntaxError [line 1, col 3]: Unexpected character '#'");
    expect(() => tokenize('/* never closed')).toThrow('Unterminated block comment');
  });
});

// ==================================================================
// Parser tests
// ==================================================================

describe('Parser', () => {
  test('parses structs and functions', () => {
    const program = parse(`
      struct Node { val: int; var next: Node; }
      func main(): void { print("hi"); }
    `);
    expect(program.structs).toHaveLength(1);
    expect(program.structs[0].name).toBe('Node');
    expect(program.structs[0].fields.map(f => [f.name, f.varType])).toEqual([
      ['val', 'int'],
      ['next', 'Node'],
    ]);
    expect(program.functions[0].name).toBe('main');
    expect(program.functions[0].returnType).toBe('void');
    expect(program.functions[0].statements[0]).toMatchObject({ type: 'call', name: 'print' });
  });

  test('integer literals are exact', () => {
    expect(parseExpression('9007199254740993')).toMatchObject({ type: 'int_literal', value: 9007199254740993n });
  });

  test('multiplication binds tighter than addition', () => {
    const expr = parseExpression('1 + 2 * 3');
    expect(expr).toMatchObject({
      type: 'binary_expression',
      operator: '+',
      op1: { type: 'int_literal', value: 1n },
      op2: { type: 'binary_expression', operator: '*' },
    });
  });

  test('binary operators associate to the left', () => {
    const expr = parseExpression('10 - 4 - 3');
    expect(expr).toMatchObject({
      operator: '-',
      op1: { operator: '-', op1: { value: 10n }, op2: { value: 4n } },
      op2: { value: 3n },
    });
  });

  test('|| is looser than && which is looser than ==', () => {
    const expr = parseExpression('a || b && c == d');
    expect(expr).toMatchObject({
      operator: '||',
      op2: { operator: '&&', op2: { operator: '==' } },
    });
  });

  test('unary operators and parentheses', () => {
    expect(parseExpression('-(1 + 2)')).toMatchObject({ type: 'negate', op1: { operator: '+' } });
    expect(parseExpression('!x')).toMatchObject({ type: 'not', op1: { type: 'variable', name: 'x' } });
  });

  test('dotted paths, new, nil and calls', () => {
    expect(parseExpression('a.b.c')).toEqual({
      type: 'variable',
      name: 'a',
      fields: ['b', 'c'],
      position: { line: 1, column: 1 },
    });
    expect(parseExpression('new Node')).toMatchObject({ type: 'new_instance', structName: 'Node' });
    expect(parseExpression('nil')).toMatchObject({ type: 'nil_literal' });
    expect(parseExpression('f(1, x)')).toMatchObject({ type: 'call', name: 'f', args: [{ value: 1n }, { name: 'x' }] });
  });

  test('parses statements', () => {
    const program = parse(`
      func main(): void {
        var i: int;
        for (i = 0; i < 3; i = i + 1) { print(i); }
        if (i == 3) { return; } else { n.next.val = 2; }
      }
    `);
    const [def, loop, branch] = program.functions[0].statements;
    expect(def).toMatchObject({ type: 'var_definition', name: 'i', varType: 'int' });
    expect(loop).toMatchObject({
      type: 'for_statement',
      init: { type: 'assignment', target: { name: 'i' } },
      update: { type: 'assignment' },
    });
    expect(branch).toMatchObject({
      type: 'if_statement',
      statements: [{ type: 'return_statement', expression: null }],
      elseStatements: [{ type: 'assignment', target: { name: 'n', fields: ['next', 'val'] } }],
    });
  });

  test('missing types parse as null', () => {
    const program = parse('func f(a) { var x; }');
    const fn = program.functions[0];
    expect(fn.params[0].varType).toBeNull();
    expect(fn.returnType).toBeNull();
    expect(fn.statements[0]).toMatchObject({ type: 'var_definition', varType: null });
  });

  test('reports the offending token', () => {
    expect(() => parse('func main(): void { print("x") }')).toThrow(
      "SyntaxError [line 1, col 32]: Expected ';' but found '}'",
    );
    expect(() => parse('func main(): void {')).toThrow("Expected '}' but found end of input");
    expect(() => parse('var x: int;')).toThrow("Expected a struct or func definition but found 'var'");
    expect(() => parseExpression('1 +')).toThrow(QuillSyntaxError);
    expect(() => parseExpression('1 2')).toThrow("Expected end of input but found '2'");
  });
});

// ==================================================================
// JSON program tree tests
// ==================================================================

describe('parseProgramJson', () => {
  const tree = {
    type: 'program',
    structs: [],
    functions: [
      {
        type: 'function_definition',
        name: 'main',
        params: [],
        returnType: 'void',
        statements: [
          {
            type: 'call',
            name: 'print',
            args: [
              {
                type: 'binary_expression',
                operator: '+',
                op1: { type: 'int_literal', value: 1 },
                op2: { type: 'int_literal', value: 2 },
              },
            ],
          },
        ],
      },
    ],
  };

  test('accepts a valid tree', () => {
    const program = parseProgramJson(JSON.stringify(tree));
    expect(program.functions[0].name).toBe('main');
    expect(program.functions[0].statements[0]).toMatchObject({
      type: 'call',
      args: [{ type: 'binary_expression', operator: '+', op1: { value: 1n }, op2: { value: 2n } }],
    });
  });

  test('integer literals may be digit strings', () => {
    const literal = (value: unknown) =>
      JSON.stringify({
        ...tree,
        functions: [{ ...tree.functions[0], statements: [{ type: 'return_statement', expression: { type: 'int_literal', value } }] }],
      });
    expect(parseProgramJson(literal('9007199254740993')).functions[0].statements[0]).toEqual({
      type: 'return_statement',
      expression: { type: 'int_literal', value: 9007199254740993n },
    });
    expect(() => parseProgramJson(literal('1.5'))).toThrow('Invalid program tree: functions.0.statements.0');
    expect(() => parseProgramJson(literal(1.5))).toThrow('Invalid program tree: functions.0.statements.0');
  });

  test('rejects text that is not JSON', () => {
    expect(() => parseProgramJson('{')).toThrow(/^SyntaxError: Program tree is not valid JSON: /);
  });

  test('rejects a tree with the wrong root', () => {
    expect(() => parseProgramJson('[]')).toThrow('Invalid program tree: <root>:');
  });

  test('rejects bad identifiers', () => {
    const bad = { ...tree, functions: [{ ...tree.functions[0], name: 'no spaces' }] };
    expect(() => parseProgramJson(JSON.stringify(bad))).toThrow('functions.0.name: must be an identifier');
  });
});
