/**
 * Recursive-descent parser: turns Quill source text into a `Program` tree.
 *
 * Binary operators bind, loosest first: `||`, `&&`, comparisons and
 * equality, `+ -`, `* /`. Unary `-` and `!` bind tighter than all of them.
 */

import {
  Assignment,
  BinaryOperator,
  CallExpression,
  Expression,
  FieldDefinition,
  FunctionDefinition,
  Parameter,
  Program,
  Statement,
  StructDefinition,
  VariableReference,
} from './ast';
import { QuillSyntaxError } from './errors';
import { Token, TokenType, tokenize } from './lexer';

const PRECEDENCE: BinaryOperator[][] = [
  ['||'],
  ['&&'],
  ['==', '!=', '<', '<=', '>', '>='],
  ['+', '-'],
  ['*', '/'],
];

export class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parseProgram(): Program {
    const structs: StructDefinition[] = [];
    const functions: FunctionDefinition[] = [];
    while (!this.check('eof')) {
      if (this.checkKeyword('struct')) {
        structs.push(this.parseStruct());
      } else if (this.checkKeyword('func')) {
        functions.push(this.parseFunction());
      } else {
        this.unexpected('a struct or func definition');
      }
    }
    return { type: 'program', structs, functions };
  }

  // ---- Declarations ----

  private parseStruct(): StructDefinition {
    const position = this.expectKeyword('struct').position;
    const name = this.expectIdentifier().text;
    this.expectPunct('{');
    const fields: FieldDefinition[] = [];
    while (!this.checkPunct('}')) {
      this.matchKeyword('var');
      const fieldToken = this.expectIdentifier();
      fields.push({ name: fieldToken.text, varType: this.parseTypeAnnotation(), position: fieldToken.position });
      this.expectPunct(';');
    }
    this.expectPunct('}');
    return { type: 'struct_definition', name, fields, position };
  }

  private parseFunction(): FunctionDefinition {
    const position = this.expectKeyword('func').position;
    const name = this.expectIdentifier().text;
    this.expectPunct('(');
    const params: Parameter[] = [];
    if (!this.checkPunct(')')) {
      do {
        const paramToken = this.expectIdentifier();
        params.push({ name: paramToken.text, varType: this.parseTypeAnnotation(), position: paramToken.position });
      } while (this.matchPunct(','));
    }
    this.expectPunct(')');
    const returnType = this.parseTypeAnnotation();
    const statements = this.parseBlock();
    return { type: 'function_definition', name, params, returnType, statements, position };
  }

  /** `: type`, or null when no annotation follows. */
  private parseTypeAnnotation(): string | null {
    if (!this.matchPunct(':')) return null;
    return this.expectIdentifier().text;
  }

  // ---- Statements ----

  private parseBlock(): Statement[] {
    this.expectPunct('{');
    const statements: Statement[] = [];
    while (!this.checkPunct('}')) {
      if (this.check('eof')) this.unexpected("'}'");
      statements.push(this.parseStatement());
    }
    this.expectPunct('}');
    return statements;
  }

  private parseStatement(): Statement {
    const token = this.peek();

    if (this.matchKeyword('var')) {
      const name = this.expectIdentifier().text;
      const varType = this.parseTypeAnnotation();
      this.expectPunct(';');
      return { type: 'var_definition', name, varType, position: token.position };
    }

    if (this.matchKeyword('if')) {
      this.expectPunct('(');
      const condition = this.parseExpression();
      this.expectPunct(')');
      const statements = this.parseBlock();
      const elseStatements = this.matchKeyword('else') ? this.parseBlock() : null;
      return { type: 'if_statement', condition, statements, elseStatements, position: token.position };
    }

    if (this.matchKeyword('for')) {
      this.expectPunct('(');
      const init = this.parseAssignment();
      this.expectPunct(';');
      const condition = this.parseExpression();
      this.expectPunct(';');
      const update = this.parseAssignment();
      this.expectPunct(')');
      const statements = this.parseBlock();
      return { type: 'for_statement', init, condition, update, statements, position: token.position };
    }

    if (this.matchKeyword('return')) {
      const expression = this.checkPunct(';') ? null : this.parseExpression();
      this.expectPunct(';');
      return { type: 'return_statement', expression, position: token.position };
    }

    if (token.type === 'identifier' && this.peekAt(1).text === '(' && this.peekAt(1).type === 'punctuation') {
      const call = this.parseCall();
      this.expectPunct(';');
      return call;
    }

    const assignment = this.parseAssignment();
    this.expectPunct(';');
    return assignment;
  }

  private parseAssignment(): Assignment {
    const target = this.parseVariable();
    this.expectOperator('=');
    const expression = this.parseExpression();
    return { type: 'assignment', target, expression, position: target.position };
  }

  // ---- Expressions ----

  parseExpression(): Expression {
    return this.parseBinary(0);
  }

  private parseBinary(level: number): Expression {
    if (level >= PRECEDENCE.length) return this.parseUnary();
    const operators = PRECEDENCE[level];
    let left = this.parseBinary(level + 1);
    for (;;) {
      const token = this.peek();
      const op = operators.find(o => token.type === 'operator' && token.text === o);
      if (op === undefined) return left;
      this.advance();
      const right = this.parseBinary(level + 1);
      left = { type: 'binary_expression', operator: op, op1: left, op2: right, position: token.position };
    }
  }

  private parseUnary(): Expression {
    const token = this.peek();
    if (this.matchOperator('-')) {
      return { type: 'negate', op1: this.parseUnary(), position: token.position };
    }
    if (this.matchOperator('!')) {
      return { type: 'not', op1: this.parseUnary(), position: token.position };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.peek();
    switch (token.type) {
      case 'int':
        this.advance();
        return { type: 'int_literal', value: BigInt(token.text), position: token.position };
      case 'string':
        this.advance();
        return { type: 'string_literal', value: token.value ?? '', position: token.position };
      case 'keyword':
        if (this.matchKeyword('true')) return { type: 'bool_literal', value: true, position: token.position };
        if (this.matchKeyword('false')) return { type: 'bool_literal', value: false, position: token.position };
        if (this.matchKeyword('nil')) return { type: 'nil_literal', position: token.position };
        if (this.matchKeyword('new')) {
          return { type: 'new_instance', structName: this.expectIdentifier().text, position: token.position };
        }
        return this.unexpected('an expression');
      case 'identifier':
        if (this.peekAt(1).type === 'punctuation' && this.peekAt(1).text === '(') {
          return this.parseCall();
        }
        return this.parseVariable();
      case 'punctuation':
        if (this.matchPunct('(')) {
          const inner = this.parseExpression();
          this.expectPunct(')');
          return inner;
        }
        return this.unexpected('an expression');
      default:
        return this.unexpected('an expression');
    }
  }

  private parseCall(): CallExpression {
    const nameToken = this.expectIdentifier();
    this.expectPunct('(');
    const args: Expression[] = [];
    if (!this.checkPunct(')')) {
      do {
        args.push(this.parseExpression());
      } while (this.matchPunct(','));
    }
    this.expectPunct(')');
    return { type: 'call', name: nameToken.text, args, position: nameToken.position };
  }

  /** `name` or `name.field.field...`, split into base name and field path. */
  private parseVariable(): VariableReference {
    const base = this.expectIdentifier();
    const fields: string[] = [];
    while (this.matchPunct('.')) {
      fields.push(this.expectIdentifier().text);
    }
    return { type: 'variable', name: base.text, fields, position: base.position };
  }

  /** Fail unless every token has been consumed. */
  expectEnd(): void {
    if (!this.check('eof')) this.unexpected('end of input');
  }

  // ---- Token helpers ----

  private peek(): Token {
    return this.peekAt(0);
  }

  private peekAt(offset: number): Token {
    const index = Math.min(this.pos + offset, this.tokens.length - 1);
    return this.tokens[index];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') this.pos++;
    return token;
  }

  private check(type: TokenType, text?: string): boolean {
    const token = this.peek();
    return token.type === type && (text === undefined || token.text === text);
  }

  private checkKeyword(word: string): boolean {
    return this.check('keyword', word);
  }

  private checkPunct(ch: string): boolean {
    return this.check('punctuation', ch);
  }

  private matchKeyword(word: string): boolean {
    if (!this.checkKeyword(word)) return false;
    this.advance();
    return true;
  }

  private matchPunct(ch: string): boolean {
    if (!this.checkPunct(ch)) return false;
    this.advance();
    return true;
  }

  private matchOperator(op: string): boolean {
    if (!this.check('operator', op)) return false;
    this.advance();
    return true;
  }

  private expectKeyword(word: string): Token {
    if (!this.checkKeyword(word)) this.unexpected(`'${word}'`);
    return this.advance();
  }

  private expectPunct(ch: string): Token {
    if (!this.checkPunct(ch)) this.unexpected(`'${ch}'`);
    return this.advance();
  }

  private expectOperator(op: string): Token {
    if (!this.check('operator', op)) this.unexpected(`'${op}'`);
    return this.advance();
  }

  private expectIdentifier(): Token {
    if (!this.check('identifier')) this.unexpected('an identifier');
    return this.advance();
  }

  private unexpected(expected: string): never {
    const token = this.peek();
    const found = token.type === 'eof' ? 'end of input' : `'${token.text}'`;
    throw new QuillSyntaxError(`Expected ${expected} but found ${found}`, token.position);
  }
}

/**
 * Parse Quill source code into a program tree.
 *
 * @throws QuillSyntaxError on malformed input
 */
export function parse(source: string): Program {
  return new Parser(tokenize(source)).parseProgram();
}

/**
 * Parse a single expression, e.g. for tests or tooling.
 */
export function parseExpression(source: string): Expression {
  const parser = new Parser(tokenize(source));
  const expression = parser.parseExpression();
  parser.expectEnd();
  return expression;
}
