/**
 * Syntax tree node types for Quill programs.
 *
 * The tree is produced by the parser (or decoded from JSON by the schema
 * module) and consumed read-only by the interpreter. Every node carries a
 * `type` tag so evaluation can switch over it exhaustively.
 */

export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 1-based column */
  column: number;
}

interface NodeBase {
  position?: SourcePosition;
}

// ---- Expressions ----

export const BINARY_OPERATORS = ['+', '-', '*', '/', '==', '!=', '>', '>=', '<', '<=', '&&', '||'] as const;

export type BinaryOperator = typeof BINARY_OPERATORS[number];

export interface IntLiteral extends NodeBase {
  type: 'int_literal';
  value: bigint;
}

export interface StringLiteral extends NodeBase {
  type: 'string_literal';
  value: string;
}

export interface BoolLiteral extends NodeBase {
  type: 'bool_literal';
  value: boolean;
}

export interface NilLiteral extends NodeBase {
  type: 'nil_literal';
}

/**
 * A variable reference, optionally followed by a field-access path.
 * `a.b.c` is stored as `{ name: 'a', fields: ['b', 'c'] }`.
 */
export interface VariableReference extends NodeBase {
  type: 'variable';
  name: string;
  fields: string[];
}

export interface NegateExpression extends NodeBase {
  type: 'negate';
  op1: Expression;
}

export interface NotExpression extends NodeBase {
  type: 'not';
  op1: Expression;
}

export interface NewInstance extends NodeBase {
  type: 'new_instance';
  structName: string;
}

export interface CallExpression extends NodeBase {
  type: 'call';
  name: string;
  args: Expression[];
}

export interface BinaryExpression extends NodeBase {
  type: 'binary_expression';
  operator: BinaryOperator;
  op1: Expression;
  op2: Expression;
}

export type Expression =
  | IntLiteral
  | StringLiteral
  | BoolLiteral
  | NilLiteral
  | VariableReference
  | NegateExpression
  | NotExpression
  | NewInstance
  | CallExpression
  | BinaryExpression;

// ---- Statements ----

export interface Assignment extends NodeBase {
  type: 'assignment';
  target: VariableReference;
  expression: Expression;
}

export interface VarDefinition extends NodeBase {
  type: 'var_definition';
  name: string;
  /** Declared type name; null when the source omitted it. */
  varType: string | null;
}

export interface IfStatement extends NodeBase {
  type: 'if_statement';
  condition: Expression;
  statements: Statement[];
  elseStatements: Statement[] | null;
}

export interface ForStatement extends NodeBase {
  type: 'for_statement';
  init: Assignment;
  condition: Expression;
  update: Assignment;
  statements: Statement[];
}

export interface ReturnStatement extends NodeBase {
  type: 'return_statement';
  expression: Expression | null;
}

export type Statement =
  | CallExpression
  | Assignment
  | VarDefinition
  | IfStatement
  | ForStatement
  | ReturnStatement;

// ---- Declarations ----

export interface Parameter extends NodeBase {
  name: string;
  varType: string | null;
}

export interface FunctionDefinition extends NodeBase {
  type: 'function_definition';
  name: string;
  params: Parameter[];
  returnType: string | null;
  statements: Statement[];
}

export interface FieldDefinition extends NodeBase {
  name: string;
  varType: string | null;
}

export interface StructDefinition extends NodeBase {
  type: 'struct_definition';
  name: string;
  fields: FieldDefinition[];
}

export interface Program {
  type: 'program';
  structs: StructDefinition[];
  functions: FunctionDefinition[];
}

// ---- Helpers ----

/**
 * Render a variable reference back to its dotted source form.
 */
export function qualifiedName(ref: VariableReference): string {
  return [ref.name, ...ref.fields].join('.');
}

/**
 * One-line description of a statement, used for trace output.
 */
export function describeStatement(stmt: Statement): string {
  const where = stmt.position ? `line ${stmt.position.line}: ` : '';
  switch (stmt.type) {
    case 'call': return `${where}call ${stmt.name}/${stmt.args.length}`;
    case 'assignment': return `${where}assignment ${qualifiedName(stmt.target)}`;
    case 'var_definition': return `${where}var ${stmt.name}: ${stmt.varType ?? '?'}`;
    case 'if_statement': return `${where}if`;
    case 'for_statement': return `${where}for`;
    case 'return_statement': return `${where}return`;
  }
}
