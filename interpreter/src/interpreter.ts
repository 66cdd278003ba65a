/**
 * Tree-walking interpreter for the Quill programming language.
 *
 * Evaluates a parsed program by recursively visiting its nodes. Early
 * returns travel back up through nested blocks as an `ExecStatus` value,
 * never as an exception; exceptions are reserved for the terminal
 * NameError/TypeError/FaultError conditions.
 */

import {
  Assignment,
  Expression,
  ForStatement,
  IfStatement,
  Program,
  SourcePosition,
  Statement,
  VarDefinition,
  VariableReference,
  describeStatement,
  qualifiedName,
} from './ast';
import { Builtin, getBuiltin } from './builtins';
import type { InterpreterOptions } from './config';
import { Environment } from './environment';
import { ErrorType, fail } from './errors';
import { FunctionSignature, FunctionTable } from './functions';
import { ConsoleIO, HostIO } from './io';
import { applyBinary } from './operators';
import { StructInstance, StructRegistry } from './structs';
import { QuillType, typeToString } from './types';
import {
  QuillValue,
  coerceIntToBool,
  defaultValue,
  isNil,
  mkBool,
  mkInt,
  mkNil,
  mkString,
  mkStructRef,
  mkVoid,
  typeOf,
} from './values';

export type ExecStatus =
  | { kind: 'continue' }
  | { kind: 'return'; value: QuillValue };

const CONTINUE: ExecStatus = { kind: 'continue' };

export class Interpreter {
  private env = new Environment();
  private structs = new StructRegistry();
  private functions = new FunctionTable();
  private readonly io: HostIO;
  private readonly trace: boolean;
  private readonly traceSink: (line: string) => void;

  constructor(options: InterpreterOptions = {}) {
    this.io = options.io ?? new ConsoleIO();
    this.trace = options.trace ?? false;
    this.traceSink = options.traceSink ?? ((line: string) => console.error(line));
  }

  /**
   * Load the program's structs and functions, then call `main()`.
   * Returns whatever `main` returns.
   */
  run(program: Program): QuillValue {
    this.load(program);
    if (!this.functions.has('main', 0)) {
      fail(ErrorType.NameError, 'No main() function was found');
    }
    this.env = new Environment();
    this.env.pushFrame();
    const result = this.callFunction('main', []);
    this.env.popFrame();
    return result;
  }

  /**
   * Build the struct registry and function table without running anything.
   */
  load(program: Program): { structs: StructRegistry; functions: FunctionTable } {
    this.structs = StructRegistry.build(program.structs);
    this.functions = FunctionTable.build(program.functions, this.structs);
    return { structs: this.structs, functions: this.functions };
  }

  /**
   * Get the environment (useful for testing).
   */
  getEnvironment(): Environment {
    return this.env;
  }

  // ==================================================================
  // Calls
  // ==================================================================

  private callFunction(name: string, argNodes: Expression[], position?: SourcePosition): QuillValue {
    const builtin = getBuiltin(name);
    if (builtin !== undefined) {
      return this.callBuiltin(builtin, argNodes, position);
    }

    const sig = this.functions.resolve(name, argNodes.length, position);

    // Arguments are evaluated in the caller's frame
    const args = sig.params.map((param, i) => {
      const argNode = argNodes[i];
      const value = this.evalExpression(argNode);
      const bound = this.fitToType(param.type, value);
      if (bound === null) {
        fail(
          ErrorType.TypeError,
          `You can not pass an argument of type ${typeToString(typeOf(value))} to parameter ${param.name} of type ${typeToString(param.type)}`,
          argNode.position ?? position,
        );
      }
      return bound;
    });

    this.env.pushFrame();
    sig.params.forEach((param, i) => {
      if (!this.env.define(param.name, args[i])) {
        fail(ErrorType.NameError, `Duplicate parameter ${param.name}`, position);
      }
    });
    const status = this.runStatements(sig.definition.statements);
    this.env.popFrame();

    return this.returnValue(sig, status, position);
  }

  private callBuiltin(builtin: Builtin, argNodes: Expression[], position?: SourcePosition): QuillValue {
    if (argNodes.length < builtin.minArgs || argNodes.length > builtin.maxArgs) {
      fail(
        ErrorType.NameError,
        `No ${builtin.name}() function that takes ${argNodes.length} parameters`,
        position,
      );
    }
    const args = argNodes.map(arg => this.evalExpression(arg));
    return builtin.fn(args, this.io);
  }

  private returnValue(sig: FunctionSignature, status: ExecStatus, position?: SourcePosition): QuillValue {
    const declared = sig.returnType;
    if (declared.kind === 'void') return mkVoid();
    if (status.kind === 'continue') return defaultValue(declared);

    const value = status.value;
    // nil, whether the literal or a nil reference of any struct type, becomes
    // a nil reference for struct returns and the default otherwise
    if (isNil(value)) return defaultValue(declared);

    const result = this.fitToType(declared, value);
    if (result === null) {
      fail(
        ErrorType.TypeError,
        `You can not return a value of type ${typeToString(typeOf(value))} from function ${sig.name} of return type ${typeToString(declared)}`,
        position,
      );
    }
    return result;
  }

  /**
   * Convert a value for storage in a slot of the given declared type:
   * Int becomes Bool for Bool slots, any nil becomes a nil reference of the
   * slot's struct type. Returns null when the value does not fit.
   */
  private fitToType(declared: QuillType, value: QuillValue): QuillValue | null {
    switch (declared.kind) {
      case 'bool':
        if (value.kind === 'int') return coerceIntToBool(value);
        return value.kind === 'bool' ? value : null;
      case 'int':
        return value.kind === 'int' ? value : null;
      case 'string':
        return value.kind === 'string' ? value : null;
      case 'struct':
        if (isNil(value)) return mkStructRef(declared.name, null);
        return value.kind === 'struct' && value.typeName === declared.name ? value : null;
      case 'nil':
      case 'void':
        return null;
    }
  }

  // ==================================================================
  // Statements
  // ==================================================================

  /**
   * Run a statement list in a fresh block. Stops at the first `return`.
   */
  private runStatements(statements: Statement[]): ExecStatus {
    this.env.pushBlock();
    for (const statement of statements) {
      const status = this.runStatement(statement);
      if (status.kind === 'return') {
        this.env.popBlock();
        return status;
      }
    }
    this.env.popBlock();
    return CONTINUE;
  }

  private runStatement(statement: Statement): ExecStatus {
    if (this.trace) {
      this.traceSink(`[trace] ${describeStatement(statement)}`);
    }
    switch (statement.type) {
      case 'call':
        this.callFunction(statement.name, statement.args, statement.position);
        return CONTINUE;
      case 'assignment':
        this.evalAssignment(statement);
        return CONTINUE;
      case 'var_definition':
        this.evalVarDefinition(statement);
        return CONTINUE;
      case 'return_statement':
        if (statement.expression === null) {
          return { kind: 'return', value: mkNil() };
        }
        return { kind: 'return', value: this.evalExpression(statement.expression) };
      case 'if_statement':
        return this.evalIf(statement);
      case 'for_statement':
        return this.evalFor(statement);
    }
  }

  private evalVarDefinition(node: VarDefinition): void {
    if (node.varType === null) {
      fail(ErrorType.TypeError, `No type provided for ${node.name}`, node.position);
    }
    const type = this.structs.resolveType(node.varType);
    if (type === null) {
      fail(ErrorType.TypeError, `No type ${node.varType} exists`, node.position);
    }
    if (!this.env.define(node.name, defaultValue(type))) {
      fail(ErrorType.NameError, `Duplicate definition for variable ${node.name}`, node.position);
    }
  }

  private evalAssignment(node: Assignment): void {
    const value = this.evalExpression(node.expression);
    const target = node.target;

    if (target.fields.length > 0) {
      const { instance, field, path } = this.resolveFieldOwner(target);
      const declared = this.structs.fieldType(instance.typeName, field);
      if (declared === undefined) {
        fail(ErrorType.NameError, `${field} is not a field of struct ${instance.typeName}`, target.position);
      }
      const stored = this.fitToType(declared, value);
      if (stored === null) {
        fail(
          ErrorType.TypeError,
          `Types ${typeToString(declared)} and ${typeToString(typeOf(value))} are incompatible for assignment to ${path}.${field}`,
          node.position,
        );
      }
      instance.set(field, stored);
      return;
    }

    const current = this.env.lookup(target.name);
    if (current === undefined) {
      fail(ErrorType.NameError, `Undefined variable ${target.name} in assignment`, target.position);
    }
    const stored = this.fitToType(typeOf(current), value);
    if (stored === null) {
      fail(
        ErrorType.TypeError,
        `Types ${typeToString(typeOf(current))} and ${typeToString(typeOf(value))} are incompatible for assignment to ${target.name}`,
        node.position,
      );
    }
    this.env.assign(target.name, stored);
  }

  private evalIf(node: IfStatement): ExecStatus {
    if (this.evalCondition(node.condition, 'if')) {
      return this.runStatements(node.statements);
    }
    if (node.elseStatements !== null) {
      return this.runStatements(node.elseStatements);
    }
    return CONTINUE;
  }

  private evalFor(node: ForStatement): ExecStatus {
    // The counter lives in the enclosing block, so it survives every iteration
    this.runStatement(node.init);
    while (this.evalCondition(node.condition, 'for')) {
      const status = this.runStatements(node.statements);
      if (status.kind === 'return') return status;
      this.runStatement(node.update);
    }
    return CONTINUE;
  }

  private evalCondition(condition: Expression, construct: 'if' | 'for'): boolean {
    const value = coerceIntToBool(this.evalExpression(condition));
    if (value.kind !== 'bool') {
      fail(
        ErrorType.TypeError,
        `Incompatible type for ${construct} condition: ${typeToString(typeOf(value))}`,
        condition.position,
      );
    }
    return value.value;
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  evalExpression(node: Expression): QuillValue {
    switch (node.type) {
      case 'int_literal':
        return mkInt(node.value);
      case 'string_literal':
        return mkString(node.value);
      case 'bool_literal':
        return mkBool(node.value);
      case 'nil_literal':
        return mkNil();
      case 'variable':
        return this.evalVariable(node);
      case 'negate': {
        const operand = this.evalExpression(node.op1);
        if (operand.kind !== 'int') {
          fail(ErrorType.TypeError, `Incompatible type for negation: ${typeToString(typeOf(operand))}`, node.position);
        }
        return mkInt(-operand.value);
      }
      case 'not': {
        const operand = coerceIntToBool(this.evalExpression(node.op1));
        if (operand.kind !== 'bool') {
          fail(ErrorType.TypeError, `Incompatible type for ! operation: ${typeToString(typeOf(operand))}`, node.position);
        }
        return mkBool(!operand.value);
      }
      case 'new_instance':
        if (!this.structs.has(node.structName)) {
          fail(ErrorType.TypeError, `Struct ${node.structName} not found`, node.position);
        }
        return mkStructRef(node.structName, this.structs.instantiate(node.structName));
      case 'call':
        return this.callFunction(node.name, node.args, node.position);
      case 'binary_expression': {
        const left = this.evalExpression(node.op1);
        const right = this.evalExpression(node.op2);
        return applyBinary(node.operator, left, right, node.position);
      }
    }
  }

  private evalVariable(ref: VariableReference): QuillValue {
    let value = this.lookupVariable(ref.name, ref.position);
    let path = ref.name;
    for (const field of ref.fields) {
      value = this.readField(value, field, path, ref.position);
      path = `${path}.${field}`;
    }
    return value;
  }

  private lookupVariable(name: string, position?: SourcePosition): QuillValue {
    const value = this.env.lookup(name);
    if (value === undefined) {
      fail(ErrorType.NameError, `Variable ${name} not found`, position);
    }
    return value;
  }

  /**
   * Walk every field of the path except the last and return the instance
   * that owns the last one.
   */
  private resolveFieldOwner(ref: VariableReference): { instance: StructInstance; field: string; path: string } {
    let value = this.lookupVariable(ref.name, ref.position);
    let path = ref.name;
    const last = ref.fields.length - 1;
    for (let i = 0; i < last; i++) {
      value = this.readField(value, ref.fields[i], path, ref.position);
      path = `${path}.${ref.fields[i]}`;
    }
    const instance = this.dereference(value, path, ref.position);
    const field = ref.fields[last];
    if (!instance.has(field)) {
      fail(ErrorType.NameError, `${field} is not a field of struct ${instance.typeName} (in ${qualifiedName(ref)})`, ref.position);
    }
    return { instance, field, path };
  }

  private readField(owner: QuillValue, field: string, path: string, position?: SourcePosition): QuillValue {
    const instance = this.dereference(owner, path, position);
    const value = instance.get(field);
    if (value === undefined) {
      fail(ErrorType.NameError, `${field} is not a field of struct ${instance.typeName}`, position);
    }
    return value;
  }

  private dereference(value: QuillValue, path: string, position?: SourcePosition): StructInstance {
    if (value.kind === 'struct' && value.instance !== null) {
      return value.instance;
    }
    if (isNil(value)) {
      fail(ErrorType.FaultError, `Variable ${path} to the left of the dot operator is nil`, position);
    }
    return fail(ErrorType.TypeError, `Variable ${path} to the left of the dot operator is not a struct`, position);
  }
}
