/**
 * Binary operator semantics.
 *
 * Dispatch is a match on (operator, left type, right type). Every
 * combination either produces a value or raises a typed error; there is no
 * fallthrough.
 */

import type { BinaryOperator, SourcePosition } from './ast';
import { ErrorType, fail } from './errors';
import { typeToString } from './types';
import { QuillValue, coerceIntToBool, isNil, mkBool, mkInt, mkString, typeOf } from './values';

type OperatorCategory = 'arithmetic' | 'comparison' | 'equality' | 'logical';

export function operatorCategory(op: BinaryOperator): OperatorCategory {
  switch (op) {
    case '+':
    case '-':
    case '*':
    case '/':
      return 'arithmetic';
    case '<':
    case '<=':
    case '>':
    case '>=':
      return 'comparison';
    case '==':
    case '!=':
      return 'equality';
    case '&&':
    case '||':
      return 'logical';
  }
}

/**
 * Integer division rounding toward negative infinity: -7 / 2 is -4.
 */
export function floorDiv(a: bigint, b: bigint): bigint {
  const quotient = a / b;
  // bigint division truncates; step down when the exact result was negative and inexact
  if (a % b !== 0n && (a < 0n) !== (b < 0n)) return quotient - 1n;
  return quotient;
}

/**
 * For `==`, `!=`, `&&` and `||`: when one side is Bool and the other Int,
 * the Int side is coerced to Bool.
 */
function coercePair(left: QuillValue, right: QuillValue): [QuillValue, QuillValue] {
  if (left.kind === 'bool' && right.kind === 'int') return [left, coerceIntToBool(right)];
  if (left.kind === 'int' && right.kind === 'bool') return [coerceIntToBool(left), right];
  return [left, right];
}

function describe(v: QuillValue): string {
  return typeToString(typeOf(v));
}

function incompatible(op: BinaryOperator, left: QuillValue, right: QuillValue, position?: SourcePosition): never {
  return fail(
    ErrorType.TypeError,
    `Incompatible types for ${op} operation: ${describe(left)} and ${describe(right)}`,
    position,
  );
}

/**
 * Whether the operator accepts this pair of operands (after any coercion
 * the operator applies). Equality never rejects two scalars or two struct
 * references; it rejects nil against a scalar and anything involving void.
 */
export function typesCompatible(op: BinaryOperator, v1: QuillValue, v2: QuillValue): boolean {
  if (v1.kind === 'void' || v2.kind === 'void') return false;
  switch (operatorCategory(op)) {
    case 'arithmetic':
      if (op === '+' && v1.kind === 'string' && v2.kind === 'string') return true;
      return v1.kind === 'int' && v2.kind === 'int';
    case 'comparison':
      return v1.kind === 'int' && v2.kind === 'int';
    case 'logical': {
      const [l, r] = [coerceIntToBool(v1), coerceIntToBool(v2)];
      return l.kind === 'bool' && r.kind === 'bool';
    }
    case 'equality': {
      const [l, r] = coercePair(v1, v2);
      if (isNil(l)) return isNil(r) || r.kind === 'struct';
      if (isNil(r)) return l.kind === 'struct';
      return true;
    }
  }
}

function valuesEqual(left: QuillValue, right: QuillValue): boolean {
  // A nil reference equals any other nil, whatever struct type it was declared with
  if (isNil(left) || isNil(right)) return isNil(left) && isNil(right);
  switch (left.kind) {
    case 'int':
      return right.kind === 'int' && left.value === right.value;
    case 'string':
      return right.kind === 'string' && left.value === right.value;
    case 'bool':
      return right.kind === 'bool' && left.value === right.value;
    case 'nil':
    case 'void':
      return false;
    case 'struct':
      if (right.kind !== 'struct' || right.typeName !== left.typeName) return false;
      return left.instance === right.instance;
  }
}

function evalArithmetic(op: '+' | '-' | '*' | '/', left: QuillValue, right: QuillValue, position?: SourcePosition): QuillValue {
  if (op === '+' && left.kind === 'string' && right.kind === 'string') {
    return mkString(left.value + right.value);
  }
  if (left.kind !== 'int' || right.kind !== 'int') return incompatible(op, left, right, position);
  switch (op) {
    case '+': return mkInt(left.value + right.value);
    case '-': return mkInt(left.value - right.value);
    case '*': return mkInt(left.value * right.value);
    case '/':
      if (right.value === 0n) {
        fail(ErrorType.FaultError, 'Division by zero', position);
      }
      return mkInt(floorDiv(left.value, right.value));
  }
}

function evalComparison(op: '<' | '<=' | '>' | '>=', left: QuillValue, right: QuillValue, position?: SourcePosition): QuillValue {
  if (left.kind !== 'int' || right.kind !== 'int') return incompatible(op, left, right, position);
  switch (op) {
    case '<': return mkBool(left.value < right.value);
    case '<=': return mkBool(left.value <= right.value);
    case '>': return mkBool(left.value > right.value);
    case '>=': return mkBool(left.value >= right.value);
  }
}

function evalLogical(op: '&&' | '||', left: QuillValue, right: QuillValue, position?: SourcePosition): QuillValue {
  const l = coerceIntToBool(left);
  const r = coerceIntToBool(right);
  if (l.kind !== 'bool' || r.kind !== 'bool') return incompatible(op, left, right, position);
  return mkBool(op === '&&' ? l.value && r.value : l.value || r.value);
}

function evalEquality(op: '==' | '!=', left: QuillValue, right: QuillValue, position?: SourcePosition): QuillValue {
  // nil against nil is settled before any other check
  if (left.kind === 'nil' && right.kind === 'nil') return mkBool(op === '==');
  if (!typesCompatible(op, left, right)) {
    fail(ErrorType.TypeError, `Cannot compare ${describe(left)} and ${describe(right)}`, position);
  }
  const [l, r] = coercePair(left, right);
  const equal = valuesEqual(l, r);
  return mkBool(op === '==' ? equal : !equal);
}

/**
 * Apply a binary operator to two already-evaluated operands.
 */
export function applyBinary(op: BinaryOperator, left: QuillValue, right: QuillValue, position?: SourcePosition): QuillValue {
  if (left.kind === 'void' || right.kind === 'void') {
    return incompatible(op, left, right, position);
  }
  switch (op) {
    case '+':
    case '-':
    case '*':
    case '/':
      return evalArithmetic(op, left, right, position);
    case '<':
    case '<=':
    case '>':
    case '>=':
      return evalComparison(op, left, right, position);
    case '==':
    case '!=':
      return evalEquality(op, left, right, position);
    case '&&':
    case '||':
      return evalLogical(op, left, right, position);
  }
}
