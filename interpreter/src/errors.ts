/**
 * Error types for the Quill interpreter.
 *
 * Every failure a Quill program can cause is one of these. Once thrown,
 * nothing inside the interpreter catches them: the program halts and the
 * host decides what to print.
 */

import type { SourcePosition } from './ast';

export enum ErrorType {
  NameError = 'NameError',
  TypeError = 'TypeError',
  FaultError = 'FaultError',
  SyntaxError = 'SyntaxError',
}

function formatLocation(position?: SourcePosition): string {
  return position !== undefined ? ` [line ${position.line}, col ${position.column}]` : '';
}

export class QuillError extends Error {
  public readonly type: ErrorType;
  public readonly detail: string;
  public readonly line: number | undefined;
  public readonly column: number | undefined;

  constructor(type: ErrorType, detail: string, position?: SourcePosition) {
    super(`${type}${formatLocation(position)}: ${detail}`);
    this.name = 'QuillError';
    this.type = type;
    this.detail = detail;
    this.line = position?.line;
    this.column = position?.column;
  }
}

/** Unresolved function, variable or field; arity mismatch; duplicate definition. */
export class QuillNameError extends QuillError {
  constructor(detail: string, position?: SourcePosition) {
    super(ErrorType.NameError, detail, position);
    this.name = 'QuillNameError';
  }
}

/** Incompatible operand, argument or return types; unknown declared types. */
export class QuillTypeError extends QuillError {
  constructor(detail: string, position?: SourcePosition) {
    super(ErrorType.TypeError, detail, position);
    this.name = 'QuillTypeError';
  }
}

/** Dereferencing a field through a nil struct reference, or dividing by zero. */
export class QuillFaultError extends QuillError {
  constructor(detail: string, position?: SourcePosition) {
    super(ErrorType.FaultError, detail, position);
    this.name = 'QuillFaultError';
  }
}

export class QuillSyntaxError extends QuillError {
  constructor(detail: string, position?: SourcePosition) {
    super(ErrorType.SyntaxError, detail, position);
    this.name = 'QuillSyntaxError';
  }
}

/**
 * Report a categorized failure and halt. Never returns.
 */
export function fail(type: ErrorType, detail: string, position?: SourcePosition): never {
  switch (type) {
    case ErrorType.NameError: throw new QuillNameError(detail, position);
    case ErrorType.TypeError: throw new QuillTypeError(detail, position);
    case ErrorType.FaultError: throw new QuillFaultError(detail, position);
    case ErrorType.SyntaxError: throw new QuillSyntaxError(detail, position);
  }
}
