/**
 * Public API of the Quill interpreter package.
 */

import type { InterpreterOptions } from './config';
import { Interpreter } from './interpreter';
import { parse } from './parser';
import type { QuillValue } from './values';

export * from './ast';
export * from './errors';
export * from './types';
export * from './values';
export { Environment } from './environment';
export { StructInstance, StructRegistry } from './structs';
export type { FieldSchema, StructSchema } from './structs';
export { FunctionTable, formatSignature } from './functions';
export type { FunctionSignature, ParamSignature } from './functions';
export { applyBinary, floorDiv } from './operators';
export { getBuiltin, isBuiltin } from './builtins';
export type { Builtin, BuiltinFn } from './builtins';
export { BufferedIO, ConsoleIO } from './io';
export type { HostIO } from './io';
export { ConfigError, loadConfig } from './config';
export type { InterpreterOptions, QuillConfig } from './config';
export { Lexer, tokenize } from './lexer';
export type { Token, TokenType } from './lexer';
export { Parser, parse, parseExpression } from './parser';
export { ExpressionSchema, ProgramSchema, StatementSchema, parseProgramJson } from './schema';
export { Interpreter } from './interpreter';
export type { ExecStatus } from './interpreter';
export { runCli } from './index';
export type { CliContext } from './index';

/**
 * Parse and run Quill source text, returning the value `main` returns.
 */
export function runSource(source: string, options: InterpreterOptions = {}): QuillValue {
  return new Interpreter(options).run(parse(source));
}
