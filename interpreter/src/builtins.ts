/**
 * Built-in functions for the Quill interpreter.
 *
 * Built-ins live outside the user function table: they cannot be overloaded
 * or redefined, and their arguments are not checked against declared types.
 */

import type { HostIO } from './io';
import { ErrorType, fail } from './errors';
import { QuillValue, mkInt, mkNil, mkString, valueToString } from './values';

export type BuiltinFn = (args: QuillValue[], io: HostIO) => QuillValue;

export interface Builtin {
  name: string;
  minArgs: number;
  /** Infinity for variadic built-ins */
  maxArgs: number;
  fn: BuiltinFn;
}

function printable(v: QuillValue): string {
  if (v.kind === 'void') {
    fail(ErrorType.TypeError, 'Cannot print the result of a void function');
  }
  return valueToString(v);
}

function promptAndRead(args: QuillValue[], io: HostIO): string | null {
  if (args.length === 1) {
    io.output(printable(args[0]));
  }
  return io.readLine();
}

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

const BUILTINS: Builtin[] = [
  {
    name: 'print',
    minArgs: 0,
    maxArgs: Infinity,
    fn: (args, io) => {
      io.output(args.map(printable).join(''));
      return mkNil();
    },
  },
  {
    name: 'inputi',
    minArgs: 0,
    maxArgs: 1,
    fn: (args, io) => {
      const line = promptAndRead(args, io);
      if (line === null) {
        fail(ErrorType.TypeError, 'inputi() reached end of input');
      }
      if (!INTEGER_PATTERN.test(line)) {
        fail(ErrorType.TypeError, `inputi() expected an integer, got '${line}'`);
      }
      return mkInt(BigInt(line.trim().replace(/^\+/, '')));
    },
  },
  {
    name: 'inputs',
    minArgs: 0,
    maxArgs: 1,
    fn: (args, io) => mkString(promptAndRead(args, io) ?? ''),
  },
];

const BUILTIN_TABLE = new Map<string, Builtin>(BUILTINS.map(b => [b.name, b]));

export function getBuiltin(name: string): Builtin | undefined {
  return BUILTIN_TABLE.get(name);
}

export function isBuiltin(name: string): boolean {
  return BUILTIN_TABLE.has(name);
}
