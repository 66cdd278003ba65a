/**
 * Runtime value representations for the Quill interpreter.
 */

import type { StructInstance } from './structs';
import { QuillType, structType, INT_TYPE, STRING_TYPE, BOOL_TYPE, NIL_TYPE, VOID_TYPE } from './types';

/**
 * A struct value is a reference. `instance === null` is a nil reference
 * that still remembers its declared struct type.
 */
export type QuillValue =
  | { kind: 'int'; value: bigint }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'nil' }
  | { kind: 'void' }
  | { kind: 'struct'; typeName: string; instance: StructInstance | null };

// ---- Value constructors ----

export function mkInt(value: bigint | number): QuillValue {
  return { kind: 'int', value: BigInt(value) };
}

export function mkString(value: string): QuillValue {
  return { kind: 'string', value };
}

export function mkBool(value: boolean): QuillValue {
  return { kind: 'bool', value };
}

export function mkNil(): QuillValue {
  return { kind: 'nil' };
}

export function mkVoid(): QuillValue {
  return { kind: 'void' };
}

export function mkStructRef(typeName: string, instance: StructInstance | null): QuillValue {
  return { kind: 'struct', typeName, instance };
}

// ---- Value utilities ----

/**
 * The default value a freshly defined variable or field of this type holds.
 */
export function defaultValue(t: QuillType): QuillValue {
  switch (t.kind) {
    case 'int': return mkInt(0);
    case 'string': return mkString('');
    case 'bool': return mkBool(false);
    case 'struct': return mkStructRef(t.name, null);
    case 'nil': return mkNil();
    case 'void': return mkVoid();
  }
}

export function typeOf(v: QuillValue): QuillType {
  switch (v.kind) {
    case 'int': return INT_TYPE;
    case 'string': return STRING_TYPE;
    case 'bool': return BOOL_TYPE;
    case 'nil': return NIL_TYPE;
    case 'void': return VOID_TYPE;
    case 'struct': return structType(v.typeName);
  }
}

/**
 * True for the nil literal and for nil struct references.
 */
export function isNil(v: QuillValue): boolean {
  return v.kind === 'nil' || (v.kind === 'struct' && v.instance === null);
}

/**
 * 0 becomes false, any other integer true. Non-Int values pass through.
 */
export function coerceIntToBool(v: QuillValue): QuillValue {
  if (v.kind !== 'int') return v;
  return mkBool(v.value !== 0n);
}

export function valueToString(v: QuillValue): string {
  switch (v.kind) {
    case 'int': return String(v.value);
    case 'string': return v.value;
    case 'bool': return v.value ? 'true' : 'false';
    case 'nil': return 'nil';
    case 'void': return 'void';
    case 'struct': return v.instance === null ? 'nil' : `<struct ${v.typeName}>`;
  }
}
