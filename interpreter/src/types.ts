/**
 * Runtime type representations for the Quill interpreter.
 *
 * Scalar types are built in; every declared struct name is a type of its own.
 */

export type QuillType =
  | { kind: 'int' }
  | { kind: 'string' }
  | { kind: 'bool' }
  | { kind: 'nil' }
  | { kind: 'void' }
  | { kind: 'struct'; name: string };

export const INT_TYPE: QuillType = { kind: 'int' };
export const STRING_TYPE: QuillType = { kind: 'string' };
export const BOOL_TYPE: QuillType = { kind: 'bool' };
export const NIL_TYPE: QuillType = { kind: 'nil' };
export const VOID_TYPE: QuillType = { kind: 'void' };

export function structType(name: string): QuillType {
  return { kind: 'struct', name };
}

export function typeToString(t: QuillType): string {
  switch (t.kind) {
    case 'int': return 'int';
    case 'string': return 'string';
    case 'bool': return 'bool';
    case 'nil': return 'nil';
    case 'void': return 'void';
    case 'struct': return t.name;
  }
}

export function sameType(a: QuillType, b: QuillType): boolean {
  if (a.kind === 'struct' && b.kind === 'struct') return a.name === b.name;
  return a.kind === b.kind;
}

/**
 * Resolve a declared type name. Returns null when the name is neither a
 * scalar, `void` (when allowed) nor a known struct.
 */
export function resolveTypeName(
  name: string,
  isStruct: (name: string) => boolean,
  allowVoid = false,
): QuillType | null {
  switch (name) {
    case 'int': return INT_TYPE;
    case 'string': return STRING_TYPE;
    case 'bool': return BOOL_TYPE;
    case 'void': return allowVoid ? VOID_TYPE : null;
    default: return isStruct(name) ? structType(name) : null;
  }
}
