/**
 * User function table, keyed by (name, arity).
 */

import type { FunctionDefinition, SourcePosition } from './ast';
import { isBuiltin } from './builtins';
import { ErrorType, fail } from './errors';
import type { StructRegistry } from './structs';
import { QuillType, typeToString } from './types';

export interface ParamSignature {
  name: string;
  type: QuillType;
}

export interface FunctionSignature {
  name: string;
  params: ParamSignature[];
  returnType: QuillType;
  definition: FunctionDefinition;
}

export class FunctionTable {
  private readonly byName = new Map<string, Map<number, FunctionSignature>>();

  /**
   * Validate every definition against the struct registry and index it.
   */
  static build(defs: FunctionDefinition[], structs: StructRegistry): FunctionTable {
    const table = new FunctionTable();
    for (const def of defs) {
      table.add(resolveSignature(def, structs));
    }
    return table;
  }

  private add(sig: FunctionSignature): void {
    const arity = sig.params.length;
    if (isBuiltin(sig.name)) {
      fail(ErrorType.NameError, `Cannot redefine built-in function ${sig.name}`, sig.definition.position);
    }
    let overloads = this.byName.get(sig.name);
    if (overloads === undefined) {
      overloads = new Map();
      this.byName.set(sig.name, overloads);
    }
    if (overloads.has(arity)) {
      fail(
        ErrorType.NameError,
        `Duplicate definition of function ${sig.name} taking ${arity} params`,
        sig.definition.position,
      );
    }
    overloads.set(arity, sig);
  }

  /**
   * Find the definition of `name` taking exactly `arity` arguments.
   */
  resolve(name: string, arity: number, position?: SourcePosition): FunctionSignature {
    const overloads = this.byName.get(name);
    if (overloads === undefined) {
      fail(ErrorType.NameError, `Function ${name} not found`, position);
    }
    const sig = overloads.get(arity);
    if (sig === undefined) {
      fail(ErrorType.NameError, `Function ${name} taking ${arity} params not found`, position);
    }
    return sig;
  }

  has(name: string, arity: number): boolean {
    return this.byName.get(name)?.has(arity) ?? false;
  }

  /** All signatures, in name then arity order. */
  signatures(): FunctionSignature[] {
    const names = [...this.byName.keys()].sort();
    return names.flatMap(name => {
      const overloads = this.byName.get(name) ?? new Map<number, FunctionSignature>();
      return [...overloads.entries()].sort(([a], [b]) => a - b).map(([, sig]) => sig);
    });
  }
}

export function formatSignature(sig: FunctionSignature): string {
  const params = sig.params.map(p => `${p.name}: ${typeToString(p.type)}`).join(', ');
  return `func ${sig.name}(${params}): ${typeToString(sig.returnType)}`;
}

function resolveSignature(def: FunctionDefinition, structs: StructRegistry): FunctionSignature {
  const seen = new Set<string>();
  const params: ParamSignature[] = [];
  for (const param of def.params) {
    const where = param.position ?? def.position;
    if (seen.has(param.name)) {
      fail(ErrorType.NameError, `Duplicate parameter ${param.name} in function ${def.name}`, where);
    }
    seen.add(param.name);
    const type = param.varType === null ? null : structs.resolveType(param.varType);
    if (type === null) {
      fail(ErrorType.TypeError, `Parameter ${param.name} can not be of type ${param.varType ?? 'none'}`, where);
    }
    params.push({ name: param.name, type });
  }

  if (def.returnType === null) {
    fail(ErrorType.TypeError, `No return type for function ${def.name}`, def.position);
  }
  const returnType = structs.resolveType(def.returnType, true);
  if (returnType === null) {
    fail(ErrorType.TypeError, `Unknown return type ${def.returnType} for function ${def.name}`, def.position);
  }

  return { name: def.name, params, returnType, definition: def };
}
