/**
 * Struct registry: declared struct names mapped to their ordered field schema.
 */

import type { StructDefinition } from './ast';
import { ErrorType, fail } from './errors';
import { QuillType, resolveTypeName, typeToString } from './types';
import { QuillValue, defaultValue } from './values';

export interface FieldSchema {
  name: string;
  type: QuillType;
}

export interface StructSchema {
  name: string;
  fields: FieldSchema[];
}

/**
 * One instance of a struct. Field storage belongs to the instance, so two
 * `new` expressions never share fields.
 */
export class StructInstance {
  readonly typeName: string;
  private readonly fields: Map<string, QuillValue>;

  constructor(schema: StructSchema) {
    this.typeName = schema.name;
    this.fields = new Map();
    for (const field of schema.fields) {
      this.fields.set(field.name, defaultValue(field.type));
    }
  }

  has(field: string): boolean {
    return this.fields.has(field);
  }

  get(field: string): QuillValue | undefined {
    return this.fields.get(field);
  }

  set(field: string, value: QuillValue): void {
    if (!this.fields.has(field)) {
      throw new Error(`Struct ${this.typeName} has no field '${field}'`);
    }
    this.fields.set(field, value);
  }
}

export class StructRegistry {
  private readonly schemas = new Map<string, StructSchema>();

  /**
   * Build the registry from the program's struct declarations. All names are
   * collected before field types are resolved, so structs may refer to
   * structs declared later in the file.
   */
  static build(defs: StructDefinition[]): StructRegistry {
    const registry = new StructRegistry();
    for (const def of defs) {
      if (registry.schemas.has(def.name)) {
        fail(ErrorType.NameError, `Duplicate struct definition: ${def.name}`, def.position);
      }
      registry.schemas.set(def.name, { name: def.name, fields: [] });
    }

    for (const def of defs) {
      const seen = new Set<string>();
      const fields: FieldSchema[] = [];
      for (const field of def.fields) {
        if (seen.has(field.name)) {
          fail(
            ErrorType.NameError,
            `Duplicate field name ${field.name} in struct ${def.name}`,
            field.position ?? def.position,
          );
        }
        seen.add(field.name);
        if (field.varType === null) {
          fail(ErrorType.TypeError, `No type given for field ${def.name}.${field.name}`, field.position ?? def.position);
        }
        const type = registry.resolveType(field.varType);
        if (type === null) {
          fail(
            ErrorType.TypeError,
            `Unknown type ${field.varType} for field ${def.name}.${field.name}`,
            field.position ?? def.position,
          );
        }
        fields.push({ name: field.name, type });
      }
      registry.schemas.set(def.name, { name: def.name, fields });
    }
    return registry;
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  get(name: string): StructSchema | undefined {
    return this.schemas.get(name);
  }

  get names(): string[] {
    return [...this.schemas.keys()];
  }

  /**
   * Declared type of a field, or undefined when the struct has no such field.
   */
  fieldType(structName: string, field: string): QuillType | undefined {
    return this.schemas.get(structName)?.fields.find(f => f.name === field)?.type;
  }

  /**
   * Resolve a declared type name against the scalars and the known structs.
   */
  resolveType(name: string, allowVoid = false): QuillType | null {
    return resolveTypeName(name, n => this.schemas.has(n), allowVoid);
  }

  /**
   * Create a fresh instance with every field at its type's default.
   */
  instantiate(name: string): StructInstance {
    const schema = this.schemas.get(name);
    if (schema === undefined) {
      fail(ErrorType.TypeError, `Struct ${name} not found`);
    }
    return new StructInstance(schema);
  }

  describe(name: string): string {
    const schema = this.schemas.get(name);
    if (schema === undefined) return name;
    return `${name} { ${schema.fields.map(f => `${f.name}: ${typeToString(f.type)}`).join('; ')} }`;
  }
}
