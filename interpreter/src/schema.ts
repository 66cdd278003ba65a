/**
 * zod schemas for JSON-serialised Quill program trees.
 *
 * Lets a host hand the interpreter a tree produced by some other parser,
 * checked against the same node contract the built-in parser produces.
 */

import { z } from 'zod';
import {
  Assignment,
  BINARY_OPERATORS,
  Expression,
  Program,
  SourcePosition,
  Statement,
  VariableReference,
} from './ast';
import { QuillSyntaxError } from './errors';

const PositionSchema: z.ZodType<SourcePosition> = z.object({
  line: z.number().int().positive(),
  column: z.number().int().positive(),
});

const position = PositionSchema.optional();
const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier');
// Digit strings carry literals past 2^53, which JSON numbers cannot
const integer = z
  .union([z.number().int(), z.string().regex(/^-?\d+$/, 'must be an integer')])
  .transform(v => BigInt(v));

/** A schema whose accepted JSON shape differs from the node type it yields. */
type TreeSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const VariableSchema: z.ZodType<VariableReference> = z.object({
  type: z.literal('variable'),
  name: identifier,
  fields: z.array(identifier),
  position,
});

export const ExpressionSchema: TreeSchema<Expression> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('int_literal'), value: integer, position }),
    z.object({ type: z.literal('string_literal'), value: z.string(), position }),
    z.object({ type: z.literal('bool_literal'), value: z.boolean(), position }),
    z.object({ type: z.literal('nil_literal'), position }),
    VariableSchema,
    z.object({ type: z.literal('negate'), op1: ExpressionSchema, position }),
    z.object({ type: z.literal('not'), op1: ExpressionSchema, position }),
    z.object({ type: z.literal('new_instance'), structName: identifier, position }),
    CallSchema,
    z.object({
      type: z.literal('binary_expression'),
      operator: z.enum(BINARY_OPERATORS),
      op1: ExpressionSchema,
      op2: ExpressionSchema,
      position,
    }),
  ]),
);

const CallSchema = z.object({
  type: z.literal('call'),
  name: identifier,
  args: z.array(ExpressionSchema),
  position,
});

const AssignmentSchema: TreeSchema<Assignment> = z.object({
  type: z.literal('assignment'),
  target: VariableSchema,
  expression: ExpressionSchema,
  position,
});

export const StatementSchema: TreeSchema<Statement> = z.lazy(() =>
  z.union([
    CallSchema,
    AssignmentSchema,
    z.object({ type: z.literal('var_definition'), name: identifier, varType: identifier.nullable(), position }),
    z.object({
      type: z.literal('if_statement'),
      condition: ExpressionSchema,
      statements: z.array(StatementSchema),
      elseStatements: z.array(StatementSchema).nullable(),
      position,
    }),
    z.object({
      type: z.literal('for_statement'),
      init: AssignmentSchema,
      condition: ExpressionSchema,
      update: AssignmentSchema,
      statements: z.array(StatementSchema),
      position,
    }),
    z.object({ type: z.literal('return_statement'), expression: ExpressionSchema.nullable(), position }),
  ]),
);

const TypedNameSchema = z.object({
  name: identifier,
  varType: identifier.nullable(),
  position,
});

export const ProgramSchema: TreeSchema<Program> = z.object({
  type: z.literal('program'),
  structs: z.array(z.object({
    type: z.literal('struct_definition'),
    name: identifier,
    fields: z.array(TypedNameSchema),
    position,
  })),
  functions: z.array(z.object({
    type: z.literal('function_definition'),
    name: identifier,
    params: z.array(TypedNameSchema),
    returnType: identifier.nullable(),
    statements: z.array(StatementSchema),
    position,
  })),
});

/**
 * Decode and validate a JSON program tree.
 *
 * @throws QuillSyntaxError when the text is not JSON or not a valid tree
 */
export function parseProgramJson(text: string): Program {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new QuillSyntaxError(`Program tree is not valid JSON: ${reason}`);
  }
  const result = ProgramSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new QuillSyntaxError(`Invalid program tree: ${issues.join('; ')}`);
  }
  return result.data;
}
