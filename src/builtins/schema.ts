/**
 * Shape of the builtin type tables
 *
 * {
 *   "classes": { "DateTime": { "properties": { "timezone": "\\DateTimeZone" } } },
 *   "functions": { "\\strlen": ["int", ["string", "string"]] }
 * }
 *
 * A function row lists the return type first, then one `[name, type]` pair
 * per parameter in declaration order. An empty row means the function has
 * no known signature.
 */

import { z } from 'zod';

export interface FunctionSignature {
  readonly returnType: string;
  /** `[name, type]` pairs in declaration order */
  readonly parameters: ReadonlyArray<readonly [string, string]>;
}

const typeStringSchema = z.string().min(1, 'Type string must not be empty');

const parameterSchema = z.tuple([z.string().min(1, 'Parameter name must not be empty'), typeStringSchema]);

const emptySignatureSchema = z.tuple([]).transform((): FunctionSignature | null => null);

const signatureRowSchema = z
  .tuple([typeStringSchema])
  .rest(parameterSchema)
  .transform(([returnType, ...parameters]): FunctionSignature | null => ({ returnType, parameters }));

export const functionSignatureSchema = z.union([emptySignatureSchema, signatureRowSchema]);

export const classEntrySchema = z.object({
  properties: z.record(z.string(), typeStringSchema).default({}),
});

export const builtinTablesSchema = z.object({
  classes: z.record(z.string(), classEntrySchema).default({}),
  functions: z.record(z.string(), functionSignatureSchema).default({}),
});

export type BuiltinTablesInput = z.input<typeof builtinTablesSchema>;
export type BuiltinTables = z.output<typeof builtinTablesSchema>;
