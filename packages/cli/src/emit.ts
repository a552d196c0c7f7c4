import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import type {
  OpenApiDocument,
  Property,
  SchemaIR,
  TypeDefinition,
} from '@openapi-ir/core';

/**
 * IR as written out: `source` repeats the input schema and hoisted types
 * are listed on their own, so neither is emitted.
 */
export interface EmittedIR
  extends Omit<
    SchemaIR,
    | 'source'
    | 'additionalTypes'
    | 'properties'
    | 'arrayType'
    | 'additionalPropertiesType'
    | 'unionElements'
  > {
  properties: EmittedProperty[];
  arrayType?: EmittedIR;
  additionalPropertiesType?: EmittedIR;
  unionElements: Array<{ typeName: string; schema: EmittedIR }>;
}

export interface EmittedProperty extends Omit<Property, 'schema'> {
  schema: EmittedIR;
}

export interface EmittedType extends Omit<TypeDefinition, 'schema'> {
  schema: EmittedIR;
}

function emitProperty(property: Property): EmittedProperty {
  return { ...property, schema: emitIR(property.schema) };
}

export function emitIR(ir: SchemaIR): EmittedIR {
  const emitted: EmittedIR = {
    typeDecl: ir.typeDecl,
    defineViaAlias: ir.defineViaAlias,
    properties: ir.properties.map(emitProperty),
    hasAdditionalProperties: ir.hasAdditionalProperties,
    enumValues: ir.enumValues,
    unionElements: ir.unionElements.map((element) => ({
      typeName: element.typeName,
      schema: emitIR(element.schema),
    })),
    constraints: ir.constraints,
    deprecated: ir.deprecated,
  };
  if (ir.refType !== undefined) emitted.refType = ir.refType;
  if (ir.arrayType !== undefined) emitted.arrayType = emitIR(ir.arrayType);
  if (ir.additionalPropertiesType !== undefined) {
    emitted.additionalPropertiesType = emitIR(ir.additionalPropertiesType);
  }
  if (ir.discriminator !== undefined) emitted.discriminator = ir.discriminator;
  if (ir.description !== undefined) emitted.description = ir.description;
  return emitted;
}

export function emitType(definition: TypeDefinition): EmittedType {
  return { ...definition, schema: emitIR(definition.schema) };
}

/** Type definitions as pretty-printed JSON */
export function renderTypes(types: readonly TypeDefinition[]): string {
  return JSON.stringify({ types: types.map(emitType) }, null, 2);
}

export function renderDocument(document: OpenApiDocument): string {
  return JSON.stringify(document, null, 2);
}

/**
 * Write to `out` (relative to `cwd`) or, without one, to stdout.
 */
export async function writeOutput(
  text: string,
  out: string | undefined,
  cwd: string = process.cwd()
): Promise<void> {
  if (out === undefined) {
    process.stdout.write(`${text}\n`);
    return;
  }
  const abs = path.resolve(cwd, out);
  await writeFile(abs, `${text}\n`, 'utf8');
  process.stderr.write(`[openapi-ir] wrote ${abs}\n`);
}
