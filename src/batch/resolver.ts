/**
 * Batch resolution: turns catalog declarations into emit-ready declarations.
 *
 * The enum registry is built once from the batch's own enum list, before any
 * field type is resolved, and is passed explicitly to both front ends.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';
import { declaresAny, describeSchema, type StructuredContext } from '../descriptor/structured.js';
import { parseAnnotation, stripQualification } from '../descriptor/textual.js';
import type { KnownEnumNames, TypeDescriptor } from '../descriptor/types.js';
import type {
  Batch,
  Declaration,
  EnumDeclaration,
  FieldDeclaration,
  ModelDeclaration,
  SourceBatch,
  SourceEnum,
  SourceField,
  SourceModel,
  TypeSource,
} from './types.js';

/**
 * Collects the enum names declared in a batch.
 *
 * @param batch - The source batch.
 * @returns The registry of enum names.
 */
export function collectEnumNames(batch: SourceBatch): KnownEnumNames {
  const names = new Set<string>();
  for (const declaration of batch.declarations) {
    if (declaration.kind === 'Enum') {
      names.add(declaration.name);
    }
  }
  return names;
}

function buildStructuredContext(
  batch: SourceBatch,
  knownEnumNames: KnownEnumNames
): StructuredContext {
  const schemaNames = new Map<z.ZodTypeAny, string>();
  const enumObjectNames = new Map<object, string>();

  for (const declaration of batch.declarations) {
    if (declaration.schema !== undefined) {
      schemaNames.set(declaration.schema, declaration.name);
    }
    if (declaration.kind === 'Enum' && declaration.enumObject !== undefined) {
      enumObjectNames.set(declaration.enumObject, declaration.name);
    }
  }

  return { knownEnumNames, schemaNames, enumObjectNames };
}

function isAny(descriptor: TypeDescriptor): boolean {
  return descriptor.kind === 'Primitive' && descriptor.name === 'Any';
}

/**
 * Builds the descriptor for one field's type source.
 *
 * @param source - Annotation text or live schema.
 * @param context - Batch naming context.
 * @returns The descriptor and whether it degraded to `Any`.
 */
export function resolveTypeSource(
  source: TypeSource,
  context: StructuredContext
): { type: TypeDescriptor; degraded: boolean } {
  if (source.kind === 'Annotation') {
    const type = parseAnnotation(source.annotation, context.knownEnumNames);
    const declared = stripQualification(source.annotation.trim());
    return { type, degraded: isAny(type) && declared !== 'Any' };
  }

  const type = describeSchema(source.schema, context);
  return { type, degraded: isAny(type) && !declaresAny(source.schema) };
}

function resolveField(field: SourceField, context: StructuredContext): FieldDeclaration {
  const { type, degraded } = resolveTypeSource(field.type, context);

  return {
    name: field.name,
    ...(field.alias !== undefined ? { alias: field.alias } : {}),
    type,
    required: field.required,
    ...(field.description !== undefined ? { description: field.description } : {}),
    ...(field.default !== undefined ? { default: field.default } : {}),
    degraded,
  };
}

function resolveEnum(declaration: SourceEnum): EnumDeclaration {
  return {
    kind: 'Enum',
    name: declaration.name,
    ...(declaration.description !== undefined ? { description: declaration.description } : {}),
    members: declaration.members,
  };
}

function resolveModel(declaration: SourceModel, context: StructuredContext): ModelDeclaration {
  return {
    kind: 'Model',
    name: declaration.name,
    ...(declaration.description !== undefined ? { description: declaration.description } : {}),
    fields: declaration.fields.map((field) => resolveField(field, context)),
  };
}

/**
 * Resolves every field type of a batch to a type descriptor.
 *
 * Pure: the source batch is not modified and no I/O happens. Declaration and
 * field order are preserved.
 *
 * @param batch - The source batch.
 * @returns The resolved batch, carrying its enum registry.
 */
export function resolveBatch(batch: SourceBatch): Batch {
  const knownEnumNames = collectEnumNames(batch);
  const context = buildStructuredContext(batch, knownEnumNames);

  const declarations: Declaration[] = batch.declarations.map((declaration) =>
    declaration.kind === 'Enum' ? resolveEnum(declaration) : resolveModel(declaration, context)
  );

  return {
    name: batch.name,
    ...(batch.description !== undefined ? { description: batch.description } : {}),
    declarations,
    knownEnumNames,
  };
}
