/**
 * Structured catalogs: declarations backed by live zod schemas.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * const Color = defineEnum('Color', ['red', 'green']);
 * const Widget = defineModel('Widget', {
 *   color: Color.schema,
 *   tags: z.array(z.string()).optional(),
 * });
 * export const batch = defineBatch('widgets', [Color, Widget]);
 * ```
 */

import { z } from 'zod';
import {
  isNumericMemberName,
  type SourceBatch,
  type SourceDeclaration,
  type SourceEnum,
  type SourceField,
  type SourceModel,
} from '../batch/types.js';
import { inspectFieldSchema, nativeEnumEntries } from '../descriptor/structured.js';
import { toJsonValue } from './json-value.js';

/**
 * Error thrown when a structured declaration is inconsistent.
 */
export class CatalogDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogDefinitionError';
  }
}

/**
 * Options shared by every structured declaration.
 */
export interface DeclarationOptions {
  /** Documentation emitted above the declaration. */
  readonly description?: string;
}

/**
 * Options for {@link defineModel}.
 */
export interface ModelOptions extends DeclarationOptions {
  /** Wire names by internal field name. */
  readonly aliases?: Readonly<Record<string, string>>;
}

/**
 * A structured enum: its schema, for use in other shapes, and its declaration.
 */
export interface DefinedEnum<S extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly kind: 'Enum';
  readonly name: string;
  readonly schema: S;
  readonly declaration: SourceEnum;
}

/**
 * A structured model: its schema, for use in other shapes, and its declaration.
 */
export interface DefinedModel<S extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly kind: 'Model';
  readonly name: string;
  readonly schema: S;
  readonly declaration: SourceModel;
}

export type Defined = DefinedEnum | DefinedModel;

function withDescription(options: DeclarationOptions): { description?: string } {
  return options.description !== undefined ? { description: options.description } : {};
}

/**
 * Declares a string enum whose members are named after their values.
 *
 * @throws CatalogDefinitionError if a value reads as a number, such as `'1'`.
 * @param name - Declaration name.
 * @param values - Member values, in order.
 * @param options - Declaration options.
 * @returns The enum, with a `z.enum` schema.
 */
export function defineEnum<V extends string>(
  name: string,
  values: readonly [V, ...V[]],
  options: DeclarationOptions = {}
) {
  const numeric = values.find(isNumericMemberName);
  if (numeric !== undefined) {
    throw new CatalogDefinitionError(
      `Value '${numeric}' of enum '${name}' cannot name a member; use defineNativeEnum`
    );
  }

  const schema = z.enum(values);
  const declaration: SourceEnum = {
    kind: 'Enum',
    name,
    ...withDescription(options),
    members: values.map((value) => ({ name: value, value })),
    schema,
  };
  return { kind: 'Enum', name, schema, declaration } satisfies DefinedEnum<typeof schema>;
}

/**
 * Declares an enum from a TypeScript enum object.
 *
 * Members keep their symbolic names; numeric enums' reverse mappings are
 * skipped.
 *
 * @param name - Declaration name.
 * @param enumObject - The enum object.
 * @param options - Declaration options.
 * @returns The enum, with a `z.nativeEnum` schema.
 */
export function defineNativeEnum<T extends z.EnumLike>(
  name: string,
  enumObject: T,
  options: DeclarationOptions = {}
): DefinedEnum<z.ZodNativeEnum<T>> {
  const schema = z.nativeEnum(enumObject);
  return {
    kind: 'Enum',
    name,
    schema,
    declaration: {
      kind: 'Enum',
      name,
      ...withDescription(options),
      members: nativeEnumEntries(enumObject),
      schema,
      enumObject,
    },
  };
}

function fieldFromSchema(
  modelName: string,
  fieldName: string,
  fieldSchema: z.ZodTypeAny,
  alias: string | undefined
): SourceField {
  const info = inspectFieldSchema(fieldSchema);
  const field: {
    -readonly [K in keyof SourceField]: SourceField[K];
  } = {
    name: fieldName,
    type: { kind: 'Schema', schema: info.schema },
    required: info.required,
  };

  if (alias !== undefined) {
    field.alias = alias;
  }
  if (info.description !== undefined) {
    field.description = info.description;
  }
  if ('defaultValue' in info) {
    const defaultValue = toJsonValue(info.defaultValue);
    if (defaultValue === undefined) {
      throw new CatalogDefinitionError(
        `Default of '${modelName}.${fieldName}' is not representable as JSON`
      );
    }
    field.default = defaultValue;
  }
  return field;
}

/**
 * Declares a model from a zod object shape.
 *
 * A field wrapped in `.optional()` or `.default()` may be omitted; its
 * `.describe()` text becomes the field's documentation.
 *
 * @param name - Declaration name.
 * @param shape - Field schemas by internal field name.
 * @param options - Declaration options.
 * @returns The model, with a `z.object` schema.
 * @throws CatalogDefinitionError if an alias names an unknown field or a
 *   default has no JSON form.
 */
export function defineModel<T extends z.ZodRawShape>(
  name: string,
  shape: T,
  options: ModelOptions = {}
) {
  const aliases = options.aliases ?? {};
  for (const aliased of Object.keys(aliases)) {
    if (!Object.prototype.hasOwnProperty.call(shape, aliased)) {
      throw new CatalogDefinitionError(`Alias given for unknown field '${name}.${aliased}'`);
    }
  }

  const fields = Object.entries(shape).map(([fieldName, fieldSchema]) =>
    fieldFromSchema(
      name,
      fieldName,
      fieldSchema,
      Object.prototype.hasOwnProperty.call(aliases, fieldName) ? aliases[fieldName] : undefined
    )
  );

  const schema = z.object(shape);
  const declaration: SourceModel = {
    kind: 'Model',
    name,
    ...withDescription(options),
    fields,
    schema,
  };
  return { kind: 'Model', name, schema, declaration } satisfies DefinedModel<typeof schema>;
}

/**
 * Options for {@link defineBatch}.
 */
export interface BatchOptions {
  readonly description?: string;
}

/**
 * Groups structured declarations into a batch.
 *
 * @param name - Batch name; also the output file base name.
 * @param entries - Declarations in output order.
 * @param options - Batch options.
 * @returns The source batch.
 * @throws CatalogDefinitionError if two entries share a name.
 */
export function defineBatch(
  name: string,
  entries: readonly Defined[],
  options: BatchOptions = {}
): SourceBatch {
  const seen = new Set<string>();
  const declarations: SourceDeclaration[] = [];

  for (const entry of entries) {
    if (seen.has(entry.name)) {
      throw new CatalogDefinitionError(`Duplicate declaration '${entry.name}' in batch '${name}'`);
    }
    seen.add(entry.name);
    declarations.push(entry.declaration);
  }

  return {
    name,
    ...(options.description !== undefined ? { description: options.description } : {}),
    declarations,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Checks the outline of a value loaded from a module as a source batch.
 *
 * @param value - The module export.
 * @returns True if the value has a batch name and a list of declarations.
 */
export function isSourceBatch(value: unknown): value is SourceBatch {
  if (!isRecord(value) || typeof value.name !== 'string' || !Array.isArray(value.declarations)) {
    return false;
  }
  return value.declarations.every(
    (declaration: unknown) =>
      isRecord(declaration) &&
      typeof declaration.name === 'string' &&
      ((declaration.kind === 'Enum' && Array.isArray(declaration.members)) ||
        (declaration.kind === 'Model' && Array.isArray(declaration.fields)))
  );
}
