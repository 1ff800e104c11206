/**
 * TOML catalog parser.
 *
 * A catalog file declares one batch of enums and models with written type
 * annotations:
 *
 * ```toml
 * [meta]
 * name = "widgets"
 *
 * [enums.Color]
 * members = [{ name = "RED", value = "red" }]
 *
 * [models.Widget]
 * fields = [{ name = "color", type = "Color" }]
 * ```
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  isNumericMemberName,
  type EnumMember,
  type SourceBatch,
  type SourceDeclaration,
  type SourceEnum,
  type SourceField,
  type SourceModel,
} from '../batch/types.js';
import { toJsonValue } from './json-value.js';

/**
 * Error class for catalog parsing errors.
 */
export class CatalogParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new CatalogParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'CatalogParseError';
    this.cause = cause;
  }
}

/** Keys that are prohibited due to prototype pollution concerns. */
const PROHIBITED_KEYS = ['__proto__', 'constructor', 'prototype'];

/** Enum and model names become exported TypeScript identifiers. */
const DECLARATION_NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** Batch names become output file names. */
export const BATCH_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

function validateKey(key: string, keyPath: string): void {
  if (PROHIBITED_KEYS.includes(key)) {
    throw new CatalogParseError(
      `Prohibited key '${key}' found at '${keyPath}': keys ${PROHIBITED_KEYS.map((k) => `'${k}'`).join(', ')} are not allowed`
    );
  }
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Date) {
    return 'datetime';
  }
  return typeof value;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function validateTable(value: unknown, fieldPath: string): Record<string, unknown> {
  if (!isTable(value)) {
    throw new CatalogParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  for (const key of Object.keys(value)) {
    validateKey(key, fieldPath);
  }
  return value;
}

function validateArray(value: unknown, fieldPath: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new CatalogParseError(
      `Invalid type for '${fieldPath}': expected array, got ${describeType(value)}`
    );
  }
  return value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new CatalogParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

function validateNonEmptyString(value: unknown, fieldPath: string): string {
  const text = validateString(value, fieldPath);
  if (text.trim() === '') {
    throw new CatalogParseError(`Invalid value for '${fieldPath}': must not be empty`);
  }
  return text;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new CatalogParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

function validateDeclarationName(name: string, fieldPath: string): string {
  validateKey(name, fieldPath);
  if (!DECLARATION_NAME_PATTERN.test(name)) {
    throw new CatalogParseError(
      `Invalid name '${name}' at '${fieldPath}': must be a valid identifier`
    );
  }
  return name;
}

function validateFieldKey(value: unknown, fieldPath: string): string {
  const key = validateNonEmptyString(value, fieldPath);
  validateKey(key, fieldPath);
  return key;
}

function parseMember(raw: unknown, memberPath: string): EnumMember {
  const def = validateTable(raw, memberPath);
  if (!('name' in def)) {
    throw new CatalogParseError(`Missing required field: '${memberPath}.name'`);
  }
  if (!('value' in def)) {
    throw new CatalogParseError(`Missing required field: '${memberPath}.value'`);
  }

  const value = def.value;
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new CatalogParseError(
      `Invalid type for '${memberPath}.value': expected string or number, got ${describeType(value)}`
    );
  }
  const name = validateNonEmptyString(def.name, `${memberPath}.name`);
  if (isNumericMemberName(name)) {
    throw new CatalogParseError(`Invalid name '${name}' at '${memberPath}.name': must not be numeric`);
  }
  return { name, value };
}

function parseEnum(name: string, raw: unknown): SourceEnum {
  const enumPath = `enums.${name}`;
  const def = validateTable(raw, enumPath);
  if (!('members' in def)) {
    throw new CatalogParseError(`Missing required field: '${enumPath}.members'`);
  }

  const members = validateArray(def.members, `${enumPath}.members`).map((member, index) =>
    parseMember(member, `${enumPath}.members[${String(index)}]`)
  );

  const seen = new Set<string>();
  for (const member of members) {
    if (seen.has(member.name)) {
      throw new CatalogParseError(`Duplicate member '${member.name}' in '${enumPath}'`);
    }
    seen.add(member.name);
  }

  return {
    kind: 'Enum',
    name,
    ...('description' in def
      ? { description: validateString(def.description, `${enumPath}.description`) }
      : {}),
    members,
  };
}

function parseField(raw: unknown, fieldPath: string): SourceField {
  const def = validateTable(raw, fieldPath);
  if (!('name' in def)) {
    throw new CatalogParseError(`Missing required field: '${fieldPath}.name'`);
  }
  if (!('type' in def)) {
    throw new CatalogParseError(`Missing required field: '${fieldPath}.type'`);
  }

  const field: {
    -readonly [K in keyof SourceField]: SourceField[K];
  } = {
    name: validateFieldKey(def.name, `${fieldPath}.name`),
    type: { kind: 'Annotation', annotation: validateString(def.type, `${fieldPath}.type`) },
    required: 'required' in def ? validateBoolean(def.required, `${fieldPath}.required`) : true,
  };

  if ('alias' in def) {
    field.alias = validateFieldKey(def.alias, `${fieldPath}.alias`);
  }
  if ('description' in def) {
    field.description = validateString(def.description, `${fieldPath}.description`);
  }
  if ('default' in def) {
    const defaultValue = toJsonValue(def.default);
    if (defaultValue === undefined) {
      throw new CatalogParseError(
        `Invalid value for '${fieldPath}.default': not representable as JSON`
      );
    }
    field.default = defaultValue;
    // A field with a default may always be omitted
    field.required = false;
  }

  return field;
}

function parseModel(name: string, raw: unknown): SourceModel {
  const modelPath = `models.${name}`;
  const def = validateTable(raw, modelPath);
  if (!('fields' in def)) {
    throw new CatalogParseError(`Missing required field: '${modelPath}.fields'`);
  }

  const fields = validateArray(def.fields, `${modelPath}.fields`).map((field, index) =>
    parseField(field, `${modelPath}.fields[${String(index)}]`)
  );

  const wireNames = new Set<string>();
  for (const field of fields) {
    const wire = field.alias ?? field.name;
    if (wireNames.has(wire)) {
      throw new CatalogParseError(`Duplicate field '${wire}' in '${modelPath}'`);
    }
    wireNames.add(wire);
  }

  return {
    kind: 'Model',
    name,
    ...('description' in def
      ? { description: validateString(def.description, `${modelPath}.description`) }
      : {}),
    fields,
  };
}

/**
 * Options for {@link parseCatalog}.
 */
export interface ParseCatalogOptions {
  /** Batch name used when the catalog has no `meta.name`. */
  readonly defaultName?: string;
}

/**
 * Parses a TOML catalog into a source batch.
 *
 * Enums come before models; within each table, declaration order is the
 * order in the file.
 *
 * @param tomlContent - The catalog text.
 * @param options - Parse options.
 * @returns The source batch.
 * @throws CatalogParseError if the TOML is malformed or a declaration is invalid.
 */
export function parseCatalog(tomlContent: string, options: ParseCatalogOptions = {}): SourceBatch {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new CatalogParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  const meta: Record<string, unknown> = 'meta' in parsed ? validateTable(parsed.meta, 'meta') : {};
  const name =
    'name' in meta ? validateNonEmptyString(meta.name, 'meta.name') : options.defaultName;
  if (name === undefined) {
    throw new CatalogParseError(`Missing required field: 'meta.name'`);
  }
  if (!BATCH_NAME_PATTERN.test(name)) {
    throw new CatalogParseError(
      `Invalid batch name '${name}': use letters, digits, '-' and '_' only`
    );
  }

  const declarations: SourceDeclaration[] = [];
  const enums: Record<string, unknown> = 'enums' in parsed ? validateTable(parsed.enums, 'enums') : {};
  for (const [enumName, def] of Object.entries(enums)) {
    declarations.push(parseEnum(validateDeclarationName(enumName, 'enums'), def));
  }

  const models: Record<string, unknown> = 'models' in parsed ? validateTable(parsed.models, 'models') : {};
  for (const [modelName, def] of Object.entries(models)) {
    if (Object.prototype.hasOwnProperty.call(enums, modelName)) {
      throw new CatalogParseError(
        `Duplicate declaration '${modelName}': declared as both enum and model`
      );
    }
    declarations.push(parseModel(validateDeclarationName(modelName, 'models'), def));
  }

  return {
    name,
    ...('description' in meta
      ? { description: validateString(meta.description, 'meta.description') }
      : {}),
    declarations,
  };
}
