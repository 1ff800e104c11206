/**
 * JSON Schema emission for a batch.
 *
 * A sibling of the declaration emitter: it consumes the same resolved batch
 * but lowers descriptors on its own, so the two outputs describe the same
 * fields without being textually derived from one another. Map value types,
 * which the TypeScript output drops, are kept here when a descriptor carries
 * one.
 *
 * @packageDocumentation
 */

import {
  wireName,
  type Batch,
  type EnumDeclaration,
  type FieldDeclaration,
  type JsonValue,
  type ModelDeclaration,
} from '../batch/types.js';
import type { TypeDescriptor } from '../descriptor/types.js';

/** A JSON Schema object. */
export type JsonSchema = Record<string, JsonValue>;

/**
 * Draft-07 document holding one definition per enum and model of a batch.
 */
export interface JsonSchemaDocument {
  readonly $schema: string;
  readonly $id: string;
  readonly title: string;
  readonly description?: string;
  readonly definitions: Readonly<Record<string, JsonSchema>>;
}

export const JSON_SCHEMA_DRAFT = 'http://json-schema.org/draft-07/schema#';

/**
 * Builds the `$id` of a batch's schema document.
 */
export function documentId(batchName: string): string {
  return `urn:schema-typegen:${batchName}`;
}

const PRIMITIVE_SCHEMAS: Readonly<Record<string, JsonSchema>> = {
  str: { type: 'string' },
  int: { type: 'integer' },
  float: { type: 'number' },
  bool: { type: 'boolean' },
  None: { type: 'null' },
  NoneType: { type: 'null' },
  Any: {},
  datetime: { type: 'string', format: 'date-time' },
  UUID: { type: 'string', format: 'uuid' },
  date: { type: 'string', format: 'date' },
  dict: { type: 'object' },
};

function primitiveSchema(name: string): JsonSchema {
  const known = Object.prototype.hasOwnProperty.call(PRIMITIVE_SCHEMAS, name)
    ? PRIMITIVE_SCHEMAS[name]
    : undefined;
  return known !== undefined ? { ...known } : {};
}

/**
 * Lowers a type descriptor to a JSON Schema.
 *
 * @param descriptor - The descriptor.
 * @param declaredNames - Names defined in the document; references to other
 *   names become the empty (accept-anything) schema.
 * @returns The schema.
 */
export function lowerToJsonSchema(
  descriptor: TypeDescriptor,
  declaredNames: ReadonlySet<string>
): JsonSchema {
  switch (descriptor.kind) {
    case 'Primitive':
      return primitiveSchema(descriptor.name);
    case 'Optional':
      return { anyOf: [lowerToJsonSchema(descriptor.inner, declaredNames), { type: 'null' }] };
    case 'ListOf':
      return { type: 'array', items: lowerToJsonSchema(descriptor.inner, declaredNames) };
    case 'MapOf': {
      const value = lowerToJsonSchema(descriptor.value, declaredNames);
      return Object.keys(value).length === 0
        ? { type: 'object' }
        : { type: 'object', additionalProperties: value };
    }
    case 'Literal': {
      const [only] = descriptor.values;
      if (only === undefined) {
        return {};
      }
      return descriptor.values.length === 1 ? { const: only } : { enum: [...descriptor.values] };
    }
    case 'UnionOf':
      return descriptor.members.length === 0
        ? {}
        : { anyOf: descriptor.members.map((member) => lowerToJsonSchema(member, declaredNames)) };
    case 'EnumRef':
    case 'NamedRef':
      return declaredNames.has(descriptor.name)
        ? { $ref: `#/definitions/${descriptor.name}` }
        : {};
    default:
      return {};
  }
}

function enumSchema(declaration: EnumDeclaration): JsonSchema {
  const values = declaration.members.map((member) => member.value);
  const schema: JsonSchema = { title: declaration.name };

  if (declaration.description !== undefined) {
    schema.description = declaration.description;
  }
  if (values.length > 0 && values.every((value) => typeof value === 'string')) {
    schema.type = 'string';
  } else if (values.length > 0 && values.every((value) => typeof value === 'number')) {
    schema.type = values.every((value) => Number.isInteger(value)) ? 'integer' : 'number';
  }
  schema.enum = values;

  return schema;
}

function propertySchema(field: FieldDeclaration, declaredNames: ReadonlySet<string>): JsonSchema {
  const lowered = lowerToJsonSchema(field.type, declaredNames);
  const hasAnnotations = field.description !== undefined || field.default !== undefined;

  // Keywords beside $ref are ignored by draft-07 validators
  const schema: JsonSchema =
    hasAnnotations && '$ref' in lowered ? { allOf: [lowered] } : { ...lowered };

  if (field.description !== undefined) {
    schema.description = field.description;
  }
  if (field.default !== undefined) {
    schema.default = field.default;
  }
  return schema;
}

// Wire names come from catalogs, so '__proto__' must land as an own key
function defineEntry(target: Record<string, JsonValue>, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function modelSchema(declaration: ModelDeclaration, declaredNames: ReadonlySet<string>): JsonSchema {
  const properties: JsonSchema = {};
  const required: string[] = [];

  for (const field of declaration.fields) {
    const name = wireName(field);
    defineEntry(properties, name, propertySchema(field, declaredNames));
    if (field.required) {
      required.push(name);
    }
  }

  const schema: JsonSchema = { title: declaration.name };
  if (declaration.description !== undefined) {
    schema.description = declaration.description;
  }
  schema.type = 'object';
  schema.properties = properties;
  if (required.length > 0) {
    schema.required = required;
  }
  return schema;
}

/**
 * Emits the JSON Schema document of a batch.
 *
 * @param batch - The resolved batch.
 * @returns A draft-07 document with one entry per declaration under `definitions`.
 */
export function emitJsonSchemaDocument(batch: Batch): JsonSchemaDocument {
  const declaredNames = new Set(batch.declarations.map((declaration) => declaration.name));
  const definitions: Record<string, JsonSchema> = {};

  for (const declaration of batch.declarations) {
    defineEntry(
      definitions,
      declaration.name,
      declaration.kind === 'Enum'
        ? enumSchema(declaration)
        : modelSchema(declaration, declaredNames)
    );
  }

  return {
    $schema: JSON_SCHEMA_DRAFT,
    $id: documentId(batch.name),
    title: batch.name,
    ...(batch.description !== undefined ? { description: batch.description } : {}),
    definitions,
  };
}

/**
 * Serializes a schema document the way it is written to disk.
 */
export function serializeJsonSchemaDocument(document: JsonSchemaDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
