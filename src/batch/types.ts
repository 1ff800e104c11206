/**
 * Batch types: the ordered list of enums and models one generation pass
 * works on, before and after type descriptors are built.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';
import type { KnownEnumNames, TypeDescriptor } from '../descriptor/types.js';

/**
 * A JSON-serializable value (field defaults, enum values).
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * One enumeration member. The value, not the name, is what goes on the wire.
 */
export interface EnumMember {
  /** Symbolic member name. */
  readonly name: string;
  /** Underlying value. */
  readonly value: string | number;
}

/**
 * Where a field's type information comes from.
 */
export type TypeSource =
  | {
      /** Written annotation, e.g. from a TOML catalog. */
      readonly kind: 'Annotation';
      /** The annotation text, e.g. `list[str] | None`. */
      readonly annotation: string;
    }
  | {
      /** Live zod schema. */
      readonly kind: 'Schema';
      /** The field schema without field-level optionality. */
      readonly schema: z.ZodTypeAny;
    };

/**
 * A field as declared by a catalog, before its type is resolved.
 */
export interface SourceField {
  /** Internal field name. */
  readonly name: string;
  /** Wire name, when it differs from the internal name. */
  readonly alias?: string;
  /** Type information. */
  readonly type: TypeSource;
  /** False when the field may be omitted or has a default. */
  readonly required: boolean;
  /** Field documentation. */
  readonly description?: string;
  /** Declared default value. */
  readonly default?: JsonValue;
}

/**
 * An enumeration as declared by a catalog.
 */
export interface SourceEnum {
  readonly kind: 'Enum';
  readonly name: string;
  readonly description?: string;
  readonly members: readonly EnumMember[];
  /** Schema other fields reference this enum through (structured catalogs). */
  readonly schema?: z.ZodTypeAny;
  /** Enum object passed to `z.nativeEnum` (structured catalogs). */
  readonly enumObject?: object;
}

/**
 * A structured model as declared by a catalog.
 */
export interface SourceModel {
  readonly kind: 'Model';
  readonly name: string;
  readonly description?: string;
  readonly fields: readonly SourceField[];
  /** Schema other fields reference this model through (structured catalogs). */
  readonly schema?: z.ZodTypeAny;
}

export type SourceDeclaration = SourceEnum | SourceModel;

/**
 * An ordered list of declarations generated together.
 */
export interface SourceBatch {
  /** Batch name; also the base name of the output files. */
  readonly name: string;
  /** What the batch covers. */
  readonly description?: string;
  /** Declarations in input order. */
  readonly declarations: readonly SourceDeclaration[];
}

/**
 * A field whose type has been resolved to a descriptor.
 */
export interface FieldDeclaration {
  readonly name: string;
  readonly alias?: string;
  readonly type: TypeDescriptor;
  readonly required: boolean;
  readonly description?: string;
  readonly default?: JsonValue;
  /** True when the type degraded to `Any` from a source that did not ask for it. */
  readonly degraded: boolean;
}

/**
 * An enumeration ready for emission.
 */
export interface EnumDeclaration {
  readonly kind: 'Enum';
  readonly name: string;
  readonly description?: string;
  readonly members: readonly EnumMember[];
}

/**
 * A model ready for emission.
 */
export interface ModelDeclaration {
  readonly kind: 'Model';
  readonly name: string;
  readonly description?: string;
  readonly fields: readonly FieldDeclaration[];
}

export type Declaration = EnumDeclaration | ModelDeclaration;

/**
 * A batch whose field types are all descriptors.
 */
export interface Batch {
  readonly name: string;
  readonly description?: string;
  readonly declarations: readonly Declaration[];
  /** Enum names declared in this batch. Built once, read-only afterwards. */
  readonly knownEnumNames: KnownEnumNames;
}

/**
 * The name a field is emitted under: its alias when present.
 */
export function wireName(field: Pick<FieldDeclaration, 'name' | 'alias'>): string {
  return field.alias ?? field.name;
}

/**
 * Returns true for names TypeScript reads as numbers (`"1"`, `"1.5"`,
 * `"NaN"`), which an enum member cannot carry.
 */
export function isNumericMemberName(name: string): boolean {
  return String(Number(name)) === name;
}
