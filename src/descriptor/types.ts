/**
 * Type descriptor definitions.
 *
 * A type descriptor is the normalized, structure-only representation of a
 * field's type. Both front ends (textual annotations and live zod schemas)
 * build descriptors; the mapper and the emitters only ever see descriptors.
 *
 * @packageDocumentation
 */

/**
 * A single member of a literal value set.
 */
export type LiteralValue = string | number | boolean;

/**
 * Primitive - maps 1:1 to a target primitive through the primitive table.
 */
export interface PrimitiveDescriptor {
  /** Discriminant for primitive types. */
  readonly kind: 'Primitive';
  /** Source-vocabulary name (e.g. 'str', 'UUID'). */
  readonly name: string;
}

/**
 * Optional - the wrapped type or null.
 */
export interface OptionalDescriptor {
  /** Discriminant for nullable wrappers. */
  readonly kind: 'Optional';
  /** The non-null type. */
  readonly inner: TypeDescriptor;
}

/**
 * ListOf - homogeneous ordered sequence.
 */
export interface ListDescriptor {
  /** Discriminant for lists. */
  readonly kind: 'ListOf';
  /** Element type. */
  readonly inner: TypeDescriptor;
}

/**
 * MapOf - string-keyed map. The key type is never preserved.
 */
export interface MapDescriptor {
  /** Discriminant for maps. */
  readonly kind: 'MapOf';
  /** Value type, kept for the JSON Schema path only. */
  readonly value: TypeDescriptor;
}

/**
 * Literal - closed set of literal values, in declaration order.
 */
export interface LiteralDescriptor {
  /** Discriminant for literal sets. */
  readonly kind: 'Literal';
  /** Literal values in declaration order. */
  readonly values: readonly LiteralValue[];
}

/**
 * UnionOf - heterogeneous union. Never contains a null member; null members
 * are lifted into an enclosing Optional by {@link unionOf}.
 */
export interface UnionDescriptor {
  /** Discriminant for unions. */
  readonly kind: 'UnionOf';
  /** Members in source order, duplicates kept. */
  readonly members: readonly TypeDescriptor[];
}

/**
 * EnumRef - reference to an enumeration registered in the same batch.
 */
export interface EnumRefDescriptor {
  /** Discriminant for enum references. */
  readonly kind: 'EnumRef';
  /** Enumeration name. */
  readonly name: string;
}

/**
 * NamedRef - reference to another exported interface, or an opaque name.
 */
export interface NamedRefDescriptor {
  /** Discriminant for named references. */
  readonly kind: 'NamedRef';
  /** Referenced name, verbatim. */
  readonly name: string;
}

/**
 * TypeDescriptor - union of all descriptor variants.
 */
export type TypeDescriptor =
  | PrimitiveDescriptor
  | OptionalDescriptor
  | ListDescriptor
  | MapDescriptor
  | LiteralDescriptor
  | UnionDescriptor
  | EnumRefDescriptor
  | NamedRefDescriptor;

/**
 * Discriminant values of {@link TypeDescriptor}.
 */
export type TypeDescriptorKind = TypeDescriptor['kind'];

/**
 * Set of enumeration names visible within one generation batch.
 */
export type KnownEnumNames = ReadonlySet<string>;

/**
 * ============================================================================
 * Factory Functions
 * ============================================================================
 */

export function primitive(name: string): PrimitiveDescriptor {
  return { kind: 'Primitive', name };
}

/** The generic "any" descriptor every unrecognized shape degrades to. */
export const ANY: PrimitiveDescriptor = primitive('Any');

/** The null primitive. */
export const NONE: PrimitiveDescriptor = primitive('None');

export function listOf(inner: TypeDescriptor): ListDescriptor {
  return { kind: 'ListOf', inner };
}

export function mapOf(value: TypeDescriptor): MapDescriptor {
  return { kind: 'MapOf', value };
}

/** The string-keyed map of any, the only map shape the front ends produce. */
export const MAP_OF_ANY: MapDescriptor = mapOf(ANY);

/**
 * Wraps a descriptor as nullable. Every call adds one wrapper, so
 * `Optional[Optional[int]]` keeps both levels.
 */
export function optional(inner: TypeDescriptor): OptionalDescriptor {
  return { kind: 'Optional', inner };
}

export function literal(values: readonly LiteralValue[]): LiteralDescriptor {
  return { kind: 'Literal', values };
}

export function enumRef(name: string): EnumRefDescriptor {
  return { kind: 'EnumRef', name };
}

export function namedRef(name: string): NamedRefDescriptor {
  return { kind: 'NamedRef', name };
}

/**
 * Builds a reference, classifying the name against the batch's enum registry.
 *
 * @param name - The referenced type name.
 * @param knownEnumNames - Enum names registered in the current batch.
 * @returns EnumRef when the name is a known enum, NamedRef otherwise.
 */
export function reference(
  name: string,
  knownEnumNames: KnownEnumNames
): EnumRefDescriptor | NamedRefDescriptor {
  return knownEnumNames.has(name) ? enumRef(name) : namedRef(name);
}

/**
 * Returns true for the primitive null spellings ('None', 'NoneType').
 */
export function isNullDescriptor(descriptor: TypeDescriptor): boolean {
  return (
    descriptor.kind === 'Primitive' && (descriptor.name === 'None' || descriptor.name === 'NoneType')
  );
}

/**
 * Builds a union, lifting null members into an Optional wrapper.
 *
 * - No null member: a UnionOf over all members (a single member is returned as is).
 * - Null member(s) and one other member: Optional(member).
 * - Null member(s) and several others: Optional(UnionOf(others)).
 * - Only null members: the null primitive.
 *
 * Member order is preserved and duplicates are kept.
 *
 * @param members - Union members in source order.
 * @returns The normalized descriptor.
 */
export function unionOf(members: readonly TypeDescriptor[]): TypeDescriptor {
  const nonNull = members.filter((member) => !isNullDescriptor(member));
  const hasNull = nonNull.length !== members.length;

  if (nonNull.length === 0) {
    return hasNull ? NONE : ANY;
  }

  const [only] = nonNull;
  const core: TypeDescriptor =
    nonNull.length === 1 && only !== undefined ? only : { kind: 'UnionOf', members: nonNull };

  return hasNull ? optional(core) : core;
}
