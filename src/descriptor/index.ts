/**
 * Type descriptor module.
 *
 * One canonical descriptor type with two front ends: annotation strings and
 * live zod schemas.
 *
 * @packageDocumentation
 */

export {
  ANY,
  MAP_OF_ANY,
  NONE,
  enumRef,
  isNullDescriptor,
  listOf,
  literal,
  mapOf,
  namedRef,
  optional,
  primitive,
  reference,
  unionOf,
} from './types.js';
export type {
  EnumRefDescriptor,
  KnownEnumNames,
  ListDescriptor,
  LiteralDescriptor,
  LiteralValue,
  MapDescriptor,
  NamedRefDescriptor,
  OptionalDescriptor,
  PrimitiveDescriptor,
  TypeDescriptor,
  TypeDescriptorKind,
  UnionDescriptor,
} from './types.js';
export { MAP_OF_ANY_TYPE, PRIMITIVE_TYPE_MAP, isPrimitiveName, lookupPrimitive } from './primitives.js';
export { UNION_SEPARATOR, parseAnnotation, stripQualification } from './textual.js';
export {
  MAX_SCHEMA_DEPTH,
  declaresAny,
  describeSchema,
  inspectFieldSchema,
  nativeEnumEntries,
} from './structured.js';
export type { NativeEnumLike, StructuredContext, StructuredFieldInfo } from './structured.js';
