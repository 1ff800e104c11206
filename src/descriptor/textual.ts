/**
 * Textual front end: builds type descriptors from annotation strings.
 *
 * Used when only the written form of a field's type is available (TOML
 * catalogs, serialized schemas). Rules are tried in a fixed order:
 *
 * 1. Primitive table lookup after stripping module qualification, only when
 *    the annotation contains no bracket.
 * 2. Union split on `" | "`.
 * 3. `list[...]` (any letter case) - recurse on the interior.
 * 4. `dict[...]` (any letter case) - always the map of any.
 * 5. `Optional[...]` - recurse on the interior and wrap.
 * 6. Anything else is an opaque enum or interface reference.
 *
 * The union split is not bracket-aware and the generic forms are sliced at
 * fixed offsets, so unions nested inside brackets come out as corrupted
 * substrings. That behavior is pinned by tests.
 *
 * @packageDocumentation
 */

import { isPrimitiveName } from './primitives.js';
import {
  ANY,
  MAP_OF_ANY,
  listOf,
  optional,
  primitive,
  reference,
  unionOf,
  type KnownEnumNames,
  type TypeDescriptor,
} from './types.js';

/** Separator between union members in an annotation. */
export const UNION_SEPARATOR = ' | ';

const LIST_PREFIX = /^list\[/i;
const DICT_PREFIX = /^dict\[/i;
const OPTIONAL_PREFIX = 'Optional[';

/** Length of both `list[` and `dict[`. */
const GENERIC_PREFIX_LENGTH = 5;

function hasBracket(annotation: string): boolean {
  return annotation.includes('[') || annotation.includes(']');
}

/**
 * Drops module qualification: `uuid.UUID` becomes `UUID`.
 *
 * @param annotation - A bracket-free annotation.
 * @returns The last dotted segment, or the input when that segment is empty.
 */
export function stripQualification(annotation: string): string {
  const lastDot = annotation.lastIndexOf('.');
  if (lastDot === -1) {
    return annotation;
  }
  const segment = annotation.slice(lastDot + 1);
  return segment === '' ? annotation : segment;
}

/**
 * Parses a textual type annotation into a type descriptor.
 *
 * Never throws. Empty annotations and annotations no rule recognizes degrade
 * to `Any` or pass through as opaque references.
 *
 * @param text - The annotation, e.g. `list[str] | None`.
 * @param knownEnumNames - Enum names registered in the current batch.
 * @returns The type descriptor.
 *
 * @example
 * ```typescript
 * parseAnnotation('list[str] | None', new Set());
 * // { kind: 'Optional', inner: { kind: 'ListOf', inner: { kind: 'Primitive', name: 'str' } } }
 * ```
 */
export function parseAnnotation(text: string, knownEnumNames: KnownEnumNames): TypeDescriptor {
  const annotation = text.trim();
  if (annotation === '') {
    return ANY;
  }

  if (!hasBracket(annotation)) {
    const unqualified = stripQualification(annotation);
    if (isPrimitiveName(unqualified)) {
      return primitive(unqualified);
    }
  }

  // Before the list rule: `list[str] | None` is a union, not a list of `str] | None`
  if (annotation.includes(UNION_SEPARATOR)) {
    const members = annotation
      .split(UNION_SEPARATOR)
      .map((part) => parseAnnotation(part, knownEnumNames));
    return unionOf(members);
  }

  if (LIST_PREFIX.test(annotation) && annotation.endsWith(']')) {
    const interior = annotation.slice(GENERIC_PREFIX_LENGTH, -1);
    const element = hasBracket(interior) ? interior : stripQualification(interior);
    return listOf(parseAnnotation(element, knownEnumNames));
  }

  if (DICT_PREFIX.test(annotation) && annotation.endsWith(']')) {
    return MAP_OF_ANY;
  }

  if (annotation.startsWith(OPTIONAL_PREFIX) && annotation.endsWith(']')) {
    const interior = annotation.slice(OPTIONAL_PREFIX.length, -1);
    return optional(parseAnnotation(interior, knownEnumNames));
  }

  const name = hasBracket(annotation) ? annotation : stripQualification(annotation);
  return reference(name, knownEnumNames);
}
