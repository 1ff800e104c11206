/**
 * Primitive lookup table.
 *
 * Keys are type names in the schema annotation vocabulary, values are the
 * TypeScript spelling emitted for them.
 *
 * @packageDocumentation
 */

/** Target spelling of the string-keyed map of any. */
export const MAP_OF_ANY_TYPE = 'Record<string, any>';

/**
 * Source primitive name to TypeScript type.
 *
 * Temporal and identifier types are transported as strings (ISO 8601 and the
 * canonical UUID text form).
 */
export const PRIMITIVE_TYPE_MAP: Readonly<Record<string, string>> = Object.freeze({
  str: 'string',
  int: 'number',
  float: 'number',
  bool: 'boolean',
  None: 'null',
  NoneType: 'null',
  Any: 'any',
  datetime: 'string',
  UUID: 'string',
  date: 'string',
  dict: MAP_OF_ANY_TYPE,
});

/**
 * Looks up the target spelling of a primitive name.
 *
 * @param name - Source primitive name.
 * @returns The TypeScript type, or undefined when the name is not in the table.
 */
export function lookupPrimitive(name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(PRIMITIVE_TYPE_MAP, name)
    ? PRIMITIVE_TYPE_MAP[name]
    : undefined;
}

/**
 * Returns true when the name is a key of the primitive table.
 */
export function isPrimitiveName(name: string): boolean {
  return lookupPrimitive(name) !== undefined;
}
