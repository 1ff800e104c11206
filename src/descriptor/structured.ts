/**
 * Structured front end: builds type descriptors from live zod schemas.
 *
 * This is the only module that inspects zod schema objects. Everything
 * downstream works on {@link TypeDescriptor} values.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import {
  ANY,
  MAP_OF_ANY,
  NONE,
  isNullDescriptor,
  listOf,
  literal,
  optional,
  primitive,
  reference,
  unionOf,
  type KnownEnumNames,
  type LiteralValue,
  type TypeDescriptor,
} from './types.js';

/**
 * Object shape accepted by `z.nativeEnum`.
 */
export type NativeEnumLike = Readonly<Record<string, string | number>>;

/**
 * Naming information the structured front end resolves references against.
 */
export interface StructuredContext {
  /** Enum names registered in the current batch. */
  readonly knownEnumNames: KnownEnumNames;
  /** Declared schemas by identity. */
  readonly schemaNames: ReadonlyMap<z.ZodTypeAny, string>;
  /** Declared native enum objects by identity, for `z.nativeEnum(...)` built outside the batch. */
  readonly enumObjectNames?: ReadonlyMap<object, string>;
}

/** Nesting depth after which an unnamed schema is treated as `Any`. */
export const MAX_SCHEMA_DEPTH = 64;

/**
 * Lists the member values of a native enum object in declaration order.
 *
 * Numeric enums carry reverse mappings (`{ A: 1, '1': 'A' }`); those keys are
 * skipped.
 *
 * @param enumObject - The enum object.
 * @returns Member name/value pairs.
 */
export function nativeEnumEntries(
  enumObject: NativeEnumLike
): Array<{ name: string; value: string | number }> {
  const entries: Array<{ name: string; value: string | number }> = [];
  for (const [name, value] of Object.entries(enumObject)) {
    const reverse = typeof value === 'string' ? enumObject[value] : undefined;
    if (typeof value === 'string' && typeof reverse === 'number' && String(reverse) === name) {
      continue;
    }
    entries.push({ name, value });
  }
  return entries;
}

function describeString(schema: z.ZodString): TypeDescriptor {
  for (const check of schema._def.checks) {
    if (check.kind === 'uuid') {
      return primitive('UUID');
    }
    if (check.kind === 'datetime') {
      return primitive('datetime');
    }
    if (check.kind === 'date') {
      return primitive('date');
    }
  }
  return primitive('str');
}

function describeLiteral(value: unknown): TypeDescriptor {
  if (value === null) {
    return NONE;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return literal([value]);
  }
  return ANY;
}

function lookupName(schema: z.ZodTypeAny, context: StructuredContext): string | undefined {
  const declared = context.schemaNames.get(schema);
  if (declared !== undefined) {
    return declared;
  }
  if (schema instanceof z.ZodNativeEnum && context.enumObjectNames !== undefined) {
    const enumObject: unknown = schema.enum;
    if (typeof enumObject === 'object' && enumObject !== null) {
      return context.enumObjectNames.get(enumObject);
    }
  }
  return undefined;
}

/**
 * Nullability from zod wrappers is a flag, not a layer: `.nullable()` on a
 * type that already admits null adds nothing.
 */
function nullable(inner: TypeDescriptor): TypeDescriptor {
  return inner.kind === 'Optional' || isNullDescriptor(inner) ? inner : optional(inner);
}

function unionMembers(members: readonly TypeDescriptor[]): TypeDescriptor[] {
  return members.flatMap((member) => {
    if (member.kind === 'Optional') {
      return [member.inner, NONE];
    }
    return member.kind === 'UnionOf' ? [...member.members] : [member];
  });
}

function resolveLazy(schema: z.ZodLazy<z.ZodTypeAny>): z.ZodTypeAny | undefined {
  try {
    return schema.schema;
  } catch {
    // A getter that fails at generation time is an unrecognized shape
    return undefined;
  }
}

function visit(
  schema: z.ZodTypeAny,
  context: StructuredContext,
  path: ReadonlySet<z.ZodTypeAny>
): TypeDescriptor {
  const name = lookupName(schema, context);
  if (name !== undefined) {
    return reference(name, context.knownEnumNames);
  }

  if (path.has(schema) || path.size >= MAX_SCHEMA_DEPTH) {
    return ANY;
  }
  const nextPath = new Set(path).add(schema);
  const recurse = (inner: z.ZodTypeAny): TypeDescriptor => visit(inner, context, nextPath);

  // Wrappers that carry no type content of their own
  if (schema instanceof z.ZodDefault) {
    return recurse(schema.removeDefault());
  }
  if (schema instanceof z.ZodCatch) {
    return recurse(schema.removeCatch());
  }
  if (schema instanceof z.ZodEffects) {
    return recurse(schema.innerType());
  }
  if (schema instanceof z.ZodBranded) {
    return recurse(schema.unwrap());
  }
  if (schema instanceof z.ZodReadonly) {
    return recurse(schema.unwrap());
  }
  if (schema instanceof z.ZodPipeline) {
    return recurse(schema._def.in);
  }
  if (schema instanceof z.ZodLazy) {
    const resolved = resolveLazy(schema);
    return resolved === undefined ? ANY : recurse(resolved);
  }

  // Primitives
  if (schema instanceof z.ZodString) {
    return describeString(schema);
  }
  if (schema instanceof z.ZodNumber) {
    return primitive(schema.isInt ? 'int' : 'float');
  }
  if (schema instanceof z.ZodBigInt) {
    return primitive('int');
  }
  if (schema instanceof z.ZodBoolean) {
    return primitive('bool');
  }
  if (schema instanceof z.ZodDate) {
    return primitive('datetime');
  }
  if (
    schema instanceof z.ZodNull ||
    schema instanceof z.ZodUndefined ||
    schema instanceof z.ZodVoid
  ) {
    return NONE;
  }
  if (schema instanceof z.ZodAny || schema instanceof z.ZodUnknown) {
    return ANY;
  }

  // List origin
  if (schema instanceof z.ZodArray || schema instanceof z.ZodSet) {
    const element: z.ZodTypeAny =
      schema instanceof z.ZodArray ? schema.element : schema._def.valueType;
    return listOf(recurse(element));
  }

  // Dict origin: the declared value type is dropped
  if (schema instanceof z.ZodRecord || schema instanceof z.ZodMap || schema instanceof z.ZodObject) {
    return MAP_OF_ANY;
  }

  // Union origin
  if (schema instanceof z.ZodNullable || schema instanceof z.ZodOptional) {
    return nullable(recurse(schema.unwrap()));
  }
  if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
    const options: readonly z.ZodTypeAny[] = schema.options;
    return unionOf(unionMembers(options.map(recurse)));
  }

  // Literal origin
  if (schema instanceof z.ZodLiteral) {
    return describeLiteral(schema.value);
  }
  if (schema instanceof z.ZodEnum) {
    const values: readonly string[] = schema.options;
    return values.length > 0 ? literal(values) : ANY;
  }
  if (schema instanceof z.ZodNativeEnum) {
    // Declared enums emit every value as a string; inline uses match them
    const values: LiteralValue[] = nativeEnumEntries(schema.enum).map((entry) =>
      String(entry.value)
    );
    return values.length > 0 ? literal(values) : ANY;
  }

  return ANY;
}

/**
 * Builds the type descriptor of a zod schema.
 *
 * Never throws. Schemas registered in `context` become enum or named
 * references; shapes with no descriptor counterpart (tuples, intersections,
 * functions, ...) degrade to `Any`.
 *
 * @param schema - The field schema, without its field-level optionality.
 * @param context - Names declared in the current batch.
 * @returns The type descriptor.
 */
export function describeSchema(schema: z.ZodTypeAny, context: StructuredContext): TypeDescriptor {
  return visit(schema, context, new Set());
}

/**
 * Field-level information read off a zod field schema.
 */
export interface StructuredFieldInfo {
  /** The schema with field-level optionality and defaults removed. */
  readonly schema: z.ZodTypeAny;
  /** False when the field may be omitted. */
  readonly required: boolean;
  /** Field documentation from `.describe()`. */
  readonly description?: string;
  /** Declared default, when the field has one. */
  readonly defaultValue?: unknown;
}

/**
 * Splits a field schema into its type and its field-level properties.
 *
 * A top-level `.optional()` or `.default()` makes the field optional; the
 * first description found while unwrapping is the field's documentation.
 *
 * @param schema - The schema declared for the field.
 * @returns The unwrapped schema and field properties.
 */
export function inspectFieldSchema(schema: z.ZodTypeAny): StructuredFieldInfo {
  let current = schema;
  let required = true;
  let description = schema.description;
  let defaultValue: { value: unknown } | undefined;

  for (;;) {
    if (current instanceof z.ZodOptional) {
      required = false;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      required = false;
      if (defaultValue === undefined) {
        defaultValue = { value: current._def.defaultValue() };
      }
      current = current.removeDefault();
    } else {
      break;
    }
    description = description ?? current.description;
  }

  const info: { -readonly [K in keyof StructuredFieldInfo]: StructuredFieldInfo[K] } = {
    schema: current,
    required,
  };
  if (description !== undefined) {
    info.description = description;
  }
  if (defaultValue !== undefined) {
    info.defaultValue = defaultValue.value;
  }
  return info;
}

/**
 * Returns true when the schema itself asks for an unconstrained value.
 */
export function declaresAny(schema: z.ZodTypeAny): boolean {
  return schema instanceof z.ZodAny || schema instanceof z.ZodUnknown;
}
