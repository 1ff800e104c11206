/**
 * Type mapper: lowers type descriptors to TypeScript type expressions.
 *
 * Lowering goes through a small target AST ({@link TsTypeNode}) so that
 * callers can inspect references; {@link mapType} prints it straight away.
 * Every function here is pure and total: a descriptor the mapper cannot
 * classify becomes `any`.
 *
 * @packageDocumentation
 */

import { MAP_OF_ANY_TYPE, lookupPrimitive } from '../descriptor/primitives.js';
import type { KnownEnumNames, LiteralValue, TypeDescriptor } from '../descriptor/types.js';

/**
 * Which kind of declaration a type reference points at.
 */
export type ReferenceTarget = 'enum' | 'interface';

/**
 * TypeScript type expression AST.
 */
export type TsTypeNode =
  | { readonly kind: 'Keyword'; readonly text: string }
  | { readonly kind: 'Record' }
  | { readonly kind: 'Array'; readonly element: TsTypeNode }
  | { readonly kind: 'Nullable'; readonly inner: TsTypeNode }
  | { readonly kind: 'LiteralType'; readonly value: LiteralValue }
  | { readonly kind: 'Union'; readonly members: readonly TsTypeNode[] }
  | { readonly kind: 'Reference'; readonly name: string; readonly target: ReferenceTarget };

const ANY_NODE: TsTypeNode = { kind: 'Keyword', text: 'any' };
const RECORD_NODE: TsTypeNode = { kind: 'Record' };

function lowerLiteralSet(values: readonly LiteralValue[]): TsTypeNode {
  const members: TsTypeNode[] = values.map((value) => ({ kind: 'LiteralType', value }));
  const [first] = members;
  if (first === undefined) {
    return ANY_NODE;
  }
  return members.length === 1 ? first : { kind: 'Union', members };
}

/**
 * Lowers a type descriptor to a TypeScript type AST.
 *
 * @param descriptor - The descriptor to lower.
 * @param knownEnumNames - Enum names of the current batch; decides the target
 *   of each reference.
 * @returns The type AST.
 */
export function lowerType(descriptor: TypeDescriptor, knownEnumNames: KnownEnumNames): TsTypeNode {
  if (typeof descriptor !== 'object' || descriptor === null) {
    return ANY_NODE;
  }

  switch (descriptor.kind) {
    case 'Primitive': {
      if (typeof descriptor.name !== 'string') {
        return ANY_NODE;
      }
      const target = lookupPrimitive(descriptor.name);
      if (target === MAP_OF_ANY_TYPE) {
        return RECORD_NODE;
      }
      // Unknown names pass through (custom scalar aliases defined elsewhere)
      return { kind: 'Keyword', text: target ?? descriptor.name };
    }
    case 'Optional':
      return { kind: 'Nullable', inner: lowerType(descriptor.inner, knownEnumNames) };
    case 'ListOf':
      return { kind: 'Array', element: lowerType(descriptor.inner, knownEnumNames) };
    case 'MapOf':
      return RECORD_NODE;
    case 'Literal':
      return Array.isArray(descriptor.values) ? lowerLiteralSet(descriptor.values) : ANY_NODE;
    case 'UnionOf': {
      if (!Array.isArray(descriptor.members) || descriptor.members.length === 0) {
        return ANY_NODE;
      }
      const members = descriptor.members.map((member) => lowerType(member, knownEnumNames));
      return { kind: 'Union', members };
    }
    case 'EnumRef':
      return { kind: 'Reference', name: descriptor.name, target: 'enum' };
    case 'NamedRef':
      return {
        kind: 'Reference',
        name: descriptor.name,
        target: knownEnumNames.has(descriptor.name) ? 'enum' : 'interface',
      };
    default:
      return ANY_NODE;
  }
}

function printLiteral(value: LiteralValue): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/**
 * Prints a type AST.
 *
 * Arrays and nullables append their suffix to the printed inner type without
 * parentheses, so `ListOf(Optional(str))` prints as `string | null[]`.
 *
 * @param node - The type AST.
 * @returns The TypeScript type expression.
 */
export function printType(node: TsTypeNode): string {
  switch (node.kind) {
    case 'Keyword':
      return node.text;
    case 'Record':
      return MAP_OF_ANY_TYPE;
    case 'Array':
      return `${printType(node.element)}[]`;
    case 'Nullable':
      return `${printType(node.inner)} | null`;
    case 'LiteralType':
      return printLiteral(node.value);
    case 'Union':
      return node.members.map(printType).join(' | ');
    case 'Reference':
      return node.name;
  }
}

/**
 * Maps a type descriptor to a TypeScript type expression.
 *
 * Deterministic: the same descriptor and registry always give the same
 * string. Union members keep their order and duplicates.
 *
 * @param descriptor - The descriptor to map.
 * @param knownEnumNames - Enum names of the current batch.
 * @returns The TypeScript type expression.
 *
 * @example
 * ```typescript
 * mapType(optional(listOf(primitive('str'))), new Set()); // 'string[] | null'
 * ```
 */
export function mapType(descriptor: TypeDescriptor, knownEnumNames: KnownEnumNames): string {
  return printType(lowerType(descriptor, knownEnumNames));
}

/**
 * A type name referenced from a descriptor.
 */
export interface TypeReference {
  readonly name: string;
  readonly target: ReferenceTarget;
}

function collectFromNode(node: TsTypeNode, seen: Map<string, TypeReference>): void {
  switch (node.kind) {
    case 'Array':
      collectFromNode(node.element, seen);
      return;
    case 'Nullable':
      collectFromNode(node.inner, seen);
      return;
    case 'Union':
      for (const member of node.members) {
        collectFromNode(member, seen);
      }
      return;
    case 'Reference':
      if (!seen.has(node.name)) {
        seen.set(node.name, { name: node.name, target: node.target });
      }
      return;
    default:
      return;
  }
}

/**
 * Lists the type names a descriptor references, in first-occurrence order.
 *
 * @param descriptor - The descriptor to inspect.
 * @param knownEnumNames - Enum names of the current batch.
 * @returns Unique references.
 */
export function collectReferences(
  descriptor: TypeDescriptor,
  knownEnumNames: KnownEnumNames
): TypeReference[] {
  const seen = new Map<string, TypeReference>();
  collectFromNode(lowerType(descriptor, knownEnumNames), seen);
  return [...seen.values()];
}
