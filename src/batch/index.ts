/**
 * Batch module: declarations generated together, and their resolution to
 * type descriptors.
 *
 * @packageDocumentation
 */

export { collectEnumNames, resolveBatch, resolveTypeSource } from './resolver.js';
export { isNumericMemberName, wireName } from './types.js';
export type {
  Batch,
  Declaration,
  EnumDeclaration,
  EnumMember,
  FieldDeclaration,
  JsonValue,
  ModelDeclaration,
  SourceBatch,
  SourceDeclaration,
  SourceEnum,
  SourceField,
  SourceModel,
  TypeSource,
} from './types.js';
