/**
 * Type mapper module.
 *
 * @packageDocumentation
 */

export { collectReferences, lowerType, mapType, printType } from './type-mapper.js';
export type { ReferenceTarget, TsTypeNode, TypeReference } from './type-mapper.js';
