/**
 * Catalog module: where batches come from.
 *
 * @packageDocumentation
 */

export {
  BATCH_NAME_PATTERN,
  CatalogParseError,
  parseCatalog,
  type ParseCatalogOptions,
} from './parser.js';
export {
  CatalogDefinitionError,
  defineBatch,
  defineEnum,
  defineModel,
  defineNativeEnum,
  isSourceBatch,
  type BatchOptions,
  type DeclarationOptions,
  type Defined,
  type DefinedEnum,
  type DefinedModel,
  type ModelOptions,
} from './define.js';
export { toJsonValue } from './json-value.js';
