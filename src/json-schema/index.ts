/**
 * JSON Schema output and payload validation.
 *
 * @packageDocumentation
 */

export {
  JSON_SCHEMA_DRAFT,
  documentId,
  emitJsonSchemaDocument,
  lowerToJsonSchema,
  serializeJsonSchemaDocument,
  type JsonSchema,
  type JsonSchemaDocument,
} from './emitter.js';

export {
  createPayloadValidator,
  formatValidationErrors,
  validateSchemaDocument,
  type PayloadValidationResult,
  type PayloadValidator,
} from './validator.js';
