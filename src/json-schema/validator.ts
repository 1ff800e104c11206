/**
 * Payload validation against an emitted schema document.
 *
 * @packageDocumentation
 */

import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import type { JsonSchemaDocument } from './emitter.js';

/**
 * Result of validating one payload.
 */
export interface PayloadValidationResult {
  readonly valid: boolean;
  /** One line per violation, `<instance path> <message>`. */
  readonly errors: readonly string[];
}

/**
 * Validates payloads against the definitions of one document.
 */
export interface PayloadValidator {
  /** Definition names available for validation, in document order. */
  readonly definitionNames: readonly string[];
  /**
   * Validates a payload against a named definition.
   *
   * An unknown definition name yields an invalid result rather than throwing.
   */
  validate(definition: string, payload: unknown): PayloadValidationResult;
}

interface CompiledValidator {
  (data: unknown): boolean;
  errors?: ErrorObject[] | null;
}

interface AjvInstance {
  compile(schema: object): CompiledValidator;
  validateSchema(schema: object): unknown;
  errors?: ErrorObject[] | null;
}

interface AjvOptions {
  allErrors: boolean;
  strict: boolean;
  logger: false;
  formats: Record<string, RegExp>;
}

const DATE_TIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?([Zz]|[+-]\d{2}:?\d{2})?$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const UUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

function createAjv(): AjvInstance {
  return new (Ajv as unknown as new (opts: AjvOptions) => AjvInstance)({
    allErrors: true,
    strict: false,
    logger: false,
    formats: {
      'date-time': DATE_TIME_PATTERN,
      date: DATE_PATTERN,
      uuid: UUID_PATTERN,
    },
  });
}

/**
 * Formats ajv errors as `<instance path> <message>` lines.
 */
export function formatValidationErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  if (errors === null || errors === undefined) {
    return [];
  }
  return errors.map((error) => {
    const location = error.instancePath === '' ? '/' : error.instancePath;
    return `${location} ${error.message ?? 'is invalid'}`;
  });
}

/**
 * Checks a document against the draft-07 meta-schema.
 *
 * @param document - The document to check.
 * @returns Meta-schema violations; empty when the document is valid.
 */
export function validateSchemaDocument(document: JsonSchemaDocument): string[] {
  const ajv = createAjv();
  const valid = ajv.validateSchema(document);
  return valid === true ? [] : formatValidationErrors(ajv.errors);
}

/**
 * Creates a payload validator for a schema document.
 *
 * Definitions are compiled lazily on first use and cached.
 *
 * @param document - An emitted schema document.
 * @returns The validator.
 *
 * @example
 * ```typescript
 * const validator = createPayloadValidator(emitJsonSchemaDocument(batch));
 * validator.validate('Widget', { color: 'red' }); // { valid: true, errors: [] }
 * ```
 */
export function createPayloadValidator(document: JsonSchemaDocument): PayloadValidator {
  const ajv = createAjv();

  const definitionNames = Object.keys(document.definitions);
  const compiled = new Map<string, CompiledValidator>();

  function validatorFor(definition: string): CompiledValidator | undefined {
    const schema = Object.prototype.hasOwnProperty.call(document.definitions, definition)
      ? document.definitions[definition]
      : undefined;
    if (schema === undefined) {
      return undefined;
    }
    let validator = compiled.get(definition);
    if (validator === undefined) {
      // Local refs (#/definitions/X) resolve against this root
      validator = ajv.compile({ ...schema, definitions: document.definitions });
      compiled.set(definition, validator);
    }
    return validator;
  }

  return {
    definitionNames,
    validate(definition: string, payload: unknown): PayloadValidationResult {
      const validator = validatorFor(definition);
      if (validator === undefined) {
        return { valid: false, errors: [`Unknown definition '${definition}'`] };
      }
      const valid = validator(payload);
      return { valid, errors: valid ? [] : formatValidationErrors(validator.errors) };
    },
  };
}
