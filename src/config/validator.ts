/**
 * Semantic validation for configuration values.
 *
 * Validates what type checking cannot:
 * - Batch names are unique and usable as file names
 * - Every batch has exactly one source
 * - The output directory is set
 *
 * @packageDocumentation
 */

import { BATCH_NAME_PATTERN } from '../catalog/parser.js';
import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Validates a configuration without throwing.
 *
 * @param config - The configuration to validate.
 * @returns Validation result with every error found.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  if (config.output.directory.trim() === '') {
    errors.push({
      field: 'output.directory',
      value: config.output.directory,
      message: 'Output directory must not be empty',
    });
  }

  const seen = new Set<string>();
  config.batches.forEach((batch, index) => {
    const fieldPath = `batches[${String(index)}]`;

    if (!BATCH_NAME_PATTERN.test(batch.name)) {
      errors.push({
        field: `${fieldPath}.name`,
        value: batch.name,
        message: `Invalid batch name '${batch.name}': use letters, digits, '-' and '_' only`,
      });
    } else if (seen.has(batch.name)) {
      errors.push({
        field: `${fieldPath}.name`,
        value: batch.name,
        message: `Duplicate batch name '${batch.name}'`,
      });
    }
    seen.add(batch.name);

    if (batch.catalog === undefined && batch.module === undefined) {
      errors.push({
        field: fieldPath,
        value: batch.name,
        message: `Batch '${batch.name}' needs either 'catalog' or 'module'`,
      });
    } else if (batch.catalog !== undefined && batch.module !== undefined) {
      errors.push({
        field: fieldPath,
        value: batch.name,
        message: `Batch '${batch.name}' sets both 'catalog' and 'module'`,
      });
    }

    if (batch.export !== undefined && batch.module === undefined) {
      errors.push({
        field: `${fieldPath}.export`,
        value: batch.export,
        message: `'export' only applies to module batches`,
      });
    }
  });

  return { valid: errors.length === 0, errors };
}

/**
 * Validates a configuration and throws on the first failure set.
 *
 * @param config - The configuration to validate.
 * @throws ConfigValidationError listing every error found.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);
  if (!result.valid) {
    const details = result.errors.map((error) => `  - ${error.field}: ${error.message}`).join('\n');
    throw new ConfigValidationError(`Configuration validation failed:\n${details}`, result.errors);
  }
}
