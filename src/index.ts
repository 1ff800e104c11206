/**
 * schema-typegen
 *
 * Generates TypeScript enums and interfaces, plus a JSON Schema document, from
 * shared DTO catalogs so that two codebases agree on one wire format.
 *
 * @example
 * ```typescript
 * import { generateBatch, parseCatalog } from 'schema-typegen';
 *
 * const { typescript } = generateBatch(parseCatalog(tomlText));
 * ```
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './descriptor/index.js';
export * from './batch/index.js';
export * from './mapper/index.js';
export * from './emitter/index.js';
export * from './catalog/index.js';
export * from './json-schema/index.js';
export * from './verify/index.js';
export * from './config/index.js';
export * from './generator/index.js';
export { Logger, type LogEntry, type LogLevel, type LogSink, type LoggerOptions } from './utils/logger.js';
export { PathValidationError } from './utils/safe-fs.js';
