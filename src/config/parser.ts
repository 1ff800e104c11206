/**
 * TOML configuration parser for typegen.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_OUTPUT } from './defaults.js';
import type { BatchSourceConfig, Config, LoggingConfig, OutputConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function describeType(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Validates that a value is a table.
 *
 * @throws ConfigParseError if value is not a table.
 */
function validateTable(value: unknown, fieldPath: string): Record<string, unknown> {
  if (!isTable(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Parses the output section, merged with defaults.
 */
function parseOutput(raw: Record<string, unknown> | undefined): OutputConfig {
  const result: OutputConfig = { ...DEFAULT_OUTPUT };
  if (raw === undefined) {
    return result;
  }

  if ('directory' in raw) {
    result.directory = validateString(raw.directory, 'output.directory');
  }
  if ('json_schema' in raw) {
    result.json_schema = validateBoolean(raw.json_schema, 'output.json_schema');
  }
  if ('banner_source' in raw) {
    result.banner_source = validateString(raw.banner_source, 'output.banner_source');
  }
  if ('regenerate_command' in raw) {
    result.regenerate_command = validateString(raw.regenerate_command, 'output.regenerate_command');
  }
  if ('include_descriptions' in raw) {
    result.include_descriptions = validateBoolean(
      raw.include_descriptions,
      'output.include_descriptions'
    );
  }

  return result;
}

/**
 * Parses the logging section, merged with defaults.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses one `[[batches]]` entry.
 */
function parseBatchSource(raw: unknown, entryPath: string): BatchSourceConfig {
  const def = validateTable(raw, entryPath);
  if (!('name' in def)) {
    throw new ConfigParseError(`Missing required field: '${entryPath}.name'`);
  }

  const entry: BatchSourceConfig = { name: validateString(def.name, `${entryPath}.name`) };
  if ('catalog' in def) {
    entry.catalog = validateString(def.catalog, `${entryPath}.catalog`);
  }
  if ('module' in def) {
    entry.module = validateString(def.module, `${entryPath}.module`);
  }
  if ('export' in def) {
    entry.export = validateString(def.export, `${entryPath}.export`);
  }
  return entry;
}

function parseBatches(raw: unknown): BatchSourceConfig[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new ConfigParseError(
      `Invalid type for 'batches': expected array of tables, got ${describeType(raw)}`
    );
  }
  return raw.map((entry: unknown, index) => parseBatchSource(entry, `batches[${String(index)}]`));
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    output: { ...DEFAULT_CONFIG.output },
    logging: { ...DEFAULT_CONFIG.logging },
    batches: [],
  };
}

/**
 * Parses typegen.toml content into a configuration.
 *
 * Missing keys take their default values; unknown keys are ignored.
 *
 * @param tomlContent - The configuration text.
 * @returns The parsed configuration.
 * @throws ConfigParseError if the TOML is malformed or a value has the wrong type.
 *
 * @example
 * ```typescript
 * const config = parseConfig(await safeReadFile('typegen.toml'));
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    output: parseOutput('output' in parsed ? validateTable(parsed.output, 'output') : undefined),
    logging: parseLogging(
      'logging' in parsed ? validateTable(parsed.logging, 'logging') : undefined
    ),
    batches: parseBatches(parsed.batches),
  };
}
