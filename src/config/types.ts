/**
 * Configuration types for typegen.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Where and how generated files are written.
 */
export interface OutputConfig {
  /** Directory receiving `<batch>.ts` and `<batch>.schema.json`. */
  directory: string;
  /** Whether a JSON Schema document is written beside each declaration file. */
  json_schema: boolean;
  /** Project named in the banner of generated files. */
  banner_source: string;
  /** Command named in the banner of generated files. */
  regenerate_command: string;
  /** Whether enum and model descriptions become doc comments. */
  include_descriptions: boolean;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Emit debug-level log entries. */
  debug: boolean;
}

/**
 * One `[[batches]]` entry. Exactly one of `catalog` and `module` is set in a
 * valid configuration.
 */
export interface BatchSourceConfig {
  /** Batch name; also the base name of the output files. */
  name: string;
  /** Path to a TOML catalog. */
  catalog?: string;
  /** Path to a JavaScript module exporting a structured batch. */
  module?: string;
  /** Export holding the batch in `module`. Default: 'batch'. */
  export?: string;
}

/**
 * Complete configuration structure.
 */
export interface Config {
  output: OutputConfig;
  logging: LoggingConfig;
  batches: BatchSourceConfig[];
}

/**
 * Partial configuration for overrides.
 */
export interface PartialConfig {
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}
