/**
 * Default configuration values for typegen.toml.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, OutputConfig } from './types.js';

/** Configuration file looked up when none is given. */
export const DEFAULT_CONFIG_FILE = 'typegen.toml';

/** Export read from a batch module when none is configured. */
export const DEFAULT_BATCH_EXPORT = 'batch';

/**
 * Default output configuration.
 */
export const DEFAULT_OUTPUT: OutputConfig = {
  directory: 'generated/typescript',
  json_schema: true,
  banner_source: 'schema-typegen',
  regenerate_command: 'npx schema-typegen generate',
  include_descriptions: true,
};

/**
 * Default logging configuration.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration. No batches are configured.
 */
export const DEFAULT_CONFIG: Config = {
  output: DEFAULT_OUTPUT,
  logging: DEFAULT_LOGGING,
  batches: [],
};
