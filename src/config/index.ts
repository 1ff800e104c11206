/**
 * Configuration module for typegen.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  BatchSourceConfig,
  Config,
  LoggingConfig,
  OutputConfig,
  PartialConfig,
} from './types.js';
export {
  DEFAULT_BATCH_EXPORT,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
} from './defaults.js';
export { ConfigValidationError, assertConfigValid, validateConfig } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
