/**
 * Environment variable overrides for configuration.
 *
 * Provides support for TYPEGEN_* environment variables to override
 * configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, OutputConfig, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off',
 * case-insensitively.
 *
 * @throws EnvCoercionError if the value is not one of those.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }
  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

interface MutableOverrides {
  output: Partial<OutputConfig>;
  logging: Partial<LoggingConfig>;
}

interface EnvVarMapping {
  /** Config path the variable overrides, for documentation. */
  readonly path: string;
  readonly type: 'string' | 'boolean';
  readonly description: string;
  apply(value: string, envVar: string, overrides: MutableOverrides): void;
}

/**
 * Mapping from environment variable names to config fields.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  TYPEGEN_OUTPUT_DIRECTORY: {
    path: 'output.directory',
    type: 'string',
    description: 'Directory receiving generated files',
    apply: (value, _envVar, overrides) => {
      overrides.output.directory = value;
    },
  },
  TYPEGEN_JSON_SCHEMA: {
    path: 'output.json_schema',
    type: 'boolean',
    description: 'Write a JSON Schema document beside each declaration file',
    apply: (value, envVar, overrides) => {
      overrides.output.json_schema = coerceToBoolean(value, envVar);
    },
  },
  TYPEGEN_INCLUDE_DESCRIPTIONS: {
    path: 'output.include_descriptions',
    type: 'boolean',
    description: 'Emit enum and model descriptions as doc comments',
    apply: (value, envVar, overrides) => {
      overrides.output.include_descriptions = coerceToBoolean(value, envVar);
    },
  },
  TYPEGEN_DEBUG: {
    path: 'logging.debug',
    type: 'boolean',
    description: 'Emit debug-level log entries',
    apply: (value, envVar, overrides) => {
      overrides.logging.debug = coerceToBoolean(value, envVar);
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Unset and empty variables are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 * @throws EnvCoercionError if a value cannot be coerced and errors are not collected.
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: MutableOverrides = { output: {}, logging: {} };
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(value, envVar, overrides);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  const partial: PartialConfig = {};
  if (Object.keys(overrides.output).length > 0) {
    partial.output = overrides.output;
  }
  if (Object.keys(overrides.logging).length > 0) {
    partial.logging = overrides.logging;
  }

  return { overrides: partial, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns A new configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const config = applyEnvOverrides(parseConfig(tomlContent));
 * // TYPEGEN_OUTPUT_DIRECTORY=out overrides output.directory
 * ```
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return {
    output: { ...config.output, ...overrides.output },
    logging: { ...config.logging, ...overrides.logging },
    batches: config.batches.map((batch) => ({ ...batch })),
  };
}

/**
 * Describes every supported environment variable, for help output.
 *
 * @returns One line per variable: name, type, config path and description.
 */
export function getEnvVarDocumentation(): string[] {
  return Object.entries(ENV_VAR_MAPPINGS).map(
    ([envVar, mapping]) => `${envVar} (${mapping.type}) -> ${mapping.path}: ${mapping.description}`
  );
}
