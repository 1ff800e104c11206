/**
 * CLI context creation and configuration loading.
 */

import * as path from 'node:path';
import {
  DEFAULT_CONFIG_FILE,
  applyEnvOverrides,
  assertConfigValid,
  getDefaultConfig,
  parseConfig,
  type Config,
} from '../config/index.js';
import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import type { CliContext, CliOptions } from './types.js';

/**
 * Error thrown for malformed command-line arguments.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parses command options.
 *
 * Recognizes `--config <path>`, `--config=<path>` and `--verify`.
 *
 * @param args - Arguments after the command name.
 * @returns The parsed options.
 * @throws CliUsageError on unknown options or a missing `--config` value.
 */
export function parseCliOptions(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    configPath: DEFAULT_CONFIG_FILE,
    explicitConfig: false,
    verify: false,
  };

  for (let index = 0; index < args.length; index++) {
    const arg = args[index] ?? '';

    if (arg === '--verify') {
      options.verify = true;
    } else if (arg === '--config' || arg === '-c') {
      const value = args[index + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new CliUsageError(`Option '${arg}' requires a path`);
      }
      options.configPath = value;
      options.explicitConfig = true;
      index++;
    } else if (arg.startsWith('--config=')) {
      const value = arg.slice('--config='.length);
      if (value === '') {
        throw new CliUsageError("Option '--config' requires a path");
      }
      options.configPath = value;
      options.explicitConfig = true;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/**
 * Creates CLI command context.
 *
 * @param args - Arguments after the command name.
 * @param overrides - Working directory and environment; default to the process's.
 * @returns The context.
 */
export function createCliApp(
  args: string[],
  overrides: { cwd?: string; env?: Record<string, string | undefined> } = {}
): CliContext {
  return {
    args,
    cwd: overrides.cwd ?? process.cwd(),
    options: parseCliOptions(args),
    env: overrides.env ?? process.env,
  };
}

/**
 * Configuration loaded for a command, with the directory its paths resolve against.
 */
export interface LoadedConfig {
  config: Config;
  /** Directory containing the configuration file. */
  baseDir: string;
  /** Absolute path of the configuration file. */
  configFile: string;
  /** False when no file was found and defaults are in use. */
  fromFile: boolean;
}

/**
 * Loads, overrides and validates the configuration for a command.
 *
 * A missing default configuration file yields the defaults; a missing file
 * named by `--config` is an error.
 *
 * @param context - The CLI context.
 * @returns The validated configuration.
 * @throws Error if the explicit file is missing.
 * @throws ConfigParseError if the file is malformed.
 * @throws EnvCoercionError if an override cannot be coerced.
 * @throws ConfigValidationError if the result is invalid.
 */
export async function loadCliConfig(context: CliContext): Promise<LoadedConfig> {
  const configFile = path.resolve(context.cwd, context.options.configPath);
  const baseDir = path.dirname(configFile);
  const exists = await safeExists(configFile);

  if (!exists && context.options.explicitConfig) {
    throw new Error(`Configuration file not found: ${context.options.configPath}`);
  }

  const fileConfig = exists ? parseConfig(await safeReadFile(configFile)) : getDefaultConfig();
  const config = applyEnvOverrides(fileConfig, context.env);
  assertConfigValid(config);

  return { config, baseDir, configFile, fromFile: exists };
}
