/**
 * CLI types and interfaces for the schema-typegen CLI.
 */

/**
 * Options shared by the commands that read a configuration.
 */
export interface CliOptions {
  /**
   * Configuration file path, relative to the working directory.
   */
  configPath: string;

  /**
   * Whether `--config` was given explicitly. A missing explicit file is an error.
   */
  explicitConfig: boolean;

  /**
   * Compile the generated declarations after writing them.
   */
  verify: boolean;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command arguments, without the command name.
   */
  args: string[];

  /**
   * Working directory the configuration path resolves against.
   */
  cwd: string;

  /**
   * Parsed options.
   */
  options: CliOptions;

  /**
   * Environment variables consulted for overrides.
   */
  env: Record<string, string | undefined>;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
