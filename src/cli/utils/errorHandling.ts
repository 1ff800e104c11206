/**
 * Shared error handling utilities for CLI commands.
 */

import type { CliCommandResult } from '../types.js';

/**
 * Runs a command handler and converts its outcome to an exit code.
 *
 * Errors are printed as `Error: <message>` on stderr and give exit code 1.
 *
 * @param fn - The handler (sync or async).
 * @returns The exit code.
 */
export async function runWithErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<number> {
  try {
    const result = await fn();
    if (result.message !== undefined) {
      console.log(result.message);
    }
    return result.exitCode;
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error(`Error: ${String(error)}`);
    }
    return 1;
  }
}
