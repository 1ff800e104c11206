/**
 * Check command handler for the schema-typegen CLI.
 *
 * Regenerates in memory and reports generated files that are missing or out
 * of date. Nothing is written.
 */

import * as path from 'node:path';
import { checkGeneration } from '../../generator/index.js';
import { loadCliConfig } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import type { CommandDeps } from './generate.js';

/**
 * Handles the check command.
 *
 * @param context - The CLI context.
 * @param deps - Pipeline collaborators.
 * @returns Exit code 1 when anything is out of date or failed to regenerate.
 */
export async function handleCheckCommand(
  context: CliContext,
  deps: CommandDeps = {}
): Promise<CliCommandResult> {
  const { config, baseDir } = await loadCliConfig(context);
  const report = await checkGeneration(config, { ...deps, baseDir });

  for (const entry of report.drift) {
    const label = entry.reason === 'missing' ? 'Missing' : 'Out of date';
    console.error(`${label}: ${path.relative(context.cwd, entry.file)}`);
  }
  for (const failure of report.failures) {
    console.error(`Failed ${failure.name}: ${failure.error.message}`);
  }

  if (report.upToDate) {
    console.log('Generated files are up to date');
    return { exitCode: 0 };
  }

  console.error('Generated files are stale; run the generate command');
  return { exitCode: 1 };
}
