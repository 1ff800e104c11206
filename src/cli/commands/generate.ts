/**
 * Generate command handler for the schema-typegen CLI.
 *
 * Writes the declaration and schema files of every configured batch, and
 * optionally compiles the declarations afterwards.
 */

import * as path from 'node:path';
import { runGeneration, type GenerationDeps } from '../../generator/index.js';
import { verifyDeclarations } from '../../verify/index.js';
import { loadCliConfig } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Collaborators the command passes through to the pipeline.
 */
export type CommandDeps = Pick<GenerationDeps, 'logger' | 'loadModule'>;

/**
 * Handles the generate command.
 *
 * @param context - The CLI context.
 * @param deps - Pipeline collaborators.
 * @returns Exit code 1 when any batch failed or did not verify.
 */
export async function handleGenerateCommand(
  context: CliContext,
  deps: CommandDeps = {}
): Promise<CliCommandResult> {
  const { config, baseDir } = await loadCliConfig(context);

  if (config.batches.length === 0) {
    console.warn(`No batches configured in ${context.options.configPath}`);
    return { exitCode: 0 };
  }

  const report = await runGeneration(config, { ...deps, baseDir });
  let unverified = 0;

  for (const outcome of report.outcomes) {
    if (outcome.status === 'failed') {
      console.error(`Failed ${outcome.name}: ${outcome.error.message}`);
      continue;
    }

    const { generated, files } = outcome;
    console.log(
      `Generated ${outcome.name}: ${String(generated.enums.length)} enums, ` +
        `${String(generated.interfaces.length)} interfaces -> ${path.relative(context.cwd, files.typescript)}`
    );

    if (context.options.verify) {
      const verification = verifyDeclarations(generated.typescript);
      if (!verification.valid) {
        unverified++;
        console.error(`Verification failed for ${outcome.name}:`);
        for (const diagnostic of verification.diagnostics) {
          const location = diagnostic.line !== undefined ? `line ${String(diagnostic.line)}: ` : '';
          console.error(`  ${location}TS${String(diagnostic.code)} ${diagnostic.message}`);
        }
      }
    }
  }

  console.log(`${String(report.succeeded)} generated, ${String(report.failed)} failed`);
  return { exitCode: report.failed > 0 || unverified > 0 ? 1 : 0 };
}
