/**
 * Command dispatch for the schema-typegen CLI.
 */

import { getEnvVarDocumentation } from '../config/index.js';
import { createCliApp } from './app.js';
import { handleCheckCommand } from './commands/check.js';
import { handleGenerateCommand, type CommandDeps } from './commands/generate.js';
import { handleVersionCommand } from './commands/version.js';
import { runWithErrorHandling } from './utils/errorHandling.js';

const COMMAND_HELP: Readonly<Record<string, string>> = {
  generate: `
USAGE: schema-typegen generate [options]

Generates <batch>.ts and <batch>.schema.json for every batch in the
configuration file.

OPTIONS:
  --config, -c <path>  Configuration file (default: typegen.toml)
  --verify             Compile the generated declarations afterwards

EXAMPLES:
  schema-typegen generate
  schema-typegen generate --config config/typegen.toml --verify
`,
  check: `
USAGE: schema-typegen check [options]

Regenerates every batch in memory and exits with 1 when a generated file
is missing or differs from what would be written.

OPTIONS:
  --config, -c <path>  Configuration file (default: typegen.toml)

EXAMPLES:
  schema-typegen check
`,
};

/**
 * Builds the general usage text.
 */
export function renderHelp(): string {
  const envLines = getEnvVarDocumentation().map((line) => `  ${line}`);
  return `
USAGE:
  schema-typegen <command> [options]

COMMANDS:
  generate    Generate declaration and schema files
  check       Report generated files that are missing or stale
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

ENVIRONMENT:
${envLines.join('\n')}
`;
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 * @returns The exit code.
 */
function showHelpForCommand(commandName: string): number {
  const help = Object.prototype.hasOwnProperty.call(COMMAND_HELP, commandName)
    ? COMMAND_HELP[commandName]
    : undefined;
  if (help !== undefined) {
    console.log(help);
    return 0;
  }
  console.error(`Unknown command: ${commandName}`);
  console.error('\nRun "schema-typegen help" to see all available commands.');
  return 1;
}

/**
 * Runs the CLI.
 *
 * @param args - Arguments after the executable name.
 * @param deps - Pipeline collaborators for the generate and check commands.
 * @returns The exit code.
 */
export async function runCli(args: readonly string[], deps: CommandDeps = {}): Promise<number> {
  const [command, ...commandArgs] = args;

  if (command === undefined || command === '') {
    console.log(renderHelp());
    return 0;
  }

  switch (command) {
    case 'help':
    case '--help':
    case '-h': {
      const topic = commandArgs[0];
      if (topic !== undefined) {
        return showHelpForCommand(topic);
      }
      console.log(renderHelp());
      return 0;
    }

    case 'version':
    case '--version':
    case '-v':
      return runWithErrorHandling(() => handleVersionCommand());

    case 'generate':
    case 'check': {
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        return showHelpForCommand(command);
      }
      const handler = command === 'generate' ? handleGenerateCommand : handleCheckCommand;
      return runWithErrorHandling(() => handler(createCliApp(commandArgs), deps));
    }

    default:
      console.error(`Error: Unknown command: ${command}`);
      console.error('\nRun "schema-typegen help" for usage information.');
      return 1;
  }
}
