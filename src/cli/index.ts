#!/usr/bin/env node

/**
 * schema-typegen CLI entry point.
 */

import { runCli } from './main.js';

runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exit(exitCode);
  },
  (error: unknown) => {
    console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
);
