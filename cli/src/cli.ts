#!/usr/bin/env node
/**
 * Taskline CLI
 *
 * Usage:
 *   taskline run <flow>                 Run a flow
 *   taskline list [--all]               List flows
 *   taskline show <flow>                Show a flow's tasks
 *   taskline create <flow> <file>       Create a flow from a JSON document
 *   taskline validate <files...>        Validate documents without a database
 */

import { ExitCode } from '@taskline/engine';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(ExitCode.INTERNAL);
});
