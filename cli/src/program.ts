/**
 * Builds the commander program. Dependencies are injected so that tests
 * can drive commands against an in-memory runtime.
 */

import { Command } from 'commander';
import type { CliDependencies } from './types/CliRuntime.js';
import { defaultDependencies } from './runtime/createRuntime.js';
import { registerRunCommand } from './commands/run.js';
import { registerFlowCommands } from './commands/flows.js';
import { registerValidateCommand } from './commands/validate.js';

export const VERSION = '0.1.0';

export function createProgram(deps: CliDependencies = defaultDependencies): Command {
  const program = new Command();

  program
    .name('taskline')
    .description('Run and manage stored task flows')
    .version(VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help')
    .option('-c, --config <file>', 'Config file (default: $TASKLINE_CONFIG or etc/taskline.yaml)');

  registerRunCommand(program, deps);
  registerFlowCommands(program, deps);
  registerValidateCommand(program, deps);

  return program;
}
