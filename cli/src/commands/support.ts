/**
 * Helpers shared by the command handlers: formatter selection, exit codes
 * and runtime lifetime.
 */

import { Option, type Command } from 'commander';
import { exitCodeOf } from '@taskline/engine';
import { FORMATTER_TYPES, createFormatter } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliGlobalOptions, CliOutputOptions } from '../types/CliOptions.js';
import type { CliDependencies, CliRuntime } from '../types/CliRuntime.js';

export function formatOption(): Option {
  return new Option('-f, --format <format>', 'Output format').choices(FORMATTER_TYPES).default('human');
}

/**
 * Add --format, --verbose and --no-color to a command
 */
export function withOutputOptions(command: Command): Command {
  return command
    .addOption(formatOption())
    .option('--verbose', 'Show detailed output')
    .option('--no-color', 'Disable colored output');
}

export function formatterFor(options: CliOutputOptions): Formatter {
  return createFormatter(options.format, { verbose: options.verbose, noColor: !options.color });
}

export function globalOptions(command: Command): CliGlobalOptions {
  return command.optsWithGlobals<CliGlobalOptions>();
}

/**
 * Report an error that stopped a command and set the exit code
 */
export function reportFailure(formatter: Formatter, error: unknown): void {
  formatter.showError(error);
  process.exitCode = exitCodeOf(error);
}

/**
 * Open a runtime, run the action against it and always close it.
 * Errors are reported through the formatter; nothing is rethrown.
 */
export async function withRuntime(
  deps: CliDependencies,
  command: Command,
  formatter: Formatter,
  action: (runtime: CliRuntime) => Promise<void>
): Promise<void> {
  const { config } = globalOptions(command);
  const { verbose } = command.opts<{ verbose?: boolean }>();
  let runtime: CliRuntime;
  try {
    runtime = await deps.openRuntime({ configFile: config, verbose });
  } catch (error) {
    reportFailure(formatter, error);
    return;
  }

  try {
    await action(runtime);
  } catch (error) {
    reportFailure(formatter, error);
  } finally {
    await runtime.close();
  }
}
