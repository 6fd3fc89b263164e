/**
 * Error Formatter
 *
 * Turns errors into log-friendly objects and terminal text.
 *
 * ```typescript
 * console.error(formatError(error, true, options.verbose));
 * logger.error('Task failed', error);   // uses serializeError()
 * ```
 *
 * @module errors
 */

import { Chalk } from 'chalk';
import { FlowError } from './FlowError.js';
import { ExitCode } from './ErrorCodes.js';
import type { SerializedError } from '../types/log-types.js';

export function serializeError(error: unknown): SerializedError {
  if (error instanceof FlowError) {
    return { name: error.name, message: error.message, code: error.code, stack: error.stack };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Exit code for an error that stopped a command; anything that is not a
 * FlowError is an internal failure
 */
export function exitCodeOf(error: unknown): ExitCode {
  return error instanceof FlowError ? error.exitCode : ExitCode.INTERNAL;
}

/**
 * Format an error for terminal display
 *
 * @param useColors - Whether to emit ANSI colors
 * @param verbose - Append exit code, context and stack
 */
export function formatError(error: unknown, useColors: boolean = true, verbose: boolean = false): string {
  const c = new Chalk({ level: useColors ? 1 : 0 });
  const lines: string[] = [];

  if (!(error instanceof Error)) {
    return c.red(`✖ ${String(error)}`);
  }

  const code = error instanceof FlowError ? ` ${c.gray(`[${error.code}]`)}` : '';
  lines.push(`${c.red.bold(`✖ ${error.name}`)}${code}`);

  if (error instanceof FlowError && error.path) {
    lines.push(c.dim(`at ${c.cyan(error.path)}`));
  }

  lines.push(c.bold(error.message));

  if (error instanceof FlowError && error.hint) {
    lines.push(`${c.blue('→ Hint:')} ${error.hint}`);
  }

  if (verbose) {
    if (error instanceof FlowError) {
      lines.push(`${c.dim('Exit Code:')} ${error.exitCode}`);
      if (Object.keys(error.context).length > 0) {
        lines.push(c.dim('Context:'));
        lines.push(c.gray(JSON.stringify(error.context, null, 2)));
      }
    }
    if (error.stack) {
      lines.push(c.gray(error.stack));
    }
  }

  return lines.join('\n');
}
