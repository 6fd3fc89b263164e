/**
 * Validate Command
 *
 * Checks flow document files without a database: JSON syntax, required
 * fields, unique and non-reserved task names, and a registered
 * implementation for every (module, method) pair.
 *
 * References that cannot resolve at run time, because they name the task
 * itself, a later task or no task at all, are reported as warnings.
 *
 * Usage:
 *   taskline validate flows/flow1.json
 *   taskline validate a.json b.json --format json
 *
 * Exit codes:
 *   0 - every document is valid
 *   2 - at least one document is invalid
 */

import { basename } from 'node:path';
import type { Command } from 'commander';
import { FlowLoader, exitCodeOf, referencedTasks, type TaskSpec } from '@taskline/engine';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliOutputOptions } from '../types/CliOptions.js';
import type { CliDependencies } from '../types/CliRuntime.js';
import { formatterFor, withOutputOptions } from './support.js';

export function registerValidateCommand(program: Command, deps: CliDependencies): void {
  withOutputOptions(
    program
      .command('validate')
      .description('Validate flow documents without running them')
      .argument('<files...>', 'Flow document files')
  ).action((files: string[], options: CliOutputOptions) => validateFiles(files, options, deps));
}

export async function validateFiles(files: string[], options: CliOutputOptions, deps: CliDependencies): Promise<void> {
  const formatter = formatterFor(options);
  const registry = deps.createRegistry();
  let failures = 0;

  for (const file of files) {
    try {
      const tasks = await FlowLoader.fromFile(file);
      registry.validate({ name: basename(file), tasks, enabled: true, deleted: false });

      for (const warning of unresolvableReferences(tasks)) {
        formatter.showWarning(`${file}: ${warning}`);
      }
      formatter.showSuccess(`${file}: ${tasks.length} task(s) valid`);
    } catch (error) {
      failures++;
      formatter.showError(error);
      if (process.exitCode === undefined || process.exitCode === 0) {
        process.exitCode = exitCodeOf(error);
      }
    }
  }

  if (files.length > 1) {
    reportSummary(formatter, files.length, failures);
  }
}

/**
 * Describe every reference that names the task itself, a later task or an
 * undeclared one
 */
export function unresolvableReferences(tasks: readonly TaskSpec[]): string[] {
  const declared = new Set(tasks.map((task) => task.name));
  const completed = new Set<string>();
  const warnings: string[] = [];

  for (const task of tasks) {
    for (const target of referencedTasks(task.params)) {
      if (target === task.name) {
        warnings.push(`task "${task.name}" references its own result`);
      } else if (!declared.has(target) && !target.startsWith('_')) {
        warnings.push(`task "${task.name}" references undeclared task "${target}"`);
      } else if (declared.has(target) && !completed.has(target)) {
        warnings.push(`task "${task.name}" references "${target}", which runs later`);
      }
    }
    completed.add(task.name);
  }
  return warnings;
}

function reportSummary(formatter: Formatter, total: number, failures: number): void {
  if (failures === 0) {
    formatter.showSuccess(`All ${total} documents are valid`);
  } else {
    formatter.showWarning(`${failures} of ${total} documents are invalid`);
  }
}
