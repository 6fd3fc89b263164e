/**
 * Catalog Commands
 *
 * Usage:
 *   taskline list [--all]
 *   taskline show <flow>
 *   taskline create <flow> <file> [--disabled]
 *   taskline update <flow> <file>
 *   taskline rename <from> <to>
 *   taskline delete <flow>
 *   taskline enable <flow>
 *   taskline disable <flow>
 *
 * Documents are read from disk and validated before anything is written.
 */

import type { Command } from 'commander';
import { FlowLoader, type FlowManager } from '@taskline/engine';
import type { CliCreateOptions, CliListOptions, CliOutputOptions } from '../types/CliOptions.js';
import type { CliDependencies } from '../types/CliRuntime.js';
import type { Formatter } from '../formatters/Formatter.js';
import { formatterFor, withOutputOptions, withRuntime } from './support.js';

type CatalogAction = (manager: FlowManager, formatter: Formatter) => Promise<void>;

export function registerFlowCommands(program: Command, deps: CliDependencies): void {
  const catalog = (command: Command, options: CliOutputOptions, action: CatalogAction): Promise<void> => {
    const formatter = formatterFor(options);
    return withRuntime(deps, command, formatter, (runtime) => action(runtime.manager, formatter));
  };

  withOutputOptions(
    program.command('list').description('List flows').option('-a, --all', 'Include deleted flows')
  ).action((options: CliListOptions, command: Command) =>
    catalog(command, options, async (manager, formatter) => {
      formatter.showFlows(await manager.list({ includeDeleted: options.all }));
    })
  );

  withOutputOptions(program.command('show').description("Show a flow's tasks").argument('<flow>', 'Flow name')).action(
    (name: string, options: CliOutputOptions, command: Command) =>
      catalog(command, options, async (manager, formatter) => {
        formatter.showFlow(await manager.describe(name));
      })
  );

  withOutputOptions(
    program
      .command('create')
      .description('Create a flow from a JSON document')
      .argument('<flow>', 'Flow name')
      .argument('<file>', 'Flow document')
      .option('--disabled', 'Store the flow disabled')
  ).action((name: string, file: string, options: CliCreateOptions & CliOutputOptions, command: Command) =>
    catalog(command, options, async (manager, formatter) => {
      const tasks = await FlowLoader.fromFile(file);
      const record = await manager.create(name, tasks, { enabled: !options.disabled });
      formatter.showSuccess(
        `Flow "${record.name}" created with ${tasks.length} task(s)${record.enabled ? '' : ' (disabled)'}`
      );
    })
  );

  withOutputOptions(
    program
      .command('update')
      .description("Replace a flow's document")
      .argument('<flow>', 'Flow name')
      .argument('<file>', 'Flow document')
  ).action((name: string, file: string, options: CliOutputOptions, command: Command) =>
    catalog(command, options, async (manager, formatter) => {
      const tasks = await FlowLoader.fromFile(file);
      await manager.update(name, tasks);
      formatter.showSuccess(`Flow "${name}" updated with ${tasks.length} task(s)`);
    })
  );

  withOutputOptions(
    program.command('rename').description('Rename a flow').argument('<from>', 'Current name').argument('<to>', 'New name')
  ).action((from: string, to: string, options: CliOutputOptions, command: Command) =>
    catalog(command, options, async (manager, formatter) => {
      await manager.rename(from, to);
      formatter.showSuccess(`Flow "${from}" renamed to "${to}"`);
    })
  );

  withOutputOptions(program.command('delete').description('Soft-delete a flow').argument('<flow>', 'Flow name')).action(
    (name: string, options: CliOutputOptions, command: Command) =>
      catalog(command, options, async (manager, formatter) => {
        await manager.delete(name);
        formatter.showSuccess(`Flow "${name}" deleted`);
      })
  );

  withOutputOptions(program.command('enable').description('Enable a flow').argument('<flow>', 'Flow name')).action(
    (name: string, options: CliOutputOptions, command: Command) =>
      catalog(command, options, async (manager, formatter) => {
        await manager.enable(name);
        formatter.showSuccess(`Flow "${name}" enabled`);
      })
  );

  withOutputOptions(program.command('disable').description('Disable a flow').argument('<flow>', 'Flow name')).action(
    (name: string, options: CliOutputOptions, command: Command) =>
      catalog(command, options, async (manager, formatter) => {
        await manager.disable(name);
        formatter.showSuccess(`Flow "${name}" disabled`);
      })
  );
}
