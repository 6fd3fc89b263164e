/**
 * Human-Readable Formatter
 *
 * Symbols:
 * - ▶ Run started
 * - ● Task running
 * - ✔ Success
 * - ✖ Failure
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { RunState, formatError, type FlowDetails, type FlowSummary, type RunOutcome } from '@taskline/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';
import { CliEventType, type CliEvent } from '../types/CliEvent.js';
import { StatusSymbols, flowStatus, formatDuration, formatTable, plural } from '../utils/format.js';

export class HumanFormatter implements Formatter {
  private readonly options: FormatterOptions;
  private readonly c: ChalkInstance;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
    this.c = options.noColor ? new Chalk({ level: 0 }) : chalk;
  }

  onEvent(event: CliEvent): void {
    const { c } = this;
    switch (event.type) {
      case CliEventType.RUN_STARTED:
        console.log(c.cyan.bold(`${StatusSymbols.started} ${event.flowName} (${plural(event.taskCount, 'task')})`));
        break;
      case CliEventType.TASK_STARTED:
        console.log(`${c.blue(StatusSymbols.running)} ${event.taskName} ${c.dim(`${event.module}.${event.method}`)}`);
        break;
      case CliEventType.TASK_COMPLETED:
        console.log(c.green(`  ${StatusSymbols.success} ${event.taskName} completed in ${formatDuration(event.durationMs)}`));
        if (this.options.verbose) {
          console.log(c.dim(`    result: ${JSON.stringify(event.result)}`));
        }
        break;
      case CliEventType.TASK_FAILED:
        console.log(
          c.red(`  ${StatusSymbols.failure} ${event.taskName} failed in ${formatDuration(event.durationMs)}: ${event.error.message}`)
        );
        break;
      case CliEventType.RUN_COMPLETED:
      case CliEventType.RUN_FAILED:
        // The outcome is printed by showResult()
        break;
    }
  }

  showResult(outcome: RunOutcome): void {
    const { c } = this;
    const total = outcome.completedTasks.length + (outcome.failedTask ? 1 : 0);
    const duration = formatDuration(outcome.durationMs);

    console.log();
    if (outcome.state === RunState.COMPLETED) {
      console.log(
        c.green.bold(`${StatusSymbols.success} Flow "${outcome.flowName}" completed: ${plural(total, 'task')} in ${duration}`)
      );
    } else {
      console.log(
        c.red.bold(
          `${StatusSymbols.failure} Flow "${outcome.flowName}" failed at task "${outcome.failedTask ?? '?'}": ` +
            `${outcome.completedTasks.length}/${total} tasks completed in ${duration}`
        )
      );
      if (outcome.error) {
        console.error(formatError(outcome.error, !this.options.noColor, this.options.verbose));
      }
    }

    if (this.options.verbose) {
      console.log(c.dim(`Run ID: ${outcome.runId}`));
      console.log(c.bold('Context:'));
      console.log(JSON.stringify(outcome.context, null, 2));
    }
  }

  showFlows(flows: FlowSummary[]): void {
    if (flows.length === 0) {
      this.showInfo('No flows found');
      return;
    }
    const rows = [
      ['NAME', 'STATUS', 'TASKS', 'UPDATED'],
      ...flows.map((flow) => [
        flow.name,
        flowStatus(flow),
        flow.taskCount === undefined ? '?' : String(flow.taskCount),
        flow.updatedAt.toISOString(),
      ]),
    ];
    const [header, ...body] = formatTable(rows);
    console.log(this.c.bold(header ?? ''));
    for (const line of body) {
      console.log(line);
    }
  }

  showFlow(details: FlowDetails): void {
    const { c } = this;
    const { record, tasks } = details;
    console.log(`${c.bold('Flow:')} ${record.name}`);
    console.log(`${c.bold('Status:')} ${flowStatus(record)}`);
    console.log(`${c.bold('Created:')} ${record.createdAt.toISOString()}`);
    console.log(`${c.bold('Updated:')} ${record.updatedAt.toISOString()}`);
    console.log(c.bold(`Tasks (${tasks.length}):`));
    tasks.forEach((task, index) => {
      console.log(`  ${index + 1}. ${task.name}  ${c.dim(`${task.module}.${task.method}`)}  ${JSON.stringify(task.params)}`);
    });
  }

  showError(error: unknown): void {
    console.error(formatError(error, !this.options.noColor, this.options.verbose));
  }

  showSuccess(message: string): void {
    console.log(this.c.green(`${StatusSymbols.success} ${message}`));
  }

  showWarning(message: string): void {
    console.warn(this.c.yellow(`${StatusSymbols.warning} ${message}`));
  }

  showInfo(message: string): void {
    console.log(this.c.blue(`${StatusSymbols.info} ${message}`));
  }
}
