/**
 * Run Command
 *
 * Loads a flow by name from the catalog and runs it, streaming task events
 * through the formatter.
 *
 * Usage:
 *   taskline run flow1
 *   taskline run flow1 --format json
 *   taskline run flow1 --verbose
 *
 * Exit codes:
 *   0  every task completed
 *   2  the flow document or registry is invalid
 *   3  no enabled, non-deleted flow with that name
 *   4  a task failed (reference, contract or execution)
 *   5  the flow store failed
 */

import type { Command } from 'commander';
import {
  EngineEventType,
  ExitCode,
  FlowError,
  RunState,
  type EventBus,
  type RunOutcome,
} from '@taskline/engine';
import type { Formatter } from '../formatters/Formatter.js';
import { CliEventType } from '../types/CliEvent.js';
import type { CliRunOptions } from '../types/CliOptions.js';
import type { CliDependencies } from '../types/CliRuntime.js';
import { formatterFor, withOutputOptions, withRuntime } from './support.js';

export function registerRunCommand(program: Command, deps: CliDependencies): void {
  withOutputOptions(
    program.command('run').description('Run a flow by name').argument('<flow>', 'Flow name')
  ).action((flowName: string, options: CliRunOptions, command: Command) => runFlow(flowName, options, command, deps));
}

export async function runFlow(
  flowName: string,
  options: CliRunOptions,
  command: Command,
  deps: CliDependencies
): Promise<void> {
  const formatter = formatterFor(options);

  await withRuntime(deps, command, formatter, async (runtime) => {
    const unsubscribe = wireEngineEvents(runtime.engine.events, formatter);
    try {
      const outcome = await runtime.engine.run(flowName);
      formatter.showResult(outcome);
      process.exitCode = outcomeExitCode(outcome);
    } finally {
      unsubscribe();
    }
  });
}

export function outcomeExitCode(outcome: RunOutcome): ExitCode {
  if (outcome.state === RunState.COMPLETED) {
    return ExitCode.SUCCESS;
  }
  return outcome.error instanceof FlowError ? outcome.error.exitCode : ExitCode.TASK_FAILED;
}

/**
 * Translate engine events to CLI events and forward them to the formatter.
 *
 * @returns Function that detaches every handler
 */
export function wireEngineEvents(events: EventBus, formatter: Formatter): () => void {
  const subscriptions = [
    events.on(EngineEventType.RUN_STARTED, (event) => {
      formatter.onEvent({
        type: CliEventType.RUN_STARTED,
        timestamp: new Date(event.timestamp),
        flowName: event.flowName,
        runId: event.runId,
        taskCount: event.payload.taskCount,
      });
    }),

    events.on(EngineEventType.RUN_COMPLETED, (event) => {
      formatter.onEvent({
        type: CliEventType.RUN_COMPLETED,
        timestamp: new Date(event.timestamp),
        flowName: event.flowName,
        durationMs: event.payload.durationMs,
      });
    }),

    events.on(EngineEventType.RUN_FAILED, (event) => {
      formatter.onEvent({
        type: CliEventType.RUN_FAILED,
        timestamp: new Date(event.timestamp),
        flowName: event.flowName,
        durationMs: event.payload.durationMs,
        failedTask: event.payload.failedTask,
      });
    }),

    events.on(EngineEventType.TASK_STARTED, (event) => {
      formatter.onEvent({
        type: CliEventType.TASK_STARTED,
        timestamp: new Date(event.timestamp),
        taskName: event.payload.taskName,
        module: event.payload.module,
        method: event.payload.method,
        index: event.payload.index,
      });
    }),

    events.on(EngineEventType.TASK_COMPLETED, (event) => {
      formatter.onEvent({
        type: CliEventType.TASK_COMPLETED,
        timestamp: new Date(event.timestamp),
        taskName: event.payload.taskName,
        durationMs: event.payload.durationMs,
        result: event.payload.result,
      });
    }),

    events.on(EngineEventType.TASK_FAILED, (event) => {
      formatter.onEvent({
        type: CliEventType.TASK_FAILED,
        timestamp: new Date(event.timestamp),
        taskName: event.payload.taskName,
        durationMs: event.payload.durationMs,
        error: event.payload.error,
      });
    }),
  ];

  return () => {
    for (const unsubscribe of subscriptions) {
      unsubscribe();
    }
  };
}
