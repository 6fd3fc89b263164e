/**
 * JSON Formatter
 *
 * One JSON object per line (NDJSON) for machine parsing, log aggregation
 * and CI/CD. Events, the final outcome and catalog output all use it.
 */

import { serializeError, type FlowDetails, type FlowSummary, type RunOutcome } from '@taskline/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';
import type { CliEvent } from '../types/CliEvent.js';

export class JsonFormatter implements Formatter {
  private readonly options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
  }

  onEvent(event: CliEvent): void {
    this.print({ ...event, timestamp: event.timestamp.toISOString() });
  }

  showResult(outcome: RunOutcome): void {
    this.print({
      type: 'run.result',
      runId: outcome.runId,
      flowName: outcome.flowName,
      state: outcome.state,
      completedTasks: outcome.completedTasks,
      failedTask: outcome.failedTask,
      durationMs: outcome.durationMs,
      startedAt: outcome.startedAt.toISOString(),
      completedAt: outcome.completedAt.toISOString(),
      context: outcome.context,
      error: outcome.error ? this.errorRecord(outcome.error) : undefined,
    });
  }

  showFlows(flows: FlowSummary[]): void {
    this.print({
      type: 'flow.list',
      flows: flows.map((flow) => ({
        ...flow,
        createdAt: flow.createdAt.toISOString(),
        updatedAt: flow.updatedAt.toISOString(),
      })),
    });
  }

  showFlow(details: FlowDetails): void {
    const { record, tasks } = details;
    this.print({
      type: 'flow.details',
      name: record.name,
      enabled: record.enabled,
      deleted: record.deleted,
      createdAt: record.createdAt.toISOString(),
      updatedAt: record.updatedAt.toISOString(),
      tasks,
    });
  }

  showError(error: unknown): void {
    console.error(JSON.stringify({ type: 'error', ...this.errorRecord(error) }));
  }

  showSuccess(message: string): void {
    this.print({ type: 'success', message });
  }

  showWarning(message: string): void {
    this.print({ type: 'warning', message });
  }

  showInfo(message: string): void {
    this.print({ type: 'info', message });
  }

  private errorRecord(error: unknown): Record<string, unknown> {
    const { stack, ...rest } = serializeError(error);
    return this.options.verbose ? { ...rest, stack } : rest;
  }

  private print(record: Record<string, unknown>): void {
    console.log(JSON.stringify(record));
  }
}
