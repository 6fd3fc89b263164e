/**
 * CLI Event Types
 *
 * Events emitted during a flow run that the CLI layer observes.
 * These events drive the formatter output.
 */

import type { SerializedError, TaskResult } from '@taskline/engine';

export enum CliEventType {
  RUN_STARTED = 'run.started',
  RUN_COMPLETED = 'run.completed',
  RUN_FAILED = 'run.failed',
  TASK_STARTED = 'task.started',
  TASK_COMPLETED = 'task.completed',
  TASK_FAILED = 'task.failed',
}

export interface BaseCliEvent {
  type: CliEventType;
  timestamp: Date;
}

export interface RunStartedEvent extends BaseCliEvent {
  type: CliEventType.RUN_STARTED;
  flowName: string;
  runId: string;
  taskCount: number;
}

export interface RunCompletedEvent extends BaseCliEvent {
  type: CliEventType.RUN_COMPLETED;
  flowName: string;
  durationMs: number;
}

export interface RunFailedEvent extends BaseCliEvent {
  type: CliEventType.RUN_FAILED;
  flowName: string;
  durationMs: number;
  failedTask?: string;
}

export interface TaskStartedEvent extends BaseCliEvent {
  type: CliEventType.TASK_STARTED;
  taskName: string;
  module: string;
  method: string;
  index: number;
}

export interface TaskCompletedEvent extends BaseCliEvent {
  type: CliEventType.TASK_COMPLETED;
  taskName: string;
  durationMs: number;
  result: TaskResult;
}

export interface TaskFailedEvent extends BaseCliEvent {
  type: CliEventType.TASK_FAILED;
  taskName: string;
  durationMs: number;
  error: SerializedError;
}

export type CliEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RunFailedEvent
  | TaskStartedEvent
  | TaskCompletedEvent
  | TaskFailedEvent;
