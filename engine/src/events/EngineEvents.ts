/**
 * Engine Events
 *
 * Lifecycle events published by the FlowEngine. Formatters, loggers and
 * tests subscribe through the EventBus.
 *
 * @module events
 */

import type { RunState, TaskResult } from '../types/core-types.js';
import type { SerializedError } from '../types/log-types.js';

export enum EngineEventType {
  RUN_STARTED = 'run.started',
  RUN_COMPLETED = 'run.completed',
  RUN_FAILED = 'run.failed',

  TASK_STARTED = 'task.started',
  TASK_COMPLETED = 'task.completed',
  TASK_FAILED = 'task.failed',

  STATE_CHANGED = 'state.changed',
}

export interface RunStartedPayload {
  taskCount: number;
}

export interface RunCompletedPayload {
  durationMs: number;
  taskCount: number;
}

export interface RunFailedPayload {
  durationMs: number;
  failedTask?: string;
  error: SerializedError;
}

export interface TaskPayload {
  taskName: string;
  module: string;
  method: string;
  /** Position in the flow, 0-based */
  index: number;
}

export interface TaskCompletedPayload extends TaskPayload {
  durationMs: number;
  result: TaskResult;
}

export interface TaskFailedPayload extends TaskPayload {
  durationMs: number;
  error: SerializedError;
}

export interface StateChangedPayload {
  from: RunState;
  to: RunState;
}

export interface EngineEventPayloads {
  [EngineEventType.RUN_STARTED]: RunStartedPayload;
  [EngineEventType.RUN_COMPLETED]: RunCompletedPayload;
  [EngineEventType.RUN_FAILED]: RunFailedPayload;
  [EngineEventType.TASK_STARTED]: TaskPayload;
  [EngineEventType.TASK_COMPLETED]: TaskCompletedPayload;
  [EngineEventType.TASK_FAILED]: TaskFailedPayload;
  [EngineEventType.STATE_CHANGED]: StateChangedPayload;
}

export interface EngineEvent<K extends EngineEventType = EngineEventType> {
  type: K;
  /** ms since epoch */
  timestamp: number;
  runId: string;
  flowName: string;
  payload: EngineEventPayloads[K];
}

export function createEvent<K extends EngineEventType>(
  type: K,
  runId: string,
  flowName: string,
  payload: EngineEventPayloads[K]
): EngineEvent<K> {
  return { type, timestamp: Date.now(), runId, flowName, payload };
}
