/**
 * Lookup and persistence errors.
 *
 * @module errors
 */

import { FlowError } from './FlowError.js';
import { FlowErrorCode } from './ErrorCodes.js';

export type FlowUnavailableReason = 'missing' | 'disabled' | 'deleted';

export class NotFoundError extends FlowError {
  public readonly flowName: string;

  constructor(flowName: string, reason: FlowUnavailableReason) {
    super({
      code: FlowErrorCode.FLOW_NOT_FOUND,
      message: `Flow "${flowName}" not found`,
      hint: reason === 'disabled'
        ? `Flow "${flowName}" exists but is disabled; enable it first.`
        : undefined,
      context: { flowName, reason },
    });
    this.name = 'NotFoundError';
    this.flowName = flowName;
  }
}

export class FlowExistsError extends FlowError {
  constructor(flowName: string) {
    super({
      code: FlowErrorCode.FLOW_EXISTS,
      message: `Flow "${flowName}" already exists`,
      hint: 'Soft-deleted flows keep their name; pick another name.',
      context: { flowName },
    });
    this.name = 'FlowExistsError';
  }
}

/**
 * The flow store failed. Fatal: without a definition there is nothing to run.
 */
export class StorageError extends FlowError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super({
      code: FlowErrorCode.STORAGE_FAILURE,
      message: `Flow store ${operation} failed: ${detail}`,
      context: { operation },
      cause,
    });
    this.name = 'StorageError';
  }
}

/**
 * A log sink failed. Never fatal: reported, then dropped.
 */
export class PersistenceError extends FlowError {
  public readonly sink: string;

  constructor(sink: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super({
      code: FlowErrorCode.PERSISTENCE_SINK_FAILURE,
      message: `Log sink "${sink}" failed: ${detail}`,
      context: { sink },
      cause,
    });
    this.name = 'PersistenceError';
    this.sink = sink;
  }
}
