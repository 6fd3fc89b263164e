/**
 * Run-time errors raised while a flow is executing.
 *
 * @module errors
 */

import { FlowError, type FlowErrorDiagnostic } from './FlowError.js';
import { FlowErrorCode } from './ErrorCodes.js';

/**
 * A `@` reference that cannot be resolved against the context.
 * Reports itself as "ReferenceError".
 */
export class ReferenceResolutionError extends FlowError {
  /** The task name the reference pointed at */
  public readonly reference: string;
  /** The key, for `@name.key` references */
  public readonly key?: string;

  constructor(diagnostic: FlowErrorDiagnostic & { reference: string; key?: string }) {
    super(diagnostic);
    this.name = 'ReferenceError';
    this.reference = diagnostic.reference;
    this.key = diagnostic.key;
  }

  static unknownTask(reference: string): ReferenceResolutionError {
    return new ReferenceResolutionError({
      code: FlowErrorCode.REFERENCE_UNKNOWN_TASK,
      message: `Context step not found: ${reference}`,
      hint: 'References can only point at tasks declared earlier in the flow.',
      context: { reference },
      reference,
    });
  }

  static unknownKey(reference: string, key: string, available: string[]): ReferenceResolutionError {
    return new ReferenceResolutionError({
      code: FlowErrorCode.REFERENCE_UNKNOWN_KEY,
      message: `Key '${key}' not found in context['${reference}']`,
      hint: available.length > 0 ? `Available keys: ${available.join(', ')}` : `Task "${reference}" returned an empty result.`,
      context: { reference, key },
      reference,
      key,
    });
  }
}

/**
 * A task returned something other than a mapping of JSON values
 */
export class ContractViolationError extends FlowError {
  constructor(diagnostic: FlowErrorDiagnostic) {
    super(diagnostic);
    this.name = 'ContractViolationError';
  }

  static invalidResult(taskName: string, received: string, detail?: string): ContractViolationError {
    return new ContractViolationError({
      code: FlowErrorCode.CONTRACT_INVALID_RESULT,
      message: detail
        ? `Task "${taskName}" returned an invalid result: ${detail}`
        : `Task "${taskName}" returned ${received}, expected a mapping`,
      hint: 'Return a plain object whose values are strings, numbers, booleans, null, arrays or objects.',
      context: { taskName, received },
    });
  }
}

/**
 * Failure inside a task's own logic.
 *
 * The engine passes `Error` instances through untouched; it only builds an
 * ExecutionError when a task throws something that is not an Error.
 * Task implementations may throw it themselves.
 */
export class ExecutionError extends FlowError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super({
      code: FlowErrorCode.EXECUTION_TASK_FAILED,
      message,
      context,
      cause,
    });
    this.name = 'ExecutionError';
  }

  static fromThrown(taskName: string, thrown: unknown): ExecutionError {
    return new ExecutionError(`Task "${taskName}" failed: ${String(thrown)}`, { taskName }, thrown);
  }

  static missingParam(param: string): ExecutionError {
    return new ExecutionError(`Missing required parameter "${param}"`, { param });
  }
}

/**
 * Violation of the context's write discipline
 */
export class ContextWriteError extends FlowError {
  constructor(diagnostic: FlowErrorDiagnostic) {
    super(diagnostic);
    this.name = 'ContextWriteError';
  }

  static alreadyWritten(name: string): ContextWriteError {
    return new ContextWriteError({
      code: FlowErrorCode.CONTEXT_WRITE_ONCE,
      message: `Context slot "${name}" has already been written`,
      context: { name },
    });
  }

  static reservedName(name: string): ContextWriteError {
    return new ContextWriteError({
      code: FlowErrorCode.CONTEXT_RESERVED_NAME,
      message: `Context slot "${name}" is reserved for runtime metadata`,
      context: { name },
    });
  }

  static runtimeInitialized(): ContextWriteError {
    return new ContextWriteError({
      code: FlowErrorCode.CONTEXT_RUNTIME_INITIALIZED,
      message: 'Runtime metadata has already been initialized for this run',
    });
  }
}

export class InvalidStateTransitionError extends FlowError {
  constructor(from: string, to: string) {
    super({
      code: FlowErrorCode.INVALID_STATE_TRANSITION,
      message: `Invalid state transition: ${from} → ${to}`,
      context: { from, to },
    });
    this.name = 'InvalidStateTransitionError';
  }
}
