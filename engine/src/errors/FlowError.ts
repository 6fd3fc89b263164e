/**
 * Base Taskline Error Class
 *
 * Every error the engine raises on its own account extends FlowError and
 * carries a structured diagnostic: code, exit code, location, hint and
 * context. Errors raised by task implementations are never rewrapped.
 *
 * @module errors
 */

import {
  ExitCode,
  FlowErrorCode,
  getErrorDescription,
  getExitCodeForError,
  isUserError,
} from './ErrorCodes.js';

export interface FlowErrorDiagnostic {
  /** Structured error code (e.g. FLW-C-002) */
  code: FlowErrorCode;

  /** Human-readable message */
  message: string;

  /** Process exit code; derived from the code when omitted */
  exitCode?: ExitCode;

  /** Location in the flow document, e.g. "tasks[1].mod" */
  path?: string;

  /** Suggestion for fixing the error */
  hint?: string;

  /** Extra data for logs and formatters */
  context?: Record<string, unknown>;

  /** Underlying error, if any */
  cause?: unknown;
}

export class FlowError extends Error {
  public readonly diagnostic: FlowErrorDiagnostic;

  public readonly timestamp: Date;

  constructor(diagnostic: FlowErrorDiagnostic) {
    super(diagnostic.message, diagnostic.cause === undefined ? undefined : { cause: diagnostic.cause });
    this.name = 'FlowError';
    this.diagnostic = {
      ...diagnostic,
      exitCode: diagnostic.exitCode ?? getExitCodeForError(diagnostic.code),
    };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get code(): FlowErrorCode {
    return this.diagnostic.code;
  }

  get exitCode(): ExitCode {
    return this.diagnostic.exitCode ?? getExitCodeForError(this.diagnostic.code);
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string | undefined {
    return this.diagnostic.hint;
  }

  get context(): Record<string, unknown> {
    return this.diagnostic.context ?? {};
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  get isUserError(): boolean {
    return isUserError(this.code);
  }

  /**
   * Format error as string for logging/display
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `: ${this.message}`;

    if (this.hint) {
      msg += `\nHint: ${this.hint}`;
    }

    return msg;
  }

  /**
   * Convert to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      description: this.description,
      path: this.path,
      hint: this.hint,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
      isUserError: this.isUserError,
    };
  }
}
