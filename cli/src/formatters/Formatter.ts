/**
 * Base Formatter Interface
 *
 * Formatters are the ONLY place where console output is allowed in the CLI.
 *
 * Flow:
 * 1. The engine emits events during a run
 * 2. The run command translates them to CliEvents and calls onEvent()
 * 3. The formatter decides what to print, and how
 *
 * Catalog commands (list, show, create...) call the show* methods directly.
 */

import type { FlowDetails, FlowSummary, RunOutcome } from '@taskline/engine';
import type { CliEvent } from '../types/CliEvent.js';

export interface FormatterOptions {
  /** More detail: task results, context, stack traces */
  verbose?: boolean;
  /** Disable colors (for CI/CD or terminals without color support) */
  noColor?: boolean;
}

export interface Formatter {
  /**
   * Handle a run or task lifecycle event
   */
  onEvent(event: CliEvent): void;

  /**
   * Display the final outcome of a run, completed or failed
   */
  showResult(outcome: RunOutcome): void;

  showFlows(flows: FlowSummary[]): void;

  showFlow(details: FlowDetails): void;

  /**
   * Display an error that stopped a command
   */
  showError(error: unknown): void;

  showSuccess(message: string): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
