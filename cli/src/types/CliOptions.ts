/**
 * Command-line options, as commander hands them to the actions.
 */

import type { FormatterType } from '../formatters/createFormatter.js';

/**
 * Options on the root program, available to every command
 */
export type CliGlobalOptions = {
  /** Config file; falls back to TASKLINE_CONFIG, then etc/taskline.yaml */
  config?: string;
};

export interface CliOutputOptions {
  format: FormatterType;
  verbose?: boolean;
  /** commander's `--no-color` sets this to false */
  color: boolean;
}

export type CliRunOptions = CliOutputOptions;

export interface CliListOptions extends CliOutputOptions {
  /** Include soft-deleted flows */
  all?: boolean;
}

export interface CliCreateOptions {
  /** Store the flow disabled */
  disabled?: boolean;
}
