/**
 * Small text helpers shared by the formatters.
 *
 * @module utils
 */

import type { FlowSummary } from '@taskline/engine';

export const StatusSymbols = {
  started: '▶',
  running: '●',
  success: '✔',
  failure: '✖',
  warning: '⚠',
  info: 'ℹ',
} as const;

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function flowStatus(flow: Pick<FlowSummary, 'enabled' | 'deleted'>): 'deleted' | 'enabled' | 'disabled' {
  if (flow.deleted) return 'deleted';
  return flow.enabled ? 'enabled' : 'disabled';
}

/**
 * Left-aligned columns separated by two spaces; the last column is not padded
 */
export function formatTable(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row.map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index] ?? 0))).join('  ')
  );
}
