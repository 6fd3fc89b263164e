import { fileURLToPath } from 'node:url';
import { vi } from 'vitest';
import { EngineLogger, InMemoryFlowStore, MemorySink } from '@taskline/engine';
import { buildRuntime, createRegistry } from '../src/runtime/createRuntime.js';
import type { CliDependencies, RuntimeOptions } from '../src/types/CliRuntime.js';

export const NOW = new Date('2024-01-01T00:00:00.000Z');

export function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export interface CapturedOutput {
  out: string[];
  err: string[];
  warn: string[];
}

/**
 * Replace console output with arrays, one entry per call
 */
export function captureConsole(): CapturedOutput {
  const captured: CapturedOutput = { out: [], err: [], warn: [] };
  const join = (args: unknown[]) => args.map(String).join(' ');
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    captured.out.push(join(args));
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    captured.err.push(join(args));
  });
  vi.spyOn(console, 'warn').mockImplementation((...args: unknown[]) => {
    captured.warn.push(join(args));
  });
  return captured;
}

/**
 * Dependencies backed by one in-memory store shared across commands
 */
export function testDependencies() {
  const store = new InMemoryFlowStore(() => NOW);
  const sink = new MemorySink();
  const opened: RuntimeOptions[] = [];
  const deps: CliDependencies = {
    openRuntime: async (options) => {
      opened.push(options);
      return buildRuntime({ store, logger: new EngineLogger({ sinks: [sink] }) });
    },
    createRegistry: () => createRegistry(),
  };
  return { deps, store, sink, opened };
}
