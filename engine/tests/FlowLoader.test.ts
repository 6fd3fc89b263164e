import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  FlowLoader,
  LogLevel,
  NotFoundError,
  StorageError,
  type FlowStore,
} from '../src/index.js';
import { flowJson, memoryLogger, seededStore } from './helpers/fixtures.js';

async function loadError(loader: FlowLoader, name: string): Promise<unknown> {
  try {
    await loader.load(name);
  } catch (error) {
    return error;
  }
  throw new Error(`expected ${name} to fail`);
}

describe('FlowLoader', () => {
  it('loads an enabled flow as a definition', async () => {
    const loader = new FlowLoader(await seededStore([{ name: 'flow1', fixture: 'echo' }]));

    const definition = await loader.load('flow1');

    expect(definition.name).toBe('flow1');
    expect(definition.tasks.map((task) => task.name)).toEqual(['step1', 'step2']);
    expect(definition.tasks[1]).toEqual({
      name: 'step2',
      module: 'common.Kt',
      method: 'prt',
      params: { msg: '@step1.msg' },
    });
  });

  interface UnavailableCase {
    reason: string;
    flows: Array<{ name: string; fixture: string; enabled?: boolean; deleted?: boolean }>;
  }

  it.each<UnavailableCase>([
    { reason: 'missing', flows: [] },
    { reason: 'disabled', flows: [{ name: 'flow1', fixture: 'echo', enabled: false }] },
    { reason: 'deleted', flows: [{ name: 'flow1', fixture: 'echo', deleted: true }] },
  ])('refuses a $reason flow with NotFoundError', async ({ reason, flows }) => {
    const { logger, sink } = memoryLogger();
    const loader = new FlowLoader(await seededStore(flows), logger);

    const error = await loadError(loader, 'flow1');

    expect(error).toBeInstanceOf(NotFoundError);
    if (error instanceof NotFoundError) {
      expect(error.message).toBe('Flow "flow1" not found');
      expect(error.context).toEqual({ flowName: 'flow1', reason });
    }
    expect(sink.entries.filter((entry) => entry.level === LogLevel.WARN)).toHaveLength(1);
    expect(sink.entries[0]?.source).toBe('FlowLoader');
  });

  it('surfaces document problems as ConfigurationError', async () => {
    const loader = new FlowLoader(await seededStore([{ name: 'bad', flowJson: '{"tasks":[{"name":"a"}]}' }]));
    await expect(loader.load('bad')).rejects.toThrow(ConfigurationError);
  });

  it('logs a document that does not parse before rejecting it', async () => {
    const { logger, sink } = memoryLogger();
    const loader = new FlowLoader(await seededStore([{ name: 'bad', flowJson: '{not json' }]), logger);

    await expect(loader.load('bad')).rejects.toThrow(ConfigurationError);

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]?.level).toBe(LogLevel.ERROR);
    expect(sink.entries[0]?.message).toBe('Flow rejected');
    expect(sink.entries[0]?.context).toEqual({ flowName: 'bad' });
  });

  it('wraps store failures in StorageError', async () => {
    const failing: FlowStore = {
      list: () => Promise.reject(new Error('down')),
      get: () => Promise.reject(new Error('down')),
      insert: () => Promise.reject(new Error('down')),
      update: () => Promise.reject(new Error('down')),
    };
    const { logger, sink } = memoryLogger();
    await expect(new FlowLoader(failing, logger).load('flow1')).rejects.toThrow(StorageError);
    expect(sink.messages(LogLevel.ERROR)).toEqual(['Flow store failed']);
  });

  it('reads documents from disk', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'taskline-flow-'));
    try {
      const file = join(dir, 'flow.json');
      writeFileSync(file, flowJson('echo'), 'utf-8');

      const tasks = await FlowLoader.fromFile(file);
      expect(tasks.map((task) => `${task.module}.${task.method}`)).toEqual(['common.Kt.prt', 'common.Kt.prt']);

      await expect(FlowLoader.fromFile(join(dir, 'missing.json'))).rejects.toThrow(ConfigurationError);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
