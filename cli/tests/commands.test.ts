import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ConfigurationError, ExitCode } from '@taskline/engine';
import { createProgram } from '../src/program.js';
import { captureConsole, fixture, testDependencies, type CapturedOutput } from './helpers.js';

let output: CapturedOutput;

beforeEach(() => {
  output = captureConsole();
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

async function cli(deps: ReturnType<typeof testDependencies>['deps'], ...args: string[]): Promise<void> {
  await createProgram(deps).parseAsync(args, { from: 'user' });
}

describe('taskline run', () => {
  it('streams task progress and exits 0', async () => {
    const { deps, opened } = testDependencies();
    await cli(deps, 'create', 'flow1', fixture('flow1.json'));
    output.out.length = 0;

    await cli(deps, '-c', 'custom.yaml', 'run', 'flow1', '--no-color');

    expect(output.out[0]).toBe('▶ flow1 (2 tasks)');
    expect(output.out[1]).toBe('● step1 common.Kt.prt');
    expect(output.out[2]).toMatch(/^ {2}✔ step1 completed in \d+ms$/);
    expect(output.out[3]).toBe('● step2 common.Kt.prt');
    expect(output.out[4]).toMatch(/^ {2}✔ step2 completed in \d+ms$/);
    expect(output.out[5]).toBe('');
    expect(output.out[6]).toMatch(/^✔ Flow "flow1" completed: 2 tasks in \d+ms$/);
    expect(output.err).toEqual([]);
    expect(process.exitCode).toBe(ExitCode.SUCCESS);
    expect(opened[1]).toEqual({ configFile: 'custom.yaml', verbose: undefined });
  });

  it('exits 4 when a task fails', async () => {
    const { deps } = testDependencies();
    await cli(deps, 'create', 'flow1', fixture('broken-reference.json'));

    await cli(deps, 'run', 'flow1', '--no-color');

    expect(output.out).toContainEqual(expect.stringMatching(/^ {2}✖ step2 failed in \d+ms: Context step not found: stepX$/));
    expect(output.out).toContainEqual(
      expect.stringMatching(/^✖ Flow "flow1" failed at task "step2": 1\/2 tasks completed in \d+ms$/)
    );
    expect(output.err[0]).toContain('✖ ReferenceError [FLW-R-001]');
    expect(process.exitCode).toBe(ExitCode.TASK_FAILED);
  });

  it('exits 3 for an unknown flow', async () => {
    const { deps } = testDependencies();

    await cli(deps, 'run', 'nope', '--no-color');

    expect(output.err).toEqual(['✖ NotFoundError [FLW-N-001]\nFlow "nope" not found']);
    expect(process.exitCode).toBe(ExitCode.NOT_FOUND);
  });

  it('exits 2 when the runtime cannot be configured', async () => {
    const { deps } = testDependencies();
    deps.openRuntime = () => Promise.reject(ConfigurationError.invalidSettings('Config file not found: x.yaml'));

    await cli(deps, 'run', 'flow1', '--no-color');

    expect(output.err[0]).toContain('Config file not found: x.yaml');
    expect(process.exitCode).toBe(ExitCode.CONFIGURATION);
  });

  it('writes one JSON object per line with --format json', async () => {
    const { deps } = testDependencies();
    await cli(deps, 'create', 'flow1', fixture('flow1.json'));
    output.out.length = 0;

    await cli(deps, 'run', 'flow1', '--format', 'json');

    const records = output.out.map((line) => JSON.parse(line));
    expect(records.map((record) => record.type)).toEqual([
      'run.started',
      'task.started',
      'task.completed',
      'task.started',
      'task.completed',
      'run.completed',
      'run.result',
    ]);
    expect(records[6]).toMatchObject({
      flowName: 'flow1',
      state: 'completed',
      completedTasks: ['step1', 'step2'],
      context: { step1: { msg: 'hello' }, step2: { msg: 'hello' } },
    });
  });
});

describe('catalog commands', () => {
  it('creates and lists flows', async () => {
    const { deps } = testDependencies();

    await cli(deps, 'create', 'flow1', fixture('flow1.json'), '--no-color');
    await cli(deps, 'create', 'flow2', fixture('flow1.json'), '--disabled', '--no-color');
    await cli(deps, 'list', '--no-color');

    expect(output.out).toEqual([
      '✔ Flow "flow1" created with 2 task(s)',
      '✔ Flow "flow2" created with 2 task(s) (disabled)',
      'NAME   STATUS    TASKS  UPDATED',
      'flow1  enabled   2      2024-01-01T00:00:00.000Z',
      'flow2  disabled  2      2024-01-01T00:00:00.000Z',
    ]);
  });

  it('shows a flow', async () => {
    const { deps } = testDependencies();
    await cli(deps, 'create', 'flow1', fixture('flow1.json'));
    output.out.length = 0;

    await cli(deps, 'show', 'flow1', '--no-color');

    expect(output.out).toEqual([
      'Flow: flow1',
      'Status: enabled',
      'Created: 2024-01-01T00:00:00.000Z',
      'Updated: 2024-01-01T00:00:00.000Z',
      'Tasks (2):',
      '  1. step1  common.Kt.prt  {"msg":"hello"}',
      '  2. step2  common.Kt.prt  {"msg":"@step1.msg"}',
    ]);
  });

  it('renames, disables, enables and deletes', async () => {
    const { deps, store } = testDependencies();
    await cli(deps, 'create', 'flow1', fixture('flow1.json'));
    output.out.length = 0;

    await cli(deps, 'rename', 'flow1', 'flow2', '--no-color');
    await cli(deps, 'disable', 'flow2', '--no-color');
    expect((await store.get('flow2'))?.enabled).toBe(false);
    await cli(deps, 'enable', 'flow2', '--no-color');
    await cli(deps, 'delete', 'flow2', '--no-color');

    expect(output.out).toEqual([
      '✔ Flow "flow1" renamed to "flow2"',
      '✔ Flow "flow2" disabled',
      '✔ Flow "flow2" enabled',
      '✔ Flow "flow2" deleted',
    ]);
    expect((await store.get('flow2'))?.deleted).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it('updates a flow from a file', async () => {
    const { deps, store } = testDependencies();
    await cli(deps, 'create', 'flow1', fixture('flow1.json'));
    await cli(deps, 'update', 'flow1', fixture('broken-reference.json'), '--no-color');

    expect(output.out[1]).toBe('✔ Flow "flow1" updated with 2 task(s)');
    expect((await store.get('flow1'))?.flowJson).toContain('@stepX.msg');
  });

  it('reports conflicts and missing flows with their exit codes', async () => {
    const { deps } = testDependencies();
    await cli(deps, 'create', 'flow1', fixture('flow1.json'));

    await cli(deps, 'create', 'flow1', fixture('flow1.json'), '--no-color');
    expect(output.err[0]).toContain('Flow "flow1" already exists');
    expect(process.exitCode).toBe(ExitCode.NOT_FOUND);

    process.exitCode = undefined;
    await cli(deps, 'delete', 'ghost', '--no-color');
    expect(output.err[1]).toContain('Flow "ghost" not found');
    expect(process.exitCode).toBe(ExitCode.NOT_FOUND);
  });

  it('refuses invalid documents before writing', async () => {
    const { deps, store } = testDependencies();

    await cli(deps, 'create', 'flow1', fixture('missing-mod.json'), '--no-color');

    expect(output.err[0]).toContain('Missing required field "mod" at tasks[0]');
    expect(process.exitCode).toBe(ExitCode.CONFIGURATION);
    expect(await store.list()).toEqual([]);
  });

  it('lists deleted flows as JSON with --all', async () => {
    const { deps } = testDependencies();
    await cli(deps, 'create', 'flow1', fixture('flow1.json'));
    await cli(deps, 'delete', 'flow1');
    output.out.length = 0;

    await cli(deps, 'list', '--all', '--format', 'json');

    expect(output.out.map((line) => JSON.parse(line))).toEqual([
      {
        type: 'flow.list',
        flows: [
          {
            name: 'flow1',
            enabled: true,
            deleted: true,
            taskCount: 2,
            createdAt: '2024-01-01T00:00:00.000Z',
            updatedAt: '2024-01-01T00:00:00.000Z',
          },
        ],
      },
    ]);
  });
});

describe('taskline validate', () => {
  it('accepts a valid document and warns about references that cannot resolve', async () => {
    const { deps, opened } = testDependencies();
    const file = fixture('forward-reference.json');

    await cli(deps, 'validate', file, '--no-color');

    expect(output.warn).toEqual([`⚠ ${file}: task "a" references "b", which runs later`]);
    expect(output.out).toEqual([`✔ ${file}: 2 task(s) valid`]);
    expect(process.exitCode).toBeUndefined();
    expect(opened).toEqual([]);
  });

  it('rejects unregistered tasks and summarises several files', async () => {
    const { deps } = testDependencies();

    await cli(deps, 'validate', fixture('flow1.json'), fixture('unknown-task.json'), '--no-color');

    expect(output.err[0]).toContain('No task registered for module "common.Kt" method "shout"');
    expect(output.warn).toEqual(['⚠ 1 of 2 documents are invalid']);
    expect(process.exitCode).toBe(ExitCode.CONFIGURATION);
  });
});
