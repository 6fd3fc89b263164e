import { describe, it, expect } from 'vitest';
import { ConfigurationError, ContextStore, FlowErrorCode, TaskRegistry, type FlowDefinition } from '../src/index.js';

const echo = () => ({ ok: true });

function definition(tasks: Array<[string, string, string]>): FlowDefinition {
  return {
    name: 'flow1',
    enabled: true,
    deleted: false,
    tasks: tasks.map(([name, module, method]) => ({ name, module, method, params: {} })),
  };
}

describe('TaskRegistry', () => {
  it('resolves registered functions and objects alike', async () => {
    const registry = new TaskRegistry()
      .register('m', 'fn', echo)
      .register('m', 'obj', { execute: () => ({ kind: 'object' }) });

    const view = new ContextStore().view();
    expect(await registry.resolve('m', 'fn').execute(view, {})).toEqual({ ok: true });
    expect(await registry.resolve('m', 'obj').execute(view, {})).toEqual({ kind: 'object' });
  });

  it('rejects a duplicate registration', () => {
    const registry = new TaskRegistry().register('m', 'a', echo);
    try {
      registry.register('m', 'a', echo);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe(FlowErrorCode.CONFIG_DUPLICATE_REGISTRATION);
        expect(error.message).toBe('Task "m.a" is already registered');
      }
    }
  });

  it('keeps pairs apart when their dotted labels coincide', async () => {
    const registry = new TaskRegistry()
      .register('common', 'Kt.prt', () => ({ who: 'common/Kt.prt' }))
      .register('common.Kt', 'prt', () => ({ who: 'common.Kt/prt' }));

    const view = new ContextStore().view();
    expect(registry.size).toBe(2);
    expect(await registry.resolve('common', 'Kt.prt').execute(view, {})).toEqual({ who: 'common/Kt.prt' });
    expect(await registry.resolve('common.Kt', 'prt').execute(view, {})).toEqual({ who: 'common.Kt/prt' });
    expect(registry.has('common.Kt', 'Kt.prt')).toBe(false);
  });

  it('registers every method of a module', () => {
    const registry = new TaskRegistry().registerModule('common', { a: echo, b: echo });
    expect(registry.has('common', 'a')).toBe(true);
    expect(registry.has('common', 'b')).toBe(true);
    expect(registry.size).toBe(2);
  });

  it('lists pairs sorted by module, then method', () => {
    const registry = new TaskRegistry()
      .register('zeta', 'a', echo)
      .register('alpha', 'z', echo)
      .register('alpha', 'b', echo);

    expect(registry.list()).toEqual([
      { module: 'alpha', method: 'b' },
      { module: 'alpha', method: 'z' },
      { module: 'zeta', method: 'a' },
    ]);
    expect(registry.names()).toEqual(['alpha.b', 'alpha.z', 'zeta.a']);
  });

  it('fails to resolve an unknown pair', () => {
    const registry = new TaskRegistry().register('m', 'a', echo);
    expect(() => registry.resolve('m', 'b')).toThrow('No task registered for module "m" method "b"');
  });

  it('validates every task of a definition up front, with its path', () => {
    const registry = new TaskRegistry().register('m', 'a', echo);
    try {
      registry.validate(definition([['s1', 'm', 'a'], ['s2', 'm', 'missing']]));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe(FlowErrorCode.CONFIG_UNKNOWN_TASK);
        expect(error.path).toBe('tasks[1]');
        expect(error.context).toEqual({ module: 'm', method: 'missing', taskName: 's2' });
      }
    }
  });

  it('forgets unregistered pairs', () => {
    const registry = new TaskRegistry().register('m', 'a', echo);
    expect(registry.unregister('m', 'a')).toBe(true);
    expect(registry.unregister('m', 'a')).toBe(false);
    expect(registry.has('m', 'a')).toBe(false);
  });
});
