import { describe, it, expect } from 'vitest';
import {
  ContextStore,
  ReferenceResolutionError,
  parseReference,
  referencedTasks,
  resolveParams,
  resolveValue,
} from '../src/index.js';

function contextWith(results: Record<string, Record<string, string | number>>): ContextStore {
  const context = new ContextStore();
  for (const [name, result] of Object.entries(results)) {
    context.set(name, result);
  }
  return context;
}

describe('parseReference', () => {
  it('classifies values', () => {
    expect(parseReference('plain')).toEqual({ kind: 'literal', value: 'plain' });
    expect(parseReference(42)).toEqual({ kind: 'literal', value: 42 });
    expect(parseReference('@@x')).toEqual({ kind: 'escaped', value: '@x' });
    expect(parseReference('@step1')).toEqual({ kind: 'result', task: 'step1' });
    expect(parseReference('@step1.msg')).toEqual({ kind: 'key', task: 'step1', key: 'msg' });
  });

  it('splits on the first dot only', () => {
    expect(parseReference('@s.a.b')).toEqual({ kind: 'key', task: 's', key: 'a.b' });
  });
});

describe('resolveValue', () => {
  const context = contextWith({ step1: { msg: 'hello', status: 0 } });

  it('returns the whole stored result for @name', () => {
    expect(resolveValue('@step1', context)).toEqual({ msg: 'hello', status: 0 });
  });

  it('returns one key for @name.key', () => {
    expect(resolveValue('@step1.msg', context)).toBe('hello');
    expect(resolveValue('@step1.status', context)).toBe(0);
  });

  it('strips one @ from escaped literals without a lookup', () => {
    expect(resolveValue('@@example', context)).toBe('@example');
    expect(resolveValue('@@missing.key', context)).toBe('@missing.key');
    expect(resolveValue('@@', context)).toBe('@');
  });

  it('passes non-reference values through', () => {
    expect(resolveValue('hello@world', context)).toBe('hello@world');
    expect(resolveValue(true, context)).toBe(true);
    expect(resolveValue(null, context)).toBeNull();
  });

  it('fails on a task that has not run', () => {
    expect(() => resolveValue('@stepX.msg', context)).toThrow(ReferenceResolutionError);
    expect(() => resolveValue('@stepX.msg', context)).toThrow('Context step not found: stepX');
  });

  it('fails on a missing key', () => {
    expect(() => resolveValue('@step1.nope', context)).toThrow("Key 'nope' not found in context['step1']");
  });

  it('reports itself as a ReferenceError with the reference', () => {
    try {
      resolveValue('@step1.nope', context);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ReferenceResolutionError);
      if (error instanceof ReferenceResolutionError) {
        expect(error.name).toBe('ReferenceError');
        expect(error.reference).toBe('step1');
        expect(error.key).toBe('nope');
      }
    }
  });
});

describe('resolveParams', () => {
  it('resolves every entry into a new object', () => {
    const context = contextWith({ step1: { msg: 'hello' } });
    const params = { a: '@step1.msg', b: '@@raw', c: 3 };

    const resolved = resolveParams(params, context);

    expect(resolved).toEqual({ a: 'hello', b: '@raw', c: 3 });
    expect(params).toEqual({ a: '@step1.msg', b: '@@raw', c: 3 });
  });

  it('leaves references nested in arrays and objects untouched', () => {
    const context = contextWith({ step1: { msg: 'hello' } });
    const resolved = resolveParams({ list: ['@step1.msg'], obj: { ref: '@step1' } }, context);
    expect(resolved).toEqual({ list: ['@step1.msg'], obj: { ref: '@step1' } });
  });

  it('copies nested literals so the raw params stay untouched', () => {
    const params = { list: [1], obj: { n: 1 } };
    const resolved = resolveParams(params, new ContextStore());

    expect(resolved).toEqual(params);
    expect(resolved.list).not.toBe(params.list);
    expect(resolved.obj).not.toBe(params.obj);
  });

  it('hands out copies of stored results', () => {
    const context = new ContextStore();
    context.set('step1', { nested: { n: 1 } });

    const resolved = resolveParams({ all: '@step1' }, context);
    expect(resolved.all).toEqual({ nested: { n: 1 } });
    expect(context.get('step1')).toEqual({ nested: { n: 1 } });
    expect(resolved.all).not.toBe(context.get('step1'));
  });
});

describe('referencedTasks', () => {
  it('lists referenced task names once, in order', () => {
    expect(referencedTasks({ a: '@s2.x', b: '@@s9', c: '@s1', d: '@s2', e: 'plain' })).toEqual(['s2', 's1']);
  });
});
