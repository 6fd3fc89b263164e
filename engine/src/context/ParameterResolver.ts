/**
 * Parameter Resolver
 *
 * Translates raw task params into the values handed to a task, using the
 * context of completed tasks.
 *
 * Grammar (string values only; everything else passes through):
 * - `@@rest`     literal string `@rest`, no lookup
 * - `@name`      the whole result stored under `name`
 * - `@name.key`  one entry of that result; split on the first `.`
 * - otherwise    unchanged
 *
 * Resolution is shallow: nested arrays and objects are copied as-is, even
 * when they contain `@` strings.
 *
 * @module context
 */

import type { JsonValue, TaskParams } from '../types/core-types.js';
import type { ContextReader } from './ContextStore.js';

export const REFERENCE_PREFIX = '@';
export const ESCAPE_PREFIX = '@@';

/**
 * A parsed parameter value
 */
export type ParameterReference =
  | { kind: 'literal'; value: JsonValue }
  | { kind: 'escaped'; value: string }
  | { kind: 'result'; task: string }
  | { kind: 'key'; task: string; key: string };

/**
 * Classify a raw parameter value without touching any context
 */
export function parseReference(raw: JsonValue): ParameterReference {
  if (typeof raw !== 'string' || !raw.startsWith(REFERENCE_PREFIX)) {
    return { kind: 'literal', value: raw };
  }

  if (raw.startsWith(ESCAPE_PREFIX)) {
    return { kind: 'escaped', value: raw.slice(1) };
  }

  const body = raw.slice(REFERENCE_PREFIX.length);
  const dot = body.indexOf('.');
  if (dot === -1) {
    return { kind: 'result', task: body };
  }
  return { kind: 'key', task: body.slice(0, dot), key: body.slice(dot + 1) };
}

/**
 * Resolve one raw value against the context
 *
 * @throws {ReferenceResolutionError} When a reference points at a missing task or key
 */
export function resolveValue(raw: JsonValue, context: ContextReader): JsonValue {
  const ref = parseReference(raw);
  switch (ref.kind) {
    case 'literal':
      return typeof ref.value === 'object' && ref.value !== null ? structuredClone(ref.value) : ref.value;
    case 'escaped':
      return ref.value;
    case 'result':
      return context.get(ref.task);
    case 'key':
      return context.get(ref.task, ref.key);
  }
}

/**
 * Resolve every entry of a params mapping. Returns a new object; the raw
 * params and the context are left untouched.
 */
export function resolveParams(params: TaskParams, context: ContextReader): TaskParams {
  const resolved: TaskParams = {};
  for (const [name, raw] of Object.entries(params)) {
    resolved[name] = resolveValue(raw, context);
  }
  return resolved;
}

/**
 * Names of the tasks a params mapping refers to, in declaration order.
 * Used to report references before a run starts.
 */
export function referencedTasks(params: TaskParams): string[] {
  const names: string[] = [];
  for (const raw of Object.values(params)) {
    const ref = parseReference(raw);
    if ((ref.kind === 'result' || ref.kind === 'key') && !names.includes(ref.task)) {
      names.push(ref.task);
    }
  }
  return names;
}
