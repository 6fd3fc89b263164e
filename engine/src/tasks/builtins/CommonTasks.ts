/**
 * Built-in `common.Kt` tasks
 *
 * Small echo tasks used by sample flows and smoke tests:
 *
 * ```json
 * { "name": "s1", "mod": "common.Kt", "method": "prt1", "params": { "msg": "hello" } }
 * ```
 *
 * @module tasks
 */

import type { FlowLogger } from '../../types/log-types.js';
import type { JsonValue, TaskParams, TaskResult } from '../../types/core-types.js';
import { ExecutionError } from '../../errors/index.js';
import type { TaskModule } from '../Task.js';
import type { TaskRegistry } from '../TaskRegistry.js';

export const COMMON_MODULE = 'common.Kt';

function messageParam(params: TaskParams): JsonValue {
  const msg = params.msg;
  if (msg === undefined) {
    throw ExecutionError.missingParam('msg');
  }
  return msg;
}

function asText(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function createCommonTasks(logger: FlowLogger): TaskModule {
  const log = logger.child(COMMON_MODULE);

  const echo = (method: string) => (_context: unknown, params: TaskParams): TaskResult => {
    const msg = asText(messageParam(params));
    log.info(`${method}: ${msg}`);
    return { status: 0, msg: `ret from ${msg}` };
  };

  return {
    prt: (_context, params): TaskResult => {
      const msg = messageParam(params);
      log.info(`prt: ${asText(msg)}`);
      return { msg };
    },
    prt1: echo('prt1'),
    prt2: echo('prt2'),
  };
}

export function registerCommonTasks(registry: TaskRegistry, logger: FlowLogger): TaskRegistry {
  return registry.registerModule(COMMON_MODULE, createCommonTasks(logger));
}
