/**
 * Flow Engine - Main Public API
 *
 * Runs a flow: a strictly ordered interpreter over its task list.
 *
 * Lifecycle:
 * - load (run only) and registry validation happen before the run exists;
 *   their errors reject and no context is created
 * - PENDING → RUNNING: context created, `_runtime` seeded
 * - each task: resolve params, dispatch, validate, store
 * - first failure → FAILED, later tasks never run
 * - every task stored → COMPLETED
 *
 * Task failures do not reject: they come back on the RunOutcome as the
 * original error object, next to the failing task's name and the partial
 * context.
 *
 * @example
 * ```ts
 * const engine = new FlowEngine({ registry, loader, logger });
 * const outcome = await engine.run('flow1');
 * if (outcome.state === RunState.FAILED) throw outcome.error;
 * ```
 *
 * @module core
 */

import { randomUUID } from 'node:crypto';
import { RunState, type FlowDefinition, type RunOutcome, type RuntimeMetadata } from '../types/core-types.js';
import type { FlowLogger } from '../types/log-types.js';
import { ContextStore } from '../context/ContextStore.js';
import type { TaskRegistry } from '../tasks/TaskRegistry.js';
import type { FlowLoader } from '../loader/FlowLoader.js';
import { TaskExecutor } from '../execution/TaskExecutor.js';
import { createRunStateMachine, type StateMachine } from '../state/StateMachine.js';
import { EventBus } from '../events/EventBus.js';
import { EngineEventType, createEvent, type EngineEventPayloads } from '../events/EngineEvents.js';
import { ConfigurationError, ExecutionError, serializeError } from '../errors/index.js';

export interface FlowEngineOptions {
  registry: TaskRegistry;
  /** Required for `run(flowName)`; `execute(definition)` works without it */
  loader?: FlowLoader;
  logger?: FlowLogger;
  events?: EventBus;
  generateRunId?: () => string;
  clock?: () => Date;
}

/**
 * Per-run bookkeeping
 */
interface RunScope {
  definition: FlowDefinition;
  runtime: RuntimeMetadata;
  context: ContextStore;
  machine: StateMachine<RunState>;
  startedAt: Date;
  completedTasks: string[];
}

export class FlowEngine {
  readonly events: EventBus;
  private readonly registry: TaskRegistry;
  private readonly loader?: FlowLoader;
  private readonly logger?: FlowLogger;
  private readonly executor: TaskExecutor;
  private readonly generateRunId: () => string;
  private readonly clock: () => Date;

  constructor(options: FlowEngineOptions) {
    this.registry = options.registry;
    this.loader = options.loader;
    this.logger = options.logger?.child('FlowEngine');
    this.events = options.events ?? new EventBus(this.logger);
    this.executor = new TaskExecutor(options.registry);
    this.generateRunId = options.generateRunId ?? randomUUID;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Load a flow by name and run it
   *
   * @throws {NotFoundError | ConfigurationError | StorageError} Before the run starts
   */
  async run(flowName: string): Promise<RunOutcome> {
    if (!this.loader) {
      throw ConfigurationError.invalidSettings('FlowEngine has no flow loader; use execute() or pass a loader');
    }
    const definition = await this.loader.load(flowName);
    return this.execute(definition);
  }

  /**
   * Run an already-parsed definition
   *
   * @throws {ConfigurationError} When a task's implementation is not registered
   */
  async execute(definition: FlowDefinition): Promise<RunOutcome> {
    try {
      this.registry.validate(definition);
    } catch (error) {
      this.logger?.error('Flow rejected', error, { flowName: definition.name });
      throw error;
    }

    const startedAt = this.clock();
    const runtime: RuntimeMetadata = {
      runId: this.generateRunId(),
      flowName: definition.name,
      startedAt: startedAt.toISOString(),
    };
    const scope: RunScope = {
      definition,
      runtime,
      context: new ContextStore(),
      machine: createRunStateMachine(),
      startedAt,
      completedTasks: [],
    };

    await this.transition(scope, RunState.RUNNING);
    scope.context.initRuntime(runtime);
    this.logger?.info('Flow started', {
      flowName: definition.name,
      runId: runtime.runId,
      taskCount: definition.tasks.length,
    });
    await this.emit(scope, EngineEventType.RUN_STARTED, { taskCount: definition.tasks.length });

    for (const [index, spec] of definition.tasks.entries()) {
      const task = { taskName: spec.name, module: spec.module, method: spec.method, index };
      const taskStart = this.clock().getTime();

      this.logger?.debug('Task started', { flowName: definition.name, ...task, params: spec.params });
      await this.emit(scope, EngineEventType.TASK_STARTED, task);

      try {
        const result = await this.executor.execute(spec, scope.context);
        scope.context.set(spec.name, result);
      } catch (thrown) {
        const error = thrown instanceof Error ? thrown : ExecutionError.fromThrown(spec.name, thrown);
        const durationMs = this.clock().getTime() - taskStart;

        this.logger?.error('Task failed', error, {
          flowName: definition.name,
          runId: runtime.runId,
          taskName: spec.name,
          module: spec.module,
          method: spec.method,
          error: error.message,
        });
        await this.emit(scope, EngineEventType.TASK_FAILED, { ...task, durationMs, error: serializeError(error) });
        return this.fail(scope, error, spec.name);
      }

      scope.completedTasks.push(spec.name);
      const result = scope.context.get(spec.name);
      this.logger?.debug('Task completed', { flowName: definition.name, taskName: spec.name, result });
      await this.emit(scope, EngineEventType.TASK_COMPLETED, {
        ...task,
        durationMs: this.clock().getTime() - taskStart,
        result,
      });
    }

    await this.transition(scope, RunState.COMPLETED);
    const outcome = this.buildOutcome(scope, RunState.COMPLETED);
    this.logger?.info('Flow completed', {
      flowName: definition.name,
      runId: runtime.runId,
      durationMs: outcome.durationMs,
    });
    await this.emit(scope, EngineEventType.RUN_COMPLETED, {
      durationMs: outcome.durationMs,
      taskCount: scope.completedTasks.length,
    });
    return outcome;
  }

  private async fail(scope: RunScope, error: Error, failedTask: string): Promise<RunOutcome> {
    await this.transition(scope, RunState.FAILED);
    const outcome = this.buildOutcome(scope, RunState.FAILED, error, failedTask);
    this.logger?.warn('Flow failed', {
      flowName: scope.definition.name,
      runId: scope.runtime.runId,
      failedTask,
      durationMs: outcome.durationMs,
    });
    await this.emit(scope, EngineEventType.RUN_FAILED, {
      durationMs: outcome.durationMs,
      failedTask,
      error: serializeError(error),
    });
    return outcome;
  }

  private async transition(scope: RunScope, to: RunState): Promise<void> {
    const { from } = scope.machine.transition(to);
    await this.emit(scope, EngineEventType.STATE_CHANGED, { from, to });
  }

  private async emit<K extends EngineEventType>(
    scope: RunScope,
    type: K,
    payload: EngineEventPayloads[K]
  ): Promise<void> {
    await this.events.emit(createEvent(type, scope.runtime.runId, scope.definition.name, payload));
  }

  private buildOutcome(
    scope: RunScope,
    state: RunState.COMPLETED | RunState.FAILED,
    error?: Error,
    failedTask?: string
  ): RunOutcome {
    const completedAt = this.clock();
    const outcome: RunOutcome = {
      runId: scope.runtime.runId,
      flowName: scope.definition.name,
      state,
      context: scope.context.toObject(),
      runtime: { ...scope.runtime },
      completedTasks: [...scope.completedTasks],
      startedAt: scope.startedAt,
      completedAt,
      durationMs: completedAt.getTime() - scope.startedAt.getTime(),
    };
    if (failedTask !== undefined) outcome.failedTask = failedTask;
    if (error !== undefined) outcome.error = error;
    return outcome;
  }
}
