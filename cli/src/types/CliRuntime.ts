/**
 * What commands need from the engine, behind a factory so that tests can
 * run commands against an in-memory store.
 */

import type { EngineLogger, FlowEngine, FlowManager, TaskRegistry } from '@taskline/engine';

export interface CliRuntime {
  engine: FlowEngine;
  manager: FlowManager;
  registry: TaskRegistry;
  logger: EngineLogger;
  /** Flush logs and release the database pool */
  close(): Promise<void>;
}

export interface RuntimeOptions {
  configFile?: string;
  verbose?: boolean;
}

export interface CliDependencies {
  openRuntime(options: RuntimeOptions): Promise<CliRuntime>;
  /** Registry for database-less commands such as `validate` */
  createRegistry(): TaskRegistry;
}
