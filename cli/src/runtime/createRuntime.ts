/**
 * Runtime wiring for the CLI: config → database pool → logger → registry →
 * store → loader → engine and catalog.
 */

import {
  EngineLogger,
  FlowEngine,
  FlowLoader,
  FlowManager,
  LogLevel,
  MySQLClient,
  MySQLFlowStore,
  TaskRegistry,
  createLogger,
  loadConfig,
  registerCommonTasks,
  type FlowLogger,
  type FlowStore,
} from '@taskline/engine';
import type { CliDependencies, CliRuntime, RuntimeOptions } from '../types/CliRuntime.js';

export interface BuildRuntimeOptions {
  store: FlowStore;
  logger: EngineLogger;
  registry?: TaskRegistry;
  /** Released after the logger is closed */
  release?: () => Promise<void>;
}

/**
 * Registry with the built-in task modules
 */
export function createRegistry(logger: FlowLogger = new EngineLogger({ sinks: [] })): TaskRegistry {
  return registerCommonTasks(new TaskRegistry(), logger);
}

/**
 * Assemble a runtime around an existing store and logger
 */
export function buildRuntime(options: BuildRuntimeOptions): CliRuntime {
  const { store, logger } = options;
  const registry = options.registry ?? createRegistry(logger);
  const loader = new FlowLoader(store, logger);

  return {
    engine: new FlowEngine({ registry, loader, logger }),
    manager: new FlowManager(store, logger),
    registry,
    logger,
    async close() {
      try {
        await logger.close();
      } finally {
        await options.release?.();
      }
    },
  };
}

/**
 * Open a runtime backed by MySQL, as configured for the working directory
 *
 * @throws {ConfigurationError} When the configuration is invalid
 */
export async function openRuntime(options: RuntimeOptions = {}): Promise<CliRuntime> {
  const config = loadConfig({ file: options.configFile });
  const client = MySQLClient.connect(config.db);
  const logger = createLogger(config.log, { source: config.name, client });
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  logger.debug('Configuration loaded', {
    configFile: config.configFile ?? 'defaults',
    host: config.db.host,
    database: config.db.database,
  });

  return buildRuntime({
    store: new MySQLFlowStore(client, config.flow.table),
    logger,
    release: () => client.close(),
  });
}

export const defaultDependencies: CliDependencies = {
  openRuntime,
  createRegistry: () => createRegistry(),
};
