import { readFileSync } from 'node:fs';
import {
  EngineLogger,
  InMemoryFlowStore,
  LogLevel,
  MemorySink,
} from '../../src/index.js';

/**
 * Flow documents keyed by name, from fixtures/flows.json
 */
export const flowDocuments: Record<string, unknown> = JSON.parse(
  readFileSync(new URL('../fixtures/flows.json', import.meta.url), 'utf-8')
);

export function flowJson(name: string): string {
  const document = flowDocuments[name];
  if (document === undefined) {
    throw new Error(`No fixture flow named ${name}`);
  }
  return JSON.stringify(document);
}

export function memoryLogger(level: LogLevel = LogLevel.DEBUG): { logger: EngineLogger; sink: MemorySink } {
  const sink = new MemorySink();
  return { logger: new EngineLogger({ level, sinks: [sink] }), sink };
}

export async function seededStore(
  flows: Array<{ name: string; fixture?: string; flowJson?: string; enabled?: boolean; deleted?: boolean }>
): Promise<InMemoryFlowStore> {
  const store = new InMemoryFlowStore(() => new Date('2024-01-01T00:00:00.000Z'));
  for (const flow of flows) {
    await store.insert({
      name: flow.name,
      flowJson: flow.flowJson ?? flowJson(flow.fixture ?? flow.name),
      enabled: flow.enabled ?? true,
      deleted: flow.deleted ?? false,
    });
  }
  return store;
}
