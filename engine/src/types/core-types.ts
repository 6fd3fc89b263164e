/**
 * Core Types
 *
 * Shared data model for flows, tasks, context and run outcomes.
 *
 * @module types
 */

// ============================================================================
// JSON VALUES
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

/**
 * Any value that survives a JSON round trip.
 * Params and task results are built from this union.
 */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** Parameter name -> raw (or resolved) value */
export type TaskParams = Record<string, JsonValue>;

/** The mapping a task returns; stored verbatim under the task's name */
export type TaskResult = JsonObject;

export type MaybePromise<T> = T | Promise<T>;

// ============================================================================
// FLOW DEFINITIONS
// ============================================================================

/**
 * One declared step of a flow
 */
export interface TaskSpec {
  /** Unique within the flow; also the task's context slot */
  name: string;
  /** Module half of the implementation identifier ("mod" in the document) */
  module: string;
  /** Method half of the implementation identifier */
  method: string;
  /** Raw params: literals, `@` references or `@@` escaped literals */
  params: TaskParams;
}

/**
 * A parsed flow, read-only for the duration of a run
 */
export interface FlowDefinition {
  name: string;
  /** Execution order is declaration order */
  tasks: readonly TaskSpec[];
  enabled: boolean;
  deleted: boolean;
}

/**
 * A flow as the storage collaborator keeps it
 */
export interface FlowRecord {
  name: string;
  /** The stored JSON document, unparsed */
  flowJson: string;
  enabled: boolean;
  deleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewFlowRecord {
  name: string;
  flowJson: string;
  enabled: boolean;
  deleted: boolean;
}

export type FlowRecordChanges = Partial<NewFlowRecord>;

export interface FlowSummary {
  name: string;
  enabled: boolean;
  deleted: boolean;
  /** Undefined when the stored document no longer parses */
  taskCount?: number;
  createdAt: Date;
  updatedAt: Date;
}

// ============================================================================
// RUNS
// ============================================================================

export enum RunState {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * Metadata seeded into the reserved `_runtime` context slot
 */
export type RuntimeMetadata = {
  runId: string;
  flowName: string;
  /** ISO-8601 */
  startedAt: string;
};

/**
 * What a caller gets back from a run that reached the Running state
 */
export interface RunOutcome {
  runId: string;
  flowName: string;
  state: RunState.COMPLETED | RunState.FAILED;
  /** Task results in execution order */
  context: Record<string, TaskResult>;
  runtime: RuntimeMetadata;
  completedTasks: string[];
  failedTask?: string;
  /** The triggering error, exactly as raised */
  error?: Error;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}
