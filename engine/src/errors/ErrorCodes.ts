/**
 * Taskline Error Codes
 *
 * Format: FLW-[Category]-[Number]
 *
 * Categories:
 * - C: Configuration (flow documents, registry, settings)
 * - N: Naming (flow lookup and conflicts)
 * - R: Reference resolution
 * - K: Task contract
 * - E: Task execution
 * - I: Internal engine invariants
 * - P: Persistence (storage and log sinks)
 *
 * ADDING NEW ERRORS:
 * 1. Add the code below
 * 2. Add its description in getErrorDescription()
 * 3. Map it in getExitCodeForError() if the category default is wrong
 * 4. Add a factory method on the matching error class
 *
 * @module errors
 */

/**
 * Process exit codes used by the CLI
 */
export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  CONFIGURATION = 2,
  NOT_FOUND = 3,
  TASK_FAILED = 4,
  STORAGE = 5,
  INTERNAL = 70,
}

export enum FlowErrorCode {
  // CONFIGURATION (C)
  /** Flow document is not valid JSON */
  CONFIG_MALFORMED_JSON = 'FLW-C-001',
  /** Required field absent or blank */
  CONFIG_MISSING_FIELD = 'FLW-C-002',
  /** Field present with the wrong type */
  CONFIG_INVALID_TYPE = 'FLW-C-003',
  /** Two tasks share a name */
  CONFIG_DUPLICATE_TASK = 'FLW-C-004',
  /** Task name uses the reserved prefix */
  CONFIG_RESERVED_NAME = 'FLW-C-005',
  /** No implementation registered for (module, method) */
  CONFIG_UNKNOWN_TASK = 'FLW-C-006',
  /** (module, method) registered twice */
  CONFIG_DUPLICATE_REGISTRATION = 'FLW-C-007',
  /** Configuration file or value rejected */
  CONFIG_INVALID_SETTINGS = 'FLW-C-008',
  /** Flow name empty or too long */
  CONFIG_INVALID_FLOW_NAME = 'FLW-C-009',

  // NAMING (N)
  /** No enabled, non-deleted flow with that name */
  FLOW_NOT_FOUND = 'FLW-N-001',
  /** Flow name already taken */
  FLOW_EXISTS = 'FLW-N-002',

  // REFERENCE (R)
  /** Referenced task has not produced a result */
  REFERENCE_UNKNOWN_TASK = 'FLW-R-001',
  /** Referenced key absent from the task's result */
  REFERENCE_UNKNOWN_KEY = 'FLW-R-002',

  // CONTRACT (K)
  /** Task returned something other than a mapping of JSON values */
  CONTRACT_INVALID_RESULT = 'FLW-K-001',

  // EXECUTION (E)
  /** Task raised during its own logic */
  EXECUTION_TASK_FAILED = 'FLW-E-001',

  // INTERNAL (I)
  /** Second write to a context slot */
  CONTEXT_WRITE_ONCE = 'FLW-I-001',
  /** Write to a reserved context slot */
  CONTEXT_RESERVED_NAME = 'FLW-I-002',
  /** Runtime metadata seeded twice */
  CONTEXT_RUNTIME_INITIALIZED = 'FLW-I-003',
  /** Run state machine refused a transition */
  INVALID_STATE_TRANSITION = 'FLW-I-004',

  // PERSISTENCE (P)
  /** Flow store driver failure */
  STORAGE_FAILURE = 'FLW-P-001',
  /** Log sink write failure */
  PERSISTENCE_SINK_FAILURE = 'FLW-P-002',
}

export function getErrorDescription(code: FlowErrorCode): string {
  const descriptions: Record<FlowErrorCode, string> = {
    [FlowErrorCode.CONFIG_MALFORMED_JSON]: 'The flow document could not be parsed as JSON.',
    [FlowErrorCode.CONFIG_MISSING_FIELD]: 'A required field is missing from the flow document.',
    [FlowErrorCode.CONFIG_INVALID_TYPE]: 'A field in the flow document has the wrong type.',
    [FlowErrorCode.CONFIG_DUPLICATE_TASK]: 'Task names must be unique within a flow because they are context keys.',
    [FlowErrorCode.CONFIG_RESERVED_NAME]: 'Names starting with "_" are reserved for runtime metadata.',
    [FlowErrorCode.CONFIG_UNKNOWN_TASK]: 'No task implementation is registered for this module and method.',
    [FlowErrorCode.CONFIG_DUPLICATE_REGISTRATION]: 'A task implementation is already registered for this module and method.',
    [FlowErrorCode.CONFIG_INVALID_SETTINGS]: 'The configuration could not be loaded.',
    [FlowErrorCode.CONFIG_INVALID_FLOW_NAME]: 'Flow names must be between 1 and 128 characters.',
    [FlowErrorCode.FLOW_NOT_FOUND]: 'No enabled, non-deleted flow exists with this name.',
    [FlowErrorCode.FLOW_EXISTS]: 'A flow with this name already exists.',
    [FlowErrorCode.REFERENCE_UNKNOWN_TASK]: 'The reference points at a task that has not run yet.',
    [FlowErrorCode.REFERENCE_UNKNOWN_KEY]: 'The referenced task result does not contain this key.',
    [FlowErrorCode.CONTRACT_INVALID_RESULT]: 'Tasks must return a mapping from string keys to JSON values.',
    [FlowErrorCode.EXECUTION_TASK_FAILED]: 'The task raised an error while executing.',
    [FlowErrorCode.CONTEXT_WRITE_ONCE]: 'Each context slot can be written exactly once per run.',
    [FlowErrorCode.CONTEXT_RESERVED_NAME]: 'Reserved context slots are written by the engine only.',
    [FlowErrorCode.CONTEXT_RUNTIME_INITIALIZED]: 'Runtime metadata is seeded once, at run start.',
    [FlowErrorCode.INVALID_STATE_TRANSITION]: 'The run state machine does not allow this transition.',
    [FlowErrorCode.STORAGE_FAILURE]: 'The flow store could not complete the operation.',
    [FlowErrorCode.PERSISTENCE_SINK_FAILURE]: 'A log sink failed to write an entry.',
  };
  return descriptions[code];
}

export function getExitCodeForError(code: FlowErrorCode): ExitCode {
  switch (code.split('-')[1]) {
    case 'C':
      return ExitCode.CONFIGURATION;
    case 'N':
      return ExitCode.NOT_FOUND;
    case 'R':
    case 'K':
    case 'E':
      return ExitCode.TASK_FAILED;
    case 'P':
      return ExitCode.STORAGE;
    case 'I':
      return ExitCode.INTERNAL;
    default:
      return ExitCode.GENERAL_ERROR;
  }
}

/**
 * True when the author of the flow document can fix the problem
 */
export function isUserError(code: FlowErrorCode): boolean {
  const category = code.split('-')[1];
  return category === 'C' || category === 'N' || category === 'R';
}
