/**
 * Configuration Errors
 *
 * Raised while loading a flow document, validating it against the task
 * registry, or loading settings. Always fatal, never retried.
 *
 * Use the factory methods rather than the constructor:
 *
 * ```typescript
 * throw ConfigurationError.missingField('mod', 'tasks[1]');
 * ```
 *
 * @module errors
 */

import { FlowError, type FlowErrorDiagnostic } from './FlowError.js';
import { FlowErrorCode } from './ErrorCodes.js';

export class ConfigurationError extends FlowError {
  constructor(diagnostic: FlowErrorDiagnostic) {
    super(diagnostic);
    this.name = 'ConfigurationError';
  }

  static malformedJson(location: string, cause: unknown): ConfigurationError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_MALFORMED_JSON,
      message: `Malformed flow JSON in ${location}: ${detail}`,
      hint: 'Check the document with a JSON validator; trailing commas and comments are not allowed.',
      context: { location },
      cause,
    });
  }

  /**
   * @param parent - Path of the object the field belongs to, e.g. `tasks[1]`
   */
  static missingField(field: string, parent: string): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_MISSING_FIELD,
      message: `Missing required field "${field}" at ${parent}`,
      path: parent === 'document' ? field : `${parent}.${field}`,
      hint: `Add a non-empty "${field}" to ${parent}.`,
      context: { field },
    });
  }

  static invalidType(field: string, expected: string, received: string, path: string): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_INVALID_TYPE,
      message: `Field "${field}" has incorrect type at ${path}: expected ${expected}, received ${received}`,
      path,
      context: { field, expected, received },
    });
  }

  static duplicateTask(taskName: string, firstIndex: number, secondIndex: number): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_DUPLICATE_TASK,
      message: `Duplicate task name "${taskName}" (tasks[${firstIndex}] and tasks[${secondIndex}])`,
      path: `tasks[${secondIndex}].name`,
      hint: 'Rename one of the tasks; references use the task name as their context key.',
      context: { taskName, firstIndex, secondIndex },
    });
  }

  static reservedTaskName(taskName: string, path: string): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_RESERVED_NAME,
      message: `Task name "${taskName}" uses the reserved "_" prefix`,
      path,
      hint: 'Choose a task name that does not start with "_".',
      context: { taskName },
    });
  }

  static unknownTask(module: string, method: string, available: string[], taskName?: string): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_UNKNOWN_TASK,
      message: `No task registered for module "${module}" method "${method}"`,
      hint: available.length > 0
        ? `Registered tasks: ${available.join(', ')}`
        : 'No tasks are registered; register the task catalog before running flows.',
      context: { module, method, taskName },
    });
  }

  static duplicateRegistration(module: string, method: string): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_DUPLICATE_REGISTRATION,
      message: `Task "${module}.${method}" is already registered`,
      context: { module, method },
    });
  }

  static invalidSettings(message: string, path?: string, cause?: unknown): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_INVALID_SETTINGS,
      message,
      path,
      cause,
    });
  }

  static invalidFlowName(flowName: string): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_INVALID_FLOW_NAME,
      message: `Invalid flow name "${flowName}"`,
      hint: 'Flow names must be between 1 and 128 characters.',
      context: { flowName },
    });
  }
}
