/**
 * Flow Parser
 *
 * Turns a stored flow document into an ordered, validated task list, and
 * back. Parsing happens once per load; the resulting definition is never
 * mutated during a run.
 *
 * Checks, in order:
 * 1. the text is JSON
 * 2. the document matches FlowDocumentSchema
 * 3. task names are unique and do not use the reserved `_` prefix
 *
 * Every diagnostic carries the document path that failed, e.g. `tasks[1].mod`.
 *
 * @module parser
 */

import { z } from 'zod';
import type { FlowDefinition, FlowRecord, TaskSpec } from '../types/core-types.js';
import { ConfigurationError, FlowErrorCode } from '../errors/index.js';
import { isReservedName } from '../context/ContextStore.js';
import { FlowDocumentSchema, type FlowDocument } from './FlowSchema.js';

export type FlowSource = Pick<FlowRecord, 'name' | 'flowJson' | 'enabled' | 'deleted'>;

export class FlowParser {
  /**
   * Parse a stored record into a definition
   *
   * @throws {ConfigurationError} On any malformed document
   */
  static parse(record: FlowSource): FlowDefinition {
    return {
      name: record.name,
      tasks: this.parseTasks(record.flowJson, `flow "${record.name}"`),
      enabled: record.enabled,
      deleted: record.deleted,
    };
  }

  /**
   * Parse document text into task specs
   *
   * @param location - Where the text came from, for messages
   */
  static parseTasks(json: string, location: string = 'flow document'): TaskSpec[] {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw ConfigurationError.malformedJson(location, error);
    }
    return this.fromObject(raw);
  }

  /**
   * Validate an already-decoded document
   */
  static fromObject(raw: unknown): TaskSpec[] {
    const result = FlowDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw this.transformZodError(result.error);
    }

    const tasks: TaskSpec[] = result.data.tasks.map((task) => ({
      name: task.name,
      module: task.mod,
      method: task.method,
      params: task.params ?? {},
    }));

    const seen = new Map<string, number>();
    tasks.forEach((task, index) => {
      if (isReservedName(task.name)) {
        throw ConfigurationError.reservedTaskName(task.name, `tasks[${index}].name`);
      }
      const first = seen.get(task.name);
      if (first !== undefined) {
        throw ConfigurationError.duplicateTask(task.name, first, index);
      }
      seen.set(task.name, index);
    });

    return tasks;
  }

  /**
   * Inverse of fromObject: the canonical document for a task list
   */
  static toDocument(tasks: readonly TaskSpec[]): FlowDocument {
    return {
      tasks: tasks.map((task) => ({
        name: task.name,
        mod: task.module,
        method: task.method,
        params: { ...task.params },
      })),
    };
  }

  static stringify(tasks: readonly TaskSpec[]): string {
    return JSON.stringify(this.toDocument(tasks));
  }

  /**
   * Render a zod path the way flow documents are addressed: `tasks[1].mod`
   */
  static formatPath(path: ReadonlyArray<string | number>): string {
    let out = '';
    for (const segment of path) {
      if (typeof segment === 'number') {
        out += `[${segment}]`;
      } else {
        out += out === '' ? segment : `.${segment}`;
      }
    }
    return out === '' ? 'document' : out;
  }

  /**
   * Report the first schema issue as a ConfigurationError
   */
  private static transformZodError(error: z.ZodError): ConfigurationError {
    const issue = error.issues[0];
    if (!issue) {
      return ConfigurationError.invalidSettings('Invalid flow document');
    }

    const path = this.formatPath(issue.path);
    const field = String(issue.path[issue.path.length - 1] ?? 'document');
    const parent = this.formatPath(issue.path.slice(0, -1));

    switch (issue.code) {
      case 'invalid_type':
        if (issue.received === 'undefined') {
          return ConfigurationError.missingField(field, parent);
        }
        return ConfigurationError.invalidType(field, issue.expected, issue.received, path);

      case 'invalid_string':
      case 'too_small':
        return ConfigurationError.missingField(field, parent);

      default:
        return new ConfigurationError({
          code: FlowErrorCode.CONFIG_INVALID_TYPE,
          message: `Invalid value at ${path}: ${issue.message}`,
          path,
        });
    }
  }
}
