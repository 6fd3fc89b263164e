/**
 * Flow Schema
 *
 * Zod schemas for the two trust boundaries: the stored flow document and
 * the mapping a task returns.
 *
 * Document shape:
 *
 * ```json
 * { "tasks": [ { "name": "s1", "mod": "common.Kt", "method": "prt", "params": { "msg": "hi" } } ] }
 * ```
 *
 * @module parser
 */

import { z } from 'zod';
import type { JsonObject, JsonValue } from '../types/core-types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), JsonValueSchema);

const RequiredText = z.string().regex(/\S/, 'must not be blank');

export const TaskDocumentSchema = z.object({
  name: RequiredText,
  mod: RequiredText,
  method: RequiredText,
  params: JsonObjectSchema.optional(),
});

export const FlowDocumentSchema = z.object({
  tasks: z.array(TaskDocumentSchema),
});

export type TaskDocument = z.infer<typeof TaskDocumentSchema>;
export type FlowDocument = z.infer<typeof FlowDocumentSchema>;
