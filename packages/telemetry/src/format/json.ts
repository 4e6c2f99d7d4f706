/**
 * JSON line encoding.
 *
 * One object per record with a fixed key order:
 *
 * ```json
 * {"timestamp":"…","level":"INFO","message":"started","component":"api",
 *  "trace_id":"…","span_id":"…","fields":{"port":8080}}
 * ```
 *
 * `trace_id` and `span_id` are present only when the record carries them.
 * Fields stay nested under `fields` so they can never collide with the
 * record's own keys.
 */

import { z } from "zod";
import { LOG_LEVELS } from "../levels.js";
import type { LogRecord } from "../types.js";
import { safeStringify } from "./value.js";

export function formatJson(record: LogRecord): string {
  return safeStringify({
    timestamp: record.timestamp,
    level: record.level,
    message: record.message,
    component: record.component,
    ...(record.traceId !== undefined ? { trace_id: record.traceId } : {}),
    ...(record.spanId !== undefined ? { span_id: record.spanId } : {}),
    fields: record.fields,
  });
}

const JsonLineSchema = z.object({
  timestamp: z.string().datetime(),
  level: z.enum(LOG_LEVELS),
  message: z.string(),
  component: z.string(),
  trace_id: z.string().optional(),
  span_id: z.string().optional(),
  fields: z.record(z.unknown()),
});

/**
 * Parses a line written by {@link formatJson} back into a record.
 * Returns undefined for anything that is not such a line.
 */
export function parseJsonRecord(line: string): LogRecord | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }

  const parsed = JsonLineSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }

  const { trace_id: traceId, span_id: spanId, ...rest } = parsed.data;
  return Object.freeze({
    timestamp: rest.timestamp,
    level: rest.level,
    message: rest.message,
    component: rest.component,
    fields: Object.freeze(rest.fields),
    ...(traceId !== undefined ? { traceId } : {}),
    ...(spanId !== undefined ? { spanId } : {}),
  });
}
