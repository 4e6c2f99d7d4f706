/**
 * Record construction.
 */

import type { LogLevel } from "./levels.js";
import type { Fields, LogRecord } from "./types.js";

/** Keys owned by the record itself; caller fields may not shadow them */
export const RESERVED_KEYS: ReadonlySet<string> = new Set(["timestamp", "level", "message"]);

/** Field added when caller-supplied keys collided with {@link RESERVED_KEYS} */
export const DROPPED_RESERVED_KEYS_FIELD = "_dropped_reserved_keys";

export interface LogRecordInput {
  readonly level: LogLevel;
  readonly message: string;
  readonly component: string;
  readonly fields?: Fields | undefined;
  readonly traceId?: string | undefined;
  readonly spanId?: string | undefined;
}

/** Wall-clock milliseconds since the epoch, from the monotonic clock */
export function wallClockNow(): number {
  return performance.timeOrigin + performance.now();
}

/**
 * Builds a frozen {@link LogRecord}.
 *
 * Caller fields named `timestamp`, `level` or `message` are dropped and
 * listed under `_dropped_reserved_keys` instead.
 */
export function createLogRecord(
  input: LogRecordInput,
  now: () => number = wallClockNow,
): LogRecord {
  const fields: Record<string, unknown> = {};
  const dropped: string[] = [];

  if (input.fields !== undefined) {
    for (const [key, value] of Object.entries(input.fields)) {
      if (RESERVED_KEYS.has(key)) {
        dropped.push(key);
      } else {
        fields[key] = value;
      }
    }
  }
  if (dropped.length > 0) {
    fields[DROPPED_RESERVED_KEYS_FIELD] = Object.freeze(dropped);
  }

  return Object.freeze({
    timestamp: new Date(now()).toISOString(),
    level: input.level,
    message: input.message,
    component: input.component,
    fields: Object.freeze(fields),
    ...(input.traceId !== undefined ? { traceId: input.traceId } : {}),
    ...(input.spanId !== undefined ? { spanId: input.spanId } : {}),
  });
}
