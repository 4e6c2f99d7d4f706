/**
 * `key=value` rendering without colors, suitable for grep and logfmt tooling.
 *
 *   timestamp=2026-01-02T03:04:05.678Z level=INFO component=api message=started port=8080
 */

import type { LogRecord } from "../types.js";
import { renderFieldValue } from "./value.js";

export function formatPlain(record: LogRecord): string {
  const pairs: [string, unknown][] = [
    ["timestamp", record.timestamp],
    ["level", record.level],
    ["component", record.component],
    ["message", record.message],
  ];
  if (record.traceId !== undefined) {
    pairs.push(["trace_id", record.traceId]);
  }
  if (record.spanId !== undefined) {
    pairs.push(["span_id", record.spanId]);
  }
  pairs.push(...Object.entries(record.fields));

  return pairs.map(([key, value]) => `${key}=${renderFieldValue(value)}`).join(" ");
}
