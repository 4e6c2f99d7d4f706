/**
 * Ambient context: fields scoped to an async call tree, and the active
 * OpenTelemetry span.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { isSpanContextValid, trace } from "@opentelemetry/api";
import type { Fields, TraceIds } from "./types.js";

/**
 * Fields bound for the duration of a callback and everything it awaits.
 * Nested scopes merge onto their parent; inner keys win.
 */
export class ContextScope {
  private readonly storage = new AsyncLocalStorage<Fields>();

  current(): Fields | undefined {
    return this.storage.getStore();
  }

  run<T>(fields: Fields, fn: () => T): T {
    const parent = this.storage.getStore();
    return this.storage.run(Object.freeze({ ...parent, ...fields }), fn);
  }
}

/**
 * Trace and span ids of the active span, if there is a valid one.
 */
export function activeTraceIds(): TraceIds | undefined {
  const span = trace.getActiveSpan();
  if (span === undefined) {
    return undefined;
  }
  const context = span.spanContext();
  if (!isSpanContextValid(context)) {
    return undefined;
  }
  return { traceId: context.traceId, spanId: context.spanId };
}
