import type {
  LogRecord,
  Sink,
  SinkContext,
  SinkFactory,
  SinkOutcome,
} from "@loglane/telemetry";
import { vi } from "vitest";

/**
 * Sink that records every delivery.
 *
 * `deliver`, `flush` and `close` are vitest mock functions, so call counts
 * can be asserted and implementations swapped per test.
 *
 * @example
 * ```typescript
 * const sink = new SpySink("file");
 * sink.deliver.mockImplementation(() => {
 *   throw new Error("disk gone");
 * });
 * ```
 */
export class SpySink implements Sink {
  readonly name: string;
  readonly records: LogRecord[] = [];

  /** Returned by the default `deliver` implementation */
  outcome: SinkOutcome = { status: "delivered" };

  readonly deliver = vi.fn<(record: LogRecord) => Promise<SinkOutcome>>(async (record) => {
    this.records.push(record);
    return this.outcome;
  });

  readonly flush = vi.fn<() => Promise<void>>(async () => {
    // No-op mock implementation
  });

  readonly close = vi.fn<() => Promise<void>>(async () => {
    // No-op mock implementation
  });

  constructor(name = "spy") {
    this.name = name;
  }

  get messages(): string[] {
    return this.records.map((record) => record.message);
  }
}

export interface SpySinkFactory extends SinkFactory {
  readonly file: SpySink;
  readonly otlp: SpySink;
  /** Contexts the factory was called with, in call order */
  readonly contexts: SinkContext[];
}

/**
 * A {@link SinkFactory} that hands out the given spy sinks instead of
 * opening files or connections.
 */
export function createSpySinkFactory(
  file: SpySink = new SpySink("file"),
  otlp: SpySink = new SpySink("otlp"),
): SpySinkFactory {
  const contexts: SinkContext[] = [];
  return {
    file,
    otlp,
    contexts,
    createFileSink(context: SinkContext): Sink {
      contexts.push(context);
      return file;
    },
    createOtlpSink(context: SinkContext): Sink {
      contexts.push(context);
      return otlp;
    },
  };
}
