import type { ConsoleFormatOptions } from "../format/index.js";
import type { ExportConfig, FallbackReporter, LogRecord, SinkOutcome } from "../types.js";

/**
 * A destination for records.
 *
 * `deliver` never rejects: failures are reported as a `failed` outcome.
 * `close` is idempotent and releases everything the sink holds.
 */
export interface Sink {
  readonly name: string;
  deliver(record: LogRecord): Promise<SinkOutcome>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/** Everything a factory needs to build a sink for a resolved config */
export interface SinkContext {
  readonly config: ExportConfig;
  readonly report: FallbackReporter;
  readonly consoleFormat?: ConsoleFormatOptions | undefined;
}

/**
 * Builds the sinks the multiplexer fans out to. Swapped in tests to
 * substitute in-process stand-ins for the real destinations.
 */
export interface SinkFactory {
  createFileSink(context: SinkContext): Sink;
  createOtlpSink(context: SinkContext): Sink;
}
