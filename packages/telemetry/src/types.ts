/**
 * Core types for the logging pipeline.
 */

import type { LogLevel } from "./levels.js";

export type { LogLevel } from "./levels.js";

/** Output encoding of a rendered record */
export type LogFormat = "json" | "console" | "plain";

/** Which destinations receive records */
export type ExportMode = "file" | "otlp" | "both";

/** Arbitrary structured context attached to a record */
export type Fields = Readonly<Record<string, unknown>>;

/**
 * A single structured log event. Immutable once created.
 */
export interface LogRecord {
  /** ISO-8601 UTC wall-clock time of emission */
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  /** Name of the emitting logger */
  readonly component: string;
  readonly fields: Fields;
  readonly traceId?: string;
  readonly spanId?: string;
}

/**
 * Fully-resolved export configuration. Produced by `resolveExportConfig`.
 */
export interface ExportConfig {
  readonly mode: ExportMode;
  /** Required when mode is "file" or "both" */
  readonly filePath: string | undefined;
  readonly format: LogFormat;
  /** Base URL of the OTLP/HTTP collector; `/v1/logs` is appended */
  readonly endpoint: string;
  readonly serviceName: string;
  /** Upper bound on a single export attempt */
  readonly timeoutMs: number;
  /** Minimum severity that is rendered and exported */
  readonly level: LogLevel;
  readonly batchSize: number;
  readonly maxQueueSize: number;
  readonly maxExportAttempts: number;
  /** Background export cadence. 0 disables the timer. */
  readonly exportIntervalMs: number;
  readonly headers: Readonly<Record<string, string>>;
}

/** Caller-supplied configuration; every omitted key takes its default */
export type ExportConfigInput = {
  readonly [K in keyof ExportConfig]?: ExportConfig[K] | undefined;
};

/**
 * Result of handing one record to one sink.
 *
 * - `delivered`: written or exported
 * - `queued`: accepted; export happens later
 * - `skipped`: deliberately not written (below level, sink closed)
 * - `failed`: the sink could not take the record
 */
export type SinkOutcome =
  | { readonly status: "delivered" }
  | { readonly status: "queued" }
  | { readonly status: "skipped"; readonly reason: string }
  | { readonly status: "failed"; readonly reason: string; readonly error?: Error };

export interface SinkDispatch {
  readonly sink: string;
  readonly outcome: SinkOutcome;
}

/**
 * Aggregate result of a dispatch across every configured sink.
 * A record is handled when at least one sink did not fail.
 */
export interface DispatchResult {
  readonly outcomes: readonly SinkDispatch[];
  readonly handled: boolean;
}

/**
 * Receives internal warnings (sink failures, dropped batches).
 * Never routed back through the pipeline.
 */
export type FallbackReporter = (tag: string, message: string) => void;

/** Trace correlation identifiers (hex) */
export interface TraceIds {
  readonly traceId: string;
  readonly spanId: string;
}

/** Profiler behaviour switches, typically loaded from settings */
export interface ProfilerSettings {
  readonly active: boolean;
  readonly collectMemory: boolean;
  readonly createSpans: boolean;
}
