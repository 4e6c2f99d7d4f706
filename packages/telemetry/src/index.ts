/**
 * @loglane/telemetry
 *
 * Structured logging with fan-out to an append-only file and an OTLP
 * collector, context-bound logger handles and performance profiling.
 *
 * ```ts
 * const pipeline = createPipeline({ mode: "file", filePath: "./app.log" });
 * const logger = pipeline.getLogger("api").bind({ region: "eu" });
 * logger.info("started", { port: 8080 });
 * await pipeline.close();
 * ```
 */

// Configuration
export { includesFile, includesOtlp, resolveExportConfig } from "./config.js";
export {
  DEFAULT_BATCH_SIZE,
  DEFAULT_EXPORT_INTERVAL_MS,
  DEFAULT_EXPORT_TIMEOUT_MS,
  DEFAULT_MAX_EXPORT_ATTEMPTS,
  DEFAULT_MAX_QUEUE_SIZE,
  DEFAULT_OTLP_ENDPOINT,
  DEFAULT_SERVICE_NAME,
  PACKAGE_NAME,
} from "./constants.js";

// Records and levels
export {
  isLevelEnabled,
  isLogLevel,
  LEVEL_SEVERITY,
  LOG_LEVELS,
  type LogLevel,
  parseLogLevel,
} from "./levels.js";
export {
  createLogRecord,
  DROPPED_RESERVED_KEYS_FIELD,
  type LogRecordInput,
  RESERVED_KEYS,
  wallClockNow,
} from "./record.js";

// Formatting
export {
  type ConsoleFormatOptions,
  createFormatter,
  type Formatter,
  formatConsole,
  formatJson,
  formatPlain,
  formatRecord,
  parseJsonRecord,
} from "./format/index.js";

// Sinks
export { delivered, failed, queued, skipped } from "./outcomes.js";
export {
  buildLogAttributes,
  defaultSinkFactory,
  FileSink,
  type FileSinkOptions,
  mapSeverity,
  OtlpSink,
  type OtlpSinkOptions,
  type OtlpSinkStats,
  type Sink,
  type SinkContext,
  type SinkFactory,
  toReadableLogRecord,
} from "./sinks/index.js";
export { ExportMultiplexer, type MultiplexerOptions } from "./multiplexer.js";
export { consoleFallbackReporter } from "./fallback.js";
export { withTimeout } from "./with-timeout.js";

// Handles and context
export { type EmitTarget, LoggerHandle } from "./logger.js";
export { activeTraceIds, ContextScope } from "./scope.js";

// Pipeline
export { createPipeline, Pipeline, type PipelineOptions } from "./pipeline.js";
export {
  getLogger,
  getObservability,
  initObservability,
  shutdownObservability,
  withLogContext,
} from "./observability.js";

// Profiling
export {
  PERFORMANCE_MESSAGE,
  type ProfileOptions,
  profile,
  profileAsync,
} from "./profiler.js";
export { withSpan, withSpanSync } from "./span-helpers.js";

export type {
  DispatchResult,
  ExportConfig,
  ExportConfigInput,
  ExportMode,
  FallbackReporter,
  Fields,
  LogFormat,
  LogRecord,
  ProfilerSettings,
  SinkDispatch,
  SinkOutcome,
  TraceIds,
} from "./types.js";
