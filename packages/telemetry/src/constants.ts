/**
 * Constants for @loglane/telemetry.
 */

export const PACKAGE_NAME = "@loglane/telemetry";
export const PACKAGE_VERSION = "0.1.0";

export const DEFAULT_SERVICE_NAME = "loglane";
export const DEFAULT_OTLP_ENDPOINT = "http://localhost:4318";
export const OTLP_LOGS_PATH = "/v1/logs";

export const DEFAULT_EXPORT_TIMEOUT_MS = 10_000; // 10 seconds
export const DEFAULT_BATCH_SIZE = 512;
export const DEFAULT_MAX_QUEUE_SIZE = 2_048;
export const DEFAULT_MAX_EXPORT_ATTEMPTS = 3;
export const DEFAULT_EXPORT_INTERVAL_MS = 5_000; // 5 seconds

/** Tracer name used for spans opened by the profiler */
export const TRACER_NAME = "loglane";
