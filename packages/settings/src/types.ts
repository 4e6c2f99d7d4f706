import type { ExportMode, LogFormat, LogLevel, ProfilerSettings } from "@loglane/telemetry";
import type { INTERFACE_TYPES } from "./constants.js";

export type InterfaceType = (typeof INTERFACE_TYPES)[number];

/**
 * Application settings, resolved from the environment.
 */
export interface Settings {
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  /** `loglane.log` in the working directory when LOG_FILE_PATH is missing or blank */
  readonly logFilePath: string;
  readonly exportMode: ExportMode;
  readonly otelEndpoint: string;
  readonly otelServiceName: string;
  readonly exportTimeoutMs: number;
  readonly exportBatchSize: number;
  /** Unset lets the pipeline size the queue from the batch size */
  readonly exportMaxQueueSize: number | undefined;
  readonly exportMaxAttempts: number;
  readonly exportIntervalMs: number;
  readonly interfaceType: InterfaceType;
  readonly restHost: string;
  readonly restPort: number;
  readonly profiler: ProfilerSettings;
}

/** Environment variables as read from `process.env` */
export type Environment = Readonly<Record<string, string | undefined>>;
