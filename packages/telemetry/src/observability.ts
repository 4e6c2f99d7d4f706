/**
 * Process-wide pipeline.
 *
 * `initObservability` installs one pipeline for the whole process;
 * `getLogger` returns handles that forward to whichever pipeline is
 * installed when they emit, so module-level loggers created before
 * initialisation still reach the sinks.
 */

import type { LogLevel } from "./levels.js";
import { type EmitTarget, LoggerHandle } from "./logger.js";
import { createPipeline, type Pipeline, type PipelineOptions } from "./pipeline.js";
import type { ExportConfigInput, Fields, LogRecord } from "./types.js";

/** The installed pipeline, if any */
let active: Pipeline | undefined;

const processTarget: EmitTarget = {
  isEnabled(level: LogLevel): boolean {
    return active?.isEnabled(level) ?? false;
  },
  scopedFields(): Fields | undefined {
    return active?.scopedFields();
  },
  submit(record: LogRecord): void {
    active?.submit(record);
  },
};

/**
 * Installs the process-wide pipeline.
 *
 * Idempotent: while a pipeline is installed and open, later calls return
 * it unchanged and ignore their arguments.
 *
 * @throws {ConfigurationError} on invalid configuration
 */
export function initObservability(config: ExportConfigInput, options?: PipelineOptions): Pipeline {
  if (active !== undefined && !active.closed) {
    return active;
  }
  active = createPipeline(config, options);
  return active;
}

/**
 * Returns a handle for `component`. Records are dropped until a pipeline
 * is installed.
 */
export function getLogger(component: string, fields?: Fields): LoggerHandle {
  return new LoggerHandle(processTarget, component, fields);
}

export function getObservability(): Pipeline | undefined {
  return active;
}

/**
 * Runs `fn` with `fields` bound on the installed pipeline, or runs it
 * plainly when none is installed.
 */
export function withLogContext<T>(fields: Fields, fn: () => T): T {
  return active !== undefined ? active.withContext(fields, fn) : fn();
}

/**
 * Closes and uninstalls the process-wide pipeline.
 *
 * Safe to call even if nothing was ever installed.
 */
export async function shutdownObservability(): Promise<void> {
  const pipeline = active;
  active = undefined;
  if (pipeline !== undefined) {
    await pipeline.close();
  }
}
