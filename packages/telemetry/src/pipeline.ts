/**
 * The pipeline: a resolved configuration, its sinks and the handles that
 * feed them.
 */

import { resolveExportConfig } from "./config.js";
import { guardReporter } from "./fallback.js";
import type { ConsoleFormatOptions } from "./format/index.js";
import { isLevelEnabled, type LogLevel } from "./levels.js";
import { type EmitTarget, LoggerHandle } from "./logger.js";
import { ExportMultiplexer } from "./multiplexer.js";
import { ContextScope } from "./scope.js";
import type { SinkFactory } from "./sinks/types.js";
import type {
  DispatchResult,
  ExportConfig,
  ExportConfigInput,
  FallbackReporter,
  Fields,
  LogRecord,
} from "./types.js";

export interface PipelineOptions {
  /** Replaces the production file and OTLP sinks */
  readonly sinkFactory?: SinkFactory | undefined;
  /**
   * Receives the pipeline's own warnings (failed deliveries, dropped
   * batches) instead of console.warn.
   */
  readonly onInternalWarning?: FallbackReporter | undefined;
  /** Color handling for the "console" format */
  readonly consoleFormat?: ConsoleFormatOptions | undefined;
}

export class Pipeline implements EmitTarget {
  readonly config: ExportConfig;

  private readonly multiplexer: ExportMultiplexer;
  private readonly scope = new ContextScope();

  /**
   * @throws {ConfigurationError} when a sink cannot be opened
   */
  constructor(config: ExportConfig, options: PipelineOptions = {}) {
    this.config = config;
    this.multiplexer = new ExportMultiplexer(config, {
      sinkFactory: options.sinkFactory,
      report: guardReporter(options.onInternalWarning),
      consoleFormat: options.consoleFormat,
    });
  }

  get closed(): boolean {
    return this.multiplexer.closed;
  }

  get sinkNames(): readonly string[] {
    return this.multiplexer.sinkNames;
  }

  getLogger(component: string, fields?: Fields): LoggerHandle {
    return new LoggerHandle(this, component, fields);
  }

  /**
   * Runs `fn` with `fields` bound for every record emitted inside it,
   * including across awaits.
   */
  withContext<T>(fields: Fields, fn: () => T): T {
    return this.scope.run(fields, fn);
  }

  isEnabled(level: LogLevel): boolean {
    return !this.multiplexer.closed && isLevelEnabled(level, this.config.level);
  }

  scopedFields(): Fields | undefined {
    return this.scope.current();
  }

  submit(record: LogRecord): void {
    this.multiplexer.submit(record);
  }

  /** Delivers one record and reports what each sink did with it */
  dispatch(record: LogRecord): Promise<DispatchResult> {
    return this.multiplexer.dispatch(record);
  }

  flush(): Promise<void> {
    return this.multiplexer.flush();
  }

  /** Flushes and releases every sink. Safe to call more than once. */
  close(): Promise<void> {
    return this.multiplexer.close();
  }
}

/**
 * Validates `input` and builds a pipeline for it.
 *
 * @throws {ConfigurationError} on invalid configuration or an unopenable file
 */
export function createPipeline(input: ExportConfigInput, options?: PipelineOptions): Pipeline {
  return new Pipeline(resolveExportConfig(input), options);
}
