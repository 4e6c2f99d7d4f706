/**
 * Performance instrumentation.
 *
 * `profile` and `profileAsync` wrap a unit of work so that each call emits
 * exactly one "performance" record carrying the operation name, wall time
 * in milliseconds and an outcome. Failures are logged at ERROR and then
 * rethrown unchanged; the wrapper never alters the work's result.
 *
 * ```ts
 * const load = profileAsync(loadConfig, logger, { name: "load_config" });
 * await load("/etc/app.toml");
 * ```
 */

import { describeError } from "@loglane/errors";
import type { LoggerHandle } from "./logger.js";
import { withSpan, withSpanSync } from "./span-helpers.js";
import type { ProfilerSettings } from "./types.js";

export const PERFORMANCE_MESSAGE = "performance";

const BYTES_PER_MB = 1024 * 1024;

export interface ProfileOptions {
  /** Operation name; defaults to the function's name */
  readonly name?: string | undefined;
  /** Add rss_mb, rss_delta_mb and heap_used_mb */
  readonly recordMemory?: boolean | undefined;
  /** Run the work inside a `profile:<name>` span */
  readonly createSpan?: boolean | undefined;
  /**
   * Settings-driven defaults for the two extras above. `active` gates both;
   * the timing record is emitted either way. Explicit options win.
   */
  readonly settings?: ProfilerSettings | undefined;
  /** Monotonic clock in milliseconds */
  readonly now?: (() => number) | undefined;
}

type Outcome = "success" | "failure";

interface Measurement {
  finish(outcome: Outcome, error?: unknown): void;
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function startMeasurement(
  logger: LoggerHandle,
  operation: string,
  recordMemory: boolean,
  now: () => number,
): Measurement {
  const rssBefore = recordMemory ? process.memoryUsage().rss : 0;
  const startedAt = now();

  return {
    finish(outcome, error) {
      const level = outcome === "success" ? "INFO" : "ERROR";
      if (!logger.isEnabledFor(level)) {
        return;
      }

      const fields: Record<string, unknown> = {
        event: PERFORMANCE_MESSAGE,
        operation,
        duration_ms: roundTo(now() - startedAt, 3),
        outcome,
      };
      if (outcome === "failure") {
        fields.error = describeError(error);
      }
      if (recordMemory) {
        const usage = process.memoryUsage();
        fields.rss_mb = roundTo(usage.rss / BYTES_PER_MB, 2);
        fields.rss_delta_mb = roundTo((usage.rss - rssBefore) / BYTES_PER_MB, 2);
        fields.heap_used_mb = roundTo(usage.heapUsed / BYTES_PER_MB, 2);
      }

      logger.emit(level, PERFORMANCE_MESSAGE, fields);
    },
  };
}

interface ResolvedProfile {
  readonly operation: string;
  readonly recordMemory: boolean;
  readonly createSpan: boolean;
  readonly now: () => number;
}

function resolveProfile(fallbackName: string, options: ProfileOptions): ResolvedProfile {
  const settings = options.settings;
  return {
    operation: options.name ?? (fallbackName || "anonymous"),
    recordMemory:
      options.recordMemory ?? (settings !== undefined && settings.active && settings.collectMemory),
    createSpan:
      options.createSpan ?? (settings !== undefined && settings.active && settings.createSpans),
    now: options.now ?? (() => performance.now()),
  };
}

/**
 * Wraps synchronous work. Promise-returning work should use
 * {@link profileAsync}; here only the synchronous part would be timed.
 */
export function profile<A extends unknown[], R>(
  work: (...args: A) => R,
  logger: LoggerHandle,
  options: ProfileOptions = {},
): (...args: A) => R {
  const resolved = resolveProfile(work.name, options);

  const run = (args: A): R => {
    const measurement = startMeasurement(
      logger,
      resolved.operation,
      resolved.recordMemory,
      resolved.now,
    );
    let result: R;
    try {
      result = work(...args);
    } catch (error) {
      measurement.finish("failure", error);
      throw error;
    }
    measurement.finish("success");
    return result;
  };

  return (...args: A): R =>
    resolved.createSpan
      ? withSpanSync(`profile:${resolved.operation}`, { "code.function": resolved.operation }, () =>
          run(args),
        )
      : run(args);
}

/**
 * Wraps asynchronous work; the duration covers the whole promise.
 */
export function profileAsync<A extends unknown[], R>(
  work: (...args: A) => Promise<R>,
  logger: LoggerHandle,
  options: ProfileOptions = {},
): (...args: A) => Promise<R> {
  const resolved = resolveProfile(work.name, options);

  const run = async (args: A): Promise<R> => {
    const measurement = startMeasurement(
      logger,
      resolved.operation,
      resolved.recordMemory,
      resolved.now,
    );
    let result: R;
    try {
      result = await work(...args);
    } catch (error) {
      measurement.finish("failure", error);
      throw error;
    }
    measurement.finish("success");
    return result;
  };

  return (...args: A): Promise<R> =>
    resolved.createSpan
      ? withSpan(`profile:${resolved.operation}`, { "code.function": resolved.operation }, () =>
          run(args),
        )
      : run(args);
}
