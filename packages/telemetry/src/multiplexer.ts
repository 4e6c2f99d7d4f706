/**
 * Fans each record out to every configured sink.
 *
 * Sinks are independent: one sink failing, rejecting or hanging never
 * prevents delivery to another. Failures are reported on the fallback
 * channel and summarised in the {@link DispatchResult}.
 */

import { getErrorMessage, SinkDeliveryError } from "@loglane/errors";
import { includesFile, includesOtlp } from "./config.js";
import { failed, skipped } from "./outcomes.js";
import { defaultSinkFactory } from "./sinks/index.js";
import type { Sink, SinkContext, SinkFactory } from "./sinks/types.js";
import type {
  DispatchResult,
  ExportConfig,
  ExportMode,
  FallbackReporter,
  LogRecord,
  SinkDispatch,
  SinkOutcome,
} from "./types.js";

export interface MultiplexerOptions {
  readonly sinkFactory?: SinkFactory | undefined;
  readonly report: FallbackReporter;
  readonly consoleFormat?: SinkContext["consoleFormat"];
}

function buildSinks(config: ExportConfig, factory: SinkFactory, context: SinkContext): Sink[] {
  const sinks: Sink[] = [];
  try {
    if (includesFile(config.mode)) {
      sinks.push(factory.createFileSink(context));
    }
    if (includesOtlp(config.mode)) {
      sinks.push(factory.createOtlpSink(context));
    }
  } catch (error) {
    // Release whatever was opened before the failure
    for (const sink of sinks) {
      sink.close().catch((closeError: unknown) => {
        context.report(`sink:${sink.name}`, `close failed: ${getErrorMessage(closeError)}`);
      });
    }
    throw error;
  }
  return sinks;
}

function rejectedOutcome(sink: string, reason: unknown): SinkOutcome {
  const error = new SinkDeliveryError(
    sink,
    getErrorMessage(reason),
    reason instanceof Error ? reason : undefined,
  );
  return failed(error.message, error);
}

function toDispatchResult(outcomes: SinkDispatch[]): DispatchResult {
  return { outcomes, handled: outcomes.some(({ outcome }) => outcome.status !== "failed") };
}

export class ExportMultiplexer {
  readonly mode: ExportMode;

  private readonly sinks: readonly Sink[];
  private readonly report: FallbackReporter;
  private readonly inFlight = new Set<Promise<DispatchResult>>();
  private closing: Promise<void> | undefined;

  /**
   * @throws {ConfigurationError} when a sink cannot be constructed
   */
  constructor(config: ExportConfig, options: MultiplexerOptions) {
    this.mode = config.mode;
    this.report = options.report;
    this.sinks = buildSinks(config, options.sinkFactory ?? defaultSinkFactory, {
      config,
      report: options.report,
      consoleFormat: options.consoleFormat,
    });
  }

  get sinkNames(): readonly string[] {
    return this.sinks.map((sink) => sink.name);
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  /**
   * Delivers one record to every sink concurrently and waits for all of
   * them to settle.
   */
  async dispatch(record: LogRecord): Promise<DispatchResult> {
    if (this.closing !== undefined) {
      return toDispatchResult(
        this.sinks.map((sink) => ({ sink: sink.name, outcome: skipped("pipeline closed") })),
      );
    }

    const settled = await Promise.allSettled(
      this.sinks.map((sink) => this.deliverTo(sink, record)),
    );

    const outcomes: SinkDispatch[] = settled.map((result, index) => {
      const sink = this.sinks[index]?.name ?? "unknown";
      const outcome =
        result.status === "fulfilled" ? result.value : rejectedOutcome(sink, result.reason);
      if (outcome.status === "failed") {
        this.report(`sink:${sink}`, outcome.reason);
      }
      return { sink, outcome };
    });

    return toDispatchResult(outcomes);
  }

  /** Turns a synchronous throw from a sink into a rejection */
  private async deliverTo(sink: Sink, record: LogRecord): Promise<SinkOutcome> {
    return sink.deliver(record);
  }

  /**
   * Fire-and-forget dispatch. The returned promise is tracked so that
   * flush and close can wait for it.
   */
  submit(record: LogRecord): void {
    if (this.closing !== undefined) {
      return;
    }
    const pending = this.dispatch(record);
    this.inFlight.add(pending);
    const release = (): void => {
      this.inFlight.delete(pending);
    };
    void pending.then(release, (error: unknown) => {
      release();
      this.report("loglane", `dispatch failed: ${getErrorMessage(error)}`);
    });
  }

  /** Waits for in-flight dispatches, then flushes every sink */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
    await this.settleAll("flush", (sink) => sink.flush());
  }

  /**
   * Waits for in-flight dispatches, then closes every sink. Idempotent:
   * every call returns the same promise.
   */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
    await this.settleAll("close", (sink) => sink.close());
  }

  private async settleAll(action: string, run: (sink: Sink) => Promise<void>): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(async (sink) => run(sink)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        const sink = this.sinks[index]?.name ?? "unknown";
        this.report(`sink:${sink}`, `${action} failed: ${getErrorMessage(result.reason)}`);
      }
    });
  }
}
