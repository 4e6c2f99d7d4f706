/**
 * Batching OTLP sink.
 *
 * Records are queued in memory and exported in batches through an
 * OpenTelemetry {@link LogRecordExporter}. An export is triggered when the
 * queue reaches `batchSize`, when the background interval fires, and on
 * flush or close. Exports run one at a time and each attempt is bounded by
 * `timeoutMs`.
 *
 * A batch whose export fails is kept and retried first on the next trigger.
 * After `maxExportAttempts` failed attempts it is dropped with a warning.
 * On close every pending batch gets one final attempt.
 * When the queue is full new records are refused with a `failed` outcome.
 */

import { getErrorMessage, SinkDeliveryError } from "@loglane/errors";
import { type ExportResult, ExportResultCode } from "@opentelemetry/core";
import type { IResource } from "@opentelemetry/resources";
import type { LogRecordExporter } from "@opentelemetry/sdk-logs";
import { isLevelEnabled, type LogLevel } from "../levels.js";
import { delivered, failed, queued, skipped } from "../outcomes.js";
import type { FallbackReporter, LogRecord, SinkOutcome } from "../types.js";
import { withTimeout } from "../with-timeout.js";
import { createResource, toReadableLogRecord } from "./log-converter.js";
import type { Sink } from "./types.js";

export interface OtlpSinkOptions {
  readonly exporter: LogRecordExporter;
  readonly serviceName: string;
  readonly level: LogLevel;
  readonly timeoutMs: number;
  readonly batchSize: number;
  readonly maxQueueSize: number;
  readonly maxExportAttempts: number;
  /** 0 disables the background timer */
  readonly exportIntervalMs: number;
  readonly report: FallbackReporter;
}

export interface OtlpSinkStats {
  /** Records queued or awaiting retry */
  readonly pending: number;
  readonly exported: number;
  readonly dropped: number;
  readonly failedAttempts: number;
}

interface Batch {
  readonly records: readonly LogRecord[];
  attempts: number;
}

type ExportStep =
  | { readonly status: "idle" }
  | { readonly status: "exported"; readonly records: readonly LogRecord[] }
  | { readonly status: "failed"; readonly reason: string; readonly error: Error };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class OtlpSink implements Sink {
  readonly name = "otlp";

  private readonly exporter: LogRecordExporter;
  private readonly resource: IResource;
  private readonly options: OtlpSinkOptions;

  private queue: LogRecord[] = [];
  private retry: Batch | undefined;
  private chain: Promise<unknown> = Promise.resolve();
  private timer: ReturnType<typeof setInterval> | undefined;
  private closed = false;
  private closing: Promise<void> | undefined;

  private exported = 0;
  private dropped = 0;
  private failedAttempts = 0;

  constructor(options: OtlpSinkOptions) {
    this.options = options;
    this.exporter = options.exporter;
    this.resource = createResource(options.serviceName);

    if (options.exportIntervalMs > 0) {
      this.timer = setInterval(() => {
        if (this.pendingCount() > 0) {
          void this.step();
        }
      }, options.exportIntervalMs);
      this.timer.unref();
    }
  }

  stats(): OtlpSinkStats {
    return {
      pending: this.pendingCount(),
      exported: this.exported,
      dropped: this.dropped,
      failedAttempts: this.failedAttempts,
    };
  }

  async deliver(record: LogRecord): Promise<SinkOutcome> {
    if (this.closed) {
      return skipped("sink closed");
    }
    if (!isLevelEnabled(record.level, this.options.level)) {
      return skipped("below level");
    }
    if (this.pendingCount() >= this.options.maxQueueSize) {
      this.dropped += 1;
      const error = new SinkDeliveryError(
        this.name,
        `queue full (${this.options.maxQueueSize} records pending)`,
      );
      return failed(error.message, error);
    }

    this.queue.push(record);
    if (this.queue.length < this.options.batchSize) {
      return queued();
    }
    return this.exportThrough(record);
  }

  /**
   * Runs export steps until `record` has left the queue, stopping at the
   * first failed attempt.
   */
  private async exportThrough(record: LogRecord): Promise<SinkOutcome> {
    for (;;) {
      const step = await this.step();
      if (step.status === "failed") {
        return failed(step.reason, step.error);
      }
      if (step.status === "exported" && step.records.includes(record)) {
        return delivered();
      }
      if (step.status === "idle" || !this.isPending(record)) {
        return queued();
      }
    }
  }

  private isPending(record: LogRecord): boolean {
    return this.queue.includes(record) || (this.retry?.records.includes(record) ?? false);
  }

  private pendingCount(): number {
    return this.queue.length + (this.retry?.records.length ?? 0);
  }

  /** Queues one export attempt behind any attempt already running */
  private step(): Promise<ExportStep> {
    const next = this.chain.then(() => this.exportOnce());
    this.chain = next;
    return next;
  }

  private takeBatch(): Batch | undefined {
    if (this.retry !== undefined) {
      return this.retry;
    }
    if (this.queue.length === 0) {
      return undefined;
    }
    return { records: this.queue.splice(0, this.options.batchSize), attempts: 0 };
  }

  private async exportOnce(): Promise<ExportStep> {
    const batch = this.takeBatch();
    if (batch === undefined) {
      return { status: "idle" };
    }

    batch.attempts += 1;
    try {
      await withTimeout(this.send(batch.records), this.options.timeoutMs, this.name);
    } catch (error) {
      this.failedAttempts += 1;
      const failure = toError(error);
      const reason = getErrorMessage(failure);

      if (this.closed || batch.attempts >= this.options.maxExportAttempts) {
        this.retry = undefined;
        this.dropped += batch.records.length;
        this.options.report(
          `sink:${this.name}`,
          `dropped batch of ${batch.records.length} records ` +
            `after ${batch.attempts} attempts: ${reason}`,
        );
      } else {
        this.retry = batch;
      }
      return { status: "failed", reason, error: failure };
    }

    this.retry = undefined;
    this.exported += batch.records.length;
    return { status: "exported", records: batch.records };
  }

  private send(records: readonly LogRecord[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const logs = records.map((record) => toReadableLogRecord(record, this.resource));
      this.exporter.export(logs, (result: ExportResult) => {
        if (result.code === ExportResultCode.SUCCESS) {
          resolve();
          return;
        }
        reject(
          new SinkDeliveryError(this.name, result.error?.message ?? "export failed", result.error),
        );
      });
    });
  }

  /**
   * Exports everything pending. Stops at the first failed attempt; the
   * failed batch stays queued for the next trigger.
   */
  async flush(): Promise<void> {
    while (this.pendingCount() > 0) {
      const step = await this.step();
      if (step.status !== "exported") {
        return;
      }
    }
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.closed = true;
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }

    // Final flush: each pending batch gets one more attempt, then is dropped
    while (this.pendingCount() > 0) {
      await this.step();
    }

    try {
      await withTimeout(this.exporter.shutdown(), this.options.timeoutMs, this.name);
    } catch (error) {
      this.options.report(
        `sink:${this.name}`,
        `exporter shutdown failed: ${getErrorMessage(error)}`,
      );
    }
  }
}
