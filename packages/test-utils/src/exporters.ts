import { type ExportResult, ExportResultCode } from "@opentelemetry/core";
import type { LogRecordExporter, ReadableLogRecord } from "@opentelemetry/sdk-logs";

/**
 * Exporter whose every export fails, as a collector that is down would.
 */
export class FailingLogExporter implements LogRecordExporter {
  exportCalls = 0;
  shutdownCalls = 0;

  constructor(private readonly message = "collector unavailable") {}

  export(_logs: ReadableLogRecord[], resultCallback: (result: ExportResult) => void): void {
    this.exportCalls += 1;
    resultCallback({ code: ExportResultCode.FAILED, error: new Error(this.message) });
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls += 1;
  }
}

/**
 * Exporter that accepts a batch and never answers, as a collector that
 * stops responding mid-request would.
 */
export class HangingLogExporter implements LogRecordExporter {
  exportCalls = 0;
  shutdownCalls = 0;
  readonly received: ReadableLogRecord[][] = [];

  export(logs: ReadableLogRecord[], _resultCallback: (result: ExportResult) => void): void {
    this.exportCalls += 1;
    this.received.push(logs);
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls += 1;
  }
}

/**
 * Exporter that fails the first `failures` exports and succeeds after.
 */
export class FlakyLogExporter implements LogRecordExporter {
  exportCalls = 0;
  shutdownCalls = 0;
  readonly exported: ReadableLogRecord[] = [];

  constructor(private failures: number) {}

  export(logs: ReadableLogRecord[], resultCallback: (result: ExportResult) => void): void {
    this.exportCalls += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      resultCallback({ code: ExportResultCode.FAILED, error: new Error("temporary failure") });
      return;
    }
    this.exported.push(...logs);
    resultCallback({ code: ExportResultCode.SUCCESS });
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls += 1;
  }
}
