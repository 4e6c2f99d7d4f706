import { OTLPLogExporter } from "@opentelemetry/exporter-logs-otlp-http";
import { OTLP_LOGS_PATH } from "../constants.js";
import { FileSink } from "./file-sink.js";
import { OtlpSink } from "./otlp-sink.js";
import type { SinkContext, SinkFactory } from "./types.js";

export { FileSink, type FileSinkOptions } from "./file-sink.js";
export {
  buildLogAttributes,
  createResource,
  mapSeverity,
  toReadableLogRecord,
} from "./log-converter.js";
export { OtlpSink, type OtlpSinkOptions, type OtlpSinkStats } from "./otlp-sink.js";
export type { Sink, SinkContext, SinkFactory } from "./types.js";

/**
 * Builds the production sinks: an append-only file and an OTLP/HTTP
 * exporter posting to `<endpoint>/v1/logs`.
 */
export const defaultSinkFactory: SinkFactory = {
  createFileSink({ config, report, consoleFormat }: SinkContext) {
    return new FileSink({
      filePath: config.filePath ?? "",
      format: config.format,
      level: config.level,
      report,
      consoleFormat,
    });
  },

  createOtlpSink({ config, report }: SinkContext) {
    const exporter = new OTLPLogExporter({
      url: `${config.endpoint}${OTLP_LOGS_PATH}`,
      headers: { ...config.headers },
      timeoutMillis: config.timeoutMs,
    });
    return new OtlpSink({
      exporter,
      serviceName: config.serviceName,
      level: config.level,
      timeoutMs: config.timeoutMs,
      batchSize: config.batchSize,
      maxQueueSize: config.maxQueueSize,
      maxExportAttempts: config.maxExportAttempts,
      exportIntervalMs: config.exportIntervalMs,
      report,
    });
  },
};
