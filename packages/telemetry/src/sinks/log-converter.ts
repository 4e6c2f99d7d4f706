/**
 * Convert {@link LogRecord} to the OpenTelemetry log data model.
 */

import { type HrTime, isSpanContextValid, type SpanContext, TraceFlags } from "@opentelemetry/api";
import { type LogAttributes, SeverityNumber } from "@opentelemetry/api-logs";
import { type IResource, Resource } from "@opentelemetry/resources";
import type { ReadableLogRecord } from "@opentelemetry/sdk-logs";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import { PACKAGE_NAME, PACKAGE_VERSION } from "../constants.js";
import { safeStringify } from "../format/value.js";
import type { LogLevel } from "../levels.js";
import type { LogRecord } from "../types.js";

const INSTRUMENTATION_SCOPE = { name: PACKAGE_NAME, version: PACKAGE_VERSION } as const;

/**
 * Map a level to OTEL SeverityNumber
 */
export function mapSeverity(level: LogLevel): SeverityNumber {
  switch (level) {
    case "DEBUG":
      return SeverityNumber.DEBUG;
    case "INFO":
      return SeverityNumber.INFO;
    case "WARNING":
      return SeverityNumber.WARN;
    case "ERROR":
      return SeverityNumber.ERROR;
    case "CRITICAL":
      return SeverityNumber.FATAL;
  }
}

/**
 * Convert an ISO timestamp to OTEL HrTime [seconds, nanoseconds]
 */
function timestampToHrTime(timestamp: string): HrTime {
  const parsed = Date.parse(timestamp);
  const ms = Number.isNaN(parsed) ? Date.now() : parsed;
  const seconds = Math.floor(ms / 1000);
  const nanoseconds = (ms % 1000) * 1_000_000;
  return [seconds, nanoseconds];
}

function isHomogeneousArray(value: readonly unknown[]): boolean {
  if (value.length === 0) {
    return true;
  }
  const kind = typeof value[0];
  if (kind !== "string" && kind !== "number" && kind !== "boolean") {
    return false;
  }
  return value.every((item) => typeof item === kind);
}

/**
 * Build OTEL log attributes from record fields.
 *
 * Primitives and homogeneous primitive arrays pass through; anything else
 * is JSON-encoded. null and undefined are omitted.
 */
export function buildLogAttributes(record: LogRecord): LogAttributes {
  const attributes: LogAttributes = { "loglane.component": record.component };

  for (const [key, value] of Object.entries(record.fields)) {
    if (value === null || value === undefined) continue;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      attributes[key] = value;
    } else if (Array.isArray(value) && isHomogeneousArray(value)) {
      attributes[key] = value.map(toScalar);
    } else if (value instanceof Date) {
      attributes[key] = Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
    } else {
      attributes[key] = safeStringify(value);
    }
  }

  return attributes;
}

function toScalar(value: unknown): string | number | boolean {
  if (typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return String(value);
}

export function createResource(serviceName: string): IResource {
  return new Resource({
    [ATTR_SERVICE_NAME]: serviceName,
    [ATTR_SERVICE_VERSION]: process.env.npm_package_version ?? "0.0.0",
  });
}

function spanContextOf(record: LogRecord): SpanContext | undefined {
  if (record.traceId === undefined || record.spanId === undefined) {
    return undefined;
  }
  const context: SpanContext = {
    traceId: record.traceId,
    spanId: record.spanId,
    traceFlags: TraceFlags.SAMPLED,
  };
  return isSpanContextValid(context) ? context : undefined;
}

/**
 * Build the exporter-facing view of a record.
 */
export function toReadableLogRecord(record: LogRecord, resource: IResource): ReadableLogRecord {
  const hrTime = timestampToHrTime(record.timestamp);
  const spanContext = spanContextOf(record);

  return {
    hrTime,
    hrTimeObserved: hrTime,
    ...(spanContext !== undefined ? { spanContext } : {}),
    severityNumber: mapSeverity(record.level),
    severityText: record.level,
    body: record.message,
    resource,
    instrumentationScope: INSTRUMENTATION_SCOPE,
    attributes: buildLogAttributes(record),
    droppedAttributesCount: 0,
  };
}
