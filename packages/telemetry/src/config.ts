/**
 * Configuration validation and resolution.
 */

import { ConfigurationError, type ValidationIssue } from "@loglane/errors";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_EXPORT_INTERVAL_MS,
  DEFAULT_EXPORT_TIMEOUT_MS,
  DEFAULT_MAX_EXPORT_ATTEMPTS,
  DEFAULT_MAX_QUEUE_SIZE,
  DEFAULT_OTLP_ENDPOINT,
  DEFAULT_SERVICE_NAME,
} from "./constants.js";
import { isLogLevel } from "./levels.js";
import type { ExportConfig, ExportConfigInput, ExportMode, LogFormat } from "./types.js";

const EXPORT_MODES: readonly ExportMode[] = ["file", "otlp", "both"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "console", "plain"];

export function includesFile(mode: ExportMode): boolean {
  return mode === "file" || mode === "both";
}

export function includesOtlp(mode: ExportMode): boolean {
  return mode === "otlp" || mode === "both";
}

function checkPositiveInteger(
  issues: ValidationIssue[],
  field: keyof ExportConfig,
  value: number | undefined,
): void {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    issues.push({
      field,
      message: `${field} must be a positive integer, got ${value}`,
      code: "invalid_number",
      value,
    });
  }
}

/**
 * Validates and resolves an {@link ExportConfigInput} into a frozen
 * {@link ExportConfig} with all defaults applied.
 *
 * Every problem is collected before throwing, so one error lists them all.
 *
 * @throws {ConfigurationError} on invalid input
 */
export function resolveExportConfig(input: ExportConfigInput = {}): ExportConfig {
  const issues: ValidationIssue[] = [];

  const mode = input.mode ?? "file";
  if (!EXPORT_MODES.includes(mode)) {
    issues.push({
      field: "mode",
      message: `mode must be one of ${EXPORT_MODES.join(", ")}, got "${mode}"`,
      code: "invalid_enum",
      value: mode,
    });
  }

  const level = input.level ?? "INFO";
  if (!isLogLevel(level)) {
    issues.push({
      field: "level",
      message: `level must be one of DEBUG, INFO, WARNING, ERROR, CRITICAL, got "${level}"`,
      code: "invalid_enum",
      value: level,
    });
  }

  const format = input.format ?? "json";
  if (!LOG_FORMATS.includes(format)) {
    issues.push({
      field: "format",
      message: `format must be one of ${LOG_FORMATS.join(", ")}, got "${format}"`,
      code: "invalid_enum",
      value: format,
    });
  }

  const filePath = input.filePath?.trim() || undefined;
  if (includesFile(mode) && filePath === undefined) {
    issues.push({
      field: "filePath",
      message: `filePath is required when mode is "${mode}"`,
      code: "required",
    });
  }

  const endpoint = (input.endpoint ?? DEFAULT_OTLP_ENDPOINT).trim().replace(/\/+$/, "");
  if (includesOtlp(mode) && !URL.canParse(endpoint)) {
    issues.push({
      field: "endpoint",
      message: `endpoint must be an absolute URL, got "${endpoint}"`,
      code: "invalid_url",
      value: endpoint,
    });
  }

  const serviceName = input.serviceName ?? DEFAULT_SERVICE_NAME;
  if (serviceName.trim() === "") {
    issues.push({
      field: "serviceName",
      message: "serviceName must not be empty",
      code: "required",
    });
  }

  if (
    input.timeoutMs !== undefined &&
    (!Number.isFinite(input.timeoutMs) || input.timeoutMs <= 0)
  ) {
    issues.push({
      field: "timeoutMs",
      message: `timeoutMs must be a positive number, got ${input.timeoutMs}`,
      code: "invalid_number",
      value: input.timeoutMs,
    });
  }

  checkPositiveInteger(issues, "batchSize", input.batchSize);
  checkPositiveInteger(issues, "maxQueueSize", input.maxQueueSize);
  checkPositiveInteger(issues, "maxExportAttempts", input.maxExportAttempts);

  const batchSize = input.batchSize ?? DEFAULT_BATCH_SIZE;
  const maxQueueSize = input.maxQueueSize ?? Math.max(DEFAULT_MAX_QUEUE_SIZE, batchSize);
  if (maxQueueSize < batchSize) {
    issues.push({
      field: "maxQueueSize",
      message: `maxQueueSize (${maxQueueSize}) must be at least batchSize (${batchSize})`,
      code: "invalid_number",
      value: maxQueueSize,
    });
  }

  if (
    input.exportIntervalMs !== undefined &&
    (!Number.isFinite(input.exportIntervalMs) || input.exportIntervalMs < 0)
  ) {
    issues.push({
      field: "exportIntervalMs",
      message: `exportIntervalMs must be zero or a positive number, got ${input.exportIntervalMs}`,
      code: "invalid_number",
      value: input.exportIntervalMs,
    });
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues.map((issue) => issue.message).join("; "), issues);
  }

  return Object.freeze({
    mode,
    filePath,
    format,
    endpoint,
    serviceName,
    timeoutMs: input.timeoutMs ?? DEFAULT_EXPORT_TIMEOUT_MS,
    level,
    batchSize,
    maxQueueSize,
    maxExportAttempts: input.maxExportAttempts ?? DEFAULT_MAX_EXPORT_ATTEMPTS,
    exportIntervalMs: input.exportIntervalMs ?? DEFAULT_EXPORT_INTERVAL_MS,
    headers: Object.freeze({ ...input.headers }),
  });
}
