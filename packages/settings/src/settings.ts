/**
 * Settings loading and conversion to an export configuration.
 */

import { ConfigurationError, type ValidationIssue } from "@loglane/errors";
import { type ExportConfig, resolveExportConfig } from "@loglane/telemetry";
import dotenv from "dotenv";
import { EnvironmentSchema } from "./schema.js";
import type { Environment, Settings } from "./types.js";

/**
 * Parses settings from an environment map (defaults to `process.env`).
 *
 * @throws {ConfigurationError} listing every invalid variable
 */
export function loadSettings(env: Environment = process.env): Settings {
  const result = EnvironmentSchema.safeParse(env);

  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => {
      const field = issue.path.join(".");
      return {
        field,
        message: `${field}: ${issue.message}`,
        code: issue.code,
        value: env[field],
      };
    });
    throw new ConfigurationError(issues.map((issue) => issue.message).join("; "), issues);
  }

  const settings = result.data;
  return Object.freeze({ ...settings, profiler: Object.freeze(settings.profiler) });
}

/**
 * Builds the export configuration the pipeline is created with.
 *
 * @throws {ConfigurationError} when the combination is invalid (e.g. file mode without a path)
 */
export function toExportConfig(settings: Settings): ExportConfig {
  return resolveExportConfig({
    mode: settings.exportMode,
    filePath: settings.logFilePath,
    format: settings.logFormat,
    endpoint: settings.otelEndpoint,
    serviceName: settings.otelServiceName,
    timeoutMs: settings.exportTimeoutMs,
    level: settings.logLevel,
    batchSize: settings.exportBatchSize,
    maxQueueSize: settings.exportMaxQueueSize,
    maxExportAttempts: settings.exportMaxAttempts,
    exportIntervalMs: settings.exportIntervalMs,
  });
}

/**
 * Loads a `.env` file into `target` (defaults to `process.env`).
 * Variables that are already set are left untouched.
 *
 * @throws {ConfigurationError} when the file cannot be read
 */
export function loadDotenv(path: string, target?: Record<string, string>): void {
  const result = dotenv.config(target ? { path, processEnv: target } : { path });
  if (result.error) {
    throw new ConfigurationError(
      `cannot read env file "${path}": ${result.error.message}`,
      [{ field: "dotenv", message: result.error.message, code: "unreadable", value: path }],
      result.error,
    );
  }
}
