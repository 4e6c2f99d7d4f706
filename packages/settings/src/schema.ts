/**
 * Environment schema.
 *
 * Every value is trimmed and blank values count as unset, so `LOG_LEVEL=`
 * falls back to the default instead of failing validation.
 */

import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_EXPORT_INTERVAL_MS,
  DEFAULT_EXPORT_TIMEOUT_MS,
  DEFAULT_MAX_EXPORT_ATTEMPTS,
  DEFAULT_OTLP_ENDPOINT,
  DEFAULT_SERVICE_NAME,
  LOG_LEVELS,
  parseLogLevel,
} from "@loglane/telemetry";
import { z } from "zod";
import {
  DEFAULT_INTERFACE_TYPE,
  DEFAULT_LOG_FILE_PATH,
  DEFAULT_REST_HOST,
  DEFAULT_REST_PORT,
  INTERFACE_TYPES,
} from "./constants.js";

function blankToUndefined(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function lowerCased(value: unknown): unknown {
  const normalized = blankToUndefined(value);
  return typeof normalized === "string" ? normalized.toLowerCase() : normalized;
}

const TRUTHY = new Set(["true", "1", "yes", "on"]);
const FALSY = new Set(["false", "0", "no", "off"]);

const LogLevelSchema = z.string().transform((value, ctx) => {
  const level = parseLogLevel(value);
  if (level === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected one of ${LOG_LEVELS.join(", ")}, received '${value}'`,
    });
    return z.NEVER;
  }
  return level;
});

const BooleanSchema = z.string().transform((value, ctx) => {
  if (TRUTHY.has(value)) return true;
  if (FALSY.has(value)) return false;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `Expected a boolean (true/false, 1/0, yes/no, on/off), received '${value}'`,
  });
  return z.NEVER;
});

const text = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema);
const keyword = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(lowerCased, schema);

export const EnvironmentSchema = z
  .object({
    LOG_LEVEL: text(LogLevelSchema.default("INFO")),
    LOG_FORMAT: keyword(z.enum(["json", "console", "plain"]).default("json")),
    LOG_FILE_PATH: text(z.string().default(DEFAULT_LOG_FILE_PATH)),
    OTEL_LOGS_EXPORT_MODE: keyword(z.enum(["file", "otlp", "both"]).default("file")),
    OTEL_ENDPOINT: text(z.string().url().default(DEFAULT_OTLP_ENDPOINT)),
    OTEL_SERVICE_NAME: text(z.string().default(DEFAULT_SERVICE_NAME)),
    OTEL_EXPORT_TIMEOUT: text(z.coerce.number().positive().default(DEFAULT_EXPORT_TIMEOUT_MS)),
    OTEL_EXPORT_BATCH_SIZE: text(z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE)),
    OTEL_EXPORT_MAX_QUEUE_SIZE: text(z.coerce.number().int().positive().optional()),
    OTEL_EXPORT_MAX_ATTEMPTS: text(
      z.coerce.number().int().positive().default(DEFAULT_MAX_EXPORT_ATTEMPTS),
    ),
    OTEL_EXPORT_INTERVAL: text(
      z.coerce.number().nonnegative().default(DEFAULT_EXPORT_INTERVAL_MS),
    ),
    INTERFACE_TYPE: keyword(z.enum(INTERFACE_TYPES).default(DEFAULT_INTERFACE_TYPE)),
    REST_HOST: text(z.string().default(DEFAULT_REST_HOST)),
    REST_PORT: text(z.coerce.number().int().min(0).max(65_535).default(DEFAULT_REST_PORT)),
    PROFILER_ACTIVE: keyword(BooleanSchema.default("false")),
    PROFILER_COLLECT_MEMORY: keyword(BooleanSchema.default("false")),
    PROFILER_CREATE_SPANS: keyword(BooleanSchema.default("false")),
  })
  .transform((env) => ({
    logLevel: env.LOG_LEVEL,
    logFormat: env.LOG_FORMAT,
    logFilePath: env.LOG_FILE_PATH,
    exportMode: env.OTEL_LOGS_EXPORT_MODE,
    otelEndpoint: env.OTEL_ENDPOINT,
    otelServiceName: env.OTEL_SERVICE_NAME,
    exportTimeoutMs: env.OTEL_EXPORT_TIMEOUT,
    exportBatchSize: env.OTEL_EXPORT_BATCH_SIZE,
    exportMaxQueueSize: env.OTEL_EXPORT_MAX_QUEUE_SIZE,
    exportMaxAttempts: env.OTEL_EXPORT_MAX_ATTEMPTS,
    exportIntervalMs: env.OTEL_EXPORT_INTERVAL,
    interfaceType: env.INTERFACE_TYPE,
    restHost: env.REST_HOST,
    restPort: env.REST_PORT,
    profiler: {
      active: env.PROFILER_ACTIVE,
      collectMemory: env.PROFILER_COLLECT_MEMORY,
      createSpans: env.PROFILER_CREATE_SPANS,
    },
  }));
