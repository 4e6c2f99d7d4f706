/**
 * Severity levels, ordered from least to most severe.
 */

export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR", "CRITICAL"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LEVEL_SEVERITY: Readonly<Record<LogLevel, number>> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

const LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  WARN: "WARNING",
  FATAL: "CRITICAL",
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * Parses a level name case-insensitively. Accepts `WARN` and `FATAL` as
 * aliases. Returns undefined for anything else.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toUpperCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  return LEVEL_ALIASES[normalized];
}

/** True when `level` is at or above `minimum` */
export function isLevelEnabled(level: LogLevel, minimum: LogLevel): boolean {
  return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[minimum];
}
