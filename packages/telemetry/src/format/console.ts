/**
 * Human-oriented single-line rendering with ANSI colors.
 *
 *   03:04:05.678 INF api started port=8080
 */

import pc from "picocolors";
import type { LogLevel } from "../levels.js";
import type { LogRecord } from "../types.js";
import { renderFieldValue } from "./value.js";

type Colors = ReturnType<typeof pc.createColors>;

export interface ConsoleFormatOptions {
  /** Force colors on or off. Defaults to picocolors' terminal detection. */
  readonly colors?: boolean | undefined;
}

const LEVEL_BADGES: Readonly<Record<LogLevel, string>> = {
  DEBUG: "DBG",
  INFO: "INF",
  WARNING: "WRN",
  ERROR: "ERR",
  CRITICAL: "CRT",
};

function paintLevel(c: Colors, level: LogLevel): string {
  const badge = LEVEL_BADGES[level];
  switch (level) {
    case "DEBUG":
      return c.gray(badge);
    case "INFO":
      return c.green(badge);
    case "WARNING":
      return c.yellow(badge);
    case "ERROR":
      return c.red(badge);
    case "CRITICAL":
      return c.bold(c.bgRed(c.white(badge)));
  }
}

/** `HH:MM:SS.mmm` slice of an ISO timestamp */
function clockTime(timestamp: string): string {
  const match = /T(\d{2}:\d{2}:\d{2}(?:\.\d+)?)/.exec(timestamp);
  return match?.[1] ?? timestamp;
}

export function formatConsole(record: LogRecord, options: ConsoleFormatOptions = {}): string {
  const c = options.colors === undefined ? pc : pc.createColors(options.colors);

  const pairs: string[] = [];
  for (const [key, value] of Object.entries(record.fields)) {
    pairs.push(`${c.dim(`${key}=`)}${renderFieldValue(value)}`);
  }
  if (record.traceId !== undefined) {
    pairs.push(`${c.dim("trace_id=")}${record.traceId}`);
  }

  const head = [
    c.dim(clockTime(record.timestamp)),
    paintLevel(c, record.level),
    c.cyan(record.component),
    c.bold(record.message),
  ].join(" ");

  return pairs.length > 0 ? `${head} ${pairs.join(" ")}` : head;
}
