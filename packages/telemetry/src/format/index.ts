import type { LogFormat, LogRecord } from "../types.js";
import { type ConsoleFormatOptions, formatConsole } from "./console.js";
import { formatJson } from "./json.js";
import { formatPlain } from "./plain.js";

export type { ConsoleFormatOptions } from "./console.js";
export { formatConsole } from "./console.js";
export { formatJson, parseJsonRecord } from "./json.js";
export { formatPlain } from "./plain.js";
export { renderFieldValue, safeStringify } from "./value.js";

/** Renders one record as a single line, without the trailing newline */
export type Formatter = (record: LogRecord) => string;

export function formatRecord(
  record: LogRecord,
  format: LogFormat,
  options: ConsoleFormatOptions = {},
): string {
  return createFormatter(format, options)(record);
}

export function createFormatter(format: LogFormat, options: ConsoleFormatOptions = {}): Formatter {
  switch (format) {
    case "json":
      return formatJson;
    case "plain":
      return formatPlain;
    case "console":
      return (record) => formatConsole(record, options);
  }
}
