/**
 * Append-only file sink.
 *
 * The file is opened once, at construction, in append mode. Each record is
 * rendered into a complete line and written with a single synchronous
 * write, so lines from one process never interleave and appear in emission
 * order.
 */

import { closeSync, fsyncSync, openSync, statSync, writeSync } from "node:fs";
import { dirname, resolve } from "node:path";
import {
  ConfigurationError,
  getErrorMessage,
  SinkDeliveryError,
  type ValidationIssue,
} from "@loglane/errors";
import { type ConsoleFormatOptions, createFormatter, type Formatter } from "../format/index.js";
import { isLevelEnabled, type LogLevel } from "../levels.js";
import { delivered, failed, skipped } from "../outcomes.js";
import type { FallbackReporter, LogFormat, LogRecord, SinkOutcome } from "../types.js";
import type { Sink } from "./types.js";

export interface FileSinkOptions {
  readonly filePath: string;
  readonly format: LogFormat;
  readonly level: LogLevel;
  readonly report: FallbackReporter;
  readonly consoleFormat?: ConsoleFormatOptions | undefined;
}

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

function pathIssue(code: string, message: string, value: string): ValidationIssue {
  return { field: "filePath", message, code, value };
}

export class FileSink implements Sink {
  readonly name = "file";
  readonly path: string;

  private fd: number | undefined;
  /** Set after a short write so the next record starts on a fresh line. */
  private lineOpen = false;
  private readonly level: LogLevel;
  private readonly format: Formatter;
  private readonly report: FallbackReporter;

  /**
   * @throws {ConfigurationError} when the parent directory is missing or the
   *   file cannot be opened for appending
   */
  constructor(options: FileSinkOptions) {
    this.path = resolve(options.filePath);
    this.level = options.level;
    this.format = createFormatter(options.format, options.consoleFormat);
    this.report = options.report;

    const directory = dirname(this.path);
    let isDirectory: boolean;
    try {
      isDirectory = statSync(directory).isDirectory();
    } catch (error) {
      throw new ConfigurationError(
        `log directory "${directory}" does not exist`,
        [pathIssue("directory_missing", getErrorMessage(error), options.filePath)],
        toError(error),
      );
    }
    if (!isDirectory) {
      throw new ConfigurationError(`"${directory}" is not a directory`, [
        pathIssue("not_a_directory", "parent is not a directory", options.filePath),
      ]);
    }

    try {
      this.fd = openSync(this.path, "a");
    } catch (error) {
      throw new ConfigurationError(
        `cannot open "${this.path}" for appending: ${getErrorMessage(error)}`,
        [pathIssue("not_writable", getErrorMessage(error), options.filePath)],
        toError(error),
      );
    }
  }

  get closed(): boolean {
    return this.fd === undefined;
  }

  deliver(record: LogRecord): Promise<SinkOutcome> {
    return Promise.resolve(this.write(record));
  }

  private write(record: LogRecord): SinkOutcome {
    if (this.fd === undefined) {
      return skipped("sink closed");
    }
    if (!isLevelEnabled(record.level, this.level)) {
      return skipped("below level");
    }

    let line: string;
    try {
      line = `${this.format(record)}\n`;
    } catch (error) {
      const failure = new SinkDeliveryError(
        this.name,
        `cannot render record: ${getErrorMessage(error)}`,
        toError(error),
      );
      return failed(failure.message, failure);
    }

    const text = this.lineOpen ? `\n${line}` : line;
    try {
      const written = writeSync(this.fd, text);
      const expected = Buffer.byteLength(text);
      if (written !== expected) {
        this.lineOpen = true;
        const failure = new SinkDeliveryError(
          this.name,
          `short write (${written} of ${expected} bytes)`,
        );
        return failed(failure.message, failure);
      }
      this.lineOpen = false;
      return delivered();
    } catch (error) {
      const failure = new SinkDeliveryError(this.name, getErrorMessage(error), toError(error));
      return failed(failure.message, failure);
    }
  }

  async flush(): Promise<void> {
    if (this.fd === undefined) {
      return;
    }
    try {
      fsyncSync(this.fd);
    } catch (error) {
      this.report(`sink:${this.name}`, `fsync failed for ${this.path}: ${getErrorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    const fd = this.fd;
    if (fd === undefined) {
      return;
    }
    this.fd = undefined;
    try {
      closeSync(fd);
    } catch (error) {
      this.report(`sink:${this.name}`, `close failed for ${this.path}: ${getErrorMessage(error)}`);
    }
  }
}
