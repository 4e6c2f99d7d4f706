import { existsSync, writeFileSync, writeSync } from "node:fs";
import { ConfigurationError, SinkDeliveryError } from "@loglane/errors";
import { collectWarnings, createTempDir, readLines, type TempDir } from "@loglane/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseJsonRecord } from "../../format/index.js";
import { createLogRecord } from "../../record.js";
import { FileSink, type FileSinkOptions } from "../../sinks/file-sink.js";

vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  return { ...actual, writeSync: vi.fn(actual.writeSync) };
});

const at = (ms: number) => () => Date.UTC(2026, 0, 1, 0, 0, 0, ms);

describe("FileSink", () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  function open(overrides: Partial<FileSinkOptions> = {}): FileSink {
    return new FileSink({
      filePath: dir.file("app.log"),
      format: "json",
      level: "INFO",
      report: collectWarnings().report,
      ...overrides,
    });
  }

  it("should create the file at construction", () => {
    open();

    expect(existsSync(dir.file("app.log"))).toBe(true);
  });

  it("should append one line per record, in order", async () => {
    const sink = open();
    const first = createLogRecord({ level: "INFO", message: "one", component: "c" }, at(1));
    const second = createLogRecord({ level: "ERROR", message: "two", component: "c" }, at(1));

    expect(await sink.deliver(first)).toEqual({ status: "delivered" });
    expect(await sink.deliver(second)).toEqual({ status: "delivered" });
    await sink.close();

    const lines = readLines(dir.file("app.log"));
    expect(lines.map((line) => parseJsonRecord(line))).toEqual([first, second]);
  });

  it("should keep existing content", async () => {
    writeFileSync(dir.file("app.log"), "previous\n");
    const sink = open();

    await sink.deliver(createLogRecord({ level: "INFO", message: "next", component: "c" }));
    await sink.close();

    const lines = readLines(dir.file("app.log"));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe("previous");
  });

  it("should skip records below its level", async () => {
    const sink = open({ level: "WARNING" });

    const outcome = await sink.deliver(
      createLogRecord({ level: "INFO", message: "quiet", component: "c" }),
    );
    await sink.close();

    expect(outcome).toEqual({ status: "skipped", reason: "below level" });
    expect(readLines(dir.file("app.log"))).toEqual([]);
  });

  it("should write the plain format", async () => {
    const sink = open({ format: "plain" });

    await sink.deliver(
      createLogRecord({ level: "INFO", message: "started", component: "api" }, at(5)),
    );
    await sink.close();

    expect(readLines(dir.file("app.log"))).toEqual([
      "timestamp=2026-01-01T00:00:00.005Z level=INFO component=api message=started",
    ]);
  });

  it("should raise ConfigurationError when the directory is missing", () => {
    expect(() => open({ filePath: dir.file("missing/app.log") })).toThrow(ConfigurationError);
  });

  it("should raise ConfigurationError when the parent is a file", () => {
    writeFileSync(dir.file("plain-file"), "");

    expect(() => open({ filePath: dir.file("plain-file/app.log") })).toThrow(
      /is not a directory/,
    );
  });

  it("should skip deliveries after close and tolerate double close", async () => {
    const sink = open();
    await sink.close();
    await sink.close();

    const outcome = await sink.deliver(
      createLogRecord({ level: "ERROR", message: "late", component: "c" }),
    );

    expect(sink.closed).toBe(true);
    expect(outcome).toEqual({ status: "skipped", reason: "sink closed" });
  });

  it("should report a failed outcome when rendering fails", async () => {
    const sink = open();
    const hostile = {
      get value(): never {
        throw new Error("getter exploded");
      },
    };

    const outcome = await sink.deliver(
      createLogRecord({ level: "INFO", message: "m", component: "c", fields: { hostile } }),
    );
    await sink.close();

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.error).toBeInstanceOf(SinkDeliveryError);
      expect(outcome.reason).toBe(
        'Sink "file" delivery failed: cannot render record: getter exploded',
      );
    }
  });

  it.runIf(existsSync("/dev/full"))("should report a failed outcome on a write error", async () => {
    const sink = open({ filePath: "/dev/full" });

    const outcome = await sink.deliver(
      createLogRecord({ level: "INFO", message: "m", component: "c" }),
    );
    await sink.close();

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.error).toBeInstanceOf(SinkDeliveryError);
      expect(outcome.reason).toMatch(/^Sink "file" delivery failed: ENOSPC/);
    }
  });

  it("should report a failed outcome without throwing when the descriptor is gone", async () => {
    const sink = open();
    vi.mocked(writeSync).mockImplementationOnce(() => {
      throw Object.assign(new Error("EBADF: bad file descriptor, write"), { code: "EBADF" });
    });

    const delivery = sink.deliver(createLogRecord({ level: "INFO", message: "m", component: "c" }));

    await expect(delivery).resolves.toMatchObject({
      status: "failed",
      reason: 'Sink "file" delivery failed: EBADF: bad file descriptor, write',
    });
    const outcome = await delivery;
    if (outcome.status === "failed") {
      expect(outcome.error).toBeInstanceOf(SinkDeliveryError);
    }
    await sink.close();
  });

  it("should fail a short write and start the next record on a fresh line", async () => {
    const actual = await vi.importActual<typeof import("node:fs")>("node:fs");
    const sink = open();
    vi.mocked(writeSync).mockImplementationOnce((fd, text) =>
      actual.writeSync(fd, text.slice(0, 3)),
    );

    const first = await sink.deliver(
      createLogRecord({ level: "INFO", message: "cut", component: "c" }, at(1)),
    );
    const second = await sink.deliver(
      createLogRecord({ level: "INFO", message: "after", component: "c" }, at(2)),
    );
    await sink.close();

    expect(first.status).toBe("failed");
    if (first.status === "failed") {
      expect(first.error).toBeInstanceOf(SinkDeliveryError);
      expect(first.reason).toMatch(/^Sink "file" delivery failed: short write \(3 of \d+ bytes\)$/);
    }
    expect(second).toEqual({ status: "delivered" });
    const lines = readLines(dir.file("app.log"));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe('{"t');
    expect(parseJsonRecord(lines[1] ?? "")?.message).toBe("after");
  });
});
