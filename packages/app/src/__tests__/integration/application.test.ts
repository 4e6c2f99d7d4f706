import { getObservability, shutdownObservability } from "@loglane/telemetry";
import { createSpySinkFactory, type SpySinkFactory } from "@loglane/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Application, WELCOME_MESSAGE } from "../../index.js";
import { captureOutput } from "../helpers/output.js";

describe("Application", () => {
  let factory: SpySinkFactory;

  beforeEach(() => {
    factory = createSpySinkFactory();
  });

  afterEach(async () => {
    await shutdownObservability();
  });

  it("should run the CLI and shut the pipeline down", async () => {
    const { output, out } = captureOutput();
    const app = new Application({
      env: { LOG_FILE_PATH: "app.log" },
      pipeline: { sinkFactory: factory },
      output,
    });

    expect(await app.run([])).toBe(0);

    expect(out[0]).toBe(WELCOME_MESSAGE);
    expect(factory.file.messages).toEqual([
      "application_started",
      "performance",
      "application_stopped",
    ]);
    expect(factory.file.records[0]?.fields).toEqual({
      interface: "cli",
      mode: "file",
      sinks: ["file"],
    });
    expect(factory.file.records[2]?.fields).toEqual({ interface: "cli", exit_code: 0 });
    expect(factory.file.close).toHaveBeenCalledTimes(1);
    expect(getObservability()).toBeUndefined();
  });

  it("should pass the CLI exit code through", async () => {
    const { output, err } = captureOutput();
    const app = new Application({
      env: { LOG_FILE_PATH: "app.log" },
      pipeline: { sinkFactory: factory },
      output,
    });

    expect(await app.run(["deploy"])).toBe(1);
    expect(err[0]).toBe("Error: Unknown command 'deploy'");
    expect(factory.file.messages).toContain("unknown_command");
  });

  it("should print invalid settings and exit with 1", async () => {
    const { output, out, err } = captureOutput();
    const app = new Application({ env: { LOG_LEVEL: "loud" }, output });

    expect(await app.run([])).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([
      "Invalid configuration: LOG_LEVEL: Expected one of DEBUG, INFO, WARNING, ERROR, CRITICAL, received 'loud'",
    ]);
    expect(getObservability()).toBeUndefined();
  });

  it("should start with an empty environment", async () => {
    const { output, out, err } = captureOutput();
    const app = new Application({ env: {}, pipeline: { sinkFactory: factory }, output });

    expect(await app.run([])).toBe(0);
    expect(out[0]).toBe(WELCOME_MESSAGE);
    expect(err).toEqual([]);
    expect(factory.contexts.map((context) => context.config.filePath)).toEqual(["loglane.log"]);
  });

  it("should refuse an export config that does not resolve", async () => {
    const { output, err } = captureOutput();
    const app = new Application({
      env: { OTEL_EXPORT_BATCH_SIZE: "10", OTEL_EXPORT_MAX_QUEUE_SIZE: "5" },
      pipeline: { sinkFactory: factory },
      output,
    });

    expect(await app.run([])).toBe(1);
    expect(err).toEqual([
      "Invalid configuration: maxQueueSize (5) must be at least batchSize (10)",
    ]);
    expect(factory.contexts).toEqual([]);
  });

  it("should stop the REST interface on a stop signal", async () => {
    const { output } = captureOutput();
    const app = new Application({
      env: { INTERFACE_TYPE: "restapi", REST_PORT: "0", LOG_FILE_PATH: "app.log" },
      pipeline: { sinkFactory: factory },
      output,
      signals: ["SIGUSR2"],
    });

    const running = app.run([]);
    await vi.waitFor(() => expect(factory.file.messages).toContain("server_started"));
    process.emit("SIGUSR2");

    expect(await running).toBe(0);
    expect(factory.file.messages).toEqual([
      "application_started",
      "server_started",
      "signal_received",
      "server_stopped",
      "application_stopped",
    ]);
    expect(process.listenerCount("SIGUSR2")).toBe(0);
    expect(factory.file.close).toHaveBeenCalledTimes(1);
  });
});
