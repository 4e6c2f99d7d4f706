import { loadSettings } from "@loglane/settings";
import { createPipeline, type Pipeline } from "@loglane/telemetry";
import { createSpySinkFactory, type SpySinkFactory } from "@loglane/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CliInterface, WELCOME_HINT, WELCOME_MESSAGE } from "../../index.js";
import { captureOutput } from "../helpers/output.js";

describe("CliInterface", () => {
  let factory: SpySinkFactory;
  let pipeline: Pipeline;

  beforeEach(() => {
    factory = createSpySinkFactory();
    pipeline = createPipeline(
      { mode: "file", filePath: "unused.log", level: "DEBUG" },
      { sinkFactory: factory },
    );
  });

  afterEach(async () => {
    await pipeline.close();
  });

  function createCli(env: Record<string, string> = {}) {
    const captured = captureOutput();
    const cli = new CliInterface({
      settings: loadSettings(env),
      logger: pipeline.getLogger("cli"),
      output: captured.output,
    });
    return { cli, ...captured };
  }

  it("should show the welcome message by default", async () => {
    const { cli, out, err } = createCli();

    expect(await cli.run([])).toBe(0);
    expect(out).toEqual([WELCOME_MESSAGE, WELCOME_HINT]);
    expect(err).toEqual([]);
  });

  it("should run the welcome command explicitly", async () => {
    const { cli, out } = createCli();

    expect(await cli.run(["welcome"])).toBe(0);
    expect(out).toEqual(["Welcome to Loglane!", "Type 'loglane help' for more information"]);
  });

  it("should list every command", async () => {
    const { cli, out } = createCli();

    expect(await cli.run(["help"])).toBe(0);
    expect(out).toEqual([
      "Available commands:",
      "  welcome  Show the welcome message",
      "  help     List the available commands, or describe one",
      "  status   Print the effective export configuration as JSON",
      "",
      "Use 'loglane help <command>' for help on a specific command.",
    ]);
  });

  it("should describe a single command", async () => {
    const { cli, out } = createCli();

    expect(await cli.run(["help", "status"])).toBe(0);
    expect(out).toEqual([
      "Command: status",
      "Usage: loglane status",
      "Description: Print the effective export configuration as JSON",
    ]);
  });

  it("should treat --help after a command as help for that command", async () => {
    const { cli, out } = createCli();

    expect(await cli.run(["status", "--help"])).toBe(0);
    expect(out[0]).toBe("Command: status");
  });

  it("should fail help for an unknown command", async () => {
    const { cli, out, err } = createCli();

    expect(await cli.run(["help", "deploy"])).toBe(1);
    expect(out).toEqual([]);
    expect(err[0]).toBe("Error: Unknown command 'deploy'");
  });

  it("should fail an unknown command on stderr and log it", async () => {
    const { cli, out, err } = createCli();

    expect(await cli.run(["deploy"])).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([
      "Error: Unknown command 'deploy'",
      "Run 'loglane help' to see all available commands.",
    ]);

    await pipeline.flush();
    const record = factory.file.records.find((r) => r.message === "unknown_command");
    expect(record?.level).toBe("WARNING");
    expect(record?.fields).toEqual({ command: "deploy" });
  });

  it("should print the export configuration derived from settings", async () => {
    const { cli, out } = createCli({
      LOG_FILE_PATH: "/var/log/app.log",
      OTEL_LOGS_EXPORT_MODE: "both",
      OTEL_EXPORT_BATCH_SIZE: "16",
    });

    expect(await cli.run(["status"])).toBe(0);
    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0] ?? "")).toMatchObject({
      mode: "both",
      filePath: "/var/log/app.log",
      endpoint: "http://localhost:4318",
      batchSize: 16,
      level: "INFO",
    });
  });

  it("should prefer the running pipeline's configuration", async () => {
    const captured = captureOutput();
    const cli = new CliInterface({
      settings: loadSettings({}),
      logger: pipeline.getLogger("cli"),
      output: captured.output,
      exportConfig: pipeline.config,
    });

    expect(await cli.run(["status"])).toBe(0);
    expect(JSON.parse(captured.out[0] ?? "")).toMatchObject({
      mode: "file",
      filePath: "unused.log",
      level: "DEBUG",
    });
  });

  it("should report an invalid configuration from status", async () => {
    const { cli, out, err } = createCli({
      OTEL_EXPORT_BATCH_SIZE: "10",
      OTEL_EXPORT_MAX_QUEUE_SIZE: "5",
    });

    expect(await cli.run(["status"])).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([
      "Invalid configuration: maxQueueSize (5) must be at least batchSize (10)",
    ]);
  });

  it("should time every command with the default settings", async () => {
    const { cli } = createCli();

    expect(await cli.run(["welcome"])).toBe(0);
    await pipeline.flush();

    expect(factory.file.messages).toEqual(["command_started", "performance"]);
    const record = factory.file.records[1];
    expect(record?.level).toBe("INFO");
    expect(record?.fields).toMatchObject({
      event: "performance",
      operation: "cli.welcome",
      outcome: "success",
    });
    expect(record?.fields).not.toHaveProperty("rss_mb");
  });

  it("should add memory fields when the profiler is active", async () => {
    const { cli } = createCli({ PROFILER_ACTIVE: "true", PROFILER_COLLECT_MEMORY: "true" });

    await cli.run(["welcome"]);
    await pipeline.flush();

    const record = factory.file.records.find((r) => r.message === "performance");
    expect(typeof record?.fields.rss_mb).toBe("number");
  });

  it("should leave memory fields out when only collection is enabled", async () => {
    const { cli } = createCli({ PROFILER_COLLECT_MEMORY: "true" });

    await cli.run(["welcome"]);
    await pipeline.flush();

    const record = factory.file.records.find((r) => r.message === "performance");
    expect(record?.fields).not.toHaveProperty("rss_mb");
  });
});
