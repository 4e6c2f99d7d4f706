import { getObservability } from "@loglane/telemetry";
import { createSpySinkFactory, createTempDir, type TempDir } from "@loglane/test-utils";
import { writeFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { main, splitDotenvFlag } from "../../index.js";
import { captureOutput } from "../helpers/output.js";

describe("splitDotenvFlag", () => {
  it("should take the file from the next argument", () => {
    expect(splitDotenvFlag(["--dotenv", ".env.test", "status"])).toEqual({
      dotenv: ".env.test",
      rest: ["status"],
    });
  });

  it("should take the file after =", () => {
    expect(splitDotenvFlag(["help", "--dotenv=.env"])).toEqual({
      dotenv: ".env",
      rest: ["help"],
    });
  });

  it("should leave everything after -- alone", () => {
    expect(splitDotenvFlag(["--", "--dotenv", "x"])).toEqual({
      dotenv: undefined,
      rest: ["--", "--dotenv", "x"],
    });
  });
});

describe("main", () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it("should load the dotenv file before reading settings", async () => {
    const path = dir.file(".env");
    writeFileSync(path, "LOG_FILE_PATH=app.log\nOTEL_SERVICE_NAME=billing\n");
    const env: Record<string, string> = {};
    const { output, out } = captureOutput();

    const code = await main(["--dotenv", path, "status"], {
      env,
      output,
      pipeline: { sinkFactory: createSpySinkFactory() },
    });

    expect(code).toBe(0);
    expect(env).toEqual({ LOG_FILE_PATH: "app.log", OTEL_SERVICE_NAME: "billing" });
    expect(JSON.parse(out[0] ?? "")).toMatchObject({
      filePath: "app.log",
      serviceName: "billing",
    });
    expect(getObservability()).toBeUndefined();
  });

  it("should exit with 1 when the dotenv file is missing", async () => {
    const path = dir.file("missing.env");
    const { output, out, err } = captureOutput();

    const code = await main(["--dotenv", path], { env: {}, output });

    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^Invalid configuration: cannot read env file /);
  });
});
