import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FallbackReporter } from "@loglane/telemetry";

export interface TempDir {
  readonly path: string;
  /** Absolute path of `name` inside the directory */
  file(name: string): string;
  cleanup(): void;
}

export function createTempDir(prefix = "loglane-test-"): TempDir {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    file: (name) => join(path, name),
    cleanup: () => {
      rmSync(path, { recursive: true, force: true });
    },
  };
}

/** Non-empty lines of a text file */
export function readLines(path: string): string[] {
  return readFileSync(path, "utf8")
    .split("\n")
    .filter((line) => line.length > 0);
}

export interface Warning {
  readonly tag: string;
  readonly message: string;
}

export interface WarningCollector {
  readonly report: FallbackReporter;
  readonly warnings: Warning[];
}

/** Captures fallback warnings instead of printing them */
export function collectWarnings(): WarningCollector {
  const warnings: Warning[] = [];
  return {
    warnings,
    report: (tag, message) => {
      warnings.push({ tag, message });
    },
  };
}
