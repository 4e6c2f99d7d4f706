export const PACKAGE_NAME = "@loglane/test-utils" as const;

export { FailingLogExporter, FlakyLogExporter, HangingLogExporter } from "./exporters.js";
export {
  collectWarnings,
  createTempDir,
  readLines,
  type TempDir,
  type Warning,
  type WarningCollector,
} from "./fixtures.js";
export { createSpySinkFactory, SpySink, type SpySinkFactory } from "./sinks.js";
