import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { withSpan, withSpanSync } from "../../span-helpers.js";

describe("span helpers", () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    trace.disable(); // Clear any previous global provider
    provider.register();
  });

  afterEach(async () => {
    trace.disable();
    exporter.reset();
    await provider.shutdown();
  });

  describe("withSpan", () => {
    it("should create a named span with attributes and OK status", async () => {
      const result = await withSpan("test.operation", { "test.key": "value" }, async () => 42);

      const spans = exporter.getFinishedSpans();
      expect(result).toBe(42);
      expect(spans).toHaveLength(1);
      expect(spans[0]?.name).toBe("test.operation");
      expect(spans[0]?.attributes["test.key"]).toBe("value");
      expect(spans[0]?.status.code).toBe(SpanStatusCode.OK);
    });

    it("should record exception and set ERROR status on failure", async () => {
      await expect(
        withSpan("test.error", {}, async () => {
          throw new Error("test failure");
        }),
      ).rejects.toThrow("test failure");

      const spans = exporter.getFinishedSpans();
      expect(spans[0]?.status).toEqual({ code: SpanStatusCode.ERROR, message: "test failure" });
      expect(spans[0]?.events[0]?.name).toBe("exception");
    });

    it("should handle non-Error throws", async () => {
      await expect(
        withSpan("test.string-error", {}, async () => {
          throw "string error";
        }),
      ).rejects.toBe("string error");

      const spans = exporter.getFinishedSpans();
      expect(spans[0]?.status.message).toBe("string error");
      expect(spans[0]?.events).toHaveLength(0);
    });
  });

  describe("withSpanSync", () => {
    it("should return the value and end the span", () => {
      const result = withSpanSync("test.sync", { n: 1 }, () => "done");

      const spans = exporter.getFinishedSpans();
      expect(result).toBe("done");
      expect(spans[0]?.name).toBe("test.sync");
      expect(spans[0]?.ended).toBe(true);
    });

    it("should make the span active while the work runs", () => {
      const activeName = withSpanSync("test.active", {}, () => {
        const span = trace.getActiveSpan();
        return span?.spanContext().spanId;
      });

      expect(activeName).toBe(exporter.getFinishedSpans()[0]?.spanContext().spanId);
    });

    it("should always end the span even on error", () => {
      expect(() =>
        withSpanSync("test.always-end", {}, () => {
          throw new Error("fail");
        }),
      ).toThrow("fail");

      const spans = exporter.getFinishedSpans();
      expect(spans).toHaveLength(1);
      expect(spans[0]?.status.code).toBe(SpanStatusCode.ERROR);
    });
  });
});
