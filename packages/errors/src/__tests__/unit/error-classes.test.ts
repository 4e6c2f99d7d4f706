import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  ExportTimeoutError,
  hasCode,
  InterfaceNotFoundError,
  InternalError,
  isConfigurationError,
  isError,
  isExpectedError,
  isLoglaneError,
  isSinkError,
  LoglaneError,
  SinkDeliveryError,
  SinkError,
} from "../../index.js";

describe("LoglaneError base class", () => {
  it("should create error with correct properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(LoglaneError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.httpStatus).toBe(500);
    expect(error.domain).toBe("internal");
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should support metadata and trace ID", () => {
    const error = new InternalError("With metadata", { key: "value" }, "trace-123");

    expect(error.metadata).toEqual({ key: "value" });
    expect(error.traceId).toBe("trace-123");
  });

  it("should serialize to JSON", () => {
    const error = new InternalError("JSON test", { key: "value" }, "trace-123");
    const json = error.toJSON();

    expect(json).toMatchObject({
      _tag: "InternalError",
      name: "InternalError",
      code: "INTERNAL_ERROR",
      message: "JSON test",
      domain: "internal",
      httpStatus: 500,
      isExpected: false,
      metadata: { key: "value" },
      traceId: "trace-123",
    });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
  });

  it("should omit absent metadata and trace ID from JSON", () => {
    const json = new InternalError("bare").toJSON();

    expect("metadata" in json).toBe(false);
    expect("traceId" in json).toBe(false);
  });
});

describe("ConfigurationError", () => {
  it("should prefix the message and carry issues", () => {
    const issues = [{ field: "filePath", message: "required", code: "required" }];
    const error = new ConfigurationError("file mode requires filePath", issues);

    expect(error.message).toBe("Invalid configuration: file mode requires filePath");
    expect(error.code).toBe("CONFIG_INVALID");
    expect(error.httpStatus).toBe(400);
    expect(error.isExpected).toBe(true);
    expect(error.issues).toEqual(issues);
  });

  it("should default to no issues", () => {
    expect(new ConfigurationError("bad").issues).toEqual([]);
  });

  it("should keep the cause", () => {
    const cause = new Error("EACCES");
    const error = new ConfigurationError("cannot open", [], cause);

    expect(error.cause).toBe(cause);
  });
});

describe("InterfaceNotFoundError", () => {
  it("should list available interfaces", () => {
    const error = new InterfaceNotFoundError("mcp", ["cli", "restapi"]);

    expect(error.message).toBe('Unknown interface type "mcp". Available: cli, restapi');
    expect(error.interfaceType).toBe("mcp");
    expect(error.available).toEqual(["cli", "restapi"]);
  });
});

describe("sink errors", () => {
  it("SinkDeliveryError should name the sink", () => {
    const error = new SinkDeliveryError("file", "EACCES");

    expect(error).toBeInstanceOf(SinkError);
    expect(error.message).toBe('Sink "file" delivery failed: EACCES');
    expect(error.sink).toBe("file");
    expect(error.code).toBe("SINK_DELIVERY_FAILED");
    expect(error.httpStatus).toBe(502);
  });

  it("ExportTimeoutError should carry the timeout", () => {
    const error = new ExportTimeoutError("otlp", 50);

    expect(error.message).toBe('Sink "otlp" export exceeded timeout of 50ms');
    expect(error.timeoutMs).toBe(50);
    expect(error._tag).toBe("TimeoutError");
  });
});

describe("guards", () => {
  it("should discriminate families", () => {
    expect(isConfigurationError(new ConfigurationError("x"))).toBe(true);
    expect(isConfigurationError(new Error("x"))).toBe(false);
    expect(isSinkError(new ExportTimeoutError("otlp", 10))).toBe(true);
    expect(isSinkError(new InternalError("x"))).toBe(false);
    expect(isLoglaneError(new InternalError("x"))).toBe(true);
    expect(isLoglaneError("x")).toBe(false);
    expect(isError(new Error("x"))).toBe(true);
  });

  it("hasCode should match the code", () => {
    const error = new ExportTimeoutError("otlp", 10);

    expect(hasCode(error, "SINK_EXPORT_TIMEOUT")).toBe(true);
    expect(hasCode(error, "SINK_DELIVERY_FAILED")).toBe(false);
  });

  it("isExpectedError should be false for plain values", () => {
    expect(isExpectedError(new ConfigurationError("x"))).toBe(true);
    expect(isExpectedError(new SinkDeliveryError("file", "x"))).toBe(false);
    expect(isExpectedError(new Error("x"))).toBe(false);
    expect(isExpectedError(null)).toBe(false);
  });
});
