import { describe, expect, it } from "vitest";
import { createLogRecord, DROPPED_RESERVED_KEYS_FIELD } from "../../record.js";

const FIXED_MS = Date.UTC(2026, 0, 2, 3, 4, 5, 678);
const fixedClock = () => FIXED_MS;

describe("createLogRecord", () => {
  it("should stamp an ISO-8601 UTC timestamp", () => {
    const record = createLogRecord(
      { level: "INFO", message: "started", component: "api" },
      fixedClock,
    );

    expect(record.timestamp).toBe("2026-01-02T03:04:05.678Z");
    expect(record.fields).toEqual({});
    expect("traceId" in record).toBe(false);
  });

  it("should default to the wall clock", () => {
    const before = Date.now();
    const record = createLogRecord({ level: "INFO", message: "now", component: "api" });
    const after = Date.now();

    const stamped = Date.parse(record.timestamp);
    expect(stamped).toBeGreaterThanOrEqual(before - 1_000);
    expect(stamped).toBeLessThanOrEqual(after + 1_000);
  });

  it("should freeze the record and its fields", () => {
    const record = createLogRecord(
      { level: "INFO", message: "m", component: "c", fields: { a: 1 } },
      fixedClock,
    );

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.fields)).toBe(true);
  });

  it("should not alias the caller's fields object", () => {
    const fields: Record<string, unknown> = { a: 1 };
    const record = createLogRecord({ level: "INFO", message: "m", component: "c", fields });
    fields.a = 2;

    expect(record.fields.a).toBe(1);
  });

  it("should drop reserved keys and list them", () => {
    const record = createLogRecord(
      {
        level: "WARNING",
        message: "real message",
        component: "c",
        fields: { message: "impostor", level: "DEBUG", user: "u-1" },
      },
      fixedClock,
    );

    expect(record.message).toBe("real message");
    expect(record.level).toBe("WARNING");
    expect(record.fields).toEqual({
      user: "u-1",
      [DROPPED_RESERVED_KEYS_FIELD]: ["message", "level"],
    });
  });

  it("should carry trace ids when given", () => {
    const record = createLogRecord(
      { level: "INFO", message: "m", component: "c", traceId: "t", spanId: "s" },
      fixedClock,
    );

    expect(record.traceId).toBe("t");
    expect(record.spanId).toBe("s");
  });

  it("should keep both records when timestamps collide", () => {
    const first = createLogRecord({ level: "INFO", message: "one", component: "c" }, fixedClock);
    const second = createLogRecord({ level: "INFO", message: "two", component: "c" }, fixedClock);

    expect(first.timestamp).toBe(second.timestamp);
    expect(first).not.toBe(second);
  });
});
