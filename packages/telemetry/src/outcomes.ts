import type { SinkOutcome } from "./types.js";

const DELIVERED: SinkOutcome = Object.freeze({ status: "delivered" });
const QUEUED: SinkOutcome = Object.freeze({ status: "queued" });

export function delivered(): SinkOutcome {
  return DELIVERED;
}

export function queued(): SinkOutcome {
  return QUEUED;
}

export function skipped(reason: string): SinkOutcome {
  return { status: "skipped", reason };
}

export function failed(reason: string, error?: Error): SinkOutcome {
  return error === undefined ? { status: "failed", reason } : { status: "failed", reason, error };
}
