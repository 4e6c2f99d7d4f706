import { LoglaneError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "./catalog.js";

// ---------------------------------------------------------------------------
// Base class for all sink errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for sink errors.
 *
 * Sink errors are recovered inside the sink that raised them; they surface
 * as a failed outcome and a fallback warning, never at the emitting call site.
 */
export abstract class SinkError extends LoglaneError {
  abstract readonly sink: string;
}

// ---------------------------------------------------------------------------
// Delivery failed (I/O or transport failure)
// ---------------------------------------------------------------------------

/**
 * A sink could not hand a record (or batch) to its destination.
 */
export class SinkDeliveryError extends SinkError {
  readonly _tag = "ExternalError" as const;
  readonly code = "SINK_DELIVERY_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly sink: string;

  constructor(sink: string, message: string, cause?: Error) {
    super(
      `Sink "${sink}" delivery failed: ${message}`,
      undefined,
      undefined,
      ...(cause ? [{ cause }] : []),
    );
    const entry = ERROR_CATALOG.SINK_DELIVERY_FAILED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.sink = sink;
  }
}

// ---------------------------------------------------------------------------
// Export timeout
// ---------------------------------------------------------------------------

/**
 * An export attempt did not settle within the configured timeout.
 */
export class ExportTimeoutError extends SinkError {
  readonly _tag = "TimeoutError" as const;
  readonly code = "SINK_EXPORT_TIMEOUT" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly sink: string;
  readonly timeoutMs: number;

  constructor(sink: string, timeoutMs: number) {
    super(`Sink "${sink}" export exceeded timeout of ${timeoutMs}ms`);
    const entry = ERROR_CATALOG.SINK_EXPORT_TIMEOUT;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.sink = sink;
    this.timeoutMs = timeoutMs;
  }
}
