import { LoglaneError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "./catalog.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

/**
 * Thrown when settings or an export configuration are invalid.
 *
 * Fatal: raised while a pipeline or interface is being constructed, never
 * while records are being emitted.
 */
export class ConfigurationError extends LoglaneError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CONFIG_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  /** Every problem found, not only the first */
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = [], cause?: Error) {
    super(
      `Invalid configuration: ${message}`,
      undefined,
      undefined,
      ...(cause ? [{ cause }] : []),
    );
    const entry = ERROR_CATALOG.CONFIG_INVALID;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Interface unknown
// ---------------------------------------------------------------------------

/**
 * Thrown when the interface factory is asked for a type it does not know.
 */
export class InterfaceNotFoundError extends LoglaneError {
  readonly _tag = "ValidationError" as const;
  readonly code = "INTERFACE_UNKNOWN" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly interfaceType: string;
  readonly available: readonly string[];

  constructor(interfaceType: string, available: readonly string[]) {
    super(`Unknown interface type "${interfaceType}". Available: ${available.join(", ")}`);
    const entry = ERROR_CATALOG.INTERFACE_UNKNOWN;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.interfaceType = interfaceType;
    this.available = available;
  }
}
