/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the Loglane packages maps to an HTTP status,
 * a domain and one of the behavioral base types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, config, sink
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // CONFIG ERRORS - Settings and pipeline construction
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid configuration",
    description: "A configuration value is missing or invalid",
  },
  INTERFACE_UNKNOWN: {
    domain: "config",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Unknown interface",
    description: "The requested interface type is not registered",
  },

  // ============================================================================
  // SINK ERRORS - Log record delivery
  // ============================================================================
  SINK_DELIVERY_FAILED: {
    domain: "sink",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "Sink delivery failed",
    description: "A log sink could not deliver a record to its destination",
  },
  SINK_EXPORT_TIMEOUT: {
    domain: "sink",
    httpStatus: 504,
    baseType: "TimeoutError",
    isExpected: false,
    title: "Sink export timed out",
    description: "A log export attempt exceeded its deadline",
  },
} as const;

export type ErrorCode = keyof typeof ERROR_CATALOG;

export type ErrorDomain = (typeof ERROR_CATALOG)[ErrorCode]["domain"];

export type HttpStatusCode = (typeof ERROR_CATALOG)[ErrorCode]["httpStatus"];

export interface ErrorCatalogEntry {
  readonly domain: ErrorDomain;
  readonly httpStatus: HttpStatusCode;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

/**
 * Error codes whose catalog entry maps to the given base type.
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
