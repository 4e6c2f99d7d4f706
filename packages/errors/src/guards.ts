/**
 * Type guards for the error families + code-level discrimination.
 */

import type { LoglaneError } from "./base.js";
import type { ErrorCode } from "./catalog.js";
import { ConfigurationError } from "./configuration.js";
import { SinkError } from "./sink.js";

/** Check if an error is a ConfigurationError (bad settings, fatal at startup) */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/** Check if an error came from a sink (recovered locally, never fatal) */
export function isSinkError(error: unknown): error is SinkError {
  return error instanceof SinkError;
}

/**
 * Check if a LoglaneError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: LoglaneError,
  code: C,
): error is LoglaneError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for non-Loglane values.
 */
export function isExpectedError(error: unknown): boolean {
  if (
    error !== null &&
    typeof error === "object" &&
    "isExpected" in error &&
    typeof error.isExpected === "boolean"
  ) {
    return error.isExpected;
  }
  return false;
}
