import { LoglaneError } from "./base.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";
import { InternalError } from "./internal.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return code in ERROR_CATALOG;
}

/**
 * Wrap an unknown error into a LoglaneError.
 * If the error is already a LoglaneError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown, traceId?: string): LoglaneError {
  if (error instanceof LoglaneError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, traceId, {
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message, undefined, traceId);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * One-line `Name: message` description, as written into log fields.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return getErrorMessage(error);
}
