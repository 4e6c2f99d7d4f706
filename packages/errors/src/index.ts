/**
 * @loglane/errors
 *
 * Shared error taxonomy for Loglane.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `instanceof` for family matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isLoglaneError, LoglaneError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export {
  describeError,
  getCatalogEntry,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

// ============================================================================
// ERROR CLASSES
// ============================================================================

export { ConfigurationError, InterfaceNotFoundError } from "./configuration.js";
export { InternalError } from "./internal.js";
export { ExportTimeoutError, SinkDeliveryError, SinkError } from "./sink.js";

export type { ValidationIssue } from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { hasCode, isConfigurationError, isExpectedError, isSinkError } from "./guards.js";
