import { LoglaneError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "./catalog.js";

/**
 * Bugs and unknown thrown values. HTTP 500.
 */
export class InternalError extends LoglaneError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.INTERNAL_ERROR.httpStatus;
  readonly domain: ErrorDomain = ERROR_CATALOG.INTERNAL_ERROR.domain;
  readonly isExpected: boolean = ERROR_CATALOG.INTERNAL_ERROR.isExpected;
}
