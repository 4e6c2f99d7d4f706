import type { ErrorCode, ErrorDomain, HttpStatusCode } from "./catalog.js";

/**
 * Wire shape produced by {@link LoglaneError.toJSON}.
 */
export interface ErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Readonly<Record<string, string>>;
  readonly traceId?: string;
}

/**
 * Abstract root of every Loglane error.
 *
 * Subclasses pin `code` to a catalog entry and copy its status, domain and
 * expectedness. Use `error.code === "XXX"` for fine-grained matching, or
 * `instanceof` for category matching.
 */
export abstract class LoglaneError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Readonly<Record<string, string>> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata !== undefined ? { metadata: this.metadata } : {}),
      ...(this.traceId !== undefined ? { traceId: this.traceId } : {}),
    };
  }
}

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

export function isLoglaneError(value: unknown): value is LoglaneError {
  return value instanceof LoglaneError;
}
