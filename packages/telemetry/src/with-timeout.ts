/**
 * Per-export timeout utility.
 *
 * Wraps a promise with a deadline. Rejects with ExportTimeoutError if the
 * promise does not settle in time; the underlying work is not cancelled.
 */

import { ExportTimeoutError } from "@loglane/errors";

export function withTimeout<T>(promise: Promise<T>, ms: number, sinkName: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = globalThis.setTimeout(() => {
      reject(new ExportTimeoutError(sinkName, ms));
    }, ms);

    promise.then(
      (value) => {
        globalThis.clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        globalThis.clearTimeout(timer);
        reject(error);
      },
    );
  });
}
