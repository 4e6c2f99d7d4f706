/**
 * Last-resort channel for the pipeline's own failures.
 *
 * Writes to stderr via console.warn and never re-enters the pipeline, so a
 * failing sink cannot recurse into itself.
 */

import type { FallbackReporter } from "./types.js";

export const consoleFallbackReporter: FallbackReporter = (tag, message) => {
  console.warn(`[${tag}] ${message}`);
};

/**
 * Wraps a caller-supplied reporter so that a throwing reporter degrades to
 * the console instead of escaping into the emit path.
 */
export function guardReporter(reporter: FallbackReporter | undefined): FallbackReporter {
  if (reporter === undefined) {
    return consoleFallbackReporter;
  }
  return (tag, message) => {
    try {
      reporter(tag, message);
    } catch (error) {
      consoleFallbackReporter(tag, message);
      consoleFallbackReporter(
        "loglane",
        `onInternalWarning threw: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  };
}
