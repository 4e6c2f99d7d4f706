/**
 * Entry point behind the `loglane` bin:
 *
 *   loglane [--dotenv <file>] [command...]
 */

import { isConfigurationError } from "@loglane/errors";
import { loadDotenv } from "@loglane/settings";
import { Application, type ApplicationOptions } from "./application.js";

export interface MainOptions extends Omit<ApplicationOptions, "env"> {
  /** Receives variables from `--dotenv`. Defaults to `process.env`. */
  readonly env?: Record<string, string> | undefined;
}

export interface SplitArgs {
  readonly dotenv: string | undefined;
  readonly rest: readonly string[];
}

/**
 * Pulls `--dotenv <file>` (or `--dotenv=<file>`) out of `argv`, leaving the
 * rest for the interface.
 */
export function splitDotenvFlag(argv: readonly string[]): SplitArgs {
  const rest: string[] = [];
  let dotenv: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      rest.push(...argv.slice(i));
      break;
    }
    if (arg === "--dotenv") {
      dotenv = argv[i + 1];
      i++;
    } else if (arg.startsWith("--dotenv=")) {
      dotenv = arg.slice("--dotenv=".length);
    } else {
      rest.push(arg);
    }
  }

  return { dotenv, rest };
}

export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const { dotenv, rest } = splitDotenvFlag(argv);
  const output = options.output ?? console;

  if (dotenv !== undefined) {
    try {
      loadDotenv(dotenv, options.env);
    } catch (error) {
      if (!isConfigurationError(error)) throw error;
      output.error(error.message);
      return 1;
    }
  }

  return new Application({ ...options, output }).run(rest);
}
