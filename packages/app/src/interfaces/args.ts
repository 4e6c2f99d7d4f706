/**
 * Minimal argument parser.
 */

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, string | boolean>>;
}

const ALIASES: Readonly<Record<string, string>> = {
  h: "help",
};

const BOOLEAN_FLAGS = new Set(["help"]);

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    const key = arg.startsWith("--")
      ? arg.slice(2)
      : arg.startsWith("-") && arg.length === 2
        ? (ALIASES[arg.slice(1)] ?? arg.slice(1))
        : undefined;

    const eq = key?.indexOf("=") ?? -1;

    if (key === undefined) {
      positionals.push(arg);
    } else if (eq > 0) {
      flags[key.slice(0, eq)] = key.slice(eq + 1);
    } else if (BOOLEAN_FLAGS.has(key)) {
      flags[key] = true;
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    }

    i++;
  }

  return { positionals, flags };
}
