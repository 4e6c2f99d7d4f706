import type { Output } from "../../interfaces/types.js";

export interface CapturedOutput {
  readonly output: Output;
  readonly out: string[];
  readonly err: string[];
}

export function captureOutput(): CapturedOutput {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    output: {
      log: (line) => {
        out.push(line);
      },
      error: (line) => {
        err.push(line);
      },
    },
  };
}
