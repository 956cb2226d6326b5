import { parseArgs } from "util";

/** Throws a TypeError on an unknown option or a missing option value. */
export function parseCliArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      model: { type: "string", short: "m" },
      dir: { type: "string", short: "d" },
      "no-stream": { type: "boolean" },
      "max-tokens": { type: "string" },
      temperature: { type: "string", short: "t" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });
}

export type CliArgs = ReturnType<typeof parseCliArgs>;
