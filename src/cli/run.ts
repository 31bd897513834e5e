import { parseArgs } from "node:util";

import { loadSanitizeOptionsFromEnv } from "../puebi/config.ts";
import { parseSanitizeOptions } from "../puebi/options.ts";
import { sanitize } from "../puebi/sanitize.ts";
import { isSentenceCapitalized, titleCase } from "../puebi/text/capitalize.ts";

export const SAMPLE_TEXT =
  "Hai luqman, Anda telah melakukan Transfer Real Time dari rekening 1234567890 sejumlah Rp 12.000. " +
  "Pastikan transaksi ini benar dilakukan atau Hubungi Call Center 1500 000.";

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: Record<string, string | undefined>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Returns the process exit code. */
export function runCli(argv: readonly string[], io: CliIo): number {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error: unknown) {
    io.stderr(`error: ${errorMessage(error)}`);
    return 2;
  }

  const text = parsed.positionals.length > 0 ? parsed.positionals.join(" ") : SAMPLE_TEXT;

  if (parsed.values.check) {
    io.stdout(String(isSentenceCapitalized(text)));
    return 0;
  }

  if (parsed.values.title) {
    io.stdout(titleCase(text));
    return 0;
  }

  const options = parseSanitizeOptions(loadSanitizeOptionsFromEnv(io.env ?? process.env));
  if (!options.ok) {
    io.stderr(`error: ${options.error.message}`);
    return 1;
  }

  io.stdout(sanitize(text, options.options));
  return 0;
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      check: { type: "boolean", default: false },
      title: { type: "boolean", default: false },
    },
  });
}
