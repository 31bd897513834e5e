import { z } from "zod";

import { DEFAULT_GREETING_NAME_LIMIT } from "./text/greeting.ts";

const wordListSchema = z.array(z.string().trim().min(1).regex(/^\S+$/u, "must be a single word"));

export const sanitizeOptionsSchema = z
  .object({
    exceptions: wordListSchema.optional().describe("Extra words that keep their capital anywhere"),
    protectedHeads: wordListSchema.optional().describe("Extra heads that protect the following word"),
    greetingNameLimit: z.number().int().min(0).max(16).optional(),
    protectGreetingName: z.boolean().optional(),
  })
  .strict();

export type SanitizeOptions = z.input<typeof sanitizeOptionsSchema>;

export interface ResolvedSanitizeOptions {
  exceptions: string[];
  protectedHeads: string[];
  greetingNameLimit: number;
  protectGreetingName: boolean;
}

export interface PuebiError {
  kind: string;
  message: string;
  details?: Array<{ field: string; message: string }>;
}

export type ParseOptionsResult =
  | { ok: true; options: ResolvedSanitizeOptions }
  | { ok: false; error: PuebiError };

export function parseSanitizeOptions(input: unknown): ParseOptionsResult {
  const parsed = sanitizeOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => ({
      field: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    return {
      ok: false,
      error: {
        kind: "invalid_options",
        message: `Invalid sanitize options: ${details.map((d) => `${d.field}: ${d.message}`).join("; ")}`,
        details,
      },
    };
  }

  const value = parsed.data;
  return {
    ok: true,
    options: {
      exceptions: value.exceptions ?? [],
      protectedHeads: value.protectedHeads ?? [],
      greetingNameLimit: value.greetingNameLimit ?? DEFAULT_GREETING_NAME_LIMIT,
      protectGreetingName: value.protectGreetingName ?? true,
    },
  };
}

export function resolveSanitizeOptionsOrThrow(input: unknown): ResolvedSanitizeOptions {
  const result = parseSanitizeOptions(input);
  if (!result.ok) {
    const error = new Error(result.error.message) as Error & { code?: string; details?: PuebiError["details"] };
    error.code = "INVALID_SANITIZE_OPTIONS";
    error.details = result.error.details;
    throw error;
  }
  return result.options;
}
