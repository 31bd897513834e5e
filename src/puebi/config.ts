import type { SanitizeOptions } from "./options.ts";

type Env = Record<string, string | undefined>;

export function parseListEnv(env: Env, name: string): string[] | undefined {
  const raw = String(env[name] || "").trim();
  if (!raw) { return undefined; }
  const items = raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

export function parseIntEnv(env: Env, name: string): number | undefined {
  const raw = String(env[name] || "").trim();
  if (!raw) { return undefined; }
  // NaN and fractions are left for option validation to reject.
  return Number(raw);
}

export function parseBoolEnv(env: Env, name: string): boolean | undefined {
  const raw = String(env[name] || "").trim().toLowerCase();
  if (raw === "1" || raw === "true" || raw === "yes") { return true; }
  if (raw === "0" || raw === "false" || raw === "no") { return false; }
  return undefined;
}

/** Sanitize options from PUEBI_* variables. Unset variables are left out. */
export function loadSanitizeOptionsFromEnv(env: Env = process.env): SanitizeOptions {
  const opts: SanitizeOptions = {};

  const exceptions = parseListEnv(env, "PUEBI_EXTRA_EXCEPTIONS");
  if (exceptions) { opts.exceptions = exceptions; }

  const protectedHeads = parseListEnv(env, "PUEBI_EXTRA_HEADS");
  if (protectedHeads) { opts.protectedHeads = protectedHeads; }

  const greetingNameLimit = parseIntEnv(env, "PUEBI_GREETING_NAME_LIMIT");
  if (greetingNameLimit !== undefined) { opts.greetingNameLimit = greetingNameLimit; }

  const protectGreetingName = parseBoolEnv(env, "PUEBI_PROTECT_GREETING_NAME");
  if (protectGreetingName !== undefined) { opts.protectGreetingName = protectGreetingName; }

  return opts;
}
