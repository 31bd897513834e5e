import type { Lexicon } from "./types.ts";

export const GREETING = "Hai";

// Heads of proper names ("Jalan Sudirman", "Bank Indonesia", "RS Harapan").
// A head keeps the capital on the word right after it, and only that word.
export const DEFAULT_PROTECTED_HEADS: ReadonlySet<string> = new Set([
  "Jalan",
  "Gunung",
  "Sungai",
  "Danau",
  "Kota",
  "Provinsi",
  "Universitas",
  "Institut",
  "Sekolah",
  "Rumah",
  "Bank",
  "PT",
  "CV",
  "RS",
  GREETING,
]);

// Words that stay capitalized anywhere in a sentence. Generic heads such as
// "Bank" belong in DEFAULT_PROTECTED_HEADS, not here.
export const DEFAULT_EXCEPTIONS: ReadonlySet<string> = new Set([
  "Indonesia",
  "Jakarta",
  "Sahabat",
  "Sampoerna",
  "Call",
  "Center",
  "ATM",
  "KTP",
  "BI",
  "BNI",
  "BCA",
]);

export const DEFAULT_LEXICON: Lexicon = {
  exceptions: DEFAULT_EXCEPTIONS,
  protectedHeads: DEFAULT_PROTECTED_HEADS,
};

export interface LexiconExtras {
  exceptions?: readonly string[];
  protectedHeads?: readonly string[];
}

function extend(base: ReadonlySet<string>, extra: readonly string[] | undefined): ReadonlySet<string> {
  if (!extra || extra.length === 0) { return base; }
  return new Set([...base, ...extra]);
}

export function createLexicon(extras?: LexiconExtras): Lexicon {
  if (!extras) { return DEFAULT_LEXICON; }
  return {
    exceptions: extend(DEFAULT_EXCEPTIONS, extras.exceptions),
    protectedHeads: extend(DEFAULT_PROTECTED_HEADS, extras.protectedHeads),
  };
}
