import { isLetter } from "../unicode.ts";
import type { Span, WordToken } from "./types.ts";

// Only \p{L} counts: apostrophes and hyphens split "Jean-Paul" into two
// tokens, each judged on its own.
export function tokenizeWords(chars: readonly string[], sentence: Span): WordToken[] {
  const out: WordToken[] = [];
  const len = sentence.end - sentence.start;
  let k = 0;
  while (k < len) {
    while (k < len && !isLetter(chars[sentence.start + k]!)) { k++; }
    const start = k;
    while (k < len && isLetter(chars[sentence.start + k]!)) { k++; }
    if (k > start) { out.push({ start, end: k }); }
  }
  return out;
}
