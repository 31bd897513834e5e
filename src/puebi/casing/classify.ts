import { isLetter, isLower, isUpper, toCodePoints } from "../unicode.ts";
import type { Lexicon, WordClass } from "./types.ts";

export function isAllCaps(word: string): boolean {
  let hasLetter = false;
  for (const ch of word) {
    if (!isLetter(ch)) { continue; }
    hasLetter = true;
    if (!isUpper(ch)) { return false; }
  }
  return hasLetter;
}

export function isTitleCase(word: string): boolean {
  const chars = toCodePoints(word);
  if (chars.length === 0 || !isUpper(chars[0]!)) { return false; }
  return chars.slice(1).every((ch) => !isLetter(ch) || isLower(ch));
}

/**
 * Resolves a token's class by precedence: the protecting classes win over
 * TitleCase, so a word matching several of them is never lowered.
 * `previous` is the exact text of the token before it, if any.
 */
export function classifyWord(word: string, previous: string | null, lexicon: Lexicon): WordClass {
  if (isAllCaps(word)) { return "AllCaps"; }
  if (lexicon.exceptions.has(word)) { return "Exception"; }
  if (previous !== null && lexicon.protectedHeads.has(previous)) { return "ProtectedSuccessor"; }
  if (isTitleCase(word)) { return "TitleCase"; }
  return "Other";
}
