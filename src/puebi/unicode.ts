// Code-point helpers. Strings are split with Array.from so that offsets count
// code points, not UTF-16 units.

const LETTER = /^\p{L}$/u;
const UPPER = /^\p{Lu}$/u;
const LOWER = /^\p{Ll}$/u;
const SPACE = /^\s$/u;

export function toCodePoints(input: string): string[] {
  return Array.from(input);
}

export function isLetter(ch: string): boolean {
  return LETTER.test(ch);
}

export function isUpper(ch: string): boolean {
  return UPPER.test(ch);
}

export function isLower(ch: string): boolean {
  return LOWER.test(ch);
}

export function isSpace(ch: string): boolean {
  return SPACE.test(ch);
}

// Case mappings that expand ("ß" -> "SS", "İ" -> "i̇") would shift every
// later offset, so those code points keep their original form.
function mapSingle(ch: string, mapped: string): string {
  return Array.from(mapped).length === 1 ? mapped : ch;
}

export function toUpperRune(ch: string): string {
  return mapSingle(ch, ch.toUpperCase());
}

export function toLowerRune(ch: string): string {
  return mapSingle(ch, ch.toLowerCase());
}

export function firstLetterIndex(chars: readonly string[], start: number): number {
  for (let i = Math.max(0, start); i < chars.length; i++) {
    if (isLetter(chars[i]!)) { return i; }
  }
  return -1;
}
