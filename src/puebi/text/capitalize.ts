import { firstLetterIndex, isUpper, toCodePoints, toLowerRune, toUpperRune } from '../unicode.ts'

function isTerminal(ch: string): boolean {
  return ch === '.' || ch === '!' || ch === '?'
}

/** Uppercases the first letter of the text and the first letter after each `.`, `!` or `?`. */
export function capitalizeSentences(input: string): string {
  const r = toCodePoints(input)

  const first = firstLetterIndex(r, 0)
  if (first >= 0) {
    r[first] = toUpperRune(r[first]!)
  }

  for (let idx = 0; idx < r.length; idx++) {
    if (!isTerminal(r[idx]!)) continue
    const j = firstLetterIndex(r, idx + 1)
    if (j >= 0) {
      r[j] = toUpperRune(r[j]!)
    }
  }

  return r.join('')
}

/** First code point upper, the rest lower. */
export function titleWord(word: string): string {
  const rs = toCodePoints(word)
  return rs.map((ch, i) => (i === 0 ? toUpperRune(ch) : toLowerRune(ch))).join('')
}

export function titleCase(input: string): string {
  return input
    .split(/\s+/u)
    .filter((w) => w.length > 0)
    .map(titleWord)
    .join(' ')
}

export function isSentenceCapitalized(input: string): boolean {
  const s = input.trim()
  if (!s) return true

  const chars = toCodePoints(s)
  const i = firstLetterIndex(chars, 0)
  // Text without any letter (digits, symbols) has nothing to capitalize.
  return i < 0 || isUpper(chars[i]!)
}
