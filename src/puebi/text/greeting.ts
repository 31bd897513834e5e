import type { Span } from '../casing/types.ts'
import { GREETING } from '../casing/lexicon.ts'
import { isLetter, toCodePoints } from '../unicode.ts'
import { titleWord } from './capitalize.ts'

export const DEFAULT_GREETING_NAME_LIMIT = 4

// "Hai" + whitespace + everything up to the first closing punctuation.
const GREETING_RUN = new RegExp(`\\b${GREETING}\\b(\\s+)([^\\n\\r,.!?;:()]+)`, 'g')

export interface GreetingNameResult {
  text: string
  /**
   * Code-point spans of the name runs in `text` that are closed by `,`, `!`
   * or `?` and fit within the limit. A run ending anywhere else may carry
   * ordinary words after the name, so it gets no span.
   */
  nameSpans: Span[]
}

function isNameToken(token: string): boolean {
  for (const ch of token) {
    if (!isLetter(ch) && ch !== "'" && ch !== '-') return false
  }
  return true
}

const NAME_CLOSERS = new Set([',', '!', '?'])

function capitalizeNameRun(run: string, limit: number): { run: string; length: number; tokens: number } {
  let seen = 0
  let lastEnd = 0
  const rewritten = run.replace(/\S+/g, (token, offset: number) => {
    seen += 1
    if (seen > limit) return token
    lastEnd = offset + token.length
    return isNameToken(token) ? titleWord(token) : token
  })
  // Case mapping is per code point, so lengths before and after agree.
  return { run: rewritten, length: toCodePoints(rewritten.slice(0, lastEnd)).length, tokens: seen }
}

/**
 * Capitalizes up to `limit` tokens of the name that follows the greeting:
 * "Hai luqmanul hakim," -> "Hai Luqmanul Hakim,". Tokens with digits or
 * symbols are left as they are.
 */
export function capitalizeGreetingName(input: string, limit = DEFAULT_GREETING_NAME_LIMIT): GreetingNameResult {
  const nameSpans: Span[] = []
  let cursor = 0
  let cursorCodePoints = 0

  const text = input.replace(GREETING_RUN, (match: string, gap: string, run: string, offset: number) => {
    const capitalized = capitalizeNameRun(run, limit)
    const closed = NAME_CLOSERS.has(input.charAt(offset + match.length)) && capitalized.tokens <= limit
    const runStart = offset + GREETING.length + gap.length

    cursorCodePoints += toCodePoints(input.slice(cursor, runStart)).length
    cursor = runStart
    if (closed && capitalized.length > 0) {
      nameSpans.push({ start: cursorCodePoints, end: cursorCodePoints + capitalized.length })
    }

    return `${GREETING}${gap}${capitalized.run}`
  })

  return { text, nameSpans }
}
