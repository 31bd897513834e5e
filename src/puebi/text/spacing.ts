const MULTI_WS = /\s+/g
const SPACE_BEFORE_PUNCT = /\s+([,.;:!?])/g
const PUNCT_WITHOUT_SPACE = /([,;:!?])([^\s)])/g
// Leaves simple decimals ("12.000", "3.5") and ellipses alone.
const DOT_WITHOUT_SPACE = /(?<!\d)\.(?=[^\d\s).])/g
const OPEN_PAREN_SPACES = /\(\s+/g
const CLOSE_PAREN_SPACES = /\s+\)/g

const MULTI_DOTS = /\.{3,}|…/g
const ELLIPSIS_NO_LEFT_SPACE = /([^ \t\n\r(["'])\.{3}/g
const ELLIPSIS_NO_RIGHT_SPACE = /\.{3}([^ \t\n\r)\]"'».,;:!?])/g

const SPACE_BEFORE_QUOTE = /\s+(['"])/g
const SPACE_AFTER_QUOTE = /(['"])\s+/g

const EM_DASH = /\s*—\s*/g

export function normalizeSpaces(input: string): string {
  let s = input.replace(MULTI_WS, ' ')
  s = s.replace(SPACE_BEFORE_PUNCT, '$1')
  return s
}

export function fixPunctuationSpacing(input: string): string {
  let s = input.replace(SPACE_BEFORE_PUNCT, '$1')

  s = s.replace(MULTI_DOTS, '...')
  s = s.replace(ELLIPSIS_NO_LEFT_SPACE, '$1 ...')
  s = s.replace(ELLIPSIS_NO_RIGHT_SPACE, '... $1')

  s = s.replace(PUNCT_WITHOUT_SPACE, '$1 $2')
  s = s.replace(DOT_WITHOUT_SPACE, '. ')

  s = s.replace(OPEN_PAREN_SPACES, '(')
  s = s.replace(CLOSE_PAREN_SPACES, ')')

  // Quotes hug their content on both sides; nothing forces a space after a
  // closing quote.
  s = s.replace(SPACE_BEFORE_QUOTE, '$1')
  s = s.replace(SPACE_AFTER_QUOTE, '$1')

  s = s.replace(EM_DASH, '—')

  return s.replace(MULTI_WS, ' ')
}
