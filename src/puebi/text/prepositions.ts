const LOCATIVES = ['luar', 'dalam', 'atas', 'bawah', 'depan', 'belakang', 'samping', 'antara']
const PLACES = ['rumah', 'kantor', 'sekolah', 'pasar', 'bank', 'jalan', 'masjid', 'gereja', 'kampus']
const DI_ONLY = ['tiap', 'setiap', 'mana', 'sini', 'situ', 'sana']

interface Rewrite {
  pattern: RegExp
  replacement: string
}

function splitPrefix(prefix: string, word: string): Rewrite {
  return { pattern: new RegExp(`\\b${prefix}${word}\\b`, 'g'), replacement: `${prefix} ${word}` }
}

const REWRITES: readonly Rewrite[] = [
  ...[...LOCATIVES, ...PLACES].flatMap((w) => [splitPrefix('di', w), splitPrefix('ke', w)]),
  { pattern: /\b[Kk]e pada\b/g, replacement: 'kepada' },
  { pattern: /\b[Dd]ari pada\b/g, replacement: 'daripada' },
  ...DI_ONLY.map((w) => splitPrefix('di', w)),
]

/** "dirumah" -> "di rumah", "ke pada" -> "kepada", "dari pada" -> "daripada". */
export function fixCommonPrepositions(input: string): string {
  return REWRITES.reduce((s, r) => s.replace(r.pattern, r.replacement), input)
}
