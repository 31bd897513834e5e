const REAL_TIME = /\bReal[ -]?Time\b/gi
const TRANSFER_REAL_TIME = /\bTransfer\s+real time\b/gi

// "Real Time" is a common noun phrase; it runs before sentence
// capitalization so a sentence opening with it is still capitalized.
export function normalizeRealTime(input: string): string {
  return input
    .replace(REAL_TIME, 'real time')
    .replace(TRANSFER_REAL_TIME, 'transfer real time')
}
