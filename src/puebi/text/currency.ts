const RP_SPACED = /\brp\.?\s+(\d)/gi
const RP_GLUED = /\brp(\d)/gi

/** "rp 12.000", "Rp. 12.000", "RP 12.000", "rp12.000" -> "Rp12.000" */
export function fixIdrCurrency(input: string): string {
  return input.replace(RP_SPACED, 'Rp$1').replace(RP_GLUED, 'Rp$1')
}
