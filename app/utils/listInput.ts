/** Split a comma-separated field into trimmed, non-empty entries. */
export const parseCommaList = (value: string): string[] =>
  value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)

export interface NamedQuantity {
  name: string
  value: number
}

/**
 * Parse `name:value` tokens such as `arabinose:10, IPTG:0.5`. Tokens without a
 * colon or with a non-numeric value are skipped.
 */
export const parseNamedQuantities = (value: string): NamedQuantity[] => {
  const quantities: NamedQuantity[] = []
  for (const token of parseCommaList(value)) {
    const separator = token.indexOf(':')
    if (separator < 0) continue
    const raw = token.slice(separator + 1).trim()
    const parsed = raw === '' ? Number.NaN : Number(raw)
    if (!Number.isFinite(parsed)) continue
    quantities.push({ name: token.slice(0, separator).trim(), value: parsed })
  }
  return quantities
}
