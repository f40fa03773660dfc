// purpose: assign the colour-coding promoter category for a timeline segment
// status: experimental

export type PromoterKind =
  | 'T7T3'
  | 'T3'
  | 'T3Final'
  | 'T7SP6'
  | 'SP6'
  | 'SP6Final'
  | 'Final'
  | 'Default'

export const PROMOTER_KINDS: readonly PromoterKind[] = [
  'T7T3',
  'T3',
  'T3Final',
  'T7SP6',
  'SP6',
  'SP6Final',
  'Final',
  'Default',
]

export const PROMOTER_LABELS: Record<PromoterKind, string> = {
  T7T3: 'T7/T3',
  T3: 'T3',
  T3Final: 'T3/final',
  T7SP6: 'T7/SP6',
  SP6: 'SP6',
  SP6Final: 'SP6/final',
  Final: 'final',
  Default: 'default',
}

export const PROMOTER_COLORS: Record<PromoterKind, string> = {
  T7T3: '#ff6b6b',
  T3: '#ff7f0e',
  T3Final: '#9acd32',
  T7SP6: '#4ecdc4',
  SP6: '#2ca02c',
  SP6Final: '#20b2aa',
  Final: '#32cd32',
  Default: '#9467bd',
}

/** Which rule produced the category; `none` means nothing matched. */
export type PromoterRule =
  | 'first-stone-t3'
  | 'first-stone-sp6'
  | 'circuit-t3'
  | 'circuit-sp6'
  | 'circuit-t7'
  | 'none'

export interface PromoterClassification {
  kind: PromoterKind
  rule: PromoterRule
}

export interface PromoterInput {
  steppingStones: readonly string[]
  circuitType: string
  circuitId: string
}

export const classifyPromoter = ({
  steppingStones,
  circuitType,
  circuitId,
}: PromoterInput): PromoterClassification => {
  const firstStone = steppingStones.length > 0 ? steppingStones[0] : undefined
  const circuitMentions = (token: string) => circuitType.includes(token) || circuitId.includes(token)

  if (firstStone?.includes('T3')) {
    return { kind: 'T7T3', rule: 'first-stone-t3' }
  }
  if (firstStone?.includes('SP6')) {
    return { kind: 'T7SP6', rule: 'first-stone-sp6' }
  }
  if (circuitMentions('T3')) {
    return { kind: 'T3', rule: 'circuit-t3' }
  }
  if (circuitMentions('SP6')) {
    return { kind: 'SP6', rule: 'circuit-sp6' }
  }
  // T7 alone has no pathway of its own; it is drawn on the T3 pathway
  if (circuitMentions('T7')) {
    return { kind: 'T7T3', rule: 'circuit-t7' }
  }
  return { kind: 'Default', rule: 'none' }
}
