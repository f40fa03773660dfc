import { describe, expect, it } from 'vitest'

import { PROMOTER_COLORS, PROMOTER_LABELS, classifyPromoter } from '../promoterClassifier'

describe('classifyPromoter', () => {
  it('prefers the first stepping stone', () => {
    expect(
      classifyPromoter({ steppingStones: ['T7/T3', 'SP6'], circuitType: 'SP6', circuitId: 'sel-SP6' }),
    ).toEqual({ kind: 'T7T3', rule: 'first-stone-t3' })
    expect(
      classifyPromoter({ steppingStones: ['T7/SP6'], circuitType: 'RNAP_promoter', circuitId: 'sel-T3' }),
    ).toEqual({ kind: 'T7SP6', rule: 'first-stone-sp6' })
  })

  it('puts a T3/final first stone on the T7/T3 pathway', () => {
    const classification = classifyPromoter({ steppingStones: ['T3/final'], circuitType: 'two_hybrid', circuitId: '' })
    expect(classification).toEqual({ kind: 'T7T3', rule: 'first-stone-t3' })
    expect(PROMOTER_LABELS[classification.kind]).toBe('T7/T3')
  })

  it('only looks at the first stone', () => {
    expect(
      classifyPromoter({ steppingStones: ['final', 'T3'], circuitType: 'RNAP_promoter', circuitId: 'sel-1' }),
    ).toEqual({ kind: 'Default', rule: 'none' })
  })

  it('falls back to the circuit type and id', () => {
    expect(classifyPromoter({ steppingStones: [], circuitType: 'T3_variant', circuitId: '' })).toEqual({
      kind: 'T3',
      rule: 'circuit-t3',
    })
    expect(classifyPromoter({ steppingStones: ['final'], circuitType: '', circuitId: 'sel-SP6-v2' })).toEqual({
      kind: 'SP6',
      rule: 'circuit-sp6',
    })
  })

  it('draws a bare T7 circuit on the T3 pathway', () => {
    expect(classifyPromoter({ steppingStones: [], circuitType: '', circuitId: 'sel-T7-only' })).toEqual({
      kind: 'T7T3',
      rule: 'circuit-t7',
    })
  })

  it('matches tokens case-sensitively', () => {
    expect(classifyPromoter({ steppingStones: ['t3'], circuitType: '', circuitId: 'sel-t3-pathway' })).toEqual({
      kind: 'Default',
      rule: 'none',
    })
  })

  it('exposes a label and colour for every kind', () => {
    expect(PROMOTER_LABELS.T3Final).toBe('T3/final')
    expect(PROMOTER_COLORS.T7T3).toBe('#ff6b6b')
    expect(PROMOTER_COLORS.Default).toBe('#9467bd')
  })
})
