import { describe, expect, it } from 'vitest'

import { parseOffsetDateTime, parseTimeToHours, timeToHours } from '../timeParser'

const reference = new Date('2025-01-01T00:00:00Z')

describe('parseTimeToHours', () => {
  it('treats missing values as zero', () => {
    expect(parseTimeToHours('', reference)).toEqual({ hours: 0, source: 'empty' })
    expect(parseTimeToHours(null, reference)).toEqual({ hours: 0, source: 'empty' })
    expect(parseTimeToHours(undefined, reference)).toEqual({ hours: 0, source: 'empty' })
  })

  it('measures zulu date-times from the reference', () => {
    expect(parseTimeToHours('2025-01-02T00:00:00Z', reference)).toEqual({ hours: 24, source: 'datetime' })
  })

  it('applies explicit offsets', () => {
    expect(timeToHours('2025-01-01T12:00:00+02:00', reference)).toBe(10)
    expect(timeToHours('2025-01-01T01:00:00+0100', reference)).toBe(0)
    expect(timeToHours('2025-01-01T00:00:00-03:30', reference)).toBe(3.5)
  })

  it('accepts a space separator and omitted seconds', () => {
    expect(timeToHours('2025-01-01 06:30+00:00', reference)).toBe(6.5)
  })

  it('clamps date-times before the reference to zero', () => {
    expect(parseTimeToHours('2024-12-31T00:00:00Z', reference)).toEqual({ hours: 0, source: 'clamped' })
  })

  it('rejects date-times without an offset', () => {
    expect(parseTimeToHours('2025-01-01T05:00:00', reference)).toEqual({ hours: 0, source: 'unparseable' })
  })

  it('reads bare numbers as hours without clamping', () => {
    expect(parseTimeToHours('36', reference)).toEqual({ hours: 36, source: 'numeric' })
    expect(parseTimeToHours('1.5', reference)).toEqual({ hours: 1.5, source: 'numeric' })
    expect(parseTimeToHours('-5', reference)).toEqual({ hours: -5, source: 'numeric' })
  })

  it('falls back to zero for anything else', () => {
    expect(parseTimeToHours('soon', reference)).toEqual({ hours: 0, source: 'unparseable' })
    expect(parseTimeToHours('-', reference)).toEqual({ hours: 0, source: 'unparseable' })
    expect(parseTimeToHours('1.2.3', reference)).toEqual({ hours: 0, source: 'unparseable' })
    expect(parseTimeToHours(' 12', reference)).toEqual({ hours: 0, source: 'unparseable' })
  })
})

describe('parseOffsetDateTime', () => {
  it('keeps fractional seconds to the millisecond', () => {
    expect(parseOffsetDateTime('2025-01-01T00:00:00.5Z')).toBe(Date.UTC(2025, 0, 1, 0, 0, 0, 500))
    expect(parseOffsetDateTime('2025-01-01T00:00:00,123456Z')).toBe(Date.UTC(2025, 0, 1, 0, 0, 0, 123))
  })

  it('rejects impossible calendar values', () => {
    expect(parseOffsetDateTime('2025-02-30T00:00:00Z')).toBeNull()
    expect(parseOffsetDateTime('2025-13-01T00:00:00Z')).toBeNull()
    expect(parseOffsetDateTime('2025-01-01T24:00:00Z')).toBeNull()
    expect(parseOffsetDateTime('2025-01-01T00:00:00+05:')).toBeNull()
  })

  it('accepts leap days', () => {
    expect(parseOffsetDateTime('2024-02-29T00:00:00Z')).toBe(Date.UTC(2024, 1, 29))
  })

  it('keeps two-digit years literal', () => {
    expect(parseOffsetDateTime('0050-01-02T00:00:00Z')).toBe(Date.parse('0050-01-02T00:00:00Z'))
    expect(parseTimeToHours('0050-01-02T00:00:00Z', new Date('0050-01-01T00:00:00Z'))).toEqual({
      hours: 24,
      source: 'datetime',
    })
  })
})
