// purpose: convert loosely formatted segment timestamps into hour offsets from a reference instant
// status: experimental

const MS_PER_HOUR = 3_600_000

// Extended ISO 8601 date-time with a mandatory offset. The date/time separator may be
// `T` or a space and seconds/fractions are optional.
const OFFSET_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?([+-])(\d{2})(?::?(\d{2}))?$/

const NUMERIC_HOURS = /^[0-9.-]+$/

export type TimeParseSource = 'empty' | 'datetime' | 'clamped' | 'numeric' | 'unparseable'

export interface TimeParseResult {
  hours: number
  source: TimeParseSource
}

const normaliseZulu = (value: string): string =>
  value.endsWith('Z') ? value.replace(/Z/g, '+00:00') : value

/**
 * Parse an offset-bearing ISO date-time into epoch milliseconds.
 * Returns null for anything that does not name an exact instant, including
 * date-times without an offset.
 */
export const parseOffsetDateTime = (value: string): number | null => {
  const match = OFFSET_DATE_TIME.exec(normaliseZulu(value))
  if (!match) {
    return null
  }
  const [, year, month, day, hour, minute, second, fraction, sign, offsetHours, offsetMinutes] = match
  const y = Number(year)
  const mo = Number(month)
  const d = Number(day)
  const h = Number(hour)
  const mi = Number(minute)
  const s = second ? Number(second) : 0
  const ms = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0
  const oh = Number(offsetHours)
  const om = offsetMinutes ? Number(offsetMinutes) : 0
  if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59 || oh > 23 || om > 59) {
    return null
  }
  // setUTCFullYear keeps years 0-99 literal, where Date.UTC maps them into the 1900s
  const instant = new Date(Date.UTC(2000, 0, 1, h, mi, s, ms))
  instant.setUTCFullYear(y, mo - 1, d)
  // invalid days (Feb 30) roll into the next month
  if (instant.getUTCDate() !== d) {
    return null
  }
  const utc = instant.getTime()
  const offsetMs = (oh * 60 + om) * 60_000
  return sign === '+' ? utc - offsetMs : utc + offsetMs
}

const parseNumericHours = (value: string): number | null => {
  if (!NUMERIC_HOURS.test(value) || !/\d/.test(value)) {
    return null
  }
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * Resolve a timestamp string to hours elapsed since `reference`.
 *
 * Date-times before the reference clamp to 0. Bare numbers are taken as hours
 * verbatim and are not clamped, so `"-5"` yields -5.
 */
export const parseTimeToHours = (value: string | null | undefined, reference: Date): TimeParseResult => {
  if (!value) {
    return { hours: 0, source: 'empty' }
  }
  const instant = parseOffsetDateTime(value)
  if (instant !== null) {
    const hours = (instant - reference.getTime()) / MS_PER_HOUR
    return hours < 0 ? { hours: 0, source: 'clamped' } : { hours, source: 'datetime' }
  }
  const numeric = parseNumericHours(value)
  if (numeric !== null) {
    return { hours: numeric, source: 'numeric' }
  }
  return { hours: 0, source: 'unparseable' }
}

export const timeToHours = (value: string | null | undefined, reference: Date): number =>
  parseTimeToHours(value, reference).hours
