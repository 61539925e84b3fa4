import { describe, it, expect } from 'vitest'
import {
  calendarDate,
  calendarDateTime,
  compareTimes,
  durationMs,
  formatIcsTime,
  icsTimeParams,
  normalizeRecurrenceKey,
  parseIcsTime,
  recurrenceKey,
  resolve,
  shiftTime,
} from '../src/calendar-time.js'

describe('recurrence keys', () => {
  it('builds local-naive keys', () => {
    expect(recurrenceKey(calendarDate('2026-03-02'))).toBe('20260302')
    expect(recurrenceKey(calendarDateTime('2026-03-02T09:30:00', 'Europe/Paris'))).toBe('20260302T093000')
  })

  it.each([
    ['20260302T093000', '20260302T093000'],
    ['20260302T093000Z', '20260302T093000'],
    ['2026-03-02T09:30:00', '20260302T093000'],
    ['2026-03-02', '20260302'],
  ])('normalizes %s', (input, expected) => {
    expect(normalizeRecurrenceKey(input)).toBe(expected)
  })

  it('moves a UTC id onto the wall clock of a zone', () => {
    expect(normalizeRecurrenceKey('20260303T080000Z', 'Europe/Paris')).toBe('20260303T090000')
    expect(normalizeRecurrenceKey('2026-07-01T07:00:00Z', 'Europe/Paris')).toBe('20260701T090000')
    expect(normalizeRecurrenceKey('20260303T080000', 'Europe/Paris')).toBe('20260303T080000')
    expect(normalizeRecurrenceKey('20260303T080000Z', 'Nowhere/City')).toBe('20260303T080000')
  })

  it('rejects values that are not dates', () => {
    expect(normalizeRecurrenceKey('next tuesday')).toBeNull()
  })
})

describe('iCalendar values', () => {
  it('parses UTC, zoned, floating and date values', () => {
    expect(parseIcsTime('20260302T093000Z')).toEqual(calendarDateTime('2026-03-02T09:30:00', 'UTC'))
    expect(parseIcsTime('20260302T093000', 'Europe/Paris')).toEqual(calendarDateTime('2026-03-02T09:30:00', 'Europe/Paris'))
    expect(parseIcsTime('20260302T093000')).toEqual(calendarDateTime('2026-03-02T09:30:00', null))
    expect(parseIcsTime('20260302', null, 'DATE')).toEqual(calendarDate('2026-03-02'))
  })

  it('returns null for malformed values', () => {
    expect(parseIcsTime('20260230')).toBeNull()
    expect(parseIcsTime('20260302T25')).toBeNull()
    expect(parseIcsTime('20260302T093000', null, 'DATE')).toBeNull()
  })

  it('formats values with their parameters', () => {
    const utc = calendarDateTime('2026-03-02T09:30:00', 'UTC')
    const paris = calendarDateTime('2026-03-02T09:30:00', 'Europe/Paris')
    expect(formatIcsTime(utc)).toBe('20260302T093000Z')
    expect(icsTimeParams(utc)).toEqual({})
    expect(formatIcsTime(paris)).toBe('20260302T093000')
    expect(icsTimeParams(paris)).toEqual({ TZID: 'Europe/Paris' })
    expect(icsTimeParams(calendarDate('2026-03-02'))).toEqual({ VALUE: 'DATE' })
  })
})

describe('resolving instants', () => {
  it('uses the value zone when it has one', () => {
    const summer = calendarDateTime('2026-07-01T09:00:00', 'Europe/Paris')
    expect(resolve(summer, 'UTC').toUTC().toISO()).toBe('2026-07-01T07:00:00.000Z')
  })

  it('reads floating times in the given zone', () => {
    const floating = calendarDateTime('2026-01-15T09:00:00')
    expect(resolve(floating, 'America/New_York').toUTC().toISO()).toBe('2026-01-15T14:00:00.000Z')
  })

  it('treats an unknown zone as floating', () => {
    const custom = calendarDateTime('2026-01-15T09:00:00', 'Mars/Olympus')
    expect(resolve(custom, 'UTC').toUTC().hour).toBe(9)
  })

  it('orders values on a common clock', () => {
    const a = calendarDateTime('2026-03-02T09:00:00', 'UTC')
    const b = calendarDateTime('2026-03-02T09:30:00', 'Europe/Paris')
    expect(compareTimes(a, b)).toBeGreaterThan(0)
  })
})

describe('durations', () => {
  it('measures on the wall clock across a DST change', () => {
    const start = calendarDateTime('2026-03-28T10:00:00', 'Europe/Paris')
    const end = calendarDateTime('2026-03-29T10:00:00', 'Europe/Paris')
    expect(durationMs(start, end)).toBe(24 * 3600_000)
  })

  it('measures real time between different zones', () => {
    const start = calendarDateTime('2026-03-02T09:00:00', 'UTC')
    const end = calendarDateTime('2026-03-02T11:00:00', 'Europe/Paris')
    expect(durationMs(start, end)).toBe(3600_000)
  })

  it('shifts a value without changing its kind', () => {
    expect(shiftTime(calendarDate('2026-02-28'), 86_400_000)).toEqual(calendarDate('2026-03-01'))
    expect(shiftTime(calendarDateTime('2026-03-02T23:30:00', 'UTC'), 3600_000))
      .toEqual(calendarDateTime('2026-03-03T00:30:00', 'UTC'))
  })
})
