// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Calendar time values
 *
 * Stored times are plain data so a Calendar can be cloned, compared and
 * serialized without carrying luxon objects around. luxon is only used while
 * computing: wall-clock arithmetic happens on DateTimes pinned to UTC (a
 * container for the wall fields, not an instant), and `resolve` turns a value
 * into a real instant once a zone is known.
 */

import { DateTime, IANAZone } from 'luxon'

// ── Types ──────────────────────────────────────────────────────────────────

export interface CalendarDate {
  kind: 'date'
  date: string            // YYYY-MM-DD
}

export interface CalendarDateTime {
  kind: 'date-time'
  wall: string            // YYYY-MM-DDTHH:mm:ss
  zone: string | null     // 'UTC', an IANA zone, or null for floating time
}

export type CalendarTime = CalendarDate | CalendarDateTime

// ── Constants ──────────────────────────────────────────────────────────────

const DATE_FORMAT = 'yyyy-MM-dd'
const WALL_FORMAT = "yyyy-MM-dd'T'HH:mm:ss"
const KEY_FORMAT = "yyyyMMdd'T'HHmmss"
const ICS_DATE = /^(\d{4})(\d{2})(\d{2})$/
const ICS_DATE_TIME = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z?)$/

// ── Construction ───────────────────────────────────────────────────────────

export function calendarDate(date: string): CalendarDate {
  return { kind: 'date', date }
}

export function calendarDateTime(wall: string, zone: string | null = null): CalendarDateTime {
  return { kind: 'date-time', wall, zone }
}

export function isKnownZone(zone: string): boolean {
  return zone === 'UTC' || IANAZone.isValidZone(zone)
}

// ── Wall-clock arithmetic ──────────────────────────────────────────────────

/**
 * Wall-clock fields of a value, as a DateTime pinned to UTC.
 */
export function toWall(time: CalendarTime): DateTime {
  return DateTime.fromISO(time.kind === 'date' ? time.date : time.wall, { zone: 'utc' })
}

/**
 * Build a value of the same kind (and zone) as `like` from wall-clock fields.
 */
export function fromWall(wall: DateTime, like: CalendarTime): CalendarTime {
  if (like.kind === 'date') return calendarDate(wall.toFormat(DATE_FORMAT))
  return calendarDateTime(wall.toFormat(WALL_FORMAT), like.zone)
}

/**
 * Wall-clock fields an instant shows in `zone`.
 */
export function wallIn(instant: DateTime, zone: string): DateTime {
  return instant.setZone(zone).setZone('utc', { keepLocalTime: true })
}

/**
 * The instant a value denotes. Dates, floating times and times in a zone the
 * timezone engine does not know are read in `zone`.
 */
export function resolve(time: CalendarTime, zone: string): DateTime {
  const target = time.kind === 'date-time' && time.zone !== null && isKnownZone(time.zone)
    ? time.zone
    : zone
  return toWall(time).setZone(target, { keepLocalTime: true })
}

/**
 * Length of [start, end) in milliseconds. Values sharing a zone (or both
 * floating) are measured on the wall clock so a 1h meeting stays 1h across DST.
 */
export function durationMs(start: CalendarTime, end: CalendarTime): number {
  const sameClock = start.kind === 'date'
    || end.kind === 'date'
    || start.zone === end.zone
  if (sameClock) return toWall(end).toMillis() - toWall(start).toMillis()
  return resolve(end, 'UTC').toMillis() - resolve(start, 'UTC').toMillis()
}

export function shiftTime(time: CalendarTime, ms: number): CalendarTime {
  return fromWall(toWall(time).plus({ milliseconds: ms }), time)
}

// ── Recurrence-id keys ─────────────────────────────────────────────────────

/**
 * Local-naive key of an occurrence start: YYYYMMDD or YYYYMMDDTHHmmss on the
 * series' own wall clock.
 */
export function recurrenceKey(time: CalendarTime): string {
  return time.kind === 'date'
    ? time.date.replace(/-/g, '')
    : time.wall.replace(/[-:]/g, '')
}

/**
 * Normalize an externally supplied recurrence-id. Accepts the key forms above
 * and ISO separators. A trailing Z names a UTC instant, which is moved onto
 * the wall clock of `zone` when that is a known zone. Returns null when the
 * value is not a date.
 */
export function normalizeRecurrenceKey(value: string, zone: string | null = null): string | null {
  const compact = value.trim().replace(/[-:]/g, '').toUpperCase()
  const utc = compact.endsWith('Z')
  const bare = utc ? compact.slice(0, -1) : compact
  if (ICS_DATE.test(bare)) return bare
  if (!ICS_DATE_TIME.test(bare)) return null
  if (!utc || zone === null || zone === 'UTC' || !isKnownZone(zone)) return bare
  const instant = DateTime.fromFormat(bare, KEY_FORMAT, { zone: 'utc' })
  return wallIn(instant, zone).toFormat(KEY_FORMAT)
}

export function keyToWall(key: string): DateTime {
  return key.includes('T')
    ? DateTime.fromFormat(key, KEY_FORMAT, { zone: 'utc' })
    : DateTime.fromFormat(key, 'yyyyMMdd', { zone: 'utc' })
}

// ── iCalendar value forms ──────────────────────────────────────────────────

/**
 * Parse a DATE or DATE-TIME property value. `tzid` is the TZID parameter, if any.
 * Returns null when the value is malformed.
 */
export function parseIcsTime(value: string, tzid: string | null = null, valueType: string | null = null): CalendarTime | null {
  const trimmed = value.trim()
  const dateMatch = trimmed.match(ICS_DATE)
  if (dateMatch) {
    const date = `${dateMatch[1]}-${dateMatch[2]}-${dateMatch[3]}`
    return DateTime.fromISO(date, { zone: 'utc' }).isValid ? calendarDate(date) : null
  }
  if (valueType === 'DATE') return null

  const dtMatch = trimmed.match(ICS_DATE_TIME)
  if (!dtMatch) return null
  const [, y, mo, d, h, mi, s, z] = dtMatch
  const wall = `${y}-${mo}-${d}T${h}:${mi}:${s}`
  if (!DateTime.fromISO(wall, { zone: 'utc' }).isValid) return null
  if (z === 'Z') return calendarDateTime(wall, 'UTC')
  return calendarDateTime(wall, tzid)
}

/**
 * Value text of a time: YYYYMMDD, YYYYMMDDTHHmmss or YYYYMMDDTHHmmssZ.
 * The TZID of a zoned value travels as a parameter, see `icsTimeParams`.
 */
export function formatIcsTime(time: CalendarTime): string {
  const key = recurrenceKey(time)
  return time.kind === 'date-time' && time.zone === 'UTC' ? `${key}Z` : key
}

export function icsTimeParams(time: CalendarTime): Record<string, string> {
  if (time.kind === 'date') return { VALUE: 'DATE' }
  if (time.zone !== null && time.zone !== 'UTC') return { TZID: time.zone }
  return {}
}

/**
 * Compare two values on a common clock (floating and dates read as UTC).
 */
export function compareTimes(a: CalendarTime, b: CalendarTime): number {
  return resolve(a, 'UTC').toMillis() - resolve(b, 'UTC').toMillis()
}
