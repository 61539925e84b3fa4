// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Recurrence rules (RFC 5545 RRULE)
 *
 * Parses and formats RRULE strings and expands them into lazy, restartable
 * sequences of occurrence starts. Expansion runs on the wall clock of the
 * series (see calendar-time.ts), so "every day at 09:00 in Europe/Paris"
 * stays at 09:00 across DST changes once the timeline resolves it.
 *
 * Expansion works period by period (day, week, month or year): BY* parts
 * produce the candidate set of a period, BYSETPOS picks from it, and COUNT /
 * UNTIL cut the merged stream. Like dateutil, a DTSTART that does not match
 * the BY* parts is not produced itself.
 */

import type { DateTime } from 'luxon'
import {
  type CalendarTime,
  formatIcsTime,
  fromWall,
  isKnownZone,
  parseIcsTime,
  recurrenceKey,
  resolve,
  toWall,
  wallIn,
} from './calendar-time.js'
import { ValidationError } from './errors.js'

// ── Types ──────────────────────────────────────────────────────────────────

export type Frequency = 'DAILY' | 'WEEKLY' | 'MONTHLY' | 'YEARLY'
export type Weekday = 'MO' | 'TU' | 'WE' | 'TH' | 'FR' | 'SA' | 'SU'

export interface WeekdayNum {
  weekday: Weekday
  ordinal?: number        // 2MO = second Monday, -1FR = last Friday
}

export interface Recur {
  freq: Frequency
  interval: number
  count?: number
  until?: CalendarTime
  byMonth?: number[]
  byMonthDay?: number[]
  byDay?: WeekdayNum[]
  byHour?: number[]
  byMinute?: number[]
  bySecond?: number[]
  bySetPos?: number[]
  wkst?: Weekday
}

export interface ExpandOptions {
  /** Wall-clock lower bound (inclusive) */
  windowStart?: DateTime
  /** Wall-clock upper bound (exclusive) */
  windowEnd?: DateTime
  /** Recurrence keys to leave out */
  exclusions?: ReadonlySet<string>
  /** Extra occurrence starts (RDATE) merged into the rule */
  rdates?: readonly CalendarTime[]
}

// ── Constants ──────────────────────────────────────────────────────────────

const FREQUENCIES: Frequency[] = ['DAILY', 'WEEKLY', 'MONTHLY', 'YEARLY']
export const WEEKDAYS: Weekday[] = ['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU']

// Periods in a row without a single candidate before a rule is considered
// exhausted (e.g. BYMONTH=2;BYMONTHDAY=30). Eight years per frequency, the
// longest gap between two leap days.
const MAX_EMPTY_PERIODS: Record<Frequency, number> = {
  DAILY: 366 * 8,
  WEEKLY: 53 * 8,
  MONTHLY: 12 * 8,
  YEARLY: 8,
}

const BYDAY_PATTERN = /^([+-]?\d{1,2})?(MO|TU|WE|TH|FR|SA|SU)$/

// ── Parsing ────────────────────────────────────────────────────────────────

function parseIntList(
  key: string,
  value: string,
  min: number,
  max: number,
  problems: string[],
  allowNegative = false,
): number[] {
  const out: number[] = []
  for (const raw of value.split(',')) {
    const n = Number(raw.trim())
    const abs = Math.abs(n)
    if (!Number.isInteger(n) || (n < 0 && !allowNegative) || abs < min || abs > max) {
      problems.push(`${key} value out of range: ${raw}`)
      continue
    }
    out.push(n)
  }
  return out
}

function parsePositiveInt(key: string, value: string, problems: string[]): number | undefined {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    problems.push(`${key} must be a positive integer`)
    return undefined
  }
  return n
}

function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some(day => day === value)
}

/**
 * Parse an RRULE value (with or without the `RRULE:` prefix).
 */
export function parseRrule(text: string): Recur {
  const body = text.trim().replace(/^RRULE:/i, '')
  const problems: string[] = []
  let freq: Frequency | null = null
  const rule: Omit<Recur, 'freq'> = { interval: 1 }

  for (const part of body.split(';')) {
    if (part.trim() === '') continue
    const eq = part.indexOf('=')
    if (eq < 0) {
      problems.push(`malformed RRULE part: ${part}`)
      continue
    }
    const key = part.slice(0, eq).trim().toUpperCase()
    const value = part.slice(eq + 1).trim().toUpperCase()

    switch (key) {
      case 'FREQ': {
        const match = FREQUENCIES.find(f => f === value)
        if (match) freq = match
        else problems.push(`unsupported RRULE frequency: ${value}`)
        break
      }
      case 'INTERVAL': {
        const n = parsePositiveInt(key, value, problems)
        if (n !== undefined) rule.interval = n
        break
      }
      case 'COUNT': {
        const n = parsePositiveInt(key, value, problems)
        if (n !== undefined) rule.count = n
        break
      }
      case 'UNTIL': {
        const until = parseIcsTime(value)
        if (until) rule.until = until
        else problems.push(`invalid UNTIL: ${value}`)
        break
      }
      case 'BYMONTH':
        rule.byMonth = parseIntList(key, value, 1, 12, problems)
        break
      case 'BYMONTHDAY':
        rule.byMonthDay = parseIntList(key, value, 1, 31, problems, true)
        break
      case 'BYDAY': {
        const days: WeekdayNum[] = []
        for (const raw of value.split(',')) {
          const m = raw.trim().match(BYDAY_PATTERN)
          const weekday = m?.[2]
          if (!m || weekday === undefined || !isWeekday(weekday)) {
            problems.push(`invalid BYDAY value: ${raw}`)
            continue
          }
          if (m[1] === undefined) {
            days.push({ weekday })
            continue
          }
          const ordinal = Number(m[1])
          if (ordinal === 0 || Math.abs(ordinal) > 53) {
            problems.push(`invalid BYDAY ordinal: ${raw}`)
            continue
          }
          days.push({ weekday, ordinal })
        }
        rule.byDay = days
        break
      }
      case 'BYHOUR':
        rule.byHour = parseIntList(key, value, 0, 23, problems)
        break
      case 'BYMINUTE':
        rule.byMinute = parseIntList(key, value, 0, 59, problems)
        break
      case 'BYSECOND':
        rule.bySecond = parseIntList(key, value, 0, 59, problems)
        break
      case 'BYSETPOS':
        rule.bySetPos = parseIntList(key, value, 1, 366, problems, true)
        break
      case 'WKST':
        if (isWeekday(value)) rule.wkst = value
        else problems.push(`invalid WKST: ${value}`)
        break
      default:
        problems.push(`unsupported RRULE part: ${key}`)
    }
  }

  if (freq === null) {
    if (!problems.some(p => p.startsWith('unsupported RRULE frequency'))) {
      problems.push('RRULE must contain FREQ')
    }
  } else if (rule.byDay?.some(d => d.ordinal !== undefined) && freq !== 'MONTHLY' && freq !== 'YEARLY') {
    problems.push('BYDAY ordinals are only valid with FREQ=MONTHLY or FREQ=YEARLY')
  }
  if (rule.count !== undefined && rule.until !== undefined) {
    problems.push('COUNT and UNTIL cannot both be set')
  }

  if (problems.length > 0 || freq === null) {
    throw new ValidationError(problems)
  }
  return { freq, ...rule }
}

/**
 * Format a rule as an RRULE value (without the `RRULE:` prefix).
 */
export function formatRrule(rule: Recur): string {
  const parts = [`FREQ=${rule.freq}`]
  if (rule.interval !== 1) parts.push(`INTERVAL=${rule.interval}`)
  if (rule.count !== undefined) parts.push(`COUNT=${rule.count}`)
  if (rule.until !== undefined) parts.push(`UNTIL=${formatIcsTime(rule.until)}`)
  if (rule.byMonth?.length) parts.push(`BYMONTH=${rule.byMonth.join(',')}`)
  if (rule.byMonthDay?.length) parts.push(`BYMONTHDAY=${rule.byMonthDay.join(',')}`)
  if (rule.byDay?.length) {
    parts.push(`BYDAY=${rule.byDay.map(d => `${d.ordinal ?? ''}${d.weekday}`).join(',')}`)
  }
  if (rule.byHour?.length) parts.push(`BYHOUR=${rule.byHour.join(',')}`)
  if (rule.byMinute?.length) parts.push(`BYMINUTE=${rule.byMinute.join(',')}`)
  if (rule.bySecond?.length) parts.push(`BYSECOND=${rule.bySecond.join(',')}`)
  if (rule.bySetPos?.length) parts.push(`BYSETPOS=${rule.bySetPos.join(',')}`)
  if (rule.wkst !== undefined) parts.push(`WKST=${rule.wkst}`)
  return parts.join(';')
}

// ── Candidate generation ───────────────────────────────────────────────────

function weekdayOf(day: DateTime): Weekday {
  return WEEKDAYS[day.weekday - 1]
}

/**
 * Does `day` satisfy BYDAY? Ordinals count within the scope that starts at
 * `scopeDay` 1 and is `scopeLength` days long (a month or a year).
 */
function matchesByDay(day: DateTime, byDay: WeekdayNum[], scopeDay: number, scopeLength: number): boolean {
  const weekday = weekdayOf(day)
  return byDay.some(d => {
    if (d.weekday !== weekday) return false
    if (d.ordinal === undefined) return true
    if (d.ordinal > 0) return Math.floor((scopeDay - 1) / 7) + 1 === d.ordinal
    return Math.floor((scopeLength - scopeDay) / 7) + 1 === -d.ordinal
  })
}

function resolveMonthDays(byMonthDay: number[], length: number): Set<number> {
  const days = new Set<number>()
  for (const d of byMonthDay) {
    const day = d > 0 ? d : length + d + 1
    if (day >= 1 && day <= length) days.add(day)
  }
  return days
}

/** Candidate days of one month, in order. */
function monthDays(rule: Recur, month: DateTime, anchor: DateTime): DateTime[] {
  const length = month.daysInMonth ?? 31
  let days: number[]
  if (rule.byMonthDay?.length) {
    days = [...resolveMonthDays(rule.byMonthDay, length)].sort((a, b) => a - b)
  } else if (rule.byDay?.length) {
    days = Array.from({ length }, (_, i) => i + 1)
  } else {
    days = anchor.day <= length ? [anchor.day] : []
  }

  const byDay = rule.byDay
  const out = days.map(d => month.set({ day: d }))
  return byDay?.length ? out.filter(day => matchesByDay(day, byDay, day.day, length)) : out
}

/** Candidate days of one year when BYMONTH is absent and BYDAY stands alone. */
function yearDaysByWeekday(byDay: WeekdayNum[], year: DateTime): DateTime[] {
  const length = year.daysInYear ?? 365
  const out: DateTime[] = []
  for (let i = 0; i < length; i++) {
    const day = year.plus({ days: i })
    if (matchesByDay(day, byDay, i + 1, length)) out.push(day)
  }
  return out
}

function startOfWeek(day: DateTime, wkst: Weekday): DateTime {
  const offset = (day.weekday - 1 - WEEKDAYS.indexOf(wkst) + 7) % 7
  return day.startOf('day').minus({ days: offset })
}

function periodDays(rule: Recur, anchor: DateTime, period: number): DateTime[] {
  const step = period * rule.interval
  const byMonth = rule.byMonth
  const inMonths = (day: DateTime) => !byMonth?.length || byMonth.includes(day.month)

  switch (rule.freq) {
    case 'DAILY': {
      const day = anchor.startOf('day').plus({ days: step })
      if (!inMonths(day)) return []
      if (rule.byMonthDay?.length && !resolveMonthDays(rule.byMonthDay, day.daysInMonth ?? 31).has(day.day)) return []
      if (rule.byDay?.length && !rule.byDay.some(d => d.weekday === weekdayOf(day))) return []
      return [day]
    }
    case 'WEEKLY': {
      const wkst = rule.wkst ?? 'MO'
      const weekStart = startOfWeek(anchor, wkst).plus({ weeks: step })
      const weekdays = rule.byDay?.length ? rule.byDay.map(d => d.weekday) : [weekdayOf(anchor)]
      const offsets = [...new Set(weekdays.map(w => (WEEKDAYS.indexOf(w) - WEEKDAYS.indexOf(wkst) + 7) % 7))]
      return offsets
        .sort((a, b) => a - b)
        .map(o => weekStart.plus({ days: o }))
        .filter(inMonths)
    }
    case 'MONTHLY': {
      const month = anchor.startOf('month').plus({ months: step })
      return inMonths(month) ? monthDays(rule, month, anchor) : []
    }
    case 'YEARLY': {
      const year = anchor.startOf('year').plus({ years: step })
      if (byMonth?.length) {
        return [...new Set(byMonth)]
          .sort((a, b) => a - b)
          .flatMap(m => monthDays(rule, year.set({ month: m }), anchor))
      }
      if (rule.byMonthDay?.length) {
        return Array.from({ length: 12 }, (_, i) => year.set({ month: i + 1 }))
          .flatMap(month => monthDays(rule, month, anchor))
      }
      if (rule.byDay?.length) return yearDaysByWeekday(rule.byDay, year)
      return monthDays(rule, year.set({ month: anchor.month }), anchor)
    }
  }
}

function sortedUnique(values: number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b)
}

function periodCandidates(rule: Recur, anchor: DateTime, period: number, allDay: boolean): DateTime[] {
  const days = periodDays(rule, anchor, period)
  const hours = allDay ? [0] : sortedUnique(rule.byHour?.length ? rule.byHour : [anchor.hour])
  const minutes = allDay ? [0] : sortedUnique(rule.byMinute?.length ? rule.byMinute : [anchor.minute])
  const seconds = allDay ? [0] : sortedUnique(rule.bySecond?.length ? rule.bySecond : [anchor.second])

  const candidates: DateTime[] = []
  for (const day of days) {
    for (const hour of hours) {
      for (const minute of minutes) {
        for (const second of seconds) {
          candidates.push(day.set({ hour, minute, second, millisecond: 0 }))
        }
      }
    }
  }

  if (!rule.bySetPos?.length) return candidates
  const picked = new Set<number>()
  for (const pos of rule.bySetPos) {
    const idx = pos > 0 ? pos - 1 : candidates.length + pos
    if (idx >= 0 && idx < candidates.length) picked.add(idx)
  }
  return [...picked].sort((a, b) => a - b).map(i => candidates[i])
}

// ── Expansion ──────────────────────────────────────────────────────────────

/**
 * UNTIL on the series' wall clock. A UTC bound on a zoned series is moved
 * into the series' zone; a date bound on a timed series covers the whole day.
 */
function untilWall(rule: Recur, start: CalendarTime): DateTime | null {
  const until = rule.until
  if (!until) return null
  if (until.kind === 'date') {
    return start.kind === 'date' ? toWall(until) : toWall(until).endOf('day')
  }
  if (start.kind === 'date-time' && until.zone === 'UTC' && start.zone !== null && start.zone !== 'UTC' && isKnownZone(start.zone)) {
    return wallIn(resolve(until, 'UTC'), start.zone)
  }
  return toWall(until)
}

/**
 * Wall-clock starts produced by a rule anchored at `start`, in increasing
 * order, bounded only by COUNT / UNTIL. Each call starts over.
 */
export function* iterateRule(rule: Recur, start: CalendarTime): Generator<DateTime> {
  const anchor = toWall(start)
  const anchorMs = anchor.toMillis()
  const until = untilWall(rule, start)
  const untilMs = until === null ? Infinity : until.toMillis()
  const allDay = start.kind === 'date'

  let emitted = 0
  let emptyPeriods = 0
  for (let period = 0; ; period++) {
    let produced = false
    for (const candidate of periodCandidates(rule, anchor, period, allDay)) {
      const ms = candidate.toMillis()
      if (ms < anchorMs) continue
      if (ms > untilMs) return
      yield candidate
      produced = true
      emitted++
      if (rule.count !== undefined && emitted >= rule.count) return
    }
    if (produced) {
      emptyPeriods = 0
    } else if (++emptyPeriods > MAX_EMPTY_PERIODS[rule.freq]) {
      return
    }
  }
}

/**
 * Occurrence starts of a series: the rule's starts (or the lone start when
 * there is no rule) merged with RDATEs, minus exclusions, cut to the window.
 * Lazy and restartable; with no window and an unbounded rule it never ends,
 * so callers take what they need.
 */
export function* expand(rule: Recur | undefined, start: CalendarTime, options: ExpandOptions = {}): Generator<CalendarTime> {
  const windowStartMs = options.windowStart?.toMillis() ?? -Infinity
  const windowEndMs = options.windowEnd?.toMillis() ?? Infinity
  const exclusions = options.exclusions
  const extra = (options.rdates ?? [])
    .map(t => toWall(t))
    .sort((a, b) => a.toMillis() - b.toMillis())

  const base: Iterator<DateTime> = rule ? iterateRule(rule, start) : [toWall(start)][Symbol.iterator]()
  let next = base.next()
  let extraIdx = 0
  let lastMs = -Infinity

  while (!next.done || extraIdx < extra.length) {
    let wall: DateTime
    if (!next.done && (extraIdx >= extra.length || next.value.toMillis() <= extra[extraIdx].toMillis())) {
      wall = next.value
      next = base.next()
    } else {
      wall = extra[extraIdx++]
    }

    const ms = wall.toMillis()
    if (ms >= windowEndMs) return
    if (ms === lastMs) continue
    lastMs = ms
    if (ms < windowStartMs) continue

    const time = fromWall(wall, start)
    if (exclusions?.has(recurrenceKey(time))) continue
    yield time
  }
}
