// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Calendar model — events, series and the calendar aggregate
 *
 * A Series groups everything stored under one UID: the master (carrying the
 * recurrence rule), overrides keyed by recurrence-id, and the recurrence-ids
 * excluded from the rule. Series objects are never mutated once they are in a
 * Calendar; the event store builds replacements and swaps map entries, so a
 * reader holding a Calendar always sees whole series.
 */

import {
  type CalendarTime,
  compareTimes,
  durationMs,
  fromWall,
  keyToWall,
  recurrenceKey,
  shiftTime,
} from './calendar-time.js'
import { ValidationError } from './errors.js'
import { type Recur, expand } from './rrule.js'

// ── Types ──────────────────────────────────────────────────────────────────

export type EventStatus = 'CONFIRMED' | 'TENTATIVE' | 'CANCELLED'

export const EVENT_STATUSES: EventStatus[] = ['CONFIRMED', 'TENTATIVE', 'CANCELLED']

/** A content line kept verbatim (name upper-cased, parameters in input order) */
export interface IcsProperty {
  name: string
  params: Record<string, string>
  value: string
}

/** A component kept verbatim, e.g. VTIMEZONE, VALARM or VTODO */
export interface IcsComponent {
  name: string
  properties: IcsProperty[]
  components: IcsComponent[]
}

export interface CalendarEvent {
  uid: string
  recurrenceId?: string
  summary: string
  description?: string
  location?: string
  start: CalendarTime
  end: CalendarTime
  rrule?: Recur
  rdate: CalendarTime[]
  status?: EventStatus
  sequence: number
  dtstamp?: CalendarTime
  created?: CalendarTime
  lastModified?: CalendarTime
  extraProperties: IcsProperty[]
  extraComponents: IcsComponent[]
}

export interface EventSeries {
  readonly uid: string
  /** null only for feeds that ship overrides without their master */
  readonly master: CalendarEvent | null
  readonly overrides: ReadonlyMap<string, CalendarEvent>
  readonly exclusions: ReadonlySet<string>
}

export interface Calendar {
  prodid: string
  version: string
  /** Calendar-level properties other than PRODID and VERSION */
  properties: IcsProperty[]
  /** Components other than VEVENT */
  components: IcsComponent[]
  series: Map<string, EventSeries>
}

export type EventInit = Pick<CalendarEvent, 'uid' | 'summary' | 'start' | 'end'> & Partial<CalendarEvent>

// ── Construction ───────────────────────────────────────────────────────────

export function createEvent(init: EventInit): CalendarEvent {
  return {
    rdate: [],
    sequence: 0,
    extraProperties: [],
    extraComponents: [],
    ...init,
  }
}

export function createCalendar(prodid: string): Calendar {
  return { prodid, version: '2.0', properties: [], components: [], series: new Map() }
}

export function createSeries(
  master: CalendarEvent,
  overrides: ReadonlyMap<string, CalendarEvent> = new Map(),
  exclusions: ReadonlySet<string> = new Set(),
): EventSeries {
  return { uid: master.uid, master, overrides, exclusions }
}

/**
 * Shallow copy: a new series map over the same (immutable) series objects.
 */
export function cloneCalendar(calendar: Calendar): Calendar {
  return {
    ...calendar,
    properties: [...calendar.properties],
    components: [...calendar.components],
    series: new Map(calendar.series),
  }
}

// ── Validation ─────────────────────────────────────────────────────────────

export interface ValidateOptions {
  role: 'master' | 'override'
  /** Reject an end before the start (create/update input) */
  requireOrderedBounds?: boolean
  requireSummary?: boolean
}

export function eventProblems(event: CalendarEvent, options: ValidateOptions): string[] {
  const problems: string[] = []

  if (options.requireSummary && event.summary.trim() === '') {
    problems.push('summary is required')
  }
  if (event.uid.trim() === '') {
    problems.push('uid must not be empty')
  }
  if (event.start.kind !== event.end.kind) {
    problems.push('start and end must both be dates or both be date-times')
  } else if (options.requireOrderedBounds && compareTimes(event.end, event.start) < 0) {
    problems.push('end must not be before start')
  }
  if (options.role === 'override') {
    if (event.rrule) problems.push('a recurrence rule is only valid on the series master')
    if (event.rdate.length > 0) problems.push('recurrence dates are only valid on the series master')
  }
  if (event.rrule?.until && event.rrule.until.kind === 'date' && event.start.kind === 'date-time' && options.requireOrderedBounds) {
    problems.push('UNTIL must be a date-time when the event starts at a date-time')
  }
  for (const rdate of event.rdate) {
    if (rdate.kind !== event.start.kind) {
      problems.push('recurrence dates must match the kind of the event start')
      break
    }
  }

  return problems
}

export function validateEvent(event: CalendarEvent, options: ValidateOptions): void {
  const problems = eventProblems(event, options)
  if (problems.length > 0) throw new ValidationError(problems)
}

// ── Series queries ─────────────────────────────────────────────────────────

export function isRecurring(event: CalendarEvent): boolean {
  return event.rrule !== undefined || event.rdate.length > 0
}

/**
 * Recurrence slots of the master, with exclusions applied unless asked not to.
 */
export function slotStarts(series: EventSeries, withExclusions = true): Generator<CalendarTime> {
  const master = series.master
  if (!master) return (function* () {})()
  return expand(master.rrule, master.start, {
    rdates: master.rdate,
    exclusions: withExclusions ? series.exclusions : undefined,
  })
}

/**
 * Does `key` name an occurrence of the series? Overrides always count; rule
 * slots count unless excluded. A non-recurring event has no addressable
 * occurrences.
 */
export function hasOccurrence(series: EventSeries, key: string): boolean {
  if (series.overrides.has(key)) return true
  const master = series.master
  if (!master || !isRecurring(master) || series.exclusions.has(key)) return false

  const wall = keyToWall(key)
  if (!wall.isValid) return false
  for (const slot of expand(master.rrule, master.start, {
    rdates: master.rdate,
    windowStart: wall,
    windowEnd: wall.plus({ seconds: 1 }),
  })) {
    if (recurrenceKey(slot) === key) return true
  }
  return false
}

/**
 * First slot of the series, exclusions ignored.
 */
export function firstSlotKey(series: EventSeries): string | null {
  const first = slotStarts(series, false).next()
  return first.done ? null : recurrenceKey(first.value)
}

/**
 * The master's fields moved to the slot named by `key`. The result is the
 * unedited occurrence, as an override would start from.
 */
export function eventAtSlot(master: CalendarEvent, key: string): CalendarEvent {
  const start = fromWall(keyToWall(key), master.start)
  const end = shiftTime(start, durationMs(master.start, master.end))
  const { rrule: _rrule, ...fields } = master
  return { ...fields, rdate: [], start, end, recurrenceId: key }
}

export function compareKeys(a: string, b: string): number {
  return keyToWall(a).toMillis() - keyToWall(b).toMillis()
}
