// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Timeline — occurrence queries over a Calendar
 *
 * Each series yields its occurrences lazily in start order (rule slots with
 * overrides substituted, exclusions removed); the timeline merges the series
 * streams by (start, uid, recurrence-id).
 */

import type { DateTime } from 'luxon'
import {
  type CalendarTime,
  durationMs,
  recurrenceKey,
  resolve,
  shiftTime,
  wallIn,
} from './calendar-time.js'
import { type Calendar, type CalendarEvent, type EventSeries, isRecurring } from './calendar-model.js'
import { expand } from './rrule.js'

// ── Types ──────────────────────────────────────────────────────────────────

export interface Occurrence {
  uid: string
  /** null for a non-recurring event */
  recurrenceId: string | null
  /** Effective event: the override when one exists, else the master */
  event: CalendarEvent
  start: CalendarTime
  end: CalendarTime
  startAt: DateTime
  endAt: DateTime
}

const HALF_HOUR_MS = 30 * 60 * 1000
const DAY_MS = 24 * 60 * 60 * 1000

// ── Occurrences ────────────────────────────────────────────────────────────

/**
 * Build an occurrence, stretching an empty or inverted interval to 30 minutes
 * (date-times) or one day (dates).
 */
export function makeOccurrence(
  uid: string,
  recurrenceId: string | null,
  event: CalendarEvent,
  start: CalendarTime,
  end: CalendarTime,
  zone: string,
): Occurrence {
  const startAt = resolve(start, zone)
  let endAt = resolve(end, zone)
  if (endAt.toMillis() <= startAt.toMillis()) {
    end = shiftTime(start, start.kind === 'date' ? DAY_MS : HALF_HOUR_MS)
    endAt = resolve(end, zone)
  }
  return { uid, recurrenceId, event, start, end, startAt, endAt }
}

export function compareOccurrences(a: Occurrence, b: Occurrence): number {
  const diff = a.startAt.toMillis() - b.startAt.toMillis()
  if (diff !== 0) return diff
  if (a.uid !== b.uid) return a.uid < b.uid ? -1 : 1
  const ra = a.recurrenceId ?? ''
  const rb = b.recurrenceId ?? ''
  if (ra === rb) return 0
  return ra < rb ? -1 : 1
}

/**
 * Occurrences of one series in start order. `after` is an instant; slots that
 * cannot reach it (start + duration + one day of slack) are skipped before
 * they are resolved.
 */
export function* seriesOccurrences(series: EventSeries, zone: string, after?: DateTime): Generator<Occurrence> {
  const master = series.master
  const overrides = [...series.overrides.entries()]
    .filter(([key]) => !series.exclusions.has(key))
    .map(([key, event]) => makeOccurrence(series.uid, key, event, event.start, event.end, zone))
    .sort(compareOccurrences)

  if (master && !isRecurring(master)) {
    yield makeOccurrence(series.uid, null, master, master.start, master.end, zone)
    return
  }

  let slots: Generator<CalendarTime> | null = null
  let duration = 0
  if (master) {
    duration = durationMs(master.start, master.end)
    slots = expand(master.rrule, master.start, {
      rdates: master.rdate,
      exclusions: series.exclusions,
      windowStart: after ? wallIn(after, 'UTC').minus({ milliseconds: Math.max(duration, 0) + DAY_MS }) : undefined,
    })
  }

  const nextSlot = (): Occurrence | null => {
    if (!slots || !master) return null
    for (let next = slots.next(); !next.done; next = slots.next()) {
      const key = recurrenceKey(next.value)
      if (series.overrides.has(key)) continue
      return makeOccurrence(series.uid, key, master, next.value, shiftTime(next.value, duration), zone)
    }
    return null
  }

  let slot = nextSlot()
  let idx = 0
  while (slot !== null || idx < overrides.length) {
    const override = overrides[idx]
    if (override !== undefined && (slot === null || compareOccurrences(override, slot) <= 0)) {
      idx++
      yield override
    } else if (slot !== null) {
      yield slot
      slot = nextSlot()
    }
  }
}

// ── Timeline ───────────────────────────────────────────────────────────────

export class Timeline {
  private readonly series: EventSeries[]

  constructor(calendar: Calendar, readonly zone: string) {
    this.series = [...calendar.series.values()]
  }

  /**
   * Occurrences whose [start, end) intersects [start, end), in timeline order.
   */
  overlapping(start: DateTime, end: DateTime): Occurrence[] {
    const startMs = start.toMillis()
    const endMs = end.toMillis()
    const out: Occurrence[] = []
    for (const series of this.series) {
      for (const occurrence of seriesOccurrences(series, this.zone, start)) {
        // DST folds can reorder resolved starts by an hour at most
        if (occurrence.startAt.toMillis() >= endMs + DAY_MS) break
        if (occurrence.startAt.toMillis() < endMs && occurrence.endAt.toMillis() > startMs) {
          out.push(occurrence)
        }
      }
    }
    return out.sort(compareOccurrences)
  }

  /**
   * Occurrences still running or upcoming at `now` (end after now), lazily,
   * in timeline order. Each call starts over.
   */
  *activeAfter(now: DateTime): Generator<Occurrence> {
    const nowMs = now.toMillis()
    const streams = this.series.map(series => activeStream(series, this.zone, now, nowMs))
    const heads = streams.map(stream => stream.next())

    for (;;) {
      let best: { index: number; occurrence: Occurrence } | null = null
      for (let i = 0; i < heads.length; i++) {
        const head = heads[i]
        if (head.done) continue
        if (best === null || compareOccurrences(head.value, best.occurrence) < 0) {
          best = { index: i, occurrence: head.value }
        }
      }
      if (best === null) return
      yield best.occurrence
      heads[best.index] = streams[best.index].next()
    }
  }

  /** First active occurrence at `now`, or null. */
  nextActive(now: DateTime): Occurrence | null {
    const first = this.activeAfter(now).next()
    return first.done ? null : first.value
  }
}

function* activeStream(series: EventSeries, zone: string, now: DateTime, nowMs: number): Generator<Occurrence> {
  for (const occurrence of seriesOccurrences(series, zone, now)) {
    if (occurrence.endAt.toMillis() > nowMs) yield occurrence
  }
}
