// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Event store — add / edit / delete on a Calendar
 *
 * Every operation builds the replacement series first and commits by swapping
 * map entries at the very end. A thrown error therefore leaves the Calendar
 * as it was.
 */

import { randomUUID } from 'node:crypto'
import { DateTime } from 'luxon'
import {
  type CalendarTime,
  calendarDateTime,
  durationMs,
  fromWall,
  isKnownZone,
  keyToWall,
  normalizeRecurrenceKey,
  resolve,
  shiftTime,
  toWall,
} from './calendar-time.js'
import {
  type Calendar,
  type CalendarEvent,
  type EventSeries,
  type EventStatus,
  compareKeys,
  createEvent,
  eventAtSlot,
  firstSlotKey,
  hasOccurrence,
  validateEvent,
} from './calendar-model.js'
import { DuplicateUidError, EventNotFoundError, InvalidRangeError, ValidationError } from './errors.js'
import { type Recur, iterateRule } from './rrule.js'

// ── Types ──────────────────────────────────────────────────────────────────

export type RecurrenceRange = 'NONE' | 'THIS_AND_FUTURE'

export interface EventPatch {
  summary?: string
  description?: string | null
  location?: string | null
  start?: CalendarTime
  end?: CalendarTime
  /** null clears the rule */
  rrule?: Recur | null
  status?: EventStatus | null
}

export interface NewEvent extends EventPatch {
  uid?: string
  summary: string
  start: CalendarTime
  end: CalendarTime
  recurrenceId?: string
}

export type Clock = () => DateTime

const WALL_FORMAT = "yyyy-MM-dd'T'HH:mm:ss"

// ── Patch helpers ──────────────────────────────────────────────────────────

function applyPatch(event: CalendarEvent, patch: EventPatch): CalendarEvent {
  const next: CalendarEvent = { ...event }
  if (patch.summary !== undefined) next.summary = patch.summary
  if (patch.description === null) delete next.description
  else if (patch.description !== undefined) next.description = patch.description
  if (patch.location === null) delete next.location
  else if (patch.location !== undefined) next.location = patch.location
  if (patch.status === null) delete next.status
  else if (patch.status !== undefined) next.status = patch.status
  if (patch.rrule === null) delete next.rrule
  else if (patch.rrule !== undefined) next.rrule = patch.rrule

  if (patch.start !== undefined) {
    // A moved start without an end keeps the event's length
    next.end = patch.end ?? (patch.start.kind === event.start.kind
      ? shiftTime(patch.start, durationMs(event.start, event.end))
      : event.end)
    next.start = patch.start
  } else if (patch.end !== undefined) {
    next.end = patch.end
  }
  return next
}

function keysBefore<T>(entries: Iterable<[string, T]>, splitKey: string): Map<string, T> {
  return new Map([...entries].filter(([key]) => compareKeys(key, splitKey) < 0))
}

function keysFrom<T>(entries: Iterable<[string, T]>, splitKey: string): Map<string, T> {
  return new Map([...entries].filter(([key]) => compareKeys(key, splitKey) >= 0))
}

/**
 * The last instant a truncated series may still start at: one second before
 * the split for date-times (written in UTC when the series is zoned), the day
 * before for dates.
 */
function untilBefore(splitKey: string, start: CalendarTime): CalendarTime {
  const split = keyToWall(splitKey)
  if (start.kind === 'date') return fromWall(split.minus({ days: 1 }), start)
  const last = fromWall(split.minus({ seconds: 1 }), start)
  if (start.zone !== null && start.zone !== 'UTC' && isKnownZone(start.zone)) {
    const utc = resolve(last, start.zone).toUTC()
    return calendarDateTime(utc.toFormat(WALL_FORMAT), 'UTC')
  }
  return last
}

// ── Store ──────────────────────────────────────────────────────────────────

export class EventStore {
  constructor(
    readonly calendar: Calendar,
    private readonly clock: Clock = () => DateTime.utc(),
  ) {}

  /**
   * Add a new non-recurring or recurring event. Returns the stored master.
   */
  add(input: NewEvent): CalendarEvent {
    if (input.recurrenceId !== undefined) {
      throw new ValidationError('a new event cannot carry a recurrence-id')
    }
    const stamp = this.stamp()
    const event = applyPatch(createEvent({
      uid: input.uid ?? randomUUID(),
      summary: input.summary,
      start: input.start,
      end: input.end,
      dtstamp: stamp,
      created: stamp,
    }), {
      description: input.description,
      location: input.location,
      status: input.status,
      rrule: input.rrule,
    })
    validateEvent(event, { role: 'master', requireOrderedBounds: true, requireSummary: true })

    if (this.calendar.series.has(event.uid)) {
      throw new DuplicateUidError(event.uid)
    }
    this.calendar.series.set(event.uid, {
      uid: event.uid,
      master: event,
      overrides: new Map(),
      exclusions: new Set(),
    })
    return event
  }

  /**
   * Delete a whole series, one occurrence, or an occurrence and everything
   * after it.
   */
  delete(uid: string, recurrenceId: string | null = null, range: RecurrenceRange = 'NONE'): void {
    const series = this.requireSeries(uid)
    if (recurrenceId === null) {
      if (range === 'THIS_AND_FUTURE') throw new InvalidRangeError('THIS_AND_FUTURE requires a recurrence-id')
      this.calendar.series.delete(uid)
      return
    }
    const key = this.requireOccurrence(series, recurrenceId)

    if (range === 'THIS_AND_FUTURE') {
      const next = this.startsSeries(series, key) ? null : this.truncate(series, key)
      if (next === null) this.calendar.series.delete(uid)
      else this.calendar.series.set(uid, next)
      return
    }

    const overrides = new Map(series.overrides)
    overrides.delete(key)
    if (!series.master) {
      if (overrides.size === 0) this.calendar.series.delete(uid)
      else this.calendar.series.set(uid, { ...series, overrides })
      return
    }
    this.calendar.series.set(uid, {
      ...series,
      overrides,
      exclusions: new Set([...series.exclusions, key]),
    })
  }

  /**
   * Edit the whole series (no recurrence-id), one occurrence (NONE) or an
   * occurrence and everything after it (THIS_AND_FUTURE, split off into a new
   * series). Returns the event that now carries the edited fields.
   */
  edit(uid: string, patch: EventPatch, recurrenceId: string | null = null, range: RecurrenceRange = 'NONE'): CalendarEvent {
    const series = this.requireSeries(uid)
    if (recurrenceId === null) {
      if (range === 'THIS_AND_FUTURE') throw new InvalidRangeError('THIS_AND_FUTURE requires a recurrence-id')
      return this.editMaster(series, patch)
    }
    const key = this.requireOccurrence(series, recurrenceId)

    if (range === 'NONE') {
      if (patch.rrule) throw new ValidationError('a recurrence rule is only valid on the series master')
      const base = series.overrides.get(key) ?? (series.master ? eventAtSlot(series.master, key) : null)
      if (!base) throw new EventNotFoundError(uid, key)
      const override = this.touch(applyPatch(base, { ...patch, rrule: undefined }))
      validateEvent(override, { role: 'override', requireOrderedBounds: true })
      this.calendar.series.set(uid, {
        ...series,
        overrides: new Map(series.overrides).set(key, override),
      })
      return override
    }

    if (this.startsSeries(series, key)) return this.editMaster(series, patch)
    return this.splitSeries(series, key, patch)
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private stamp(): CalendarTime {
    return calendarDateTime(this.clock().toUTC().toFormat(WALL_FORMAT), 'UTC')
  }

  private touch(event: CalendarEvent): CalendarEvent {
    const stamp = this.stamp()
    return { ...event, sequence: event.sequence + 1, lastModified: stamp, dtstamp: stamp }
  }

  private requireSeries(uid: string): EventSeries {
    const series = this.calendar.series.get(uid)
    if (!series) throw new EventNotFoundError(uid)
    return series
  }

  private requireOccurrence(series: EventSeries, recurrenceId: string): string {
    const start = series.master?.start
    const zone = start?.kind === 'date-time' ? start.zone : null
    const key = normalizeRecurrenceKey(recurrenceId, zone)
    if (key === null || !hasOccurrence(series, key)) {
      throw new EventNotFoundError(series.uid, key ?? recurrenceId)
    }
    return key
  }

  /** Is `key` at or before the first slot, i.e. does a range edit cover the whole series? */
  private startsSeries(series: EventSeries, key: string): boolean {
    const first = firstSlotKey(series)
    return first !== null && compareKeys(key, first) <= 0
  }

  private editMaster(series: EventSeries, patch: EventPatch): CalendarEvent {
    const master = series.master
    if (!master) {
      throw new InvalidRangeError(`event ${series.uid} has no master; edit its occurrences instead`)
    }
    const next = this.touch(applyPatch(master, patch))
    validateEvent(next, { role: 'master', requireOrderedBounds: true, requireSummary: true })
    this.calendar.series.set(series.uid, { ...series, master: next })
    return next
  }

  /**
   * The series cut short before `splitKey`: UNTIL moves before the split and
   * everything anchored at or after it goes.
   */
  private truncate(series: EventSeries, splitKey: string): EventSeries {
    const master = series.master
    if (!master) {
      throw new InvalidRangeError(`event ${series.uid} has no master to truncate`)
    }
    const split = keyToWall(splitKey).toMillis()
    const truncated: CalendarEvent = this.touch({
      ...master,
      rdate: master.rdate.filter(t => toWall(t).toMillis() < split),
    })
    if (master.rrule) {
      const { count: _count, ...rule } = master.rrule
      truncated.rrule = { ...rule, until: untilBefore(splitKey, master.start) }
    }

    return {
      ...series,
      master: truncated,
      overrides: keysBefore(series.overrides, splitKey),
      exclusions: new Set([...series.exclusions].filter(key => compareKeys(key, splitKey) < 0)),
    }
  }

  private splitSeries(series: EventSeries, splitKey: string, patch: EventPatch): CalendarEvent {
    const master = series.master
    if (!master) {
      throw new InvalidRangeError(`event ${series.uid} has no master to split`)
    }
    const truncated = this.truncate(series, splitKey)
    const split = keyToWall(splitKey).toMillis()
    const uid = randomUUID()
    const stamp = this.stamp()

    let rrule: Recur | undefined
    if (patch.rrule !== undefined) {
      rrule = patch.rrule ?? undefined
    } else if (master.rrule) {
      rrule = continuedRule(master.rrule, master.start, split)
    }

    const base = eventAtSlot(master, splitKey)
    const { recurrenceId: _rid, rrule: _rule, ...fields } = applyPatch(base, { ...patch, rrule: undefined })
    const successor: CalendarEvent = {
      ...fields,
      uid,
      rdate: master.rdate.filter(t => toWall(t).toMillis() >= split),
      sequence: 0,
      created: stamp,
      dtstamp: stamp,
      lastModified: stamp,
    }
    if (rrule) successor.rrule = rrule
    validateEvent(successor, { role: 'master', requireOrderedBounds: true, requireSummary: true })

    // Future exclusions and overrides only line up with the new slots while the start stays put
    const keepsSlots = patch.start === undefined
    const overrides = new Map<string, CalendarEvent>()
    if (keepsSlots) {
      for (const [key, event] of keysFrom(series.overrides, splitKey)) {
        overrides.set(key, { ...event, uid })
      }
    }

    this.calendar.series.set(series.uid, truncated)
    this.calendar.series.set(uid, {
      uid,
      master: successor,
      overrides,
      exclusions: keepsSlots
        ? new Set([...series.exclusions].filter(key => compareKeys(key, splitKey) >= 0))
        : new Set(),
    })
    return successor
  }
}

/**
 * The old rule carried on from the split. COUNT shrinks by the slots left in
 * the truncated series.
 */
function continuedRule(rule: Recur, start: CalendarTime, splitMs: number): Recur {
  if (rule.count === undefined) return rule
  let before = 0
  for (const slot of iterateRule(rule, start)) {
    if (slot.toMillis() >= splitMs) break
    before++
  }
  return { ...rule, count: Math.max(rule.count - before, 1) }
}
