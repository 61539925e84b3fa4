// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Event input and display
 *
 * External event fields (HTTP bodies, CLI flags) use ISO strings: a bare
 * YYYY-MM-DD is an all-day date, a date-time with an offset is moved into
 * the calendar's zone and kept as floating local time, a date-time without
 * one is floating already.
 */

import { DateTime } from 'luxon'
import { z } from 'zod'
import { type CalendarTime, calendarDate, calendarDateTime } from './calendar-time.js'
import type { EventStatus } from './calendar-model.js'
import { ValidationError } from './errors.js'
import type { EventPatch, NewEvent } from './event-store.js'
import { formatRrule, parseRrule } from './rrule.js'
import type { Occurrence } from './timeline.js'

// ── Schemas ────────────────────────────────────────────────────────────────

const StatusSchema = z.enum(['CONFIRMED', 'TENTATIVE', 'CANCELLED'])

export const EventFieldsSchema = z.object({
  uid: z.string().min(1).optional(),
  summary: z.string().min(1),
  start: z.string().min(1),
  end: z.string().min(1),
  description: z.string().nullable().optional(),
  location: z.string().nullable().optional(),
  rrule: z.string().nullable().optional(),
  status: StatusSchema.nullable().optional(),
})

export const EventPatchSchema = EventFieldsSchema.omit({ uid: true }).partial()

export type EventFields = z.infer<typeof EventFieldsSchema>
export type EventPatchFields = z.infer<typeof EventPatchSchema>

export interface EventView {
  uid: string
  recurrence_id: string | null
  summary: string
  description: string | null
  location: string | null
  status: EventStatus | null
  start: string
  end: string
  all_day: boolean
  rrule: string | null
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/
const HAS_OFFSET = /(Z|[+-]\d{2}(:?\d{2})?)$/i
const WALL_FORMAT = "yyyy-MM-dd'T'HH:mm:ss"
const ISO_WITH_OFFSET = "yyyy-MM-dd'T'HH:mm:ssZZ"

// ── Parsing ────────────────────────────────────────────────────────────────

export function parseTimeInput(value: string, zone: string): CalendarTime | null {
  const text = value.trim()
  if (DATE_ONLY.test(text)) {
    return DateTime.fromISO(text, { zone: 'utc' }).isValid ? calendarDate(text) : null
  }
  const parsed = DateTime.fromISO(text, { setZone: true })
  if (!parsed.isValid) return null
  const local = HAS_OFFSET.test(text) ? parsed.setZone(zone) : parsed
  return calendarDateTime(local.toFormat(WALL_FORMAT))
}

function timeField(name: string, value: string, zone: string, problems: string[]): CalendarTime | undefined {
  const time = parseTimeInput(value, zone)
  if (!time) problems.push(`${name} is not a valid date or date-time: ${value}`)
  return time ?? undefined
}

/**
 * Turn patch fields into a model patch. Omitted fields stay omitted; null
 * (or an empty rrule) clears.
 */
export function parseEventFields(fields: EventPatchFields, zone: string): EventPatch {
  const problems: string[] = []
  const patch: EventPatch = {}

  if (fields.summary !== undefined) patch.summary = fields.summary
  if (fields.description !== undefined) patch.description = fields.description
  if (fields.location !== undefined) patch.location = fields.location
  if (fields.status !== undefined) patch.status = fields.status
  if (fields.start !== undefined) patch.start = timeField('start', fields.start, zone, problems)
  if (fields.end !== undefined) patch.end = timeField('end', fields.end, zone, problems)

  if (fields.rrule === null || fields.rrule?.trim() === '') {
    patch.rrule = null
  } else if (fields.rrule !== undefined) {
    try {
      patch.rrule = parseRrule(fields.rrule)
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      problems.push(...err.problems)
    }
  }

  if (problems.length > 0) throw new ValidationError(problems)
  return patch
}

export function parseNewEvent(fields: EventFields, zone: string): NewEvent {
  const patch = parseEventFields(fields, zone)
  const { start, end } = patch
  if (start === undefined || end === undefined) {
    throw new ValidationError('start and end are required')
  }
  return { ...patch, uid: fields.uid, summary: fields.summary, start, end }
}

// ── Display ────────────────────────────────────────────────────────────────

function displayTime(time: CalendarTime, instant: DateTime, zone: string): string {
  return time.kind === 'date' ? time.date : instant.setZone(zone).toFormat(ISO_WITH_OFFSET)
}

export function toEventView(occurrence: Occurrence, zone: string): EventView {
  const { event } = occurrence
  return {
    uid: occurrence.uid,
    recurrence_id: occurrence.recurrenceId,
    summary: event.summary,
    description: event.description ?? null,
    location: event.location ?? null,
    status: event.status ?? null,
    start: displayTime(occurrence.start, occurrence.startAt, zone),
    end: displayTime(occurrence.end, occurrence.endAt, zone),
    all_day: occurrence.start.kind === 'date',
    rrule: event.rrule ? formatRrule(event.rrule) : null,
  }
}
