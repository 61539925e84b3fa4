// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Offline commands over an .ics document, shared by the CLI and its tests.
 */
import { DateTime } from 'luxon'
import { isKnownZone } from './calendar-time.js'
import { ValidationError } from './errors.js'
import { type EventView, toEventView } from './event-input.js'
import { parseIcs, serializeIcs } from './ics-codec.js'
import { Timeline } from './timeline.js'

export interface ZoneOption {
  tz: string
}

function zoneOf(options: ZoneOption): string {
  if (!isKnownZone(options.tz)) throw new ValidationError(`unknown time zone: ${options.tz}`)
  return options.tz
}

function instant(name: string, value: string, zone: string): DateTime {
  const parsed = DateTime.fromISO(value, { zone })
  if (!parsed.isValid) throw new ValidationError(`--${name} is not a valid date-time: ${value}`)
  return parsed
}

export function formatEventLine(view: EventView): string {
  const rid = view.recurrence_id ? ` [${view.recurrence_id}]` : ''
  return `${view.start}  ${view.end}  ${view.summary}${rid}`
}

export function listEvents(text: string, options: ZoneOption & { start: string; end: string }): EventView[] {
  const zone = zoneOf(options)
  const timeline = new Timeline(parseIcs(text), zone)
  return timeline
    .overlapping(instant('start', options.start, zone), instant('end', options.end, zone))
    .map(o => toEventView(o, zone))
}

export function nextEvent(text: string, options: ZoneOption & { at?: string }): EventView | null {
  const zone = zoneOf(options)
  const at = options.at ? instant('at', options.at, zone) : DateTime.now().setZone(zone)
  const next = new Timeline(parseIcs(text), zone).nextActive(at)
  return next ? toEventView(next, zone) : null
}

export interface CheckReport {
  series: number
  overrides: number
  recurring: number
  /** Serializing and parsing again gives back the same number of series */
  roundTrips: boolean
}

export function checkCalendar(text: string): CheckReport {
  const calendar = parseIcs(text)
  let overrides = 0
  let recurring = 0
  for (const series of calendar.series.values()) {
    overrides += series.overrides.size
    if (series.master?.rrule || (series.master?.rdate.length ?? 0) > 0) recurring++
  }
  const again = parseIcs(serializeIcs(calendar))
  return {
    series: calendar.series.size,
    overrides,
    recurring,
    roundTrips: again.series.size === calendar.series.size,
  }
}
