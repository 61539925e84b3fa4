// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * iCalendar (ICS) codec
 *
 * RFC 5545 text ⇄ Calendar. Parsing goes through three layers: unfolding
 * (with the physical line each content line started on, for error
 * messages), a component tree built from BEGIN/END, and the mapping of
 * VCALENDAR / VEVENT onto the model. Properties and components the model
 * does not know are carried along verbatim so a round trip loses nothing.
 *
 * Serialization is a pure function of the Calendar: fixed property order,
 * events sorted by UID with each master ahead of its overrides.
 */

import { Duration } from 'luxon'
import {
  type CalendarTime,
  formatIcsTime,
  fromWall,
  icsTimeParams,
  isKnownZone,
  keyToWall,
  parseIcsTime,
  recurrenceKey,
  resolve,
  shiftTime,
  wallIn,
} from './calendar-time.js'
import {
  type Calendar,
  type CalendarEvent,
  type EventSeries,
  type EventStatus,
  type IcsComponent,
  type IcsProperty,
  EVENT_STATUSES,
  compareKeys,
  createEvent,
} from './calendar-model.js'
import { ParseError, ValidationError } from './errors.js'
import { formatRrule, parseRrule } from './rrule.js'

// ── Constants ──────────────────────────────────────────────────────────────

const CRLF = '\r\n'
const VERSION = '2.0'
const MAX_LINE_OCTETS = 75
const DAY_MS = 24 * 60 * 60 * 1000

// ── Content lines ──────────────────────────────────────────────────────────

interface ContentLine {
  text: string
  line: number
}

interface ParsedProperty extends IcsProperty {
  line: number
}

interface ParsedComponent {
  name: string
  line: number
  properties: ParsedProperty[]
  components: ParsedComponent[]
}

/**
 * Unfold lines per RFC 5545 (lines starting with space/tab are continuations).
 */
function unfoldLines(raw: string): ContentLine[] {
  const physical = raw.replace(/^\uFEFF/, '').split(/\r\n|\r|\n/)
  const lines: ContentLine[] = []

  physical.forEach((text, i) => {
    const last = lines.at(-1)
    if ((text.startsWith(' ') || text.startsWith('\t')) && last) {
      last.text += text.slice(1)
      return
    }
    if (text.trim() === '') return
    lines.push({ text, line: i + 1 })
  })

  return lines
}

/**
 * Split a content line into name, parameters and value. Parameter values may
 * be quoted, and quoted values may contain ':' ';' and ','.
 */
function parseContentLine({ text, line }: ContentLine): ParsedProperty {
  const nameMatch = text.match(/^[A-Za-z0-9-]+/)
  if (!nameMatch) throw new ParseError('expected a property name', line)
  const name = nameMatch[0].toUpperCase()
  const params: Record<string, string> = {}
  let i = nameMatch[0].length

  while (text[i] === ';') {
    const eq = text.indexOf('=', i + 1)
    if (eq < 0) throw new ParseError(`malformed parameter on ${name}`, line)
    const key = text.slice(i + 1, eq).toUpperCase()
    if (!/^[A-Z0-9-]+$/.test(key)) throw new ParseError(`malformed parameter name on ${name}`, line)
    i = eq + 1

    let value = ''
    for (;;) {
      if (text[i] === '"') {
        const close = text.indexOf('"', i + 1)
        if (close < 0) throw new ParseError(`unterminated quoted value for ${key}`, line)
        value += text.slice(i + 1, close)
        i = close + 1
      } else {
        const part = text.slice(i).match(/^[^";:,]*/)
        const chunk = part ? part[0] : ''
        value += chunk
        i += chunk.length
      }
      if (text[i] !== ',') break
      value += ','
      i++
    }
    params[key] = value
  }

  if (text[i] !== ':') throw new ParseError(`expected ":" after ${name}`, line)
  return { name, params, value: text.slice(i + 1), line }
}

function parseComponents(lines: ContentLine[]): ParsedComponent[] {
  const roots: ParsedComponent[] = []
  const stack: ParsedComponent[] = []

  for (const contentLine of lines) {
    const prop = parseContentLine(contentLine)
    const current = stack.at(-1)

    if (prop.name === 'BEGIN') {
      const name = prop.value.trim().toUpperCase()
      if (name === '') throw new ParseError('BEGIN without a component name', prop.line)
      const component: ParsedComponent = { name, line: prop.line, properties: [], components: [] }
      if (current) current.components.push(component)
      else roots.push(component)
      stack.push(component)
    } else if (prop.name === 'END') {
      const name = prop.value.trim().toUpperCase()
      if (!current) throw new ParseError(`END:${name} without matching BEGIN`, prop.line)
      if (current.name !== name) {
        throw new ParseError(`expected END:${current.name}, found END:${name}`, prop.line)
      }
      stack.pop()
    } else {
      if (!current) throw new ParseError(`property ${prop.name} outside of a component`, prop.line)
      current.properties.push(prop)
    }
  }

  const open = stack.at(-1)
  if (open) throw new ParseError(`${open.name} is not terminated`, open.line)
  return roots
}

function stripLines(component: ParsedComponent): IcsComponent {
  return {
    name: component.name,
    properties: component.properties.map(toIcsProperty),
    components: component.components.map(stripLines),
  }
}

function toIcsProperty({ name, params, value }: ParsedProperty): IcsProperty {
  return { name, params, value }
}

// ── Text values ────────────────────────────────────────────────────────────

/**
 * Escape text values per RFC 5545.
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n')
}

export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch))
}

function parseDurationMs(value: string): number | null {
  const match = value.trim().toUpperCase().match(/^([+-])?(P.+)$/)
  if (!match) return null
  const duration = Duration.fromISO(match[2])
  if (!duration.isValid) return null
  return (match[1] === '-' ? -1 : 1) * duration.toMillis()
}

// ── VEVENT → model ─────────────────────────────────────────────────────────

interface ParsedEvent {
  event: Omit<CalendarEvent, 'recurrenceId'>
  line: number
  recurrenceId: CalendarTime | null
  exdates: CalendarTime[]
}

function timeOf(prop: ParsedProperty): CalendarTime {
  const time = parseIcsTime(prop.value, prop.params.TZID ?? null, prop.params.VALUE?.toUpperCase() ?? null)
  if (!time) throw new ParseError(`invalid ${prop.name} value: ${prop.value}`, prop.line)
  return time
}

function timesOf(prop: ParsedProperty): CalendarTime[] {
  return prop.value.split(',').map(value => timeOf({ ...prop, value }))
}

function isStatus(value: string): value is EventStatus {
  return EVENT_STATUSES.some(status => status === value)
}

/**
 * The key a RECURRENCE-ID or EXDATE value names on the series' own clock.
 */
function keyOn(time: CalendarTime, like: CalendarTime | null): string {
  if (!like || time.kind === 'date') return recurrenceKey(time)
  if (like.kind === 'date') return recurrenceKey(time).slice(0, 8)
  if (
    time.zone === like.zone
    || time.zone === null
    || like.zone === null
    || !isKnownZone(time.zone)
    || !isKnownZone(like.zone)
  ) {
    return recurrenceKey(time)
  }
  return recurrenceKey(fromWall(wallIn(resolve(time, 'UTC'), like.zone), like))
}

function eventFromComponent(component: ParsedComponent): ParsedEvent {
  let uid: string | null = null
  let start: CalendarTime | null = null
  let end: CalendarTime | null = null
  let endLine = component.line
  let durationMs: number | null = null
  let recurrenceId: CalendarTime | null = null
  const fields: Partial<CalendarEvent> = {}
  const rdate: CalendarTime[] = []
  const exdates: CalendarTime[] = []
  const masterOnly: ParsedProperty[] = []
  const extra: ParsedProperty[] = []

  for (const prop of component.properties) {
    switch (prop.name) {
      case 'UID':
        uid = prop.value.trim()
        break
      case 'DTSTART':
        start = timeOf(prop)
        break
      case 'DTEND':
        end = timeOf(prop)
        endLine = prop.line
        break
      case 'DURATION':
        durationMs = parseDurationMs(prop.value)
        if (durationMs === null) throw new ParseError(`invalid DURATION value: ${prop.value}`, prop.line)
        break
      case 'RECURRENCE-ID':
        recurrenceId = timeOf(prop)
        break
      case 'SUMMARY':
        fields.summary = unescapeText(prop.value)
        break
      case 'DESCRIPTION':
        fields.description = unescapeText(prop.value)
        break
      case 'LOCATION':
        fields.location = unescapeText(prop.value)
        break
      case 'STATUS': {
        const status = prop.value.trim().toUpperCase()
        if (isStatus(status)) fields.status = status
        else extra.push(prop)
        break
      }
      case 'SEQUENCE': {
        const sequence = Number(prop.value.trim())
        if (Number.isInteger(sequence) && sequence >= 0) fields.sequence = sequence
        else extra.push(prop)
        break
      }
      case 'DTSTAMP':
      case 'CREATED':
      case 'LAST-MODIFIED': {
        const time = parseIcsTime(prop.value)
        if (!time) {
          extra.push(prop)
          break
        }
        if (prop.name === 'DTSTAMP') fields.dtstamp = time
        else if (prop.name === 'CREATED') fields.created = time
        else fields.lastModified = time
        break
      }
      case 'RRULE':
      case 'RDATE':
      case 'EXDATE':
        masterOnly.push(prop)
        break
      default:
        extra.push(prop)
    }
  }

  if (uid === null || uid === '') throw new ParseError('VEVENT without UID', component.line)
  if (start === null) throw new ParseError(`VEVENT ${uid} without DTSTART`, component.line)

  if (end !== null && end.kind !== start.kind) {
    throw new ParseError('DTSTART and DTEND must both be dates or both be date-times', endLine)
  }
  if (end === null) {
    end = durationMs !== null
      ? shiftTime(start, durationMs)
      : start.kind === 'date' ? shiftTime(start, DAY_MS) : start
  }

  // Recurrence properties only mean something on a master
  for (const prop of masterOnly) {
    if (recurrenceId !== null) {
      extra.push(prop)
      continue
    }
    if (prop.name === 'RRULE') {
      try {
        fields.rrule = parseRrule(prop.value)
      } catch (err) {
        if (err instanceof ValidationError) throw new ParseError(err.problems.join('; '), prop.line, { cause: err })
        throw err
      }
    } else if (prop.name === 'RDATE' && prop.params.VALUE?.toUpperCase() === 'PERIOD') {
      extra.push(prop)
    } else if (prop.name === 'RDATE') {
      rdate.push(...timesOf(prop))
    } else {
      exdates.push(...timesOf(prop))
    }
  }

  const event = createEvent({
    ...fields,
    uid,
    summary: fields.summary ?? '',
    start,
    end,
    rdate,
    extraProperties: extra.map(toIcsProperty),
    extraComponents: component.components.map(stripLines),
  })
  return { event, line: component.line, recurrenceId, exdates }
}

function groupSeries(parsed: ParsedEvent[]): Map<string, EventSeries> {
  const masters = new Map<string, ParsedEvent>()
  for (const item of parsed) {
    if (item.recurrenceId !== null) continue
    if (masters.has(item.event.uid)) throw new ParseError(`duplicate UID ${item.event.uid}`, item.line)
    masters.set(item.event.uid, item)
  }

  const overrides = new Map<string, Map<string, CalendarEvent>>()
  for (const item of parsed) {
    if (item.recurrenceId === null) continue
    const uid = item.event.uid
    const key = keyOn(item.recurrenceId, masters.get(uid)?.event.start ?? null)
    const byKey = overrides.get(uid) ?? new Map<string, CalendarEvent>()
    if (byKey.has(key)) throw new ParseError(`duplicate RECURRENCE-ID ${key} for UID ${uid}`, item.line)
    byKey.set(key, { ...item.event, recurrenceId: key })
    overrides.set(uid, byKey)
  }

  const uids = [...new Set([...masters.keys(), ...overrides.keys()])]
  const series = new Map<string, EventSeries>()
  for (const uid of uids) {
    const master = masters.get(uid)
    series.set(uid, {
      uid,
      master: master ? master.event : null,
      overrides: overrides.get(uid) ?? new Map(),
      exclusions: new Set(master ? master.exdates.map(t => keyOn(t, master.event.start)) : []),
    })
  }
  return series
}

/**
 * Parse a .ics document into a Calendar.
 */
export function parseIcs(text: string): Calendar {
  const roots = parseComponents(unfoldLines(text))
  const calendars = roots.filter(c => c.name === 'VCALENDAR')
  const first = calendars[0]
  if (!first) throw new ParseError('no VCALENDAR component found')

  let prodid = ''
  let version = VERSION
  const properties: IcsProperty[] = []
  const components: IcsComponent[] = []
  const events: ParsedEvent[] = []

  for (const prop of first.properties) {
    if (prop.name === 'PRODID') prodid = prop.value
    else if (prop.name === 'VERSION') version = prop.value.trim()
    else properties.push(toIcsProperty(prop))
  }
  // Concatenated feeds: later VCALENDARs contribute their components only
  for (const calendar of calendars) {
    for (const component of calendar.components) {
      if (component.name === 'VEVENT') events.push(eventFromComponent(component))
      else components.push(stripLines(component))
    }
  }

  return { prodid, version, properties, components, series: groupSeries(events) }
}

// ── Model → text ───────────────────────────────────────────────────────────

function quoteParam(value: string): string {
  return /[:;]/.test(value) ? `"${value.replace(/"/g, '')}"` : value
}

function formatProperty({ name, params, value }: IcsProperty): string {
  const paramText = Object.entries(params)
    .map(([key, v]) => `;${key}=${quoteParam(v)}`)
    .join('')
  return `${name}${paramText}:${value}`
}

function timeProperty(name: string, time: CalendarTime): IcsProperty {
  return { name, params: icsTimeParams(time), value: formatIcsTime(time) }
}

/**
 * Fold long lines per RFC 5545: at most 75 octets per line, never inside a
 * UTF-8 sequence.
 */
function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) return line
  const parts: string[] = []
  let current = ''
  let octets = 0
  for (const ch of line) {
    const size = Buffer.byteLength(ch, 'utf8')
    if (octets + size > MAX_LINE_OCTETS) {
      parts.push(current)
      current = ' '
      octets = 1
    }
    current += ch
    octets += size
  }
  parts.push(current)
  return parts.join(CRLF)
}

function componentLines(component: IcsComponent): string[] {
  return [
    `BEGIN:${component.name}`,
    ...component.properties.map(formatProperty),
    ...component.components.flatMap(componentLines),
    `END:${component.name}`,
  ]
}

function eventLines(event: CalendarEvent, series: EventSeries): string[] {
  const props: IcsProperty[] = [{ name: 'UID', params: {}, value: event.uid }]
  if (event.dtstamp) props.push(timeProperty('DTSTAMP', event.dtstamp))
  if (event.recurrenceId !== undefined) {
    const like = series.master?.start ?? event.start
    props.push(timeProperty('RECURRENCE-ID', fromWall(keyToWall(event.recurrenceId), like)))
  }
  props.push(timeProperty('DTSTART', event.start))
  props.push(timeProperty('DTEND', event.end))
  props.push({ name: 'SUMMARY', params: {}, value: escapeText(event.summary) })
  if (event.description !== undefined) props.push({ name: 'DESCRIPTION', params: {}, value: escapeText(event.description) })
  if (event.location !== undefined) props.push({ name: 'LOCATION', params: {}, value: escapeText(event.location) })
  if (event.status !== undefined) props.push({ name: 'STATUS', params: {}, value: event.status })
  if (event.sequence > 0) props.push({ name: 'SEQUENCE', params: {}, value: String(event.sequence) })
  if (event.rrule) props.push({ name: 'RRULE', params: {}, value: formatRrule(event.rrule) })
  for (const rdate of event.rdate) props.push(timeProperty('RDATE', rdate))

  if (event.recurrenceId === undefined && series.exclusions.size > 0) {
    const excluded = [...series.exclusions]
      .sort(compareKeys)
      .map(key => fromWall(keyToWall(key), event.start))
    props.push({
      name: 'EXDATE',
      params: icsTimeParams(event.start),
      value: excluded.map(formatIcsTime).join(','),
    })
  }
  if (event.created) props.push(timeProperty('CREATED', event.created))
  if (event.lastModified) props.push(timeProperty('LAST-MODIFIED', event.lastModified))
  props.push(...event.extraProperties)

  return [
    'BEGIN:VEVENT',
    ...props.map(formatProperty),
    ...event.extraComponents.flatMap(componentLines),
    'END:VEVENT',
  ]
}

export interface SerializeOptions {
  /** PRODID to write; defaults to the calendar's own */
  prodid?: string
}

/**
 * Serialize a Calendar to .ics text (CRLF line endings, folded).
 */
export function serializeIcs(calendar: Calendar, options: SerializeOptions = {}): string {
  const lines: string[] = [
    'BEGIN:VCALENDAR',
    `VERSION:${calendar.version || VERSION}`,
    `PRODID:${options.prodid ?? calendar.prodid}`,
    ...calendar.properties.map(formatProperty),
    ...calendar.components.flatMap(componentLines),
  ]

  const uids = [...calendar.series.keys()].sort()
  for (const uid of uids) {
    const series = calendar.series.get(uid)
    if (!series) continue
    if (series.master) lines.push(...eventLines(series.master, series))
    const keys = [...series.overrides.keys()].sort(compareKeys)
    for (const key of keys) {
      const override = series.overrides.get(key)
      if (override) lines.push(...eventLines(override, series))
    }
  }

  lines.push('END:VCALENDAR')
  return lines.map(foldLine).join(CRLF) + CRLF
}
