import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { DateTime } from 'luxon'
import type { FastifyInstance } from 'fastify'
import { createServer } from '../src/server.js'
import { CalendarRegistry } from '../src/calendar-registry.js'
import { MemoryCalendarStore } from '../src/calendar-store.js'
import { TransportError } from '../src/errors.js'
import type { CalendarTransport, FetchResult } from '../src/remote-fetch.js'

const FEED = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//feed//EN',
  'BEGIN:VEVENT',
  'UID:holiday-1',
  'DTSTART;VALUE=DATE:20260305',
  'DTEND;VALUE=DATE:20260306',
  'SUMMARY:Holiday',
  'END:VEVENT',
  'END:VCALENDAR',
  '',
].join('\r\n')

class ScriptedTransport implements CalendarTransport {
  constructor(private readonly responses: Array<FetchResult | Error>) {}

  async fetch(): Promise<FetchResult> {
    const next = this.responses.shift()
    if (next === undefined) throw new TransportError('no response scripted')
    if (next instanceof Error) throw next
    return next
  }
}

describe('HTTP API', () => {
  let app: FastifyInstance
  let registry: CalendarRegistry

  beforeEach(async () => {
    registry = new CalendarRegistry([
      { key: 'personal', name: 'Personal' },
      { key: 'holidays', name: 'Holidays', url: 'https://calendar.example.test/holidays.ics' },
    ], {
      zone: 'UTC',
      transport: new ScriptedTransport([
        { status: 'ok', text: FEED, etag: '"v1"' },
        { status: 'not-modified' },
        new TransportError('Fetching https://calendar.example.test/holidays.ics failed: HTTP 500', 500),
      ]),
      storeFor: () => new MemoryCalendarStore(),
      syncIntervalMs: 3_600_000,
      clock: () => DateTime.fromISO('2026-03-01T12:00:00Z', { zone: 'utc' }),
    })
    await registry.start()
    app = await createServer({ registry, logger: false })
  })

  afterEach(async () => {
    registry.stop()
    await app.close()
  })

  async function createGym() {
    return app.inject({
      method: 'POST',
      url: '/calendars/personal/events',
      payload: {
        uid: 'gym',
        summary: 'Gym',
        start: '2026-03-10T18:00:00',
        end: '2026-03-10T19:00:00',
        rrule: 'FREQ=DAILY;COUNT=3',
      },
    })
  }

  async function eventsBetween(key: string, start: string, end: string) {
    const res = await app.inject({ method: 'GET', url: `/calendars/${key}/events?start=${start}&end=${end}` })
    return res.json<{ events: Array<{ uid: string; summary: string; recurrence_id: string | null }>; count: number }>()
  }

  it('reports health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' })
    expect(res.statusCode).toBe(200)
    expect(res.json()).toMatchObject({ status: 'ok', calendars: 2 })
  })

  it('lists calendars with their state', async () => {
    const res = await app.inject({ method: 'GET', url: '/calendars' })
    const body = res.json<{ calendars: Array<Record<string, unknown>> }>()
    expect(body.calendars).toHaveLength(2)
    expect(body.calendars[0]).toMatchObject({ key: 'personal', read_only: false, url: null, event_count: 0, next_event: null })
    expect(body.calendars[1]).toMatchObject({
      key: 'holidays',
      read_only: true,
      url: 'https://calendar.example.test/holidays.ics',
      event_count: 1,
      last_refresh_at: '2026-03-01T12:00:00.000Z',
    })
  })

  it('creates an event', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/calendars/personal/events',
      payload: { uid: 'dentist-1', summary: 'Dentist', start: '2026-03-10T15:00:00', end: '2026-03-10T16:00:00' },
    })
    expect(res.statusCode).toBe(201)
    expect(res.json()).toEqual({
      event: {
        uid: 'dentist-1',
        recurrence_id: null,
        summary: 'Dentist',
        description: null,
        location: null,
        status: null,
        start: '2026-03-10T15:00:00+00:00',
        end: '2026-03-10T16:00:00+00:00',
        all_day: false,
        rrule: null,
      },
    })

    const listed = await eventsBetween('personal', '2026-03-10', '2026-03-11')
    expect(listed.count).toBe(1)
  })

  it('rejects a duplicate uid with 409', async () => {
    await createGym()
    const res = await createGym()
    expect(res.statusCode).toBe(409)
    expect(res.json()).toMatchObject({ code: 'duplicate_uid' })
  })

  it('rejects an invalid body with 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/calendars/personal/events',
      payload: { start: '2026-03-10T15:00:00', end: '2026-03-10T16:00:00' },
    })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toMatchObject({ error: 'Validation failed' })
  })

  it('rejects an invalid rule with 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/calendars/personal/events',
      payload: { summary: 'x', start: '2026-03-10T15:00:00', end: '2026-03-10T16:00:00', rrule: 'FREQ=HOURLY' },
    })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toMatchObject({ code: 'validation_error' })
  })

  it('rejects a range that ends before it starts', async () => {
    const res = await app.inject({ method: 'GET', url: '/calendars/personal/events?start=2026-03-11&end=2026-03-10' })
    expect(res.statusCode).toBe(400)
  })

  it('edits and deletes single occurrences', async () => {
    await createGym()
    const patched = await app.inject({
      method: 'PATCH',
      url: '/calendars/personal/events/gym',
      payload: { summary: 'Late gym', start: '2026-03-11T20:00:00', recurrence_id: '20260311T180000' },
    })
    expect(patched.statusCode).toBe(200)
    expect(patched.json()).toMatchObject({
      event: {
        recurrence_id: '20260311T180000',
        summary: 'Late gym',
        start: '2026-03-11T20:00:00+00:00',
        end: '2026-03-11T21:00:00+00:00',
      },
    })

    const deleted = await app.inject({
      method: 'DELETE',
      url: '/calendars/personal/events/gym?recurrence_id=20260312T180000',
    })
    expect(deleted.statusCode).toBe(204)

    const listed = await eventsBetween('personal', '2026-03-10', '2026-03-13')
    expect(listed.events.map(e => `${e.summary}@${e.recurrence_id}`)).toEqual([
      'Gym@20260310T180000',
      'Late gym@20260311T180000',
    ])
  })

  it('deletes this and future occurrences', async () => {
    await createGym()
    const res = await app.inject({
      method: 'DELETE',
      url: '/calendars/personal/events/gym?recurrence_id=20260311T180000&recurrence_range=THISANDFUTURE',
    })
    expect(res.statusCode).toBe(204)
    const listed = await eventsBetween('personal', '2026-03-10', '2026-03-13')
    expect(listed.events.map(e => e.recurrence_id)).toEqual(['20260310T180000'])
  })

  it('returns 404 for unknown events and calendars', async () => {
    const missingEvent = await app.inject({ method: 'DELETE', url: '/calendars/personal/events/nope' })
    expect(missingEvent.statusCode).toBe(404)
    expect(missingEvent.json()).toMatchObject({ code: 'event_not_found' })

    const missingCalendar = await app.inject({ method: 'GET', url: '/calendars/nope/next' })
    expect(missingCalendar.statusCode).toBe(404)
    expect(missingCalendar.json()).toEqual({ error: 'Calendar nope not found' })
  })

  it('refuses writes to a remote calendar with 405', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/calendars/holidays/events',
      payload: { summary: 'x', start: '2026-03-10T15:00:00', end: '2026-03-10T16:00:00' },
    })
    expect(res.statusCode).toBe(405)
    expect(res.json()).toMatchObject({ code: 'read_only' })
  })

  it('returns the next active event', async () => {
    const res = await app.inject({ method: 'GET', url: '/calendars/holidays/next?at=2026-03-04T00:00:00Z' })
    expect(res.json()).toMatchObject({ event: { uid: 'holiday-1', start: '2026-03-05', end: '2026-03-06', all_day: true } })
  })

  it('exports the calendar with a revalidating ETag', async () => {
    const first = await app.inject({ method: 'GET', url: '/calendars/holidays/calendar.ics' })
    expect(first.statusCode).toBe(200)
    expect(first.headers['content-type']).toBe('text/calendar; charset=utf-8')
    expect(first.body).toContain('\r\nUID:holiday-1\r\n')

    const etag = first.headers.etag
    expect(typeof etag).toBe('string')
    const second = await app.inject({
      method: 'GET',
      url: '/calendars/holidays/calendar.ics',
      headers: { 'if-none-match': String(etag) },
    })
    expect(second.statusCode).toBe(304)
  })

  it('refreshes remote feeds on demand', async () => {
    const unchanged = await app.inject({ method: 'POST', url: '/calendars/holidays/refresh' })
    expect(unchanged.statusCode).toBe(200)
    expect(unchanged.json()).toMatchObject({ outcome: 'not-modified', calendar: { event_count: 1 } })

    const failed = await app.inject({ method: 'POST', url: '/calendars/holidays/refresh' })
    expect(failed.statusCode).toBe(502)
    expect(failed.json()).toMatchObject({ code: 'transport_error' })

    const local = await app.inject({ method: 'POST', url: '/calendars/personal/refresh' })
    expect(local.statusCode).toBe(400)
  })
})
