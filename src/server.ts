// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Fastify server with REST endpoints over the configured calendars
 */
import Fastify from 'fastify'
import fastifyCors from '@fastify/cors'
import { z, ZodError } from 'zod'
import { createHash } from 'crypto'
import { DateTime } from 'luxon'
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import { serverConfig, isDev, logLevel } from './config.js'
import type { CalendarEvent } from './calendar-model.js'
import type { CalendarEntity, CalendarState } from './calendar-entity.js'
import { RemoteCalendarEntity } from './calendar-entity.js'
import type { CalendarRegistry } from './calendar-registry.js'
import { isCalendarError, ValidationError, type CalendarErrorCode } from './errors.js'
import type { RecurrenceRange } from './event-store.js'
import {
  EventFieldsSchema,
  EventPatchSchema,
  type EventView,
  parseEventFields,
  parseNewEvent,
  toEventView,
} from './event-input.js'
import { isKnownZone } from './calendar-time.js'
import { makeOccurrence } from './timeline.js'

// Schemas
const RangeSchema = z.enum(['NONE', 'THIS_AND_FUTURE', 'THISANDFUTURE'])

const EventsQuerySchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
  tz: z.string().optional(),
})

const NextQuerySchema = z.object({
  at: z.string().optional(),
  tz: z.string().optional(),
})

const UpdateEventSchema = EventPatchSchema.extend({
  recurrence_id: z.string().min(1).optional(),
  recurrence_range: RangeSchema.optional(),
})

const DeleteQuerySchema = z.object({
  recurrence_id: z.string().min(1).optional(),
  recurrence_range: RangeSchema.optional(),
})

const STATUS_BY_CODE: Record<CalendarErrorCode, number> = {
  parse_error: 400,
  validation_error: 400,
  invalid_range: 400,
  event_not_found: 404,
  read_only: 405,
  duplicate_uid: 409,
  transport_error: 502,
  config_error: 500,
}

type KeyParams = { Params: { key: string } }
type EventParams = { Params: { key: string; uid: string } }

function toRange(value: z.infer<typeof RangeSchema> | undefined): RecurrenceRange {
  return value === 'THIS_AND_FUTURE' || value === 'THISANDFUTURE' ? 'THIS_AND_FUTURE' : 'NONE'
}

function generateWeakETag(body: string): string {
  const digest = createHash('sha1').update(body).digest('base64url')
  return `W/"${digest}"`
}

function applyConditionalCaching(request: FastifyRequest, reply: FastifyReply, body: string): boolean {
  const etag = generateWeakETag(body)
  reply.header('ETag', etag)
  reply.header('Cache-Control', 'private, max-age=0, must-revalidate')

  const ifNoneMatch = request.headers['if-none-match']
  if (ifNoneMatch && ifNoneMatch === etag) {
    reply.code(304).send()
    return true
  }
  return false
}

/**
 * Parse a query instant. Date-only and offset-less values are read in `zone`.
 */
function parseInstant(name: string, value: string, zone: string): DateTime {
  const parsed = DateTime.fromISO(value, { zone, setZone: false })
  if (!parsed.isValid) {
    throw new ValidationError(`${name} is not a valid date-time: ${value}`)
  }
  return parsed
}

function displayZone(tz: string | undefined, entity: CalendarEntity): string {
  return tz && isKnownZone(tz) ? tz : entity.zone
}

function eventView(event: CalendarEvent, zone: string): EventView {
  return toEventView(makeOccurrence(event.uid, event.recurrenceId ?? null, event, event.start, event.end, zone), zone)
}

function stateView(state: CalendarState, zone: string) {
  return {
    key: state.key,
    name: state.name,
    read_only: state.readOnly,
    url: state.url,
    event_count: state.eventCount,
    next_event: state.nextEvent ? toEventView(state.nextEvent, zone) : null,
    last_refresh_at: state.lastRefreshAt,
  }
}

export interface ServerOptions {
  registry: CalendarRegistry
  /** false silences request logging (tests) */
  logger?: boolean
}

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { registry } = options
  const app = Fastify({
    logger: options.logger === false ? false : isDev ? {
      level: logLevel,
      transport: {
        target: 'pino-pretty',
      }
    } : { level: logLevel },
  })

  // Register plugins
  await app.register(fastifyCors, {
    origin: serverConfig.corsEnabled ? true : false,
  })

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        error: 'Validation failed',
        details: error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`),
      })
    }
    if (isCalendarError(error)) {
      const status = STATUS_BY_CODE[error.code]
      if (status >= 500) request.log.error({ err: error }, 'Calendar request failed')
      return reply.code(status).send({ error: error.message, code: error.code })
    }
    const status = error.statusCode ?? 500
    if (status >= 500) request.log.error({ err: error }, 'Unhandled error')
    return reply.code(status).send({ error: status >= 500 ? 'Internal server error' : error.message })
  })

  function requireCalendar(key: string, reply: FastifyReply): CalendarEntity | null {
    const entity = registry.get(key)
    if (!entity) {
      reply.code(404).send({ error: `Calendar ${key} not found` })
      return null
    }
    return entity
  }

  // Health check
  app.get('/health', async () => {
    return {
      status: 'ok',
      calendars: registry.list().length,
      timestamp: Date.now(),
    }
  })

  // ============ CALENDARS ============

  app.get('/calendars', async () => {
    return {
      calendars: registry.list().map(entity => stateView(entity.state(), entity.zone)),
    }
  })

  app.get<KeyParams>('/calendars/:key/events', async (request, reply) => {
    const entity = requireCalendar(request.params.key, reply)
    if (!entity) return
    const query = EventsQuerySchema.parse(request.query)
    const zone = displayZone(query.tz, entity)
    const start = parseInstant('start', query.start, zone)
    const end = parseInstant('end', query.end, zone)
    if (end.toMillis() <= start.toMillis()) {
      return reply.code(400).send({ error: 'end must be after start' })
    }
    const events = entity.getEvents(start, end).map(o => toEventView(o, zone))
    return { events, count: events.length }
  })

  app.get<KeyParams>('/calendars/:key/next', async (request, reply) => {
    const entity = requireCalendar(request.params.key, reply)
    if (!entity) return
    const query = NextQuerySchema.parse(request.query)
    const zone = displayZone(query.tz, entity)
    const at = query.at ? parseInstant('at', query.at, zone) : undefined
    const next = entity.getNextActive(at)
    return { event: next ? toEventView(next, zone) : null }
  })

  app.get<KeyParams>('/calendars/:key/calendar.ics', async (request, reply) => {
    const entity = requireCalendar(request.params.key, reply)
    if (!entity) return
    const body = entity.exportIcs()
    if (applyConditionalCaching(request, reply, body)) {
      return
    }
    return reply.type('text/calendar; charset=utf-8').send(body)
  })

  app.post<KeyParams>('/calendars/:key/refresh', async (request, reply) => {
    const entity = requireCalendar(request.params.key, reply)
    if (!entity) return
    if (!(entity instanceof RemoteCalendarEntity)) {
      return reply.code(400).send({ error: `Calendar ${entity.key} is not a remote feed` })
    }
    const outcome = await entity.refresh()
    return { outcome, calendar: stateView(entity.state(), entity.zone) }
  })

  // ============ EVENTS ============

  app.post<KeyParams>('/calendars/:key/events', async (request, reply) => {
    const entity = requireCalendar(request.params.key, reply)
    if (!entity) return
    const fields = EventFieldsSchema.parse(request.body)
    const created = await entity.createEvent(parseNewEvent(fields, entity.zone))
    return reply.code(201).send({ event: eventView(created, entity.zone) })
  })

  app.patch<EventParams>('/calendars/:key/events/:uid', async (request, reply) => {
    const entity = requireCalendar(request.params.key, reply)
    if (!entity) return
    const { recurrence_id, recurrence_range, ...fields } = UpdateEventSchema.parse(request.body)
    const updated = await entity.updateEvent(
      request.params.uid,
      parseEventFields(fields, entity.zone),
      recurrence_id ?? null,
      toRange(recurrence_range),
    )
    return { event: eventView(updated, entity.zone) }
  })

  app.delete<EventParams>('/calendars/:key/events/:uid', async (request, reply) => {
    const entity = requireCalendar(request.params.key, reply)
    if (!entity) return
    const query = DeleteQuerySchema.parse(request.query)
    await entity.deleteEvent(request.params.uid, query.recurrence_id ?? null, toRange(query.recurrence_range))
    return reply.code(204).send()
  })

  return app
}
