// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Calendar entities — one per configured calendar
 *
 * An entity owns a committed Calendar and its stored document. Mutations and
 * refreshes run one at a time; each works on a copy and only replaces the
 * committed Calendar once the new document is stored, so readers never see a
 * half-applied change and a failure leaves everything as it was.
 */

import { DateTime } from 'luxon'
import { type Calendar, type CalendarEvent, cloneCalendar, createCalendar } from './calendar-model.js'
import type { CalendarStore } from './calendar-store.js'
import { PRODID } from './config.js'
import { ReadOnlyCalendarError } from './errors.js'
import { type Clock, type EventPatch, EventStore, type NewEvent, type RecurrenceRange } from './event-store.js'
import { parseIcs, serializeIcs } from './ics-codec.js'
import { type Logger, calendarLogger } from './logger.js'
import type { CalendarTransport } from './remote-fetch.js'
import { type Occurrence, Timeline } from './timeline.js'

// ── Types ──────────────────────────────────────────────────────────────────

export interface CalendarEntityOptions {
  key: string
  name: string
  /** Zone for floating times and dates */
  zone: string
  store: CalendarStore
  clock?: Clock
  logger?: Logger
  prodid?: string
}

export interface RemoteCalendarOptions extends CalendarEntityOptions {
  url: string
  transport: CalendarTransport
  /** Refresh period of the sync loop */
  intervalMs: number
}

export interface CalendarState {
  key: string
  name: string
  readOnly: boolean
  url: string | null
  eventCount: number
  nextEvent: Occurrence | null
  lastRefreshAt: string | null
}

export type RefreshOutcome = 'updated' | 'not-modified'

// ── Base entity ────────────────────────────────────────────────────────────

export abstract class CalendarEntity {
  readonly key: string
  readonly name: string
  readonly zone: string
  abstract readonly readOnly: boolean

  protected calendar: Calendar
  protected readonly store: CalendarStore
  protected readonly clock: Clock
  protected readonly log: Logger
  protected readonly prodid: string
  private queue: Promise<void> = Promise.resolve()

  constructor(options: CalendarEntityOptions) {
    this.key = options.key
    this.name = options.name
    this.zone = options.zone
    this.store = options.store
    this.clock = options.clock ?? (() => DateTime.utc())
    this.log = options.logger ?? calendarLogger(options.key)
    this.prodid = options.prodid ?? PRODID
    this.calendar = createCalendar(this.prodid)
  }

  /**
   * Load the stored document. An empty store starts an empty calendar.
   */
  async load(): Promise<void> {
    await this.exclusive(async () => {
      const content = await this.store.load()
      const calendar = content === null || content.trim() === ''
        ? createCalendar(this.prodid)
        : parseIcs(content)
      this.commit(calendar)
      this.log.info({ series: calendar.series.size }, 'Calendar loaded')
    })
  }

  // ── Queries ───────────────────────────────────────────────────────────────

  getEvents(start: DateTime, end: DateTime): Occurrence[] {
    return new Timeline(this.calendar, this.zone).overlapping(start, end)
  }

  getNextActive(now: DateTime = this.clock()): Occurrence | null {
    return new Timeline(this.calendar, this.zone).nextActive(now)
  }

  /** The committed Calendar. Treat as read-only. */
  snapshot(): Calendar {
    return this.calendar
  }

  exportIcs(): string {
    return serializeIcs(this.calendar, { prodid: this.prodid })
  }

  state(): CalendarState {
    return {
      key: this.key,
      name: this.name,
      readOnly: this.readOnly,
      url: null,
      eventCount: this.calendar.series.size,
      nextEvent: this.getNextActive(this.clock()),
      lastRefreshAt: null,
    }
  }

  // ── Mutations ─────────────────────────────────────────────────────────────

  createEvent(input: NewEvent): Promise<CalendarEvent> {
    return this.mutate('create', store => store.add(input))
  }

  updateEvent(
    uid: string,
    patch: EventPatch,
    recurrenceId: string | null = null,
    range: RecurrenceRange = 'NONE',
  ): Promise<CalendarEvent> {
    return this.mutate('update', store => store.edit(uid, patch, recurrenceId, range))
  }

  deleteEvent(uid: string, recurrenceId: string | null = null, range: RecurrenceRange = 'NONE'): Promise<void> {
    return this.mutate('delete', store => store.delete(uid, recurrenceId, range))
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  /** Run `task` after every task queued before it. */
  protected exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task)
    this.queue = run.then(() => undefined, () => undefined)
    return run
  }

  protected commit(calendar: Calendar): void {
    this.calendar = calendar
  }

  private mutate<T>(action: string, apply: (store: EventStore) => T): Promise<T> {
    if (this.readOnly) return Promise.reject(new ReadOnlyCalendarError(this.key))
    return this.exclusive(async () => {
      const draft = cloneCalendar(this.calendar)
      const result = apply(new EventStore(draft, this.clock))
      await this.store.store(serializeIcs(draft, { prodid: this.prodid }))
      this.commit(draft)
      this.log.debug({ action, series: draft.series.size }, 'Calendar updated')
      return result
    })
  }
}

// ── Local ──────────────────────────────────────────────────────────────────

export class LocalCalendarEntity extends CalendarEntity {
  readonly readOnly = false
}

// ── Remote ─────────────────────────────────────────────────────────────────

export class RemoteCalendarEntity extends CalendarEntity {
  readonly readOnly = true
  readonly url: string
  private readonly transport: CalendarTransport
  private readonly intervalMs: number
  private etag: string | null = null
  private lastRefreshAt: DateTime | null = null
  private timer: NodeJS.Timeout | null = null

  constructor(options: RemoteCalendarOptions) {
    super(options)
    this.url = options.url
    this.transport = options.transport
    this.intervalMs = options.intervalMs
  }

  /**
   * Fetch the feed. A 304 changes nothing; a fetch, parse or store failure
   * is thrown and leaves the last good Calendar in place.
   */
  refresh(): Promise<RefreshOutcome> {
    return this.exclusive(async () => {
      const result = await this.transport.fetch(this.url, this.etag)
      this.lastRefreshAt = this.clock()
      if (result.status === 'not-modified') {
        this.log.debug('Feed not modified')
        return 'not-modified'
      }
      const calendar = parseIcs(result.text)
      await this.store.store(result.text)
      this.etag = result.etag
      this.commit(calendar)
      this.log.info({ series: calendar.series.size }, 'Feed refreshed')
      return 'updated'
    })
  }

  startSync(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      this.refresh().catch((err: unknown) => {
        this.log.warn({ err }, 'Feed refresh failed; keeping the last good copy')
      })
    }, this.intervalMs)
    this.timer.unref()
  }

  stopSync(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  override state(): CalendarState {
    return {
      ...super.state(),
      url: this.url,
      lastRefreshAt: this.lastRefreshAt?.toUTC().toISO() ?? null,
    }
  }
}
