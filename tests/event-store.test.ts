import { describe, it, expect, beforeEach } from 'vitest'
import { DateTime } from 'luxon'
import { calendarDate, calendarDateTime } from '../src/calendar-time.js'
import { type Calendar, createCalendar, createEvent, createSeries } from '../src/calendar-model.js'
import { EventStore } from '../src/event-store.js'
import { DuplicateUidError, EventNotFoundError, InvalidRangeError, ValidationError } from '../src/errors.js'
import { formatRrule, parseRrule } from '../src/rrule.js'
import { Timeline } from '../src/timeline.js'

const clock = () => DateTime.fromISO('2026-03-01T12:00:00Z', { zone: 'utc' })
const stamp = calendarDateTime('2026-03-01T12:00:00', 'UTC')
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

function gymSeries(rule = 'FREQ=DAILY;COUNT=3') {
  return createSeries(createEvent({
    uid: 'gym',
    summary: 'Gym',
    start: calendarDateTime('2026-03-02T18:00:00'),
    end: calendarDateTime('2026-03-02T19:00:00'),
    rrule: parseRrule(rule),
  }))
}

function occurrenceKeys(calendar: Calendar): string[] {
  return new Timeline(calendar, 'UTC')
    .overlapping(DateTime.fromISO('2026-03-01T00:00:00Z'), DateTime.fromISO('2026-04-01T00:00:00Z'))
    .map(o => `${o.event.summary}@${o.recurrenceId}`)
}

describe('EventStore.add', () => {
  let calendar: Calendar
  let store: EventStore

  beforeEach(() => {
    calendar = createCalendar('-//test//EN')
    store = new EventStore(calendar, clock)
  })

  it('assigns a uid and stamps the event', () => {
    const event = store.add({
      summary: 'Dentist',
      start: calendarDateTime('2026-03-10T15:00:00'),
      end: calendarDateTime('2026-03-10T16:00:00'),
      location: 'Main St',
    })
    expect(event.uid).toMatch(UUID)
    expect(event.created).toEqual(stamp)
    expect(event.dtstamp).toEqual(stamp)
    expect(event.location).toBe('Main St')
    expect(event.sequence).toBe(0)
    expect(calendar.series.get(event.uid)?.master).toBe(event)
  })

  it('rejects a duplicate uid', () => {
    const input = {
      uid: 'dentist',
      summary: 'Dentist',
      start: calendarDateTime('2026-03-10T15:00:00'),
      end: calendarDateTime('2026-03-10T16:00:00'),
    }
    store.add(input)
    expect(() => store.add(input)).toThrow(DuplicateUidError)
    expect(calendar.series.size).toBe(1)
  })

  it('rejects an end before the start', () => {
    expect(() => store.add({
      summary: 'Backwards',
      start: calendarDateTime('2026-03-10T15:00:00'),
      end: calendarDateTime('2026-03-10T14:00:00'),
    })).toThrow(ValidationError)
    expect(calendar.series.size).toBe(0)
  })

  it('rejects a date start with a date-time end', () => {
    expect(() => store.add({
      summary: 'Mixed',
      start: calendarDate('2026-03-10'),
      end: calendarDateTime('2026-03-10T14:00:00'),
    })).toThrow(ValidationError)
  })

  it('rejects a recurrence-id', () => {
    expect(() => store.add({
      summary: 'Override',
      start: calendarDateTime('2026-03-10T15:00:00'),
      end: calendarDateTime('2026-03-10T16:00:00'),
      recurrenceId: '20260310T150000',
    })).toThrow(ValidationError)
  })
})

describe('EventStore.delete', () => {
  let calendar: Calendar
  let store: EventStore

  beforeEach(() => {
    calendar = createCalendar('-//test//EN')
    calendar.series.set('gym', gymSeries())
    store = new EventStore(calendar, clock)
  })

  it('deletes a whole series', () => {
    store.delete('gym')
    expect(calendar.series.has('gym')).toBe(false)
  })

  it('excludes a single occurrence', () => {
    store.delete('gym', '20260303T180000Z')
    expect([...(calendar.series.get('gym')?.exclusions ?? [])]).toEqual(['20260303T180000'])
    expect(occurrenceKeys(calendar)).toEqual(['Gym@20260302T180000', 'Gym@20260304T180000'])
  })

  it('reads a UTC id on the clock of a zoned series', () => {
    calendar.series.set('standup', createSeries(createEvent({
      uid: 'standup',
      summary: 'Standup',
      start: calendarDateTime('2026-03-02T09:00:00', 'Europe/Paris'),
      end: calendarDateTime('2026-03-02T09:15:00', 'Europe/Paris'),
      rrule: parseRrule('FREQ=DAILY;COUNT=3'),
    })))
    store.delete('standup', '20260303T080000Z')
    expect([...(calendar.series.get('standup')?.exclusions ?? [])]).toEqual(['20260303T090000'])
    expect(() => store.delete('standup', '20260304T090000Z')).toThrow(EventNotFoundError)
  })

  it('rejects ids that are not occurrences', () => {
    expect(() => store.delete('gym', '20260303T170000')).toThrow(EventNotFoundError)
    expect(() => store.delete('gym', 'soon')).toThrow(EventNotFoundError)
    expect(() => store.delete('swim')).toThrow(EventNotFoundError)
  })

  it('rejects an already deleted occurrence', () => {
    store.delete('gym', '20260303T180000')
    expect(() => store.delete('gym', '20260303T180000')).toThrow(EventNotFoundError)
  })

  it('requires a recurrence-id for THIS_AND_FUTURE', () => {
    expect(() => store.delete('gym', null, 'THIS_AND_FUTURE')).toThrow(InvalidRangeError)
  })

  it('truncates the rule before the split', () => {
    store.delete('gym', '20260303T180000', 'THIS_AND_FUTURE')
    const master = calendar.series.get('gym')?.master
    expect(master?.rrule).toEqual({
      freq: 'DAILY',
      interval: 1,
      until: calendarDateTime('2026-03-03T17:59:59'),
    })
    expect(master?.sequence).toBe(1)
    expect(occurrenceKeys(calendar)).toEqual(['Gym@20260302T180000'])
  })

  it('removes the series when cut at its first occurrence', () => {
    store.delete('gym', '20260302T180000', 'THIS_AND_FUTURE')
    expect(calendar.series.size).toBe(0)
  })

  it('drops overrides and exclusions at or after the split', () => {
    const moved = createEvent({
      uid: 'gym',
      recurrenceId: '20260305T180000',
      summary: 'Gym (late)',
      start: calendarDateTime('2026-03-05T20:00:00'),
      end: calendarDateTime('2026-03-05T21:00:00'),
    })
    const base = gymSeries('FREQ=DAILY;COUNT=10')
    calendar.series.set('gym', {
      ...base,
      overrides: new Map([['20260305T180000', moved]]),
      exclusions: new Set(['20260303T180000', '20260306T180000']),
    })
    store.delete('gym', '20260304T180000', 'THIS_AND_FUTURE')
    const series = calendar.series.get('gym')
    expect(series?.overrides.size).toBe(0)
    expect([...(series?.exclusions ?? [])]).toEqual(['20260303T180000'])
  })

  it('writes UNTIL in UTC for a zoned series', () => {
    calendar.series.set('standup', createSeries(createEvent({
      uid: 'standup',
      summary: 'Standup',
      start: calendarDateTime('2026-03-02T09:00:00', 'Europe/Paris'),
      end: calendarDateTime('2026-03-02T09:15:00', 'Europe/Paris'),
      rrule: parseRrule('FREQ=DAILY'),
    })))
    store.delete('standup', '20260304T090000', 'THIS_AND_FUTURE')
    const rule = calendar.series.get('standup')?.master?.rrule
    expect(rule && formatRrule(rule)).toBe('FREQ=DAILY;UNTIL=20260304T075959Z')
  })

  it('ends a date series the day before the split', () => {
    calendar.series.set('rota', createSeries(createEvent({
      uid: 'rota',
      summary: 'On call',
      start: calendarDate('2026-03-02'),
      end: calendarDate('2026-03-03'),
      rrule: parseRrule('FREQ=DAILY'),
    })))
    store.delete('rota', '20260305', 'THIS_AND_FUTURE')
    expect(calendar.series.get('rota')?.master?.rrule?.until).toEqual(calendarDate('2026-03-04'))
  })

  it('has no occurrences to address on a single event', () => {
    calendar.series.set('dentist', createSeries(createEvent({
      uid: 'dentist',
      summary: 'Dentist',
      start: calendarDateTime('2026-03-10T15:00:00'),
      end: calendarDateTime('2026-03-10T16:00:00'),
    })))
    expect(() => store.delete('dentist', '20260310T150000')).toThrow(EventNotFoundError)
  })
})

describe('EventStore.edit', () => {
  let calendar: Calendar
  let store: EventStore

  beforeEach(() => {
    calendar = createCalendar('-//test//EN')
    calendar.series.set('gym', gymSeries())
    store = new EventStore(calendar, clock)
  })

  it('edits one occurrence into an override', () => {
    const override = store.edit('gym', {
      summary: 'Gym (late)',
      start: calendarDateTime('2026-03-03T20:00:00'),
    }, '20260303T180000')
    expect(override.recurrenceId).toBe('20260303T180000')
    expect(override.end).toEqual(calendarDateTime('2026-03-03T21:00:00'))
    expect(override.rrule).toBeUndefined()
    expect(override.sequence).toBe(1)
    expect(override.lastModified).toEqual(stamp)
    expect(occurrenceKeys(calendar)).toEqual([
      'Gym@20260302T180000',
      'Gym (late)@20260303T180000',
      'Gym@20260304T180000',
    ])
  })

  it('edits an existing override again', () => {
    store.edit('gym', { summary: 'Gym (late)' }, '20260303T180000')
    const again = store.edit('gym', { location: 'Pool' }, '20260303T180000')
    expect(again.summary).toBe('Gym (late)')
    expect(again.location).toBe('Pool')
    expect(again.sequence).toBe(2)
  })

  it('rejects a rule on a single occurrence', () => {
    expect(() => store.edit('gym', { rrule: parseRrule('FREQ=WEEKLY') }, '20260303T180000'))
      .toThrow(ValidationError)
  })

  it('edits the whole series without a recurrence-id', () => {
    store.edit('gym', { summary: 'Workout' }, '20260303T180000')
    const master = store.edit('gym', { summary: 'Gym class', location: 'Hall B' })
    expect(master.sequence).toBe(1)
    expect(master.location).toBe('Hall B')
    expect(calendar.series.get('gym')?.overrides.size).toBe(1)
    expect(occurrenceKeys(calendar)).toEqual([
      'Gym class@20260302T180000',
      'Workout@20260303T180000',
      'Gym class@20260304T180000',
    ])
  })

  it('clears fields set to null', () => {
    store.edit('gym', { location: 'Hall B' })
    const master = store.edit('gym', { location: null, rrule: null })
    expect(master.location).toBeUndefined()
    expect(master.rrule).toBeUndefined()
    expect(occurrenceKeys(calendar)).toEqual(['Gym@null'])
  })

  it('splits the series for THIS_AND_FUTURE', () => {
    calendar.series.set('gym', gymSeries('FREQ=DAILY;COUNT=5'))
    const successor = store.edit('gym', { summary: 'Evening gym' }, '20260304T180000', 'THIS_AND_FUTURE')
    expect(successor.uid).toMatch(UUID)
    expect(successor.start).toEqual(calendarDateTime('2026-03-04T18:00:00'))
    expect(successor.rrule).toEqual({ freq: 'DAILY', interval: 1, count: 3 })
    expect(successor.recurrenceId).toBeUndefined()
    expect(calendar.series.get('gym')?.master?.rrule?.until).toEqual(calendarDateTime('2026-03-04T17:59:59'))
    expect(occurrenceKeys(calendar)).toEqual([
      'Gym@20260302T180000',
      'Gym@20260303T180000',
      'Evening gym@20260304T180000',
      'Evening gym@20260305T180000',
      'Evening gym@20260306T180000',
    ])
  })

  it('edits the master when THIS_AND_FUTURE starts at the first occurrence', () => {
    const master = store.edit('gym', { summary: 'Gym class' }, '20260302T180000', 'THIS_AND_FUTURE')
    expect(master.uid).toBe('gym')
    expect(calendar.series.size).toBe(1)
  })

  it('leaves the calendar untouched on a failed edit', () => {
    const before = calendar.series.get('gym')
    expect(() => store.edit('gym', { end: calendarDateTime('2026-03-01T00:00:00') })).toThrow(ValidationError)
    expect(calendar.series.get('gym')).toBe(before)
  })

  it('requires a recurrence-id for THIS_AND_FUTURE', () => {
    expect(() => store.edit('gym', { summary: 'x' }, null, 'THIS_AND_FUTURE')).toThrow(InvalidRangeError)
  })
})
