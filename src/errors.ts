// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Calendar error taxonomy.
 *
 * Every error raised by the codec, the event store or the entities is a
 * CalendarError with a stable `code`, so the HTTP layer can map it to a
 * status without matching on messages.
 */

export type CalendarErrorCode =
  | 'parse_error'
  | 'validation_error'
  | 'duplicate_uid'
  | 'event_not_found'
  | 'invalid_range'
  | 'read_only'
  | 'transport_error'
  | 'config_error'

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CalendarError'
    this.code = code
  }
}

/** Malformed iCalendar text. `line` is the 1-based physical line a content line starts on. */
export class ParseError extends CalendarError {
  readonly line: number | null
  readonly reason: string

  constructor(reason: string, line: number | null = null, options?: { cause?: unknown }) {
    super('parse_error', line === null ? `Invalid calendar: ${reason}` : `Invalid calendar (line ${line}): ${reason}`, options)
    this.name = 'ParseError'
    this.line = line
    this.reason = reason
  }
}

export class ValidationError extends CalendarError {
  readonly problems: string[]

  constructor(problems: string | string[]) {
    const list = Array.isArray(problems) ? problems : [problems]
    super('validation_error', `Validation failed: ${list.join('; ')}`)
    this.name = 'ValidationError'
    this.problems = list
  }
}

export class DuplicateUidError extends CalendarError {
  constructor(readonly uid: string) {
    super('duplicate_uid', `An event with uid ${uid} already exists`)
    this.name = 'DuplicateUidError'
  }
}

export class EventNotFoundError extends CalendarError {
  constructor(readonly uid: string, readonly recurrenceId: string | null = null) {
    super(
      'event_not_found',
      recurrenceId === null
        ? `No event with uid ${uid}`
        : `No occurrence ${recurrenceId} of event ${uid}`,
    )
    this.name = 'EventNotFoundError'
  }
}

export class InvalidRangeError extends CalendarError {
  constructor(message: string) {
    super('invalid_range', message)
    this.name = 'InvalidRangeError'
  }
}

export class ReadOnlyCalendarError extends CalendarError {
  constructor(readonly calendar: string) {
    super('read_only', `Calendar ${calendar} is read-only`)
    this.name = 'ReadOnlyCalendarError'
  }
}

export class TransportError extends CalendarError {
  constructor(message: string, readonly status: number | null = null, options?: { cause?: unknown }) {
    super('transport_error', message, options)
    this.name = 'TransportError'
  }
}

export class ConfigError extends CalendarError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config_error', message, options)
    this.name = 'ConfigError'
  }
}

export function isCalendarError(err: unknown): err is CalendarError {
  return err instanceof CalendarError
}
