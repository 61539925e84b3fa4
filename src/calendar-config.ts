// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Calendar list configuration
 *
 * Loaded from calendars.yaml:
 *
 *   calendars:
 *     - name: Personal
 *     - name: Holidays
 *       url: https://example.com/holidays.ics
 *
 * An entry without `url` is a local, writable calendar. Each entry's storage
 * key is the slug of its name and must be unique.
 */

import { readFileSync, existsSync } from 'node:fs'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { CALENDARS_FILE } from './config.js'
import { ConfigError } from './errors.js'

// ── Types ──────────────────────────────────────────────────────────────────

export interface CalendarConfig {
  key: string
  name: string
  /** Remote feed; absent for a local calendar */
  url?: string
}

const CalendarEntrySchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url()
    .refine(url => /^(https?|webcal):\/\//i.test(url), 'url must be http, https or webcal')
    .transform(url => url.replace(/^webcal:\/\//i, 'https://'))
    .optional(),
})

const CalendarsFileSchema = z.object({
  calendars: z.array(CalendarEntrySchema),
})

export const DEFAULT_CALENDARS: CalendarConfig[] = [{ key: 'calendar', name: 'Calendar' }]

// ── Parsing ────────────────────────────────────────────────────────────────

export function slugify(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
}

export function parseCalendarsConfig(content: string): CalendarConfig[] {
  let data: unknown
  try {
    data = parseYaml(content)
  } catch (err) {
    throw new ConfigError(`calendars file is not valid YAML: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
  }

  const result = CalendarsFileSchema.safeParse(data)
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`invalid calendars file: ${details.join('; ')}`)
  }

  const seen = new Set<string>()
  return result.data.calendars.map(entry => {
    const key = slugify(entry.name)
    if (key === '') throw new ConfigError(`calendar name "${entry.name}" has no usable characters`)
    if (seen.has(key)) throw new ConfigError(`duplicate calendar key "${key}" (from "${entry.name}")`)
    seen.add(key)
    return entry.url ? { key, name: entry.name, url: entry.url } : { key, name: entry.name }
  })
}

/**
 * Read the calendars file. A missing file means one local calendar.
 */
export function loadCalendarsConfig(path: string = CALENDARS_FILE): CalendarConfig[] {
  if (!existsSync(path)) return DEFAULT_CALENDARS
  return parseCalendarsConfig(readFileSync(path, 'utf-8'))
}
