// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Configuration loader
 */
import 'dotenv/config'
import { homedir } from 'os'
import { join } from 'path'
import { DateTime } from 'luxon'
import { isKnownZone } from './calendar-time.js'

export type StorageKind = 'file' | 'sqlite'

export interface ServerConfig {
  port: number
  host: string
  corsEnabled: boolean
}

export interface SyncConfig {
  intervalMinutes: number
  fetchTimeoutMs: number
}

function positiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

export const serverConfig: ServerConfig = {
  port: positiveInt(process.env.PORT, 4460),
  host: process.env.HOST || '0.0.0.0',
  corsEnabled: process.env.CORS_ENABLED !== 'false',
}

export const syncConfig: SyncConfig = {
  // Remote calendars poll every six hours by default
  intervalMinutes: positiveInt(process.env.SYNC_INTERVAL_MINUTES, 360),
  fetchTimeoutMs: positiveInt(process.env.FETCH_TIMEOUT_MS, 30_000),
}

export const isDev = process.env.NODE_ENV !== 'production'
export const logLevel = process.env.LOG_LEVEL || (isDev ? 'debug' : 'info')

export const storageKind: StorageKind = process.env.CALENDAR_STORAGE === 'sqlite' ? 'sqlite' : 'file'

/**
 * Zone used for floating times, dates and input without an offset.
 * CALENDAR_TIMEZONE, else the system zone.
 */
export function defaultTimezone(): string {
  const configured = process.env.CALENDAR_TIMEZONE
  if (configured && isKnownZone(configured)) return configured
  return DateTime.local().zoneName || 'UTC'
}

/**
 * Data directory configuration
 * Uses CALENDAR_HOME environment variable or defaults to ~/.ics-calendar
 */
export const CALENDAR_HOME = process.env.CALENDAR_HOME || join(homedir(), '.ics-calendar')
export const DATA_DIR = join(CALENDAR_HOME, 'data')
export const CALENDARS_FILE = process.env.CALENDARS_FILE || join(CALENDAR_HOME, 'calendars.yaml')
export const PRODID = '-//ics-calendar-node//Calendar v1//EN'
