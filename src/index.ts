// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * ics-calendar-node - iCalendar-backed calendars over HTTP
 *
 * Entry point
 */
import { createServer } from './server.js'
import { serverConfig, syncConfig, storageKind, defaultTimezone, CALENDARS_FILE } from './config.js'
import { closeDb } from './db.js'
import { loadCalendarsConfig } from './calendar-config.js'
import { CalendarRegistry } from './calendar-registry.js'
import { createCalendarStore } from './calendar-store.js'
import { HttpCalendarTransport } from './remote-fetch.js'
import { logger } from './logger.js'

async function main(): Promise<void> {
  logger.info('Starting ics-calendar-node...')

  try {
    const zone = defaultTimezone()
    const configs = loadCalendarsConfig()
    logger.info({ file: CALENDARS_FILE, calendars: configs.map(c => c.key), storage: storageKind }, 'Calendars configured')

    const registry = new CalendarRegistry(configs, {
      zone,
      transport: new HttpCalendarTransport({ timeoutMs: syncConfig.fetchTimeoutMs }),
      storeFor: key => createCalendarStore(storageKind, key),
      syncIntervalMs: syncConfig.intervalMinutes * 60_000,
    })
    await registry.start()

    const app = await createServer({ registry })
    await app.listen({
      port: serverConfig.port,
      host: serverConfig.host,
    })

    const baseUrl = `http://${serverConfig.host}:${serverConfig.port}`
    logger.info({ baseUrl, pid: process.pid }, 'Server running')

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`${signal} received, shutting down...`)
      registry.stop()
      await app.close()
      closeDb()
      process.exit(0)
    }

    process.on('SIGTERM', () => { void shutdown('SIGTERM') })
    process.on('SIGINT', () => { void shutdown('SIGINT') })
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server')
    process.exit(1)
  }
}

void main()
