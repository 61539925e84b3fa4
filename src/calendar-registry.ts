// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Calendar registry — one entity per configured calendar
 */

import type { CalendarConfig } from './calendar-config.js'
import {
  type CalendarEntity,
  LocalCalendarEntity,
  RemoteCalendarEntity,
} from './calendar-entity.js'
import type { CalendarStore } from './calendar-store.js'
import type { Clock } from './event-store.js'
import { logger } from './logger.js'
import type { CalendarTransport } from './remote-fetch.js'

export interface RegistryOptions {
  zone: string
  transport: CalendarTransport
  storeFor: (key: string) => CalendarStore
  syncIntervalMs: number
  clock?: Clock
}

export class CalendarRegistry {
  private readonly entities = new Map<string, CalendarEntity>()

  constructor(configs: CalendarConfig[], private readonly options: RegistryOptions) {
    for (const config of configs) {
      const base = {
        key: config.key,
        name: config.name,
        zone: options.zone,
        store: options.storeFor(config.key),
        clock: options.clock,
      }
      const entity = config.url
        ? new RemoteCalendarEntity({
          ...base,
          url: config.url,
          transport: options.transport,
          intervalMs: options.syncIntervalMs,
        })
        : new LocalCalendarEntity(base)
      this.entities.set(config.key, entity)
    }
  }

  get(key: string): CalendarEntity | undefined {
    return this.entities.get(key)
  }

  list(): CalendarEntity[] {
    return [...this.entities.values()]
  }

  /**
   * Load every stored document, then fetch remote feeds once and start their
   * sync loops. A remote feed that fails its first fetch still serves its
   * stored copy.
   */
  async start(): Promise<void> {
    for (const entity of this.entities.values()) {
      await entity.load()
    }
    for (const entity of this.entities.values()) {
      if (!(entity instanceof RemoteCalendarEntity)) continue
      try {
        await entity.refresh()
      } catch (err) {
        logger.warn({ err, calendar: entity.key }, 'Initial feed refresh failed')
      }
      entity.startSync()
    }
    logger.info({ calendars: this.entities.size, zone: this.options.zone }, 'Calendars ready')
  }

  stop(): void {
    for (const entity of this.entities.values()) {
      if (entity instanceof RemoteCalendarEntity) entity.stopSync()
    }
  }
}
