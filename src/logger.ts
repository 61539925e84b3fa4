// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Process logger. Pretty-printed in development like the Fastify server,
 * JSON lines otherwise.
 */
import { pino, type Logger, type LoggerOptions } from 'pino'
import { isDev, logLevel } from './config.js'

export type { Logger }

export function loggerOptions(): LoggerOptions {
  const silent = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined
  return {
    level: silent ? 'silent' : logLevel,
    ...(isDev && !silent ? { transport: { target: 'pino-pretty' } } : {}),
  }
}

export const logger: Logger = pino(loggerOptions())

export function calendarLogger(key: string): Logger {
  return logger.child({ calendar: key })
}
