// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * SQLite database module
 *
 * Optional store for calendar documents (CALENDAR_STORAGE=sqlite), one row
 * per calendar key holding the serialized .ics text.
 */

import Database from 'better-sqlite3'
import { join } from 'path'
import { mkdirSync } from 'fs'
import { DATA_DIR } from './config.js'
import { logger } from './logger.js'

const DB_PATH = join(DATA_DIR, 'calendars.db')

let _db: Database.Database | null = null

/**
 * Get or create the SQLite database connection
 */
export function getDb(): Database.Database {
  if (_db) return _db

  mkdirSync(DATA_DIR, { recursive: true })
  _db = openDb(DB_PATH)
  return _db
}

/**
 * Open a database at `path` (or ':memory:') and bring its schema up to date.
 */
export function openDb(path: string): Database.Database {
  const db = new Database(path)

  // WAL mode for concurrent reads + better write performance
  if (path !== ':memory:') db.pragma('journal_mode = WAL')
  db.pragma('synchronous = NORMAL')
  db.pragma('busy_timeout = 5000')

  runMigrations(db)
  return db
}

/**
 * Close the database connection (call on shutdown)
 */
export function closeDb(): void {
  if (_db) {
    _db.close()
    _db = null
  }
}

interface Migration {
  version: number
  sql: string
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    sql: `
      CREATE TABLE IF NOT EXISTS calendar_documents (
        key TEXT PRIMARY KEY,
        content TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `,
  },
]

/**
 * Schema version tracking + migrations
 */
export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const current = db.prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM _migrations').get()
  const version = current?.v ?? 0
  const insertMigration = db.prepare<[number]>('INSERT INTO _migrations (version) VALUES (?)')

  const apply = db.transaction((migration: Migration) => {
    db.exec(migration.sql)
    insertMigration.run(migration.version)
  })

  for (const migration of MIGRATIONS) {
    if (migration.version <= version) continue
    apply(migration)
    logger.debug({ version: migration.version }, '[DB] Applied migration')
  }
}
