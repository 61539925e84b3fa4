// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Calendar document persistence
 *
 * A store holds the serialized .ics text of one calendar. `load` returns null
 * when nothing has been stored yet.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import type Database from 'better-sqlite3'
import { DATA_DIR, type StorageKind } from './config.js'
import { getDb } from './db.js'

export interface CalendarStore {
  load(): Promise<string | null>
  store(content: string): Promise<void>
}

// ── File ───────────────────────────────────────────────────────────────────

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export class FileCalendarStore implements CalendarStore {
  constructor(readonly path: string) {}

  async load(): Promise<string | null> {
    try {
      return await readFile(this.path, 'utf-8')
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  /** Write to a temp file and rename, so readers never see a partial document. */
  async store(content: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })
    const tmp = `${this.path}.${process.pid}.tmp`
    await writeFile(tmp, content, 'utf-8')
    await rename(tmp, this.path)
  }
}

// ── SQLite ─────────────────────────────────────────────────────────────────

export class SqliteCalendarStore implements CalendarStore {
  constructor(
    private readonly db: Database.Database,
    readonly key: string,
  ) {}

  async load(): Promise<string | null> {
    const row = this.db
      .prepare<[string], { content: string }>('SELECT content FROM calendar_documents WHERE key = ?')
      .get(this.key)
    return row?.content ?? null
  }

  async store(content: string): Promise<void> {
    this.db
      .prepare<[string, string, number]>(`
        INSERT INTO calendar_documents (key, content, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET content = excluded.content, updated_at = excluded.updated_at
      `)
      .run(this.key, content, Date.now())
  }
}

// ── Memory ─────────────────────────────────────────────────────────────────

export class MemoryCalendarStore implements CalendarStore {
  writes = 0

  constructor(public content: string | null = null) {}

  async load(): Promise<string | null> {
    return this.content
  }

  async store(content: string): Promise<void> {
    this.content = content
    this.writes++
  }
}

// ── Factory ────────────────────────────────────────────────────────────────

export function calendarFilePath(key: string, dataDir: string = DATA_DIR): string {
  return join(dataDir, 'calendars', `${key}.ics`)
}

export function createCalendarStore(kind: StorageKind, key: string): CalendarStore {
  return kind === 'sqlite'
    ? new SqliteCalendarStore(getDb(), key)
    : new FileCalendarStore(calendarFilePath(key))
}
