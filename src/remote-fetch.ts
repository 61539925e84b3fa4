// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI

/**
 * Remote calendar transport — conditional GET of an .ics feed
 */

import { TransportError } from './errors.js'

export type FetchResult =
  | { status: 'not-modified' }
  | { status: 'ok'; text: string; etag: string | null }

export interface CalendarTransport {
  fetch(url: string, etag: string | null): Promise<FetchResult>
}

export interface HttpTransportOptions {
  timeoutMs: number
  userAgent?: string
}

export class HttpCalendarTransport implements CalendarTransport {
  constructor(private readonly options: HttpTransportOptions) {}

  async fetch(url: string, etag: string | null): Promise<FetchResult> {
    const headers: Record<string, string> = {
      'Accept': 'text/calendar, */*;q=0.5',
      'User-Agent': this.options.userAgent ?? 'ics-calendar-node/1.0',
    }
    if (etag) headers['If-None-Match'] = etag

    let resp: Response
    try {
      resp = await fetch(url, {
        headers,
        signal: AbortSignal.timeout(this.options.timeoutMs),
        redirect: 'follow',
      })
    } catch (err) {
      const reason = err instanceof Error && err.name === 'TimeoutError'
        ? `timed out after ${this.options.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err)
      throw new TransportError(`Fetching ${url} failed: ${reason}`, null, { cause: err })
    }

    if (resp.status === 304) return { status: 'not-modified' }
    if (!resp.ok) {
      throw new TransportError(`Fetching ${url} failed: HTTP ${resp.status}`, resp.status)
    }
    return { status: 'ok', text: await resp.text(), etag: resp.headers.get('etag') }
  }
}
