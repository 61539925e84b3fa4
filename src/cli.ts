#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0
// Copyright (c) Reflectt AI
/**
 * ics-calendar CLI - query and check .ics files, or start the server
 */
import { Command } from 'commander'
import { readFileSync } from 'fs'
import { defaultTimezone } from './config.js'
import { isCalendarError } from './errors.js'
import { checkCalendar, formatEventLine, listEvents, nextEvent } from './cli-commands.js'

function readCalendarFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8')
  } catch (err) {
    console.error(`❌ Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`)
    process.exit(1)
  }
}

function fail(err: unknown): never {
  if (isCalendarError(err)) {
    console.error(`❌ ${err.message}`)
  } else {
    console.error('❌ Unexpected error:', err)
  }
  process.exit(1)
}

const program = new Command()

program
  .name('ics-calendar')
  .description('Query and serve iCalendar-backed calendars')
  .version('1.0.0')

program
  .command('events')
  .description('List occurrences overlapping a time range')
  .argument('<file>', 'Path to an .ics file')
  .requiredOption('--start <iso>', 'Range start (ISO date or date-time)')
  .requiredOption('--end <iso>', 'Range end (ISO date or date-time)')
  .option('--tz <zone>', 'Time zone for floating times and output', defaultTimezone())
  .option('--json', 'Print JSON output')
  .action((file: string, options: { start: string; end: string; tz: string; json?: boolean }) => {
    try {
      const events = listEvents(readCalendarFile(file), options)
      if (options.json) {
        console.log(JSON.stringify(events, null, 2))
        return
      }
      if (events.length === 0) console.log('No events in range')
      for (const view of events) console.log(formatEventLine(view))
    } catch (err) {
      fail(err)
    }
  })

program
  .command('next')
  .description('Show the next active event')
  .argument('<file>', 'Path to an .ics file')
  .option('--at <iso>', 'Reference time (default: now)')
  .option('--tz <zone>', 'Time zone for floating times and output', defaultTimezone())
  .option('--json', 'Print JSON output')
  .action((file: string, options: { at?: string; tz: string; json?: boolean }) => {
    try {
      const view = nextEvent(readCalendarFile(file), options)
      if (options.json) {
        console.log(JSON.stringify(view, null, 2))
        return
      }
      console.log(view ? formatEventLine(view) : 'No upcoming events')
    } catch (err) {
      fail(err)
    }
  })

program
  .command('check')
  .description('Parse an .ics file and report what it contains')
  .argument('<file>', 'Path to an .ics file')
  .action((file: string) => {
    try {
      const report = checkCalendar(readCalendarFile(file))
      console.log(`✅ ${report.series} series (${report.recurring} recurring, ${report.overrides} overrides)`)
      if (!report.roundTrips) {
        console.error('⚠️  Serialized output does not parse back to the same series')
        process.exit(1)
      }
    } catch (err) {
      fail(err)
    }
  })

program
  .command('serve')
  .description('Start the HTTP server')
  .action(async () => {
    await import('./index.js')
  })

program.parseAsync(process.argv).catch(fail)
