/**
 * Test setup: isolate tests from real data
 *
 * Sets CALENDAR_HOME to a temporary directory so tests never touch the
 * user's calendars, database or calendars.yaml.
 */
import { mkdtempSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'

// Create isolated temp directory BEFORE any module imports config
const testHome = mkdtempSync(join(tmpdir(), 'ics-calendar-test-'))
process.env.CALENDAR_HOME = testHome
process.env.CALENDAR_TIMEZONE = 'UTC'

// Ensure cleanup after all tests
process.on('exit', () => {
  try {
    rmSync(testHome, { recursive: true, force: true })
  } catch (err) {
    console.warn(`[Test Setup] could not remove ${testHome}:`, err)
  }
})
