import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import * as path from 'node:path'
import {
  DEFAULT_CALENDAR_CONFIG,
  loadCalendarConfig,
  loadCalendarCredentials,
  parseCalendarConfig,
} from '../src/calendar/config.js'
import { SourceUnavailableError } from '../src/calendar/errors.js'
import { createSourceAdapters, toCalendarSource } from '../src/calendar/registry.js'
import { createCalendarRuntime } from '../src/calendar/runtime.js'
import { resolveDataDir } from '../src/config.js'

let dataDir: string
let warn: MockInstance<typeof console.warn>

beforeEach(() => {
  dataDir = mkdtempSync(path.join(tmpdir(), 'daybook-'))
  warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'log').mockImplementation(() => {})
})

afterEach(() => {
  rmSync(dataDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

function writeConfig(yaml: string): void {
  writeFileSync(path.join(dataDir, 'config.yaml'), yaml)
}

const SAMPLE = `
calendar:
  timezone: Europe/Paris
  businessHours:
    start: "08:30"
    end: "16:00"
  searchWindowDays: 7
  sources:
    home:
      displayName: Home
      kind: appointment
      backend: caldav
    chores:
      displayName: Chores
      kind: chore
      backend: memory
`

describe('parseCalendarConfig', () => {
  it('falls back to defaults for a missing section', () => {
    expect(parseCalendarConfig(undefined)).toEqual(DEFAULT_CALENDAR_CONFIG)
    expect(warn).not.toHaveBeenCalled()
  })

  it('replaces an unknown timezone with the default', () => {
    const config = parseCalendarConfig({ timezone: 'Mars/Base' })

    expect(config.timezone).toBe('America/Toronto')
    expect(warn).toHaveBeenCalledWith('Warning: Unknown timezone "Mars/Base" in config.yaml. Using America/Toronto.')
  })

  it('replaces business hours that end before they start', () => {
    const config = parseCalendarConfig({ businessHours: { start: '18:00', end: '09:00' } })

    expect(config.businessHours).toEqual({ start: '09:00', end: '17:00' })
    expect(warn).toHaveBeenCalledWith('Warning: calendar.businessHours ends before it starts. Using 09:00–17:00.')
  })

  it('names an invalid number and keeps the default', () => {
    const config = parseCalendarConfig({ listTimeoutMs: -5 })

    expect(config.listTimeoutMs).toBe(10_000)
    expect(warn).toHaveBeenCalledWith('Warning: Invalid calendar.listTimeoutMs in config.yaml (-5). Using 10000.')
  })

  it('warns about a google source without a key file', () => {
    const config = parseCalendarConfig({ sources: { work: { kind: 'appointment', backend: 'google' } } })

    expect(config.sources.work).toEqual({ displayName: 'work', kind: 'appointment', backend: 'google' })
    expect(warn).toHaveBeenCalledWith(
      'Warning: calendar.sources.work uses the google backend without a keyFile; it will be unavailable.',
    )
  })
})

describe('loadCalendarConfig', () => {
  it('reads the calendar section of config.yaml', () => {
    writeConfig(SAMPLE)

    const config = loadCalendarConfig(dataDir)

    expect(config.timezone).toBe('Europe/Paris')
    expect(config.businessHours).toEqual({ start: '08:30', end: '16:00' })
    expect(config.searchWindowDays).toBe(7)
    expect(config.listTimeoutMs).toBe(10_000)
    expect(Object.keys(config.sources)).toEqual(['home', 'chores'])
    expect(config.sources.chores.kind).toBe('generic')
    expect(warn).toHaveBeenCalledWith(
      'Warning: Invalid calendar.sources.chores.kind in config.yaml ("chore"). Using "generic".',
    )
  })

  it('uses defaults when there is no config file', () => {
    expect(loadCalendarConfig(dataDir)).toEqual(DEFAULT_CALENDAR_CONFIG)
  })

  it('uses defaults when config.yaml does not parse', () => {
    writeConfig('calendar: [unclosed')

    expect(loadCalendarConfig(dataDir)).toEqual(DEFAULT_CALENDAR_CONFIG)
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

describe('loadCalendarCredentials', () => {
  function writeCredentials(value: unknown): void {
    mkdirSync(path.join(dataDir, 'calendar'), { recursive: true })
    writeFileSync(path.join(dataDir, 'calendar', 'credentials.json'), JSON.stringify(value))
  }

  it('returns null without a credentials file', () => {
    expect(loadCalendarCredentials(dataDir)).toBeNull()
  })

  it('reads username and password', () => {
    writeCredentials({ username: 'daybook', password: 'test-secret' })

    expect(loadCalendarCredentials(dataDir)).toEqual({ username: 'daybook', password: 'test-secret' })
  })

  it('rejects incomplete credentials', () => {
    writeCredentials({ username: 'daybook' })

    expect(loadCalendarCredentials(dataDir)).toBeNull()
    expect(warn).toHaveBeenCalledTimes(1)
  })
})

describe('source registry', () => {
  it('derives collection URLs from the server', () => {
    const source = toCalendarSource(
      'home',
      { displayName: 'Home', kind: 'appointment', backend: 'caldav' },
      'http://127.0.0.1:5232',
    )
    expect(source.externalRef).toBe('http://127.0.0.1:5232/daybook/home/')
  })

  it('builds adapters in configuration order', () => {
    writeConfig(SAMPLE)
    const config = loadCalendarConfig(dataDir)

    const adapters = createSourceAdapters(config, { dataDir, credentials: null })

    expect(adapters.map((adapter) => [adapter.source.id, adapter.source.backend])).toEqual([
      ['home', 'caldav'],
      ['chores', 'memory'],
    ])
    expect(warn).toHaveBeenCalledWith(
      `[Calendar] No CalDAV credentials in ${path.join(dataDir, 'calendar', 'credentials.json')}; CalDAV calendars will be reported unavailable.`,
    )
  })

  it('reports a CalDAV source without credentials as unavailable', async () => {
    writeConfig(SAMPLE)
    const [home] = createSourceAdapters(loadCalendarConfig(dataDir), { dataDir, credentials: null })

    const error = await home.list(new Date('2026-10-19T00:00:00Z'), new Date('2026-10-20T00:00:00Z')).catch(
      (err: unknown) => err,
    )

    expect(error).toBeInstanceOf(SourceUnavailableError)
    expect(error instanceof Error && error.message).toBe(
      'Calendar "home" unavailable: no CalDAV credentials configured',
    )
  })
})

describe('runtime', () => {
  it('wires configured sources into a coordinator', () => {
    writeConfig(SAMPLE)

    const runtime = createCalendarRuntime({ dataDir })

    expect(runtime.time.zone).toBe('Europe/Paris')
    expect(runtime.coordinator.sources.map((source) => source.displayName)).toEqual(['Home', 'Chores'])
  })

  it('prefers an explicit data directory', () => {
    expect(resolveDataDir(dataDir)).toBe(dataDir)
  })
})
