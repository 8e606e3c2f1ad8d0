/**
 * Calendar Configuration Loader
 *
 * Loads calendar config from <data dir>/config.yaml and credentials
 * from <data dir>/calendar/credentials.json
 *
 * Lenient: an invalid value is reported with a warning and replaced by its
 * default, so a typo never keeps the rest of the calendars from loading.
 */

import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { z } from 'zod'
import { loadYamlConfig, resolveDataDir } from '../config.js'
import { isValidTimezone } from './time.js'
import type { CalendarConfig, CalendarCredentials, SourceConfig } from './types.js'

const DEFAULT_TIMEZONE = 'America/Toronto'
const DEFAULT_SERVER_HOST = '127.0.0.1'
const DEFAULT_SERVER_PORT = 5232

const DEFAULT_SOURCES: CalendarConfig['sources'] = {
  appointments: { displayName: 'Appointments', kind: 'appointment', backend: 'memory' },
  tasks: { displayName: 'Tasks', kind: 'task', backend: 'memory' },
}

export const DEFAULT_CALENDAR_CONFIG: CalendarConfig = {
  timezone: DEFAULT_TIMEZONE,
  businessHours: { start: '09:00', end: '17:00' },
  searchWindowDays: 14,
  listTimeoutMs: 10_000,
  briefing: { maxChars: 1200, maxToday: 10, maxTomorrow: 3 },
  caldav: { host: DEFAULT_SERVER_HOST, port: DEFAULT_SERVER_PORT },
  sources: DEFAULT_SOURCES,
}

const clock = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$|^24:00$/)
const positiveInt = z.number().int().positive()
const sourceKind = z.enum(['appointment', 'task', 'generic'])
const sourceBackend = z.enum(['caldav', 'google', 'memory'])

const CredentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
})

/** Validated field, or the fallback with a warning naming the field */
function field<T>(schema: z.ZodType<T>, value: unknown, label: string, fallback: T): T {
  if (value === undefined || value === null) return fallback
  const result = schema.safeParse(value)
  if (result.success) return result.data
  console.warn(`Warning: Invalid ${label} in config.yaml (${JSON.stringify(value)}). Using ${JSON.stringify(fallback)}.`)
  return fallback
}

function optionalField<T>(schema: z.ZodType<T>, value: unknown, label: string): T | undefined {
  if (value === undefined || value === null) return undefined
  const result = schema.safeParse(value)
  if (result.success) return result.data
  console.warn(`Warning: Invalid ${label} in config.yaml (${JSON.stringify(value)}). Ignoring it.`)
  return undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {}
}

function parseSource(id: string, raw: unknown): SourceConfig {
  const yaml = section(raw)
  const label = `calendar.sources.${id}`
  const source: SourceConfig = {
    displayName: field(z.string().min(1), yaml.displayName, `${label}.displayName`, id),
    kind: field(sourceKind, yaml.kind, `${label}.kind`, 'generic'),
    backend: field(sourceBackend, yaml.backend, `${label}.backend`, 'memory'),
  }

  const url = optionalField(z.string().url(), yaml.url, `${label}.url`)
  const calendarId = optionalField(z.string().min(1), yaml.calendarId, `${label}.calendarId`)
  const keyFile = optionalField(z.string().min(1), yaml.keyFile, `${label}.keyFile`)
  if (url !== undefined) source.url = url
  if (calendarId !== undefined) source.calendarId = calendarId
  if (keyFile !== undefined) source.keyFile = keyFile

  if (source.backend === 'google' && !source.keyFile) {
    console.warn(`Warning: ${label} uses the google backend without a keyFile; it will be unavailable.`)
  }
  return source
}

/**
 * Build a CalendarConfig from the `calendar:` section of config.yaml
 */
export function parseCalendarConfig(raw: unknown): CalendarConfig {
  const yaml = section(raw)
  const defaults = DEFAULT_CALENDAR_CONFIG

  let timezone = field(z.string(), yaml.timezone, 'calendar.timezone', defaults.timezone)
  if (!isValidTimezone(timezone)) {
    console.warn(`Warning: Unknown timezone "${timezone}" in config.yaml. Using ${defaults.timezone}.`)
    timezone = defaults.timezone
  }

  const hours = section(yaml.businessHours)
  let businessHours = {
    start: field(clock, hours.start, 'calendar.businessHours.start', defaults.businessHours.start),
    end: field(clock, hours.end, 'calendar.businessHours.end', defaults.businessHours.end),
  }
  if (businessHours.start >= businessHours.end) {
    console.warn('Warning: calendar.businessHours ends before it starts. Using 09:00–17:00.')
    businessHours = defaults.businessHours
  }

  const briefing = section(yaml.briefing)
  const caldav = section(yaml.caldav)

  const sources: CalendarConfig['sources'] = {}
  if (isRecord(yaml.sources) && Object.keys(yaml.sources).length > 0) {
    for (const [id, value] of Object.entries(yaml.sources)) {
      sources[id] = parseSource(id, value)
    }
  } else {
    Object.assign(sources, defaults.sources)
  }

  return {
    timezone,
    businessHours,
    searchWindowDays: field(
      positiveInt,
      yaml.searchWindowDays,
      'calendar.searchWindowDays',
      defaults.searchWindowDays,
    ),
    listTimeoutMs: field(positiveInt, yaml.listTimeoutMs, 'calendar.listTimeoutMs', defaults.listTimeoutMs),
    briefing: {
      maxChars: field(
        positiveInt,
        briefing.maxChars,
        'calendar.briefing.maxChars',
        defaults.briefing.maxChars,
      ),
      maxToday: field(
        positiveInt,
        briefing.maxToday,
        'calendar.briefing.maxToday',
        defaults.briefing.maxToday,
      ),
      maxTomorrow: field(
        z.number().int().min(0),
        briefing.maxTomorrow,
        'calendar.briefing.maxTomorrow',
        defaults.briefing.maxTomorrow,
      ),
    },
    caldav: {
      host: field(z.string().min(1), caldav.host, 'calendar.caldav.host', defaults.caldav.host),
      port: field(positiveInt, caldav.port, 'calendar.caldav.port', defaults.caldav.port),
    },
    sources,
  }
}

/**
 * Load calendar configuration from config.yaml
 */
export function loadCalendarConfig(dataDir?: string): CalendarConfig {
  const dir = resolveDataDir(dataDir)
  const yaml = section(loadYamlConfig(dir))
  return parseCalendarConfig(yaml.calendar)
}

/**
 * Load CalDAV credentials from credentials.json
 */
export function loadCalendarCredentials(dataDir?: string): CalendarCredentials | null {
  const dir = resolveDataDir(dataDir)
  const credentialsPath = path.join(dir, 'calendar', 'credentials.json')

  if (!existsSync(credentialsPath)) {
    return null
  }

  try {
    const raw: unknown = JSON.parse(readFileSync(credentialsPath, 'utf-8'))
    const parsed = CredentialsSchema.safeParse(raw)
    if (!parsed.success) {
      console.warn(`Invalid credentials file at ${credentialsPath}: missing username or password.`)
      return null
    }
    return parsed.data
  } catch (err) {
    console.warn(
      `Could not load calendar credentials: ${err instanceof Error ? err.message : String(err)}`,
    )
    return null
  }
}

/**
 * Base URL of the configured CalDAV server
 */
export function getCalDAVServerUrl(config: CalendarConfig): string {
  return `http://${config.caldav.host}:${config.caldav.port}`
}
