/**
 * Builds one SourceAdapter per configured source, in configuration order.
 * Done once at startup; the adapters are then injected everywhere.
 */

import * as path from 'node:path'
import { CalDAVConnection, CalDAVSourceAdapter } from './adapters/caldav.js'
import { GoogleCalendarSourceAdapter, createGoogleCalendarClient } from './adapters/google.js'
import { InMemorySourceAdapter } from './adapters/memory.js'
import { getCalDAVServerUrl } from './config.js'
import type {
  CalendarConfig,
  CalendarCredentials,
  CalendarSource,
  SourceAdapter,
  SourceConfig,
} from './types.js'

export interface RegistryOptions {
  /** Base for relative key file paths */
  dataDir: string
  credentials: CalendarCredentials | null
}

export function toCalendarSource(id: string, config: SourceConfig, serverUrl: string): CalendarSource {
  let externalRef: string
  switch (config.backend) {
    case 'caldav':
      externalRef = config.url ?? `${serverUrl}/daybook/${id}/`
      break
    case 'google':
      externalRef = config.calendarId ?? 'primary'
      break
    case 'memory':
      externalRef = `memory:${id}`
      break
  }
  return { id, displayName: config.displayName, kind: config.kind, backend: config.backend, externalRef }
}

export function createSourceAdapters(config: CalendarConfig, options: RegistryOptions): SourceAdapter[] {
  const serverUrl = getCalDAVServerUrl(config)
  let connection: CalDAVConnection | null = null

  const adapters = Object.entries(config.sources).map(([id, sourceConfig]): SourceAdapter => {
    const source = toCalendarSource(id, sourceConfig, serverUrl)

    switch (source.backend) {
      case 'caldav':
        connection ??= new CalDAVConnection(serverUrl, options.credentials)
        return new CalDAVSourceAdapter(source, connection, config.timezone)
      case 'google': {
        const keyFile = path.resolve(options.dataDir, sourceConfig.keyFile ?? 'google-key.json')
        return new GoogleCalendarSourceAdapter(source, createGoogleCalendarClient(keyFile), config.timezone)
      }
      case 'memory':
        return new InMemorySourceAdapter(source)
    }
  })

  if (!options.credentials && adapters.some((adapter) => adapter.source.backend === 'caldav')) {
    console.warn(
      `[Calendar] No CalDAV credentials in ${path.join(options.dataDir, 'calendar', 'credentials.json')}; CalDAV calendars will be reported unavailable.`,
    )
  }
  console.log(
    `[Calendar] ${adapters.length} calendar(s): ${adapters.map((adapter) => `${adapter.source.id} (${adapter.source.backend})`).join(', ')}`,
  )
  return adapters
}
