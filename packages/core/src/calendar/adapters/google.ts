/**
 * Google Calendar Source Adapter
 *
 * Implements SourceAdapter for one Google calendar through the googleapis
 * client. Authentication is a service-account key file named in config;
 * acquiring that credential happens elsewhere.
 */

import { google, type calendar_v3 } from 'googleapis'
import { DateTime } from 'luxon'
import { CalendarError, NotFoundError, SourceUnavailableError, errorMessage } from '../errors.js'
import type {
  CalendarSource,
  EventDraft,
  EventPatch,
  ListOptions,
  SourceAdapter,
  SourceEvent,
} from '../types.js'
import { defaultEnd, overlapsWindow, validateDraft } from './shared.js'

const CALENDAR_SCOPE = 'https://www.googleapis.com/auth/calendar'
const PAGE_SIZE = 250

/**
 * The part of the Calendar API the adapter calls. `calendar_v3.Calendar`
 * satisfies it; tests pass an in-process fake.
 */
export interface GoogleCalendarApi {
  events: {
    list(params: calendar_v3.Params$Resource$Events$List): Promise<{ data: calendar_v3.Schema$Events }>
    get(params: calendar_v3.Params$Resource$Events$Get): Promise<{ data: calendar_v3.Schema$Event }>
    insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<{ data: calendar_v3.Schema$Event }>
    patch(params: calendar_v3.Params$Resource$Events$Patch): Promise<{ data: calendar_v3.Schema$Event }>
    delete(params: calendar_v3.Params$Resource$Events$Delete): Promise<unknown>
  }
}

/**
 * Create an authenticated Calendar API client from a service-account key file
 */
export function createGoogleCalendarClient(keyFile: string): calendar_v3.Calendar {
  const auth = new google.auth.GoogleAuth({ keyFile, scopes: [CALENDAR_SCOPE] })
  return google.calendar({ version: 'v3', auth })
}

export class GoogleCalendarSourceAdapter implements SourceAdapter {
  readonly source: CalendarSource

  constructor(
    source: CalendarSource,
    private api: GoogleCalendarApi,
    private zone: string,
  ) {
    this.source = source
  }

  private get calendarId(): string {
    return this.source.externalRef
  }

  async list(from: Date, to: Date, options?: ListOptions): Promise<SourceEvent[]> {
    return this.guard('list', async () => {
      const events: SourceEvent[] = []
      let pageToken: string | undefined

      do {
        options?.signal?.throwIfAborted()
        const res = await this.api.events.list({
          calendarId: this.calendarId,
          timeMin: from.toISOString(),
          timeMax: to.toISOString(),
          singleEvents: true, // Expand recurring events into individual instances
          orderBy: 'startTime',
          maxResults: PAGE_SIZE,
          pageToken,
        })

        for (const item of res.data.items ?? []) {
          const event = fromGoogleEvent(item, this.source.id, this.zone)
          if (event && overlapsWindow(event, from, to)) {
            events.push(event)
          }
        }
        pageToken = res.data.nextPageToken ?? undefined
      } while (pageToken)

      return events
    })
  }

  async create(draft: EventDraft): Promise<SourceEvent> {
    const valid = validateDraft(draft)

    return this.guard('create', async () => {
      const res = await this.api.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: valid.title,
          description: valid.description,
          location: valid.location,
          start: toGoogleDateTime(valid.start, valid.allDay, this.zone),
          end: toGoogleDateTime(valid.end, valid.allDay, this.zone),
          attendees: valid.attendees?.map((email) => ({ email })),
        },
      })
      return this.expectEvent(res.data, 'create')
    })
  }

  async update(externalEventId: string, patch: EventPatch): Promise<SourceEvent> {
    return this.guard('update', async () => {
      const requestBody: calendar_v3.Schema$Event = {}
      if (patch.title !== undefined) requestBody.summary = patch.title
      if (patch.description !== undefined) requestBody.description = patch.description
      if (patch.location !== undefined) requestBody.location = patch.location
      if (patch.attendees !== undefined) {
        requestBody.attendees = patch.attendees.map((email) => ({ email }))
      }

      if (patch.start !== undefined || patch.end !== undefined || patch.allDay !== undefined) {
        // Google needs both ends whenever either changes
        const current = await this.api.events.get({ calendarId: this.calendarId, eventId: externalEventId })
        const existing = this.expectEvent(current.data, 'update')
        const allDay = patch.allDay ?? existing.allDay
        requestBody.start = toGoogleDateTime(patch.start ?? existing.start, allDay, this.zone)
        requestBody.end = toGoogleDateTime(patch.end ?? existing.end, allDay, this.zone)
      }

      const res = await this.api.events.patch({
        calendarId: this.calendarId,
        eventId: externalEventId,
        requestBody,
      })
      return this.expectEvent(res.data, 'update')
    })
  }

  async delete(externalEventId: string): Promise<void> {
    return this.guard('delete', async () => {
      await this.api.events.delete({ calendarId: this.calendarId, eventId: externalEventId })
    })
  }

  private expectEvent(item: calendar_v3.Schema$Event, op: string): SourceEvent {
    const event = fromGoogleEvent(item, this.source.id, this.zone)
    if (!event) {
      throw new SourceUnavailableError(this.source.id, `${op} returned an event without id or start`)
    }
    return event
  }

  /** 404/410 mean the event is gone; every other failure is an outage */
  private async guard<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (err instanceof CalendarError) throw err
      const status = httpStatus(err)
      if (status === 404 || status === 410) {
        throw new NotFoundError(`Event not found in ${this.source.displayName}: ${errorMessage(err)}`)
      }
      console.warn(`[Google] ${op} on ${this.source.id} failed: ${errorMessage(err)}`)
      throw new SourceUnavailableError(this.source.id, errorMessage(err), { cause: err })
    }
  }
}

// ─── Google event mapping ───

/**
 * Map a Google event to a source event. Returns null for cancelled
 * instances and items missing an id or a start.
 */
export function fromGoogleEvent(
  item: calendar_v3.Schema$Event,
  sourceId: string,
  zone: string,
): SourceEvent | null {
  if (!item.id || item.status === 'cancelled') {
    return null
  }

  const allDay = Boolean(item.start?.date) && !item.start?.dateTime
  const start = parseGoogleDateTime(item.start, zone)
  if (!start) {
    return null
  }
  const parsedEnd = parseGoogleDateTime(item.end, zone)
  const end = parsedEnd && parsedEnd.getTime() >= start.getTime() ? parsedEnd : defaultEnd(start, allDay)

  const attendees = (item.attendees ?? [])
    .map((attendee) => attendee.email ?? '')
    .filter((email) => email.length > 0)

  const event: SourceEvent = {
    sourceId,
    externalEventId: item.id,
    title: item.summary || 'Untitled',
    start,
    end,
    allDay,
    location: item.location || undefined,
    description: item.description || undefined,
    attendees: attendees.length > 0 ? attendees : undefined,
    externalLink: item.htmlLink || undefined,
  }
  // Instance IDs already address a single occurrence
  if (item.recurringEventId) event.recurringEventId = item.recurringEventId
  return event
}

function parseGoogleDateTime(
  value: calendar_v3.Schema$EventDateTime | undefined,
  zone: string,
): Date | null {
  if (value?.dateTime) {
    const dt = DateTime.fromISO(value.dateTime, { zone: value.timeZone ?? zone })
    return dt.isValid ? dt.toJSDate() : null
  }
  if (value?.date) {
    const dt = DateTime.fromISO(value.date, { zone })
    return dt.isValid ? dt.startOf('day').toJSDate() : null
  }
  return null
}

export function toGoogleDateTime(
  instant: Date,
  allDay: boolean,
  zone: string,
): calendar_v3.Schema$EventDateTime {
  const local = DateTime.fromJSDate(instant, { zone })
  if (allDay) {
    return { date: local.toFormat('yyyy-MM-dd') }
  }
  return { dateTime: local.toISO({ suppressMilliseconds: true }) ?? instant.toISOString(), timeZone: zone }
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined
  if ('status' in err && typeof err.status === 'number') return err.status
  if ('code' in err) {
    const code = Number(err.code)
    return Number.isInteger(code) ? code : undefined
  }
  return undefined
}
