/**
 * CalDAV Source Adapter
 *
 * Implements SourceAdapter for one CalDAV collection using tsdav for
 * transport and ical-expander for recurring event expansion.
 */

import { createDAVClient, type DAVCalendar, type DAVCalendarObject } from 'tsdav'
import IcalExpander from 'ical-expander'
import { DateTime } from 'luxon'
import { randomUUID } from 'node:crypto'
import { CalendarError, NotFoundError, SourceUnavailableError, errorMessage } from '../errors.js'
import type {
  CalendarCredentials,
  CalendarSource,
  EventDraft,
  EventPatch,
  ListOptions,
  SourceAdapter,
  SourceEvent,
} from '../types.js'
import {
  addProperty,
  dateTokens,
  escapeText,
  findVEvents,
  firstProperty,
  foldLines,
  formatDate,
  formatProperty,
  occurrenceId,
  parseDateValue,
  readBlockEvent,
  readDate,
  recurrenceToken,
  setProperties,
  splitOccurrenceId,
  uidOf,
  unfoldLines,
  writeBlockEvent,
  type VEventRange,
} from './icalendar.js'
import { applyPatch, defaultEnd, overlapsWindow, validateDraft } from './shared.js'

// Type for the DAV client returned by createDAVClient
type DAVClientInstance = Awaited<ReturnType<typeof createDAVClient>>

type StoredObject = DAVCalendarObject & { data: string }

/** Series properties an occurrence override must not carry */
const SERIES_ONLY = ['RRULE', 'RDATE', 'EXDATE', 'DURATION']

/**
 * One authenticated connection to a CalDAV server, shared by every
 * CalDAV source configured against it.
 */
export class CalDAVConnection {
  private client: Promise<DAVClientInstance> | null = null

  constructor(
    readonly serverUrl: string,
    private credentials: CalendarCredentials | null,
  ) {}

  /**
   * Get or create the DAV client connection
   */
  getClient(): Promise<DAVClientInstance> {
    if (!this.credentials) {
      return Promise.reject(new Error('no CalDAV credentials configured'))
    }
    if (!this.client) {
      this.client = createDAVClient({
        serverUrl: this.serverUrl,
        credentials: {
          username: this.credentials.username,
          password: this.credentials.password,
        },
        authMethod: 'Basic',
        defaultAccountType: 'caldav',
      })
      // A failed login must not poison later attempts
      this.client.catch(() => {
        this.client = null
      })
    }
    return this.client
  }
}

export class CalDAVSourceAdapter implements SourceAdapter {
  readonly source: CalendarSource
  private calendar: DAVCalendar | null = null

  constructor(
    source: CalendarSource,
    private connection: CalDAVConnection,
    private zone: string,
  ) {
    this.source = source
  }

  async list(from: Date, to: Date, options?: ListOptions): Promise<SourceEvent[]> {
    return this.guard('list', async () => {
      const client = await this.connection.getClient()
      const calendar = await this.findCalendar()
      options?.signal?.throwIfAborted()

      const objects = await client.fetchCalendarObjects({
        calendar,
        timeRange: { start: from.toISOString(), end: to.toISOString() },
      })

      const events: SourceEvent[] = []
      for (const obj of objects) {
        if (typeof obj.data === 'string') {
          events.push(...parseICalObject(obj.data, this.source.id, from, to, this.zone))
        }
      }
      return events
    })
  }

  async create(draft: EventDraft): Promise<SourceEvent> {
    const valid = validateDraft(draft)

    return this.guard('create', async () => {
      const client = await this.connection.getClient()
      const calendar = await this.findCalendar()

      const uid = `${randomUUID()}@daybook`
      const event: SourceEvent = {
        sourceId: this.source.id,
        externalEventId: uid,
        title: valid.title,
        start: valid.start,
        end: valid.end,
        allDay: valid.allDay,
        location: valid.location,
        attendees: valid.attendees,
        description: valid.description,
      }

      const response = await client.createCalendarObject({
        calendar,
        filename: `${encodeURIComponent(uid)}.ics`,
        iCalString: buildICalEvent(event, this.zone),
      })
      if (!response.ok) {
        throw new SourceUnavailableError(this.source.id, `create rejected (HTTP ${response.status})`)
      }

      return event
    })
  }

  /**
   * Patch the stored object in place. An occurrence ID writes (or rewrites)
   * a RECURRENCE-ID override and leaves the series untouched.
   */
  async update(externalEventId: string, patch: EventPatch): Promise<SourceEvent> {
    return this.guard('update', async () => {
      const client = await this.connection.getClient()
      const { uid, token } = splitOccurrenceId(externalEventId)
      const existing = await this.findObject(uid)
      const lines = unfoldLines(existing.data)
      const ranges = findVEvents(lines).filter((range) => uidOf(blockOf(lines, range)) === uid)
      const ids = {
        sourceId: this.source.id,
        externalEventId,
        recurringEventId: token === undefined ? undefined : uid,
      }

      let target: VEventRange | undefined
      let block: string[]
      if (token === undefined) {
        target = ranges.find((range) => !firstProperty(blockOf(lines, range), 'RECURRENCE-ID')) ?? ranges[0]
        if (!target) throw this.notFound(externalEventId)
        block = blockOf(lines, target)
      } else {
        target = ranges.find((range) =>
          dateTokens(blockOf(lines, range), 'RECURRENCE-ID', this.zone).includes(token),
        )
        if (target) {
          block = blockOf(lines, target)
        } else {
          block = overrideBlock(this.masterOf(lines, ranges, externalEventId).block, token, this.zone)
        }
      }

      const current = readBlockEvent(block, ids, this.zone)
      if (!current) {
        throw new NotFoundError(`Could not parse event ${externalEventId} in ${this.source.displayName}`)
      }
      const updated = applyPatch(current, patch)
      const written = writeBlockEvent(
        block,
        updated,
        {
          times: patch.start !== undefined || patch.end !== undefined || patch.allDay !== undefined,
          title: patch.title !== undefined,
          location: patch.location !== undefined,
          description: patch.description !== undefined,
          attendees: patch.attendees !== undefined,
        },
        this.zone,
      )

      const next = target ? rewrite(lines, [{ range: target, block: written }]) : appendBlock(lines, written)
      await this.store(client, existing, next, 'update')
      return updated
    })
  }

  /** An occurrence ID excludes that occurrence with an EXDATE; the series stays */
  async delete(externalEventId: string): Promise<void> {
    return this.guard('delete', async () => {
      const client = await this.connection.getClient()
      const { uid, token } = splitOccurrenceId(externalEventId)
      const existing = await this.findObject(uid)

      if (token === undefined) {
        const response = await client.deleteCalendarObject({ calendarObject: existing })
        if (response.status === 404 || response.status === 410) {
          throw this.notFound(externalEventId)
        }
        if (!response.ok) {
          throw new SourceUnavailableError(this.source.id, `delete rejected (HTTP ${response.status})`)
        }
        return
      }

      const lines = unfoldLines(existing.data)
      const ranges = findVEvents(lines).filter((range) => uidOf(blockOf(lines, range)) === uid)
      const master = this.masterOf(lines, ranges, externalEventId)
      if (dateTokens(master.block, 'EXDATE', this.zone).includes(token)) {
        throw this.notFound(externalEventId)
      }

      const like = readDate(firstProperty(master.block, 'DTSTART'), this.zone)
      const occurrence = tokenDate(token, this.zone)
      const excluded = addProperty(
        master.block,
        formatDate('EXDATE', occurrence.instant, occurrence.allDay, this.zone, like),
      )
      // An override of the removed occurrence goes with it
      const overrides = ranges.filter((range) =>
        dateTokens(blockOf(lines, range), 'RECURRENCE-ID', this.zone).includes(token),
      )

      const next = rewrite(lines, [{ range: master.range, block: excluded }], overrides)
      await this.store(client, existing, next, 'delete')
    })
  }

  /**
   * Resolve the DAVCalendar for this source: by collection URL when one is
   * configured, else by the last URL segment matching the source ID.
   */
  private async findCalendar(): Promise<DAVCalendar> {
    if (this.calendar) {
      return this.calendar
    }

    const client = await this.connection.getClient()
    const calendars = await client.fetchCalendars()
    const wanted = trimSlash(this.source.externalRef)

    const calendar = calendars.find((cal) => {
      const url = trimSlash(cal.url)
      return url === wanted || url.endsWith(wanted) || lastSegment(url) === this.source.id
    })
    if (!calendar) {
      throw new SourceUnavailableError(
        this.source.id,
        `collection ${this.source.externalRef} not found on ${this.connection.serverUrl}`,
      )
    }

    this.calendar = calendar
    return calendar
  }

  /** The stored object holding a VEVENT whose UID equals `uid` exactly */
  private async findObject(uid: string): Promise<StoredObject> {
    const client = await this.connection.getClient()
    const calendar = await this.findCalendar()
    const objects = await client.fetchCalendarObjects({ calendar })

    for (const obj of objects) {
      if (typeof obj.data !== 'string') continue
      const lines = unfoldLines(obj.data)
      if (findVEvents(lines).some((range) => uidOf(blockOf(lines, range)) === uid)) {
        return { ...obj, data: obj.data }
      }
    }
    throw this.notFound(uid)
  }

  /** The series VEVENT (the one without RECURRENCE-ID) of a recurring object */
  private masterOf(
    lines: string[],
    ranges: VEventRange[],
    externalEventId: string,
  ): { range: VEventRange; block: string[] } {
    const range = ranges.find((candidate) => !firstProperty(blockOf(lines, candidate), 'RECURRENCE-ID'))
    if (!range) throw this.notFound(externalEventId)
    const block = blockOf(lines, range)
    if (!firstProperty(block, 'RRULE') && !firstProperty(block, 'RDATE')) {
      throw this.notFound(externalEventId)
    }
    return { range, block }
  }

  private async store(
    client: DAVClientInstance,
    existing: StoredObject,
    lines: string[],
    op: 'update' | 'delete',
  ): Promise<void> {
    const response = await client.updateCalendarObject({
      calendarObject: { ...existing, data: foldLines(lines) },
    })
    if (!response.ok) {
      throw new SourceUnavailableError(this.source.id, `${op} rejected (HTTP ${response.status})`)
    }
  }

  private notFound(externalEventId: string): NotFoundError {
    return new NotFoundError(`Event ${externalEventId} not found in ${this.source.displayName}`)
  }

  /** Calendar errors pass through; anything else means the backend is unavailable */
  private async guard<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (err instanceof CalendarError) throw err
      console.warn(`[CalDAV] ${op} on ${this.source.id} failed: ${errorMessage(err)}`)
      throw new SourceUnavailableError(this.source.id, errorMessage(err), { cause: err })
    }
  }
}

// ─── iCalendar mapping ───

/**
 * Generate an iCalendar VEVENT string.
 * Timed events are written in UTC, all-day events as civil dates in `zone`.
 */
export function buildICalEvent(event: SourceEvent, zone: string): string {
  const lines: string[] = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//daybook//calendar//EN',
    'BEGIN:VEVENT',
    `UID:${event.externalEventId}`,
    `DTSTAMP:${DateTime.now().toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'")}`,
    formatProperty(formatDate('DTSTART', event.start, event.allDay, zone)),
    formatProperty(formatDate('DTEND', event.end, event.allDay, zone)),
    `SUMMARY:${escapeText(event.title)}`,
  ]

  if (event.description) {
    lines.push(`DESCRIPTION:${escapeText(event.description)}`)
  }

  if (event.location) {
    lines.push(`LOCATION:${escapeText(event.location)}`)
  }

  for (const attendee of event.attendees ?? []) {
    lines.push(`ATTENDEE:mailto:${attendee}`)
  }

  lines.push('END:VEVENT', 'END:VCALENDAR')

  return foldLines(lines)
}

/**
 * Parse iCalendar data into source events overlapping [from, to).
 * Recurring events are expanded into one event per occurrence, each
 * addressed by its series UID and recurrence ID.
 */
export function parseICalObject(
  icalData: string,
  sourceId: string,
  from: Date,
  to: Date,
  zone: string,
): SourceEvent[] {
  const expander = new IcalExpander({
    ics: icalData,
    maxIterations: 365, // Limit recurring event expansion
  })
  const expanded = expander.between(from, to)

  const events: SourceEvent[] = []
  // Overrides come back with the plain events, carrying their own RECURRENCE-ID
  for (const event of expanded.events) {
    const parsed = toSourceEvent(event.component, event.startDate, event.endDate, sourceId, zone)
    events.push(event.recurrenceId ? asOccurrence(parsed, event.recurrenceId, zone) : parsed)
  }
  for (const { item, startDate, endDate, recurrenceId } of expanded.occurrences) {
    const parsed = toSourceEvent(item.component, startDate, endDate, sourceId, zone)
    events.push(asOccurrence(parsed, recurrenceId, zone))
  }
  return events.filter((event) => overlapsWindow(event, from, to))
}

function asOccurrence(event: SourceEvent, recurrenceId: IcalExpander.Time, zone: string): SourceEvent {
  const uid = event.externalEventId
  const token = recurrenceToken(toInstant(recurrenceId, zone), recurrenceId.isDate, zone)
  return { ...event, externalEventId: occurrenceId(uid, token), recurringEventId: uid }
}
function toSourceEvent(
  vevent: IcalExpander.Component,
  startDate: IcalExpander.Time,
  endDate: IcalExpander.Time,
  sourceId: string,
  zone: string,
): SourceEvent {
  const allDay = startDate.isDate
  const start = toInstant(startDate, zone)
  const hasEnd =
    vevent.getFirstPropertyValue('dtend') !== null || vevent.getFirstPropertyValue('duration') !== null
  const end = hasEnd ? toInstant(endDate, zone) : defaultEnd(start, allDay)

  const attendees = vevent
    .getAllProperties('attendee')
    .map((prop) => String(prop.getFirstValue() ?? '').replace(/^mailto:/i, ''))
    .filter((address) => address.length > 0)

  return {
    sourceId,
    externalEventId: String(vevent.getFirstPropertyValue('uid') ?? ''),
    title: optionalText(vevent.getFirstPropertyValue('summary')) ?? 'Untitled',
    start,
    end: end.getTime() < start.getTime() ? start : end,
    allDay,
    location: optionalText(vevent.getFirstPropertyValue('location')),
    description: optionalText(vevent.getFirstPropertyValue('description')),
    attendees: attendees.length > 0 ? attendees : undefined,
  }
}

/** Dates and floating times are civil values in the configured zone */
function toInstant(time: IcalExpander.Time, zone: string): Date {
  if (time.isDate) {
    return DateTime.fromObject({ year: time.year, month: time.month, day: time.day }, { zone }).toJSDate()
  }
  if (time.zone?.tzid === 'floating') {
    return DateTime.fromObject(
      {
        year: time.year,
        month: time.month,
        day: time.day,
        hour: time.hour,
        minute: time.minute,
        second: time.second,
      },
      { zone },
    ).toJSDate()
  }
  return time.toJSDate()
}

function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

function trimSlash(url: string): string {
  return url.replace(/\/$/, '')
}

function lastSegment(url: string): string {
  const parts = url.split('/')
  return parts[parts.length - 1] ?? ''
}

// ─── Stored object editing ───

function blockOf(lines: string[], range: VEventRange): string[] {
  return lines.slice(range.begin, range.end + 1)
}

/** Replace some VEVENT ranges and drop others; every other line is kept */
function rewrite(
  lines: string[],
  replacements: Array<{ range: VEventRange; block: string[] }>,
  removals: VEventRange[] = [],
): string[] {
  const next: string[] = []
  let index = 0
  while (index < lines.length) {
    const replaced = replacements.find((entry) => entry.range.begin === index)
    const removed = removals.find((range) => range.begin === index)
    if (replaced) {
      next.push(...replaced.block)
      index = replaced.range.end + 1
    } else if (removed) {
      index = removed.end + 1
    } else {
      next.push(lines[index])
      index += 1
    }
  }
  return next
}

/** Insert a VEVENT before the closing END:VCALENDAR */
function appendBlock(lines: string[], block: string[]): string[] {
  const close = lines.map((line) => line.toUpperCase()).lastIndexOf('END:VCALENDAR')
  const at = close === -1 ? lines.length : close
  return [...lines.slice(0, at), ...block, ...lines.slice(at)]
}

/**
 * A RECURRENCE-ID override for one occurrence of `master`: the series
 * properties are dropped, its times become the occurrence's own.
 */
function overrideBlock(master: string[], token: string, zone: string): string[] {
  const seriesStart = readDate(firstProperty(master, 'DTSTART'), zone)
  const series = readBlockEvent(master, { sourceId: '', externalEventId: '' }, zone)
  if (!seriesStart || !series) {
    throw new NotFoundError(`Recurring event ${uidOf(master) ?? ''} has no start`)
  }

  const occurrence = tokenDate(token, zone)
  const start = occurrence.instant
  const end = series.allDay
    ? DateTime.fromJSDate(start, { zone })
        .plus({ days: spanDays(series.start, series.end, zone) })
        .toJSDate()
    : new Date(start.getTime() + (series.end.getTime() - series.start.getTime()))

  let block = master
  for (const name of SERIES_ONLY) {
    block = setProperties(block, name, [])
  }
  block = setProperties(block, 'RECURRENCE-ID', [
    formatDate('RECURRENCE-ID', start, occurrence.allDay, zone, seriesStart),
  ])
  block = setProperties(block, 'DTSTART', [formatDate('DTSTART', start, series.allDay, zone, seriesStart)])
  return setProperties(block, 'DTEND', [formatDate('DTEND', end, series.allDay, zone, seriesStart)])
}

/** Occurrence start named by a recurrence token */
function tokenDate(token: string, zone: string): { instant: Date; allDay: boolean } {
  const date = parseDateValue(token, {}, zone)
  if (!date) {
    throw new NotFoundError(`Invalid occurrence ${token}`)
  }
  return { instant: date.instant, allDay: date.allDay }
}

function spanDays(start: Date, end: Date, zone: string): number {
  const days = DateTime.fromJSDate(end, { zone })
    .startOf('day')
    .diff(DateTime.fromJSDate(start, { zone }).startOf('day'), 'days').days
  return Math.max(1, Math.round(days))
}
