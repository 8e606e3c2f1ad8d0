/**
 * Line-level iCalendar reading and editing.
 *
 * Stored CalDAV objects are patched in place: only the properties a change
 * touches are rewritten, every other line of the object is written back as read.
 */

import { DateTime, Duration } from 'luxon'
import type { SourceEvent } from '../types.js'
import { defaultEnd } from './shared.js'

export interface ICalProperty {
  name: string
  params: Record<string, string>
  value: string
}

/** A date-valued property: the instant plus the form it was written in */
export interface ICalDate {
  instant: Date
  allDay: boolean
  /** Local time in a named zone */
  tzid?: string
  /** Local time without a zone, read in the configured zone */
  floating: boolean
}

/** Top-level VEVENT: lines[begin] is BEGIN:VEVENT, lines[end] is END:VEVENT */
export interface VEventRange {
  begin: number
  end: number
}

const UTC_FORMAT = "yyyyMMdd'T'HHmmss'Z'"
const LOCAL_FORMAT = "yyyyMMdd'T'HHmmss"
const DATE_FORMAT = 'yyyyMMdd'
const MAX_LINE = 75

/** Separates the series UID from the recurrence token in occurrence IDs */
const OCCURRENCE_SEPARATOR = '::'
const RECURRENCE_TOKEN = /^\d{8}(T\d{6}Z)?$/

// ─── Lines and properties ───

export function unfoldLines(ics: string): string[] {
  return ics
    .replace(/\r?\n[ \t]/g, '')
    .split(/\r?\n/)
    .filter((line) => line.length > 0)
}

/** Join lines, folding those longer than 75 characters */
export function foldLines(lines: string[]): string {
  return lines.map(foldLine).join('\r\n')
}

function foldLine(line: string): string {
  const chars = Array.from(line)
  if (chars.length <= MAX_LINE) return line
  const parts = [chars.slice(0, MAX_LINE).join('')]
  for (let i = MAX_LINE; i < chars.length; i += MAX_LINE - 1) {
    parts.push(` ${chars.slice(i, i + MAX_LINE - 1).join('')}`)
  }
  return parts.join('\r\n')
}

export function parseProperty(line: string): ICalProperty {
  const [head, value] = splitOutsideQuotes(line, ':', 2)
  const [name, ...rawParams] = splitOutsideQuotes(head, ';')

  const params: Record<string, string> = {}
  for (const part of rawParams) {
    const eq = part.indexOf('=')
    if (eq <= 0) continue
    params[part.slice(0, eq).trim().toUpperCase()] = part.slice(eq + 1).trim().replace(/^"|"$/g, '')
  }

  return { name: name.trim().toUpperCase(), params, value: value ?? '' }
}

export function formatProperty(prop: ICalProperty): string {
  const params = Object.entries(prop.params).map(([key, value]) =>
    /[:;,]/.test(value) ? `;${key}="${value}"` : `;${key}=${value}`,
  )
  return `${prop.name}${params.join('')}:${prop.value}`
}

function splitOutsideQuotes(text: string, separator: string, limit = Infinity): string[] {
  const parts: string[] = []
  let quoted = false
  let from = 0
  for (let i = 0; i < text.length && parts.length < limit - 1; i++) {
    if (text[i] === '"') quoted = !quoted
    else if (text[i] === separator && !quoted) {
      parts.push(text.slice(from, i))
      from = i + 1
    }
  }
  parts.push(text.slice(from))
  return parts
}

export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\n/g, '\\n')
}

export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch))
}

// ─── VEVENT blocks ───

export function findVEvents(lines: string[]): VEventRange[] {
  const ranges: VEventRange[] = []
  let depth = 0
  let begin = -1

  lines.forEach((line, index) => {
    const upper = line.toUpperCase()
    if (upper.startsWith('BEGIN:')) {
      depth += 1
      if (depth === 2 && upper === 'BEGIN:VEVENT') begin = index
    } else if (upper.startsWith('END:')) {
      if (depth === 2 && upper === 'END:VEVENT' && begin !== -1) {
        ranges.push({ begin, end: index })
        begin = -1
      }
      depth -= 1
    }
  })
  return ranges
}

/** Properties of the block itself, not of nested components such as VALARM */
export function ownProperties(block: string[]): ICalProperty[] {
  const props: ICalProperty[] = []
  let depth = 0
  for (const line of block.slice(1, -1)) {
    const upper = line.toUpperCase()
    if (upper.startsWith('BEGIN:')) depth += 1
    else if (upper.startsWith('END:')) depth -= 1
    else if (depth === 0) props.push(parseProperty(line))
  }
  return props
}

export function firstProperty(block: string[], name: string): ICalProperty | undefined {
  return ownProperties(block).find((prop) => prop.name === name)
}

/** Replace every own `name` property of the block with `props` */
export function setProperties(block: string[], name: string, props: ICalProperty[]): string[] {
  const own: string[] = []
  const nested: string[] = []
  let depth = 0

  for (const line of block.slice(1, -1)) {
    const upper = line.toUpperCase()
    if (upper.startsWith('BEGIN:')) depth += 1
    if (depth > 0) {
      nested.push(line)
    } else if (parseProperty(line).name !== name) {
      own.push(line)
    }
    if (upper.startsWith('END:')) depth -= 1
  }

  return [block[0], ...own, ...props.map(formatProperty), ...nested, block[block.length - 1]]
}

/** Add a property after the block's existing ones of the same name */
export function addProperty(block: string[], prop: ICalProperty): string[] {
  const same = ownProperties(block).filter((own) => own.name === prop.name)
  return setProperties(block, prop.name, [...same, prop])
}

export function uidOf(block: string[]): string | undefined {
  return firstProperty(block, 'UID')?.value.trim()
}

// ─── Dates ───

export function parseDateValue(value: string, params: Record<string, string>, zone: string): ICalDate | null {
  const text = value.trim()

  if (params.VALUE === 'DATE' || /^\d{8}$/.test(text)) {
    const dt = DateTime.fromFormat(text, DATE_FORMAT, { zone })
    return dt.isValid ? { instant: dt.toJSDate(), allDay: true, floating: false } : null
  }
  if (text.endsWith('Z')) {
    const dt = DateTime.fromFormat(text, UTC_FORMAT, { zone: 'utc' })
    return dt.isValid ? { instant: dt.toJSDate(), allDay: false, floating: false } : null
  }

  const tzid = params.TZID
  const dt = DateTime.fromFormat(text, LOCAL_FORMAT, { zone: knownZone(tzid) ?? zone })
  if (!dt.isValid) return null
  return { instant: dt.toJSDate(), allDay: false, tzid, floating: tzid === undefined }
}

export function readDate(prop: ICalProperty | undefined, zone: string): ICalDate | null {
  return prop ? parseDateValue(prop.value, prop.params, zone) : null
}

/** Date property written in the same form as `like`; UTC when there is none */
export function formatDate(
  name: string,
  instant: Date,
  allDay: boolean,
  zone: string,
  like?: ICalDate | null,
): ICalProperty {
  if (allDay) {
    return { name, params: { VALUE: 'DATE' }, value: DateTime.fromJSDate(instant, { zone }).toFormat(DATE_FORMAT) }
  }
  if (like && !like.allDay && like.tzid !== undefined) {
    const local = DateTime.fromJSDate(instant, { zone: knownZone(like.tzid) ?? zone })
    return { name, params: { TZID: like.tzid }, value: local.toFormat(LOCAL_FORMAT) }
  }
  if (like?.floating) {
    return { name, params: {}, value: DateTime.fromJSDate(instant, { zone }).toFormat(LOCAL_FORMAT) }
  }
  return { name, params: {}, value: DateTime.fromJSDate(instant).toUTC().toFormat(UTC_FORMAT) }
}

function knownZone(tzid: string | undefined): string | undefined {
  return tzid !== undefined && DateTime.local().setZone(tzid).isValid ? tzid : undefined
}

// ─── Occurrence IDs ───

/** Recurrence token: the civil date for all-day series, else the UTC instant */
export function recurrenceToken(instant: Date, allDay: boolean, zone: string): string {
  return allDay
    ? DateTime.fromJSDate(instant, { zone }).toFormat(DATE_FORMAT)
    : DateTime.fromJSDate(instant).toUTC().toFormat(UTC_FORMAT)
}

export function occurrenceId(uid: string, token: string): string {
  return `${uid}${OCCURRENCE_SEPARATOR}${token}`
}

export function splitOccurrenceId(externalEventId: string): { uid: string; token?: string } {
  const at = externalEventId.lastIndexOf(OCCURRENCE_SEPARATOR)
  if (at > 0) {
    const token = externalEventId.slice(at + OCCURRENCE_SEPARATOR.length)
    if (RECURRENCE_TOKEN.test(token)) {
      return { uid: externalEventId.slice(0, at), token }
    }
  }
  return { uid: externalEventId }
}

/** Tokens of every date listed in the block's own `name` properties (EXDATE, RECURRENCE-ID) */
export function dateTokens(block: string[], name: string, zone: string): string[] {
  const tokens: string[] = []
  for (const prop of ownProperties(block)) {
    if (prop.name !== name) continue
    for (const value of prop.value.split(',')) {
      const date = parseDateValue(value, prop.params, zone)
      if (date) tokens.push(recurrenceToken(date.instant, date.allDay, zone))
    }
  }
  return tokens
}

// ─── Events ───

/** Event fields as written in one VEVENT block */
export function readBlockEvent(
  block: string[],
  ids: { sourceId: string; externalEventId: string; recurringEventId?: string },
  zone: string,
): SourceEvent | null {
  const props = ownProperties(block)
  const first = (name: string): ICalProperty | undefined => props.find((prop) => prop.name === name)

  const start = readDate(first('DTSTART'), zone)
  if (!start) return null

  let end = readDate(first('DTEND'), zone)?.instant
  const duration = first('DURATION')
  if (!end && duration) {
    const length = Duration.fromISO(duration.value.trim())
    if (length.isValid) {
      end = DateTime.fromJSDate(start.instant, { zone }).plus(length).toJSDate()
    }
  }
  const finish = end && end.getTime() >= start.instant.getTime() ? end : defaultEnd(start.instant, start.allDay)

  const text = (name: string): string | undefined => {
    const value = first(name)?.value
    return value ? unescapeText(value) : undefined
  }
  const attendees = props
    .filter((prop) => prop.name === 'ATTENDEE')
    .map((prop) => prop.value.replace(/^mailto:/i, ''))
    .filter((address) => address.length > 0)

  const event: SourceEvent = {
    sourceId: ids.sourceId,
    externalEventId: ids.externalEventId,
    title: text('SUMMARY') ?? 'Untitled',
    start: start.instant,
    end: finish,
    allDay: start.allDay,
    location: text('LOCATION'),
    description: text('DESCRIPTION'),
    attendees: attendees.length > 0 ? attendees : undefined,
  }
  if (ids.recurringEventId !== undefined) event.recurringEventId = ids.recurringEventId
  return event
}

export interface BlockChanges {
  times: boolean
  title: boolean
  location: boolean
  description: boolean
  attendees: boolean
}

/** Write the changed fields of `event` into the block; other lines stay as they are */
export function writeBlockEvent(block: string[], event: SourceEvent, changes: BlockChanges, zone: string): string[] {
  let next = setProperties(block, 'DTSTAMP', [
    { name: 'DTSTAMP', params: {}, value: DateTime.now().toUTC().toFormat(UTC_FORMAT) },
  ])

  if (changes.times) {
    const like = readDate(firstProperty(block, 'DTSTART'), zone)
    next = setProperties(next, 'DTSTART', [formatDate('DTSTART', event.start, event.allDay, zone, like)])
    next = setProperties(next, 'DTEND', [formatDate('DTEND', event.end, event.allDay, zone, like)])
    next = setProperties(next, 'DURATION', [])
  }
  if (changes.title) {
    next = setProperties(next, 'SUMMARY', [{ name: 'SUMMARY', params: {}, value: escapeText(event.title) }])
  }
  if (changes.location) {
    next = setProperties(next, 'LOCATION', textProperty('LOCATION', event.location))
  }
  if (changes.description) {
    next = setProperties(next, 'DESCRIPTION', textProperty('DESCRIPTION', event.description))
  }
  if (changes.attendees) {
    next = setProperties(
      next,
      'ATTENDEE',
      (event.attendees ?? []).map((address) => ({ name: 'ATTENDEE', params: {}, value: `mailto:${address}` })),
    )
  }
  return next
}

function textProperty(name: string, value: string | undefined): ICalProperty[] {
  return value ? [{ name, params: {}, value: escapeText(value) }] : []
}
