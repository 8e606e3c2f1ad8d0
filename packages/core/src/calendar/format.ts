/**
 * Plain-text rendering of events for schedules, briefings and confirmations.
 * All times are 24-hour local times.
 */

import type { TimeNormalizer } from './time.js'
import type { CalendarSource, CanonicalEvent, ConflictPair } from './types.js'

export type SourceLookup = (sourceId: string) => CalendarSource | undefined

export function formatTimeRange(event: CanonicalEvent, time: TimeNormalizer): string {
  if (event.allDay) {
    return 'All day'
  }
  return `${time.formatTime(event.start)}–${time.formatTime(event.end)}`
}

/**
 * "• 10:00–11:00 Dentist [Appointments]"
 */
export function formatEventLine(
  event: CanonicalEvent,
  time: TimeNormalizer,
  lookup?: SourceLookup,
): string {
  const parts = [`• ${formatTimeRange(event, time)} ${event.title}`]
  if (event.location) {
    parts.push(`@ ${event.location}`)
  }
  const source = lookup?.(event.sourceId)
  if (source) {
    parts.push(`[${source.displayName}]`)
  }
  return parts.join(' ')
}

/**
 * "⚠ 10:15–10:30 Dentist (Appointments) overlaps Call plumber (Tasks)"
 */
export function formatConflictLine(
  pair: ConflictPair,
  time: TimeNormalizer,
  lookup?: SourceLookup,
): string {
  const name = (event: CanonicalEvent): string => {
    const source = lookup?.(event.sourceId)
    return source ? `${event.title} (${source.displayName})` : event.title
  }
  const range = `${time.formatTime(pair.overlap.start)}–${time.formatTime(pair.overlap.end)}`
  return `⚠ ${range} ${name(pair.first)} overlaps ${name(pair.second)}`
}

/** One line per failed source, naming it */
export function formatSourceWarnings(
  sourceErrors: Record<string, Error>,
  lookup?: SourceLookup,
): string[] {
  return Object.keys(sourceErrors).map((sourceId) => {
    const name = lookup?.(sourceId)?.displayName ?? sourceId
    return `⚠ ${name} calendar unavailable; its events are missing below`
  })
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/**
 * "Mon 10/19 14:00–15:00", "Sat 10/24, all day", "Fri 10/23 22:00–Sat 10/24 01:00"
 */
export function formatWhen(
  event: Pick<CanonicalEvent, 'start' | 'end' | 'allDay'>,
  time: TimeNormalizer,
): string {
  const startDay = time.localDate(event.start)
  if (event.allDay) {
    const lastDay = time.addDays(startDay, time.spanDays(event.start, event.end) - 1)
    return lastDay === startDay
      ? `${time.formatShortDay(startDay)}, all day`
      : `${time.formatShortDay(startDay)}–${time.formatShortDay(lastDay)}, all day`
  }
  const endDay = time.localDate(event.end)
  const end =
    endDay === startDay
      ? time.formatTime(event.end)
      : `${time.formatShortDay(endDay)} ${time.formatTime(event.end)}`
  return `${time.formatShortDay(startDay)} ${time.formatTime(event.start)}–${end}`
}
