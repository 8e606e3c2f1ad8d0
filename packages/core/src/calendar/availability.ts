/**
 * Availability Engine
 *
 * Free/busy computation over canonical events. Busy intervals are derived
 * per query and discarded afterwards.
 */

import { ValidationError } from './errors.js'
import type { LocalDate, TimeNormalizer } from './time.js'
import type { BusinessHours, CanonicalEvent, Interval } from './types.js'

const MINUTE_MS = 60_000

export interface DayBounds {
  /** Wall-clock bound of the searchable part of the day; default full day */
  hours?: BusinessHours
  /** Nothing before this instant is offered (e.g. "now") */
  notBefore?: Date
  /** Let all-day events block the whole day (default: they do not) */
  includeAllDay?: boolean
}

export interface SlotSearchOptions extends DayBounds {
  /** ISO weekdays to consider, 1 = Monday … 7 = Sunday */
  weekdays?: number[]
  /** Maximum slots returned (one per day) */
  limit?: number
}

const FULL_DAY: BusinessHours = { start: '00:00', end: '24:00' }
const WORKDAYS = [1, 2, 3, 4, 5]
const DEFAULT_SLOT_LIMIT = 5

/**
 * Sort by start and coalesce overlapping or touching intervals.
 */
export function mergeIntervals(intervals: Interval[]): Interval[] {
  const sorted = [...intervals].sort((a, b) => a.start.getTime() - b.start.getTime())
  const merged: Interval[] = []

  for (const interval of sorted) {
    const last = merged[merged.length - 1]
    if (last && interval.start.getTime() <= last.end.getTime()) {
      if (interval.end.getTime() > last.end.getTime()) {
        last.end = interval.end
      }
    } else {
      merged.push({ start: interval.start, end: interval.end })
    }
  }
  return merged
}

/**
 * Busy intervals of `events` clipped to [from, to).
 */
export function busyIntervals(
  events: CanonicalEvent[],
  from: Date,
  to: Date,
  includeAllDay = false,
): Interval[] {
  const busy: Interval[] = []
  for (const event of events) {
    if (event.allDay && !includeAllDay) continue
    const start = Math.max(event.start.getTime(), from.getTime())
    const end = Math.min(event.end.getTime(), to.getTime())
    if (end > start) {
      busy.push({ start: new Date(start), end: new Date(end) })
    }
  }
  return mergeIntervals(busy)
}

/**
 * Gaps of [from, to) not covered by the merged busy intervals.
 */
export function freeIntervals(busy: Interval[], from: Date, to: Date): Interval[] {
  const free: Interval[] = []
  let cursor = from.getTime()

  for (const interval of mergeIntervals(busy)) {
    if (interval.start.getTime() > cursor) {
      free.push({ start: new Date(cursor), end: new Date(Math.min(interval.start.getTime(), to.getTime())) })
    }
    cursor = Math.max(cursor, interval.end.getTime())
    if (cursor >= to.getTime()) break
  }

  if (cursor < to.getTime()) {
    free.push({ start: new Date(cursor), end: to })
  }
  return free.filter((gap) => gap.end.getTime() > gap.start.getTime())
}

export class AvailabilityEngine {
  constructor(private time: TimeNormalizer) {}

  /**
   * Earliest slot of `durationMinutes` on `day` that overlaps no busy event,
   * or null when the day has no such gap.
   */
  findFreeSlot(
    day: LocalDate,
    durationMinutes: number,
    busyEvents: CanonicalEvent[],
    options?: DayBounds,
  ): Interval | null {
    assertDuration(durationMinutes)

    const window = this.searchWindow(day, options)
    if (!window) return null

    const needed = durationMinutes * MINUTE_MS
    const busy = busyIntervals(busyEvents, window.start, window.end, options?.includeAllDay)

    for (const gap of freeIntervals(busy, window.start, window.end)) {
      if (gap.end.getTime() - gap.start.getTime() >= needed) {
        return { start: gap.start, end: new Date(gap.start.getTime() + needed) }
      }
    }
    return null
  }

  /**
   * Earliest slot per qualifying day over `days` civil days from `fromDay`.
   */
  findFreeSlots(
    fromDay: LocalDate,
    days: number,
    durationMinutes: number,
    busyEvents: CanonicalEvent[],
    options?: SlotSearchOptions,
  ): Interval[] {
    assertDuration(durationMinutes)
    const weekdays = options?.weekdays ?? WORKDAYS
    const limit = options?.limit ?? DEFAULT_SLOT_LIMIT

    const slots: Interval[] = []
    for (let offset = 0; offset < days && slots.length < limit; offset++) {
      const day = this.time.addDays(fromDay, offset)
      if (!weekdays.includes(this.time.weekday(day))) continue

      const slot = this.findFreeSlot(day, durationMinutes, busyEvents, options)
      if (slot) slots.push(slot)
    }
    return slots
  }

  /** [dayStart, dayEnd) within the hours bound, clipped by notBefore */
  private searchWindow(day: LocalDate, options?: DayBounds): Interval | null {
    const hours = options?.hours ?? FULL_DAY
    const start = this.time.atClock(day, hours.start)
    const end = this.time.atClock(day, hours.end)

    const notBefore = options?.notBefore?.getTime() ?? Number.NEGATIVE_INFINITY
    const from = new Date(Math.max(start.getTime(), notBefore))
    return from.getTime() < end.getTime() ? { start: from, end } : null
  }
}

function assertDuration(durationMinutes: number): void {
  if (!Number.isInteger(durationMinutes) || durationMinutes <= 0) {
    throw new ValidationError(`Duration must be a positive number of minutes, got ${durationMinutes}`)
  }
}
