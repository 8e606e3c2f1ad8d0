/**
 * Time Normalizer
 *
 * The only place local civil time is converted to and from absolute
 * instants. Everything else in the calendar core works on `Date` values and
 * asks this class for day boundaries and display strings.
 */

import { DateTime, IANAZone } from 'luxon'
import { InvalidTimeFormatError, ValidationError } from './errors.js'
import type { ClockTime, Interval } from './types.js'

/** Civil date "YYYY-MM-DD" */
export type LocalDate = string

export interface ParsedTime {
  instant: Date
  /** True for date-only input: the value names a whole civil day */
  allDay: boolean
  /** Civil date of the instant in the configured zone */
  date: LocalDate
}

export interface LocalDisplay {
  date: LocalDate
  /** 24-hour "HH:mm", or "HH:mm:ss" when seconds are non-zero */
  time: string
  /** UTC offset in effect, e.g. "-04:00" */
  civilOffset: string
}

const CIVIL_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(Z|[+-]\d{2}:?\d{2})?)?$/

const CLOCK_PATTERN = /^(\d{2}):(\d{2})$/

export function isValidTimezone(zone: string): boolean {
  return IANAZone.isValidZone(zone)
}

export class TimeNormalizer {
  readonly zone: string

  constructor(zone: string) {
    if (!isValidTimezone(zone)) {
      throw new ValidationError(`Unknown timezone "${zone}"`)
    }
    this.zone = zone
  }

  /**
   * Parse a civil string in the configured zone.
   * Strings with an explicit offset ("Z", "-05:00") are absolute instants.
   */
  parse(input: string, assumeDateOnly = false): ParsedTime {
    const text = input.trim()
    const match = CIVIL_PATTERN.exec(text)
    if (!match) {
      throw new InvalidTimeFormatError(input)
    }

    const [, y, mo, d, h, mi, s, offset] = match
    const year = Number(y)
    const month = Number(mo)
    const day = Number(d)

    const dateOnly = h === undefined
    if (dateOnly || assumeDateOnly) {
      const dt = DateTime.fromObject({ year, month, day }, { zone: this.zone })
      if (!dt.isValid) {
        throw new InvalidTimeFormatError(input, dt.invalidExplanation ?? 'not a calendar date')
      }
      if (dateOnly || !offset) {
        const startOfDay = dt.startOf('day')
        return { instant: startOfDay.toJSDate(), allDay: true, date: startOfDay.toISODate() ?? text }
      }
    }

    if (offset) {
      const absolute = DateTime.fromISO(text.replace(' ', 'T'), { zone: this.zone })
      if (!absolute.isValid) {
        throw new InvalidTimeFormatError(input, absolute.invalidExplanation ?? undefined)
      }
      const local = assumeDateOnly ? absolute.startOf('day') : absolute
      return { instant: local.toJSDate(), allDay: assumeDateOnly, date: this.localDate(local.toJSDate()) }
    }

    const hour = Number(h)
    const minute = Number(mi)
    const second = s === undefined ? 0 : Number(s)
    const dt = DateTime.fromObject({ year, month, day, hour, minute, second }, { zone: this.zone })
    if (!dt.isValid) {
      throw new InvalidTimeFormatError(input, dt.invalidExplanation ?? 'not a calendar time')
    }
    // Luxon silently shifts times inside a spring-forward gap
    if (dt.hour !== hour || dt.minute !== minute) {
      throw new InvalidTimeFormatError(input, `does not exist in ${this.zone} (daylight-saving gap)`)
    }

    return { instant: dt.toJSDate(), allDay: false, date: this.localDate(dt.toJSDate()) }
  }

  toInstant(input: string, assumeDateOnly = false): Date {
    return this.parse(input, assumeDateOnly).instant
  }

  /**
   * Canonical rendering: seconds appear only when non-zero, so
   * "2026-10-19T10:00:00" comes back as "10:00". Round trips are exact for
   * canonical strings.
   */
  toLocalDisplay(instant: Date): LocalDisplay {
    const dt = this.local(instant)
    return {
      date: dt.toFormat('yyyy-MM-dd'),
      time: dt.toFormat(dt.second !== 0 ? 'HH:mm:ss' : 'HH:mm'),
      civilOffset: dt.toFormat('ZZ'),
    }
  }

  /** Canonical "YYYY-MM-DDTHH:mm[:ss]", the inverse of `parse` for timed values */
  toCivilString(instant: Date): string {
    const { date, time } = this.toLocalDisplay(instant)
    return `${date}T${time}`
  }

  local(instant: Date): DateTime {
    return DateTime.fromJSDate(instant, { zone: this.zone })
  }

  localDate(instant: Date): LocalDate {
    return this.local(instant).toFormat('yyyy-MM-dd')
  }

  today(now: Date): LocalDate {
    return this.localDate(now)
  }

  addDays(date: LocalDate, days: number): LocalDate {
    return this.civilDay(date).plus({ days }).toFormat('yyyy-MM-dd')
  }

  startOfDay(date: LocalDate): Date {
    return this.civilDay(date).toJSDate()
  }

  /** The civil day as [start, next start): 23 or 25 hours on transition days */
  dayRange(date: LocalDate): Interval {
    const start = this.civilDay(date)
    return { start: start.toJSDate(), end: start.plus({ days: 1 }).startOf('day').toJSDate() }
  }

  /** Instant of a wall-clock time ("HH:mm") on a civil date */
  atClock(date: LocalDate, clock: ClockTime): Date {
    const { hour, minute } = parseClock(clock)
    if (hour === 24 && minute === 0) {
      return this.dayRange(date).end
    }
    return this.civilDay(date).set({ hour, minute }).toJSDate()
  }

  /** Civil date taken from `date`, wall-clock time taken from `timeOf` */
  combine(date: LocalDate, timeOf: Date): Date {
    const source = this.local(timeOf)
    return this.civilDay(date)
      .set({ hour: source.hour, minute: source.minute, second: source.second })
      .toJSDate()
  }

  /**
   * New end for an event moved from [start, end) to begin at `newStart`,
   * keeping its wall-clock length rather than its absolute length.
   */
  shiftKeepingWallDuration(start: Date, end: Date, newStart: Date): Date {
    const wallStart = this.local(start).setZone('utc', { keepLocalTime: true })
    const wallEnd = this.local(end).setZone('utc', { keepLocalTime: true })
    const lengthMs = wallEnd.toMillis() - wallStart.toMillis()

    const shifted = this.local(newStart)
      .setZone('utc', { keepLocalTime: true })
      .plus({ milliseconds: lengthMs })
      .setZone(this.zone, { keepLocalTime: true })

    return new Date(Math.max(shifted.toMillis(), newStart.getTime()))
  }

  /** Whole civil days spanned by an all-day event, at least one */
  spanDays(start: Date, end: Date): number {
    const days = Math.round(
      this.local(end).startOf('day').diff(this.local(start).startOf('day'), 'days').days,
    )
    return Math.max(1, days)
  }

  /** ISO weekday of a civil date, 1 = Monday … 7 = Sunday */
  weekday(date: LocalDate): number {
    return this.civilDay(date).weekday
  }

  /** Minutes since local midnight */
  minuteOfDay(instant: Date): number {
    const dt = this.local(instant)
    return dt.hour * 60 + dt.minute
  }

  formatTime(instant: Date): string {
    return this.local(instant).toFormat('HH:mm')
  }

  /** "Sunday, October 18" */
  formatDayHeading(date: LocalDate): string {
    return this.civilDay(date).toFormat('cccc, LLLL d')
  }

  /** "Sun 10/18" */
  formatShortDay(date: LocalDate): string {
    return this.civilDay(date).toFormat('ccc MM/dd')
  }

  private civilDay(date: LocalDate): DateTime {
    const dt = DateTime.fromISO(date, { zone: this.zone })
    if (!dt.isValid) {
      throw new InvalidTimeFormatError(date, dt.invalidExplanation ?? undefined)
    }
    return dt.startOf('day')
  }
}

export function parseClock(clock: ClockTime): { hour: number; minute: number } {
  const match = CLOCK_PATTERN.exec(clock.trim())
  const hour = match ? Number(match[1]) : NaN
  const minute = match ? Number(match[2]) : NaN
  if (!match || minute > 59 || hour > 24 || (hour === 24 && minute !== 0)) {
    throw new InvalidTimeFormatError(clock, 'expected HH:MM')
  }
  return { hour, minute }
}

export function clockToMinutes(clock: ClockTime): number {
  const { hour, minute } = parseClock(clock)
  return hour * 60 + minute
}
