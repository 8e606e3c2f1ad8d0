import { describe, it, expect } from 'vitest'
import { TimeNormalizer, parseClock } from '../src/calendar/time.js'
import { InvalidTimeFormatError, ValidationError } from '../src/calendar/errors.js'

const tz = new TimeNormalizer('America/Toronto')

describe('TimeNormalizer.parse', () => {
  it('reads a date-time as local civil time', () => {
    const parsed = tz.parse('2026-10-19T10:00')
    expect(parsed.instant.toISOString()).toBe('2026-10-19T14:00:00.000Z')
    expect(parsed.allDay).toBe(false)
    expect(parsed.date).toBe('2026-10-19')
  })

  it('treats a date-only value as the whole civil day', () => {
    const parsed = tz.parse('2026-10-19')
    expect(parsed.instant.toISOString()).toBe('2026-10-19T04:00:00.000Z')
    expect(parsed.allDay).toBe(true)
  })

  it('truncates to the start of the day when asked to assume a date', () => {
    expect(tz.toInstant('2026-10-19T15:30', true).toISOString()).toBe('2026-10-19T04:00:00.000Z')
  })

  it('accepts explicit offsets as absolute instants', () => {
    expect(tz.toCivilString(tz.toInstant('2026-10-19T14:00Z'))).toBe('2026-10-19T10:00')
    expect(tz.toCivilString(tz.toInstant('2026-10-19T10:00-05:00'))).toBe('2026-10-19T11:00')
  })

  it('rejects unparseable input instead of defaulting to now', () => {
    expect(() => tz.parse('tomorrow at 3')).toThrow(InvalidTimeFormatError)
    expect(() => tz.parse('')).toThrow(InvalidTimeFormatError)
  })

  it('rejects impossible calendar values', () => {
    expect(() => tz.parse('2026-02-30')).toThrow(InvalidTimeFormatError)
    expect(() => tz.parse('2026-10-19T25:00')).toThrow(InvalidTimeFormatError)
  })

  it('rejects local times inside the spring-forward gap', () => {
    expect(() => tz.parse('2026-03-08T02:30')).toThrow('daylight-saving gap')
  })

  it('names the offending input in the error', () => {
    expect(() => tz.parse('19/10/2026')).toThrow(
      'Invalid time "19/10/2026". Use YYYY-MM-DD or YYYY-MM-DDTHH:MM.',
    )
  })
})

describe('TimeNormalizer display', () => {
  it('round-trips local civil strings', () => {
    for (const civil of ['2026-10-19T10:00', '2026-01-05T23:45', '2026-07-01T00:00', '2026-10-19T10:00:30']) {
      expect(tz.toCivilString(tz.toInstant(civil))).toBe(civil)
    }
  })

  it('drops zero seconds from the canonical form', () => {
    const written = tz.toInstant('2026-10-19T10:00:00')

    expect(written).toEqual(tz.toInstant('2026-10-19T10:00'))
    expect(tz.toCivilString(written)).toBe('2026-10-19T10:00')
    expect(tz.toLocalDisplay(written).time).toBe('10:00')
  })

  it('renders 24-hour time with the offset in effect', () => {
    expect(tz.toLocalDisplay(tz.toInstant('2026-10-19T18:05'))).toEqual({
      date: '2026-10-19',
      time: '18:05',
      civilOffset: '-04:00',
    })
    expect(tz.toLocalDisplay(tz.toInstant('2026-12-01T09:00')).civilOffset).toBe('-05:00')
  })

  it('formats day headings', () => {
    expect(tz.formatDayHeading('2026-10-18')).toBe('Sunday, October 18')
    expect(tz.formatShortDay('2026-10-19')).toBe('Mon 10/19')
  })
})

describe('TimeNormalizer day arithmetic', () => {
  it('gives 25-hour days when clocks fall back', () => {
    const range = tz.dayRange('2026-11-01')
    expect(range.end.getTime() - range.start.getTime()).toBe(25 * 60 * 60 * 1000)
  })

  it('maps 24:00 to the end of the day', () => {
    expect(tz.atClock('2026-10-19', '24:00')).toEqual(tz.dayRange('2026-10-19').end)
    expect(tz.atClock('2026-10-19', '09:30').toISOString()).toBe('2026-10-19T13:30:00.000Z')
  })

  it('keeps wall-clock duration when shifting across a transition', () => {
    const start = tz.toInstant('2026-10-31T23:00')
    const end = tz.toInstant('2026-11-01T03:00')
    // Five absolute hours, four on the wall clock
    expect(end.getTime() - start.getTime()).toBe(5 * 60 * 60 * 1000)

    const shifted = tz.shiftKeepingWallDuration(start, end, tz.toInstant('2026-11-07T23:00'))
    expect(tz.toCivilString(shifted)).toBe('2026-11-08T03:00')
  })

  it('combines a new date with an existing time of day', () => {
    expect(tz.toCivilString(tz.combine('2026-10-22', tz.toInstant('2026-10-19T10:15')))).toBe(
      '2026-10-22T10:15',
    )
  })

  it('numbers weekdays from Monday', () => {
    expect(tz.weekday('2026-10-19')).toBe(1)
    expect(tz.weekday('2026-10-25')).toBe(7)
  })
})

describe('configuration checks', () => {
  it('rejects unknown timezones', () => {
    expect(() => new TimeNormalizer('Mars/Olympus_Mons')).toThrow(ValidationError)
  })

  it('parses HH:MM clock times only', () => {
    expect(parseClock('09:30')).toEqual({ hour: 9, minute: 30 })
    expect(() => parseClock('9:30')).toThrow(InvalidTimeFormatError)
    expect(() => parseClock('24:30')).toThrow(InvalidTimeFormatError)
  })
})
