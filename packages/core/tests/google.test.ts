import { beforeEach, describe, it, expect, vi } from 'vitest'
import type { calendar_v3 } from 'googleapis'
import {
  GoogleCalendarSourceAdapter,
  fromGoogleEvent,
  toGoogleDateTime,
} from '../src/calendar/adapters/google.js'
import { NotFoundError, SourceUnavailableError } from '../src/calendar/errors.js'
import type { CalendarSource } from '../src/calendar/types.js'
import { ZONE, at, time } from './fixtures.js'

describe('fromGoogleEvent', () => {
  it('maps a timed event', () => {
    const event = fromGoogleEvent(
      {
        id: 'g1',
        summary: 'Standup',
        start: { dateTime: '2026-10-19T09:00:00-04:00' },
        end: { dateTime: '2026-10-19T09:15:00-04:00' },
        htmlLink: 'https://calendar.example.com/g1',
        attendees: [{ email: 'a@example.com' }, {}],
      },
      'work',
      ZONE,
    )

    expect(event).toEqual({
      sourceId: 'work',
      externalEventId: 'g1',
      title: 'Standup',
      start: new Date('2026-10-19T13:00:00Z'),
      end: new Date('2026-10-19T13:15:00Z'),
      allDay: false,
      location: undefined,
      description: undefined,
      attendees: ['a@example.com'],
      externalLink: 'https://calendar.example.com/g1',
    })
  })

  it('maps all-day events to civil days in the zone', () => {
    const event = fromGoogleEvent(
      { id: 'g2', summary: 'Holiday', start: { date: '2026-10-24' }, end: { date: '2026-10-25' } },
      'work',
      ZONE,
    )

    expect(event?.allDay).toBe(true)
    expect(event?.start).toEqual(time.startOfDay('2026-10-24'))
    expect(event?.end).toEqual(time.startOfDay('2026-10-25'))
  })

  it('defaults a missing end and title', () => {
    const event = fromGoogleEvent({ id: 'g3', start: { dateTime: '2026-10-19T14:00:00Z' } }, 'work', ZONE)

    expect(event?.title).toBe('Untitled')
    expect(event?.end).toEqual(new Date('2026-10-19T15:00:00Z'))
  })

  it('skips cancelled and incomplete items', () => {
    expect(
      fromGoogleEvent({ id: 'g4', status: 'cancelled', start: { dateTime: '2026-10-19T14:00:00Z' } }, 'work', ZONE),
    ).toBeNull()
    expect(fromGoogleEvent({ start: { dateTime: '2026-10-19T14:00:00Z' } }, 'work', ZONE)).toBeNull()
    expect(fromGoogleEvent({ id: 'g5' }, 'work', ZONE)).toBeNull()
  })

  it('keeps the series of a recurring instance', () => {
    const event = fromGoogleEvent(
      {
        id: 'standup_20261019T130000Z',
        recurringEventId: 'standup',
        start: { dateTime: '2026-10-19T09:00:00-04:00' },
      },
      'work',
      ZONE,
    )

    expect(event?.externalEventId).toBe('standup_20261019T130000Z')
    expect(event?.recurringEventId).toBe('standup')
  })
})

describe('toGoogleDateTime', () => {
  it('writes local date-times with the zone', () => {
    expect(toGoogleDateTime(at('2026-10-19T10:00'), false, ZONE)).toEqual({
      dateTime: '2026-10-19T10:00:00-04:00',
      timeZone: ZONE,
    })
  })

  it('writes all-day values as dates', () => {
    expect(toGoogleDateTime(time.startOfDay('2026-10-24'), true, ZONE)).toEqual({ date: '2026-10-24' })
  })
})

// ─── Adapter against an in-process Calendar API ───

const work: CalendarSource = {
  id: 'work',
  displayName: 'Work',
  kind: 'appointment',
  backend: 'google',
  externalRef: 'primary',
}

function httpError(code: number, message: string): Error {
  return Object.assign(new Error(message), { code })
}

function fakeCalendar(pages: calendar_v3.Schema$Event[][] = [[]]) {
  const stored = new Map<string, calendar_v3.Schema$Event>()
  const find = (eventId: string | undefined): calendar_v3.Schema$Event => {
    const item = stored.get(eventId ?? '')
    if (!item) throw httpError(404, 'Not Found')
    return item
  }

  const events = {
    list: vi.fn(async (params: calendar_v3.Params$Resource$Events$List) => {
      const page = Number(params.pageToken ?? '0')
      const nextPageToken = page + 1 < pages.length ? String(page + 1) : undefined
      return { data: { items: pages[page], nextPageToken } }
    }),
    get: vi.fn(async (params: calendar_v3.Params$Resource$Events$Get) => ({ data: find(params.eventId) })),
    insert: vi.fn(async (params: calendar_v3.Params$Resource$Events$Insert) => ({
      data: { ...params.requestBody, id: 'new-1', htmlLink: 'https://calendar.example.com/new-1' },
    })),
    patch: vi.fn(async (params: calendar_v3.Params$Resource$Events$Patch) => {
      const next = { ...find(params.eventId), ...params.requestBody }
      stored.set(params.eventId ?? '', next)
      return { data: next }
    }),
    delete: vi.fn(async (params: calendar_v3.Params$Resource$Events$Delete) => {
      if (!stored.delete(params.eventId ?? '')) throw httpError(410, 'Resource has been deleted')
      return { data: '' }
    }),
  }

  return { api: { events }, events, stored }
}

const dentist: calendar_v3.Schema$Event = {
  id: 'dentist',
  summary: 'Dentist',
  start: { dateTime: '2026-10-20T10:00:00-04:00' },
  end: { dateTime: '2026-10-20T11:00:00-04:00' },
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

describe('GoogleCalendarSourceAdapter', () => {
  it('follows page tokens and skips cancelled instances', async () => {
    const standup: calendar_v3.Schema$Event = {
      id: 'standup_20261019T130000Z',
      recurringEventId: 'standup',
      summary: 'Standup',
      start: { dateTime: '2026-10-19T09:00:00-04:00' },
      end: { dateTime: '2026-10-19T09:15:00-04:00' },
    }
    const cancelled: calendar_v3.Schema$Event = { ...standup, id: 'standup_20261021T130000Z', status: 'cancelled' }
    const { api, events } = fakeCalendar([[standup], [cancelled, dentist]])

    const listed = await new GoogleCalendarSourceAdapter(work, api, ZONE).list(
      at('2026-10-19T00:00'),
      at('2026-10-26T00:00'),
    )

    expect(listed.map((event) => [event.externalEventId, event.recurringEventId])).toEqual([
      ['standup_20261019T130000Z', 'standup'],
      ['dentist', undefined],
    ])
    expect(events.list).toHaveBeenCalledTimes(2)
    expect(events.list).toHaveBeenLastCalledWith({
      calendarId: 'primary',
      timeMin: '2026-10-19T04:00:00.000Z',
      timeMax: '2026-10-26T04:00:00.000Z',
      singleEvents: true,
      orderBy: 'startTime',
      maxResults: 250,
      pageToken: '1',
    })
  })

  it('sends both ends when only the start changes', async () => {
    const { api, events, stored } = fakeCalendar()
    stored.set('dentist', dentist)

    const updated = await new GoogleCalendarSourceAdapter(work, api, ZONE).update('dentist', {
      start: at('2026-10-20T09:30'),
    })

    expect(events.get).toHaveBeenCalledWith({ calendarId: 'primary', eventId: 'dentist' })
    expect(events.patch).toHaveBeenCalledWith({
      calendarId: 'primary',
      eventId: 'dentist',
      requestBody: {
        start: { dateTime: '2026-10-20T09:30:00-04:00', timeZone: ZONE },
        end: { dateTime: '2026-10-20T11:00:00-04:00', timeZone: ZONE },
      },
    })
    expect(time.toCivilString(updated.start)).toBe('2026-10-20T09:30')
    expect(time.toCivilString(updated.end)).toBe('2026-10-20T11:00')
  })

  it('patches text fields without reading the event first', async () => {
    const { api, events, stored } = fakeCalendar()
    stored.set('dentist', dentist)

    const updated = await new GoogleCalendarSourceAdapter(work, api, ZONE).update('dentist', {
      location: 'Suite 4',
    })

    expect(events.get).not.toHaveBeenCalled()
    expect(events.patch).toHaveBeenCalledWith({
      calendarId: 'primary',
      eventId: 'dentist',
      requestBody: { location: 'Suite 4' },
    })
    expect(updated.location).toBe('Suite 4')
  })

  it('creates events with the zone and returns the link', async () => {
    const { api, events } = fakeCalendar()

    const created = await new GoogleCalendarSourceAdapter(work, api, ZONE).create({
      title: 'Project sync',
      start: at('2026-10-20T14:00'),
    })

    expect(events.insert).toHaveBeenCalledWith({
      calendarId: 'primary',
      requestBody: {
        summary: 'Project sync',
        description: undefined,
        location: undefined,
        start: { dateTime: '2026-10-20T14:00:00-04:00', timeZone: ZONE },
        end: { dateTime: '2026-10-20T15:00:00-04:00', timeZone: ZONE },
        attendees: undefined,
      },
    })
    expect(created).toMatchObject({
      sourceId: 'work',
      externalEventId: 'new-1',
      externalLink: 'https://calendar.example.com/new-1',
    })
  })

  it('maps 404 and 410 to not found', async () => {
    const { api, stored } = fakeCalendar()
    stored.set('dentist', dentist)
    const adapter = new GoogleCalendarSourceAdapter(work, api, ZONE)

    await adapter.delete('dentist')

    await expect(adapter.delete('dentist')).rejects.toThrow(
      new NotFoundError('Event not found in Work: Resource has been deleted'),
    )
    await expect(adapter.update('dentist', { start: at('2026-10-20T09:30') })).rejects.toThrow(
      new NotFoundError('Event not found in Work: Not Found'),
    )
  })

  it('treats other failures as an outage', async () => {
    const { api, events } = fakeCalendar()
    events.list.mockRejectedValueOnce(httpError(500, 'Backend Error'))

    await expect(
      new GoogleCalendarSourceAdapter(work, api, ZONE).list(at('2026-10-19T00:00'), at('2026-10-26T00:00')),
    ).rejects.toThrow(new SourceUnavailableError('work', 'Backend Error'))
  })
})
