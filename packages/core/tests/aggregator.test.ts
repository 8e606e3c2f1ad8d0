import { describe, it, expect } from 'vitest'
import { EventAggregator } from '../src/calendar/aggregator.js'
import { EventClassifier } from '../src/calendar/classifier.js'
import { SourceUnavailableError } from '../src/calendar/errors.js'
import { at, createAdapters, seed, time } from './fixtures.js'

const classifier = new EventClassifier(time)
const from = at('2026-10-19T00:00')
const to = at('2026-10-20T00:00')

describe('EventAggregator', () => {
  it('merges sources ordered by start, then registration order, then title', async () => {
    const { appointments, tasks } = createAdapters(
      [
        seed('Dentist', '2026-10-19T10:00', '2026-10-19T11:00'),
        seed('Zeta review', '2026-10-19T11:00', '2026-10-19T12:00'),
        seed('Alpha review', '2026-10-19T11:00', '2026-10-19T12:00'),
      ],
      [
        seed('Call plumber', '2026-10-19T10:00', '2026-10-19T10:30'),
        seed('Laundry', '2026-10-19T09:00', '2026-10-19T09:30'),
      ],
    )
    const aggregator = new EventAggregator([appointments, tasks], classifier)

    const { events, sourceErrors } = await aggregator.aggregate(from, to)

    expect(events.map((e) => e.title)).toEqual([
      'Laundry',
      'Dentist',
      'Call plumber',
      'Alpha review',
      'Zeta review',
    ])
    expect(sourceErrors).toEqual({})
  })

  it('classifies by the owning source', async () => {
    const { appointments, tasks } = createAdapters(
      [seed('Laundry pickup', '2026-10-19T10:00', '2026-10-19T11:00')],
      [seed('Team meeting', '2026-10-19T12:00', '2026-10-19T13:00')],
    )
    const aggregator = new EventAggregator([appointments, tasks], classifier)

    const { events } = await aggregator.aggregate(from, to)

    expect(events.map((e) => [e.title, e.kind])).toEqual([
      ['Laundry pickup', 'appointment'],
      ['Team meeting', 'task'],
    ])
  })

  it('is idempotent for unchanged backends', async () => {
    const { appointments, tasks } = createAdapters(
      [seed('Dentist', '2026-10-19T10:00', '2026-10-19T11:00')],
      [seed('Gym', '2026-10-19T07:00', '2026-10-19T08:00')],
    )
    const aggregator = new EventAggregator([appointments, tasks], classifier)

    const first = await aggregator.aggregate(from, to)
    const second = await aggregator.aggregate(from, to)

    expect(second).toEqual(first)
  })

  it('leaves out a source that times out and reports it', async () => {
    const { appointments, tasks } = createAdapters(
      [seed('Dentist', '2026-10-19T10:00', '2026-10-19T11:00')],
      [seed('Gym', '2026-10-19T07:00', '2026-10-19T08:00')],
    )
    tasks.setLatency(200)
    const aggregator = new EventAggregator([appointments, tasks], classifier, { listTimeoutMs: 50 })

    const { events, sourceErrors } = await aggregator.aggregate(from, to)

    expect(events.map((e) => e.title)).toEqual(['Dentist'])
    expect(Object.keys(sourceErrors)).toEqual(['tasks'])
    expect(sourceErrors.tasks).toBeInstanceOf(SourceUnavailableError)
    expect(sourceErrors.tasks.message).toBe('Calendar "tasks" unavailable: no response within 50ms')
  })

  it('wraps backend failures as SourceUnavailable', async () => {
    const { appointments, tasks } = createAdapters([seed('Dentist', '2026-10-19T10:00', '2026-10-19T11:00')])
    tasks.failOn('list', new Error('socket hang up'))
    const aggregator = new EventAggregator([appointments, tasks], classifier)

    const { events, sourceErrors } = await aggregator.aggregate(from, to)

    expect(events).toHaveLength(1)
    expect(sourceErrors.tasks).toBeInstanceOf(SourceUnavailableError)
    expect(sourceErrors.tasks.message).toBe('Calendar "tasks" unavailable: socket hang up')
  })

  it('returns an empty result rather than failing when every source is down', async () => {
    const { appointments, tasks } = createAdapters()
    appointments.failOn('list')
    tasks.failOn('list')
    const aggregator = new EventAggregator([appointments, tasks], classifier)

    const { events, sourceErrors } = await aggregator.aggregate(from, to)

    expect(events).toEqual([])
    expect(Object.keys(sourceErrors)).toEqual(['appointments', 'tasks'])
  })

  it('clamps an end before the start', async () => {
    const { appointments, tasks } = createAdapters([
      seed('Broken', '2026-10-19T10:00', '2026-10-19T10:00', { end: at('2026-10-19T09:00') }),
    ])
    const aggregator = new EventAggregator([appointments, tasks], classifier)

    const { events } = await aggregator.aggregate(at('2026-10-19T08:00'), to)

    expect(events[0].end).toEqual(events[0].start)
  })

  it('abandons the read when the caller aborts', async () => {
    const { appointments, tasks } = createAdapters()
    const aggregator = new EventAggregator([appointments, tasks], classifier)
    const controller = new AbortController()
    controller.abort(new Error('caller gave up'))

    await expect(aggregator.aggregate(from, to, { signal: controller.signal })).rejects.toThrow(
      'caller gave up',
    )
  })
})
