import { describe, it, expect } from 'vitest'
import { BriefingComposer } from '../src/calendar/briefing.js'
import { findConflicts } from '../src/calendar/conflicts.js'
import { SourceUnavailableError } from '../src/calendar/errors.js'
import { event, lookup, time } from './fixtures.js'

const composer = new BriefingComposer(time, lookup)
const date = '2026-10-19'

const today = [
  event('appointments', 'Dentist', '2026-10-19T10:00', '2026-10-19T11:00'),
  event('tasks', 'Laundry', '2026-10-19T18:00', '2026-10-19T19:00'),
]
const tomorrow = [event('tasks', 'Gym', '2026-10-20T07:00', '2026-10-20T08:00')]

describe('BriefingComposer', () => {
  it('lays out today, tomorrow and a focus line', () => {
    const text = composer.compose(today, tomorrow, [], { date })

    expect(text).toBe(
      [
        'Briefing for Monday, October 19',
        '',
        'Today (2 events):',
        '• 10:00–11:00 Dentist [Appointments]',
        '• 18:00–19:00 Laundry [Tasks]',
        '',
        'Tomorrow (Tuesday, October 20):',
        '• 07:00–08:00 Gym [Tasks]',
        '',
        'Focus: 2 commitments today, first at 10:00.',
      ].join('\n'),
    )
    expect(text).toHaveLength(221)
  })

  it('drops tomorrow and the focus line before touching today', () => {
    const text = composer.compose(today, tomorrow, [], { date, maxChars: 150 })

    expect(text).toBe(
      'Briefing for Monday, October 19\n\nToday (2 events):\n• 10:00–11:00 Dentist [Appointments]\n• 18:00–19:00 Laundry [Tasks]',
    )
  })

  it('summarises hidden events of today under a tight budget', () => {
    const text = composer.compose(today, tomorrow, [], { date, maxChars: 100 })

    expect(text).toBe(
      'Briefing for Monday, October 19\n\nToday (2 events):\n• 10:00–11:00 Dentist [Appointments]\n…and 1 more',
    )
    expect(text.length).toBeLessThanOrEqual(100)
  })

  it('never exceeds the budget', () => {
    for (const maxChars of [20, 40, 60, 80, 120, 180, 240]) {
      const text = composer.compose(today, tomorrow, [], { date, maxChars })
      expect(text.length).toBeLessThanOrEqual(maxChars)
    }
    expect(composer.compose(today, tomorrow, [], { date, maxChars: 40 })).toBe(
      'Briefing for Monday, October 19',
    )
  })

  it('limits the tomorrow preview', () => {
    const busyTomorrow = [
      event('tasks', 'Gym', '2026-10-20T07:00', '2026-10-20T08:00'),
      event('appointments', 'Standup', '2026-10-20T09:00', '2026-10-20T09:15'),
    ]
    const text = composer.compose([], busyTomorrow, [], { date, maxTomorrow: 1 })

    expect(text).toBe(
      [
        'Briefing for Monday, October 19',
        '',
        'Today: no events.',
        '',
        'Tomorrow (Tuesday, October 20):',
        '• 07:00–08:00 Gym [Tasks]',
        '…and 1 more',
        '',
        'Focus: open day, good for deep work and planning.',
      ].join('\n'),
    )
  })

  it('lists conflicts and puts them in focus', () => {
    const clashing = [
      event('appointments', 'Dentist', '2026-10-19T10:00', '2026-10-19T11:00'),
      event('tasks', 'Call plumber', '2026-10-19T10:30', '2026-10-19T11:00'),
    ]
    const text = composer.compose(clashing, [], findConflicts(clashing), { date })

    expect(text).toBe(
      [
        'Briefing for Monday, October 19',
        '',
        'Today (2 events):',
        '• 10:00–11:00 Dentist [Appointments]',
        '• 10:30–11:00 Call plumber [Tasks]',
        '',
        'Tomorrow (Tuesday, October 20): clear.',
        '',
        'Conflicts (1):',
        '⚠ 10:30–11:00 Dentist (Appointments) overlaps Call plumber (Tasks)',
        '',
        'Focus: resolve 1 conflict before the day gets going.',
      ].join('\n'),
    )
  })

  it('names unavailable sources under the header', () => {
    const text = composer.compose(today.slice(0, 1), [], [], {
      date,
      sourceErrors: { tasks: new SourceUnavailableError('tasks', 'timeout') },
    })

    expect(text.split('\n').slice(0, 2)).toEqual([
      'Briefing for Monday, October 19',
      '⚠ Tasks calendar unavailable; its events are missing below',
    ])
  })

  it('mentions all-day events without a start time in focus', () => {
    const holiday = event('appointments', 'Holiday', '2026-10-19', '2026-10-20', { allDay: true })
    const text = composer.compose([holiday], [], [], { date })

    expect(text.split('\n')).toContain('• All day Holiday [Appointments]')
    expect(text.split('\n').pop()).toBe('Focus: 1 commitment today.')
  })
})
