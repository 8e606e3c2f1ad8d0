import { describe, it, expect } from 'vitest'
import { findConflicts } from '../src/calendar/conflicts.js'
import type { ConflictPair } from '../src/calendar/types.js'
import { event, time } from './fixtures.js'

const describePair = (pair: ConflictPair): string =>
  `${pair.first.title}/${pair.second.title} ${time.formatTime(pair.overlap.start)}-${time.formatTime(pair.overlap.end)}`

describe('findConflicts', () => {
  it('reports an overlap between two sources once', () => {
    const pairs = findConflicts([
      event('appointments', 'Dentist', '2026-10-19T10:00', '2026-10-19T10:30'),
      event('tasks', 'Call plumber', '2026-10-19T10:15', '2026-10-19T10:45'),
    ])

    expect(pairs.map(describePair)).toEqual(['Dentist/Call plumber 10:15-10:30'])
  })

  it('does not depend on input order', () => {
    const a = event('appointments', 'Dentist', '2026-10-19T10:00', '2026-10-19T10:30')
    const b = event('tasks', 'Call plumber', '2026-10-19T10:15', '2026-10-19T10:45')

    expect(findConflicts([b, a]).map(describePair)).toEqual(findConflicts([a, b]).map(describePair))
  })

  it('ignores overlaps within one source', () => {
    const pairs = findConflicts([
      event('appointments', 'Dentist', '2026-10-19T10:00', '2026-10-19T11:00'),
      event('appointments', 'Review', '2026-10-19T10:30', '2026-10-19T11:30'),
    ])
    expect(pairs).toEqual([])
  })

  it('does not treat back-to-back events as overlapping', () => {
    const pairs = findConflicts([
      event('appointments', 'Dentist', '2026-10-19T10:00', '2026-10-19T10:30'),
      event('tasks', 'Laundry', '2026-10-19T10:30', '2026-10-19T11:00'),
    ])
    expect(pairs).toEqual([])
  })

  it('reports every cross-source pair among three sources', () => {
    const pairs = findConflicts([
      event('family', 'School pickup', '2026-10-19T10:30', '2026-10-19T11:00'),
      event('tasks', 'Groceries', '2026-10-19T10:15', '2026-10-19T11:00'),
      event('appointments', 'Dentist', '2026-10-19T10:00', '2026-10-19T11:00'),
    ])

    expect(pairs.map(describePair)).toEqual([
      'Dentist/Groceries 10:15-11:00',
      'Dentist/School pickup 10:30-11:00',
      'Groceries/School pickup 10:30-11:00',
    ])
  })

  it('reports a long event against everything it covers', () => {
    const pairs = findConflicts([
      event('appointments', 'Workshop', '2026-10-19T09:00', '2026-10-19T12:00'),
      event('tasks', 'Laundry', '2026-10-19T09:30', '2026-10-19T10:00'),
      event('tasks', 'Gym', '2026-10-19T11:00', '2026-10-19T11:45'),
    ])

    expect(pairs.map(describePair)).toEqual(['Workshop/Laundry 09:30-10:00', 'Workshop/Gym 11:00-11:45'])
  })

  it('skips all-day events', () => {
    const pairs = findConflicts([
      event('appointments', 'Holiday', '2026-10-19', '2026-10-20', { allDay: true }),
      event('tasks', 'Laundry', '2026-10-19T10:00', '2026-10-19T11:00'),
    ])
    expect(pairs).toEqual([])
  })
})
