/**
 * Shared test fixtures: two in-memory sources in America/Toronto and a
 * helper for writing local civil times.
 */

import { InMemorySourceAdapter } from '../src/calendar/adapters/memory.js'
import { TimeNormalizer } from '../src/calendar/time.js'
import type { CalendarSource, CanonicalEvent, EventKind, SourceEvent } from '../src/calendar/types.js'

export const ZONE = 'America/Toronto'
export const time = new TimeNormalizer(ZONE)

/** Local civil time in the test zone, e.g. at('2026-10-19T10:00') */
export function at(civil: string): Date {
  return time.toInstant(civil)
}

export const appointmentsSource: CalendarSource = {
  id: 'appointments',
  displayName: 'Appointments',
  kind: 'appointment',
  backend: 'memory',
  externalRef: 'memory:appointments',
}

export const tasksSource: CalendarSource = {
  id: 'tasks',
  displayName: 'Tasks',
  kind: 'task',
  backend: 'memory',
  externalRef: 'memory:tasks',
}

export const lookup = (sourceId: string): CalendarSource | undefined =>
  [appointmentsSource, tasksSource].find((source) => source.id === sourceId)

type Seed = Omit<SourceEvent, 'sourceId'>

let seq = 0

/** Timed seed event between two local civil times */
export function seed(title: string, start: string, end: string, extra: Partial<Seed> = {}): Seed {
  seq += 1
  return {
    externalEventId: `evt-${seq}`,
    title,
    start: at(start),
    end: at(end),
    allDay: false,
    ...extra,
  }
}

export function createAdapters(
  appointments: Seed[] = [],
  tasks: Seed[] = [],
): { appointments: InMemorySourceAdapter; tasks: InMemorySourceAdapter } {
  return {
    appointments: new InMemorySourceAdapter(appointmentsSource, appointments),
    tasks: new InMemorySourceAdapter(tasksSource, tasks),
  }
}

/** Canonical event for components that take events directly */
export function event(
  sourceId: string,
  title: string,
  start: string,
  end: string,
  extra: Partial<CanonicalEvent> = {},
): CanonicalEvent {
  const kind: EventKind = sourceId === 'tasks' ? 'task' : 'appointment'
  return { ...seed(title, start, end), sourceId, kind, ...extra }
}
