/**
 * Conflict Detector
 *
 * Sweep over events sorted by start, keeping the set of events still in
 * progress. A new event that starts before an active event from another
 * source ends conflicts with it. Same-source overlaps are never reported.
 */

import type { CanonicalEvent, ConflictPair } from './types.js'

function eventKey(event: CanonicalEvent): string {
  return `${event.sourceId}\u0000${event.externalEventId}\u0000${event.start.getTime()}`
}

export function findConflicts(events: CanonicalEvent[]): ConflictPair[] {
  const timed = events
    .filter((event) => !event.allDay)
    .sort(
      (a, b) =>
        a.start.getTime() - b.start.getTime() ||
        a.end.getTime() - b.end.getTime() ||
        eventKey(a).localeCompare(eventKey(b)),
    )

  const pairs: ConflictPair[] = []
  const seen = new Set<string>()
  let active: CanonicalEvent[] = []

  for (const event of timed) {
    const start = event.start.getTime()
    active = active.filter((other) => other.end.getTime() > start)

    for (const other of active) {
      if (other.sourceId === event.sourceId) continue

      const key = `${eventKey(other)}|${eventKey(event)}`
      if (seen.has(key)) continue
      seen.add(key)

      pairs.push({
        first: other,
        second: event,
        overlap: {
          start: event.start,
          end: new Date(Math.min(other.end.getTime(), event.end.getTime())),
        },
      })
    }

    active.push(event)
  }

  return pairs
}
