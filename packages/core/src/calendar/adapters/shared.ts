/**
 * Helpers shared by every SourceAdapter implementation.
 */

import { ValidationError } from '../errors.js'
import type { EventDraft, EventPatch, SourceEvent } from '../types.js'

const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS

export interface ValidDraft extends EventDraft {
  end: Date
  allDay: boolean
}

/**
 * Check required fields and fill the default end.
 * Timed events default to one hour, all-day events to one day.
 */
export function validateDraft(draft: Partial<EventDraft>): ValidDraft {
  const title = draft.title?.trim()
  if (!title) {
    throw new ValidationError('Event title is required')
  }
  const start = draft.start
  if (!start || Number.isNaN(start.getTime())) {
    throw new ValidationError(`Start time is required for "${title}"`)
  }

  const allDay = draft.allDay ?? false
  const end = draft.end ?? new Date(start.getTime() + (allDay ? DAY_MS : HOUR_MS))
  if (end.getTime() < start.getTime()) {
    throw new ValidationError(`End time of "${title}" is before its start`)
  }

  return { ...draft, title, start, end, allDay }
}

/** Apply a sparse patch: unset fields keep their current value */
export function applyPatch(current: SourceEvent, patch: EventPatch): SourceEvent {
  const next: SourceEvent = { ...current }
  if (patch.title !== undefined) next.title = patch.title
  if (patch.start !== undefined) next.start = patch.start
  if (patch.end !== undefined) next.end = patch.end
  if (patch.allDay !== undefined) next.allDay = patch.allDay
  if (patch.location !== undefined) next.location = patch.location
  if (patch.attendees !== undefined) next.attendees = patch.attendees
  if (patch.description !== undefined) next.description = patch.description

  if (next.end.getTime() < next.start.getTime()) {
    throw new ValidationError(`End time of "${next.title}" is before its start`)
  }
  return next
}

/** Overlap test against the half-open window [from, to) */
export function overlapsWindow(event: { start: Date; end: Date }, from: Date, to: Date): boolean {
  const start = event.start.getTime()
  const end = event.end.getTime()
  if (start === end) {
    return start >= from.getTime() && start < to.getTime()
  }
  return start < to.getTime() && end > from.getTime()
}

/** Event end when a backend omits it */
export function defaultEnd(start: Date, allDay: boolean): Date {
  return new Date(start.getTime() + (allDay ? DAY_MS : HOUR_MS))
}
