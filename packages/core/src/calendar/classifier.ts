/**
 * Event Classifier
 *
 * Source kind is authoritative. Content heuristics only apply to events
 * from `generic` sources and to drafts that have no source yet.
 */

import type { TimeNormalizer } from './time.js'
import type { BusinessHours, CalendarSource, EventKind, SourceEvent } from './types.js'
import { clockToMinutes } from './time.js'

const MEETING_KEYWORDS = [
  'meeting',
  'meet',
  'call',
  'sync',
  'standup',
  'stand-up',
  'interview',
  'review',
  'appointment',
  'appt',
  'consultation',
  'session',
  'lunch with',
  'coffee with',
  'demo',
  '1:1',
  'one-on-one',
  'dentist',
  'doctor',
  'clinic',
]

const TASK_KEYWORDS = [
  'wash',
  'clean',
  'laundry',
  'groceries',
  'grocery',
  'workout',
  'gym',
  'run',
  'meditate',
  'meditation',
  'stretch',
  'shower',
  'hair',
  'nails',
  'skincare',
  'water plants',
  'pay',
  'renew',
  'refill',
  'fix',
  'repair',
  'maintenance',
  'oil change',
  'backup',
  'todo',
  'to-do',
  'reminder',
  'errand',
]

const DEFAULT_BUSINESS_HOURS: BusinessHours = { start: '09:00', end: '17:00' }

export interface ContentSignals {
  title: string
  start?: Date
  attendees?: string[]
}

export class EventClassifier {
  private businessStart: number
  private businessEnd: number

  constructor(
    private time: TimeNormalizer,
    businessHours: BusinessHours = DEFAULT_BUSINESS_HOURS,
  ) {
    this.businessStart = clockToMinutes(businessHours.start)
    this.businessEnd = clockToMinutes(businessHours.end)
  }

  classify(event: SourceEvent, source: CalendarSource): EventKind {
    switch (source.kind) {
      case 'appointment':
        return 'appointment'
      case 'task':
        return 'task'
      case 'generic':
        return event.allDay
          ? this.classifyContent({ title: event.title, attendees: event.attendees })
          : this.classifyContent({
              title: event.title,
              start: event.start,
              attendees: event.attendees,
            })
    }
  }

  classifyContent(signals: ContentSignals): EventKind {
    if ((signals.attendees?.length ?? 0) >= 2) {
      return 'appointment'
    }

    const title = signals.title.toLowerCase()
    if (signals.start && this.isBusinessHours(signals.start) && containsKeyword(title, MEETING_KEYWORDS)) {
      return 'appointment'
    }

    if (containsKeyword(title, TASK_KEYWORDS)) {
      return 'task'
    }

    return 'other'
  }

  private isBusinessHours(instant: Date): boolean {
    const weekday = this.time.weekday(this.time.localDate(instant))
    if (weekday > 5) return false
    const minute = this.time.minuteOfDay(instant)
    return minute >= this.businessStart && minute < this.businessEnd
  }
}

/** Whole-word match so "run" does not fire on "brunch" */
function containsKeyword(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) => {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    return new RegExp(`(^|[^a-z0-9])${escaped}($|[^a-z0-9])`).test(text)
  })
}
