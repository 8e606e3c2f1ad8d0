/**
 * Schedule Coordinator
 *
 * Entry point for validated requests. Reads are rendered to text here;
 * writes go through the MutationResolver and come back as confirmations.
 * Every component is built once from the injected adapters and config.
 */

import { EventAggregator } from './aggregator.js'
import { AvailabilityEngine } from './availability.js'
import { BriefingComposer } from './briefing.js'
import { EventClassifier } from './classifier.js'
import { findConflicts } from './conflicts.js'
import {
  formatConflictLine,
  formatEventLine,
  formatSourceWarnings,
  formatWhen,
  plural,
  type SourceLookup,
} from './format.js'
import { parseRequest, type CalendarRequest } from './requests.js'
import {
  MutationResolver,
  planChanges,
  type MutationAction,
  type MutationConfirmation,
} from './resolver.js'
import type { LocalDate, TimeNormalizer } from './time.js'
import type { CalendarConfig, CalendarSource, CanonicalEvent, SourceAdapter } from './types.js'

const DEFAULT_UPCOMING_DAYS = 7
const MAX_EVENTS_PER_DAY = 6
const DEFAULT_FREE_SEARCH_DAYS = 7

export type CoordinatorResult =
  | { type: 'text'; text: string }
  | { type: 'confirmation'; confirmation: MutationConfirmation; text: string }

export interface CoordinatorDeps {
  adapters: SourceAdapter[]
  time: TimeNormalizer
  config: Pick<CalendarConfig, 'businessHours' | 'searchWindowDays' | 'listTimeoutMs' | 'briefing'>
  now?: () => Date
}

export interface HandleOptions {
  /** Abandons in-flight reads; an already-dispatched write still completes */
  signal?: AbortSignal
}

export class ScheduleCoordinator {
  readonly sources: CalendarSource[]
  readonly aggregator: EventAggregator
  readonly resolver: MutationResolver

  readonly time: TimeNormalizer
  private config: CoordinatorDeps['config']
  private now: () => Date
  private availability: AvailabilityEngine
  private composer: BriefingComposer
  private lookup: SourceLookup

  constructor(deps: CoordinatorDeps) {
    this.time = deps.time
    this.config = deps.config
    this.now = deps.now ?? (() => new Date())
    this.sources = deps.adapters.map((adapter) => adapter.source)

    const byId = new Map(this.sources.map((source) => [source.id, source]))
    this.lookup = (sourceId) => byId.get(sourceId)

    const classifier = new EventClassifier(this.time, this.config.businessHours)
    this.aggregator = new EventAggregator(deps.adapters, classifier, {
      listTimeoutMs: this.config.listTimeoutMs,
    })
    this.availability = new AvailabilityEngine(this.time)
    this.composer = new BriefingComposer(this.time, this.lookup)
    this.resolver = new MutationResolver({
      aggregator: this.aggregator,
      adapters: deps.adapters,
      classifier,
      time: this.time,
      now: this.now,
      searchWindowDays: this.config.searchWindowDays,
    })
  }

  /**
   * Validate an inbound `{action, args}` payload and run it.
   * @throws ValidationError for a malformed payload, or the CalendarError of the failed step
   */
  async handle(input: unknown, options?: HandleOptions): Promise<CoordinatorResult> {
    const request = parseRequest(input)
    return this.dispatch(request, options)
  }

  async dispatch(request: CalendarRequest, options?: HandleOptions): Promise<CoordinatorResult> {
    const signal = options?.signal

    switch (request.action) {
      case 'GetSchedule':
        return text(await this.schedule(request.args.date, signal))

      case 'GetUpcoming':
        return text(await this.upcoming(request.args.days ?? DEFAULT_UPCOMING_DAYS, signal))

      case 'FindFreeTime':
        return text(await this.freeTime(request.args, signal))

      case 'GetBriefing':
        return text(await this.briefing(request.args.date, request.args.maxChars, signal))

      case 'GetConflicts':
        return text(await this.conflicts(request.args.date, request.args.days ?? 1, signal))

      case 'ListSources':
        return text(this.listSources())

      case 'CreateEvent':
        return this.confirmed(await this.resolver.create(request.args))

      case 'RescheduleEvent': {
        const { searchText, newStart, newEnd, window } = request.args
        return this.confirmed(
          await this.resolver.mutate({
            searchText,
            windowHint: window,
            changes: [{ type: 'reschedule', newStart, newEnd }],
          }),
        )
      }

      case 'MoveEvent': {
        const { searchText, window, ...intent } = request.args
        return this.confirmed(
          await this.resolver.mutate({
            searchText,
            windowHint: window,
            changes: planChanges(searchText, intent),
          }),
        )
      }

      case 'DeleteEvent': {
        const { searchText, window } = request.args
        return this.confirmed(
          await this.resolver.mutate({ searchText, windowHint: window, changes: [{ type: 'delete' }] }),
        )
      }

      case 'UpdateEvent': {
        const { searchText, window, title, location, description } = request.args
        return this.confirmed(
          await this.resolver.mutate({
            searchText,
            windowHint: window,
            changes: [{ type: 'edit', title, location, description }],
          }),
        )
      }
    }
  }

  // ─── Reads ───

  async schedule(date?: string, signal?: AbortSignal): Promise<string> {
    const day = this.resolveDay(date)
    const range = this.time.dayRange(day)
    const { events, sourceErrors } = await this.aggregator.aggregate(range.start, range.end, { signal })
    const heading = this.time.formatDayHeading(day)
    const warnings = formatSourceWarnings(sourceErrors, this.lookup)

    if (events.length === 0) {
      return [`Schedule for ${heading}: no events.`, ...warnings].join('\n')
    }

    const counts = this.sources
      .map((source) => ({ source, count: events.filter((event) => event.sourceId === source.id).length }))
      .filter(({ count }) => count > 0)
      .map(({ source, count }) => `${count} ${source.displayName}`)
      .join(', ')

    return [
      `Schedule for ${heading} (${plural(events.length, 'event')}: ${counts})`,
      ...warnings,
      ...events.map((event) => formatEventLine(event, this.time, this.lookup)),
    ].join('\n')
  }

  async upcoming(days: number, signal?: AbortSignal): Promise<string> {
    const now = this.now()
    const today = this.time.today(now)
    const end = this.time.dayRange(this.time.addDays(today, days - 1)).end
    const { events, sourceErrors } = await this.aggregator.aggregate(now, end, { signal })
    const warnings = formatSourceWarnings(sourceErrors, this.lookup)
    const span = days === 1 ? 'today' : `the next ${days} days`

    if (events.length === 0) {
      return [`Nothing scheduled for ${span}.`, ...warnings].join('\n')
    }

    // Ongoing events are listed under today
    const byDay = new Map<LocalDate, CanonicalEvent[]>()
    for (const event of events) {
      const startDay = this.time.localDate(event.start)
      const day = startDay < today ? today : startDay
      const list = byDay.get(day) ?? []
      list.push(event)
      byDay.set(day, list)
    }

    const blocks = [...byDay.entries()].map(([day, dayEvents]) => {
      const shown = dayEvents.slice(0, MAX_EVENTS_PER_DAY)
      const lines = [
        this.time.formatDayHeading(day),
        ...shown.map((event) => formatEventLine(event, this.time, this.lookup)),
      ]
      if (dayEvents.length > shown.length) {
        lines.push(`…and ${dayEvents.length - shown.length} more`)
      }
      return lines.join('\n')
    })

    const header = [`Upcoming for ${span} (${plural(events.length, 'event')}):`, ...warnings].join('\n')
    return [header, ...blocks].join('\n\n')
  }

  async freeTime(
    args: Extract<CalendarRequest, { action: 'FindFreeTime' }>['args'],
    signal?: AbortSignal,
  ): Promise<string> {
    const now = this.now()
    const fromDay = this.resolveDay(args.date)
    const days = args.days ?? DEFAULT_FREE_SEARCH_DAYS
    const hours = args.hours ?? this.config.businessHours
    const lastDay = this.time.addDays(fromDay, days - 1)

    const { events, sourceErrors } = await this.aggregator.aggregate(
      this.time.startOfDay(fromDay),
      this.time.dayRange(lastDay).end,
      { signal },
    )
    const slots = this.availability.findFreeSlots(fromDay, days, args.durationMinutes, events, {
      hours,
      weekdays: args.weekdays,
      limit: args.limit,
      notBefore: now,
    })
    const warnings = formatSourceWarnings(sourceErrors, this.lookup)

    if (slots.length === 0) {
      return [
        `No free ${args.durationMinutes}-minute slot between ${hours.start} and ${hours.end} from ${this.time.formatShortDay(fromDay)} to ${this.time.formatShortDay(lastDay)}.`,
        ...warnings,
      ].join('\n')
    }

    return [
      `Free ${args.durationMinutes}-minute slots:`,
      ...warnings,
      ...slots.map((slot) => `• ${formatWhen({ ...slot, allDay: false }, this.time)}`),
    ].join('\n')
  }

  async briefing(date?: string, maxChars?: number, signal?: AbortSignal): Promise<string> {
    const day = this.resolveDay(date)
    const todayRange = this.time.dayRange(day)
    const tomorrowRange = this.time.dayRange(this.time.addDays(day, 1))
    const { events, sourceErrors } = await this.aggregator.aggregate(todayRange.start, tomorrowRange.end, {
      signal,
    })

    const overlaps = (event: CanonicalEvent, start: Date, end: Date): boolean =>
      event.start.getTime() < end.getTime() &&
      (event.end.getTime() > start.getTime() || event.start.getTime() === start.getTime())

    const today = events.filter((event) => overlaps(event, todayRange.start, todayRange.end))
    const tomorrow = events.filter((event) => overlaps(event, tomorrowRange.start, tomorrowRange.end))

    return this.composer.compose(today, tomorrow, findConflicts(today), {
      date: day,
      maxChars: maxChars ?? this.config.briefing.maxChars,
      maxToday: this.config.briefing.maxToday,
      maxTomorrow: this.config.briefing.maxTomorrow,
      sourceErrors,
    })
  }

  async conflicts(date?: string, days = 1, signal?: AbortSignal): Promise<string> {
    const fromDay = this.resolveDay(date)
    const lastDay = this.time.addDays(fromDay, days - 1)
    const { events, sourceErrors } = await this.aggregator.aggregate(
      this.time.startOfDay(fromDay),
      this.time.dayRange(lastDay).end,
      { signal },
    )
    const pairs = findConflicts(events)
    const heading =
      days === 1
        ? this.time.formatDayHeading(fromDay)
        : `${this.time.formatDayHeading(fromDay)} to ${this.time.formatDayHeading(lastDay)}`
    const warnings = formatSourceWarnings(sourceErrors, this.lookup)

    if (pairs.length === 0) {
      return [`No conflicts for ${heading}.`, ...warnings].join('\n')
    }

    const lines = pairs.map((pair) => {
      const line = formatConflictLine(pair, this.time, this.lookup)
      return days === 1 ? line : `${this.time.formatShortDay(this.time.localDate(pair.overlap.start))} ${line}`
    })
    return [`Conflicts for ${heading} (${pairs.length}):`, ...warnings, ...lines].join('\n')
  }

  listSources(): string {
    if (this.sources.length === 0) {
      return 'No calendars configured.'
    }
    return [
      'Calendars:',
      ...this.sources.map((source) => `• ${source.displayName} (${source.id}): ${source.kind}, ${source.backend}`),
    ].join('\n')
  }

  // ─── Helpers ───

  private resolveDay(date?: string): LocalDate {
    return date ? this.time.parse(date).date : this.time.today(this.now())
  }

  private confirmed(confirmation: MutationConfirmation): CoordinatorResult {
    return { type: 'confirmation', confirmation, text: this.describe(confirmation) }
  }

  /** One-line confirmation, e.g. `Moved "Oil change" from Tasks to Appointments: Mon 10/19 10:00–11:00.` */
  describe(confirmation: MutationConfirmation): string {
    const { event, title, sourceName } = confirmation
    const when = formatWhen(event, this.time)

    let line: string
    if (confirmation.unchanged) {
      line = `"${title}" is already in ${sourceName}; nothing to move.`
    } else if (confirmation.actions.includes('deleted')) {
      line = `Deleted "${title}" from ${sourceName} (${when}).`
    } else {
      const where = confirmation.previousSourceName
        ? `from ${confirmation.previousSourceName} to ${sourceName}`
        : `in ${sourceName}`
      line = `${verbs(confirmation.actions)} "${title}" ${where}: ${when}.`
    }

    return confirmation.externalLink ? `${line}\n${confirmation.externalLink}` : line
  }
}

function verbs(actions: MutationAction[]): string {
  const phrase = actions.join(' and ')
  return phrase.charAt(0).toUpperCase() + phrase.slice(1)
}

function text(value: string): CoordinatorResult {
  return { type: 'text', text: value }
}
