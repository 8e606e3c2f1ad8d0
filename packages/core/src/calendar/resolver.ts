/**
 * Mutation Resolver
 *
 * Turns a fuzzy reference ("hair") plus a desired change into writes on the
 * source that owns the event:
 *
 *   search → disambiguate → apply
 *
 * Never guesses between several candidates. Multi-step changes run strictly
 * in order, and a change that stops halfway is reported as a
 * PartialMutationFailureError naming what did and did not happen.
 */

import {
  AmbiguousError,
  CalendarError,
  NotFoundError,
  PartialMutationFailureError,
  ValidationError,
  errorMessage,
} from './errors.js'
import { formatWhen } from './format.js'
import { matchEvents, normalizeTitle } from './matcher.js'
import type { EventAggregator } from './aggregator.js'
import type { EventClassifier } from './classifier.js'
import type { TimeNormalizer } from './time.js'
import type {
  CalendarSource,
  CanonicalEvent,
  EventPatch,
  Interval,
  SourceAdapter,
  SourceEvent,
} from './types.js'

const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS
const DEFAULT_SEARCH_WINDOW_DAYS = 14

export type DesiredChange =
  | { type: 'reschedule'; newStart: string; newEnd?: string }
  | { type: 'move'; targetCalendar: string }
  | { type: 'delete' }
  | { type: 'edit'; title?: string; location?: string; description?: string }

export interface WindowHint {
  /** Local civil date or date-time */
  from?: string
  /** Local civil date (inclusive) or date-time */
  to?: string
}

export interface MutationRequest {
  searchText: string
  windowHint?: WindowHint
  /** Applied in order to the resolved event */
  changes: DesiredChange[]
}

export interface CreateRequest {
  title: string
  start: string
  end?: string
  /** Source ID, kind ("task") or display-name fragment */
  calendar?: string
  location?: string
  description?: string
  attendees?: string[]
}

export type MutationAction = 'created' | 'rescheduled' | 'moved' | 'deleted' | 'updated'

export interface MutationConfirmation {
  actions: MutationAction[]
  title: string
  /** Local "YYYY-MM-DDTHH:mm", or "YYYY-MM-DD" for all-day events */
  start: string
  /** Local end; for all-day events the last day, inclusive */
  end: string
  allDay: boolean
  sourceId: string
  sourceName: string
  externalLink?: string
  /** Set when the event changed calendars */
  previousSourceName?: string
  /** True when nothing had to be written (e.g. already in the target calendar) */
  unchanged?: boolean
  event: CanonicalEvent
}

export interface MoveIntent {
  newStart?: string
  newEnd?: string
  targetCalendar?: string
}

/**
 * Time language alone is a reschedule, a calendar name alone is a move,
 * and both mean reschedule first, then move.
 */
export function planChanges(searchText: string, intent: MoveIntent): DesiredChange[] {
  const changes: DesiredChange[] = []
  if (intent.newEnd !== undefined && intent.newStart === undefined) {
    throw new ValidationError(`A new end for "${searchText}" needs a new start as well`)
  }
  if (intent.newStart !== undefined) {
    changes.push({ type: 'reschedule', newStart: intent.newStart, newEnd: intent.newEnd })
  }
  if (intent.targetCalendar !== undefined) {
    changes.push({ type: 'move', targetCalendar: intent.targetCalendar })
  }
  if (changes.length === 0) {
    throw new ValidationError(`Say when or to which calendar "${searchText}" should move`)
  }
  return changes
}

export interface ResolverDeps {
  aggregator: EventAggregator
  adapters: SourceAdapter[]
  classifier: EventClassifier
  time: TimeNormalizer
  now?: () => Date
  searchWindowDays?: number
}

export class MutationResolver {
  private aggregator: EventAggregator
  private adapters = new Map<string, SourceAdapter>()
  private sources: CalendarSource[]
  private classifier: EventClassifier
  private time: TimeNormalizer
  private now: () => Date
  private searchWindowDays: number

  constructor(deps: ResolverDeps) {
    this.aggregator = deps.aggregator
    this.classifier = deps.classifier
    this.time = deps.time
    this.now = deps.now ?? (() => new Date())
    this.searchWindowDays = deps.searchWindowDays ?? DEFAULT_SEARCH_WINDOW_DAYS
    for (const adapter of deps.adapters) {
      this.adapters.set(adapter.source.id, adapter)
    }
    this.sources = deps.adapters.map((adapter) => adapter.source)
  }

  // ─── Search & disambiguate ───

  /**
   * The single event `searchText` refers to.
   * @throws NotFoundError when nothing matches
   * @throws AmbiguousError with the candidates when several match
   */
  async resolve(searchText: string, windowHint?: WindowHint): Promise<CanonicalEvent> {
    const window = this.searchWindow(windowHint)
    const { events, sourceErrors } = await this.aggregator.aggregate(window.start, window.end)
    const candidates = matchEvents(events, searchText)

    if (candidates.length === 0) {
      const failed = Object.keys(sourceErrors)
      const missing = failed.length > 0 ? ` (not searched, unavailable: ${failed.join(', ')})` : ''
      throw new NotFoundError(
        `No event matching "${searchText}" between ${this.time.toCivilString(window.start)} and ${this.time.toCivilString(window.end)}${missing}`,
      )
    }
    if (candidates.length === 1) {
      return candidates[0]
    }

    const exact = candidates.filter((event) => normalizeTitle(event.title) === normalizeTitle(searchText))
    if (exact.length === 1) {
      return exact[0]
    }

    const listed = candidates.map((event) => this.describeCandidate(event)).join('; ')
    throw new AmbiguousError(
      searchText,
      candidates,
      `"${searchText}" matches ${candidates.length} events: ${listed}. Which one?`,
    )
  }

  // ─── Apply ───

  async mutate(request: MutationRequest): Promise<MutationConfirmation> {
    if (request.changes.length === 0) {
      throw new ValidationError(`No change requested for "${request.searchText}"`)
    }

    const original = await this.resolve(request.searchText, request.windowHint)
    const actions: MutationAction[] = []
    let event = original
    let previousSource: CalendarSource | undefined
    let unchanged = true

    for (const change of request.changes) {
      try {
        switch (change.type) {
          case 'reschedule':
            event = await this.reschedule(event, change.newStart, change.newEnd)
            actions.push('rescheduled')
            unchanged = false
            break
          case 'move': {
            const moved = await this.move(event, change.targetCalendar)
            if (!moved.unchanged) {
              previousSource = this.sourceOf(event)
              actions.push('moved')
              unchanged = false
            }
            event = moved.event
            break
          }
          case 'delete':
            await this.remove(event)
            actions.push('deleted')
            unchanged = false
            break
          case 'edit':
            event = await this.edit(event, change)
            actions.push('updated')
            unchanged = false
            break
        }
      } catch (err) {
        if (actions.length === 0) throw err
        if (err instanceof PartialMutationFailureError) {
          throw new PartialMutationFailureError(
            err.completed,
            err.failed,
            `"${event.title}" was already ${actions.join(' and ')}. ${err.message}`,
          )
        }
        const error = err instanceof Error ? err : new Error(String(err))
        throw new PartialMutationFailureError(
          { step: actions[actions.length - 1], event },
          { step: change.type, event, error },
          `"${event.title}" was ${actions.join(' and ')}, but the ${change.type} step failed: ${error.message}`,
        )
      }
    }

    return this.confirm(event, actions, { previousSource, unchanged })
  }

  async create(request: CreateRequest): Promise<MutationConfirmation> {
    const title = request.title.trim()
    if (!title) {
      throw new ValidationError('Event title is required')
    }
    if (!request.start.trim()) {
      throw new ValidationError(`Start time is required for "${title}"`)
    }

    const parsed = this.time.parse(request.start)
    const span = request.end ? this.parseEnd(request.end, parsed.allDay, title) : undefined
    const start = parsed.instant
    const end =
      span ??
      (parsed.allDay
        ? this.time.startOfDay(this.time.addDays(parsed.date, 1))
        : new Date(start.getTime() + HOUR_MS))
    if (end.getTime() < start.getTime()) {
      throw new ValidationError(`End of "${title}" is before its start`)
    }

    const target = request.calendar
      ? this.resolveSource(request.calendar)
      : this.defaultTarget(title, parsed.allDay ? undefined : start, request.attendees)

    const created = await this.adapterFor(target.id).create({
      title,
      start,
      end,
      allDay: parsed.allDay,
      location: request.location,
      description: request.description,
      attendees: request.attendees,
    })
    console.log(`[Resolver] Created "${title}" in ${target.id}`)

    return this.confirm(this.canonical(created), ['created'], { unchanged: false })
  }

  /**
   * Match a calendar reference against configured sources: exact ID, kind,
   * display name, then a display-name fragment.
   */
  resolveSource(reference: string): CalendarSource {
    const needle = reference.trim().toLowerCase().replace(/\s+calendar$/, '')
    const singular = needle.replace(/s$/, '')

    const found =
      this.sources.find((source) => source.id.toLowerCase() === needle) ??
      this.sources.find((source) => source.kind !== 'generic' && source.kind === singular) ??
      this.sources.find((source) => source.displayName.toLowerCase() === needle) ??
      (needle.length > 0
        ? this.sources.find(
            (source) =>
              source.displayName.toLowerCase().includes(needle) || source.id.toLowerCase().includes(needle),
          )
        : undefined)

    if (!found) {
      const available = this.sources.map((source) => `${source.displayName} (${source.kind})`).join(', ')
      throw new NotFoundError(`No calendar matching "${reference}". Available: ${available}`)
    }
    return found
  }

  // ─── Changes ───

  private async reschedule(event: CanonicalEvent, newStart: string, newEnd?: string): Promise<CanonicalEvent> {
    const parsed = this.time.parse(newStart)
    let start: Date
    let end: Date
    let allDay: boolean

    if (parsed.allDay && event.allDay) {
      // Whole-day event moves as a whole-day span
      start = parsed.instant
      allDay = true
      end = newEnd
        ? this.parseEnd(newEnd, true, event.title)
        : this.time.startOfDay(this.time.addDays(parsed.date, this.time.spanDays(event.start, event.end)))
    } else if (parsed.allDay) {
      // New date, same local time of day
      start = this.time.combine(parsed.date, event.start)
      allDay = false
      end = newEnd
        ? this.time.combine(this.time.parse(newEnd).date, event.end)
        : this.time.shiftKeepingWallDuration(event.start, event.end, start)
    } else {
      start = parsed.instant
      allDay = false
      if (newEnd) {
        end = this.parseEnd(newEnd, false, event.title)
      } else if (event.allDay) {
        end = new Date(start.getTime() + HOUR_MS)
      } else {
        end = this.time.shiftKeepingWallDuration(event.start, event.end, start)
      }
    }

    if (end.getTime() < start.getTime()) {
      throw new ValidationError(`New end of "${event.title}" is before its new start`)
    }

    const patch: EventPatch = { start, end }
    if (allDay !== event.allDay) patch.allDay = allDay

    const updated = await this.adapterFor(event.sourceId).update(event.externalEventId, patch)
    console.log(`[Resolver] Rescheduled "${event.title}" in ${event.sourceId}`)
    return this.canonical(updated)
  }

  /**
   * Create on the target, verify the copy, then delete the original.
   * Not atomic: a failure after the create is surfaced, never hidden.
   * Occurrences of a recurring series are refused before anything is written.
   */
  private async move(
    event: CanonicalEvent,
    targetCalendar: string,
  ): Promise<{ event: CanonicalEvent; unchanged: boolean }> {
    const target = this.resolveSource(targetCalendar)
    if (target.id === event.sourceId) {
      return { event, unchanged: true }
    }
    const origin = this.sourceOf(event)
    if (event.recurringEventId !== undefined) {
      throw new ValidationError(
        `"${event.title}" is one occurrence of a recurring series in ${origin.displayName}. A recurring series cannot be moved to another calendar; reschedule or delete the occurrence instead.`,
      )
    }

    const created = this.canonical(
      await this.adapterFor(target.id).create({
        title: event.title,
        start: event.start,
        end: event.end,
        allDay: event.allDay,
        location: event.location,
        attendees: event.attendees,
        description: event.description,
      }),
    )

    if (!this.isFaithfulCopy(created, event, target)) {
      const error = new ValidationError(`Copy in ${target.displayName} does not match the original`)
      console.warn(`[Resolver] Move of "${event.title}" stopped: ${error.message}`)
      throw new PartialMutationFailureError(
        { step: 'create', event: created },
        { step: 'verify', event, error },
        `"${event.title}" was copied to ${target.displayName}, but the copy does not match the original, so it was kept in ${origin.displayName}. Check both calendars.`,
      )
    }

    try {
      await this.adapterFor(event.sourceId).delete(event.externalEventId)
    } catch (err) {
      if (err instanceof NotFoundError) {
        console.log(`[Resolver] "${event.title}" was already gone from ${origin.id}`)
      } else {
        const error = err instanceof Error ? err : new Error(String(err))
        console.warn(`[Resolver] Move of "${event.title}" left a duplicate: ${error.message}`)
        throw new PartialMutationFailureError(
          { step: 'create', event: created },
          { step: 'delete', event, error },
          `"${event.title}" was copied to ${target.displayName}, but could not be removed from ${origin.displayName} (${errorMessage(err)}). It now appears in both calendars.`,
        )
      }
    }

    console.log(`[Resolver] Moved "${event.title}" ${origin.id} → ${target.id}`)
    return { event: created, unchanged: false }
  }

  private async remove(event: CanonicalEvent): Promise<void> {
    try {
      await this.adapterFor(event.sourceId).delete(event.externalEventId)
      console.log(`[Resolver] Deleted "${event.title}" from ${event.sourceId}`)
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err
      console.log(`[Resolver] "${event.title}" was already gone from ${event.sourceId}`)
    }
  }

  private async edit(
    event: CanonicalEvent,
    change: Extract<DesiredChange, { type: 'edit' }>,
  ): Promise<CanonicalEvent> {
    const patch: EventPatch = {}
    if (change.title !== undefined) {
      const title = change.title.trim()
      if (!title) throw new ValidationError(`New title for "${event.title}" is empty`)
      patch.title = title
    }
    if (change.location !== undefined) patch.location = change.location
    if (change.description !== undefined) patch.description = change.description
    if (Object.keys(patch).length === 0) {
      throw new ValidationError(`Nothing to update on "${event.title}"`)
    }

    const updated = await this.adapterFor(event.sourceId).update(event.externalEventId, patch)
    console.log(`[Resolver] Updated "${event.title}" in ${event.sourceId}`)
    return this.canonical(updated)
  }

  // ─── Helpers ───

  private searchWindow(hint?: WindowHint): Interval {
    const now = this.now().getTime()
    const spread = this.searchWindowDays * DAY_MS
    const start = hint?.from ? this.time.toInstant(hint.from) : new Date(now - spread)
    let end = new Date(now + spread)
    if (hint?.to) {
      const parsed = this.time.parse(hint.to)
      end = parsed.allDay ? this.time.dayRange(parsed.date).end : parsed.instant
    }
    if (end.getTime() <= start.getTime()) {
      throw new ValidationError('Search window ends before it starts')
    }
    return { start, end }
  }

  /** Exclusive end from user input; a date-only end includes that whole day */
  private parseEnd(input: string, allDay: boolean, title: string): Date {
    const parsed = this.time.parse(input)
    if (parsed.allDay !== allDay) {
      throw new ValidationError(
        `Start and end of "${title}" must both be dates or both be date-times`,
      )
    }
    return allDay ? this.time.dayRange(parsed.date).end : parsed.instant
  }

  private defaultTarget(title: string, start: Date | undefined, attendees?: string[]): CalendarSource {
    const kind = this.classifier.classifyContent({ title, start, attendees })
    const wanted = kind === 'task' ? 'task' : 'appointment'
    const source = this.sources.find((candidate) => candidate.kind === wanted) ?? this.sources[0]
    if (!source) {
      throw new NotFoundError('No calendars are configured')
    }
    return source
  }

  private isFaithfulCopy(copy: CanonicalEvent, original: CanonicalEvent, target: CalendarSource): boolean {
    return (
      copy.sourceId === target.id &&
      copy.externalEventId.length > 0 &&
      copy.title === original.title &&
      copy.start.getTime() === original.start.getTime() &&
      copy.end.getTime() === original.end.getTime()
    )
  }

  private canonical(event: SourceEvent): CanonicalEvent {
    const adapter = this.adapterFor(event.sourceId)
    return { ...event, kind: this.classifier.classify(event, adapter.source) }
  }

  private adapterFor(sourceId: string): SourceAdapter {
    const adapter = this.adapters.get(sourceId)
    if (!adapter) {
      throw new CalendarError('NOT_FOUND', `Calendar "${sourceId}" is not configured`)
    }
    return adapter
  }

  private sourceOf(event: CanonicalEvent): CalendarSource {
    return this.adapterFor(event.sourceId).source
  }

  private describeCandidate(event: CanonicalEvent): string {
    return `${event.title} (${formatWhen(event, this.time)}, ${this.sourceOf(event).displayName})`
  }

  private confirm(
    event: CanonicalEvent,
    actions: MutationAction[],
    extra: { previousSource?: CalendarSource; unchanged: boolean },
  ): MutationConfirmation {
    const source = this.sourceOf(event)
    const lastDay = this.time.addDays(this.time.localDate(event.end), -1)
    return {
      actions,
      title: event.title,
      start: event.allDay ? this.time.localDate(event.start) : this.time.toCivilString(event.start),
      end: event.allDay
        ? lastDay < this.time.localDate(event.start)
          ? this.time.localDate(event.start)
          : lastDay
        : this.time.toCivilString(event.end),
      allDay: event.allDay,
      sourceId: source.id,
      sourceName: source.displayName,
      externalLink: event.externalLink,
      previousSourceName: extra.previousSource?.displayName,
      unchanged: extra.unchanged ? true : undefined,
      event,
    }
  }
}
