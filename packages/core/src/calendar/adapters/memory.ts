/**
 * In-Memory Source Adapter
 *
 * Map-backed SourceAdapter. Serves `memory` sources (local scratch calendars)
 * and stands in for remote backends in tests, with hooks to simulate
 * outages, slow responses and failing writes.
 */

import { randomUUID } from 'node:crypto'
import { NotFoundError, SourceUnavailableError } from '../errors.js'
import type {
  CalendarSource,
  EventDraft,
  EventPatch,
  ListOptions,
  SourceAdapter,
  SourceEvent,
} from '../types.js'
import { applyPatch, overlapsWindow, validateDraft } from './shared.js'

type Operation = 'list' | 'create' | 'update' | 'delete'

export class InMemorySourceAdapter implements SourceAdapter {
  readonly source: CalendarSource
  private events = new Map<string, SourceEvent>()
  private failures = new Map<Operation, Error>()
  private latencyMs = 0

  /** Every write is recorded here for assertions */
  readonly writes: Array<{ op: Exclude<Operation, 'list'>; externalEventId: string }> = []

  constructor(source: CalendarSource, seed: Array<Omit<SourceEvent, 'sourceId'>> = []) {
    this.source = source
    for (const event of seed) {
      this.events.set(event.externalEventId, { ...event, sourceId: source.id })
    }
  }

  async list(from: Date, to: Date, options?: ListOptions): Promise<SourceEvent[]> {
    await this.simulate('list', options?.signal)
    return Array.from(this.events.values())
      .filter((event) => overlapsWindow(event, from, to))
      .map((event) => ({ ...event }))
  }

  async create(draft: EventDraft): Promise<SourceEvent> {
    const valid = validateDraft(draft)
    await this.simulate('create')

    const event: SourceEvent = {
      sourceId: this.source.id,
      externalEventId: randomUUID(),
      title: valid.title,
      start: valid.start,
      end: valid.end,
      allDay: valid.allDay,
      location: valid.location,
      attendees: valid.attendees,
      description: valid.description,
    }
    this.events.set(event.externalEventId, event)
    this.writes.push({ op: 'create', externalEventId: event.externalEventId })
    return { ...event }
  }

  async update(externalEventId: string, patch: EventPatch): Promise<SourceEvent> {
    await this.simulate('update')
    const current = this.events.get(externalEventId)
    if (!current) {
      throw new NotFoundError(`Event ${externalEventId} not found in ${this.source.displayName}`)
    }
    const updated = applyPatch(current, patch)
    this.events.set(externalEventId, updated)
    this.writes.push({ op: 'update', externalEventId })
    return { ...updated }
  }

  async delete(externalEventId: string): Promise<void> {
    await this.simulate('delete')
    if (!this.events.delete(externalEventId)) {
      throw new NotFoundError(`Event ${externalEventId} not found in ${this.source.displayName}`)
    }
    this.writes.push({ op: 'delete', externalEventId })
  }

  // ── Test Methods ───────────────────────────────────────────────

  /** Make every subsequent call of `op` fail with `error` (default: outage) */
  failOn(op: Operation, error?: Error): void {
    this.failures.set(op, error ?? new SourceUnavailableError(this.source.id, 'simulated outage'))
  }

  recover(op?: Operation): void {
    if (op) this.failures.delete(op)
    else this.failures.clear()
  }

  /** Delay every call, e.g. to trip the aggregator's per-source timeout */
  setLatency(ms: number): void {
    this.latencyMs = ms
  }

  snapshot(): SourceEvent[] {
    return Array.from(this.events.values()).map((event) => ({ ...event }))
  }

  private async simulate(op: Operation, signal?: AbortSignal): Promise<void> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs, signal)
    }
    const failure = this.failures.get(op)
    if (failure) {
      throw failure
    }
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
