/**
 * Event Aggregator
 *
 * Queries every configured source concurrently and merges the results into
 * one canonical, deterministically ordered sequence. A failed or slow source
 * is reported in `sourceErrors` and left out; it never fails the read.
 */

import { SourceUnavailableError, errorMessage } from './errors.js'
import type { EventClassifier } from './classifier.js'
import type { AggregateResult, CanonicalEvent, SourceAdapter, SourceEvent } from './types.js'

/** Default per-source list timeout */
const DEFAULT_LIST_TIMEOUT_MS = 10_000

export interface AggregatorOptions {
  listTimeoutMs?: number
}

export class EventAggregator {
  private adapters: SourceAdapter[]
  private order = new Map<string, number>()
  private listTimeoutMs: number

  constructor(
    adapters: SourceAdapter[],
    private classifier: EventClassifier,
    options?: AggregatorOptions,
  ) {
    this.adapters = [...adapters]
    this.adapters.forEach((adapter, index) => this.order.set(adapter.source.id, index))
    this.listTimeoutMs = options?.listTimeoutMs ?? DEFAULT_LIST_TIMEOUT_MS
  }

  async aggregate(from: Date, to: Date, options?: { signal?: AbortSignal }): Promise<AggregateResult> {
    const signal = options?.signal
    signal?.throwIfAborted()

    const settled = await Promise.allSettled(
      this.adapters.map((adapter) => this.listWithTimeout(adapter, from, to, signal)),
    )
    // Abandon the whole read when the caller gave up
    signal?.throwIfAborted()

    const events: CanonicalEvent[] = []
    const sourceErrors: Record<string, Error> = {}

    settled.forEach((result, index) => {
      const adapter = this.adapters[index]
      if (result.status === 'fulfilled') {
        for (const event of result.value) {
          events.push(this.canonicalize(event, adapter))
        }
      } else {
        const err =
          result.reason instanceof SourceUnavailableError
            ? result.reason
            : new SourceUnavailableError(adapter.source.id, errorMessage(result.reason), {
                cause: result.reason,
              })
        console.warn(`[Aggregator] ${adapter.source.id} excluded: ${err.message}`)
        sourceErrors[adapter.source.id] = err
      }
    })

    events.sort((a, b) => this.compare(a, b))
    return { events, sourceErrors }
  }

  /** Registration order, then title, then external ID, after start */
  compare(a: CanonicalEvent, b: CanonicalEvent): number {
    return (
      a.start.getTime() - b.start.getTime() ||
      (this.order.get(a.sourceId) ?? Number.MAX_SAFE_INTEGER) -
        (this.order.get(b.sourceId) ?? Number.MAX_SAFE_INTEGER) ||
      compareText(a.title, b.title) ||
      compareText(a.externalEventId, b.externalEventId)
    )
  }

  private canonicalize(event: SourceEvent, adapter: SourceAdapter): CanonicalEvent {
    const end = event.end.getTime() < event.start.getTime() ? event.start : event.end
    const normalized: SourceEvent = { ...event, sourceId: adapter.source.id, end }
    return { ...normalized, kind: this.classifier.classify(normalized, adapter.source) }
  }

  private async listWithTimeout(
    adapter: SourceAdapter,
    from: Date,
    to: Date,
    parent?: AbortSignal,
  ): Promise<SourceEvent[]> {
    const controller = new AbortController()
    const onParentAbort = (): void => controller.abort(parent?.reason)
    parent?.addEventListener('abort', onParentAbort, { once: true })

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new SourceUnavailableError(
          adapter.source.id,
          `no response within ${this.listTimeoutMs}ms`,
        )
        controller.abort(err)
        reject(err)
      }, this.listTimeoutMs)
    })

    try {
      return await Promise.race([adapter.list(from, to, { signal: controller.signal }), timeout])
    } finally {
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
    }
  }
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}
