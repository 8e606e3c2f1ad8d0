/**
 * Calendar System Types
 *
 * Core interfaces shared by the adapters, the aggregator and the
 * read/write components built on top of them.
 */

/** Semantic kind of a configured source */
export type SourceKind = 'appointment' | 'task' | 'generic'

/** Semantic kind assigned to an event by the classifier */
export type EventKind = 'appointment' | 'task' | 'other'

/** Backend that serves a source */
export type SourceBackend = 'caldav' | 'google' | 'memory'

/**
 * A configured calendar source.
 * Immutable after configuration load; registration order is significant.
 */
export interface CalendarSource {
  /** Source identifier (e.g., "appointments", "tasks") */
  id: string

  /** Human-readable display name */
  displayName: string

  kind: SourceKind

  backend: SourceBackend

  /** Backend-specific reference (CalDAV collection URL, Google calendar ID) */
  externalRef: string
}

/**
 * Normalized, timezone-explicit representation of a calendar entry.
 * Instants are UTC `Date` values; rendering goes through the TimeNormalizer.
 */
export interface CanonicalEvent {
  sourceId: string

  /** Stable ID within the source. (sourceId, externalEventId) is unique. */
  externalEventId: string

  title: string

  start: Date

  /** Always >= start */
  end: Date

  allDay: boolean

  location?: string

  attendees?: string[]

  description?: string

  /** Link to the event in the backend's own UI, when it has one */
  externalLink?: string

  /**
   * Series ID, set only on occurrences of a recurring event. The occurrence
   * itself is addressed by externalEventId.
   */
  recurringEventId?: string

  kind: EventKind
}

/**
 * Event content as produced by an adapter, before classification.
 */
export type SourceEvent = Omit<CanonicalEvent, 'kind'>

/**
 * Input for creating a new event. Adapters validate title and start.
 */
export interface EventDraft {
  title: string
  start: Date
  end?: Date
  allDay?: boolean
  location?: string
  attendees?: string[]
  description?: string
}

/**
 * Sparse update: unset fields are left unchanged.
 */
export type EventPatch = Partial<
  Pick<
    CanonicalEvent,
    'title' | 'start' | 'end' | 'allDay' | 'location' | 'attendees' | 'description'
  >
>

export interface ListOptions {
  /** Abort signal from the calling layer; in-flight reads may be abandoned */
  signal?: AbortSignal
}

/**
 * Adapter for exactly one calendar source.
 * The only component that performs network I/O. No internal retries.
 */
export interface SourceAdapter {
  readonly source: CalendarSource

  /**
   * Events overlapping [from, to). Zero events is not an error.
   * @throws SourceUnavailableError on network or auth failure
   */
  list(from: Date, to: Date, options?: ListOptions): Promise<SourceEvent[]>

  /** @throws ValidationError if title or start is missing */
  create(draft: EventDraft): Promise<SourceEvent>

  /** An occurrence ID changes that occurrence only, never its series */
  update(externalEventId: string, patch: EventPatch): Promise<SourceEvent>

  /**
   * An occurrence ID removes that occurrence only.
   * @throws NotFoundError if the event is already absent
   */
  delete(externalEventId: string): Promise<void>
}

/** Half-open interval [start, end) */
export interface Interval {
  start: Date
  end: Date
}

/** Two overlapping events from different sources, earliest start first */
export interface ConflictPair {
  first: CanonicalEvent
  second: CanonicalEvent
  overlap: Interval
}

export interface AggregateResult {
  events: CanonicalEvent[]
  /** Keyed by source ID, only for sources that failed */
  sourceErrors: Record<string, Error>
}

/** Civil clock time "HH:mm" */
export type ClockTime = string

export interface BusinessHours {
  start: ClockTime
  end: ClockTime
}

/**
 * Per-source configuration from config.yaml
 */
export interface SourceConfig {
  displayName: string
  kind: SourceKind
  backend: SourceBackend
  /** CalDAV collection URL (defaults to one derived from the server) */
  url?: string
  /** Google calendar ID */
  calendarId?: string
  /** Google service-account key file, relative to the data directory */
  keyFile?: string
}

/**
 * Calendar configuration from <data dir>/config.yaml
 */
export interface CalendarConfig {
  /** IANA timezone identifier all local civil times are expressed in */
  timezone: string

  businessHours: BusinessHours

  /** Default ± window for fuzzy event search */
  searchWindowDays: number

  /** Per-source list timeout */
  listTimeoutMs: number

  briefing: {
    maxChars: number
    maxToday: number
    maxTomorrow: number
  }

  caldav: {
    host: string
    port: number
  }

  /** Ordered: insertion order is the registration order */
  sources: Record<string, SourceConfig>
}

/**
 * Credentials for CalDAV authentication.
 * Stored in <data dir>/calendar/credentials.json
 */
export interface CalendarCredentials {
  username: string
  password: string
}
