/**
 * Calendar System
 *
 * Multi-source aggregation, availability, conflicts, briefings and
 * fuzzy-reference mutations over CalDAV, Google and in-memory calendars.
 */

// Types
export type {
  SourceKind,
  EventKind,
  SourceBackend,
  CalendarSource,
  CanonicalEvent,
  SourceEvent,
  EventDraft,
  EventPatch,
  ListOptions,
  SourceAdapter,
  Interval,
  ConflictPair,
  AggregateResult,
  ClockTime,
  BusinessHours,
  SourceConfig,
  CalendarConfig,
  CalendarCredentials,
} from './types.js'

// Errors
export {
  CalendarError,
  CalendarErrorCode,
  InvalidTimeFormatError,
  SourceUnavailableError,
  ValidationError,
  NotFoundError,
  AmbiguousError,
  PartialMutationFailureError,
  isCalendarError,
  errorMessage,
} from './errors.js'

// Components
export { TimeNormalizer, isValidTimezone, parseClock, clockToMinutes } from './time.js'
export type { LocalDate, ParsedTime, LocalDisplay } from './time.js'
export { EventClassifier } from './classifier.js'
export { EventAggregator } from './aggregator.js'
export type { AggregatorOptions } from './aggregator.js'
export { AvailabilityEngine, mergeIntervals, busyIntervals, freeIntervals } from './availability.js'
export type { DayBounds, SlotSearchOptions } from './availability.js'
export { findConflicts } from './conflicts.js'
export { BriefingComposer } from './briefing.js'
export type { BriefingOptions } from './briefing.js'
export { matchEvents, tokenOverlap } from './matcher.js'
export { MutationResolver, planChanges } from './resolver.js'
export type {
  DesiredChange,
  WindowHint,
  MutationRequest,
  CreateRequest,
  MutationAction,
  MutationConfirmation,
  MoveIntent,
} from './resolver.js'
export { CalendarRequestSchema, CALENDAR_ACTIONS, parseRequest } from './requests.js'
export type { CalendarRequest, CalendarAction } from './requests.js'
export { ScheduleCoordinator } from './coordinator.js'
export type { CoordinatorResult, CoordinatorDeps, HandleOptions } from './coordinator.js'

// Adapters
export { InMemorySourceAdapter } from './adapters/memory.js'
export { CalDAVConnection, CalDAVSourceAdapter } from './adapters/caldav.js'
export { GoogleCalendarSourceAdapter, createGoogleCalendarClient } from './adapters/google.js'
export type { GoogleCalendarApi } from './adapters/google.js'

// Configuration
export {
  DEFAULT_CALENDAR_CONFIG,
  loadCalendarConfig,
  loadCalendarCredentials,
  parseCalendarConfig,
  getCalDAVServerUrl,
} from './config.js'
export { createSourceAdapters, toCalendarSource } from './registry.js'
export { createCalendarRuntime } from './runtime.js'
export type { CalendarRuntime } from './runtime.js'
