/**
 * Calendar Errors
 *
 * Every failure the calendar core reports carries a typed code, so the
 * calling layer can map it (HTTP status, user message) without string matching.
 */

import type { CanonicalEvent } from './types.js'

export const CalendarErrorCode = {
  INVALID_TIME_FORMAT: 'INVALID_TIME_FORMAT',
  SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  AMBIGUOUS: 'AMBIGUOUS',
  PARTIAL_MUTATION_FAILURE: 'PARTIAL_MUTATION_FAILURE',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CalendarError'
    this.code = code
  }
}

export class InvalidTimeFormatError extends CalendarError {
  constructor(
    readonly input: string,
    reason?: string,
  ) {
    super(
      CalendarErrorCode.INVALID_TIME_FORMAT,
      `Invalid time "${input}"${reason ? `: ${reason}` : ''}. Use YYYY-MM-DD or YYYY-MM-DDTHH:MM.`,
    )
    this.name = 'InvalidTimeFormatError'
  }
}

export class SourceUnavailableError extends CalendarError {
  constructor(
    readonly sourceId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(CalendarErrorCode.SOURCE_UNAVAILABLE, `Calendar "${sourceId}" unavailable: ${message}`, options)
    this.name = 'SourceUnavailableError'
  }
}

export class ValidationError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.VALIDATION_ERROR, message)
    this.name = 'ValidationError'
  }
}

export class NotFoundError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class AmbiguousError extends CalendarError {
  constructor(
    readonly searchText: string,
    readonly candidates: CanonicalEvent[],
    message: string,
  ) {
    super(CalendarErrorCode.AMBIGUOUS, message)
    this.name = 'AmbiguousError'
  }
}

/**
 * A multi-step mutation stopped halfway. `completed` names what did happen
 * (e.g. the duplicate created on the target source), `failed` what did not.
 */
export class PartialMutationFailureError extends CalendarError {
  constructor(
    readonly completed: { step: string; event: CanonicalEvent },
    readonly failed: { step: string; event: CanonicalEvent; error: Error },
    message: string,
  ) {
    super(CalendarErrorCode.PARTIAL_MUTATION_FAILURE, message, { cause: failed.error })
    this.name = 'PartialMutationFailureError'
  }
}

export function isCalendarError(err: unknown): err is CalendarError {
  return err instanceof CalendarError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
