/**
 * Inbound request boundary
 *
 * Structured calls from the orchestration layer arrive as `{action, args}`.
 * They are validated here into a discriminated union; nothing past this
 * module sees an untyped payload.
 */

import { z } from 'zod'
import { ValidationError } from './errors.js'

const civilTime = z.string().min(1).describe('Local date "YYYY-MM-DD" or date-time "YYYY-MM-DDTHH:MM"')
const clockTime = z.string().regex(/^\d{2}:\d{2}$/, 'expected HH:MM')
const searchText = z.string().trim().min(1).describe('Fuzzy reference to an existing event title')

const windowHint = z
  .object({
    from: civilTime.optional(),
    to: civilTime.optional().describe('Inclusive when date-only'),
  })
  .optional()

const GetScheduleRequest = z.object({
  action: z.literal('GetSchedule'),
  args: z.object({ date: civilTime.optional() }).default({}),
})

const GetUpcomingRequest = z.object({
  action: z.literal('GetUpcoming'),
  args: z.object({ days: z.number().int().min(1).max(31).optional() }).default({}),
})

const FindFreeTimeRequest = z.object({
  action: z.literal('FindFreeTime'),
  args: z.object({
    durationMinutes: z.number().int().positive().describe('Length of the slot wanted'),
    date: civilTime.optional().describe('First day searched; defaults to today'),
    days: z.number().int().min(1).max(31).optional(),
    weekdays: z.array(z.number().int().min(1).max(7)).optional().describe('ISO weekdays, 1 = Monday'),
    hours: z.object({ start: clockTime, end: clockTime }).optional(),
    limit: z.number().int().min(1).max(20).optional(),
  }),
})

const CreateEventRequest = z.object({
  action: z.literal('CreateEvent'),
  args: z.object({
    title: z.string().trim().min(1),
    start: civilTime,
    end: civilTime.optional(),
    calendar: z.string().optional().describe('Source ID, kind ("task") or display name'),
    location: z.string().optional(),
    description: z.string().optional(),
    attendees: z.array(z.string()).optional(),
  }),
})

const RescheduleEventRequest = z.object({
  action: z.literal('RescheduleEvent'),
  args: z.object({
    searchText,
    newStart: civilTime,
    newEnd: civilTime.optional(),
    window: windowHint,
  }),
})

const MoveEventRequest = z.object({
  action: z.literal('MoveEvent'),
  args: z.object({
    searchText,
    newStart: civilTime.optional(),
    newEnd: civilTime.optional(),
    targetCalendar: z.string().trim().min(1).optional(),
    window: windowHint,
  }),
})

const DeleteEventRequest = z.object({
  action: z.literal('DeleteEvent'),
  args: z.object({ searchText, window: windowHint }),
})

const UpdateEventRequest = z.object({
  action: z.literal('UpdateEvent'),
  args: z.object({
    searchText,
    title: z.string().optional(),
    location: z.string().optional(),
    description: z.string().optional(),
    window: windowHint,
  }),
})

const GetBriefingRequest = z.object({
  action: z.literal('GetBriefing'),
  args: z
    .object({
      date: civilTime.optional(),
      maxChars: z.number().int().min(80).max(8000).optional(),
    })
    .default({}),
})

const GetConflictsRequest = z.object({
  action: z.literal('GetConflicts'),
  args: z
    .object({
      date: civilTime.optional(),
      days: z.number().int().min(1).max(31).optional(),
    })
    .default({}),
})

const ListSourcesRequest = z.object({
  action: z.literal('ListSources'),
  args: z.object({}).default({}),
})

export const CalendarRequestSchema = z.discriminatedUnion('action', [
  GetScheduleRequest,
  GetUpcomingRequest,
  FindFreeTimeRequest,
  CreateEventRequest,
  RescheduleEventRequest,
  MoveEventRequest,
  DeleteEventRequest,
  UpdateEventRequest,
  GetBriefingRequest,
  GetConflictsRequest,
  ListSourcesRequest,
])

export type CalendarRequest = z.infer<typeof CalendarRequestSchema>

export type CalendarAction = CalendarRequest['action']

export const CALENDAR_ACTIONS: CalendarAction[] = CalendarRequestSchema.options.map(
  (option) => option.shape.action.value,
)

/**
 * @throws ValidationError naming every offending field
 */
export function parseRequest(input: unknown): CalendarRequest {
  const result = CalendarRequestSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    throw new ValidationError(`Invalid request: ${issues}`)
  }
  return result.data
}
