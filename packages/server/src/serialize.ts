/**
 * JSON shapes returned by the HTTP API
 */

import type {
  CanonicalEvent,
  CoordinatorResult,
  MutationConfirmation,
  TimeNormalizer,
} from "@daybook/core";

export interface EventJson {
  sourceId: string;
  externalEventId: string;
  title: string;
  /** ISO instant (UTC) */
  start: string;
  end: string;
  /** Local "YYYY-MM-DDTHH:mm" in the configured timezone */
  localStart: string;
  localEnd: string;
  allDay: boolean;
  kind: CanonicalEvent["kind"];
  location?: string;
  attendees?: string[];
  externalLink?: string;
  /** Series ID when the event is one occurrence of a recurring event */
  recurringEventId?: string;
}

export type ConfirmationJson = Omit<MutationConfirmation, "event"> & {
  event: EventJson;
};

export type ResultJson =
  | { type: "text"; text: string }
  | { type: "confirmation"; text: string; confirmation: ConfirmationJson };

export function toEventJson(
  event: CanonicalEvent,
  time: TimeNormalizer,
): EventJson {
  return {
    sourceId: event.sourceId,
    externalEventId: event.externalEventId,
    title: event.title,
    start: event.start.toISOString(),
    end: event.end.toISOString(),
    localStart: time.toCivilString(event.start),
    localEnd: time.toCivilString(event.end),
    allDay: event.allDay,
    kind: event.kind,
    location: event.location,
    attendees: event.attendees,
    externalLink: event.externalLink,
    recurringEventId: event.recurringEventId,
  };
}

export function toResultJson(
  result: CoordinatorResult,
  time: TimeNormalizer,
): ResultJson {
  if (result.type === "text") {
    return result;
  }
  const { event, ...rest } = result.confirmation;
  return {
    type: "confirmation",
    text: result.text,
    confirmation: { ...rest, event: toEventJson(event, time) },
  };
}
