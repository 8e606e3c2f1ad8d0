/**
 * Calendar API Routes
 *
 * Structured action endpoint plus briefing, source listing and health.
 * Everything goes through the ScheduleCoordinator from @daybook/core;
 * errors are rendered by the server's error handler.
 */

import type { FastifyInstance } from "fastify";
import type { CalendarSource } from "@daybook/core";
import { toResultJson, type ResultJson } from "../serialize.js";

// ─── Route Types ───

interface BriefingQuery {
  date?: string;
  maxChars?: string;
}

interface BriefingReply {
  text: string;
}

interface SourcesReply {
  sources: CalendarSource[];
}

// ─── Health Types ───

interface SourceHealth {
  id: string;
  displayName: string;
  backend: CalendarSource["backend"];
  reachable: boolean;
  error?: string;
}

interface CalendarHealth {
  status: "healthy" | "degraded" | "offline";
  timezone: string;
  sources: SourceHealth[];
  checkedAt: string;
}

/**
 * Register calendar routes
 */
export async function registerCalendarRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  const coordinator = fastify.coordinator;
  const time = coordinator.time;

  /**
   * POST /api/calendar/actions
   *
   * Body: {action, args}. Reads return rendered text, mutations a
   * confirmation.
   */
  fastify.post<{ Body: unknown; Reply: ResultJson }>(
    "/api/calendar/actions",
    async (request) => {
      const result = await coordinator.handle(request.body);
      if (result.type === "confirmation") {
        request.log.info(result.text);
      }
      return toResultJson(result, time);
    },
  );

  /**
   * GET /api/calendar/briefing
   *
   * Query params:
   *   - date: local date (default: today)
   *   - maxChars: character budget (default from config)
   */
  fastify.get<{ Querystring: BriefingQuery; Reply: BriefingReply }>(
    "/api/calendar/briefing",
    async (request) => {
      const { date, maxChars } = request.query;
      const args: Record<string, unknown> = {};
      if (date) args.date = date;
      if (maxChars) args.maxChars = Number(maxChars);

      const result = await coordinator.handle({ action: "GetBriefing", args });
      return { text: result.text };
    },
  );

  /**
   * GET /api/calendar/sources
   *
   * Configured calendars in registration order
   */
  fastify.get<{ Reply: SourcesReply }>("/api/calendar/sources", async () => {
    return { sources: coordinator.sources };
  });

  /**
   * GET /api/calendar/health
   *
   * Lists today from every source and reports which ones answered
   */
  fastify.get<{ Reply: CalendarHealth }>("/api/calendar/health", async () => {
    const now = new Date();
    const range = time.dayRange(time.today(now));
    const { sourceErrors } = await coordinator.aggregator.aggregate(
      range.start,
      range.end,
    );

    const sources: SourceHealth[] = coordinator.sources.map((source) => {
      const error: Error | undefined = sourceErrors[source.id];
      return {
        id: source.id,
        displayName: source.displayName,
        backend: source.backend,
        reachable: !error,
        error: error?.message,
      };
    });

    const failed = sources.filter((source) => !source.reachable).length;
    let status: CalendarHealth["status"];
    if (sources.length > 0 && failed === sources.length) {
      status = "offline";
    } else if (failed > 0) {
      status = "degraded";
    } else {
      status = "healthy";
    }

    return {
      status,
      timezone: time.zone,
      sources,
      checkedAt: now.toISOString(),
    };
  });
}
