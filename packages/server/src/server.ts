import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import fastifyCors from "@fastify/cors";
import {
  AmbiguousError,
  PartialMutationFailureError,
  isCalendarError,
  type CalendarErrorCode,
  type ScheduleCoordinator,
} from "@daybook/core";
import { registerCalendarRoutes } from "./routes/calendar.js";
import { toEventJson, type EventJson } from "./serialize.js";

export interface ServerOptions {
  coordinator: ScheduleCoordinator;
  /** Fastify logger setting; defaults to pino-pretty output at info level */
  logger?: FastifyServerOptions["logger"];
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    coordinator: ScheduleCoordinator;
  }
}

const STATUS_BY_CODE: Record<CalendarErrorCode, number> = {
  INVALID_TIME_FORMAT: 400,
  SOURCE_UNAVAILABLE: 503,
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  AMBIGUOUS: 409,
  PARTIAL_MUTATION_FAILURE: 502,
};

export interface ErrorBody {
  error: string;
  message: string;
  candidates?: EventJson[];
  completed?: { step: string; event: EventJson };
  failed?: { step: string; message: string };
}

const DEFAULT_LOGGER: FastifyServerOptions["logger"] = {
  level: "info",
  transport: {
    target: "pino-pretty",
    options: {
      translateTime: "HH:MM:ss Z",
      ignore: "pid,hostname",
    },
  },
};

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const { coordinator } = options;
  const time = coordinator.time;

  const fastify = Fastify({
    logger: options.logger ?? DEFAULT_LOGGER,
  });

  // Register CORS (allow all origins, single-user app)
  await fastify.register(fastifyCors, {
    origin: true,
  });

  fastify.decorate("coordinator", coordinator);

  // Calendar errors carry their own code; map them to HTTP status
  fastify.setErrorHandler((error, request, reply) => {
    if (isCalendarError(error)) {
      const body: ErrorBody = { error: error.code, message: error.message };

      if (error instanceof AmbiguousError) {
        body.candidates = error.candidates.map((event) => toEventJson(event, time));
      }
      if (error instanceof PartialMutationFailureError) {
        body.completed = {
          step: error.completed.step,
          event: toEventJson(error.completed.event, time),
        };
        body.failed = {
          step: error.failed.step,
          message: error.failed.error.message,
        };
        request.log.warn(`Partial mutation: ${error.message}`);
      }

      return reply.code(STATUS_BY_CODE[error.code]).send(body);
    }

    if (error.validation) {
      return reply
        .code(400)
        .send({ error: "VALIDATION_ERROR", message: error.message } satisfies ErrorBody);
    }

    request.log.error(error);
    return reply
      .code(error.statusCode ?? 500)
      .send({ error: "INTERNAL_ERROR", message: error.message } satisfies ErrorBody);
  });

  // Register calendar routes
  await registerCalendarRoutes(fastify);

  return fastify;
}
