import pino from "pino";
import type { FastifyBaseLogger } from "fastify";

const ROOT_NAME = "smart-cities";

/** The logging surface services need; satisfied by both pino loggers and `request.log`. */
export type AppLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

/**
 * Create the root logger. Fastify logs requests through it too.
 * @param level - pino level name, already validated by `loadConfig`
 */
export function createRootLogger(level: string): FastifyBaseLogger {
  return pino({ name: ROOT_NAME, level });
}
