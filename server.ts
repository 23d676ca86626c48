import dotenv from "dotenv";
import type { FastifyInstance } from "fastify";
import { start } from "./bootstrap";
import { ConfigurationError } from "./errors";
import { createRootLogger } from "./logger";

dotenv.config();

function shutdownOn(fastify: FastifyInstance, signal: NodeJS.Signals) {
  process.on(signal, () => {
    fastify.log.info(`Received ${signal}, closing server`);
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, "Error while closing server");
        process.exit(1);
      },
    );
  });
}

start()
  .then((fastify) => {
    shutdownOn(fastify, "SIGINT");
    shutdownOn(fastify, "SIGTERM");
  })
  .catch((err: unknown) => {
    // No configured logger exists when start-up fails, so report at a fixed level
    const logger = createRootLogger("info");
    if (err instanceof ConfigurationError) {
      logger.fatal(err.message);
    } else {
      logger.fatal({ err }, "Server failed to start");
    }
    process.exit(1);
  });
