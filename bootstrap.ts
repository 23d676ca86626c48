import type { FastifyInstance } from "fastify";
import { buildApp } from "./app";
import { loadConfig } from "./config";
import { createRootLogger } from "./logger";
import { CompletionClient, createOpenAIClient, OpenAITextGenerator } from "./services/completionService";
import type { TextGenerator } from "./services/completionService";
import { SessionRegistry } from "./services/sessionService";

export interface StartOptions {
  env?: NodeJS.ProcessEnv;
  /** Set to false to build the server without binding a port. */
  listen?: boolean;
  /** Replaces the hosted model, e.g. in tests. */
  generator?: TextGenerator;
}

/**
 * Load configuration, construct the shared completion client and start the server.
 * Rejects with a ConfigurationError before any route exists when the credential is missing.
 * @param options - Start-up overrides
 * @returns The running (or merely built) server
 */
export async function start(options: StartOptions = {}): Promise<FastifyInstance> {
  const config = loadConfig(options.env ?? process.env);
  const logger = createRootLogger(config.logLevel);

  const generator = options.generator ?? new OpenAITextGenerator(createOpenAIClient(config));
  const completions = new CompletionClient(generator, config.model, logger.child({ module: "completions" }));
  const sessions = new SessionRegistry(config.sessionIdleMs);

  const fastify = buildApp({ completions, sessions, logger });
  if (options.listen !== false) {
    await fastify.listen({ port: config.port, host: config.host });
    logger.info({ model: config.model }, `Server running at http://${config.host}:${config.port}`);
  }
  return fastify;
}
