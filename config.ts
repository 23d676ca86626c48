import { z } from "zod";
import { ConfigurationError } from "./errors";

export const DEFAULT_MODEL = "gemini-2.5-flash";
export const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";

export const MISSING_API_KEY_MESSAGE =
  "GEMINI_API_KEY not found. Put your API key into a .env file (GEMINI_API_KEY=...) or export an env var.";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = z.object({
  GEMINI_API_KEY: z.string().trim().optional(),
  GOOGLE_API_KEY: z.string().trim().optional(),
  GENAI_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  GENAI_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8501),
  SESSION_IDLE_MINUTES: z.coerce.number().positive().default(60),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface AppConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  host: string;
  port: number;
  sessionIdleMs: number;
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Read the application configuration from an environment map
 * @param env - Usually `process.env`, after dotenv has loaded `.env`
 * @returns The typed configuration
 * @throws ConfigurationError when the credential is missing or a setting is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  // Blank values count as unset, as they do in a .env file with `KEY=`
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const settings = parsed.data;
  const apiKey = settings.GEMINI_API_KEY || settings.GOOGLE_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError(MISSING_API_KEY_MESSAGE);
  }

  return {
    apiKey,
    baseURL: settings.GENAI_BASE_URL,
    model: settings.GENAI_MODEL,
    host: settings.HOST,
    port: settings.PORT,
    sessionIdleMs: settings.SESSION_IDLE_MINUTES * 60_000,
    logLevel: settings.LOG_LEVEL,
  };
}
