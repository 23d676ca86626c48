/**
 * Raised at start-up when the environment cannot produce a usable configuration.
 * Fatal: the server never starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Any failure of the generation service. Recovered at the completion client
 * boundary and shown to the user inline.
 */
export class ExternalServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExternalServiceError";
  }
}

/**
 * Render an unknown thrown value as a message fit to show a user.
 * @param error - Whatever was thrown
 * @returns A non-empty message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim() !== "") {
    return error.message;
  }
  if (typeof error === "string" && error.trim() !== "") {
    return error;
  }
  return "Unknown error from the generation service";
}
