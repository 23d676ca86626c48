import OpenAI from "openai";
import { describeError, ExternalServiceError } from "../errors";
import type { AppConfig } from "../config";
import type { AppLogger } from "../logger";
import type { CompletionResult } from "../models/completions";

/** Anything that turns one prompt into one completion. */
export interface TextGenerator {
  generate(prompt: string, model: string): Promise<string | null | undefined>;
}

/** The slice of the OpenAI SDK this app calls. */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: "user"; content: string }>;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export class OpenAITextGenerator implements TextGenerator {
  constructor(private readonly api: ChatCompletionsApi) {}

  async generate(prompt: string, model: string): Promise<string | null | undefined> {
    const chatCompletion = await this.api.chat.completions.create({
      model,
      messages: [{ role: "user", content: prompt }],
    });
    return chatCompletion.choices[0]?.message?.content;
  }
}

/**
 * Create the OpenAI SDK client for the configured endpoint. No retries: one call per completion.
 * @param config - The application configuration
 */
export function createOpenAIClient(config: Pick<AppConfig, "apiKey" | "baseURL">): OpenAI {
  return new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
}

export class CompletionClient {
  constructor(
    private readonly generator: TextGenerator,
    private readonly defaultModel: string,
    private readonly logger: AppLogger,
  ) {}

  /**
   * Generate text for a prompt. Never throws: every failure comes back as `{ ok: false }`.
   * @param prompt - The prompt text
   * @param model - Model identifier, defaults to the configured one
   */
  async complete(prompt: string, model: string = this.defaultModel): Promise<CompletionResult> {
    if (prompt.trim() === "") {
      return { ok: false, message: "Cannot request a completion for an empty prompt" };
    }

    try {
      const text = await this.generator.generate(prompt, model);
      if (!text) {
        throw new ExternalServiceError("The generation service returned an empty response");
      }
      this.logger.debug({ model, length: text.length }, "Completion received");
      return { ok: true, text };
    } catch (error) {
      this.logger.error({ err: error, model }, "Completion failed");
      return { ok: false, message: describeError(error) };
    }
  }
}
