import { z } from "zod";
import { buildPromptFor, missingFields } from "../services/promptService";
import { completionOutput, missingNotice } from "../views/components";
import type { CompletionResult } from "../models/completions";
import type { PromptRequest } from "../models/prompts";
import type { FormInput, ViewContext } from "./types";

export type PromptOutcome =
  | { status: "incomplete"; fields: string[] }
  | { status: "completed"; result: CompletionResult };

/**
 * Get the first value submitted for a field
 * @param input - Decoded form or query
 * @param name - Field name
 * @returns The value, or undefined when the field was not sent
 */
export function firstValue(input: FormInput, name: string): string | undefined {
  const value = input[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Get every value submitted for a field, e.g. the ticked boxes of a multi-select
 * @param input - Decoded form or query
 * @param name - Field name
 */
export function allValues(input: FormInput, name: string): string[] {
  const value = input[name];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Pick a submitted option, falling back when it is absent or not offered
 * @param value - The submitted value
 * @param options - The options the widget offers
 * @param fallback - The widget's default
 */
export function pickOption<T extends string>(value: string | undefined, options: readonly T[], fallback: T): T {
  return options.find((option) => option === value) ?? fallback;
}

/**
 * Read a numeric field for display, falling back when it is blank or not a number
 * @param value - The submitted text
 * @param fallback - The widget's default
 */
export function pickNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** Let an array schema accept a field sent once, several times, or not at all. */
export function asList<T extends z.ZodTypeAny>(list: T) {
  return z.preprocess((value) => {
    if (value === undefined) return [];
    return Array.isArray(value) ? value : [value];
  }, list);
}

/**
 * Validate a submitted form against a schema
 * @returns The parsed values, or the names of the fields that failed
 */
export function parseForm<S extends z.ZodTypeAny>(
  schema: S,
  input: FormInput,
): { ok: true; data: z.output<S> } | { ok: false; fields: string[] } {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }
  const fields = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0] ?? "form")))];
  return { ok: false, fields };
}

/**
 * Build the prompt for a request and send it
 * @param ctx - The request's view context
 * @param request - A request whose required fields are filled
 */
export async function requestCompletion(ctx: ViewContext, request: PromptRequest): Promise<CompletionResult> {
  const prompt = buildPromptFor(request);
  ctx.log.info({ templateId: request.templateId, sessionId: ctx.session.id }, "Requesting completion");
  const result = await ctx.completions.complete(prompt);
  if (!result.ok) {
    ctx.log.warn({ templateId: request.templateId, sessionId: ctx.session.id }, "Completion failed, showing error");
  }
  return result;
}

/**
 * Send a request once its required fields are present
 * @returns `incomplete` with the empty fields, without calling the service, or the completion
 */
export async function runPrompt(ctx: ViewContext, request: PromptRequest): Promise<PromptOutcome> {
  const fields = missingFields(request);
  if (fields.length > 0) {
    return { status: "incomplete", fields };
  }
  return { status: "completed", result: await requestCompletion(ctx, request) };
}

/**
 * Render a prompt outcome: the missing-field notice, the error, or the banner and text
 * @param outcome - Result of `runPrompt`
 * @param banner - Success banner text
 * @param extra - HTML shown after the text on success only
 */
export function renderOutcome(outcome: PromptOutcome, banner: string, extra?: string): string {
  if (outcome.status === "incomplete") {
    return missingNotice(outcome.fields);
  }
  return completionOutput(outcome.result, banner, extra);
}
