import { readFileSync } from "fs";
import { join } from "path";
import type { PromptParameters, PromptRequest, SlotValue, TemplateId, TemplateSlots } from "../models/prompts";

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

const templateCache = new Map<TemplateId, string>();

/**
 * Get the instruction text of a template from file
 * @param templateId - The template to load
 * @returns The raw template text with its {{placeholders}}
 */
export function getTemplate(templateId: TemplateId): string {
  let template = templateCache.get(templateId);
  if (template === undefined) {
    template = readFileSync(join(process.cwd(), "prompts", `${templateId}.txt`), "utf8").trimEnd();
    templateCache.set(templateId, template);
  }
  return template;
}

function renderSlot(value: SlotValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return value.join(", ");
}

function interpolate(templateId: TemplateId, slots: PromptParameters): string {
  return getTemplate(templateId).replace(PLACEHOLDER, (placeholder, name: string) => {
    const value = slots[name];
    return value === undefined ? placeholder : renderSlot(value);
  });
}

/**
 * Build the prompt text for a template. Values are interpolated as given.
 * @param templateId - Which instruction to use
 * @param parameters - Values for the template's slots
 * @returns The prompt text
 */
export function buildPrompt<T extends TemplateId>(templateId: T, parameters: TemplateSlots[T]): string {
  return interpolate(templateId, parameters);
}

/**
 * Build the prompt text for a request assembled by a controller
 * @param request - Template id and its slot values
 * @returns The prompt text
 */
export function buildPromptFor(request: PromptRequest): string {
  return interpolate(request.templateId, request.parameters);
}

/**
 * List the slots of a request that hold no usable value. A request is only
 * sent once this is empty.
 * @param request - The request a form produced
 * @returns Names of the empty slots
 */
export function missingFields(request: PromptRequest): string[] {
  const slots: PromptParameters = request.parameters;
  return Object.entries(slots)
    .filter(([, value]) => {
      if (typeof value === "string") return value.trim() === "";
      if (typeof value === "number") return !Number.isFinite(value);
      return value.length === 0;
    })
    .map(([name]) => name);
}
