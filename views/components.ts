import { escapeHtml } from "./html";
import { renderMarkdown } from "../services/markdownService";
import type { CompletionResult } from "../models/completions";
import type { Turn } from "../models/conversations";

/** Page heading. */
export function heading(text: string): string {
  return `<h2>${escapeHtml(text)}</h2>`;
}

/**
 * Single-choice dropdown
 * @param selected - The option shown as chosen
 */
export function select(name: string, label: string, options: readonly string[], selected: string): string {
  const items = options
    .map((option) => {
      const isSelected = option === selected ? " selected" : "";
      return `<option value="${escapeHtml(option)}"${isSelected}>${escapeHtml(option)}</option>`;
    })
    .join("");
  return `<label>${escapeHtml(label)}<select name="${escapeHtml(name)}">${items}</select></label>`;
}

/**
 * Checkbox group; each ticked box submits one value under `name`
 * @param selected - The options shown ticked
 */
export function multiSelect(name: string, label: string, options: readonly string[], selected: readonly string[]): string {
  const items = options
    .map((option) => {
      const checked = selected.includes(option) ? " checked" : "";
      return `<label class="choice"><input type="checkbox" name="${escapeHtml(name)}" value="${escapeHtml(option)}"${checked}> ${escapeHtml(option)}</label>`;
    })
    .join("");
  return `<fieldset><legend>${escapeHtml(label)}</legend>${items}</fieldset>`;
}

/**
 * Numeric entry with browser-side bounds
 * @param limits - Minimum, optional maximum and step
 */
export function numberInput(
  name: string,
  label: string,
  value: number,
  limits: { min: number; max?: number; step: number },
): string {
  const max = limits.max === undefined ? "" : ` max="${limits.max}"`;
  return `<label>${escapeHtml(label)}<input type="number" name="${escapeHtml(name)}" value="${value}" min="${limits.min}"${max} step="${limits.step}" required></label>`;
}

/**
 * Range input with a live readout of its value
 * @param limits - Inclusive bounds
 */
export function slider(name: string, label: string, value: number, limits: { min: number; max: number }): string {
  return `<label>${escapeHtml(label)}<input type="range" name="${escapeHtml(name)}" value="${value}" min="${limits.min}" max="${limits.max}" step="1" oninput="this.nextElementSibling.value = this.value"><output>${value}</output></label>`;
}

/**
 * Required free-text entry
 * @param placeholder - Example text shown while empty
 */
export function textArea(name: string, label: string, value: string, placeholder: string): string {
  return `<label>${escapeHtml(label)}<textarea name="${escapeHtml(name)}" placeholder="${escapeHtml(placeholder)}" required>${escapeHtml(value)}</textarea></label>`;
}

/** Hidden field carrying state across a post, e.g. the analysis type. */
export function hidden(name: string, value: string): string {
  return `<input type="hidden" name="${escapeHtml(name)}" value="${escapeHtml(value)}">`;
}

/**
 * A POST form with a single trigger button
 * @param action - Path the form posts to
 * @param fields - Rendered field HTML
 * @param button - Button label
 */
export function form(action: string, fields: string[], button: string): string {
  return `<form method="post" action="${escapeHtml(action)}">${fields.join("")}<button type="submit">${escapeHtml(button)}</button></form>`;
}

/**
 * Unordered list; items are trusted HTML
 * @param items - Static markup for each item
 */
export function bulletList(items: readonly string[]): string {
  return `<ul>${items.map((item) => `<li>${item}</li>`).join("")}</ul>`;
}

/**
 * Coloured alert box
 * @param html - Already escaped content
 */
export function notice(kind: "success" | "error" | "warning" | "info", html: string): string {
  return `<div class="alert alert-${kind}">${html}</div>`;
}

/**
 * Notice naming the fields that stopped a form from being sent
 * @param fields - Field names
 */
export function missingNotice(fields: readonly string[]): string {
  return notice("warning", `Please provide: ${escapeHtml(fields.join(", "))}`);
}

/** A headline figure with its change, as on the green technologies page. */
export function metric(label: string, value: string, delta: string): string {
  return `<div class="metric"><div class="metric-label">${escapeHtml(label)}</div><div class="metric-value">${escapeHtml(value)}</div><div class="metric-delta">${escapeHtml(delta)}</div></div>`;
}

/**
 * Render a completion the way every page does: the error inline, or the
 * success banner followed by the text.
 * @param result - The completion outcome
 * @param banner - Success banner text
 * @param extra - Additional HTML shown after the text on success only
 */
export function completionOutput(result: CompletionResult, banner: string, extra = ""): string {
  if (!result.ok) {
    return notice("error", `[ERROR] ${escapeHtml(result.message)}`);
  }
  return `${notice("success", escapeHtml(banner))}<div class="output">${renderMarkdown(result.text)}</div>${extra}`;
}

/**
 * One transcript entry, rendered as Markdown under its role
 * @param turn - The turn to show
 */
export function chatMessage(turn: Turn): string {
  return `<div class="chat-message chat-${turn.role}"><span class="chat-role">${turn.role}</span>${renderMarkdown(turn.content)}</div>`;
}
