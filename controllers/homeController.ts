import { bulletList, form, notice } from "../views/components";
import { escapeHtml } from "../views/html";
import { renderMarkdown } from "../services/markdownService";
import { requestCompletion } from "./forms";
import type { CompletionResult } from "../models/completions";
import type { FormInput, PageController, ViewContext } from "./types";

const FOCUS_AREAS = [
  "<strong>Smart Infrastructure</strong>: IoT-enabled urban systems",
  "<strong>Green Buildings</strong>: Energy-efficient architecture",
  "<strong>Sustainable Transport</strong>: Electric &amp; public transit",
  "<strong>Waste Management</strong>: Smart recycling solutions",
  "<strong>Energy Systems</strong>: Renewable energy integration",
  "<strong>Water Conservation</strong>: Smart water management",
];

const PROJECT_GOALS = [
  "Reduce carbon emissions by 50%",
  "Achieve 80% energy efficiency",
  "Implement 100% renewable energy",
  "Zero waste to landfill target",
  "Smart mobility for all citizens",
  "Improve quality of life metrics",
];

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time
 * @param date - The date to format
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function renderInsights(result: CompletionResult, generatedAt: Date): string {
  if (!result.ok) {
    return notice("error", `[ERROR] ${escapeHtml(result.message)}`);
  }
  return [
    notice("success", "✅ Latest insights generated!"),
    `<p><strong>AI-Generated Insights (${formatTimestamp(generatedAt)})</strong></p>`,
    `<div class="info-box">${renderMarkdown(result.text)}</div>`,
  ].join("");
}

export class HomeController implements PageController {
  readonly page = "home";
  readonly title = "Home";

  render(_ctx: ViewContext, _input: FormInput, output = ""): string {
    return `
<div class="columns">
<section><h3>🌍 Key Focus Areas</h3>${bulletList(FOCUS_AREAS)}</section>
<section><h3>🎯 Project Goals</h3>${bulletList(PROJECT_GOALS)}</section>
</div>
<hr>
<h3>🔄 Real-time Urban Sustainability Insights</h3>
${form("/home", [], "🔍 Get Latest Insights from AI")}
${output}`;
  }

  async submit(ctx: ViewContext, input: FormInput): Promise<string> {
    const result = await requestCompletion(ctx, { templateId: "insights", parameters: {} });
    return this.render(ctx, input, renderInsights(result, ctx.now()));
  }
}
