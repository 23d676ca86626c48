import { z } from "zod";
import { form, heading, hidden, missingNotice, multiSelect, numberInput, select, slider, textArea } from "../views/components";
import { escapeHtml } from "../views/html";
import { CITIES, TECHNOLOGIES } from "../models/prompts";
import { allValues, asList, firstValue, parseForm, pickNumber, pickOption, renderOutcome, runPrompt } from "./forms";
import type { PromptRequest } from "../models/prompts";
import type { FormInput, PageController, ViewContext } from "./types";

export const ANALYSIS_TYPES = ["city-comparison", "technology-roi", "impact-assessment", "future-trends"] as const;

export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

const DEFAULT_CITIES = ["Singapore", "Copenhagen"];
const INVESTMENT = { min: 1000, step: 1000, fallback: 50000 };
const YEARS = { min: 1, max: 20, fallback: 10 };

interface Analysis {
  label: string;
  button: string;
  banner: string;
  fields(input: FormInput, submitted: boolean): string[];
  parse(input: FormInput): { ok: true; request: PromptRequest } | { ok: false; fields: string[] };
}

const cityComparisonForm = z.object({ cities: asList(z.array(z.enum(CITIES)).min(1)) });
const technologyRoiForm = z.object({
  technology: z.enum(TECHNOLOGIES),
  investment: z.coerce.number().int().min(INVESTMENT.min),
});
const impactAssessmentForm = z.object({ scenario: z.string().trim().min(1) });
const futureTrendsForm = z.object({ years: z.coerce.number().int().min(YEARS.min).max(YEARS.max) });

const ANALYSES: Record<AnalysisType, Analysis> = {
  "city-comparison": {
    label: "City Comparison",
    button: "📈 Compare Cities",
    banner: "✅ Analysis complete!",
    fields: (input, submitted) => {
      // An untouched form starts from the default pair; a submitted one keeps what was sent
      const cities = submitted ? allValues(input, "cities") : DEFAULT_CITIES;
      return [multiSelect("cities", "Select cities to compare:", CITIES, cities)];
    },
    parse: (input) => {
      const parsed = parseForm(cityComparisonForm, input);
      return parsed.ok
        ? { ok: true, request: { templateId: "cityComparison", parameters: parsed.data } }
        : { ok: false, fields: parsed.fields };
    },
  },
  "technology-roi": {
    label: "Technology ROI",
    button: "💰 Calculate ROI",
    banner: "✅ ROI calculated!",
    fields: (input) => [
      select("technology", "Select Technology:", TECHNOLOGIES, pickOption(firstValue(input, "technology"), TECHNOLOGIES, TECHNOLOGIES[0])),
      numberInput("investment", "Investment Amount (USD):", pickNumber(firstValue(input, "investment"), INVESTMENT.fallback), {
        min: INVESTMENT.min,
        step: INVESTMENT.step,
      }),
    ],
    parse: (input) => {
      const parsed = parseForm(technologyRoiForm, input);
      return parsed.ok
        ? { ok: true, request: { templateId: "technologyRoi", parameters: parsed.data } }
        : { ok: false, fields: parsed.fields };
    },
  },
  "impact-assessment": {
    label: "Impact Assessment",
    button: "🔬 Assess Impact",
    banner: "✅ Impact assessed!",
    fields: (input) => [
      textArea(
        "scenario",
        "Describe your smart city/green building scenario:",
        firstValue(input, "scenario") ?? "",
        "E.g., Converting 100 buildings to net-zero energy in a city of 500,000 people...",
      ),
    ],
    parse: (input) => {
      const parsed = parseForm(impactAssessmentForm, input);
      return parsed.ok
        ? { ok: true, request: { templateId: "impactAssessment", parameters: parsed.data } }
        : { ok: false, fields: parsed.fields };
    },
  },
  "future-trends": {
    label: "Future Trends",
    button: "🔮 Predict Future Trends",
    banner: "✅ Trends identified!",
    fields: (input) => [
      slider("years", "Select timeframe (years ahead):", pickNumber(firstValue(input, "years"), YEARS.fallback), YEARS),
    ],
    parse: (input) => {
      const parsed = parseForm(futureTrendsForm, input);
      return parsed.ok
        ? { ok: true, request: { templateId: "futureTrends", parameters: parsed.data } }
        : { ok: false, fields: parsed.fields };
    },
  },
};

export function resolveAnalysis(value: string | undefined): AnalysisType {
  return pickOption(value, ANALYSIS_TYPES, "city-comparison");
}

export class AnalyticsController implements PageController {
  readonly page = "analytics";
  readonly title = "Analytics";

  render(_ctx: ViewContext, input: FormInput, output = "", submitted = false): string {
    const analysisType = resolveAnalysis(firstValue(input, "analysis"));
    const analysis = ANALYSES[analysisType];

    const tabs = ANALYSIS_TYPES.map((type) => {
      const active = type === analysisType ? ' class="active"' : "";
      return `<a href="/analytics?analysis=${type}"${active}>${escapeHtml(ANALYSES[type].label)}</a>`;
    }).join(" · ");

    const sectionTitle = analysisType === "impact-assessment" ? "<h3>🌍 Environmental Impact Assessment</h3>" : "";

    return [
      heading("📊 Sustainability Analytics Dashboard"),
      `<nav class="analysis-types">Select Analysis Type: ${tabs}</nav>`,
      sectionTitle,
      form("/analytics", [hidden("analysis", analysisType), ...analysis.fields(input, submitted)], analysis.button),
      output,
    ].join("\n");
  }

  async submit(ctx: ViewContext, input: FormInput): Promise<string> {
    const analysis = ANALYSES[resolveAnalysis(firstValue(input, "analysis"))];
    const parsed = analysis.parse(input);
    if (!parsed.ok) {
      return this.render(ctx, input, missingNotice(parsed.fields), true);
    }
    ctx.log.debug({ analysis: analysis.label }, "Running analysis");
    const outcome = await runPrompt(ctx, parsed.request);
    return this.render(ctx, input, renderOutcome(outcome, analysis.banner), true);
  }
}
