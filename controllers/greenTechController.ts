import { z } from "zod";
import { form, heading, metric, missingNotice, select } from "../views/components";
import { BUILDING_TYPES, CLIMATE_ZONES } from "../models/prompts";
import { firstValue, parseForm, pickOption, renderOutcome, runPrompt } from "./forms";
import type { FormInput, PageController, ViewContext } from "./types";

const greenTechForm = z.object({
  buildingType: z.enum(BUILDING_TYPES),
  climateZone: z.enum(CLIMATE_ZONES),
});

// Illustrative figures, shown beside every recommendation; not derived from the model's answer
const METRICS = [
  metric("Potential Energy Savings", "40-60%", "+15%"),
  metric("ROI Period", "5-7 years", "-2 years"),
  metric("Carbon Reduction", "45%", "+12%"),
];

export class GreenTechController implements PageController {
  readonly page = "green-technologies";
  readonly title = "Green Technologies";

  render(_ctx: ViewContext, input: FormInput, output = ""): string {
    const buildingType = pickOption(firstValue(input, "buildingType"), BUILDING_TYPES, BUILDING_TYPES[0]);
    const climateZone = pickOption(firstValue(input, "climateZone"), CLIMATE_ZONES, CLIMATE_ZONES[0]);
    const fields = [
      `<div class="columns">`,
      select("buildingType", "Building Type:", BUILDING_TYPES, buildingType),
      select("climateZone", "Climate Zone:", CLIMATE_ZONES, climateZone),
      `</div>`,
    ];
    return [
      heading("🌱 Green Building Technologies"),
      form("/green-technologies", fields, "🌿 Get Green Technology Recommendations"),
      output,
    ].join("\n");
  }

  async submit(ctx: ViewContext, input: FormInput): Promise<string> {
    const parsed = parseForm(greenTechForm, input);
    if (!parsed.ok) {
      return this.render(ctx, input, missingNotice(parsed.fields));
    }
    const outcome = await runPrompt(ctx, { templateId: "greenTechnologies", parameters: parsed.data });
    const metrics = `<hr><div class="metrics">${METRICS.join("")}</div>`;
    return this.render(ctx, input, renderOutcome(outcome, "✅ Recommendations ready!", metrics));
  }
}
