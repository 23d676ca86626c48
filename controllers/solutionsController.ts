import { z } from "zod";
import { form, heading, missingNotice, select } from "../views/components";
import { SOLUTION_CATEGORIES } from "../models/prompts";
import { firstValue, parseForm, pickOption, renderOutcome, runPrompt } from "./forms";
import type { FormInput, PageController, ViewContext } from "./types";

const solutionsForm = z.object({
  category: z.enum(SOLUTION_CATEGORIES),
});

export class SolutionsController implements PageController {
  readonly page = "solutions";
  readonly title = "Smart Solutions";

  render(_ctx: ViewContext, input: FormInput, output = ""): string {
    const category = pickOption(firstValue(input, "category"), SOLUTION_CATEGORIES, SOLUTION_CATEGORIES[0]);
    return [
      heading("💡 Smart City Solutions"),
      form("/solutions", [select("category", "Select solution category:", SOLUTION_CATEGORIES, category)], "🚀 Generate Solution Ideas"),
      output,
    ].join("\n");
  }

  async submit(ctx: ViewContext, input: FormInput): Promise<string> {
    const parsed = parseForm(solutionsForm, input);
    if (!parsed.ok) {
      return this.render(ctx, input, missingNotice(parsed.fields));
    }
    const outcome = await runPrompt(ctx, { templateId: "solutions", parameters: parsed.data });
    return this.render(ctx, input, renderOutcome(outcome, "✅ Solutions generated!"));
  }
}
