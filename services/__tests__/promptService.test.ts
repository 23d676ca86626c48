import { describe, it, expect } from "vitest";
import { buildPrompt, buildPromptFor, missingFields } from "../promptService";

describe("buildPrompt", () => {
  it("interpolates building type and climate zone", () => {
    const prompt = buildPrompt("greenTechnologies", { buildingType: "Residential", climateZone: "Arid" });

    expect(prompt).toContain("Residential");
    expect(prompt).toContain("Arid");
    expect(prompt.split("\n")[0]).toBe(
      "Recommend 5 specific green building technologies for a Residential building in a Arid climate. For each technology:",
    );
  });

  it("interpolates technology and investment amount", () => {
    const prompt = buildPrompt("technologyRoi", { technology: "Solar Panels", investment: 50000 });

    expect(prompt).toContain("50000");
    expect(prompt).toContain("Solar Panels");
    expect(prompt.split("\n")[0]).toBe("Calculate detailed ROI for Solar Panels with an investment of $50000.");
  });

  it("joins a set of cities with commas", () => {
    const prompt = buildPrompt("cityComparison", { cities: ["Singapore", "Copenhagen", "Oslo"] });

    expect(prompt.split("\n")[0]).toBe(
      "Compare these cities in terms of smart city and green building initiatives: Singapore, Copenhagen, Oslo",
    );
  });

  it("returns the insights instruction unchanged", () => {
    expect(buildPrompt("insights", {})).toBe(
      "Provide 3 brief, current insights about smart cities and green buildings. " +
        "Each insight should be 1-2 sentences. Focus on recent innovations, technologies, or trends. " +
        "Format as JSON with keys: insight1, insight2, insight3",
    );
  });

  it("ends the template without a trailing newline", () => {
    expect(buildPrompt("futureTrends", { years: 10 }).endsWith("Be forward-thinking but realistic.")).toBe(true);
  });

  it("is deterministic", () => {
    const parameters = { scenario: "Converting 100 buildings to net-zero energy" };

    expect(buildPrompt("impactAssessment", parameters)).toBe(buildPrompt("impactAssessment", parameters));
  });

  it("does not expand placeholders found inside a value", () => {
    const prompt = buildPrompt("assistant", { question: "What about {{years}}?" });

    expect(prompt).toContain("Answer this question professionally and practically: What about {{years}}?");
  });

  it("matches buildPromptFor for the same request", () => {
    expect(buildPromptFor({ templateId: "solutions", parameters: { category: "Smart Water" } })).toBe(
      buildPrompt("solutions", { category: "Smart Water" }),
    );
  });
});

describe("missingFields", () => {
  it("reports blank text, empty sets and non-finite numbers", () => {
    expect(missingFields({ templateId: "impactAssessment", parameters: { scenario: "   " } })).toEqual(["scenario"]);
    expect(missingFields({ templateId: "cityComparison", parameters: { cities: [] } })).toEqual(["cities"]);
    expect(missingFields({ templateId: "futureTrends", parameters: { years: Number.NaN } })).toEqual(["years"]);
  });

  it("is empty for a filled request", () => {
    expect(missingFields({ templateId: "technologyRoi", parameters: { technology: "LED Lighting", investment: 1000 } })).toEqual([]);
    expect(missingFields({ templateId: "insights", parameters: {} })).toEqual([]);
  });
});
