export const SOLUTION_CATEGORIES = [
  "Smart Energy",
  "Smart Mobility",
  "Smart Buildings",
  "Smart Waste",
  "Smart Water",
] as const;

export const BUILDING_TYPES = ["Residential", "Commercial", "Industrial", "Educational", "Healthcare"] as const;

export const CLIMATE_ZONES = ["Tropical", "Arid", "Temperate", "Cold", "Polar"] as const;

export const CITIES = [
  "Singapore",
  "Copenhagen",
  "Amsterdam",
  "Barcelona",
  "San Francisco",
  "Tokyo",
  "Dubai",
  "Stockholm",
  "Oslo",
  "Vienna",
] as const;

export const TECHNOLOGIES = [
  "Solar Panels",
  "Smart HVAC",
  "Rainwater Harvesting",
  "LED Lighting",
  "Green Roofs",
  "Energy Storage",
  "Smart Windows",
  "Geothermal Cooling",
] as const;

export type SlotValue = string | number | readonly string[];

export type PromptParameters = Readonly<Record<string, SlotValue>>;

// Slot names per template; they match the {{placeholders}} in prompts/<templateId>.txt
export type TemplateSlots = {
  insights: Record<string, never>;
  solutions: { category: string };
  greenTechnologies: { buildingType: string; climateZone: string };
  assistant: { question: string };
  cityComparison: { cities: readonly string[] };
  technologyRoi: { technology: string; investment: number };
  impactAssessment: { scenario: string };
  futureTrends: { years: number };
};

export type TemplateId = keyof TemplateSlots;

export type PromptRequest<T extends TemplateId = TemplateId> = {
  [K in T]: { templateId: K; parameters: TemplateSlots[K] };
}[T];
