import { AnalyticsController } from "../controllers/analyticsController";
import { AssistantController } from "../controllers/assistantController";
import { GreenTechController } from "../controllers/greenTechController";
import { HomeController } from "../controllers/homeController";
import { SolutionsController } from "../controllers/solutionsController";
import type { PageController, PageId } from "../controllers/types";
import type { NavLink } from "../views/layout";

export interface NavEntry {
  page: PageId;
  label: string;
  path: string;
}

export const NAVIGATION: readonly NavEntry[] = [
  { page: "home", label: "🏠 Home", path: "/" },
  { page: "solutions", label: "💡 Smart Solutions", path: "/solutions" },
  { page: "green-technologies", label: "🌱 Green Technologies", path: "/green-technologies" },
  { page: "assistant", label: "🤖 AI Assistant", path: "/assistant" },
  { page: "analytics", label: "📊 Analytics", path: "/analytics" },
];

/**
 * Maps the selected navigation entry to the one controller that renders it.
 */
export class PageRouter {
  readonly assistant = new AssistantController();
  private readonly controllers: ReadonlyMap<string, PageController>;

  constructor() {
    const controllers: PageController[] = [
      new HomeController(),
      new SolutionsController(),
      new GreenTechController(),
      this.assistant,
      new AnalyticsController(),
    ];
    this.controllers = new Map(controllers.map((controller) => [controller.page, controller] as const));
  }

  /**
   * Find the controller for a page slug
   * @param slug - Path segment, e.g. `analytics`
   * @returns The controller, or undefined for an unknown page
   */
  resolve(slug: string): PageController | undefined {
    return this.controllers.get(slug);
  }

  navigation(active: PageId): NavLink[] {
    return NAVIGATION.map((entry) => ({ href: entry.path, label: entry.label, active: entry.page === active }));
  }
}
