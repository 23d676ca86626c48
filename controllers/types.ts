import type { CompletionClient } from "../services/completionService";
import type { SessionContext } from "../services/sessionService";
import type { AppLogger } from "../logger";

export type PageId = "home" | "solutions" | "green-technologies" | "assistant" | "analytics";

/** Decoded query string or urlencoded form body. Repeated keys arrive as arrays. */
export type FormInput = Readonly<Record<string, string | string[] | undefined>>;

/** Everything a controller may touch while handling one request. */
export interface ViewContext {
  session: SessionContext;
  completions: CompletionClient;
  now: () => Date;
  log: AppLogger;
}

export interface PageController {
  readonly page: PageId;
  readonly title: string;
  /** Show the page with the given form state and no completion. */
  render(ctx: ViewContext, input: FormInput): string;
  /** Handle the page's trigger action. */
  submit(ctx: ViewContext, input: FormInput): Promise<string>;
}
