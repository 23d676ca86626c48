import { chatMessage, heading, missingNotice, notice } from "../views/components";
import { escapeHtml } from "../views/html";
import { missingFields } from "../services/promptService";
import { firstValue, requestCompletion } from "./forms";
import type { PromptRequest } from "../models/prompts";
import type { FormInput, PageController, ViewContext } from "./types";

const CHAT_FORM = `<form method="post" action="/assistant" class="chat-input">
<input type="text" name="question" placeholder="Ask about smart cities and green buildings..." required autofocus>
<button type="submit">Send</button>
</form>`;

const CLEAR_FORM = `<form method="post" action="/assistant/clear"><button type="submit">🗑️ Clear Chat History</button></form>`;

export class AssistantController implements PageController {
  readonly page = "assistant";
  readonly title = "AI Assistant";

  render(ctx: ViewContext, _input: FormInput, output = ""): string {
    const history = ctx.session.conversation.all().map(chatMessage).join("\n");
    return [
      heading("🤖 AI Sustainability Assistant"),
      "<p>Ask questions about smart cities, green buildings, and sustainable urban development!</p>",
      `<div class="chat-history">${history}</div>`,
      output,
      CHAT_FORM,
      CLEAR_FORM,
    ].join("\n");
  }

  /**
   * Answer one chat question. The user's turn is kept even when the answer fails.
   */
  async submit(ctx: ViewContext, input: FormInput): Promise<string> {
    const question = firstValue(input, "question") ?? "";
    const request: PromptRequest<"assistant"> = { templateId: "assistant", parameters: { question } };

    const missing = missingFields(request);
    if (missing.length > 0) {
      return this.render(ctx, input, missingNotice(missing));
    }

    ctx.session.conversation.append({ role: "user", content: question });
    const result = await requestCompletion(ctx, request);
    if (!result.ok) {
      return this.render(ctx, input, notice("error", `[ERROR] ${escapeHtml(result.message)}`));
    }

    ctx.session.conversation.append({ role: "assistant", content: result.text });
    return this.render(ctx, input);
  }

  clear(ctx: ViewContext): void {
    ctx.session.conversation.clear();
    ctx.log.info({ sessionId: ctx.session.id }, "Chat history cleared");
  }
}
