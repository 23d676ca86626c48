import { Marked } from "marked";
import { escapeHtml } from "../views/html";

const SAFE_PROTOCOLS = new Set(["http:", "https:", "mailto:"]);

/**
 * Whether a link or image target may be rendered as written
 * @param href - The target from the Markdown source
 * @returns True only for absolute http(s) and mailto URLs
 */
export function isSafeUrl(href: string): boolean {
  try {
    return SAFE_PROTOCOLS.has(new URL(href).protocol);
  } catch {
    return false;
  }
}

// Model output and chat input are untrusted: raw HTML is shown as text and
// link or image targets outside SAFE_PROTOCOLS are replaced by "#"
const markdown = new Marked({ gfm: true });
markdown.use({
  walkTokens(token) {
    if ((token.type === "link" || token.type === "image") && !isSafeUrl(token.href)) {
      token.href = "#";
    }
  },
  renderer: {
    html(token) {
      return escapeHtml(token.text);
    },
  },
});

/**
 * Render generated text as HTML
 * @param text - Markdown from the model or the user
 * @returns HTML with no raw markup and no script URLs
 */
export function renderMarkdown(text: string): string {
  const html = markdown.parse(text, { async: false });
  if (typeof html !== "string") {
    throw new Error("Markdown renderer returned a promise for a synchronous parse");
  }
  return html;
}
