import { escapeHtml } from "./html";

const STYLES = `
body { font-family: system-ui, sans-serif; margin: 0; display: flex; min-height: 100vh; color: #222; }
aside { width: 260px; background: #F1F8E9; padding: 1.5rem; box-sizing: border-box; }
aside nav a { display: block; padding: 0.4rem 0.6rem; border-radius: 6px; color: #2E7D32; text-decoration: none; }
aside nav a.active { background: #2E7D32; color: white; font-weight: bold; }
main { flex: 1; padding: 1.5rem 2.5rem; }
.main-header { font-size: 2.2rem; color: #2E7D32; text-align: center; font-weight: bold; margin-bottom: 0.5rem; }
.sub-header { font-size: 1.2rem; color: #558B2F; text-align: center; margin-bottom: 1.2rem; }
.info-box { background-color: #F1F8E9; padding: 1rem; border-radius: 8px; margin: 1rem 0; }
.columns { display: flex; gap: 2rem; }
.columns > * { flex: 1; }
form label { display: block; margin: 0.6rem 0; }
form select, form input, form textarea { display: block; margin-top: 0.3rem; }
form textarea { width: 100%; min-height: 6rem; }
fieldset { border: 1px solid #C5E1A5; border-radius: 8px; }
.choice { display: inline-block; margin-right: 1rem; }
button { background-color: #2E7D32; color: white; font-weight: bold; border: 0; border-radius: 6px; padding: 0.5rem 1rem; cursor: pointer; }
.alert { padding: 0.8rem 1rem; border-radius: 8px; margin: 1rem 0; }
.alert-success { background: #E8F5E9; color: #1B5E20; }
.alert-error { background: #FFEBEE; color: #B71C1C; }
.alert-warning { background: #FFF8E1; color: #8D6E00; }
.alert-info { background: #E3F2FD; color: #0D47A1; }
.metrics { display: flex; gap: 2rem; }
.metric-value { font-size: 1.8rem; }
.metric-delta { color: #2E7D32; }
.chat-message { padding: 0.6rem 1rem; border-radius: 8px; margin: 0.5rem 0; }
.chat-user { background: #F5F5F5; }
.chat-assistant { background: #F1F8E9; }
.chat-role { font-size: 0.75rem; text-transform: uppercase; color: #666; }
footer { text-align: center; color: #666; padding: 1rem; border-top: 1px solid #ddd; margin-top: 2rem; }
`;

const INSTITUTION = "Ajeenkya DY Patil School of Engineering, Lohegaon, Pune";

export interface NavLink {
  href: string;
  label: string;
  active: boolean;
}

/**
 * Wrap a page body in the shared shell: header, sidebar navigation and footer.
 * @param title - Page title for the browser tab
 * @param links - Sidebar navigation, with the current page marked active
 * @param body - The page's own HTML
 */
export function renderLayout(title: string, links: readonly NavLink[], body: string): string {
  const nav = links
    .map((link) => `<a href="${escapeHtml(link.href)}"${link.active ? ' class="active"' : ""}>${escapeHtml(link.label)}</a>`)
    .join("");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} · Smart Cities &amp; Green Buildings</title>
<style>${STYLES}</style>
</head>
<body>
<aside>
<h1>Navigation</h1>
<nav>${nav}</nav>
<hr>
<h3>🎓 Institution Info</h3>
<p><strong>${INSTITUTION}</strong></p>
<p><em>Affiliated to Savitribai Phule Pune University</em></p>
<form method="post" action="/session/end"><button type="submit">End session</button></form>
</aside>
<main>
<p class="main-header">🏙️ SMART CITIES &amp; GREEN BUILDINGS</p>
<p class="sub-header">Innovating for a Sustainable Tomorrow</p>
${body}
<footer>
<p><strong>${INSTITUTION}</strong></p>
<p>Empowerment through quality technical education</p>
<p>Approved by AICTE, Affiliated to Savitribai Phule Pune University</p>
</footer>
</main>
</body>
</html>`;
}
