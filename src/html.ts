import { html } from "hono/html";
import type { ClassifiedIssue, DashboardSnapshot } from "./types.js";

function renderIssue(issue: ClassifiedIssue, withSeenButton: boolean) {
  const badge = issue.classification === "Suppressed" ? html` <span class="badge">notified</span>` : "";
  const button = withSeenButton ? html` <button class="seen" data-identity="${issue.identity}">seen</button>` : "";
  return html`<li><a href="${issue.url}">${issue.title}</a>${badge}${button}</li>`;
}

function renderList(heading: string, issues: ClassifiedIssue[], withSeenButton: boolean) {
  if (issues.length === 0) return html`<h2>${heading}</h2>\n<p class="empty">nothing here</p>`;
  return html`<h2>${heading}</h2>\n<ul>\n${issues.map((i) => html`  ${renderIssue(i, withSeenButton)}\n`)}</ul>`;
}

/** Values interpolated into the page are escaped by hono's html template. */
export async function renderDashboard(snapshot: DashboardSnapshot): Promise<string> {
  const errors = snapshot.errors.length
    ? html`<h2>Check errors</h2>\n<ul class="errors">\n${snapshot.errors.map(
        (e) => html`  <li><strong>${e.check}</strong>: ${e.message}</li>\n`,
      )}</ul>`
    : "";
  const next = snapshot.nextCheckAt
    ? html`next check at <time datetime="${snapshot.nextCheckAt.toISOString()}">${snapshot.nextCheckAt.toISOString()}</time>`
    : "no further checks scheduled";

  const page = await html`<!DOCTYPE html>
<html>
<head>
<meta charset="UTF-8">
<meta http-equiv="refresh" content="60">
<title>nudge</title>
<style>
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Helvetica, Arial, sans-serif; max-width: 800px; margin: 40px auto; padding: 20px; line-height: 1.6; }
  h1 { color: #333; border-bottom: 2px solid #e1e4e8; padding-bottom: 10px; }
  ul { list-style-type: none; padding-left: 0; }
  li { padding: 10px; margin: 8px 0; background: #f6f8fa; border-radius: 6px; border-left: 4px solid #0969da; }
  .errors li { border-left-color: #cf222e; }
  a { color: #0969da; text-decoration: none; }
  .badge { font-size: 0.8em; color: #57606a; }
  .seen { float: right; }
  .meta, .empty { color: #57606a; }
</style>
</head>
<body>
<h1>nudge</h1>
<p class="meta">updated ${snapshot.generatedAt.toISOString()}, ${next}</p>
${renderList("Needs attention", snapshot.needsAttention, true)}
${renderList("Recently reviewed", snapshot.recentlyReviewed, false)}
${errors}
<script>
  for (const button of document.querySelectorAll("button.seen")) {
    button.addEventListener("click", async () => {
      await fetch("/api/seen", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ identity: button.dataset.identity }),
      });
      location.reload();
    });
  }
</script>
</body>
</html>
`;
  return page.toString();
}
