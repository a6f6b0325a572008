import {
  formatDate,
  hnItemUrl,
  isDegraded,
  storyUrl,
  summaryOrPlaceholder,
  type DigestEntry,
} from "./entry.js";

export function digestTitle(date: Date): string {
  return `Hacker News Top Stories - ${formatDate(date)}`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function metaLine(entry: DigestEntry): string {
  const { story } = entry;
  const parts = [`Points: ${story.score ?? 0}`, `Comments: ${story.comments ?? 0}`];
  if (story.by) parts.push(`By: ${story.by}`);
  return parts.join(" | ");
}

export function renderText(entries: readonly DigestEntry[], date: Date): string {
  const body = entries
    .map((entry) => {
      const lines = [
        `${entry.rank}. ${entry.story.title}`,
        `URL: ${storyUrl(entry.story)}`,
        metaLine(entry),
        "",
        summaryOrPlaceholder(entry),
        "",
        `Discuss: ${hnItemUrl(entry.story.id)}`,
      ];
      return lines.join("\n");
    })
    .join(`\n\n${"-".repeat(80)}\n\n`);

  return `${digestTitle(date)}\n\n${body}\n`;
}

export function renderHtml(entries: readonly DigestEntry[], date: Date): string {
  const items = entries
    .map((entry) => {
      const summary = isDegraded(entry)
        ? `<p style="color: #95a5a6; font-style: italic; margin: 8px 0 0 0;">${escapeHtml(summaryOrPlaceholder(entry))}</p>`
        : `<div style="font-size: 14px; color: #444; line-height: 1.6; margin-top: 8px;">${escapeHtml(entry.summary.text).replace(/\n/g, "<br>")}</div>`;

      return `
      <li style="margin-bottom: 16px; padding: 12px; background: #f9f9f9; border-radius: 8px;">
        <div style="font-weight: 600;">
          ${entry.rank}. <a href="${escapeHtml(storyUrl(entry.story))}" style="color: #333; text-decoration: none;">${escapeHtml(entry.story.title)}</a>
        </div>
        <div style="font-size: 13px; color: #666; margin-top: 4px;">
          ${escapeHtml(metaLine(entry))} | <a href="${hnItemUrl(entry.story.id)}" style="color: #0066cc; text-decoration: none;">Discuss on HN</a>
        </div>
        ${summary}
      </li>`;
    })
    .join("");

  return `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 640px; margin: 0 auto; padding: 20px; color: #333;">
  <div style="text-align: center; margin-bottom: 24px;">
    <h1 style="font-size: 24px; margin: 0;">${escapeHtml(digestTitle(date))}</h1>
    <p style="color: #666; margin-top: 8px;">${entries.length} ${entries.length === 1 ? "story" : "stories"}</p>
  </div>
  <ul style="list-style: none; padding: 0; margin: 0;">${items}
  </ul>
  <div style="text-align: center; margin-top: 32px; padding-top: 16px; border-top: 1px solid #eee; color: #999; font-size: 12px;">
    Generated by hn-digest
  </div>
</body>
</html>`;
}
