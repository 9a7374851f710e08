import type { ActionRecord, ReportFormat } from "./types.js";
import { formatLongDate } from "./dates.js";

export const REPORT_TITLE = "Mailwarden Daily Report";
export const REPLY_PREVIEW_LENGTH = 100;

export interface ActionCount {
  actionType: string;
  label: string;
  count: number;
}

export interface ReportEntry {
  actionType: string;
  subject: string;
  sender: string;
  ruleName: string;
  /** "Reply: ..." or "Label: ...", empty for actions without details */
  detail: string;
}

export interface ReportSummary {
  dateLabel: string;
  total: number;
  counts: ActionCount[];
  entries: ReportEntry[];
}

/**
 * Plural heading for an action type: reply -> Replies, label -> Labels
 */
export function pluralizeActionType(actionType: string): string {
  if (actionType.length === 0) {
    return "Actions";
  }
  const capitalized = actionType.charAt(0).toUpperCase() + actionType.slice(1);
  if (/[^aeiou]y$/i.test(capitalized)) {
    return `${capitalized.slice(0, -1)}ies`;
  }
  return `${capitalized}s`;
}

export function truncate(text: string, length: number = REPLY_PREVIEW_LENGTH): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

function describeDetails(record: ActionRecord): string {
  if (record.actionType === "reply" && record.details.text !== undefined) {
    return `Reply: ${truncate(record.details.text)}`;
  }
  if (record.actionType === "label" && record.details.label !== undefined) {
    return `Label: ${record.details.label}`;
  }
  return "";
}

/**
 * Counts and listing shared by every report format
 */
export function summarizeActions(day: Date, records: ActionRecord[]): ReportSummary {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.actionType, (counts.get(record.actionType) ?? 0) + 1);
  }

  return {
    dateLabel: formatLongDate(day),
    total: records.length,
    counts: [...counts.entries()].map(([actionType, count]) => ({
      actionType,
      label: pluralizeActionType(actionType),
      count,
    })),
    entries: records.map((record) => ({
      actionType: record.actionType,
      subject: record.messageSubject,
      sender: record.sender,
      ruleName: record.ruleName,
      detail: describeDetails(record),
    })),
  };
}

export function renderTextReport(summary: ReportSummary): string {
  const lines = [`${REPORT_TITLE} for ${summary.dateLabel}`, "", `Total actions: ${summary.total}`];

  for (const { label, count } of summary.counts) {
    lines.push(`${label}: ${count}`);
  }

  if (summary.entries.length === 0) {
    lines.push("", "No actions were taken on this day.");
    return `${lines.join("\n")}\n`;
  }

  lines.push("", "Detailed Actions:");
  for (const entry of summary.entries) {
    lines.push("", `- ${entry.actionType.toUpperCase()}: ${entry.subject}`);
    lines.push(`  From: ${entry.sender}`);
    lines.push(`  Rule: ${entry.ruleName}`);
    if (entry.detail) {
      lines.push(`  ${entry.detail}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

const CELL_STYLE = "text-align: left; padding: 8px; border-bottom: 1px solid #e5e5e5;";

export function renderHtmlReport(summary: ReportSummary): string {
  const parts = [
    "<html>",
    '<body style="font-family: Arial, sans-serif; margin: 20px;">',
    `<h1 style="color: #333366;">${REPORT_TITLE} for ${escapeHtml(summary.dateLabel)}</h1>`,
    '<div style="background-color: #eeeeff; padding: 10px; border-radius: 5px;">',
    '<h2 style="color: #666699;">Summary</h2>',
    `<p>Total actions: ${summary.total}</p>`,
  ];

  for (const { label, count } of summary.counts) {
    parts.push(`<p>${escapeHtml(label)}: ${count}</p>`);
  }
  parts.push("</div>");

  if (summary.entries.length === 0) {
    parts.push('<p style="color: #666666; font-style: italic;">No actions were taken on this day.</p>');
    parts.push("</body>", "</html>");
    return parts.join("\n");
  }

  parts.push('<h2 style="color: #666699; margin-top: 20px;">Detailed Actions</h2>');
  parts.push('<table style="border-collapse: collapse; width: 100%; margin-top: 10px;">');
  const headings = ["Action", "Subject", "From", "Rule", "Details"];
  parts.push(
    `<tr>${headings
      .map((heading) => `<th style="${CELL_STYLE} background-color: #f2f2f2;">${heading}</th>`)
      .join("")}</tr>`
  );

  for (const entry of summary.entries) {
    const cells = [entry.actionType, entry.subject, entry.sender, entry.ruleName, entry.detail];
    parts.push(
      `<tr>${cells.map((cell) => `<td style="${CELL_STYLE}">${escapeHtml(cell)}</td>`).join("")}</tr>`
    );
  }

  parts.push("</table>", "</body>", "</html>");
  return parts.join("\n");
}

function markdownCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function renderMarkdownReport(summary: ReportSummary): string {
  const lines = [
    `# ${REPORT_TITLE} for ${summary.dateLabel}`,
    "",
    "## Summary",
    "",
    `Total actions: ${summary.total}`,
    "",
  ];

  for (const { label, count } of summary.counts) {
    lines.push(`${label}: ${count}`, "");
  }

  if (summary.entries.length === 0) {
    lines.push("*No actions were taken on this day.*");
    return `${lines.join("\n")}\n`;
  }

  lines.push("## Detailed Actions", "");
  lines.push("| Action | Subject | Sender | Rule | Details |");
  lines.push("| --- | --- | --- | --- | --- |");
  for (const entry of summary.entries) {
    const cells = [entry.actionType, entry.subject, entry.sender, entry.ruleName, entry.detail];
    lines.push(`| ${cells.map(markdownCell).join(" | ")} |`);
  }

  return `${lines.join("\n")}\n`;
}

export function renderReport(summary: ReportSummary, format: ReportFormat): string {
  switch (format) {
    case "html":
      return renderHtmlReport(summary);
    case "markdown":
      return renderMarkdownReport(summary);
    case "text":
      return renderTextReport(summary);
  }
}

export function isReportFormat(value: string): value is ReportFormat {
  return value === "text" || value === "html" || value === "markdown";
}
