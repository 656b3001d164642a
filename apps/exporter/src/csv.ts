import { sliceCodePoints } from "../../common/src/template.js";
import { truncateOnWordBoundary } from "../../producer/src/contract.js";
import { toPlainText } from "../../producer/src/markdown.js";
import { toHandle } from "./handle.js";
import type { ExportItem } from "./items.js";

export const CSV_COLUMNS = [
  "Title",
  "Content",
  "Excerpt",
  "Handle",
  "Published",
  "Tags",
  "Author",
  "Created At",
  "Updated At",
  "Status",
  "SEO Title",
  "SEO Description",
] as const;

export const SEO_TITLE_MAX_CHARS = 70;
export const SEO_DESCRIPTION_MAX_CHARS = 160;

export interface CsvOptions {
  author: string;
  /** Stamped on items that carry no timestamps of their own. */
  exportedAt: Date;
}

export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function seoTitle(title: string): string {
  return title.length > SEO_TITLE_MAX_CHARS ? sliceCodePoints(title, SEO_TITLE_MAX_CHARS).trimEnd() : title;
}

function excerptOf(item: ExportItem): string {
  const summary = item.summary?.trim() ?? "";
  return summary.length > 0 ? summary : truncateOnWordBoundary(toPlainText(item.body), SEO_DESCRIPTION_MAX_CHARS);
}

function toRow(item: ExportItem, options: CsvOptions): string[] {
  const stamp = options.exportedAt.toISOString();
  const excerpt = excerptOf(item);

  return [
    item.title,
    item.body,
    excerpt,
    toHandle(item.title),
    item.status === "published" ? "TRUE" : "FALSE",
    item.keywords.join(", "),
    options.author,
    item.createdAt ?? stamp,
    item.updatedAt ?? stamp,
    item.status,
    seoTitle(item.title),
    truncateOnWordBoundary(excerpt, SEO_DESCRIPTION_MAX_CHARS),
  ];
}

/** Storefront blog import sheet; lines end in CRLF. */
export function renderBlogCsv(items: readonly ExportItem[], options: CsvOptions): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const item of items) {
    lines.push(toRow(item, options).map(escapeCsvField).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}

export function csvFileName(weekId: string | null, exportedAt: Date): string {
  const label = (weekId ?? exportedAt.toISOString().slice(0, 10)).replace(/[^A-Za-z0-9_-]/g, "_");
  return `blog_posts_${label}.csv`;
}
