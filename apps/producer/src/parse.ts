import type { Platform, Season } from "../../common/src/types.js";
import {
  escapeHtml,
  looksLikeHtml,
  renderMarkdownToSafeHtml,
  sanitizeFragment,
  stripLeadingTitleHeading,
} from "./markdown.js";
import { RemoteContentSchema } from "./schema.js";

export type ParseStage = "json" | "scrape" | "shell";

export interface ParsedResponse {
  stage: ParseStage;
  body: string;
  summary: string | null;
  mediaSuggestions: string[];
  qualityScore: number | null;
}

export interface ShellContext {
  title: string;
  season: Season;
  brandName: string;
  platform: Platform;
}

export const SHELL_QUALITY_SCORE = 85;

const META_LINE =
  /^\s*[-*"']?\s*\**\s*meta[_ ]?description\s*\**["']?\s*[:=]\s*\**\s*["']?(.+?)["',]*\s*$/im;
const IMAGE_LINE =
  /^\s*[-*]?\s*\**\s*(?:image suggestion|image idea|image|photo|visual)s?(?:\s*#?\d+)?\s*\**\s*[:-]\s*\**\s*(.+?)\s*$/gim;

function normalizeBody(content: string, platform: Platform, title: string): string {
  const trimmed = content.trim();
  if (looksLikeHtml(trimmed)) {
    return sanitizeFragment(trimmed);
  }
  if (platform === "blog") {
    return `<h1>${escapeHtml(title)}</h1>\n${renderMarkdownToSafeHtml(stripLeadingTitleHeading(trimmed, title))}`.trim();
  }
  return trimmed;
}

function extractJsonBlock(raw: string): string | null {
  const unfenced = raw.replace(/```(?:json)?/gi, "");
  const start = unfenced.indexOf("{");
  const end = unfenced.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }
  return unfenced.slice(start, end + 1);
}

/** Strict stage: the first `{...}` block, markdown fences removed, checked against the schema. */
export function parseStructured(raw: string, context: ShellContext): ParsedResponse | null {
  const block = extractJsonBlock(raw);
  if (!block) {
    return null;
  }

  let candidate: unknown;
  try {
    candidate = JSON.parse(block);
  } catch {
    return null;
  }

  const parsed = RemoteContentSchema.safeParse(candidate);
  if (!parsed.success) {
    return null;
  }

  const body = normalizeBody(parsed.data.content, context.platform, context.title);
  if (!body) {
    return null;
  }

  return {
    stage: "json",
    body,
    summary: parsed.data.meta_description?.trim() || null,
    mediaSuggestions: parsed.data.image_suggestions,
    qualityScore: parsed.data.quality_score,
  };
}

/** Pattern stage: succeeds only when a meta description or an image suggestion was found. */
export function parseScraped(raw: string, context: ShellContext): ParsedResponse | null {
  const metaMatch = META_LINE.exec(raw);
  const summary = metaMatch?.[1]?.trim() || null;

  const mediaSuggestions: string[] = [];
  for (const match of raw.matchAll(IMAGE_LINE)) {
    const suggestion = match[1]?.trim();
    if (suggestion) {
      mediaSuggestions.push(suggestion);
    }
  }

  if (!summary && mediaSuggestions.length === 0) {
    return null;
  }

  const remaining = raw
    .replace(new RegExp(META_LINE.source, "gim"), "")
    .replace(IMAGE_LINE, "")
    .trim();
  const body = normalizeBody(remaining, context.platform, context.title);
  if (!body) {
    return null;
  }

  return { stage: "scrape", body, summary, mediaSuggestions, qualityScore: null };
}

export function synthesizeShell(raw: string, context: ShellContext): ParsedResponse {
  const trimmed = raw.trim();
  const inner = looksLikeHtml(trimmed)
    ? sanitizeFragment(trimmed)
    : renderMarkdownToSafeHtml(stripLeadingTitleHeading(trimmed, context.title)).trim();

  const body = [
    `<h1>${escapeHtml(context.title)}</h1>`,
    inner,
    `<p>Here's to a great ${context.season} in the garden from everyone at ${escapeHtml(context.brandName)}.</p>`,
  ]
    .filter((segment) => segment.length > 0)
    .join("\n");

  return {
    stage: "shell",
    body,
    summary: null,
    mediaSuggestions: [],
    qualityScore: SHELL_QUALITY_SCORE,
  };
}

export function parseRemoteResponse(raw: string, context: ShellContext): ParsedResponse {
  return (
    parseStructured(raw, context) ??
    parseScraped(raw, context) ??
    synthesizeShell(raw, context)
  );
}
