import type { GenerationSource } from "../../common/src/types.js";
import { sliceCodePoints } from "../../common/src/template.js";
import { toPlainText } from "./markdown.js";

export const SUMMARY_MAX_CHARS = 160;
export const MAX_MEDIA_SUGGESTIONS = 5;

export interface GenerationDraft {
  body: string;
  summary: string | null;
  mediaSuggestions: string[];
  qualityScore: number | null;
  source: GenerationSource;
}

export interface GenerationResult {
  body: string;
  summary: string;
  mediaSuggestions: string[];
  qualityScore: number;
  source: GenerationSource;
}

export interface ContractDefaults {
  title: string;
  mediaSuggestion: string;
  qualityScore: number;
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Cuts on the last space that keeps at least half the budget, then appends an ellipsis. */
export function truncateOnWordBoundary(text: string, max = SUMMARY_MAX_CHARS): string {
  if (text.length <= max) {
    return text;
  }

  const room = sliceCodePoints(text, max - 1);
  const lastSpace = room.lastIndexOf(" ");
  const cut = lastSpace > max / 2 ? room.slice(0, lastSpace) : room;
  return `${cut.replace(/[\s,;:.-]+$/, "")}…`;
}

export function clampScore(value: number | null, fallback: number): number {
  if (value === null || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(100, Math.max(0, Math.round(value)));
}

function normalizeMedia(values: string[], fallback: string): string[] {
  const unique = Array.from(
    new Set(values.map((value) => collapseWhitespace(value)).filter((value) => value.length > 0)),
  );
  return unique.length > 0 ? unique.slice(0, MAX_MEDIA_SUGGESTIONS) : [fallback];
}

export function enforceOutputContract(
  draft: GenerationDraft,
  defaults: ContractDefaults,
): GenerationResult {
  const body = draft.body.trim().length > 0 ? draft.body.trim() : defaults.title;

  const summarySource = collapseWhitespace(draft.summary ?? "");
  const summary = truncateOnWordBoundary(
    summarySource.length > 0 ? summarySource : toPlainText(body) || defaults.title,
  );

  return {
    body,
    summary,
    mediaSuggestions: normalizeMedia(draft.mediaSuggestions, defaults.mediaSuggestion),
    qualityScore: clampScore(draft.qualityScore, defaults.qualityScore),
    source: draft.source,
  };
}
