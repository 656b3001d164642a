import type {
  ContentItem,
  ContentStatus,
  ContentType,
  GenerationSource,
  HolidayRecord,
  Platform,
  Season,
  WeeklyPackage,
} from "./types.js";
import { sliceCodePoints } from "./template.js";

export const BODY_PREVIEW_CHARS = 200;

export interface ContentItemView {
  id: string;
  title: string;
  body: string;
  platform: Platform;
  contentType: ContentType;
  status: ContentStatus;
  scheduledTime: string | null;
  keywords: string[];
  hashtags: string[];
  mediaSuggestions: string[];
  generationSource: GenerationSource;
  createdAt: string;
  updatedAt: string;
  weekId: string | null;
  holidayContext: string | null;
  summary: string | null;
  qualityScore: number | null;
}

export interface WeeklyPackageView {
  weekId: string;
  startDate: string;
  endDate: string;
  season: Season;
  holidays: HolidayRecord[];
  theme: string;
  status: WeeklyPackage["status"];
  createdAt: string;
  updatedAt: string;
}

export function previewBody(body: string, limit = BODY_PREVIEW_CHARS): string {
  return body.length > limit ? `${sliceCodePoints(body, limit)}...` : body;
}

export function toContentView(item: ContentItem, options?: { preview?: boolean }): ContentItemView {
  return {
    id: item.id,
    title: item.title,
    body: options?.preview ? previewBody(item.body) : item.body,
    platform: item.platform,
    contentType: item.contentType,
    status: item.status,
    scheduledTime: item.scheduledTime,
    keywords: item.keywords,
    hashtags: item.hashtags,
    mediaSuggestions: item.mediaSuggestions,
    generationSource: item.generationSource,
    createdAt: item.createdAt.toISOString(),
    updatedAt: item.updatedAt.toISOString(),
    weekId: item.weekId,
    holidayContext: item.holidayContext,
    summary: item.summary,
    qualityScore: item.qualityScore,
  };
}

export function toWeeklyPackageView(pkg: WeeklyPackage): WeeklyPackageView {
  return {
    ...pkg,
    createdAt: pkg.createdAt.toISOString(),
    updatedAt: pkg.updatedAt.toISOString(),
  };
}

export function countByPlatform(items: ReadonlyArray<{ platform: Platform }>): Partial<Record<Platform, number>> {
  const breakdown: Partial<Record<Platform, number>> = {};
  for (const item of items) {
    breakdown[item.platform] = (breakdown[item.platform] ?? 0) + 1;
  }
  return breakdown;
}
