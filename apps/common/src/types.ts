export const CONTENT_STATUSES = [
  "draft",
  "preview",
  "approved",
  "scheduled",
  "published",
  "failed",
] as const;

export const PLATFORMS = [
  "blog",
  "instagram",
  "facebook",
  "tiktok",
  "linkedin",
  "youtube",
] as const;

export const SEASONS = ["spring", "summer", "fall", "winter"] as const;

export const POST_TYPES = [
  "educational_tip",
  "product_spotlight",
  "community_question",
  "seasonal_advice",
  "behind_scenes",
] as const;

export const GENERATION_SOURCES = ["remote", "fallback"] as const;

export type ContentStatus = (typeof CONTENT_STATUSES)[number];
export type Platform = (typeof PLATFORMS)[number];
export type Season = (typeof SEASONS)[number];
export type PostType = (typeof POST_TYPES)[number];
export type GenerationSource = (typeof GENERATION_SOURCES)[number];

export type ContentType =
  | "blog_post"
  | "video_outline"
  | "video_script"
  | "linkedin_post"
  | PostType;

/** Wall-clock local time, `YYYY-MM-DDTHH:mm:ss`. */
export type LocalDateTime = string;

/** Calendar date, `YYYY-MM-DD`. */
export type CalendarDateString = string;

export interface HolidayRecord {
  date: CalendarDateString;
  name: string;
  focus: string;
  theme: string;
}

export interface ContentItem {
  id: string;
  title: string;
  body: string;
  platform: Platform;
  contentType: ContentType;
  status: ContentStatus;
  scheduledTime: LocalDateTime | null;
  keywords: string[];
  hashtags: string[];
  mediaSuggestions: string[];
  generationSource: GenerationSource;
  createdAt: Date;
  updatedAt: Date;
  weekId: string | null;
  holidayContext: string | null;
  summary: string | null;
  qualityScore: number | null;
}

export type WeeklyPackageStatus = "generated" | "archived";

export interface WeeklyPackage {
  weekId: string;
  startDate: CalendarDateString;
  endDate: CalendarDateString;
  season: Season;
  holidays: HolidayRecord[];
  theme: string;
  status: WeeklyPackageStatus;
  createdAt: Date;
  updatedAt: Date;
}

export function isContentStatus(value: string): value is ContentStatus {
  return CONTENT_STATUSES.some((status) => status === value);
}

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}
