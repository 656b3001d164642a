import { PLATFORMS, type Platform } from "../../common/src/types.js";
import type { ExportItem } from "./items.js";

export const PLATFORM_LABELS: Record<Platform, string> = {
  blog: "Blog Posts",
  instagram: "Instagram Posts",
  facebook: "Facebook Posts",
  tiktok: "TikTok Scripts",
  linkedin: "LinkedIn Posts",
  youtube: "YouTube Outlines",
};

export interface CopyField {
  id: string;
  label: string;
  value: string;
}

export interface CopyEntry {
  heading: string;
  scheduledTime: string | null;
  status: string;
  fields: CopyField[];
}

export interface CopySection {
  platform: Platform;
  label: string;
  count: number;
  entries: CopyEntry[];
}

export interface CopyPasteView {
  weekId: string | null;
  generatedAt: string;
  total: number;
  sections: CopySection[];
}

function hashtagLine(item: ExportItem): string {
  return item.hashtags.map((tag) => (tag.startsWith("#") ? tag : `#${tag.replace(/\s+/g, "")}`)).join(" ");
}

function fieldsFor(item: ExportItem, index: number): CopyField[] {
  const prefix = `${item.platform}-${index + 1}`;

  if (item.platform === "blog") {
    return [
      { id: `${prefix}-title`, label: "Title", value: item.title },
      { id: `${prefix}-body`, label: "HTML Content", value: item.body },
      { id: `${prefix}-summary`, label: "Meta Description", value: item.summary ?? "" },
      { id: `${prefix}-tags`, label: "Tags", value: item.keywords.join(", ") },
    ];
  }

  const fields: CopyField[] = [{ id: `${prefix}-content`, label: "Content", value: item.body }];
  const hashtags = hashtagLine(item);
  if (hashtags.length > 0) {
    fields.push({ id: `${prefix}-hashtags`, label: "Hashtags", value: hashtags });
  }
  return fields;
}

/** Groups items by platform in the fixed platform order; escaping is left to the template. */
export function buildCopyPasteView(
  items: readonly ExportItem[],
  options: { weekId: string | null; generatedAt: Date },
): CopyPasteView {
  const sections = PLATFORMS.map((platform): CopySection => {
    const matching = items.filter((item) => item.platform === platform);
    return {
      platform,
      label: PLATFORM_LABELS[platform],
      count: matching.length,
      entries: matching.map((item, index) => ({
        heading: item.title,
        scheduledTime: item.scheduledTime,
        status: item.status,
        fields: fieldsFor(item, index),
      })),
    };
  });

  return {
    weekId: options.weekId,
    generatedAt: options.generatedAt.toISOString(),
    total: items.length,
    sections,
  };
}
