import type { ContentItem, ContentStatus, Platform, WeeklyPackage } from "../../common/src/types.js";
import {
  countByPlatform,
  toContentView,
  toWeeklyPackageView,
  type ContentItemView,
  type WeeklyPackageView,
} from "../../common/src/views.js";

export interface WeekExport {
  weekId: string;
  exportDate: string;
  totalPieces: number;
  platformBreakdown: Partial<Record<Platform, number>>;
  statusBreakdown: Partial<Record<ContentStatus, number>>;
  weeklyPackage: WeeklyPackageView | null;
  content: ContentItemView[];
}

export function buildWeekExport(
  weekId: string,
  items: readonly ContentItem[],
  weeklyPackage: WeeklyPackage | null,
  exportedAt: Date,
): WeekExport {
  const statusBreakdown: Partial<Record<ContentStatus, number>> = {};
  for (const item of items) {
    statusBreakdown[item.status] = (statusBreakdown[item.status] ?? 0) + 1;
  }

  return {
    weekId,
    exportDate: exportedAt.toISOString(),
    totalPieces: items.length,
    platformBreakdown: countByPlatform(items),
    statusBreakdown,
    weeklyPackage: weeklyPackage ? toWeeklyPackageView(weeklyPackage) : null,
    content: items.map((item) => toContentView(item)),
  };
}
