import { randomUUID } from "node:crypto";
import { failure, normalizeError, type ServiceResult } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import { saveContentItem, saveWeeklyPackage } from "../../common/src/repository.js";
import type {
  ContentItem,
  GenerationSource,
  HolidayRecord,
  Platform,
  Season,
  WeeklyPackage,
} from "../../common/src/types.js";
import { countByPlatform, toContentView, type ContentItemView } from "../../common/src/views.js";
import { formatDate, parseCalendarDate, weekdayIndex } from "../../planner/src/calendar.js";
import type { CalendarConfig } from "../../planner/src/config.js";
import {
  buildDailyPlan,
  buildWeeklyPlan,
  type PlannedItem,
  type WeekContext,
} from "../../planner/src/plan.js";
import type { ContentGenerator } from "./generator.js";
import { requestFromPlannedItem } from "./prompt.js";

export interface ProducerStore {
  saveContentItem(item: ContentItem): Promise<void>;
  saveWeeklyPackage(pkg: WeeklyPackage): Promise<void>;
}

export interface ProducerDeps {
  config: CalendarConfig;
  generator: ContentGenerator;
  store?: ProducerStore;
  now?: () => Date;
  newId?: () => string;
}

export interface GenerationRunSummary {
  mode: "weekly" | "daily";
  weekId: string;
  date: string;
  weekStartDate: string;
  weekEndDate: string;
  season: Season;
  theme: string;
  holidays: HolidayRecord[];
  contentPieces: number;
  contentBreakdown: Partial<Record<Platform, number>>;
  generationSource: GenerationSource;
  failedCount: number;
  content: ContentItemView[];
}

export type GenerationRunResult = ServiceResult<GenerationRunSummary>;

const defaultStore: ProducerStore = { saveContentItem, saveWeeklyPackage };

interface RunOutcome {
  produced: ContentItem[];
  failedCount: number;
}

async function produceItems(
  planned: PlannedItem[],
  week: WeekContext,
  deps: ProducerDeps,
  runId: string,
): Promise<RunOutcome> {
  const store = deps.store ?? defaultStore;
  const now = deps.now ?? (() => new Date());
  const newId = deps.newId ?? randomUUID;
  const produced: ContentItem[] = [];
  let failedCount = 0;

  // One generation and one save per plan position, strictly in plan order.
  for (const [position, item] of planned.entries()) {
    try {
      const result = await deps.generator.generate(requestFromPlannedItem(deps.config, item));
      const timestamp = now();
      const contentItem: ContentItem = {
        id: newId(),
        title: item.title,
        body: result.body,
        platform: item.platform,
        contentType: item.contentType,
        status: "draft",
        scheduledTime: item.scheduledTime,
        keywords: item.keywords,
        hashtags: item.hashtags,
        mediaSuggestions: result.mediaSuggestions,
        generationSource: result.source,
        createdAt: timestamp,
        updatedAt: timestamp,
        weekId: week.weekId,
        holidayContext: item.holidayContext,
        summary: result.summary,
        qualityScore: result.qualityScore,
      };

      await store.saveContentItem(contentItem);
      produced.push(contentItem);
    } catch (error) {
      failedCount += 1;
      logger.error("content item failed", {
        runId,
        position,
        platform: item.platform,
        title: item.title,
        error: normalizeError(error),
      });
    }
  }

  return { produced, failedCount };
}

function batchSource(items: ContentItem[]): GenerationSource {
  return items.length > 0 && items.every((item) => item.generationSource === "remote")
    ? "remote"
    : "fallback";
}

function summarize(
  mode: GenerationRunSummary["mode"],
  date: Date,
  week: WeekContext,
  outcome: RunOutcome,
): GenerationRunSummary {
  return {
    mode,
    weekId: week.weekId,
    date: formatDate(date),
    weekStartDate: formatDate(week.weekStart),
    weekEndDate: formatDate(week.weekEnd),
    season: week.season,
    theme: week.theme,
    holidays: week.holidays,
    contentPieces: outcome.produced.length,
    contentBreakdown: countByPlatform(outcome.produced),
    generationSource: batchSource(outcome.produced),
    failedCount: outcome.failedCount,
    content: outcome.produced.map((item) => toContentView(item, { preview: true })),
  };
}

/** Generates the full week containing `date`, starting from its Monday. */
export async function generateWeek(date: Date, deps: ProducerDeps): Promise<GenerationRunResult> {
  const runId = randomUUID();
  const plan = buildWeeklyPlan(deps.config, date);
  const { week } = plan;

  logger.info("weekly run started", {
    runId,
    weekId: week.weekId,
    season: week.season,
    theme: week.theme,
    holidays: week.holidays.map((holiday) => holiday.name),
    plannedItems: plan.items.length,
  });

  const outcome = await produceItems(plan.items, week, deps, runId);

  const timestamp = (deps.now ?? (() => new Date()))();
  try {
    await (deps.store ?? defaultStore).saveWeeklyPackage({
      weekId: week.weekId,
      startDate: formatDate(week.weekStart),
      endDate: formatDate(week.weekEnd),
      season: week.season,
      holidays: week.holidays,
      theme: week.theme,
      status: "generated",
      createdAt: timestamp,
      updatedAt: timestamp,
    });
  } catch (error) {
    logger.error("weekly package save failed", {
      runId,
      weekId: week.weekId,
      error: normalizeError(error),
    });
  }

  const summary = summarize("weekly", week.weekStart, week, outcome);
  logger.info("weekly run completed", {
    runId,
    weekId: week.weekId,
    contentPieces: summary.contentPieces,
    failedCount: summary.failedCount,
    generationSource: summary.generationSource,
  });

  return { success: true, ...summary };
}

/** Generates a single day's package; no weekly package row is written. */
export async function generateDay(date: Date, deps: ProducerDeps): Promise<GenerationRunResult> {
  const runId = randomUUID();
  const plan = buildDailyPlan(deps.config, date);

  logger.info("daily run started", {
    runId,
    date: formatDate(date),
    weekId: plan.week.weekId,
    plannedItems: plan.items.length,
  });

  const outcome = await produceItems(plan.items, plan.week, deps, runId);
  const summary = summarize("daily", date, plan.week, outcome);

  logger.info("daily run completed", {
    runId,
    date: summary.date,
    contentPieces: summary.contentPieces,
    failedCount: summary.failedCount,
    generationSource: summary.generationSource,
  });

  return { success: true, ...summary };
}

/** Mondays produce the whole week; any other day produces that day only. */
export async function generateForDate(
  input: string,
  deps: ProducerDeps,
): Promise<GenerationRunResult> {
  const date = parseCalendarDate(input);
  if (!date) {
    return failure("invalid_input", `invalid date: ${input}`);
  }

  return weekdayIndex(date) === 0 ? generateWeek(date, deps) : generateDay(date, deps);
}

export async function generateWeekForInput(
  input: string,
  deps: ProducerDeps,
): Promise<GenerationRunResult> {
  const date = parseCalendarDate(input);
  if (!date) {
    return failure("invalid_input", `invalid date: ${input}`);
  }
  return generateWeek(date, deps);
}
