import { resetDbForTests } from "../apps/common/src/db.js";
import { resetEnvForTests } from "../apps/common/src/env.js";
import type { ContentItem } from "../apps/common/src/types.js";
import { loadCalendarConfig, type CalendarConfig } from "../apps/planner/src/config.js";
import { parseCalendarDate } from "../apps/planner/src/calendar.js";
import type { TextBackend } from "../apps/producer/src/backend.js";
import type { ContentPromptInput } from "../apps/producer/src/prompt.js";
import { runMigration } from "../db/migrate.js";

export function testConfig(): CalendarConfig {
  return loadCalendarConfig("./config/calendar.json");
}

export function day(input: string): Date {
  const parsed = parseCalendarDate(input);
  if (!parsed) {
    throw new Error(`bad test date: ${input}`);
  }
  return parsed;
}

/** Answers the self-test, then hands every content prompt input to `reply`. */
export function fakeBackend(
  reply: (input: ContentPromptInput) => Promise<string>,
): TextBackend & { calls: string[] } {
  const calls: string[] = [];
  return {
    name: "fake-model",
    calls,
    async ping() {
      calls.push("ping");
      return "ready";
    },
    async generateContent(input) {
      calls.push(`content:${input.title}`);
      return reply(input);
    },
  };
}

export async function freshDatabase(): Promise<void> {
  process.env.SQLITE_DB_PATH = ":memory:";
  resetEnvForTests();
  resetDbForTests();
  await runMigration();
}

export function sampleItem(overrides?: Partial<ContentItem>): ContentItem {
  return {
    id: "item-1",
    title: "Spring Garden Tips & Tricks!",
    body: "<h1>Spring Garden Tips</h1><p>Feed the soil first.</p>",
    platform: "blog",
    contentType: "blog_post",
    status: "draft",
    scheduledTime: "2025-07-07T09:00:00",
    keywords: ["soil health", "organic fertilizer", "plant food"],
    hashtags: [],
    mediaSuggestions: ["Hero image of a spring bed"],
    generationSource: "fallback",
    createdAt: new Date("2025-07-01T08:00:00.000Z"),
    updatedAt: new Date("2025-07-01T08:00:00.000Z"),
    weekId: "week_2025_07_07",
    holidayContext: "summer gardening - Week Kickoff & Planning",
    summary: "Feed the soil first.",
    qualityScore: 82,
    ...overrides,
  };
}
