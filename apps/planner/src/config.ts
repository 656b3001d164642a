import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { getEnv } from "../../common/src/env.js";
import { logger } from "../../common/src/logger.js";

export const WEEKDAYS = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

const WeekdayTableKey = z.enum(WEEKDAYS);

const SeasonTable = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    spring: value,
    summer: value,
    fall: value,
    winter: value,
  });

const HolidaySchema = z.object({
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
  name: z.string().min(1),
  focus: z.string().min(1),
  theme: z.string().min(1),
});

export const CalendarConfigSchema = z
  .object({
    targetKeywords: z.array(z.string().min(1)).min(2),
    holidays: z.array(HolidaySchema),
    seasonalThemes: SeasonTable(z.array(z.string().min(1)).length(4)),
    dailyThemes: z.record(WeekdayTableKey, z.string().min(1)),
    defaultDailyTheme: z.string().min(1),
    dailyKeywords: z.record(WeekdayTableKey, z.array(z.string().min(1)).min(1)),
    seasonalKeywords: SeasonTable(z.array(z.string().min(1)).length(3)),
    blogTitles: z.object({
      holiday: z.string().min(1),
      byWeekday: z.record(WeekdayTableKey, z.array(z.string().min(1)).length(3)),
      default: z.array(z.string().min(1)).length(3),
    }),
    brand: z.object({
      name: z.string().min(1),
      voice: z.string().min(1),
      audience: z.string().min(1),
      products: z.array(z.string().min(1)).min(1),
      author: z.string().min(1),
    }),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.holidays.forEach((holiday, index) => {
      const key = `${holiday.month}-${holiday.day}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["holidays", index],
          message: `duplicate holiday date ${key}`,
        });
      }
      seen.add(key);
    });
  });

export type CalendarConfig = z.infer<typeof CalendarConfigSchema>;
export type HolidayDefinition = z.infer<typeof HolidaySchema>;

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function parseCalendarConfig(raw: unknown): CalendarConfig {
  const parsed = CalendarConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Invalid calendar config: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
    );
  }
  return deepFreeze(parsed.data);
}

export function loadCalendarConfig(filePath: string): CalendarConfig {
  const absolutePath = path.resolve(process.cwd(), filePath);
  const raw: unknown = JSON.parse(readFileSync(absolutePath, "utf8"));
  const config = parseCalendarConfig(raw);

  logger.debug("calendar config loaded", {
    path: absolutePath,
    holidays: config.holidays.length,
    targetKeywords: config.targetKeywords.length,
  });

  return config;
}

let cachedConfig: CalendarConfig | null = null;

export function getCalendarConfig(): CalendarConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = loadCalendarConfig(getEnv().CALENDAR_CONFIG_PATH);
  return cachedConfig;
}

export function resetCalendarConfigForTests(): void {
  cachedConfig = null;
}
