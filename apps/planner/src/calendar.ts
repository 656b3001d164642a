import type {
  CalendarDateString,
  HolidayRecord,
  LocalDateTime,
  Season,
} from "../../common/src/types.js";
import { WEEKDAYS, type CalendarConfig, type Weekday } from "./config.js";

// Calendar dates are Date values pinned to UTC midnight so host time zones never shift them.
const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function isValidClock(hour: number, minute: number, second: number): boolean {
  return hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59 && second >= 0 && second <= 59;
}

interface ParsedStamp {
  date: Date;
  hasTime: boolean;
  hour: number;
  minute: number;
  second: number;
}

function parseStamp(input: string): ParsedStamp | null {
  const match = DATE_PATTERN.exec(input.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hasTime = match[4] !== undefined;
  const hour = hasTime ? Number(match[4]) : 0;
  const minute = hasTime ? Number(match[5]) : 0;
  const second = match[6] !== undefined ? Number(match[6]) : 0;

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    !isValidClock(hour, minute, second)
  ) {
    return null;
  }

  return { date, hasTime, hour, minute, second };
}

/**
 * Accepts `YYYY-MM-DD` or `YYYY-MM-DDTHH:mm[:ss]`; any time part is dropped.
 * Returns null for malformed or impossible dates such as 2025-02-30.
 */
export function parseCalendarDate(input: string): Date | null {
  return parseStamp(input)?.date ?? null;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Zero for Monday through six for Sunday. */
export function weekdayIndex(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

export function weekdayName(date: Date): Weekday {
  return WEEKDAYS[weekdayIndex(date)];
}

export function mondayOf(date: Date): Date {
  const midnight = new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
  return addDays(midnight, -weekdayIndex(midnight));
}

export function isoWeek(date: Date): number {
  const target = new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
  // The ISO week belongs to the year holding its Thursday.
  const thursday = addDays(target, 3 - weekdayIndex(target));
  const yearStart = new Date(Date.UTC(thursday.getUTCFullYear(), 0, 1));
  return Math.floor((thursday.getTime() - yearStart.getTime()) / DAY_MS / 7) + 1;
}

export function formatDate(date: Date, separator = "-"): CalendarDateString {
  return [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
  ].join(separator);
}

export function atTime(date: Date, hour: number): LocalDateTime {
  return `${formatDate(date)}T${pad(hour)}:00:00`;
}

export function weekId(date: Date): string {
  return `week_${formatDate(mondayOf(date), "_")}`;
}

export function seasonOf(date: Date): Season {
  const month = date.getUTCMonth() + 1;
  if (month >= 3 && month <= 5) {
    return "spring";
  }
  if (month >= 6 && month <= 8) {
    return "summer";
  }
  if (month >= 9 && month <= 11) {
    return "fall";
  }
  return "winter";
}

export function holidaysInWeek(config: CalendarConfig, weekStart: Date): HolidayRecord[] {
  const matches: HolidayRecord[] = [];

  for (let offset = 0; offset <= 6; offset += 1) {
    const current = addDays(weekStart, offset);
    const month = current.getUTCMonth() + 1;
    const day = current.getUTCDate();
    const holiday = config.holidays.find((entry) => entry.month === month && entry.day === day);

    if (holiday) {
      matches.push({
        date: formatDate(current),
        name: holiday.name,
        focus: holiday.focus,
        theme: holiday.theme,
      });
    }
  }

  return matches;
}

export function weekTheme(config: CalendarConfig, weekStart: Date): string {
  const [firstHoliday] = holidaysInWeek(config, weekStart);
  if (firstHoliday) {
    return firstHoliday.theme;
  }

  const themes = config.seasonalThemes[seasonOf(weekStart)];
  return themes[isoWeek(weekStart) % themes.length];
}

export function dailyThemeOf(config: CalendarConfig, date: Date): string {
  return config.dailyThemes[weekdayName(date)] ?? config.defaultDailyTheme;
}

/**
 * Normalizes a range bound to `YYYY-MM-DDTHH:mm:ss`. A date-only end bound
 * covers the whole day.
 */
export function parseRangeBound(input: string, edge: "start" | "end"): LocalDateTime | null {
  const stamp = parseStamp(input);
  if (!stamp) {
    return null;
  }

  const day = formatDate(stamp.date);
  if (!stamp.hasTime) {
    return edge === "start" ? `${day}T00:00:00` : `${day}T23:59:59`;
  }
  return `${day}T${pad(stamp.hour)}:${pad(stamp.minute)}:${pad(stamp.second)}`;
}
