import {
  POST_TYPES,
  type CalendarDateString,
  type ContentType,
  type HolidayRecord,
  type LocalDateTime,
  type Platform,
  type PostType,
  type Season,
} from "../../common/src/types.js";
import { fillTemplate, titleCase } from "../../common/src/template.js";
import {
  addDays,
  atTime,
  dailyThemeOf,
  formatDate,
  holidaysInWeek,
  isoWeek,
  mondayOf,
  seasonOf,
  weekdayIndex,
  weekdayName,
  weekId,
  weekTheme,
} from "./calendar.js";
import type { CalendarConfig, Weekday } from "./config.js";

export interface WordCountBand {
  min: number;
  max: number;
}

export interface GenerationContext {
  date: CalendarDateString;
  dayName: Weekday;
  season: Season;
  theme: string;
  dailyTheme: string;
  postType: PostType | null;
  wordCount: WordCountBand;
  featuredProduct: string;
}

export interface PlannedItem {
  platform: Platform;
  contentType: ContentType;
  title: string;
  scheduledTime: LocalDateTime;
  keywords: string[];
  hashtags: string[];
  holidayContext: string;
  context: GenerationContext;
}

export interface WeekContext {
  weekId: string;
  weekStart: Date;
  weekEnd: Date;
  season: Season;
  theme: string;
  holidays: HolidayRecord[];
}

export interface WeeklyPlan {
  kind: "weekly";
  week: WeekContext;
  items: PlannedItem[];
}

export interface DailyPlan {
  kind: "daily";
  date: Date;
  week: WeekContext;
  items: PlannedItem[];
}

const SOCIAL_SLOTS: Record<"instagram" | "facebook", readonly number[]> = {
  instagram: [9, 13, 17],
  facebook: [10, 14, 18],
};

const SOCIAL_POSTS_PER_DAY = 3;
const BLOG_HOUR = 9;
const TIKTOK_HOUR = 15;
const LINKEDIN_HOUR = 11;
const YOUTUBE_HOUR = 10;
const PACKAGE_DAYS = 6;

const WORD_COUNTS: Record<Platform, WordCountBand> = {
  blog: { min: 700, max: 1000 },
  instagram: { min: 40, max: 90 },
  facebook: { min: 60, max: 140 },
  tiktok: { min: 100, max: 160 },
  linkedin: { min: 150, max: 250 },
  youtube: { min: 400, max: 700 },
};

const PLATFORM_LABELS: Record<Platform, string> = {
  blog: "Blog",
  instagram: "Instagram",
  facebook: "Facebook",
  tiktok: "TikTok",
  linkedin: "LinkedIn",
  youtube: "YouTube",
};

function brandTag(config: CalendarConfig): string {
  return config.brand.name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

export function hashtagsFor(config: CalendarConfig, platform: Platform, season: Season): string[] {
  const brand = brandTag(config);
  const seasonal = `${season}gardening`;

  switch (platform) {
    case "blog":
      return [];
    case "instagram":
      return [
        "organicgardening",
        brand,
        "plantcare",
        seasonal,
        "gardenlife",
        "growyourown",
        "sustainablegardening",
        "healthysoil",
        "gardenlovers",
        "plantparent",
      ];
    case "facebook":
      return ["organicgardening", brand, "sustainablegardening", "gardenlife", seasonal];
    case "tiktok":
      return ["gardentok", "organicgardening", brand, seasonal, "planttok", "gardeningtips"];
    case "linkedin":
      return ["SustainableAgriculture", "OrganicGrowing", "AgBusiness"];
    case "youtube":
      return [seasonal, "organicgardening", brand, "gardeningtips", "soilhealth"];
  }
}

export function resolveWeek(config: CalendarConfig, date: Date): WeekContext {
  const weekStart = mondayOf(date);
  return {
    weekId: weekId(weekStart),
    weekStart,
    weekEnd: addDays(weekStart, 6),
    season: seasonOf(weekStart),
    theme: weekTheme(config, weekStart),
    holidays: holidaysInWeek(config, weekStart),
  };
}

function holidayOn(week: WeekContext, date: Date): HolidayRecord | undefined {
  const day = formatDate(date);
  return week.holidays.find((holiday) => holiday.date === day);
}

function dayKeywords(config: CalendarConfig, date: Date, season: Season, dailyTheme: string): string[] {
  const base = config.dailyKeywords[weekdayName(date)] ?? [
    `${season} gardening`,
    dailyTheme.toLowerCase(),
  ];
  return [...base, ...config.targetKeywords.slice(0, 2)];
}

function blogTitle(config: CalendarConfig, date: Date, week: WeekContext): string {
  const values: Record<string, string> = {
    season: week.season,
    Season: titleCase(week.season),
    theme: week.theme,
  };

  const holiday = holidayOn(week, date);
  if (holiday) {
    return fillTemplate(config.blogTitles.holiday, {
      ...values,
      holiday: holiday.name,
      holidayTheme: holiday.theme,
    });
  }

  const options = config.blogTitles.byWeekday[weekdayName(date)] ?? config.blogTitles.default;
  return fillTemplate(options[isoWeek(date) % options.length], values);
}

/**
 * One day's package in publishing order: blog, Instagram x3, Facebook x3,
 * TikTok, LinkedIn.
 */
export function buildDailyPackage(
  config: CalendarConfig,
  date: Date,
  week: WeekContext,
): PlannedItem[] {
  const dayName = weekdayName(date);
  const dailyTheme = dailyThemeOf(config, date);
  const holiday = holidayOn(week, date);
  const holidayContext = holiday
    ? `${holiday.name} - ${holiday.focus}`
    : `${week.season} gardening - ${dailyTheme}`;
  const keywords = dayKeywords(config, date, week.season, dailyTheme);
  const products = config.brand.products;
  const featuredProduct = products[weekdayIndex(date) % products.length];

  const context = (platform: Platform, postType: PostType | null): GenerationContext => ({
    date: formatDate(date),
    dayName,
    season: week.season,
    theme: week.theme,
    dailyTheme,
    postType,
    wordCount: WORD_COUNTS[platform],
    featuredProduct,
  });

  const items: PlannedItem[] = [
    {
      platform: "blog",
      contentType: "blog_post",
      title: blogTitle(config, date, week),
      scheduledTime: atTime(date, BLOG_HOUR),
      keywords,
      hashtags: hashtagsFor(config, "blog", week.season),
      holidayContext,
      context: context("blog", null),
    },
  ];

  for (const platform of ["instagram", "facebook"] as const) {
    const slots = SOCIAL_SLOTS[platform];
    for (let index = 0; index < SOCIAL_POSTS_PER_DAY; index += 1) {
      const postType = POST_TYPES[index % POST_TYPES.length];
      items.push({
        platform,
        contentType: postType,
        title: `${dayName} ${PLATFORM_LABELS[platform]} Post ${index + 1} - ${titleCase(postType)}`,
        scheduledTime: atTime(date, slots[index % slots.length]),
        keywords: keywords.slice(0, 3),
        hashtags: hashtagsFor(config, platform, week.season),
        holidayContext,
        context: context(platform, postType),
      });
    }
  }

  items.push({
    platform: "tiktok",
    contentType: "video_script",
    title: `${dayName} TikTok Video Script - ${dailyTheme}`,
    scheduledTime: atTime(date, TIKTOK_HOUR),
    keywords: keywords.slice(0, 3),
    hashtags: hashtagsFor(config, "tiktok", week.season),
    holidayContext,
    context: context("tiktok", null),
  });

  items.push({
    platform: "linkedin",
    contentType: "linkedin_post",
    title: `${dayName} LinkedIn Post - ${dailyTheme}`,
    scheduledTime: atTime(date, LINKEDIN_HOUR),
    keywords: keywords.slice(0, 3),
    hashtags: hashtagsFor(config, "linkedin", week.season),
    holidayContext,
    context: context("linkedin", null),
  });

  return items;
}

function buildYoutubeOutline(config: CalendarConfig, week: WeekContext): PlannedItem {
  const [firstHoliday] = week.holidays;
  const title = firstHoliday
    ? `${firstHoliday.name} Garden Special: ${week.theme} Complete Guide`
    : `Complete ${titleCase(week.season)} Garden Mastery: ${week.theme} (60-Min Deep Dive)`;
  const holidayContext = firstHoliday
    ? `${firstHoliday.name} - ${firstHoliday.focus}`
    : `${week.season} gardening mastery`;
  const products = config.brand.products;

  return {
    platform: "youtube",
    contentType: "video_outline",
    title,
    scheduledTime: atTime(week.weekStart, YOUTUBE_HOUR),
    keywords: [...config.seasonalKeywords[week.season], ...config.targetKeywords.slice(0, 2)],
    hashtags: hashtagsFor(config, "youtube", week.season),
    holidayContext,
    context: {
      date: formatDate(week.weekStart),
      dayName: weekdayName(week.weekStart),
      season: week.season,
      theme: week.theme,
      dailyTheme: dailyThemeOf(config, week.weekStart),
      postType: null,
      wordCount: WORD_COUNTS.youtube,
      featuredProduct: products[0],
    },
  };
}

/** YouTube outline first, then Monday through Saturday packages. Sunday is never planned. */
export function buildWeeklyPlan(config: CalendarConfig, date: Date): WeeklyPlan {
  const week = resolveWeek(config, date);
  const items: PlannedItem[] = [buildYoutubeOutline(config, week)];

  for (let offset = 0; offset < PACKAGE_DAYS; offset += 1) {
    items.push(...buildDailyPackage(config, addDays(week.weekStart, offset), week));
  }

  return { kind: "weekly", week, items };
}

/** Single-day package; the season follows the requested date rather than its Monday. */
export function buildDailyPlan(config: CalendarConfig, date: Date): DailyPlan {
  const week = { ...resolveWeek(config, date), season: seasonOf(date) };
  return { kind: "daily", date, week, items: buildDailyPackage(config, date, week) };
}
