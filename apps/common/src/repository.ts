import { getDb, withTransaction } from "./db.js";
import {
  GENERATION_SOURCES,
  POST_TYPES,
  SEASONS,
  type ContentItem,
  type ContentStatus,
  type ContentType,
  type HolidayRecord,
  type LocalDateTime,
  type WeeklyPackage,
  isContentStatus,
  isPlatform,
} from "./types.js";

interface ContentRow {
  id: string;
  title: string;
  body: string;
  platform: string;
  content_type: string;
  status: string;
  scheduled_time: string | null;
  keywords: string;
  hashtags: string;
  media_suggestions: string;
  generation_source: string;
  created_at: string;
  updated_at: string;
  week_id: string | null;
  holiday_context: string | null;
  summary: string | null;
  quality_score: number | null;
}

interface WeeklyPackageRow {
  week_id: string;
  start_date: string;
  end_date: string;
  season: string;
  holidays: string;
  theme: string;
  status: string;
  created_at: string;
  updated_at: string;
}

const CONTENT_TYPES: readonly string[] = [
  "blog_post",
  "video_outline",
  "video_script",
  "linkedin_post",
  ...POST_TYPES,
];

const CONTENT_ORDER = "ORDER BY scheduled_time ASC, created_at ASC, id ASC";

function parseStringList(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed)) {
      return parsed.filter((value): value is string => typeof value === "string");
    }
  } catch {
    return [];
  }
  return [];
}

function parseHolidays(raw: string): HolidayRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) {
    return [];
  }

  const holidays: HolidayRecord[] = [];
  for (const entry of parsed) {
    if (!isRecord(entry)) {
      continue;
    }
    const { date, name, focus, theme } = entry;
    if (
      typeof date === "string" &&
      typeof name === "string" &&
      typeof focus === "string" &&
      typeof theme === "string"
    ) {
      holidays.push({ date, name, focus, theme });
    }
  }
  return holidays;
}

function isContentType(value: string): value is ContentType {
  return CONTENT_TYPES.includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function mapContentRow(row: ContentRow): ContentItem {
  if (!isPlatform(row.platform)) {
    throw new Error(`unknown platform in store: ${row.platform}`);
  }
  if (!isContentStatus(row.status)) {
    throw new Error(`unknown status in store: ${row.status}`);
  }
  if (!isContentType(row.content_type)) {
    throw new Error(`unknown content type in store: ${row.content_type}`);
  }
  const generationSource = GENERATION_SOURCES.find((source) => source === row.generation_source);

  return {
    id: row.id,
    title: row.title,
    body: row.body,
    platform: row.platform,
    contentType: row.content_type,
    status: row.status,
    scheduledTime: row.scheduled_time,
    keywords: parseStringList(row.keywords),
    hashtags: parseStringList(row.hashtags),
    mediaSuggestions: parseStringList(row.media_suggestions),
    generationSource: generationSource ?? "fallback",
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    weekId: row.week_id,
    holidayContext: row.holiday_context,
    summary: row.summary,
    qualityScore: row.quality_score,
  };
}

function mapWeeklyPackageRow(row: WeeklyPackageRow): WeeklyPackage {
  const season = SEASONS.find((value) => value === row.season);
  if (!season) {
    throw new Error(`unknown season in store: ${row.season}`);
  }

  return {
    weekId: row.week_id,
    startDate: row.start_date,
    endDate: row.end_date,
    season,
    holidays: parseHolidays(row.holidays),
    theme: row.theme,
    status: row.status === "archived" ? "archived" : "generated",
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/** Insert-or-replace by id. Every column is overwritten, created_at included. */
export async function saveContentItem(item: ContentItem): Promise<void> {
  const db = getDb();
  db.prepare<[ContentRow]>(
    `INSERT OR REPLACE INTO content_items (
      id, title, body, platform, content_type, status, scheduled_time,
      keywords, hashtags, media_suggestions, generation_source,
      created_at, updated_at, week_id, holiday_context, summary, quality_score
    ) VALUES (
      @id, @title, @body, @platform, @content_type, @status, @scheduled_time,
      @keywords, @hashtags, @media_suggestions, @generation_source,
      @created_at, @updated_at, @week_id, @holiday_context, @summary, @quality_score
    )`,
  ).run({
    id: item.id,
    title: item.title,
    body: item.body,
    platform: item.platform,
    content_type: item.contentType,
    status: item.status,
    scheduled_time: item.scheduledTime,
    keywords: JSON.stringify(item.keywords),
    hashtags: JSON.stringify(item.hashtags),
    media_suggestions: JSON.stringify(item.mediaSuggestions),
    generation_source: item.generationSource,
    created_at: item.createdAt.toISOString(),
    updated_at: item.updatedAt.toISOString(),
    week_id: item.weekId,
    holiday_context: item.holidayContext,
    summary: item.summary,
    quality_score: item.qualityScore,
  });
}

export async function getContentItem(id: string): Promise<ContentItem | null> {
  const db = getDb();
  const row = db
    .prepare<[string], ContentRow>("SELECT * FROM content_items WHERE id = ?")
    .get(id);
  return row ? mapContentRow(row) : null;
}

export async function listContentByWeek(weekId: string): Promise<ContentItem[]> {
  const db = getDb();
  const rows = db
    .prepare<[string], ContentRow>(`SELECT * FROM content_items WHERE week_id = ? ${CONTENT_ORDER}`)
    .all(weekId);
  return rows.map((row) => mapContentRow(row));
}

/** Both bounds inclusive, compared as wall-clock `YYYY-MM-DDTHH:mm:ss` strings. */
export async function listContentByRange(
  start: LocalDateTime,
  end: LocalDateTime,
): Promise<ContentItem[]> {
  const db = getDb();
  const rows = db
    .prepare<[string, string], ContentRow>(
      `SELECT * FROM content_items
       WHERE scheduled_time IS NOT NULL AND scheduled_time >= ? AND scheduled_time <= ?
       ${CONTENT_ORDER}`,
    )
    .all(start, end);
  return rows.map((row) => mapContentRow(row));
}

export async function updateContentStatus(
  id: string,
  status: ContentStatus,
  updatedAt: Date,
): Promise<ContentItem | null> {
  const row = withTransaction((db) => {
    const result = db
      .prepare<[string, string, string]>(
        "UPDATE content_items SET status = ?, updated_at = ? WHERE id = ?",
      )
      .run(status, updatedAt.toISOString(), id);

    if (result.changes === 0) {
      return undefined;
    }
    return db.prepare<[string], ContentRow>("SELECT * FROM content_items WHERE id = ?").get(id);
  });

  return row ? mapContentRow(row) : null;
}

/** Upsert by week id; the first run's created_at is kept. */
export async function saveWeeklyPackage(pkg: WeeklyPackage): Promise<void> {
  const db = getDb();
  db.prepare<[WeeklyPackageRow]>(
    `INSERT INTO weekly_packages (
      week_id, start_date, end_date, season, holidays, theme, status, created_at, updated_at
    ) VALUES (
      @week_id, @start_date, @end_date, @season, @holidays, @theme, @status, @created_at, @updated_at
    )
    ON CONFLICT (week_id) DO UPDATE SET
      start_date = excluded.start_date,
      end_date = excluded.end_date,
      season = excluded.season,
      holidays = excluded.holidays,
      theme = excluded.theme,
      status = excluded.status,
      updated_at = excluded.updated_at`,
  ).run({
    week_id: pkg.weekId,
    start_date: pkg.startDate,
    end_date: pkg.endDate,
    season: pkg.season,
    holidays: JSON.stringify(pkg.holidays),
    theme: pkg.theme,
    status: pkg.status,
    created_at: pkg.createdAt.toISOString(),
    updated_at: pkg.updatedAt.toISOString(),
  });
}

export async function getWeeklyPackage(weekId: string): Promise<WeeklyPackage | null> {
  const db = getDb();
  const row = db
    .prepare<[string], WeeklyPackageRow>("SELECT * FROM weekly_packages WHERE week_id = ?")
    .get(weekId);
  return row ? mapWeeklyPackageRow(row) : null;
}

export async function countContentByStatus(): Promise<Record<ContentStatus, number>> {
  const db = getDb();
  const rows = db
    .prepare<[], { status: string; total: number }>(
      "SELECT status, COUNT(*) AS total FROM content_items GROUP BY status",
    )
    .all();

  const counts: Record<ContentStatus, number> = {
    draft: 0,
    preview: 0,
    approved: 0,
    scheduled: 0,
    published: 0,
    failed: 0,
  };
  for (const row of rows) {
    if (isContentStatus(row.status)) {
      counts[row.status] = row.total;
    }
  }
  return counts;
}

export function pingDatabase(): boolean {
  const db = getDb();
  const row = db.prepare<[], { ok: number }>("SELECT 1 AS ok").get();
  return row?.ok === 1;
}

export function listMissingTables(required: readonly string[]): string[] {
  const db = getDb();
  const statement = db.prepare<[string], { ok: number }>(
    "SELECT 1 AS ok FROM sqlite_master WHERE type = 'table' AND name = ? LIMIT 1",
  );
  return required.filter((tableName) => statement.get(tableName) === undefined);
}
