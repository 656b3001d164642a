import { z } from "zod";
import { failure, type ServiceResult } from "../../common/src/errors.js";
import { CONTENT_STATUSES, PLATFORMS, type ContentStatus, type Platform } from "../../common/src/types.js";

/** Arrays pass through; comma-separated strings are split. */
const StringList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (typeof value === "string" ? value.split(",") : value)
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

// Accepts both the item views this service returns and the snake_case shape
// older dashboard scripts post.
export const ExportItemSchema = z
  .object({
    id: z.string().optional(),
    title: z.string().trim().min(1),
    body: z.string().optional(),
    content: z.string().optional(),
    summary: z.string().nullable().optional(),
    meta_description: z.string().optional(),
    platform: z.string().trim().toLowerCase().pipe(z.enum(PLATFORMS)),
    status: z.enum(CONTENT_STATUSES).default("draft"),
    keywords: StringList.default([]),
    hashtags: StringList.default([]),
    scheduledTime: z.string().nullable().optional(),
    scheduled_time: z.string().optional(),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
  })
  .transform((raw) => ({
    id: raw.id ?? null,
    title: raw.title,
    body: raw.body ?? raw.content ?? "",
    summary: raw.summary ?? raw.meta_description ?? null,
    platform: raw.platform,
    status: raw.status,
    keywords: raw.keywords,
    hashtags: raw.hashtags,
    scheduledTime: raw.scheduledTime ?? raw.scheduled_time ?? null,
    createdAt: raw.createdAt ?? null,
    updatedAt: raw.updatedAt ?? null,
  }));

export interface ExportItem {
  id: string | null;
  title: string;
  body: string;
  summary: string | null;
  platform: Platform;
  status: ContentStatus;
  keywords: string[];
  hashtags: string[];
  scheduledTime: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

const ExportRequestSchema = z.object({
  items: z.array(z.unknown()).optional(),
  blog_posts: z.array(z.unknown()).optional(),
  content_pieces: z.array(z.unknown()).optional(),
  week_id: z.string().trim().min(1).optional(),
});

export interface ExportRequest {
  items: ExportItem[];
  weekId: string | null;
}

export function parseExportRequest(body: unknown): ServiceResult<ExportRequest> {
  const envelope = ExportRequestSchema.safeParse(body ?? {});
  if (!envelope.success) {
    return failure("invalid_input", "invalid payload: items must be an array");
  }

  const rawItems = envelope.data.items ?? envelope.data.blog_posts ?? envelope.data.content_pieces ?? [];
  const items = z.array(ExportItemSchema).safeParse(rawItems);
  if (!items.success) {
    return failure(
      "invalid_input",
      `invalid items: ${items.error.issues
        .map((issue) => `${["items", ...issue.path].join(".")}: ${issue.message}`)
        .join(", ")}`,
    );
  }

  const parsed: ExportItem[] = items.data;
  return { success: true, items: parsed, weekId: envelope.data.week_id ?? null };
}
