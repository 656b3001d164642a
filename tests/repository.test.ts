import { afterAll, beforeEach, describe, expect, it } from "vitest";
import { getDb, resetDbForTests } from "../apps/common/src/db.js";
import {
  countContentByStatus,
  getContentItem,
  getWeeklyPackage,
  listContentByRange,
  listContentByWeek,
  listMissingTables,
  pingDatabase,
  saveContentItem,
  saveWeeklyPackage,
  updateContentStatus,
} from "../apps/common/src/repository.js";
import type { WeeklyPackage } from "../apps/common/src/types.js";
import { runMigration } from "../db/migrate.js";
import { freshDatabase, sampleItem } from "./helpers.js";

function samplePackage(overrides?: Partial<WeeklyPackage>): WeeklyPackage {
  return {
    weekId: "week_2025_12_22",
    startDate: "2025-12-22",
    endDate: "2025-12-28",
    season: "winter",
    holidays: [
      {
        date: "2025-12-25",
        name: "Christmas",
        focus: "gift-giving for gardeners and holiday plant care",
        theme: "Christmas Garden Gifts",
      },
    ],
    theme: "Christmas Garden Gifts",
    status: "generated",
    createdAt: new Date("2025-12-22T06:00:00.000Z"),
    updatedAt: new Date("2025-12-22T06:00:00.000Z"),
    ...overrides,
  };
}

describe("content store", () => {
  beforeEach(async () => {
    await freshDatabase();
  });

  afterAll(() => {
    resetDbForTests();
  });

  it("applies migrations once", async () => {
    expect(await runMigration()).toEqual([]);
    expect(pingDatabase()).toBe(true);
    expect(listMissingTables(["schema_migrations", "content_items", "weekly_packages", "nope"])).toEqual([
      "nope",
    ]);
  });

  it("round-trips an item with list order preserved", async () => {
    const item = sampleItem({
      keywords: ["zinnia", "aster", "marigold"],
      mediaSuggestions: ["b roll", "a roll"],
    });
    await saveContentItem(item);

    expect(await getContentItem("item-1")).toEqual(item);
    expect(await getContentItem("missing")).toBeNull();
  });

  it("replaces every field on re-save, including the creation time", async () => {
    await saveContentItem(sampleItem());
    const replacement = sampleItem({
      title: "Replaced",
      status: "approved",
      keywords: [],
      summary: null,
      qualityScore: null,
      createdAt: new Date("2025-07-02T00:00:00.000Z"),
    });
    await saveContentItem(replacement);

    expect(await getContentItem("item-1")).toEqual(replacement);
  });

  it("lists a week in scheduled order", async () => {
    await saveContentItem(sampleItem({ id: "late", scheduledTime: "2025-07-08T15:00:00" }));
    await saveContentItem(sampleItem({ id: "early", scheduledTime: "2025-07-07T09:00:00" }));
    await saveContentItem(sampleItem({ id: "other-week", weekId: "week_2025_07_14" }));

    const items = await listContentByWeek("week_2025_07_07");
    expect(items.map((item) => item.id)).toEqual(["early", "late"]);
  });

  it("includes both bounds of a range", async () => {
    await saveContentItem(sampleItem({ id: "before", scheduledTime: "2025-07-06T23:59:59" }));
    await saveContentItem(sampleItem({ id: "start", scheduledTime: "2025-07-07T00:00:00" }));
    await saveContentItem(sampleItem({ id: "end", scheduledTime: "2025-07-08T23:59:59" }));
    await saveContentItem(sampleItem({ id: "after", scheduledTime: "2025-07-09T00:00:00" }));
    await saveContentItem(sampleItem({ id: "unscheduled", scheduledTime: null }));

    const items = await listContentByRange("2025-07-07T00:00:00", "2025-07-08T23:59:59");
    expect(items.map((item) => item.id)).toEqual(["start", "end"]);
  });

  it("updates status and bumps the update time", async () => {
    await saveContentItem(sampleItem());
    const updatedAt = new Date("2025-07-03T12:00:00.000Z");

    const updated = await updateContentStatus("item-1", "preview", updatedAt);
    expect(updated?.status).toBe("preview");
    expect(updated?.updatedAt).toEqual(updatedAt);
    expect(updated?.createdAt).toEqual(new Date("2025-07-01T08:00:00.000Z"));
    expect(await updateContentStatus("missing", "preview", updatedAt)).toBeNull();
  });

  it("counts items per status", async () => {
    await saveContentItem(sampleItem({ id: "a" }));
    await saveContentItem(sampleItem({ id: "b", status: "published" }));

    expect(await countContentByStatus()).toEqual({
      draft: 1,
      preview: 0,
      approved: 0,
      scheduled: 0,
      published: 1,
      failed: 0,
    });
  });

  it("upserts weekly packages and keeps the first creation time", async () => {
    await saveWeeklyPackage(samplePackage());
    await saveWeeklyPackage(
      samplePackage({
        createdAt: new Date("2025-12-29T06:00:00.000Z"),
        updatedAt: new Date("2025-12-29T06:00:00.000Z"),
      }),
    );

    const stored = await getWeeklyPackage("week_2025_12_22");
    expect(stored).toEqual(
      samplePackage({ updatedAt: new Date("2025-12-29T06:00:00.000Z") }),
    );
    expect(await getWeeklyPackage("week_2030_01_07")).toBeNull();
  });

  it("links items to weeks by id only", async () => {
    await saveContentItem(sampleItem({ id: "orphan", weekId: "week_2030_01_07" }));

    expect(getDb().pragma("foreign_keys", { simple: true })).toBe(0);
    expect((await listContentByWeek("week_2030_01_07")).map((item) => item.id)).toEqual(["orphan"]);
    expect(await getWeeklyPackage("week_2030_01_07")).toBeNull();
  });
});
