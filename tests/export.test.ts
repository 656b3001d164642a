import { describe, expect, it } from "vitest";
import { toContentView } from "../apps/common/src/views.js";
import { buildCopyPasteView } from "../apps/exporter/src/copy-paste.js";
import { csvFileName, CSV_COLUMNS, escapeCsvField, renderBlogCsv } from "../apps/exporter/src/csv.js";
import { toHandle } from "../apps/exporter/src/handle.js";
import { parseExportRequest, type ExportItem } from "../apps/exporter/src/items.js";
import { sampleItem } from "./helpers.js";

const exportedAt = new Date("2025-07-01T06:00:00.000Z");

function exportItem(overrides?: Partial<ExportItem>): ExportItem {
  return {
    id: null,
    title: "Spring Garden Tips & Tricks!",
    body: "<h1>Spring</h1><p>Feed the soil, then water.</p>",
    summary: null,
    platform: "blog",
    status: "draft",
    keywords: ["soil health", "compost"],
    hashtags: [],
    scheduledTime: null,
    createdAt: null,
    updatedAt: null,
    ...overrides,
  };
}

describe("toHandle", () => {
  it("slugs a title for the storefront", () => {
    expect(toHandle("Spring Garden Tips & Tricks!")).toBe("spring-garden-tips-tricks");
    expect(toHandle("  Fall -- Harvest   Time  ")).toBe("fall-harvest-time");
    expect(toHandle("Garden 101: Start Here")).toBe("garden-101-start-here");
  });

  it("caps handles at 255 characters", () => {
    expect(toHandle("a".repeat(300))).toHaveLength(255);
  });
});

describe("escapeCsvField", () => {
  it("quotes only when needed", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('Say "hi"')).toBe('"Say ""hi"""');
    expect(escapeCsvField("line\nbreak")).toBe('"line\nbreak"');
  });
});

describe("renderBlogCsv", () => {
  it("writes the header and one row per post with CRLF endings", () => {
    const csv = renderBlogCsv([exportItem()], { author: "Test Author", exportedAt });
    const lines = csv.split("\r\n");

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(CSV_COLUMNS.join(","));
    expect(lines[1]).toBe(
      [
        "Spring Garden Tips & Tricks!",
        '"<h1>Spring</h1><p>Feed the soil, then water.</p>"',
        '"Spring Feed the soil, then water."',
        "spring-garden-tips-tricks",
        "FALSE",
        '"soil health, compost"',
        "Test Author",
        "2025-07-01T06:00:00.000Z",
        "2025-07-01T06:00:00.000Z",
        "draft",
        "Spring Garden Tips & Tricks!",
        '"Spring Feed the soil, then water."',
      ].join(","),
    );
    expect(lines[2]).toBe("");
  });

  it("prefers the summary and keeps item timestamps", () => {
    const csv = renderBlogCsv(
      [
        exportItem({
          summary: "Feed the soil first.",
          status: "published",
          keywords: ["soil"],
          createdAt: "2025-06-30T10:00:00.000Z",
          updatedAt: "2025-06-30T11:00:00.000Z",
        }),
      ],
      { author: "Test Author", exportedAt },
    );
    const row = csv.split("\r\n")[1];

    expect(row).toBe(
      [
        "Spring Garden Tips & Tricks!",
        '"<h1>Spring</h1><p>Feed the soil, then water.</p>"',
        "Feed the soil first.",
        "spring-garden-tips-tricks",
        "TRUE",
        "soil",
        "Test Author",
        "2025-06-30T10:00:00.000Z",
        "2025-06-30T11:00:00.000Z",
        "published",
        "Spring Garden Tips & Tricks!",
        "Feed the soil first.",
      ].join(","),
    );
  });

  it("cuts long excerpts on a word boundary", () => {
    const body = `<p>${Array.from({ length: 50 }, () => "garden").join(" ")}</p>`;
    const row = renderBlogCsv([exportItem({ body, keywords: [] })], {
      author: "Test Author",
      exportedAt,
    }).split("\r\n")[1];
    const excerpt = `${Array.from({ length: 22 }, () => "garden").join(" ")}…`;

    expect(row?.split(",")[2]).toBe(excerpt);
    expect(row?.endsWith(`,${excerpt}`)).toBe(true);
  });

  it("names the file after the week or the export date", () => {
    expect(csvFileName("week_2025_07_07", exportedAt)).toBe("blog_posts_week_2025_07_07.csv");
    expect(csvFileName(null, exportedAt)).toBe("blog_posts_2025-07-01.csv");
  });
});

describe("parseExportRequest", () => {
  it("accepts snake_case posts under blog_posts", () => {
    const result = parseExportRequest({
      week_id: "week_2025_07_07",
      blog_posts: [
        {
          title: "Mulch Matters",
          content: "<p>Mulch early.</p>",
          meta_description: "Why mulch early",
          platform: "Blog",
          scheduled_time: "2025-07-07T09:00:00",
          keywords: "mulch, water wise,",
        },
      ],
    });

    expect(result).toEqual({
      success: true,
      weekId: "week_2025_07_07",
      items: [
        {
          id: null,
          title: "Mulch Matters",
          body: "<p>Mulch early.</p>",
          summary: "Why mulch early",
          platform: "blog",
          status: "draft",
          keywords: ["mulch", "water wise"],
          hashtags: [],
          scheduledTime: "2025-07-07T09:00:00",
          createdAt: null,
          updatedAt: null,
        },
      ],
    });
  });

  it("accepts the item views the API returns", () => {
    const view = toContentView(sampleItem({ status: "approved" }));
    const result = parseExportRequest({ items: [view] });

    expect(result).toMatchObject({
      success: true,
      weekId: null,
      items: [
        {
          id: "item-1",
          body: "<h1>Spring Garden Tips</h1><p>Feed the soil first.</p>",
          summary: "Feed the soil first.",
          status: "approved",
          scheduledTime: "2025-07-07T09:00:00",
          createdAt: "2025-07-01T08:00:00.000Z",
        },
      ],
    });
  });

  it("treats a missing body as an empty export", () => {
    expect(parseExportRequest(undefined)).toEqual({ success: true, items: [], weekId: null });
  });

  it("rejects a payload whose items are not an array", () => {
    expect(parseExportRequest({ items: "nope" })).toEqual({
      success: false,
      code: "invalid_input",
      error: "invalid payload: items must be an array",
    });
  });

  it("names the offending item field", () => {
    const missingTitle = parseExportRequest({ items: [{ platform: "blog" }] });
    expect(missingTitle.success).toBe(false);
    if (!missingTitle.success) {
      expect(missingTitle.code).toBe("invalid_input");
      expect(missingTitle.error).toMatch(/^invalid items: items\.0\.title: /);
    }

    const badPlatform = parseExportRequest({ content_pieces: [{ title: "Hi", platform: "myspace" }] });
    expect(badPlatform.success).toBe(false);
    if (!badPlatform.success) {
      expect(badPlatform.error).toMatch(/^invalid items: items\.0\.platform: /);
    }
  });
});

describe("buildCopyPasteView", () => {
  it("groups items by platform in a fixed order", () => {
    const view = buildCopyPasteView(
      [
        exportItem({ platform: "instagram", title: "IG Tip", body: "Water at dawn.", hashtags: ["garden", "#soil"] }),
        exportItem({ summary: "Feed the soil first." }),
        exportItem({ platform: "facebook", title: "FB Tip", body: "Compost now." }),
        exportItem({ platform: "instagram", title: "IG Tip 2", body: "Check for pests." }),
      ],
      { weekId: "week_2025_07_07", generatedAt: exportedAt },
    );

    expect(view.weekId).toBe("week_2025_07_07");
    expect(view.generatedAt).toBe("2025-07-01T06:00:00.000Z");
    expect(view.total).toBe(4);
    expect(view.sections.map((section) => [section.label, section.count])).toEqual([
      ["Blog Posts", 1],
      ["Instagram Posts", 2],
      ["Facebook Posts", 1],
      ["TikTok Scripts", 0],
      ["LinkedIn Posts", 0],
      ["YouTube Outlines", 0],
    ]);
  });

  it("lays out copy fields per platform", () => {
    const view = buildCopyPasteView(
      [
        exportItem({ summary: "Feed the soil first." }),
        exportItem({ platform: "instagram", title: "IG Tip", body: "Water at dawn.", hashtags: ["garden", "#soil"] }),
        exportItem({ platform: "facebook", title: "FB Tip", body: "Compost now." }),
      ],
      { weekId: null, generatedAt: exportedAt },
    );

    expect(view.sections[0]?.entries[0]?.fields).toEqual([
      { id: "blog-1-title", label: "Title", value: "Spring Garden Tips & Tricks!" },
      { id: "blog-1-body", label: "HTML Content", value: "<h1>Spring</h1><p>Feed the soil, then water.</p>" },
      { id: "blog-1-summary", label: "Meta Description", value: "Feed the soil first." },
      { id: "blog-1-tags", label: "Tags", value: "soil health, compost" },
    ]);
    expect(view.sections[1]?.entries[0]?.fields).toEqual([
      { id: "instagram-1-content", label: "Content", value: "Water at dawn." },
      { id: "instagram-1-hashtags", label: "Hashtags", value: "#garden #soil" },
    ]);
    expect(view.sections[2]?.entries[0]?.fields).toEqual([
      { id: "facebook-1-content", label: "Content", value: "Compost now." },
    ]);
  });
});
