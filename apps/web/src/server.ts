import express from "express";
import expressLayouts from "express-ejs-layouts";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { runMigration } from "../../../db/migrate.js";
import { getEnv } from "../../common/src/env.js";
import { normalizeError, type Failure, type FailureCode } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import { countContentByStatus, pingDatabase } from "../../common/src/repository.js";
import { toContentView, toWeeklyPackageView } from "../../common/src/views.js";
import { buildCopyPasteView } from "../../exporter/src/copy-paste.js";
import { csvFileName, renderBlogCsv } from "../../exporter/src/csv.js";
import { parseExportRequest } from "../../exporter/src/items.js";
import { buildWeekExport } from "../../exporter/src/week.js";
import { formatDate } from "../../planner/src/calendar.js";
import { getCalendarConfig, type CalendarConfig } from "../../planner/src/config.js";
import {
  changeContentStatus,
  findContent,
  findContentInRange,
  findWeekContent,
} from "../../producer/src/content.js";
import { createDefaultGenerator, type ContentGenerator } from "../../producer/src/generator.js";
import { generateForDate, generateWeekForInput } from "../../producer/src/producer.js";
import { publishContent } from "../../publisher/src/publish.js";
import { createShopifyPublisherFromEnv, type Publisher } from "../../publisher/src/shopify.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const AVAILABLE_ENDPOINTS = [
  "GET /",
  "GET /health",
  "GET /api/generator/status",
  "POST /api/generate-content",
  "POST /api/generate-weekly-content",
  "GET /api/content/:id",
  "GET /api/weekly-content/:weekId",
  "GET /api/content?start=&end=",
  "PATCH /api/content/:id/status",
  "POST /api/content/:id/publish",
  "GET /api/export-content/:weekId",
  "POST /api/export/csv",
  "POST /api/export/copy-paste",
] as const;

const FAILURE_STATUS: Record<FailureCode, number> = {
  invalid_input: 400,
  not_found: 404,
  conflict: 409,
  not_implemented: 501,
  upstream: 502,
  persistence: 500,
};

export interface AppDeps {
  config?: CalendarConfig;
  generator?: ContentGenerator;
  publisher?: Publisher;
  /** Overrides API_TOKEN; an empty string disables the bearer check. */
  apiToken?: string;
  now?: () => Date;
}

function sendFailure(res: express.Response, result: Failure): void {
  res.status(FAILURE_STATUS[result.code]).json({ success: false, error: result.error });
}

function readStringField(body: unknown, field: string): string | null {
  if (typeof body !== "object" || body === null || !(field in body)) {
    return null;
  }
  const value: unknown = Reflect.get(body, field);
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

function isJsonParseError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

function requireApiToken(token: string | undefined): express.RequestHandler {
  return (req, res, next) => {
    if (!token || req.method === "GET" || req.method === "HEAD") {
      next();
      return;
    }
    if (req.header("authorization") !== `Bearer ${token}`) {
      res.status(401).json({ success: false, error: "unauthorized" });
      return;
    }
    next();
  };
}

export function createApp(deps: AppDeps = {}): express.Express {
  const env = getEnv();
  const config = deps.config ?? getCalendarConfig();
  const generator = deps.generator ?? createDefaultGenerator();
  const publisher = deps.publisher ?? createShopifyPublisherFromEnv();
  const apiToken = deps.apiToken ?? env.API_TOKEN;
  const now = deps.now ?? (() => new Date());
  const producerDeps = { config, generator, now };

  const app = express();

  app.use(express.json({ limit: "5mb" }));
  app.use(expressLayouts);
  app.set("view engine", "ejs");
  app.set("views", path.join(__dirname, "../views"));
  app.set("layout", "layout");

  app.use("/api", requireApiToken(apiToken));

  app.get("/", async (_req, res) => {
    const counts = await countContentByStatus();
    res.render("index", {
      title: `${config.brand.name} Content Planner`,
      brand: config.brand,
      generator: generator.status(),
      counts,
      today: formatDate(now()),
    });
  });

  app.get("/health", (_req, res) => {
    let reachable = false;
    try {
      reachable = pingDatabase();
    } catch (error) {
      logger.warn("database ping failed", { error: normalizeError(error) });
    }

    const status = generator.status();
    res.json({
      status: reachable ? "healthy" : "degraded",
      timestamp: now().toISOString(),
      services: {
        remoteBackend: { configured: status.configured, connected: status.mode === "remote" },
        database: { reachable },
        fallbackAvailable: true,
      },
    });
  });

  app.get("/api/generator/status", (_req, res) => {
    res.json({ success: true, ...generator.status() });
  });

  app.post("/api/generate-content", async (req, res) => {
    const date = readStringField(req.body, "date");
    if (!date) {
      res.status(400).json({ success: false, error: "date is required (YYYY-MM-DD)" });
      return;
    }

    const result = await generateForDate(date, producerDeps);
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.json(result);
  });

  app.post("/api/generate-weekly-content", async (req, res) => {
    const date = readStringField(req.body, "week_start_date");
    if (!date) {
      res.status(400).json({ success: false, error: "week_start_date is required (YYYY-MM-DD)" });
      return;
    }

    const result = await generateWeekForInput(date, producerDeps);
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.json(result);
  });

  app.get("/api/content", async (req, res) => {
    const { start, end } = req.query;
    if (typeof start !== "string" || typeof end !== "string") {
      res.status(400).json({ success: false, error: "start and end query parameters are required" });
      return;
    }

    const result = await findContentInRange(start, end);
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.json({
      success: true,
      start: result.start,
      end: result.end,
      count: result.items.length,
      content: result.items.map((item) => toContentView(item)),
    });
  });

  app.get("/api/content/:id", async (req, res) => {
    const result = await findContent(req.params.id);
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.json({ success: true, content: toContentView(result.item) });
  });

  app.get("/api/weekly-content/:weekId", async (req, res) => {
    const result = await findWeekContent(req.params.weekId);
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.json({
      success: true,
      weekId: req.params.weekId,
      count: result.items.length,
      weeklyPackage: result.weeklyPackage ? toWeeklyPackageView(result.weeklyPackage) : null,
      content: result.items.map((item) => toContentView(item)),
    });
  });

  app.patch("/api/content/:id/status", async (req, res) => {
    const status: unknown =
      typeof req.body === "object" && req.body !== null ? Reflect.get(req.body, "status") : undefined;
    const result = await changeContentStatus(req.params.id, status, now());
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.json({ success: true, changed: result.changed, content: toContentView(result.item) });
  });

  app.post("/api/content/:id/publish", async (req, res) => {
    const result = await publishContent(req.params.id, {
      publisher,
      author: config.brand.author,
      now,
    });
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.json({
      success: true,
      externalId: result.externalId,
      content: toContentView(result.item),
    });
  });

  app.get("/api/export-content/:weekId", async (req, res) => {
    const result = await findWeekContent(req.params.weekId);
    if (!result.success) {
      sendFailure(res, result);
      return;
    }
    res.json({
      success: true,
      ...buildWeekExport(req.params.weekId, result.items, result.weeklyPackage, now()),
    });
  });

  app.post("/api/export/csv", (req, res) => {
    const parsed = parseExportRequest(req.body);
    if (!parsed.success) {
      sendFailure(res, parsed);
      return;
    }

    const blogItems = parsed.items.filter((item) => item.platform === "blog");
    if (blogItems.length === 0) {
      res.status(400).json({ success: false, error: "no blog posts provided" });
      return;
    }

    const exportedAt = now();
    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader(
      "Content-Disposition",
      `attachment; filename="${csvFileName(parsed.weekId, exportedAt)}"`,
    );
    res.send(renderBlogCsv(blogItems, { author: config.brand.author, exportedAt }));
  });

  app.post("/api/export/copy-paste", (req, res) => {
    const parsed = parseExportRequest(req.body);
    if (!parsed.success) {
      sendFailure(res, parsed);
      return;
    }

    res.render("export", {
      title: `Content Export${parsed.weekId ? ` - ${parsed.weekId}` : ""}`,
      brand: config.brand,
      view: buildCopyPasteView(parsed.items, { weekId: parsed.weekId, generatedAt: now() }),
    });
  });

  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      error: "not found",
      availableEndpoints: AVAILABLE_ENDPOINTS,
    });
  });

  const errorHandler: express.ErrorRequestHandler = (error, req, res, _next) => {
    if (isJsonParseError(error)) {
      res.status(400).json({ success: false, error: "invalid JSON body" });
      return;
    }

    logger.error("request failed", {
      method: req.method,
      path: req.path,
      error: normalizeError(error),
    });
    res.status(500).json({ success: false, error: "internal server error" });
  };
  app.use(errorHandler);

  return app;
}

export async function startServer(): Promise<void> {
  const env = getEnv();
  await runMigration();

  const generator = createDefaultGenerator();
  const status = await generator.initialize();

  const app = createApp({ generator });
  app.listen(env.PORT, () => {
    logger.info("web server started", { port: env.PORT, generatorMode: status.mode });
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer().catch((error) => {
    logger.error("web server failed to start", {
      message: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
