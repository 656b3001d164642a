import { getEnv } from "../../common/src/env.js";
import { logger } from "../../common/src/logger.js";
import { listMissingTables, pingDatabase } from "../../common/src/repository.js";
import { withRetry } from "../../common/src/retry.js";
import { getCalendarConfig } from "../../planner/src/config.js";
import { createDefaultGenerator, type GeneratorMode } from "../../producer/src/generator.js";

export const REQUIRED_TABLES = ["schema_migrations", "content_items", "weekly_packages"];

export interface PreflightReport {
  database: "ok" | "failed";
  calendarConfig: "ok" | "failed";
  generator: GeneratorMode;
  shopify: "configured" | "not_configured";
}

async function checkDatabase(): Promise<void> {
  if (!pingDatabase()) {
    throw new Error("database ping failed");
  }

  const missing = listMissingTables(REQUIRED_TABLES);
  if (missing.length > 0) {
    throw new Error(`required tables missing: ${missing.join(", ")}`);
  }
}

export async function runPreflight(): Promise<PreflightReport> {
  const env = getEnv();

  const report: PreflightReport = {
    database: "failed",
    calendarConfig: "failed",
    generator: "fallback",
    shopify:
      env.SHOPIFY_STORE_URL && env.SHOPIFY_ACCESS_TOKEN && env.SHOPIFY_BLOG_ID
        ? "configured"
        : "not_configured",
  };

  await withRetry(
    "preflight:database",
    { attempts: env.DB_BOOTSTRAP_MAX_ATTEMPTS, initialBackoffMs: env.DB_BOOTSTRAP_BACKOFF_MS },
    async () => {
      await checkDatabase();
      report.database = "ok";
    },
  );

  const config = getCalendarConfig();
  report.calendarConfig = "ok";

  const status = await createDefaultGenerator().initialize();
  report.generator = status.mode;
  if (status.configured && !status.selfTestPassed) {
    logger.warn("remote backend configured but self-test failed; fallback templates will be used", {
      model: status.model,
    });
  }

  logger.info("preflight checks passed", {
    ...report,
    holidays: config.holidays.length,
  });
  return report;
}
