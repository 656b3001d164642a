import { getEnv } from "../apps/common/src/env.js";
import { logger } from "../apps/common/src/logger.js";
import { withRetry } from "../apps/common/src/retry.js";
import { runMigration } from "./migrate.js";

async function main(): Promise<void> {
  const env = getEnv();

  const applied = await withRetry(
    "db-bootstrap",
    {
      attempts: env.DB_BOOTSTRAP_MAX_ATTEMPTS,
      initialBackoffMs: env.DB_BOOTSTRAP_BACKOFF_MS,
    },
    runMigration,
  );

  logger.info("bootstrap completed", { databasePath: env.SQLITE_DB_PATH, applied });
}

main().catch((error) => {
  logger.error("bootstrap failed", {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
