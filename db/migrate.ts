import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import { getDb } from "../apps/common/src/db.js";
import { logger } from "../apps/common/src/logger.js";

const MIGRATION_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "migrations");

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    )
  `);
}

function migrationApplied(db: Database.Database, version: string): boolean {
  const row = db
    .prepare("SELECT version FROM schema_migrations WHERE version = ?")
    .get(version);
  return row !== undefined;
}

async function listMigrationFiles(): Promise<string[]> {
  const entries = await readdir(MIGRATION_DIR, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".sql"))
    .map((entry) => entry.name)
    .sort();
}

export async function runMigration(): Promise<string[]> {
  const db = getDb();
  ensureMigrationsTable(db);

  const pending: Array<{ version: string; sql: string }> = [];
  for (const fileName of await listMigrationFiles()) {
    const version = fileName.replace(/\.sql$/, "");
    if (migrationApplied(db, version)) {
      logger.debug("migration already applied", { version });
      continue;
    }
    pending.push({ version, sql: await readFile(path.join(MIGRATION_DIR, fileName), "utf8") });
  }

  const applyAll = db.transaction(() => {
    for (const migration of pending) {
      db.exec(migration.sql);
      db.prepare("INSERT INTO schema_migrations(version, applied_at) VALUES (?, ?)").run(
        migration.version,
        new Date().toISOString(),
      );
    }
  });
  applyAll();

  for (const migration of pending) {
    logger.info("migration applied", { version: migration.version });
  }

  return pending.map((migration) => migration.version);
}

const directRun = process.argv[1] ? path.resolve(process.argv[1]) : "";
const thisFile = fileURLToPath(import.meta.url);

if (directRun === thisFile) {
  runMigration().catch((error) => {
    logger.error("migration failed", {
      message: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  });
}
