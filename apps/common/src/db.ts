import Database from "better-sqlite3";
import { getEnv } from "./env.js";

let cachedDb: Database.Database | null = null;

export function getDb(): Database.Database {
  if (cachedDb) {
    return cachedDb;
  }

  const env = getEnv();
  cachedDb = new Database(env.SQLITE_DB_PATH);
  cachedDb.pragma("journal_mode = WAL");
  return cachedDb;
}

export function withTransaction<T>(handler: (db: Database.Database) => T): T {
  const db = getDb();
  return db.transaction(() => handler(db))();
}

export function resetDbForTests(): void {
  if (cachedDb) {
    cachedDb.close();
  }
  cachedDb = null;
}
