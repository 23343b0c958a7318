import BetterSqlite3 from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { SCHEMA_VERSION, TABLE_NAMES } from "./schema";
import { runMigrations } from "./migrations";
import { logger } from "../logger";

export type Database = BetterSqlite3.Database;

/** Opens (creating if needed) and migrates a database. ":memory:" for tests. */
export function openDatabase(path: string): Database {
  if (path !== ":memory:") {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
      logger.info(`Created data directory: ${dir}`);
    }
  }

  const db = new BetterSqlite3(path);
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  initializeDatabase(db);
  return db;
}

export function initializeDatabase(db: Database): void {
  logger.info("Initializing database...");

  try {
    runMigrations(db);

    const tables = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
      )
      .all();

    const tableNames = tables
      .map((t) => t.name)
      .filter((n) => n !== "sqlite_sequence");
    logger.info(
      `Database initialized with ${tableNames.length} tables: ${tableNames.join(", ")}`,
    );

    const missing = TABLE_NAMES.filter((t) => !tableNames.includes(t));
    if (missing.length > 0) {
      logger.warn(`Missing tables: ${missing.join(", ")}`);
    }
  } catch (error) {
    logger.error("Failed to initialize database:", error);
    throw error;
  }
}

export function checkDatabaseIntegrity(db: Database): { ok: boolean; result: string } {
  try {
    const result = db
      .prepare<[], { integrity_check: string }>("PRAGMA integrity_check")
      .get();
    const isOk = result?.integrity_check === "ok";

    if (!isOk) {
      logger.error(`Database integrity check FAILED: ${result?.integrity_check}`);
    } else {
      logger.info("Database integrity check passed");
    }

    return { ok: isOk, result: result?.integrity_check ?? "unknown" };
  } catch (error) {
    logger.error("Database integrity check threw error:", error);
    return { ok: false, result: String(error) };
  }
}

export function getDatabaseStats(db: Database): Record<string, number> {
  const stats: Record<string, number> = {};

  for (const table of TABLE_NAMES) {
    try {
      const result = db
        .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`)
        .get();
      stats[table] = result?.count ?? 0;
    } catch (error) {
      logger.warn(`Could not count ${table}: ${error}`);
      stats[table] = -1;
    }
  }

  return stats;
}

export function quickHealthCheck(db: Database): boolean {
  try {
    const result = db.prepare<[], { ok: number }>("SELECT 1 as ok").get();
    return result?.ok === 1;
  } catch (error) {
    logger.error(`Health check query failed: ${error}`);
    return false;
  }
}

export { SCHEMA_VERSION };
