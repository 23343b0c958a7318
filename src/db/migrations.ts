import type { Database } from "./index";
import { CREATE_TABLES_SQL } from "./schema";
import { logger } from "../logger";

interface Migration {
  id: string;
  description: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    id: "0001_init_schema",
    description: "Scout pool, per-user matches, results, preferences",
    sql: CREATE_TABLES_SQL,
  },
  {
    id: "0002_scouted_jobs_company_index",
    description: "Index company references for learned-penalty lookups",
    sql: `
      CREATE INDEX IF NOT EXISTS idx_scouted_jobs_company
        ON scouted_jobs(matched_company_id);
      CREATE INDEX IF NOT EXISTS idx_scouted_jobs_last_seen
        ON scouted_jobs(is_active, last_seen_at);
    `,
  },
];

function ensureMigrationTable(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function isApplied(db: Database, id: string): boolean {
  const row = db
    .prepare("SELECT id FROM _migrations WHERE id = ? LIMIT 1")
    .get(id);
  return row !== undefined;
}

export function runMigrations(db: Database): void {
  ensureMigrationTable(db);

  for (const migration of MIGRATIONS) {
    if (isApplied(db, migration.id)) {
      continue;
    }

    logger.info(`Applying migration ${migration.id}: ${migration.description}`);
    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare("INSERT INTO _migrations (id, description) VALUES (?, ?)").run(
        migration.id,
        migration.description,
      );
    });

    try {
      apply();
      logger.info(`Applied migration ${migration.id}`);
    } catch (error) {
      logger.error(`Migration ${migration.id} failed:`, error);
      throw error;
    }
  }
}
