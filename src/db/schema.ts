export const SCHEMA_VERSION = 1;

export const CREATE_TABLES_SQL = `
  -- 1. users / profiles (owned by the product; read here)
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    telegram_chat_id TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS user_profiles (
    user_id INTEGER PRIMARY KEY,
    target_roles TEXT NOT NULL DEFAULT '[]',
    target_locations TEXT NOT NULL DEFAULT '[]',
    core_skills TEXT NOT NULL DEFAULT '[]',
    resume_keywords TEXT NOT NULL DEFAULT '[]',
    industries TEXT NOT NULL DEFAULT '[]',
    experience_level TEXT,
    target_salary_min INTEGER,
    updated_at TEXT NOT NULL DEFAULT (datetime('now')),
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
  );

  -- 2. company directory
  CREATE TABLE IF NOT EXISTS companies (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    name_normalized TEXT NOT NULL UNIQUE,
    sector TEXT,
    stage TEXT,
    is_excluded INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  -- 3. pipeline jobs (the user's application tracker)
  CREATE TABLE IF NOT EXISTS pipeline_jobs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    title TEXT NOT NULL,
    company TEXT NOT NULL,
    location TEXT,
    url TEXT,
    source TEXT,
    salary_min INTEGER,
    salary_max INTEGER,
    status TEXT NOT NULL DEFAULT 'saved',
    notes TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_pipeline_jobs_user ON pipeline_jobs(user_id);

  -- 4. shared pool
  CREATE TABLE IF NOT EXISTS scouted_jobs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    dedup_hash TEXT NOT NULL UNIQUE,
    external_id TEXT,
    title TEXT NOT NULL,
    company TEXT NOT NULL,
    company_normalized TEXT NOT NULL,
    location TEXT,
    city TEXT,
    description TEXT,
    salary_min INTEGER,
    salary_max INTEGER,
    salary_estimated INTEGER NOT NULL DEFAULT 0,
    source TEXT NOT NULL,
    source_url TEXT NOT NULL,
    apply_url TEXT,
    posted_date TEXT,
    raw_payload TEXT,
    matched_company_id INTEGER,
    is_active INTEGER NOT NULL DEFAULT 1,
    inactive_reason TEXT,
    last_seen_at TEXT NOT NULL,
    scouted_at TEXT NOT NULL,
    FOREIGN KEY (matched_company_id) REFERENCES companies(id)
  );

  CREATE INDEX IF NOT EXISTS idx_scouted_jobs_active_posted
    ON scouted_jobs(is_active, posted_date);

  -- 5. per-user matches against the pool
  CREATE TABLE IF NOT EXISTS user_scouted_jobs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    scouted_job_id INTEGER NOT NULL,
    relevance_score INTEGER NOT NULL,
    score_breakdown TEXT NOT NULL,
    match_reasons TEXT NOT NULL DEFAULT '[]',
    status TEXT NOT NULL DEFAULT 'new',
    dismiss_reason TEXT,
    pipeline_job_id INTEGER,
    matched_at TEXT NOT NULL,
    updated_at TEXT,
    UNIQUE (user_id, scouted_job_id),
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
    FOREIGN KEY (scouted_job_id) REFERENCES scouted_jobs(id),
    FOREIGN KEY (pipeline_job_id) REFERENCES pipeline_jobs(id)
  );

  CREATE INDEX IF NOT EXISTS idx_user_scouted_jobs_status
    ON user_scouted_jobs(user_id, status, matched_at);

  -- 6. on-demand AI-scored results
  CREATE TABLE IF NOT EXISTS scout_results (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    external_id TEXT,
    dedup_hash TEXT,
    title TEXT NOT NULL,
    company TEXT NOT NULL,
    location TEXT,
    description TEXT,
    salary_min INTEGER,
    salary_max INTEGER,
    source TEXT NOT NULL,
    source_url TEXT NOT NULL,
    apply_url TEXT,
    posted_date TEXT,
    fit_score REAL NOT NULL DEFAULT 0,
    b2c_validated INTEGER NOT NULL DEFAULT 0,
    ai_reasoning TEXT,
    status TEXT NOT NULL DEFAULT 'new',
    pipeline_job_id INTEGER,
    scout_run_id TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
    FOREIGN KEY (pipeline_job_id) REFERENCES pipeline_jobs(id)
  );

  CREATE INDEX IF NOT EXISTS idx_scout_results_user_status
    ON scout_results(user_id, status);
  CREATE INDEX IF NOT EXISTS idx_scout_results_source_url
    ON scout_results(source_url);

  -- 7. preferences
  CREATE TABLE IF NOT EXISTS user_scout_preferences (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL UNIQUE,
    target_roles TEXT NOT NULL DEFAULT '[]',
    role_keywords TEXT NOT NULL DEFAULT '[]',
    target_locations TEXT NOT NULL DEFAULT '[]',
    location_flexibility TEXT NOT NULL DEFAULT 'preferred',
    target_company_ids TEXT NOT NULL DEFAULT '[]',
    excluded_company_ids TEXT NOT NULL DEFAULT '[]',
    target_industries TEXT NOT NULL DEFAULT '[]',
    excluded_industries TEXT NOT NULL DEFAULT '[]',
    company_stages TEXT NOT NULL DEFAULT '[]',
    min_salary INTEGER,
    salary_flexibility TEXT NOT NULL DEFAULT 'flexible',
    min_score INTEGER NOT NULL DEFAULT 30,
    learned_boosts TEXT NOT NULL DEFAULT '[]',
    learned_penalties TEXT NOT NULL DEFAULT '[]',
    last_synced_at TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now')),
    FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
  );

  -- 8. run log
  CREATE TABLE IF NOT EXISTS scout_runs (
    run_id TEXT PRIMARY KEY,
    kind TEXT NOT NULL,
    user_id INTEGER,
    started_at TEXT NOT NULL DEFAULT (datetime('now')),
    finished_at TEXT,
    status TEXT NOT NULL DEFAULT 'running',
    summary TEXT,
    error_count INTEGER NOT NULL DEFAULT 0
  );

  -- 9. notifications
  CREATE TABLE IF NOT EXISTS notifications (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    recipient TEXT NOT NULL,
    message_preview TEXT NOT NULL,
    status TEXT NOT NULL,
    error TEXT,
    sent_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

export const TABLE_NAMES = [
  "users",
  "user_profiles",
  "companies",
  "pipeline_jobs",
  "scouted_jobs",
  "user_scouted_jobs",
  "scout_results",
  "user_scout_preferences",
  "scout_runs",
  "notifications",
  "_migrations",
] as const;
