import Database from 'better-sqlite3';

let _db: Database.Database | null = null;

export function openDb(dbPath: string): Database.Database {
  if (_db) return _db;
  _db = new Database(dbPath);
  _db.pragma('journal_mode = WAL');
  _db.pragma('foreign_keys = ON');
  _db.pragma('busy_timeout = 5000');
  applyInlineSchema(_db);
  return _db;
}

export function applyInlineSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS channels (
      name TEXT PRIMARY KEY,
      niche TEXT NOT NULL,
      quality_tier TEXT NOT NULL CHECK (quality_tier IN ('standard','premium')),
      upload_schedule_json TEXT NOT NULL DEFAULT '{}',
      branding_json TEXT NOT NULL DEFAULT '{}',
      daily_uploads INTEGER NOT NULL DEFAULT 0,
      daily_reset_at TEXT,
      last_upload_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS jobs (
      id TEXT PRIMARY KEY,
      topic TEXT,
      channel TEXT NOT NULL,
      stage TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('pending','running','succeeded','failed','cancelled')),
      priority TEXT NOT NULL CHECK (priority IN ('low','normal','high','critical')),
      retry_count INTEGER NOT NULL DEFAULT 0,
      improvement_cycles INTEGER NOT NULL DEFAULT 0,
      quality_score REAL CHECK (quality_score IS NULL OR (quality_score >= 0 AND quality_score <= 100)),
      approval_id TEXT,
      deferred_until TEXT,
      active_ms INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      stage_entered_at TEXT NOT NULL,
      data_json TEXT NOT NULL DEFAULT '{}'
    );
    CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
    CREATE INDEX IF NOT EXISTS idx_jobs_channel ON jobs(channel);

    CREATE TABLE IF NOT EXISTS approvals (
      id TEXT PRIMARY KEY,
      job_id TEXT NOT NULL REFERENCES jobs(id),
      created_at TEXT NOT NULL,
      actor TEXT,
      payload_hash TEXT NOT NULL,
      summary_json TEXT NOT NULL DEFAULT '{}',
      status TEXT NOT NULL CHECK (status IN ('pending','approved','denied')),
      decided_at TEXT,
      decision_reason TEXT,
      chain_prev_hash TEXT,
      chain_this_hash TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_approvals_status ON approvals(status);
    CREATE INDEX IF NOT EXISTS idx_approvals_job ON approvals(job_id);
  `);
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
