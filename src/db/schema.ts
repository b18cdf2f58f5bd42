import type Database from 'better-sqlite3';

const CREATE_JOBS = `
CREATE TABLE IF NOT EXISTS jobs (
  id TEXT PRIMARY KEY,
  workflow_id TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'queued',
  prompt_id TEXT,
  params TEXT NOT NULL DEFAULT '{}',
  resolved_params TEXT NOT NULL DEFAULT '{}',
  error TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)`;

const CREATE_JOBS_INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_jobs_created_at ON jobs(created_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_jobs_workflow_id ON jobs(workflow_id)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_jobs_prompt_id ON jobs(prompt_id) WHERE prompt_id IS NOT NULL`,
];

export function createTables(db: Database.Database): void {
  db.exec(CREATE_JOBS);
  for (const idx of CREATE_JOBS_INDEXES) {
    db.exec(idx);
  }
}
