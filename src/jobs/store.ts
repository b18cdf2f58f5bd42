import type Database from 'better-sqlite3';
import type { ParamValue } from '../manifest/types.js';

export const JOB_STATUSES = ['queued', 'submitted', 'failed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface JobRecord {
  id: string;
  workflow_id: string;
  status: JobStatus;
  prompt_id: string | null;
  /** Caller params as stored under the configured unknown-param policy. */
  params: Record<string, unknown>;
  /** Coerced values the patch engine actually wrote into the graph. */
  resolved_params: Record<string, ParamValue>;
  error: string | null;
  created_at: string;
  updated_at: string;
}

export interface JobFilters {
  workflowId?: string;
  status?: JobStatus;
  limit?: number;
}

export interface NewJob {
  id: string;
  workflowId: string;
  params: Record<string, unknown>;
  resolvedParams: Record<string, ParamValue>;
}

interface JobRow {
  id: string;
  workflow_id: string;
  status: string;
  prompt_id: string | null;
  params: string;
  resolved_params: string;
  error: string | null;
  created_at: string;
  updated_at: string;
}

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

export class JobStore {
  constructor(private db: Database.Database) {}

  create(job: NewJob): JobRecord {
    const now = new Date().toISOString();
    this.db
      .prepare(
        `INSERT INTO jobs (id, workflow_id, status, params, resolved_params, created_at, updated_at)
         VALUES (?, ?, 'queued', ?, ?, ?, ?)`,
      )
      .run(job.id, job.workflowId, JSON.stringify(job.params), JSON.stringify(job.resolvedParams), now, now);
    return this.require(job.id);
  }

  markSubmitted(id: string, promptId: string): JobRecord {
    this.update(id, `status = 'submitted', prompt_id = ?, error = NULL`, [promptId]);
    return this.require(id);
  }

  markFailed(id: string, error: string): JobRecord {
    this.update(id, `status = 'failed', error = ?`, [error]);
    return this.require(id);
  }

  get(id: string): JobRecord | null {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?').get(id);
    return row ? toRecord(row) : null;
  }

  list(filters?: JobFilters): JobRecord[] {
    let query = 'SELECT * FROM jobs WHERE 1=1';
    const params: Array<string | number> = [];

    if (filters?.workflowId) {
      query += ' AND workflow_id = ?';
      params.push(filters.workflowId);
    }

    if (filters?.status) {
      query += ' AND status = ?';
      params.push(filters.status);
    }

    query += ' ORDER BY created_at DESC, rowid DESC';

    if (filters?.limit) {
      query += ' LIMIT ?';
      params.push(filters.limit);
    }

    return this.db.prepare<Array<string | number>, JobRow>(query).all(...params).map(toRecord);
  }

  private update(id: string, assignments: string, values: string[]): void {
    const result = this.db
      .prepare(`UPDATE jobs SET ${assignments}, updated_at = ? WHERE id = ?`)
      .run(...values, new Date().toISOString(), id);
    if (result.changes === 0) {
      throw new JobNotFoundError(id);
    }
  }

  private require(id: string): JobRecord {
    const job = this.get(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }
}

function toStatus(value: string): JobStatus {
  const status = JOB_STATUSES.find((s) => s === value);
  if (!status) {
    throw new Error(`Unexpected job status in database: ${value}`);
  }
  return status;
}

function toRecord(row: JobRow): JobRecord {
  return {
    id: row.id,
    workflow_id: row.workflow_id,
    status: toStatus(row.status),
    prompt_id: row.prompt_id,
    params: JSON.parse(row.params),
    resolved_params: JSON.parse(row.resolved_params),
    error: row.error,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}
