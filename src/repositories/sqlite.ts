// Durable job store on SQLite. better-sqlite3 is synchronous, so every method
// completes its read-check-write inside one IMMEDIATE transaction; that also
// holds the write lock across processes sharing the database file.

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { Job, CreateJobData, JobQuery, JobStatus, JobUpdate, OwnerBudget } from '../types/job.js';
import { ownerKey } from '../types/job.js';
import { JobErrorSchema, JobStatusSchema, ResponseModeSchema, StoredJobRequestSchema } from '../schemas/job.js';
import type { JobRepository, RepositoryStats } from './base.js';
import { StoredJobError, assertTransition, workerLostError } from './base.js';

interface JobRow {
  ticket: string;
  kind: string;
  params: string;
  mode: string;
  owner: string | null;
  status: string;
  input_ref: string;
  input_name: string;
  input_size: number;
  output_ref: string | null;
  error: string | null;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  last_heartbeat_at: number | null;
  updated_at: number;
}

interface MutableColumns {
  status: JobStatus;
  output_ref: string | null;
  error: string | null;
  started_at: number | null;
  completed_at: number | null;
  last_heartbeat_at: number | null;
  updated_at: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS jobs (
    ticket TEXT PRIMARY KEY,
    kind TEXT NOT NULL,
    params TEXT NOT NULL,
    mode TEXT NOT NULL CHECK (mode IN ('prompt', 'deferred')),
    owner TEXT,
    status TEXT NOT NULL CHECK (status IN ('pending', 'running', 'success', 'failed')),
    input_ref TEXT NOT NULL,
    input_name TEXT NOT NULL,
    input_size INTEGER NOT NULL,
    output_ref TEXT,
    error TEXT,
    created_at INTEGER NOT NULL,
    started_at INTEGER,
    completed_at INTEGER,
    last_heartbeat_at INTEGER,
    updated_at INTEGER NOT NULL,
    CHECK ((status = 'success') = (output_ref IS NOT NULL)),
    CHECK ((status = 'failed') = (error IS NOT NULL))
  ) STRICT;
  CREATE INDEX IF NOT EXISTS jobs_queue ON jobs (status, mode, ticket);
  CREATE INDEX IF NOT EXISTS jobs_owner ON jobs (owner, ticket);
`;

const toMillis = (date: Date | null): number | null => (date ? date.getTime() : null);
const toDate = (millis: number | null): Date | null => (millis === null ? null : new Date(millis));

export class SqliteJobRepository implements JobRepository {
  private readonly db: Database.Database;
  private readonly selectOne: Database.Statement<[string], JobRow>;
  private readonly insertOne: Database.Statement<[JobRow]>;
  private readonly updateOne: Database.Statement<[MutableColumns & { ticket: string; from: JobStatus }]>;
  private readonly touchOne: Database.Statement<[number, number, string]>;

  constructor(databasePath: string) {
    if (databasePath !== ':memory:') {
      mkdirSync(dirname(databasePath), { recursive: true });
    }

    this.db = new Database(databasePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(SCHEMA);

    this.selectOne = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE ticket = ?');
    this.insertOne = this.db.prepare<JobRow>(`
      INSERT INTO jobs (ticket, kind, params, mode, owner, status, input_ref, input_name, input_size,
                        output_ref, error, created_at, started_at, completed_at, last_heartbeat_at, updated_at)
      VALUES (@ticket, @kind, @params, @mode, @owner, @status, @input_ref, @input_name, @input_size,
              @output_ref, @error, @created_at, @started_at, @completed_at, @last_heartbeat_at, @updated_at)
    `);
    this.updateOne = this.db.prepare<MutableColumns & { ticket: string; from: JobStatus }>(`
      UPDATE jobs
         SET status = @status, output_ref = @output_ref, error = @error, started_at = @started_at,
             completed_at = @completed_at, last_heartbeat_at = @last_heartbeat_at, updated_at = @updated_at
       WHERE ticket = @ticket AND status = @from
    `);
    this.touchOne = this.db.prepare<[number, number, string]>(
      `UPDATE jobs SET last_heartbeat_at = ?, updated_at = ? WHERE ticket = ? AND status = 'running'`
    );
  }

  private toJob(row: JobRow): Job {
    try {
      return this.decodeRow(row);
    } catch (error) {
      throw new StoredJobError(row.ticket, error);
    }
  }

  private decodeRow(row: JobRow): Job {
    const request = StoredJobRequestSchema.parse({ kind: row.kind, params: JSON.parse(row.params) });
    return {
      ...request,
      ticket: row.ticket,
      mode: ResponseModeSchema.parse(row.mode),
      owner: row.owner,
      status: JobStatusSchema.parse(row.status),
      inputRef: row.input_ref,
      inputName: row.input_name,
      inputSize: row.input_size,
      outputRef: row.output_ref,
      error: row.error === null ? null : JobErrorSchema.parse(JSON.parse(row.error)),
      createdAt: new Date(row.created_at),
      startedAt: toDate(row.started_at),
      completedAt: toDate(row.completed_at),
      lastHeartbeatAt: toDate(row.last_heartbeat_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  private mutableColumns(job: Job): MutableColumns {
    return {
      status: job.status,
      output_ref: job.outputRef,
      error: job.error === null ? null : JSON.stringify(job.error),
      started_at: toMillis(job.startedAt),
      completed_at: toMillis(job.completedAt),
      last_heartbeat_at: toMillis(job.lastHeartbeatAt),
      updated_at: job.updatedAt.getTime(),
    };
  }

  // Runs inside a transaction opened by the caller.
  private applyTransition(ticket: string, from: JobStatus, update: JobUpdate): Job | null {
    const row = this.selectOne.get(ticket);
    if (!row || row.status !== from) return null;

    const next: Job = { ...this.toJob(row), ...update, updatedAt: new Date() };
    const result = this.updateOne.run({ ...this.mutableColumns(next), ticket, from });
    return result.changes === 1 ? next : null;
  }

  async create(data: CreateJobData): Promise<Job> {
    const now = Date.now();
    this.insertOne.run({
      ticket: data.ticket,
      kind: data.request.kind,
      params: JSON.stringify(data.request.params),
      mode: data.mode,
      owner: data.owner,
      status: 'pending',
      input_ref: data.inputRef,
      input_name: data.inputName,
      input_size: data.inputSize,
      output_ref: null,
      error: null,
      created_at: now,
      started_at: null,
      completed_at: null,
      last_heartbeat_at: null,
      updated_at: now,
    });

    const row = this.selectOne.get(data.ticket);
    if (!row) {
      throw new Error(`Job ${data.ticket} vanished after insert`);
    }
    return this.toJob(row);
  }

  async get(ticket: string): Promise<Job | null> {
    const row = this.selectOne.get(ticket);
    return row ? this.toJob(row) : null;
  }

  async transition(ticket: string, from: JobStatus, update: JobUpdate): Promise<Job | null> {
    assertTransition(from, update.status);
    return this.db.transaction(() => this.applyTransition(ticket, from, update)).immediate();
  }

  async heartbeat(ticket: string, at: Date): Promise<boolean> {
    return this.touchOne.run(at.getTime(), at.getTime(), ticket).changes === 1;
  }

  async find(query: JobQuery): Promise<{ jobs: Job[]; nextCursor?: string }> {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (query.owner === null) {
      conditions.push('owner IS NULL');
    } else if (query.owner !== undefined) {
      conditions.push('owner = ?');
      params.push(query.owner);
    }
    if (query.kind) {
      conditions.push('kind = ?');
      params.push(query.kind);
    }
    if (query.status) {
      conditions.push('status = ?');
      params.push(query.status);
    }
    if (query.cursor) {
      conditions.push('ticket < ?');
      params.push(query.cursor);
    }

    const limit = query.limit ?? 50;
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare<Array<string | number>, JobRow>(`SELECT * FROM jobs ${where} ORDER BY ticket DESC LIMIT ?`)
      .all(...params, limit + 1);

    const hasMore = rows.length > limit;
    const jobs = rows.slice(0, limit).map(row => this.toJob(row));

    return {
      jobs,
      nextCursor: hasMore ? jobs[jobs.length - 1]?.ticket : undefined,
    };
  }

  async leaseNextEligible(options: { now: Date; ownerBudget: OwnerBudget }): Promise<Job | null> {
    const candidates = this.db.prepare<[], JobRow>(
      `SELECT * FROM jobs WHERE status = 'pending' AND mode = 'deferred' ORDER BY ticket ASC`
    );

    const lease = this.db.transaction((): Job | null => {
      for (const row of candidates.all()) {
        const key = ownerKey(row.owner);
        if ((options.ownerBudget[key] ?? options.ownerBudget['*'] ?? 0) <= 0) continue;

        return this.applyTransition(row.ticket, 'pending', {
          status: 'running',
          startedAt: options.now,
          lastHeartbeatAt: options.now,
        });
      }
      return null;
    });

    return lease.immediate();
  }

  async failStale(options: { now: Date; heartbeatBefore: Date; pendingBefore: Date }): Promise<Job[]> {
    const stale = this.db.prepare<[number, number], JobRow>(`
      SELECT * FROM jobs
       WHERE (status = 'running' AND COALESCE(last_heartbeat_at, started_at, created_at) < ?)
          OR (status = 'pending' AND mode = 'prompt' AND created_at < ?)
       ORDER BY ticket ASC
    `);

    const reap = this.db.transaction((): Job[] => {
      const failed: Job[] = [];
      const rows = stale.all(options.heartbeatBefore.getTime(), options.pendingBefore.getTime());
      for (const row of rows) {
        const status = JobStatusSchema.parse(row.status);
        const updated = this.applyTransition(row.ticket, status, {
          status: 'failed',
          error: workerLostError(status),
          completedAt: options.now,
        });
        if (updated) failed.push(updated);
      }
      return failed;
    });

    return reap.immediate();
  }

  async prune(options: { status?: 'success' | 'failed'; olderThan: Date }): Promise<Job[]> {
    const statuses = options.status ? [options.status] : ['success', 'failed'];
    const placeholders = statuses.map(() => '?').join(', ');
    const select = this.db.prepare<Array<string | number>, JobRow>(
      `SELECT * FROM jobs WHERE status IN (${placeholders}) AND created_at < ?`
    );
    const remove = this.db.prepare<[string]>('DELETE FROM jobs WHERE ticket = ?');

    const prune = this.db.transaction((): Job[] => {
      const rows = select.all(...statuses, options.olderThan.getTime());
      for (const row of rows) remove.run(row.ticket);
      return rows.map(row => this.toJob(row));
    });

    return prune.immediate();
  }

  async getStats(): Promise<RepositoryStats> {
    const fiveMinutesAgo = Date.now() - 5 * 60 * 1000;
    const row = this.db.prepare<[number, number], RepositoryStats>(`
      SELECT
        COALESCE(SUM(status = 'pending'), 0) AS queueDepth,
        COALESCE(SUM(status = 'running'), 0) AS running,
        COALESCE(SUM(status = 'success' AND completed_at >= ?), 0) AS completedLast5m,
        COALESCE(SUM(status = 'failed' AND completed_at >= ?), 0) AS failedLast5m
      FROM jobs
    `).get(fiveMinutesAgo, fiveMinutesAgo);

    return row ?? { queueDepth: 0, running: 0, completedLast5m: 0, failedLast5m: 0 };
  }

  async ping(): Promise<void> {
    this.db.prepare('SELECT 1').get();
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
