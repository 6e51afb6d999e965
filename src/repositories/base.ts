import { canTransition } from '../types/job.js';
import type { Job, CreateJobData, JobError, JobQuery, JobStatus, JobUpdate, OwnerBudget } from '../types/job.js';

export interface RepositoryStats {
  queueDepth: number;
  running: number;
  completedLast5m: number;
  failedLast5m: number;
}

export interface JobRepository {
  create(data: CreateJobData): Promise<Job>;
  get(ticket: string): Promise<Job | null>;

  /**
   * Compare-and-set on status: applies `update` only while the job is still in
   * `from`. Returns the updated job, or null when the ticket is unknown or has
   * already moved on. Rejects moves the state machine does not allow.
   */
  transition(ticket: string, from: JobStatus, update: JobUpdate): Promise<Job | null>;

  /** Refreshes the heartbeat of a running job; false once it is no longer running. */
  heartbeat(ticket: string, at: Date): Promise<boolean>;

  find(query: JobQuery): Promise<{ jobs: Job[]; nextCursor?: string }>;

  /**
   * Claims the oldest pending deferred job whose owner still has budget and
   * marks it running in the same write. Each ticket is handed out once.
   */
  leaseNextEligible(options: { now: Date; ownerBudget: OwnerBudget }): Promise<Job | null>;

  /**
   * Fails jobs whose executor is gone: running jobs with a heartbeat older than
   * `heartbeatBefore`, and prompt jobs still pending since before `pendingBefore`.
   */
  failStale(options: { now: Date; heartbeatBefore: Date; pendingBefore: Date }): Promise<Job[]>;

  prune(options: { status?: 'success' | 'failed'; olderThan: Date }): Promise<Job[]>;
  getStats(): Promise<RepositoryStats>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export class InvalidTransitionError extends Error {
  constructor(readonly from: JobStatus, readonly to: JobStatus) {
    super(`Invalid job status transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/** A persisted row that no longer decodes into a job. */
export class StoredJobError extends Error {
  constructor(readonly ticket: string, cause: unknown) {
    super(`Stored job ${ticket} could not be read`, { cause });
    this.name = 'StoredJobError';
  }
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function workerLostError(previous: JobStatus): JobError {
  return {
    category: 'internal_fault',
    reason: 'worker_lost',
    message: previous === 'running'
      ? 'Executor stopped sending heartbeats before finishing the job'
      : 'Job was never started by the request that created it',
  };
}
