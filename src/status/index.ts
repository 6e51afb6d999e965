import type { ArtifactStore, StoredArtifact } from '../artifacts/store.js';
import { ArtifactMissingError, JobFailedError, NotFoundError, NotReadyError } from '../errors.js';
import type { JobRepository } from '../repositories/base.js';
import type { Job, JobError, JobKind, JobStatus, ResponseMode } from '../types/job.js';

const ULID = /^[0-9A-HJKMNP-TV-Z]{26}$/;

export interface JobStatusView {
  ticket: string;
  kind: JobKind;
  mode: ResponseMode;
  status: JobStatus;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  /** Seconds from start to completion, once finished. */
  executionTime: number | null;
  error?: JobError;
  resourceUrl?: string;
}

export interface JobListFilter {
  status?: JobStatus;
  kind?: JobKind;
  cursor?: string;
  limit?: number;
}

export function statusUrl(ticket: string): string {
  return `/status/${ticket}`;
}

export function resourceUrl(ticket: string): string {
  return `/resource/${ticket}`;
}

export function toStatusView(job: Job): JobStatusView {
  const executionTime = job.startedAt && job.completedAt
    ? Math.round(job.completedAt.getTime() - job.startedAt.getTime()) / 1000
    : null;

  return {
    ticket: job.ticket,
    kind: job.kind,
    mode: job.mode,
    status: job.status,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString() ?? null,
    completedAt: job.completedAt?.toISOString() ?? null,
    executionTime,
    ...(job.error ? { error: job.error } : {}),
    ...(job.status === 'success' ? { resourceUrl: resourceUrl(job.ticket) } : {}),
  };
}

/**
 * Read side of the service. A job with an owner is only visible to that
 * owner; anonymous jobs are visible to whoever holds the ticket. Anything a
 * caller may not see is reported exactly like an unknown ticket.
 */
export class StatusService {
  constructor(private repo: JobRepository, private artifacts: ArtifactStore) {}

  async getJob(ticket: string, caller: string | null): Promise<Job> {
    const job = ULID.test(ticket) ? await this.repo.get(ticket) : null;
    if (!job || (job.owner !== null && job.owner !== caller)) {
      throw new NotFoundError(ticket);
    }
    return job;
  }

  async getStatus(ticket: string, caller: string | null): Promise<JobStatusView> {
    return toStatusView(await this.getJob(ticket, caller));
  }

  async getResource(ticket: string, caller: string | null): Promise<StoredArtifact> {
    const job = await this.getJob(ticket, caller);

    switch (job.status) {
      case 'pending':
      case 'running':
        throw new NotReadyError(ticket, job.status);
      case 'failed':
        throw new JobFailedError(ticket, job.error ?? {
          category: 'internal_fault',
          reason: 'unexpected',
          message: 'Job failed without a recorded error',
        });
      case 'success': {
        const artifact = job.outputRef ? await this.artifacts.open(job.outputRef) : null;
        if (!artifact) throw new ArtifactMissingError(ticket);
        return artifact;
      }
    }
  }

  /** Jobs submitted under the caller's identity. Anonymous callers see none. */
  async listJobs(caller: string | null, filter: JobListFilter = {}): Promise<{ jobs: JobStatusView[]; nextCursor?: string }> {
    if (caller === null) return { jobs: [] };

    const result = await this.repo.find({ ...filter, owner: caller });
    return {
      jobs: result.jobs.map(toStatusView),
      nextCursor: result.nextCursor,
    };
  }
}
