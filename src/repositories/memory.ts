import type { Job, CreateJobData, JobQuery, JobStatus, JobUpdate, OwnerBudget } from '../types/job.js';
import { isTerminal, ownerKey } from '../types/job.js';
import type { JobRepository, RepositoryStats } from './base.js';
import { assertTransition, workerLostError } from './base.js';

export class InMemoryJobRepository implements JobRepository {
  private jobs = new Map<string, Job>();

  async create(data: CreateJobData): Promise<Job> {
    if (this.jobs.has(data.ticket)) {
      throw new Error(`Ticket already issued: ${data.ticket}`);
    }

    const now = new Date();
    const job: Job = {
      ...data.request,
      ticket: data.ticket,
      mode: data.mode,
      owner: data.owner,
      status: 'pending',
      inputRef: data.inputRef,
      inputName: data.inputName,
      inputSize: data.inputSize,
      outputRef: null,
      error: null,
      createdAt: now,
      startedAt: null,
      completedAt: null,
      lastHeartbeatAt: null,
      updatedAt: now,
    };

    this.jobs.set(job.ticket, job);
    return job;
  }

  async get(ticket: string): Promise<Job | null> {
    return this.jobs.get(ticket) ?? null;
  }

  async transition(ticket: string, from: JobStatus, update: JobUpdate): Promise<Job | null> {
    assertTransition(from, update.status);

    const job = this.jobs.get(ticket);
    if (!job || job.status !== from) return null;

    const updatedJob: Job = {
      ...job,
      ...update,
      updatedAt: new Date(),
    };

    this.jobs.set(ticket, updatedJob);
    return updatedJob;
  }

  async heartbeat(ticket: string, at: Date): Promise<boolean> {
    const job = this.jobs.get(ticket);
    if (!job || job.status !== 'running') return false;

    this.jobs.set(ticket, { ...job, lastHeartbeatAt: at, updatedAt: at });
    return true;
  }

  async find(query: JobQuery): Promise<{ jobs: Job[]; nextCursor?: string }> {
    let jobs = Array.from(this.jobs.values());

    // Apply filters
    if (query.owner !== undefined) {
      jobs = jobs.filter(job => job.owner === query.owner);
    }
    if (query.kind) {
      jobs = jobs.filter(job => job.kind === query.kind);
    }
    if (query.status) {
      jobs = jobs.filter(job => job.status === query.status);
    }

    // Tickets sort by issue time; newest first
    jobs.sort((a, b) => (a.ticket < b.ticket ? 1 : a.ticket > b.ticket ? -1 : 0));

    const cursor = query.cursor;
    if (cursor) {
      jobs = jobs.filter(job => job.ticket < cursor);
    }

    const limit = query.limit ?? 50;
    const hasMore = jobs.length > limit;
    if (hasMore) {
      jobs = jobs.slice(0, limit);
    }

    return {
      jobs,
      nextCursor: hasMore ? jobs[jobs.length - 1]?.ticket : undefined,
    };
  }

  async leaseNextEligible(options: { now: Date; ownerBudget: OwnerBudget }): Promise<Job | null> {
    const eligibleJobs = Array.from(this.jobs.values())
      .filter(job => job.status === 'pending' && job.mode === 'deferred')
      .sort((a, b) => (a.ticket < b.ticket ? -1 : a.ticket > b.ticket ? 1 : 0)); // FIFO

    const selectedJob = eligibleJobs.find(job => {
      const key = ownerKey(job.owner);
      return (options.ownerBudget[key] ?? options.ownerBudget['*'] ?? 0) > 0;
    });

    if (!selectedJob) return null;

    // Lease the job (mark as running)
    return this.transition(selectedJob.ticket, 'pending', {
      status: 'running',
      startedAt: options.now,
      lastHeartbeatAt: options.now,
    });
  }

  async failStale(options: { now: Date; heartbeatBefore: Date; pendingBefore: Date }): Promise<Job[]> {
    const failed: Job[] = [];

    for (const job of Array.from(this.jobs.values())) {
      const lastSign = job.lastHeartbeatAt ?? job.startedAt ?? job.createdAt;
      const stale =
        (job.status === 'running' && lastSign < options.heartbeatBefore) ||
        (job.status === 'pending' && job.mode === 'prompt' && job.createdAt < options.pendingBefore);
      if (!stale) continue;

      const updated = await this.transition(job.ticket, job.status, {
        status: 'failed',
        error: workerLostError(job.status),
        completedAt: options.now,
      });
      if (updated) failed.push(updated);
    }

    return failed;
  }

  async prune(options: { status?: 'success' | 'failed'; olderThan: Date }): Promise<Job[]> {
    const removed: Job[] = [];

    for (const [ticket, job] of this.jobs) {
      const matchesStatus = options.status ? job.status === options.status : isTerminal(job.status);
      const isOld = job.createdAt < options.olderThan;

      if (matchesStatus && isOld) {
        this.jobs.delete(ticket);
        removed.push(job);
      }
    }

    return removed;
  }

  async getStats(): Promise<RepositoryStats> {
    const now = new Date();
    const fiveMinutesAgo = new Date(now.getTime() - 5 * 60 * 1000);

    const allJobs = Array.from(this.jobs.values());
    const finishedRecently = (job: Job) => job.completedAt !== null && job.completedAt >= fiveMinutesAgo;

    return {
      queueDepth: allJobs.filter(job => job.status === 'pending').length,
      running: allJobs.filter(job => job.status === 'running').length,
      completedLast5m: allJobs.filter(job => job.status === 'success' && finishedRecently(job)).length,
      failedLast5m: allJobs.filter(job => job.status === 'failed' && finishedRecently(job)).length,
    };
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.jobs.clear();
  }
}
