import type { WorkerConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { JobRepository } from '../repositories/base.js';
import type { Job, OwnerBudget } from '../types/job.js';
import { ownerKey } from '../types/job.js';
import type { ExecutorStats, JobExecutor } from './executor.js';

export * from './executor.js';

export interface WorkerPoolStats extends ExecutorStats {
  leased: number;
  reaped: number;
  ownerConcurrency: Record<string, number>;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Executes deferred jobs. Polls the job store for pending deferred jobs and
 * leases as many as it has free slots, bounded globally by `poolSize` and per
 * owner by `ownerMaxConcurrency`. Also reaps jobs whose executor went away.
 */
export class WorkerPool {
  private isRunning = false;
  private inFlight = new Map<string, Promise<void>>();
  private ownerConcurrency = new Map<string, number>();
  private pollTimer?: NodeJS.Timeout;
  private reapTimer?: NodeJS.Timeout;
  private polling = false;
  private pollAgain = false;
  private reaped = 0;

  constructor(
    private repo: JobRepository,
    private executor: JobExecutor,
    private logger: Logger,
    private config: WorkerConfig
  ) {}

  async start(): Promise<void> {
    if (this.isRunning) return;

    this.isRunning = true;
    await this.reap();
    this.scheduleNextPoll(0);
    this.scheduleNextReap();
    this.logger.info({ poolSize: this.config.poolSize, ownerMaxConcurrency: this.config.ownerMaxConcurrency }, 'Worker pool started');
  }

  /**
   * Stops leasing, waits up to `shutdownGraceMs` for running jobs, then aborts
   * what is left. Aborted jobs are recorded as interrupted.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.isRunning = false;
    clearTimeout(this.pollTimer);
    clearTimeout(this.reapTimer);

    const deadline = Date.now() + this.config.shutdownGraceMs;
    while (this.executor.activeCount > 0 && Date.now() < deadline) {
      await sleep(50);
    }

    if (this.executor.activeCount > 0) {
      this.logger.warn({ running: this.executor.activeCount }, 'Interrupting jobs still running after the grace period');
      this.executor.abortAll();
    }
    await Promise.all(this.inFlight.values());

    this.ownerConcurrency.clear();
    this.logger.info('Worker pool stopped');
  }

  /** Leases immediately instead of waiting for the next poll. */
  wake(): void {
    if (!this.isRunning) return;
    if (this.polling) {
      this.pollAgain = true;
      return;
    }
    this.scheduleNextPoll(0);
  }

  getStats(): WorkerPoolStats {
    return {
      ...this.executor.getStats(),
      leased: this.inFlight.size,
      reaped: this.reaped,
      ownerConcurrency: Object.fromEntries(this.ownerConcurrency),
    };
  }

  private scheduleNextPoll(delayMs: number): void {
    if (!this.isRunning) return;

    clearTimeout(this.pollTimer);
    this.pollTimer = setTimeout(() => {
      this.polling = true;
      this.pollAndExecute().finally(() => {
        this.polling = false;
        const again = this.pollAgain;
        this.pollAgain = false;
        this.scheduleNextPoll(again ? 0 : this.config.pollIntervalMs);
      });
    }, delayMs);
  }

  private scheduleNextReap(): void {
    if (!this.isRunning || this.config.staleAfterMs === 0) return;

    this.reapTimer = setTimeout(() => {
      this.reap().finally(() => this.scheduleNextReap());
    }, this.config.reapIntervalMs);
  }

  private ownerBudget(): OwnerBudget {
    const available = this.config.poolSize - this.inFlight.size;
    const budget: OwnerBudget = {};

    for (const [owner, running] of this.ownerConcurrency) {
      budget[owner] = Math.max(0, Math.min(this.config.ownerMaxConcurrency - running, available));
    }
    // Owners with nothing running yet
    budget['*'] = Math.min(this.config.ownerMaxConcurrency, available);

    return budget;
  }

  private async pollAndExecute(): Promise<void> {
    try {
      while (this.isRunning && this.inFlight.size < this.config.poolSize) {
        const job = await this.repo.leaseNextEligible({
          now: new Date(),
          ownerBudget: this.ownerBudget(),
        });

        if (!job) return;
        this.track(job);
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Error in poll and execute');
    }
  }

  private track(job: Job): void {
    const key = ownerKey(job.owner);
    this.ownerConcurrency.set(key, (this.ownerConcurrency.get(key) ?? 0) + 1);

    const execution = this.executor.execute(job)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error({ err: error, ticket: job.ticket }, 'Job execution crashed');
        }
      )
      .finally(() => {
        this.inFlight.delete(job.ticket);

        const current = this.ownerConcurrency.get(key) ?? 0;
        if (current <= 1) {
          this.ownerConcurrency.delete(key);
        } else {
          this.ownerConcurrency.set(key, current - 1);
        }

        this.wake();
      });

    this.inFlight.set(job.ticket, execution);
  }

  private async reap(): Promise<void> {
    if (this.config.staleAfterMs === 0) return;

    try {
      const now = new Date();
      const cutoff = new Date(now.getTime() - this.config.staleAfterMs);
      const failed = await this.repo.failStale({ now, heartbeatBefore: cutoff, pendingBefore: cutoff });

      for (const job of failed) {
        this.reaped++;
        this.logger.warn({ ticket: job.ticket, kind: job.kind, owner: job.owner }, 'Failed stale job');
        await this.executor.releaseScratch(job.ticket);
      }
    } catch (error) {
      this.logger.error({ err: error }, 'Error while reaping stale jobs');
    }
  }
}
