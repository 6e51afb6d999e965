import type { ArtifactStore } from '../artifacts/store.js';
import type { EngineRegistry } from '../engine/base.js';
import { EngineFailure } from '../engine/base.js';
import type { Logger } from '../logger.js';
import type { JobRepository } from '../repositories/base.js';
import type { Job, JobError, JobUpdate } from '../types/job.js';

export interface ExecutorOptions {
  heartbeatIntervalMs: number;
  jobMaxRunMs: number; // 0 = unbounded
}

export interface ExecutorStats {
  running: number;
  processed: number;
  failed: number;
  interrupted: number;
}

/** Abort reason set by the executor itself; engines see it on `signal.reason`. */
export class ExecutionAborted extends Error {
  constructor(readonly reason: 'timeout' | 'interrupted', message: string) {
    super(message);
    this.name = 'ExecutionAborted';
  }
}

export class UnknownTicketError extends Error {
  constructor(readonly ticket: string) {
    super(`Unknown ticket: ${ticket}`);
    this.name = 'UnknownTicketError';
  }
}

/**
 * Runs one job from `running` to a terminal state. Shared by prompt requests,
 * which claim their own job through `run`, and the worker pool, which hands
 * over jobs it has already leased through `execute`.
 */
export class JobExecutor {
  private active = new Map<string, AbortController>();
  private stats: Omit<ExecutorStats, 'running'> = { processed: 0, failed: 0, interrupted: 0 };
  private readonly accounting: Logger;

  constructor(
    private repo: JobRepository,
    private artifacts: ArtifactStore,
    private engines: EngineRegistry,
    private logger: Logger,
    private options: ExecutorOptions
  ) {
    this.accounting = logger.child({ component: 'accounting' });
  }

  get activeCount(): number {
    return this.active.size;
  }

  getStats(): ExecutorStats {
    return { running: this.active.size, ...this.stats };
  }

  /**
   * Claims a pending job and executes it. When the claim is lost the job is
   * not executed; its current state is returned instead.
   */
  async run(ticket: string): Promise<Job> {
    const now = new Date();
    const claimed = await this.repo.transition(ticket, 'pending', {
      status: 'running',
      startedAt: now,
      lastHeartbeatAt: now,
    });

    if (!claimed) {
      const current = await this.repo.get(ticket);
      if (!current) throw new UnknownTicketError(ticket);
      this.logger.warn({ ticket, status: current.status }, 'Job already claimed, not executing');
      return current;
    }

    return this.execute(claimed);
  }

  async execute(job: Job): Promise<Job> {
    const { ticket } = job;
    const startedAt = job.startedAt ?? new Date();
    const controller = new AbortController();
    this.active.set(ticket, controller);

    const timeout = this.options.jobMaxRunMs > 0
      ? setTimeout(() => {
          controller.abort(new ExecutionAborted('timeout', `Job exceeded the maximum run time of ${this.options.jobMaxRunMs} ms`));
        }, this.options.jobMaxRunMs)
      : undefined;
    const heartbeat = setInterval(() => {
      void this.beat(ticket);
    }, this.options.heartbeatIntervalMs);

    this.logger.info({ ticket, kind: job.kind, owner: job.owner }, 'Job started');

    let outcome: JobUpdate;
    try {
      outcome = await this.process(job, controller.signal);
    } catch (error) {
      outcome = { status: 'failed', error: this.classify(error, controller.signal), completedAt: new Date() };
    } finally {
      clearTimeout(timeout);
      clearInterval(heartbeat);
      this.active.delete(ticket);
    }

    const finished = await this.finish(job, outcome);
    await this.releaseScratch(ticket);

    const completedAt = outcome.completedAt ?? new Date();
    this.accounting.info({
      ticket,
      kind: job.kind,
      success: outcome.status === 'success',
      execution_start: startedAt.toISOString(),
      execution_time: Math.round(completedAt.getTime() - startedAt.getTime()) / 1000,
      filesize: job.inputSize,
      comment: outcome.error?.message ?? null,
    }, 'Job finished');

    return finished ?? (await this.repo.get(ticket)) ?? job;
  }

  /** Aborts every job this executor is running; they are recorded as interrupted. */
  abortAll(): void {
    for (const controller of this.active.values()) {
      controller.abort(new ExecutionAborted('interrupted', 'Service stopped before the job finished'));
    }
  }

  async releaseScratch(ticket: string): Promise<void> {
    try {
      await this.artifacts.releaseScratch(ticket);
    } catch (error) {
      this.logger.warn({ err: error, ticket }, 'Failed to remove scratch directory');
    }
  }

  private async process(job: Job, signal: AbortSignal): Promise<JobUpdate> {
    const engine = this.engines.get(job.kind);
    if (!engine) {
      return {
        status: 'failed',
        error: { category: 'internal_fault', reason: 'no_engine', message: `No processing engine is configured for ${job.kind}` },
        completedAt: new Date(),
      };
    }

    const output = await engine.process({
      ticket: job.ticket,
      request: job,
      inputPath: job.inputRef,
      workDir: this.artifacts.workDir(job.ticket),
      signal,
      heartbeat: () => this.beat(job.ticket),
    });
    signal.throwIfAborted();

    const outputRef = await this.artifacts.store(job.ticket, output.artifactPath);
    return { status: 'success', outputRef, completedAt: new Date() };
  }

  private classify(error: unknown, signal: AbortSignal): JobError {
    if (signal.aborted && signal.reason instanceof ExecutionAborted) {
      return { category: 'internal_fault', reason: signal.reason.reason, message: signal.reason.message };
    }
    if (error instanceof EngineFailure) {
      return { category: 'processing_failed', reason: error.reason, message: error.message };
    }

    this.logger.error({ err: error }, 'Unexpected error while executing job');
    return {
      category: 'internal_fault',
      reason: 'unexpected',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  private async finish(job: Job, outcome: JobUpdate): Promise<Job | null> {
    try {
      const finished = await this.repo.transition(job.ticket, 'running', outcome);
      if (!finished) {
        this.logger.warn({ ticket: job.ticket }, 'Job left running state before its outcome was recorded');
        return null;
      }

      if (finished.status === 'success') {
        this.stats.processed++;
      } else if (finished.error?.reason === 'interrupted') {
        this.stats.interrupted++;
      } else {
        this.stats.failed++;
      }
      this.logger.info({ ticket: job.ticket, status: finished.status, error: finished.error ?? undefined }, 'Job completed');
      return finished;
    } catch (error) {
      this.logger.fatal({ err: error, ticket: job.ticket }, 'Could not record job outcome');
      return null;
    }
  }

  private async beat(ticket: string): Promise<void> {
    try {
      await this.repo.heartbeat(ticket, new Date());
    } catch (error) {
      this.logger.warn({ err: error, ticket }, 'Heartbeat failed');
    }
  }
}
