import { monotonicFactory } from 'ulid';
import type { ArtifactStore, MaterializedInput } from '../artifacts/store.js';
import { InvalidRequestError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { JobRepository } from '../repositories/base.js';
import { JobRequestSchema } from '../schemas/job.js';
import type { Job, JobKind, JobRequest, ResponseMode } from '../types/job.js';
import type { JobExecutor } from '../worker/executor.js';

export type ResourceSource =
  | { type: 'content'; fileName: string; content: Buffer }
  | { type: 'path'; path: string };

export interface Submission {
  kind: JobKind;
  /** Raw request fields; validated against the schema of `kind`. */
  params: unknown;
  source: ResourceSource;
  mode: ResponseMode;
  owner: string | null;
}

export interface JobScheduler {
  wake(): void;
}

export class TicketDispatcher {
  constructor(
    private repo: JobRepository,
    private artifacts: ArtifactStore,
    private executor: JobExecutor,
    private scheduler: JobScheduler,
    private logger: Logger,
    private issueTicket: () => string = monotonicFactory()
  ) {}

  /**
   * Validates a request and records it as a pending job under a fresh ticket.
   * Deferred submissions return the pending job at once; prompt submissions
   * execute it inline and return it in its terminal state. Nothing is recorded
   * for a request that fails validation.
   */
  async submit(submission: Submission): Promise<Job> {
    const request = this.validate(submission.kind, submission.params);
    const source = submission.source.type === 'path'
      ? { type: 'path' as const, path: await this.artifacts.resolveInputPath(submission.source.path) }
      : submission.source;

    const ticket = this.issueTicket();
    let job: Job;
    try {
      const input = await this.materialize(ticket, source);
      job = await this.repo.create({
        ticket,
        request,
        mode: submission.mode,
        owner: submission.owner,
        inputRef: input.path,
        inputName: input.name,
        inputSize: input.size,
      });
    } catch (error) {
      await this.artifacts.releaseScratch(ticket);
      throw error;
    }

    this.logger.info({ ticket, kind: job.kind, mode: job.mode, owner: job.owner, inputSize: job.inputSize }, 'Job submitted');

    if (job.mode === 'deferred') {
      this.scheduler.wake();
      return job;
    }
    return this.executor.run(ticket);
  }

  private validate(kind: JobKind, params: unknown): JobRequest {
    const parsed = JobRequestSchema.safeParse({ kind, params });
    if (!parsed.success) {
      throw InvalidRequestError.fromZod(parsed.error);
    }
    return parsed.data;
  }

  private materialize(ticket: string, source: ResourceSource): Promise<MaterializedInput> {
    return source.type === 'content'
      ? this.artifacts.materializeUpload(ticket, source.fileName, source.content)
      : this.artifacts.materializePath(ticket, source.path);
  }
}
