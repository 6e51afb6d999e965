import type { JobKind, JobRequest, ProcessingFailureReason } from '../types/job.js';

export interface EngineTask {
  ticket: string;
  request: JobRequest;
  inputPath: string;
  /** Scratch directory the engine may write into; removed after the job. */
  workDir: string;
  signal: AbortSignal;
  heartbeat: () => Promise<void>;
}

export interface EngineOutput {
  /** File inside `workDir` to keep as the job's artifact. */
  artifactPath: string;
}

export interface ProcessingEngine {
  readonly name: string;
  process(task: EngineTask): Promise<EngineOutput>;
}

/** Thrown by engines when the input, not the service, is at fault. */
export class EngineFailure extends Error {
  constructor(readonly reason: ProcessingFailureReason, message: string) {
    super(message);
    this.name = 'EngineFailure';
  }
}

export type EngineRegistry = Map<JobKind, ProcessingEngine>;
