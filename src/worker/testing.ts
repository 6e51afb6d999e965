import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { monotonicFactory } from 'ulid';
import type { ArtifactStore } from '../artifacts/store.js';
import type { EngineOutput, EngineTask, ProcessingEngine } from '../engine/base.js';
import type { JobRepository } from '../repositories/base.js';
import { parseJobRequest } from '../schemas/job.js';
import type { Job, ResponseMode } from '../types/job.js';

// Test doubles shared by the executor, pool and dispatcher tests.

export const nextTicket = monotonicFactory();

export class FakeEngine implements ProcessingEngine {
  readonly name = 'fake';
  readonly calls: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(private behaviour: (task: EngineTask) => Promise<EngineOutput> = writeReport) {}

  async process(task: EngineTask): Promise<EngineOutput> {
    this.calls.push(task.ticket);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.behaviour(task);
    } finally {
      this.active--;
    }
  }
}

export async function writeReport(task: EngineTask): Promise<EngineOutput> {
  const artifactPath = join(task.workDir, 'result.json');
  await writeFile(artifactPath, JSON.stringify({ ticket: task.ticket, kind: task.request.kind }));
  return { artifactPath };
}

/** Settles once the job's signal aborts, with the abort reason. */
export function untilAborted(task: EngineTask): Promise<never> {
  return new Promise<never>((_, reject) => {
    task.signal.addEventListener('abort', () => reject(task.signal.reason), { once: true });
  });
}

export class Gate {
  private waiting: Array<() => void> = [];
  private opened = false;

  wait(): Promise<void> {
    if (this.opened) return Promise.resolve();
    return new Promise(resolve => this.waiting.push(resolve));
  }

  open(): void {
    this.opened = true;
    for (const resolve of this.waiting.splice(0)) resolve();
  }
}

export async function createJob(
  repo: JobRepository,
  artifacts: ArtifactStore,
  options: { mode?: ResponseMode; owner?: string | null } = {}
): Promise<Job> {
  const ticket = nextTicket();
  const input = await artifacts.materializeUpload(ticket, 'points.csv', Buffer.from('a,b\n'));
  return repo.create({
    ticket,
    request: parseJobRequest('profile-vector', {}),
    mode: options.mode ?? 'deferred',
    owner: options.owner ?? null,
    inputRef: input.path,
    inputName: input.name,
    inputSize: input.size,
  });
}

export async function waitFor(check: () => Promise<boolean>, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}
