import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArtifactStore } from '../artifacts/store.js';
import type { WorkerConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { InMemoryJobRepository } from '../repositories/memory.js';
import { JobExecutor, WorkerPool } from './index.js';
import { FakeEngine, Gate, createJob, untilAborted, waitFor, writeReport } from './testing.js';

describe('WorkerPool', () => {
  let root: string;
  let repo: InMemoryJobRepository;
  let artifacts: ArtifactStore;
  let engine: FakeEngine;
  let config: WorkerConfig;
  let pools: WorkerPool[];

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'worker-pool-'));
    repo = new InMemoryJobRepository();
    artifacts = new ArtifactStore({
      inputDir: join(root, 'input'),
      outputDir: join(root, 'output'),
      tempDir: join(root, 'tmp'),
    });
    engine = new FakeEngine();
    config = {
      poolSize: 2,
      ownerMaxConcurrency: 1,
      pollIntervalMs: 20,
      jobMaxRunMs: 0,
      heartbeatIntervalMs: 1000,
      staleAfterMs: 0,
      reapIntervalMs: 1000,
      shutdownGraceMs: 200,
    };
    pools = [];
  });

  afterEach(async () => {
    for (const pool of pools) await pool.stop();
    rmSync(root, { recursive: true, force: true });
  });

  function createPool(): WorkerPool {
    const logger = createLogger('silent');
    const executor = new JobExecutor(repo, artifacts, new Map([['profile-vector', engine]]), logger, config);
    const pool = new WorkerPool(repo, executor, logger, config);
    pools.push(pool);
    return pool;
  }

  async function statusOf(ticket: string) {
    return (await repo.get(ticket))?.status;
  }

  describe('start and stop', () => {
    it('should start and stop successfully', async () => {
      const pool = createPool();
      await pool.start();
      expect(pool.getStats().running).toBe(0);

      await pool.stop();
    });

    it('should not start twice', async () => {
      const pool = createPool();
      await pool.start();
      await pool.start(); // Should not throw
      await pool.stop();
      await pool.stop();
    });
  });

  describe('job execution', () => {
    it('should execute queued deferred jobs', async () => {
      const pool = createPool();
      await pool.start();

      const job = await createJob(repo, artifacts, { mode: 'deferred' });
      pool.wake();

      await waitFor(async () => (await statusOf(job.ticket)) === 'success');
      expect(pool.getStats().processed).toBe(1);
    });

    it('should leave prompt jobs to their request', async () => {
      const job = await createJob(repo, artifacts, { mode: 'prompt' });
      const pool = createPool();
      await pool.start();

      await new Promise(resolve => setTimeout(resolve, 100));

      expect(await statusOf(job.ticket)).toBe('pending');
      expect(engine.calls).toEqual([]);
    });

    it('should run no more jobs at once than it has slots', async () => {
      const gate = new Gate();
      engine = new FakeEngine(async task => {
        await gate.wait();
        return writeReport(task);
      });
      const jobs = await Promise.all(['a', 'b', 'c'].map(owner => createJob(repo, artifacts, { owner })));
      const pool = createPool();
      await pool.start();

      await waitFor(async () => engine.active === 2);
      await new Promise(resolve => setTimeout(resolve, 60));
      expect(engine.active).toBe(2);
      expect(pool.getStats().ownerConcurrency).toEqual({ a: 1, b: 1 });

      gate.open();
      for (const job of jobs) {
        await waitFor(async () => (await statusOf(job.ticket)) === 'success');
      }
      expect(engine.maxActive).toBe(2);
    });

    it('should limit concurrency per owner', async () => {
      const gate = new Gate();
      engine = new FakeEngine(async task => {
        await gate.wait();
        return writeReport(task);
      });
      const first = await createJob(repo, artifacts, { owner: 'alice' });
      const second = await createJob(repo, artifacts, { owner: 'alice' });
      const pool = createPool();
      await pool.start();

      await waitFor(async () => engine.active === 1);
      await new Promise(resolve => setTimeout(resolve, 60));
      expect(engine.calls).toEqual([first.ticket]);
      expect(await statusOf(second.ticket)).toBe('pending');

      gate.open();
      await waitFor(async () => (await statusOf(second.ticket)) === 'success');
      expect(engine.maxActive).toBe(1);
    });

    it('should execute every ticket once across pools sharing a store', async () => {
      config.poolSize = 4;
      config.ownerMaxConcurrency = 4;
      const jobs = await Promise.all(Array.from({ length: 8 }, () => createJob(repo, artifacts)));
      const sharing = [createPool(), createPool(), createPool()];
      await Promise.all(sharing.map(pool => pool.start()));

      for (const job of jobs) {
        await waitFor(async () => (await statusOf(job.ticket)) === 'success');
      }

      expect([...engine.calls].sort()).toEqual(jobs.map(job => job.ticket).sort());
    });
  });

  describe('stop', () => {
    it('should interrupt jobs still running after the grace period', async () => {
      config.shutdownGraceMs = 50;
      engine = new FakeEngine(untilAborted);
      const job = await createJob(repo, artifacts);
      const pool = createPool();
      await pool.start();
      await waitFor(async () => engine.active === 1);

      await pool.stop();

      const stopped = await repo.get(job.ticket);
      expect(stopped?.status).toBe('failed');
      expect(stopped?.error).toMatchObject({ category: 'internal_fault', reason: 'interrupted' });
      expect(pool.getStats().interrupted).toBe(1);
    });

    it('should let jobs finish within the grace period', async () => {
      engine = new FakeEngine(async task => {
        await new Promise(resolve => setTimeout(resolve, 50));
        return writeReport(task);
      });
      const job = await createJob(repo, artifacts);
      const pool = createPool();
      await pool.start();
      await waitFor(async () => engine.active === 1);

      await pool.stop();

      expect(await statusOf(job.ticket)).toBe('success');
    });
  });

  describe('reaper', () => {
    it('should fail jobs whose executor stopped sending heartbeats', async () => {
      config.staleAfterMs = 1000;
      const job = await createJob(repo, artifacts);
      const longAgo = new Date(Date.now() - 60_000);
      await repo.transition(job.ticket, 'pending', { status: 'running', startedAt: longAgo, lastHeartbeatAt: longAgo });
      const pool = createPool();

      await pool.start();

      const reaped = await repo.get(job.ticket);
      expect(reaped?.status).toBe('failed');
      expect(reaped?.error).toMatchObject({ category: 'internal_fault', reason: 'worker_lost' });
      expect(pool.getStats().reaped).toBe(1);
      expect(engine.calls).toEqual([]);
    });
  });
});
