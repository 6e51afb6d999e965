import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArtifactStore } from './artifacts/store.js';
import { runCli } from './cli.js';
import { createLogger } from './logger.js';
import { SqliteJobRepository } from './repositories/sqlite.js';
import { createJob } from './worker/testing.js';

describe('cli', () => {
  let root: string;
  let env: NodeJS.ProcessEnv;
  let databasePath: string;
  const logger = createLogger('silent');

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'cli-'));
    databasePath = join(root, 'db', 'jobs.sqlite');
    env = {
      INPUT_DIR: join(root, 'input'),
      OUTPUT_DIR: join(root, 'output'),
      TEMP_DIR: join(root, 'tmp'),
      DATABASE_PATH: databasePath,
    };
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('init-db', () => {
    it('should create the job store', async () => {
      expect(await runCli(['init-db'], { env, logger })).toBe(0);
      expect(existsSync(databasePath)).toBe(true);
    });

    it('should refuse the in-memory store', async () => {
      expect(await runCli(['init-db'], { env: { ...env, REPO_KIND: 'memory' }, logger })).toBe(2);
    });

    it('should fail on invalid configuration', async () => {
      expect(await runCli(['init-db'], { env: { DATABASE_PATH: databasePath }, logger })).toBe(1);
    });
  });

  describe('prune', () => {
    it('should delete old finished jobs and their artifacts', async () => {
      const repo = new SqliteJobRepository(databasePath);
      const artifacts = new ArtifactStore({ inputDir: env.INPUT_DIR ?? '', outputDir: env.OUTPUT_DIR ?? '', tempDir: env.TEMP_DIR ?? '' });

      const done = await createJob(repo, artifacts);
      await repo.transition(done.ticket, 'pending', { status: 'running', startedAt: new Date() });
      const outputRef = await artifacts.store(done.ticket, done.inputRef);
      await repo.transition(done.ticket, 'running', { status: 'success', outputRef, completedAt: new Date() });

      const failed = await createJob(repo, artifacts);
      await repo.transition(failed.ticket, 'pending', {
        status: 'failed',
        completedAt: new Date(),
        error: { category: 'internal_fault', reason: 'unexpected', message: 'boom' },
      });

      const waiting = await createJob(repo, artifacts);
      await repo.close();

      const now = new Date(Date.now() + 10 * 24 * 60 * 60 * 1000);
      const code = await runCli(['prune', '--older-than-days', '1', '--status', 'success'], { env, logger, now });

      expect(code).toBe(0);
      expect(existsSync(artifacts.ticketDir(done.ticket))).toBe(false);
      expect(existsSync(artifacts.scratchDir(done.ticket))).toBe(false);

      const reopened = new SqliteJobRepository(databasePath);
      expect(await reopened.get(done.ticket)).toBeNull();
      expect((await reopened.get(failed.ticket))?.status).toBe('failed');
      expect((await reopened.get(waiting.ticket))?.status).toBe('pending');
      await reopened.close();
    });

    it('should keep jobs younger than the cutoff', async () => {
      const repo = new SqliteJobRepository(databasePath);
      const artifacts = new ArtifactStore({ inputDir: env.INPUT_DIR ?? '', outputDir: env.OUTPUT_DIR ?? '', tempDir: env.TEMP_DIR ?? '' });
      const job = await createJob(repo, artifacts);
      await repo.transition(job.ticket, 'pending', {
        status: 'failed',
        completedAt: new Date(),
        error: { category: 'internal_fault', reason: 'unexpected', message: 'boom' },
      });
      await repo.close();

      expect(await runCli(['prune', '--older-than-days=30'], { env, logger })).toBe(0);

      const reopened = new SqliteJobRepository(databasePath);
      expect((await reopened.get(job.ticket))?.status).toBe('failed');
      await reopened.close();
    });

    it('should require --older-than-days', async () => {
      expect(await runCli(['prune'], { env, logger })).toBe(2);
    });

    it('should reject unknown options', async () => {
      expect(await runCli(['prune', '--older-than-days', '1', '--force', 'yes'], { env, logger })).toBe(2);
    });
  });

  it('should reject unknown commands', async () => {
    expect(await runCli(['vacuum'], { env, logger })).toBe(2);
  });
});
