import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { monotonicFactory } from 'ulid';
import type { CreateJobData, JobRequest, ResponseMode } from '../types/job.js';
import { parseJobRequest } from '../schemas/job.js';
import type { JobRepository } from './base.js';
import { InvalidTransitionError } from './base.js';

const nextTicket = monotonicFactory();

export function jobData(overrides: Partial<CreateJobData> = {}): CreateJobData {
  const request: JobRequest = parseJobRequest('profile-raster', { width: '800' });
  return {
    ticket: nextTicket(),
    request,
    mode: 'deferred',
    owner: null,
    inputRef: 'scratch/input/dem.tif',
    inputName: 'dem.tif',
    inputSize: 1024,
    ...overrides,
  };
}

/**
 * Behaviour every job store must share. Run against each implementation from
 * its own test file.
 */
export function describeJobRepository(name: string, createRepo: () => JobRepository): void {
  describe(`${name} (job store contract)`, () => {
    let repo: JobRepository;

    beforeEach(() => {
      repo = createRepo();
    });

    afterEach(async () => {
      await repo.close();
    });

    async function createWithMode(mode: ResponseMode, owner: string | null = null) {
      return repo.create(jobData({ mode, owner }));
    }

    describe('create', () => {
      it('should store a pending job with empty outcome fields', async () => {
        const data = jobData({ owner: 'alice' });
        const job = await repo.create(data);

        expect(job.ticket).toBe(data.ticket);
        expect(job.kind).toBe('profile-raster');
        expect(job.params).toEqual({ basemap_provider: 'OpenStreetMap', basemap_name: 'Mapnik', width: 800 });
        expect(job.status).toBe('pending');
        expect(job.mode).toBe('deferred');
        expect(job.owner).toBe('alice');
        expect(job.outputRef).toBeNull();
        expect(job.error).toBeNull();
        expect(job.startedAt).toBeNull();
        expect(job.completedAt).toBeNull();
      });

      it('should reject a ticket that was already issued', async () => {
        const data = jobData();
        await repo.create(data);

        await expect(repo.create(data)).rejects.toThrow();
      });

      it('should keep normalize parameters intact', async () => {
        const request = parseJobRequest('normalize', {
          resource_type: 'csv',
          csv_delimiter: ';',
          date_normalization: 'created, updated',
          wkt_normalization: 'true',
        });
        const created = await repo.create(jobData({ request }));
        const stored = await repo.get(created.ticket);

        expect(stored?.kind).toBe('normalize');
        expect(stored?.params).toEqual(created.params);
        expect(stored?.params).toMatchObject({
          csv_delimiter: ';',
          date_normalization: ['created', 'updated'],
          wkt_normalization: true,
          column_name_normalization: false,
        });
      });
    });

    describe('get', () => {
      it('should return null for an unknown ticket', async () => {
        expect(await repo.get('01HZZZZZZZZZZZZZZZZZZZZZZZ')).toBeNull();
      });

      it('should return the stored job', async () => {
        const created = await repo.create(jobData());
        expect(await repo.get(created.ticket)).toEqual(created);
      });
    });

    describe('transition', () => {
      it('should move a job forward only from the expected status', async () => {
        const job = await repo.create(jobData());
        const startedAt = new Date();

        const running = await repo.transition(job.ticket, 'pending', { status: 'running', startedAt });
        expect(running?.status).toBe('running');
        expect(running?.startedAt).toEqual(startedAt);

        const again = await repo.transition(job.ticket, 'pending', { status: 'running' });
        expect(again).toBeNull();
        expect((await repo.get(job.ticket))?.startedAt).toEqual(startedAt);
      });

      it('should record the outcome of a finished job', async () => {
        const job = await repo.create(jobData());
        await repo.transition(job.ticket, 'pending', { status: 'running', startedAt: new Date() });

        const done = await repo.transition(job.ticket, 'running', {
          status: 'success',
          outputRef: '240101/x/report.json',
          completedAt: new Date(),
        });

        expect(done?.status).toBe('success');
        expect((await repo.get(job.ticket))?.outputRef).toBe('240101/x/report.json');
      });

      it('should store failure details', async () => {
        const job = await repo.create(jobData());
        await repo.transition(job.ticket, 'pending', {
          status: 'failed',
          error: { category: 'processing_failed', reason: 'bad_input', message: 'no header row' },
          completedAt: new Date(),
        });

        expect((await repo.get(job.ticket))?.error).toEqual({
          category: 'processing_failed',
          reason: 'bad_input',
          message: 'no header row',
        });
      });

      it('should refuse moves the state machine does not allow', async () => {
        const job = await repo.create(jobData());

        await expect(repo.transition(job.ticket, 'pending', { status: 'success', outputRef: 'x' }))
          .rejects.toBeInstanceOf(InvalidTransitionError);
        await expect(repo.transition(job.ticket, 'success', { status: 'running' }))
          .rejects.toBeInstanceOf(InvalidTransitionError);
        expect((await repo.get(job.ticket))?.status).toBe('pending');
      });

      it('should return null for an unknown ticket', async () => {
        expect(await repo.transition('missing', 'pending', { status: 'running' })).toBeNull();
      });
    });

    describe('heartbeat', () => {
      it('should only touch running jobs', async () => {
        const job = await repo.create(jobData());
        const at = new Date(Date.now() + 1000);

        expect(await repo.heartbeat(job.ticket, at)).toBe(false);

        await repo.transition(job.ticket, 'pending', { status: 'running', startedAt: new Date() });
        expect(await repo.heartbeat(job.ticket, at)).toBe(true);
        expect((await repo.get(job.ticket))?.lastHeartbeatAt).toEqual(at);

        await repo.transition(job.ticket, 'running', {
          status: 'failed',
          error: { category: 'internal_fault', reason: 'unexpected', message: 'boom' },
        });
        expect(await repo.heartbeat(job.ticket, at)).toBe(false);
      });
    });

    describe('find', () => {
      let tickets: string[];

      beforeEach(async () => {
        const a = await repo.create(jobData({ owner: 'alice' }));
        const b = await repo.create(jobData({ owner: 'alice', request: parseJobRequest('profile-vector', {}) }));
        const c = await repo.create(jobData({ owner: null }));
        tickets = [a.ticket, b.ticket, c.ticket];
      });

      it('should list newest first', async () => {
        const result = await repo.find({});
        expect(result.jobs.map(job => job.ticket)).toEqual([...tickets].reverse());
        expect(result.nextCursor).toBeUndefined();
      });

      it('should filter by owner, treating null as anonymous', async () => {
        const alice = await repo.find({ owner: 'alice' });
        expect(alice.jobs.map(job => job.ticket)).toEqual([tickets[1], tickets[0]]);

        const anonymous = await repo.find({ owner: null });
        expect(anonymous.jobs.map(job => job.ticket)).toEqual([tickets[2]]);
      });

      it('should filter by kind and status', async () => {
        const vector = await repo.find({ kind: 'profile-vector' });
        expect(vector.jobs.map(job => job.ticket)).toEqual([tickets[1]]);

        await repo.transition(tickets[0], 'pending', { status: 'running' });
        const running = await repo.find({ status: 'running' });
        expect(running.jobs.map(job => job.ticket)).toEqual([tickets[0]]);
      });

      it('should page with a cursor', async () => {
        const firstPage = await repo.find({ limit: 2 });
        expect(firstPage.jobs.map(job => job.ticket)).toEqual([tickets[2], tickets[1]]);
        expect(firstPage.nextCursor).toBe(tickets[1]);

        const secondPage = await repo.find({ limit: 2, cursor: firstPage.nextCursor });
        expect(secondPage.jobs.map(job => job.ticket)).toEqual([tickets[0]]);
        expect(secondPage.nextCursor).toBeUndefined();
      });
    });

    describe('leaseNextEligible', () => {
      it('should return null when nothing is queued', async () => {
        expect(await repo.leaseNextEligible({ now: new Date(), ownerBudget: { '*': 1 } })).toBeNull();
      });

      it('should lease the oldest deferred job and mark it running', async () => {
        const first = await createWithMode('deferred');
        await createWithMode('deferred');
        const now = new Date();

        const leased = await repo.leaseNextEligible({ now, ownerBudget: { '*': 1 } });

        expect(leased?.ticket).toBe(first.ticket);
        expect(leased?.status).toBe('running');
        expect(leased?.startedAt).toEqual(now);
        expect(leased?.lastHeartbeatAt).toEqual(now);
      });

      it('should never hand out prompt jobs', async () => {
        await createWithMode('prompt');
        expect(await repo.leaseNextEligible({ now: new Date(), ownerBudget: { '*': 4 } })).toBeNull();
      });

      it('should hand out each ticket once', async () => {
        await createWithMode('deferred');

        const first = await repo.leaseNextEligible({ now: new Date(), ownerBudget: { '*': 4 } });
        const second = await repo.leaseNextEligible({ now: new Date(), ownerBudget: { '*': 4 } });

        expect(first).not.toBeNull();
        expect(second).toBeNull();
      });

      it('should skip owners without budget', async () => {
        await createWithMode('deferred', 'alice');
        const bob = await createWithMode('deferred', 'bob');

        const leased = await repo.leaseNextEligible({ now: new Date(), ownerBudget: { alice: 0, '*': 1 } });
        expect(leased?.ticket).toBe(bob.ticket);
      });

      it('should budget anonymous jobs under their own key', async () => {
        await createWithMode('deferred', null);
        const leased = await repo.leaseNextEligible({ now: new Date(), ownerBudget: { '~anonymous': 0, '*': 1 } });
        expect(leased).toBeNull();
      });
    });

    describe('failStale', () => {
      it('should fail running jobs whose heartbeat stopped', async () => {
        const job = await createWithMode('deferred');
        const longAgo = new Date(Date.now() - 60_000);
        await repo.transition(job.ticket, 'pending', { status: 'running', startedAt: longAgo, lastHeartbeatAt: longAgo });
        const now = new Date();

        const failed = await repo.failStale({
          now,
          heartbeatBefore: new Date(now.getTime() - 30_000),
          pendingBefore: new Date(now.getTime() - 30_000),
        });

        expect(failed.map(j => j.ticket)).toEqual([job.ticket]);
        const stored = await repo.get(job.ticket);
        expect(stored?.status).toBe('failed');
        expect(stored?.error).toMatchObject({ category: 'internal_fault', reason: 'worker_lost' });
        expect(stored?.completedAt).toEqual(now);
      });

      it('should leave fresh running jobs and queued deferred jobs alone', async () => {
        const running = await createWithMode('deferred');
        await repo.transition(running.ticket, 'pending', { status: 'running', lastHeartbeatAt: new Date() });
        const queued = await createWithMode('deferred');
        const now = new Date();

        const failed = await repo.failStale({
          now,
          heartbeatBefore: new Date(now.getTime() - 30_000),
          pendingBefore: new Date(now.getTime() + 30_000),
        });

        expect(failed).toEqual([]);
        expect((await repo.get(running.ticket))?.status).toBe('running');
        expect((await repo.get(queued.ticket))?.status).toBe('pending');
      });

      it('should fail prompt jobs nobody started', async () => {
        const job = await createWithMode('prompt');
        const now = new Date(Date.now() + 60_000);

        const failed = await repo.failStale({ now, heartbeatBefore: new Date(0), pendingBefore: now });

        expect(failed.map(j => j.ticket)).toEqual([job.ticket]);
        expect(failed[0]?.error).toMatchObject({ reason: 'worker_lost' });
      });
    });

    describe('prune', () => {
      it('should remove finished jobs created before the cutoff', async () => {
        const done = await repo.create(jobData());
        await repo.transition(done.ticket, 'pending', {
          status: 'failed',
          error: { category: 'internal_fault', reason: 'unexpected', message: 'x' },
        });
        const pending = await repo.create(jobData());

        const removed = await repo.prune({ olderThan: new Date(Date.now() + 60_000) });

        expect(removed.map(job => job.ticket)).toEqual([done.ticket]);
        expect(await repo.get(done.ticket)).toBeNull();
        expect(await repo.get(pending.ticket)).not.toBeNull();
      });

      it('should honour the status filter and the cutoff', async () => {
        const failed = await repo.create(jobData());
        await repo.transition(failed.ticket, 'pending', {
          status: 'failed',
          error: { category: 'internal_fault', reason: 'unexpected', message: 'x' },
        });

        expect(await repo.prune({ status: 'success', olderThan: new Date(Date.now() + 60_000) })).toEqual([]);
        expect(await repo.prune({ status: 'failed', olderThan: new Date(0) })).toEqual([]);
        expect(await repo.get(failed.ticket)).not.toBeNull();
      });
    });

    describe('getStats', () => {
      it('should count jobs by state', async () => {
        await repo.create(jobData());
        const running = await repo.create(jobData());
        const succeeded = await repo.create(jobData());

        await repo.transition(running.ticket, 'pending', { status: 'running' });
        await repo.transition(succeeded.ticket, 'pending', { status: 'running' });
        await repo.transition(succeeded.ticket, 'running', {
          status: 'success',
          outputRef: 'out/report.json',
          completedAt: new Date(),
        });

        expect(await repo.getStats()).toEqual({
          queueDepth: 1,
          running: 1,
          completedLast5m: 1,
          failedLast5m: 0,
        });
      });
    });

    it('should answer a ping', async () => {
      await expect(repo.ping()).resolves.toBeUndefined();
    });
  });
}
