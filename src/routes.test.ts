import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { loadConfig } from './config.js';
import { EngineFailure } from './engine/base.js';
import type { EngineRegistry, ProcessingEngine } from './engine/base.js';
import { createServer } from './server.js';
import { FakeEngine, Gate, waitFor, writeReport } from './worker/testing.js';

const BOUNDARY = '----spatial-profile-test';

function multipart(fields: Record<string, string | string[]>, file?: { name: string; content: string }) {
  const chunks: string[] = [];
  for (const [name, value] of Object.entries(fields)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      chunks.push(`--${BOUNDARY}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${item}\r\n`);
    }
  }
  if (file) {
    chunks.push(
      `--${BOUNDARY}\r\nContent-Disposition: form-data; name="resource"; filename="${file.name}"\r\n` +
      `Content-Type: application/octet-stream\r\n\r\n${file.content}\r\n`
    );
  }
  chunks.push(`--${BOUNDARY}--\r\n`);

  return {
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
    payload: chunks.join(''),
  };
}

describe('Job API Routes', () => {
  let root: string;
  let app: FastifyInstance | undefined;
  let engine: ProcessingEngine;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'routes-'));
    mkdirSync(join(root, 'input'));
    engine = new FakeEngine();
  });

  afterEach(async () => {
    await app?.close();
    app = undefined;
    rmSync(root, { recursive: true, force: true });
  });

  async function start(env: Record<string, string> = {}): Promise<FastifyInstance> {
    const config = loadConfig({
      INPUT_DIR: join(root, 'input'),
      OUTPUT_DIR: join(root, 'output'),
      TEMP_DIR: join(root, 'tmp'),
      REPO_KIND: 'memory',
      LOG_LEVEL: 'silent',
      POLL_INTERVAL_MS: '20',
      SHUTDOWN_GRACE_MS: '100',
      ...env,
    });
    const engines: EngineRegistry = new Map([
      ['profile-vector', engine],
      ['profile-raster', engine],
      ['normalize', engine],
    ]);
    app = await createServer({ config, engines });
    return app;
  }

  async function statusOf(server: FastifyInstance, ticket: string, headers: Record<string, string> = {}) {
    const response = await server.inject({ method: 'GET', url: `/status/${ticket}`, headers });
    return JSON.parse(response.body);
  }

  describe('prompt submissions', () => {
    it('should return the artifact inline with its ticket', async () => {
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        ...multipart({ width: '640' }, { name: 'points.csv', content: 'a,b\n' }),
      });

      expect(response.statusCode).toBe(200);
      const ticket = response.headers['x-ticket'];
      expect(typeof ticket).toBe('string');
      expect(JSON.parse(response.body)).toEqual({ ticket, kind: 'profile-vector' });
      expect(response.headers['content-type']).toBe('application/json');
      expect(response.headers['content-disposition']).toBe('attachment; filename="result.json"');
    });

    it('should return the status when inline delivery is off', async () => {
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        ...multipart({ inline: 'false' }, { name: 'points.csv', content: 'a,b\n' }),
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body).toEqual({
        ticket: response.headers['x-ticket'],
        status: 'success',
        resourceUrl: `/resource/${body.ticket}`,
      });
    });

    it('should report processing failures as job data', async () => {
      engine = new FakeEngine(async () => {
        throw new EngineFailure('bad_input', 'Columns not found in file: geom');
      });
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        ...multipart({ geometry: 'geom' }, { name: 'points.csv', content: 'a,b\n' }),
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('failed');
      expect(body.error).toEqual({ category: 'processing_failed', reason: 'bad_input', message: 'Columns not found in file: geom' });

      const resource = await server.inject({ method: 'GET', url: `/resource/${body.ticket}` });
      expect(resource.statusCode).toBe(422);
      expect(JSON.parse(resource.body).error.type).toBe('JOB_FAILED');
    });

    it('should pass repeated fields to normalization as lists', async () => {
      const seen: unknown[] = [];
      engine = new FakeEngine(async task => {
        seen.push(task.request.params);
        return writeReport(task);
      });
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/normalize/file',
        ...multipart(
          { resource_type: 'csv', case_normalization: ['name', 'city'], inline: 'false' },
          { name: 'people.csv', content: 'name,city\n' }
        ),
      });

      expect(response.statusCode).toBe(200);
      expect(seen).toHaveLength(1);
      expect(seen[0]).toMatchObject({ resource_type: 'csv', case_normalization: ['name', 'city'] });
    });
  });

  describe('deferred submissions', () => {
    it('should accept a path, then report success and serve the artifact', async () => {
      writeFileSync(join(root, 'input', 'parcels.shp'), 'shp');
      writeFileSync(join(root, 'input', 'parcels.dbf'), 'dbf');
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/profile/path/vector',
        payload: { resource: 'parcels.shp', response: 'deferred' },
      });

      expect(response.statusCode).toBe(202);
      const body = JSON.parse(response.body);
      expect(body).toEqual({
        ticket: response.headers['x-ticket'],
        status: 'pending',
        statusUrl: `/status/${body.ticket}`,
        resourceUrl: `/resource/${body.ticket}`,
      });

      await waitFor(async () => (await statusOf(server, body.ticket)).status === 'success');

      const resource = await server.inject({ method: 'GET', url: `/resource/${body.ticket}` });
      expect(resource.statusCode).toBe(200);
      expect(resource.body.length).toBeGreaterThan(0);

      const again = await server.inject({ method: 'GET', url: `/resource/${body.ticket}` });
      expect(again.body).toBe(resource.body);
    });

    it('should refuse the resource while the job is running', async () => {
      const gate = new Gate();
      engine = new FakeEngine(async task => {
        await gate.wait();
        return writeReport(task);
      });
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        ...multipart({ response: 'deferred' }, { name: 'points.csv', content: 'a,b\n' }),
      });
      const { ticket } = JSON.parse(response.body);
      await waitFor(async () => (await statusOf(server, ticket)).status === 'running');

      const resource = await server.inject({ method: 'GET', url: `/resource/${ticket}` });
      expect(resource.statusCode).toBe(409);
      expect(JSON.parse(resource.body).error).toMatchObject({ type: 'NOT_READY', fields: { ticket, status: 'running' } });

      gate.open();
      await waitFor(async () => (await statusOf(server, ticket)).status === 'success');
    });

    it('should keep jobs private to the client that submitted them', async () => {
      const server = await start();
      const owner = { 'x-client-id': 'team-a' };

      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        headers: { ...multipart({ response: 'deferred' }).headers, ...owner },
        payload: multipart({ response: 'deferred' }, { name: 'points.csv', content: 'a,b\n' }).payload,
      });
      const { ticket } = JSON.parse(response.body);

      const anonymous = await server.inject({ method: 'GET', url: `/status/${ticket}` });
      expect(anonymous.statusCode).toBe(404);

      const other = await server.inject({ method: 'GET', url: `/status/${ticket}`, headers: { 'x-client-id': 'team-b' } });
      expect(other.statusCode).toBe(404);

      const mine = await server.inject({ method: 'GET', url: `/status/${ticket}`, headers: owner });
      expect(mine.statusCode).toBe(200);

      const listed = await server.inject({ method: 'GET', url: '/jobs', headers: owner });
      expect(JSON.parse(listed.body).jobs.map((job: { ticket: string }) => job.ticket)).toEqual([ticket]);
    });

    it('should not list anonymous tickets to anonymous callers', async () => {
      const server = await start();
      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        ...multipart({ response: 'deferred' }, { name: 'points.csv', content: 'a,b\n' }),
      });
      const { ticket } = JSON.parse(response.body);

      const listed = await server.inject({ method: 'GET', url: '/jobs' });
      expect(listed.statusCode).toBe(200);
      expect(JSON.parse(listed.body)).toEqual({ jobs: [] });

      const status = await server.inject({ method: 'GET', url: `/status/${ticket}` });
      expect(status.statusCode).toBe(200);
    });
  });

  describe('rejected submissions', () => {
    it('should reject paths outside the input directory and record no job', async () => {
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/profile/path/vector',
        headers: { 'x-client-id': 'team-a' },
        payload: { resource: '../secrets.csv', response: 'prompt' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toMatchObject({
        type: 'INVALID_REQUEST',
        message: 'Resource path must stay inside the input directory',
      });
      expect(response.headers['x-ticket']).toBeUndefined();

      const jobs = await server.inject({ method: 'GET', url: '/jobs', headers: { 'x-client-id': 'team-a' } });
      expect(JSON.parse(jobs.body).jobs).toEqual([]);
    });

    it('should name invalid fields', async () => {
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        ...multipart({ width: 'wide' }, { name: 'points.csv', content: 'a,b\n' }),
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.fields).toEqual({
        issues: [{ path: 'params.width', message: 'Expected number, received nan' }],
      });
    });

    it('should require normalization resource type', async () => {
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/normalize/file',
        ...multipart({}, { name: 'people.csv', content: 'name\n' }),
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.fields.issues[0].path).toBe('params.resource_type');
    });

    it('should require a file on upload routes', async () => {
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        ...multipart({ width: '640' }),
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.message).toBe('Request must include a resource');
    });

    it('should reject unknown response modes', async () => {
      const server = await start();

      const response = await server.inject({
        method: 'POST',
        url: '/profile/path/vector',
        payload: { resource: 'parcels.shp', response: 'later' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.fields.issues[0].path).toBe('response');
    });

    it('should reject uploads above the size limit', async () => {
      const server = await start({ MAX_UPLOAD_BYTES: '4' });

      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        ...multipart({}, { name: 'points.csv', content: '0123456789' }),
      });

      expect(response.statusCode).toBe(413);
      expect(JSON.parse(response.body).error.message).toBe('Uploaded file exceeds the maximum size of 4 bytes');
    });
  });

  describe('tickets', () => {
    it('should not find unknown or malformed tickets', async () => {
      const server = await start();

      const unknown = await server.inject({ method: 'GET', url: '/status/01J00000000000000000000000' });
      expect(unknown.statusCode).toBe(404);
      expect(JSON.parse(unknown.body).error.type).toBe('NOT_FOUND');

      const malformed = await server.inject({ method: 'GET', url: '/resource/nope' });
      expect(malformed.statusCode).toBe(404);
    });

    it('should answer repeated status requests on finished jobs identically', async () => {
      const server = await start();
      const response = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        ...multipart({ inline: 'false' }, { name: 'points.csv', content: 'a,b\n' }),
      });
      const { ticket } = JSON.parse(response.body);

      const first = await server.inject({ method: 'GET', url: `/status/${ticket}` });
      const second = await server.inject({ method: 'GET', url: `/status/${ticket}` });

      expect(second.body).toBe(first.body);
    });

    it('should validate list queries', async () => {
      const server = await start();

      const response = await server.inject({ method: 'GET', url: '/jobs?limit=500' });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('access control', () => {
    it('should require the API key when one is configured', async () => {
      const server = await start({ API_KEY: 'test-secret' });
      const upload = multipart({}, { name: 'points.csv', content: 'a,b\n' });

      const denied = await server.inject({ method: 'POST', url: '/profile/file/vector', ...upload });
      expect(denied.statusCode).toBe(401);
      expect(JSON.parse(denied.body).error.type).toBe('UNAUTHORIZED');

      const status = await server.inject({ method: 'GET', url: '/status/01J00000000000000000000000' });
      expect(status.statusCode).toBe(401);

      const allowed = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        headers: { ...upload.headers, 'x-api-key': 'test-secret' },
        payload: upload.payload,
      });
      expect(allowed.statusCode).toBe(200);
    });

    it('should limit submissions per client', async () => {
      const server = await start({ RATE_LIMIT_ENABLED: '1', RATE_LIMIT_BURST: '1', RATE_LIMIT_PER_MIN: '1' });
      const upload = multipart({ inline: 'false' }, { name: 'points.csv', content: 'a,b\n' });

      const first = await server.inject({ method: 'POST', url: '/profile/file/vector', ...upload });
      expect(first.statusCode).toBe(200);
      expect(first.headers['x-ratelimit-remaining']).toBe('0');

      const second = await server.inject({ method: 'POST', url: '/profile/file/vector', ...upload });
      expect(second.statusCode).toBe(429);
      expect(second.headers['retry-after']).toBe('60');
      expect(JSON.parse(second.body).error.type).toBe('RATE_LIMIT');

      const other = await server.inject({
        method: 'POST',
        url: '/profile/file/vector',
        headers: { ...upload.headers, 'x-client-id': 'team-b' },
        payload: upload.payload,
      });
      expect(other.statusCode).toBe(200);
    });
  });
});
