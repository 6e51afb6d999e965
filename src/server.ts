import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { ulid } from 'ulid';
import { ArtifactStore } from './artifacts/store.js';
import type { AppConfig } from './config.js';
import { TicketDispatcher } from './dispatcher/index.js';
import { createEngines } from './engine/index.js';
import type { EngineRegistry } from './engine/index.js';
import { ServiceError, replyWithAppError, toServiceError } from './errors.js';
import { loggerOptions } from './logger.js';
import { requireApiKey } from './middleware/auth.js';
import { rateLimit } from './middleware/rate-limit.js';
import { createJobRepository } from './repositories/index.js';
import type { JobRepository, RepositoryStats } from './repositories/index.js';
import { registerSubmitRoutes } from './routes/submit.js';
import { registerTicketRoutes } from './routes/tickets.js';
import { StatusService } from './status/index.js';
import { JobExecutor, WorkerPool } from './worker/index.js';

export interface ServerOptions {
  config: AppConfig;
  repo?: JobRepository;
  engines?: EngineRegistry;
}

const EMPTY_STATS: RepositoryStats = { queueDepth: 0, running: 0, completedLast5m: 0, failedLast5m: 0 };

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const repo = options.repo ?? createJobRepository(config.repo);
  const engines = options.engines ?? createEngines(config.engine);

  const app = Fastify({
    logger: loggerOptions(config.logLevel),
    genReqId: () => ulid(),
  });

  const artifacts = new ArtifactStore(config);
  const executor = new JobExecutor(repo, artifacts, engines, app.log, config.worker);
  const pool = new WorkerPool(repo, executor, app.log, config.worker);
  const dispatcher = new TicketDispatcher(repo, artifacts, executor, pool, app.log);
  const status = new StatusService(repo, artifacts);

  // Security
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  if (config.corsOrigins.length > 0) {
    await app.register(cors, {
      origin: config.corsOrigins,
      exposedHeaders: ['x-ticket', 'x-request-id', 'content-disposition'],
    });
  }

  await app.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
      fields: 100,
    },
  });

  // Echo X-Request-ID
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.setErrorHandler(async (err, request, reply) => {
    const error = toServiceError(err);
    if (error.type === 'INTERNAL') {
      request.log.error({ err }, 'Request failed');
    }
    return replyWithAppError(reply, error);
  });

  app.setNotFoundHandler(async (request, reply) => {
    return replyWithAppError(reply, new ServiceError('NOT_FOUND', `Route ${request.method} ${request.url} not found`));
  });

  // Health endpoint with storage checks, repository and worker stats
  app.get('/health', async (_request, reply) => {
    const [writable, store] = await Promise.all([
      artifacts.checkWritable(),
      repo.ping().then(
        () => true,
        (error: unknown) => {
          app.log.error({ err: error }, 'Job store ping failed');
          return false;
        }
      ),
    ]);
    const stats = store ? await repo.getStats() : EMPTY_STATS;
    const ok = writable.tempDir && writable.outputDir && store;

    return reply.code(ok ? 200 : 503).send({
      ok,
      checks: { ...writable, store },
      ...stats,
      worker: pool.getStats(),
      repo: { kind: config.repo.kind },
    });
  });

  const authenticate = requireApiKey(config.apiKey);

  registerSubmitRoutes(app, {
    dispatcher,
    status,
    maxUploadBytes: config.maxUploadBytes,
    preHandler: [authenticate, rateLimit(config.rateLimit)],
  });
  registerTicketRoutes(app, { status, authenticate });

  // Start the worker
  await pool.start();

  app.addHook('onClose', async () => {
    await pool.stop();
    await repo.close();
  });

  return app;
}
