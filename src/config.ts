import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
  z.preprocess(
    (val) => val === undefined || val === '' ? fallback : Number(val),
    z.number().int().min(0)
  );

const flagFromEnv = z.preprocess((val) => val === '1' || val === 'true', z.boolean());

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: numberFromEnv(4500),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  INPUT_DIR: z.string({ required_error: 'INPUT_DIR is not set' }).min(1),
  OUTPUT_DIR: z.string({ required_error: 'OUTPUT_DIR is not set' }).min(1),
  TEMP_DIR: z.string().min(1).optional(),
  REPO_KIND: z.enum(['sqlite', 'memory']).default('sqlite'),
  DATABASE_PATH: z.string().min(1).optional(),
  WORKER_POOL_SIZE: numberFromEnv(4).pipe(z.number().min(1)),
  OWNER_MAX_CONCURRENCY: z.preprocess(
    (val) => val === undefined || val === '' ? undefined : Number(val),
    z.number().int().min(1).optional()
  ),
  POLL_INTERVAL_MS: numberFromEnv(500).pipe(z.number().min(10)),
  JOB_MAX_RUN_MS: numberFromEnv(0),
  HEARTBEAT_INTERVAL_MS: numberFromEnv(10_000).pipe(z.number().min(100)),
  STALE_AFTER_MS: numberFromEnv(120_000),
  REAP_INTERVAL_MS: numberFromEnv(30_000),
  SHUTDOWN_GRACE_MS: numberFromEnv(10_000),
  MAX_UPLOAD_BYTES: numberFromEnv(512 * 1024 * 1024).pipe(z.number().min(1)),
  ENGINE_COMMAND: z.string().min(1).optional(),
  ENGINE_ARGS: z.string().optional(),
  API_KEY: z.string().min(1).optional(),
  RATE_LIMIT_ENABLED: flagFromEnv,
  RATE_LIMIT_BURST: numberFromEnv(60).pipe(z.number().min(1)),
  RATE_LIMIT_PER_MIN: numberFromEnv(600).pipe(z.number().min(1)),
  CORS_ORIGINS: z.string().optional(),
}).superRefine((env, ctx) => {
  if (env.STALE_AFTER_MS > 0 && env.STALE_AFTER_MS <= env.HEARTBEAT_INTERVAL_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['STALE_AFTER_MS'],
      message: 'STALE_AFTER_MS must exceed HEARTBEAT_INTERVAL_MS',
    });
  }
});

export interface WorkerConfig {
  poolSize: number;
  ownerMaxConcurrency: number;
  pollIntervalMs: number;
  jobMaxRunMs: number; // 0 = unbounded
  heartbeatIntervalMs: number;
  staleAfterMs: number; // 0 = reaper disabled
  reapIntervalMs: number;
  shutdownGraceMs: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  host: string;
  logLevel: string;
  inputDir: string;
  outputDir: string;
  tempDir: string;
  repo: { kind: 'sqlite'; databasePath: string } | { kind: 'memory' };
  worker: WorkerConfig;
  maxUploadBytes: number;
  engine: { command?: string; args: string[] };
  apiKey?: string;
  rateLimit: { enabled: boolean; burst: number; sustainedPerMin: number };
  corsOrigins: string[];
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function splitList(value: string | undefined, separator: RegExp): string[] {
  if (!value) return [];
  return value.split(separator).map(item => item.trim()).filter(item => item.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  const outputDir = resolve(e.OUTPUT_DIR);

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    inputDir: resolve(e.INPUT_DIR),
    outputDir,
    tempDir: resolve(e.TEMP_DIR ?? join(tmpdir(), 'spatial-profile')),
    repo: e.REPO_KIND === 'memory'
      ? { kind: 'memory' }
      : { kind: 'sqlite', databasePath: resolve(e.DATABASE_PATH ?? join(outputDir, 'jobs.sqlite')) },
    worker: {
      poolSize: e.WORKER_POOL_SIZE,
      ownerMaxConcurrency: e.OWNER_MAX_CONCURRENCY ?? e.WORKER_POOL_SIZE,
      pollIntervalMs: e.POLL_INTERVAL_MS,
      jobMaxRunMs: e.JOB_MAX_RUN_MS,
      heartbeatIntervalMs: e.HEARTBEAT_INTERVAL_MS,
      staleAfterMs: e.STALE_AFTER_MS,
      reapIntervalMs: e.REAP_INTERVAL_MS,
      shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
    },
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    engine: { command: e.ENGINE_COMMAND, args: splitList(e.ENGINE_ARGS, /\s+/) },
    apiKey: e.API_KEY,
    rateLimit: {
      enabled: e.RATE_LIMIT_ENABLED,
      burst: e.RATE_LIMIT_BURST,
      sustainedPerMin: e.RATE_LIMIT_PER_MIN,
    },
    corsOrigins: splitList(e.CORS_ORIGINS, /,/),
  };
}
