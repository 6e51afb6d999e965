#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { ArtifactStore } from './artifacts/store.js';
import { ConfigError, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { SqliteJobRepository, createJobRepository } from './repositories/index.js';

const USAGE = `Usage: spatial-profile <command>

Commands:
  init-db                                        Create the job store schema at DATABASE_PATH
  prune --older-than-days N [--status S]         Delete finished jobs older than N days and their artifacts
                                                 (S is success or failed; both when omitted)`;

const PruneOptionsSchema = z.object({
  olderThanDays: z.coerce.number({ invalid_type_error: '--older-than-days must be a number' }).int().min(0),
  status: z.enum(['success', 'failed']).optional(),
});

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readFlags(args: string[]): Map<string, string> {
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
    const [name, inline] = arg.slice(2).split('=', 2);
    const value = inline ?? args[++i];
    if (!name || value === undefined) {
      throw new UsageError(`Missing value for ${arg}`);
    }
    flags.set(name, value);
  }
  return flags;
}

async function initDb(env: NodeJS.ProcessEnv, logger: Logger): Promise<void> {
  const config = loadConfig(env);
  if (config.repo.kind !== 'sqlite') {
    throw new UsageError('init-db needs REPO_KIND=sqlite');
  }

  const repo = new SqliteJobRepository(config.repo.databasePath);
  await repo.close();
  logger.info({ databasePath: config.repo.databasePath }, 'Job store ready');
}

async function prune(args: string[], env: NodeJS.ProcessEnv, logger: Logger, now: Date): Promise<number> {
  const flags = readFlags(args);
  for (const name of flags.keys()) {
    if (name !== 'older-than-days' && name !== 'status') {
      throw new UsageError(`Unknown option: --${name}`);
    }
  }
  const parsed = PruneOptionsSchema.safeParse({
    olderThanDays: flags.get('older-than-days'),
    status: flags.get('status'),
  });
  if (!parsed.success) {
    throw new UsageError(parsed.error.errors.map(issue => issue.message).join('; '));
  }

  const config = loadConfig(env);
  const repo = createJobRepository(config.repo);
  const artifacts = new ArtifactStore(config);
  const olderThan = new Date(now.getTime() - parsed.data.olderThanDays * 24 * 60 * 60 * 1000);

  try {
    const pruned = await repo.prune({ status: parsed.data.status, olderThan });
    for (const job of pruned) {
      await artifacts.removeTicket(job.ticket);
      await artifacts.releaseScratch(job.ticket);
    }
    logger.info({ pruned: pruned.length, olderThan: olderThan.toISOString(), status: parsed.data.status ?? 'any' }, 'Pruned finished jobs');
    return pruned.length;
  } finally {
    await repo.close();
  }
}

/** Runs one command; resolves to the process exit code. */
export async function runCli(
  args: string[],
  options: { env?: NodeJS.ProcessEnv; logger?: Logger; now?: Date } = {}
): Promise<number> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger(env.LOG_LEVEL || 'info');
  const [command = 'help', ...rest] = args;

  try {
    switch (command) {
      case 'init-db':
        await initDb(env, logger);
        return 0;
      case 'prune':
        await prune(rest, env, logger, options.now ?? new Date());
        return 0;
      case 'help':
      case '--help':
        process.stdout.write(`${USAGE}\n`);
        return 0;
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      process.stderr.write(`${USAGE}\n`);
      return 2;
    }
    if (error instanceof ConfigError) {
      logger.error({ issues: error.issues }, 'Invalid configuration');
      return 1;
    }
    logger.error({ err: error }, 'Command failed');
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (error: unknown) => {
      createLogger().fatal({ err: error }, 'Unexpected failure');
      process.exitCode = 1;
    }
  );
}
