import type { AppConfig } from '../config.js';
import type { JobRepository } from './base.js';
import { InMemoryJobRepository } from './memory.js';
import { SqliteJobRepository } from './sqlite.js';

export * from './base.js';
export * from './memory.js';
export * from './sqlite.js';

export function createJobRepository(repo: AppConfig['repo']): JobRepository {
  switch (repo.kind) {
    case 'memory':
      return new InMemoryJobRepository();

    case 'sqlite':
      return new SqliteJobRepository(repo.databasePath);
  }
}
