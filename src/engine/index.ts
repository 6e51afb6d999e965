import type { AppConfig } from '../config.js';
import type { EngineRegistry, ProcessingEngine } from './base.js';
import { CommandEngine } from './command.js';
import { InspectEngine } from './inspect.js';

export * from './base.js';
export * from './command.js';
export * from './inspect.js';

/**
 * Profile kinds fall back to the built-in inspect engine. Normalization has no
 * built-in engine and is only available with ENGINE_COMMAND set.
 */
export function createEngines(engine: AppConfig['engine']): EngineRegistry {
  const engines: EngineRegistry = new Map();
  const inspect = new InspectEngine();
  const external: ProcessingEngine | undefined = engine.command
    ? new CommandEngine({ command: engine.command, args: engine.args })
    : undefined;

  engines.set('profile-netcdf', external ?? inspect);
  engines.set('profile-raster', external ?? inspect);
  engines.set('profile-vector', external ?? inspect);
  if (external) {
    engines.set('normalize', external);
  }

  return engines;
}
