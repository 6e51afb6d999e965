import { spawn } from 'node:child_process';
import { stat } from 'node:fs/promises';
import { isAbsolute, relative, resolve } from 'node:path';
import type { EngineOutput, EngineTask, ProcessingEngine } from './base.js';
import { EngineFailure } from './base.js';

const STDERR_TAIL_BYTES = 4096;
// Only the last stdout line is read back.
const STDOUT_TAIL_BYTES = 4096;

export interface CommandEngineOptions {
  command: string;
  args?: string[];
}

/**
 * Runs an external analysis program once per job:
 *
 *   <command> [...args] <kind> <inputPath> <workDir>
 *
 * The request parameters arrive as JSON on stdin. On exit code 0 the last
 * non-empty stdout line names the artifact, relative to `workDir`. Exit code 2
 * reports bad input, 3 an unsupported format; any other code is an engine error.
 */
export class CommandEngine implements ProcessingEngine {
  readonly name: string;

  constructor(private readonly options: CommandEngineOptions) {
    this.name = `command:${options.command}`;
  }

  async process(task: EngineTask): Promise<EngineOutput> {
    const { request, inputPath, workDir, signal } = task;
    signal.throwIfAborted();

    const args = [...(this.options.args ?? []), request.kind, inputPath, workDir];
    const child = spawn(this.options.command, args, { cwd: workDir });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout = (stdout + chunk).slice(-STDOUT_TAIL_BYTES);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_TAIL_BYTES);
    });
    // The program may exit without reading its parameters.
    child.stdin.on('error', () => undefined);
    child.stdin.end(JSON.stringify(request.params));

    const onAbort = () => child.kill('SIGTERM');
    signal.addEventListener('abort', onAbort, { once: true });

    let exitCode: number | null;
    try {
      exitCode = await new Promise<number | null>((resolvePromise, reject) => {
        child.once('error', reject);
        child.once('close', code => resolvePromise(code));
      });
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    signal.throwIfAborted();

    const detail = stderr.trim().split('\n').pop() ?? '';
    switch (exitCode) {
      case 0:
        return { artifactPath: await this.locateArtifact(stdout, workDir) };
      case 2:
        throw new EngineFailure('bad_input', detail || 'Engine rejected the input');
      case 3:
        throw new EngineFailure('unsupported_format', detail || 'Engine does not support this format');
      default:
        throw new EngineFailure(
          'engine_error',
          `Engine exited with ${exitCode === null ? 'a signal' : `code ${exitCode}`}${detail ? `: ${detail}` : ''}`
        );
    }
  }

  private async locateArtifact(stdout: string, workDir: string): Promise<string> {
    const reported = stdout.split('\n').map(line => line.trim()).filter(line => line.length > 0).pop();
    if (!reported) {
      throw new EngineFailure('engine_error', 'Engine finished without naming an artifact');
    }

    const artifactPath = resolve(workDir, reported);
    const rel = relative(workDir, artifactPath);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new EngineFailure('engine_error', `Engine artifact '${reported}' is outside its working directory`);
    }

    const info = await stat(artifactPath).catch(() => null);
    if (!info?.isFile()) {
      throw new EngineFailure('engine_error', `Engine artifact '${reported}' was not written`);
    }
    return artifactPath;
  }
}
