import type { Writable } from 'stream';
import { logger } from '../logger.js';
import { RunnerError, RunnerErrorCode, SpawnFailedError } from '../shared/errors.js';
import { ProcessHandle } from './process-handle.js';
import { execaSpawner } from './spawner.js';
import { pumpLines } from './stream-pump.js';
import type { LaunchSpec, LineSink, SpawnRequest, Spawner } from './types.js';

export interface LaunchHandlers {
  stdout: LineSink;
  stderr: LineSink;
  /**
   * Called once, after every piped stream has drained and the child has
   * exited. Also fires for a child with no piped streams.
   */
  onComplete?: (handle: ProcessHandle) => void;
}

export class Launcher {
  constructor(private readonly spawner: Spawner = execaSpawner) {}

  async launch(spec: LaunchSpec, handlers: LaunchHandlers): Promise<ProcessHandle> {
    const request = toSpawnRequest(spec);
    const spawned = this.spawner(spec.argv, request);
    try {
      await spawned.started;
    } catch (err) {
      throw new SpawnFailedError(spec.argv, err);
    }

    const { child } = spawned;
    logger.debug({ pid: child.pid, argv: spec.argv }, 'Process started');

    const pumps: Promise<void>[] = [];
    if (child.stdout) pumps.push(pumpLines(child.stdout, handlers.stdout, 'stdout'));
    if (child.stderr) pumps.push(pumpLines(child.stderr, handlers.stderr, 'stderr'));
    const drained = Promise.all(pumps).then(() => undefined);

    const handle = new ProcessHandle(spec.argv, child, spawned.exited, drained);

    // Pumps are attached first so a child echoing its input cannot stall on a full pipe.
    if (spec.input !== undefined && child.stdin) {
      await feedInput(child.stdin, spec.input);
    }

    if (handlers.onComplete) {
      watchCompletion(handle, handlers.onComplete);
    }
    return handle;
  }
}

export function toSpawnRequest(spec: LaunchSpec): SpawnRequest {
  const options = spec.options ?? {};
  if (spec.argv.length === 0) {
    throw new RunnerError(RunnerErrorCode.INVALID_LAUNCH_SPEC, 'Cannot launch an empty command');
  }
  if (spec.input !== undefined && options.stdin !== undefined) {
    throw new RunnerError(
      RunnerErrorCode.INVALID_LAUNCH_SPEC,
      `stdin is already configured as '${options.stdin}'; it cannot also receive input`,
      { argv: [...spec.argv] }
    );
  }
  return {
    cwd: options.cwd,
    env: options.env,
    stdin: spec.input !== undefined ? 'pipe' : options.stdin ?? 'ignore',
    stdout: options.stdout ?? 'pipe',
    stderr: options.stderr ?? 'pipe',
  };
}

function feedInput(stdin: Writable, payload: string | Uint8Array): Promise<void> {
  return new Promise<void>((resolve) => {
    // The child may exit without reading; EPIPE is not a launch failure.
    stdin.once('error', (err) => {
      logger.warn({ err }, 'Could not write input to child');
      resolve();
    });
    stdin.end(payload, () => resolve());
  });
}

function watchCompletion(handle: ProcessHandle, onComplete: (handle: ProcessHandle) => void): void {
  Promise.all([handle.drained, handle.wait()])
    .then(() => onComplete(handle))
    .catch((err: unknown) => {
      logger.error({ err, argv: handle.argv }, 'Completion hook failed');
    });
}
