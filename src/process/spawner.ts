import { constants } from 'os';
import execa from 'execa';
import type { ExitStatus, SpawnedProcess, Spawner } from './types.js';

export const execaSpawner: Spawner = (argv, request) => {
  const [file, ...args] = argv;
  const subprocess = execa(file, args, {
    cwd: request.cwd,
    env: request.env,
    extendEnv: true,
    stdin: request.stdin,
    stdout: request.stdout,
    stderr: request.stderr,
    // Lines are consumed by the pumps; nothing is buffered here.
    buffer: false,
    reject: false,
  });

  // execa's own result also fails on stdin errors (EPIPE from a child that
  // never read its input) and then carries no exit code; the child's 'exit'
  // event always does.
  const exited = new Promise<ExitStatus>((resolve) => {
    subprocess.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ exitCode: code, signal: isSignal(signal) ? signal : null });
    });
  });

  const started = new Promise<void>((resolve, reject) => {
    subprocess.once('spawn', () => resolve());
    subprocess.once('error', reject);
    // execa rejects without an 'error' event when spawn() throws synchronously.
    void subprocess.catch(reject);
  });

  const spawned: SpawnedProcess = { child: subprocess, started, exited };
  return spawned;
};

export function isSignal(value: unknown): value is NodeJS.Signals {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(constants.signals, value);
}

/** Exit status as a single number: the code, or minus the signal number. */
export function toReturnCode(status: ExitStatus): number | null {
  if (status.exitCode !== null) return status.exitCode;
  if (status.signal === null) return null;
  const signalNumber = Object.entries(constants.signals).find(([name]) => name === status.signal)?.[1];
  return signalNumber === undefined ? null : -signalNumber;
}
