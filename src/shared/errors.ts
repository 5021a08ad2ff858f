export enum RunnerErrorCode {
  SPAWN_FAILED = 'SPAWN_FAILED',
  COMMAND_FAILED = 'COMMAND_FAILED',
  INVALID_LAUNCH_SPEC = 'INVALID_LAUNCH_SPEC',
  CONFIG_INVALID = 'CONFIG_INVALID',
  CACHE_ERROR = 'CACHE_ERROR',
}

export class RunnerError extends Error {
  readonly code: RunnerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: RunnerErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RunnerError';
    this.code = code;
    this.context = context;
  }
}

// The executable could not be started at all (missing binary, EACCES, ...).
export class SpawnFailedError extends RunnerError {
  readonly argv: readonly string[];

  constructor(argv: readonly string[], cause: unknown) {
    const osCode = errorCode(cause);
    const reason = errorMessage(cause);
    super(RunnerErrorCode.SPAWN_FAILED, `Failed to launch ${argv[0] ?? '<empty>'}: ${reason}`, {
      argv: [...argv],
      osCode,
    }, { cause });
    this.name = 'SpawnFailedError';
    this.argv = argv;
  }
}

export class CommandFailedError extends RunnerError {
  readonly argv: readonly string[];
  readonly returncode: number;
  /** Captured stdout, only set by the capturing execution mode. */
  readonly output?: string;

  constructor(argv: readonly string[], returncode: number, output?: string) {
    super(
      RunnerErrorCode.COMMAND_FAILED,
      `Command ${JSON.stringify(argv)} returned non-zero exit status ${returncode}`,
      output === undefined ? { argv: [...argv], returncode } : { argv: [...argv], returncode, output }
    );
    this.name = 'CommandFailedError';
    this.argv = argv;
    this.returncode = returncode;
    this.output = output;
  }
}

export function isSpawnFailure(err: unknown): err is SpawnFailedError {
  return err instanceof SpawnFailedError;
}

// Structural checks: errors raised by Node's own modules may come from another
// realm (a vm context, a test sandbox) and fail `instanceof Error`.
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
