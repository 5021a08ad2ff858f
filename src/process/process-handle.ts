import type { ChildProcess } from 'child_process';
import { toReturnCode } from './spawner.js';
import type { ExitStatus } from './types.js';

/**
 * A launched child. The launcher hands it over once pumps are attached;
 * from then on the caller may wait on it, poll it or kill it.
 */
export class ProcessHandle {
  private status: ExitStatus | null = null;
  private readonly exit: Promise<ExitStatus>;

  constructor(
    readonly argv: readonly string[],
    private readonly child: ChildProcess,
    exited: Promise<ExitStatus>,
    /** Settles once every piped output stream has reached end-of-stream. */
    readonly drained: Promise<void>
  ) {
    this.exit = exited.then((status) => {
      this.status = status;
      return status;
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** The return code if the child has exited, otherwise null. */
  poll(): number | null {
    return this.status === null ? null : toReturnCode(this.status);
  }

  async wait(): Promise<number> {
    const status = await this.exit;
    const code = toReturnCode(status);
    if (code === null) {
      throw new Error(`Process ${this.child.pid ?? '?'} exited without a code or signal`);
    }
    return code;
  }

  kill(signal?: NodeJS.Signals): boolean {
    return this.child.kill(signal);
  }
}
