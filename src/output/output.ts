import fs from 'fs';
import path from 'path';

export const DEFAULT_PREFIX = 'RUN';

/** Where formatted log lines go. Writes must complete before returning. */
export interface LogDestination {
  write(text: string): void;
}

export interface OutputOptions {
  /** Number of recent lines kept for readLogs(). */
  tailSize?: number;
  /** Milliseconds, monotonic. */
  clock?: () => number;
  path?: string;
}

export function fileDestination(filePath: string): LogDestination {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  return {
    write(text: string): void {
      fs.appendFileSync(filePath, text, 'utf-8');
    },
  };
}

export const stdoutDestination: LogDestination = {
  write(text: string): void {
    fs.writeSync(1, text);
  },
};

/**
 * The session log. Every line carries the seconds since the log was opened
 * and a short prefix: "RUN" for status lines, a track number for process
 * output.
 */
export class Output {
  readonly path: string;
  private readonly clock: () => number;
  private readonly startedAt: number;
  private readonly tailSize: number;
  private readonly tail: string[] = [];

  constructor(private readonly destination: LogDestination, options: OutputOptions = {}) {
    this.clock = options.clock ?? (() => performance.now());
    this.startedAt = this.clock();
    this.tailSize = options.tailSize ?? 25;
    this.path = options.path ?? '-';
  }

  static open(logfilePath: string, options: Omit<OutputOptions, 'path'> = {}): Output {
    if (logfilePath === '-') {
      return new Output(stdoutDestination, { ...options, path: '-' });
    }
    // Children may run elsewhere, so log the absolute location.
    const absolute = path.resolve(logfilePath);
    return new Output(fileDestination(absolute), { ...options, path: absolute });
  }

  write(message: string, prefix: string = DEFAULT_PREFIX): void {
    const body = message.endsWith('\n') ? message.slice(0, -1) : message;
    const elapsed = ((this.clock() - this.startedAt) / 1000).toFixed(1).padStart(6);
    for (const part of body.split(/\r?\n/)) {
      const line = `${elapsed} ${prefix} | ${part}\n`;
      this.destination.write(line);
      this.remember(line);
    }
  }

  readLogs(): string {
    return this.tail.join('');
  }

  private remember(line: string): void {
    this.tail.push(line);
    if (this.tail.length > this.tailSize) {
      this.tail.shift();
    }
  }
}
