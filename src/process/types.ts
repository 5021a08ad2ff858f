import type { ChildProcess } from 'child_process';

/** Per-invocation correlation id. Positive, issued once, never reused. */
export type Track = number;

export type StdioMode = 'pipe' | 'ignore' | 'inherit';

export interface LaunchOptions {
  cwd?: string;
  /** Merged over the parent environment. */
  env?: Record<string, string>;
  stdin?: StdioMode;
  stdout?: StdioMode;
  stderr?: StdioMode;
}

export interface LaunchSpec {
  readonly argv: readonly string[];
  /** Written to the child's stdin, which is then closed. */
  readonly input?: string | Uint8Array;
  readonly options?: LaunchOptions;
}

/**
 * Receives one stream's lines in order. `end()` is called exactly once,
 * after the last line.
 */
export interface LineSink {
  line(text: string): void;
  end(): void;
}

export interface ExitStatus {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
}

export interface SpawnRequest {
  cwd?: string;
  env?: Record<string, string>;
  stdin: StdioMode;
  stdout: StdioMode;
  stderr: StdioMode;
}

export interface SpawnedProcess {
  readonly child: ChildProcess;
  /** Resolves once the OS has started the child; rejects with the OS error otherwise. */
  readonly started: Promise<void>;
  readonly exited: Promise<ExitStatus>;
}

export type Spawner = (argv: readonly string[], request: SpawnRequest) => SpawnedProcess;
