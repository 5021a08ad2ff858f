import { join } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { Cache } from '../cache/cache.js';
import { loadConfig, withOverrides } from '../config/loader.js';
import { buildKubectlArgv } from '../kubectl/command-builder.js';
import { Output } from '../output/output.js';
import { CaptureBuffer } from '../process/capture-buffer.js';
import { Launcher, type LaunchHandlers } from '../process/launcher.js';
import type { ProcessHandle } from '../process/process-handle.js';
import { TrackSequencer } from '../process/track-sequencer.js';
import type { LaunchOptions, LineSink, Track } from '../process/types.js';
import { strCommand } from '../shared/command-string.js';
import {
  CommandFailedError,
  RunnerError,
  RunnerErrorCode,
  errorMessage,
  isSpawnFailure,
} from '../shared/errors.js';
import { Span, Tracer, type SpanOptions } from '../tracing/span.js';
import type { RunnerConfig } from '../types/config.js';
import { TrackLogger } from './track-logger.js';

export interface RunOptions extends LaunchOptions {
  input?: string | Uint8Array;
}

export interface CaptureOptions extends RunOptions {
  /** Also write captured stdout to the session log. Always on in verbose mode. */
  reveal?: boolean;
}

export interface RunnerDeps {
  launcher?: Launcher;
  sequencer?: TrackSequencer;
  /** Milliseconds, monotonic; drives spans and elapsed-time log lines. */
  clock?: () => number;
  cache?: Cache;
}

export interface RunnerOpenOptions extends RunnerDeps {
  configPath?: string;
  overrides?: Partial<RunnerConfig>;
  output?: Output;
}

interface Verbs {
  start: string;
  done: string;
}

const RUNNING: Verbs = { start: 'Running', done: 'ran' };
const CAPTURING: Verbs = { start: 'Capturing', done: 'captured' };

const SPAN_TAG_LIMIT = 80;

/**
 * Runs external commands for one session. Every invocation gets a track
 * number; its output lines land in the session log under that number and
 * its duration is recorded as a span.
 */
export class Runner {
  readonly tracer: Tracer;
  cache: Cache | null;
  private readonly launcher: Launcher;
  private readonly sequencer: TrackSequencer;

  constructor(
    readonly output: Output,
    readonly config: RunnerConfig,
    deps: RunnerDeps = {}
  ) {
    this.tracer = new Tracer(output, deps.clock);
    this.launcher = deps.launcher ?? new Launcher();
    this.sequencer = deps.sequencer ?? new TrackSequencer();
    this.cache = deps.cache ?? null;
  }

  static async open(options: RunnerOpenOptions = {}): Promise<Runner> {
    const loaded = loadConfig(options.configPath).config;
    const config = options.overrides ? withOverrides(loaded, options.overrides) : loaded;
    const output = options.output ?? Output.open(config.logfile, { tailSize: config.log_tail_lines });
    const runner = new Runner(output, config, options);
    await runner.reportEnvironment();
    if (!runner.cache) {
      runner.cache = Cache.load(join(config.cache.dir, 'cache.json'));
    }
    await runner.cache.invalidate(config.cache.ttl_seconds);
    return runner;
  }

  get verbose(): boolean {
    return this.config.verbose;
  }

  span(name: string, options?: SpanOptions): Span {
    return this.tracer.span(name, options);
  }

  write(message: string, prefix?: string): void {
    this.output.write(message, prefix);
  }

  /** Recent session log lines, after giving in-flight output a moment to land. */
  async readLogs(): Promise<string> {
    await sleep(this.config.read_logs_settle_ms);
    return this.output.readLogs();
  }

  setSuccess(flag: boolean): void {
    this.tracer.emitSummary = flag;
    this.output.write('Success. Starting cleanup.');
  }

  commandSpan(track: Track, argv: readonly string[]): Span {
    const tag = `${track} ${strCommand(argv)}`.slice(0, SPAN_TAG_LIMIT);
    return this.tracer.span(tag, { verbose: false, current: false });
  }

  makeLogger(track: Track): LineSink {
    return new TrackLogger(this.output, track);
  }

  /** Runs a command to completion; throws CommandFailedError on a nonzero exit. */
  async checkCall(argv: readonly string[], options: RunOptions = {}): Promise<void> {
    const track = this.sequencer.next();
    const log = this.makeLogger(track);
    await this.runCommand(track, RUNNING, { stdout: log, stderr: log }, argv, options);
  }

  /** Runs a command to completion and returns its stdout, trimmed. */
  async getOutput(argv: readonly string[], options: CaptureOptions = {}): Promise<string> {
    const { reveal = false, ...runOptions } = options;
    if (runOptions.stdout !== undefined && runOptions.stdout !== 'pipe') {
      throw new RunnerError(
        RunnerErrorCode.INVALID_LAUNCH_SPEC,
        `Cannot capture stdout redirected to '${runOptions.stdout}'`,
        { argv: [...argv] }
      );
    }

    const track = this.sequencer.next();
    const capture = new CaptureBuffer(reveal || this.verbose ? this.makeLogger(track) : undefined);
    const stderr = this.makeLogger(track);

    let failure: CommandFailedError | undefined;
    try {
      await this.runCommand(track, CAPTURING, { stdout: capture, stderr }, argv, runOptions);
    } catch (err) {
      if (!(err instanceof CommandFailedError)) throw err;
      failure = err;
    }

    // Exit can be observed before the last stdout lines have been read.
    await capture.closed;
    const text = capture.text();
    if (failure) {
      throw new CommandFailedError(failure.argv, failure.returncode, text);
    }
    return text;
  }

  /** Starts a command and returns at once; its exit code is logged when known. */
  async popen(argv: readonly string[], options: RunOptions = {}): Promise<ProcessHandle> {
    const track = this.sequencer.next();
    const log = this.makeLogger(track);
    this.output.write(`[${track}] Launching: ${strCommand(argv)}`);
    const span = this.commandSpan(track, argv);
    return this.launchCommand(track, span, argv, options, {
      stdout: log,
      stderr: log,
      onComplete: (handle) => this.popenDone(track, span, handle),
    });
  }

  kubectl(context: string, namespace: string, args: readonly string[]): string[] {
    return buildKubectlArgv(
      { tool: this.config.kubectl_command, verbose: this.verbose, context, namespace },
      args
    );
  }

  getKubectl(context: string, namespace: string, args: readonly string[], options?: CaptureOptions): Promise<string> {
    return this.getOutput(this.kubectl(context, namespace, args), options);
  }

  checkKubectl(context: string, namespace: string, args: readonly string[], options?: RunOptions): Promise<void> {
    return this.checkCall(this.kubectl(context, namespace, args), options);
  }

  private async runCommand(
    track: Track,
    verbs: Verbs,
    sinks: Pick<LaunchHandlers, 'stdout' | 'stderr'>,
    argv: readonly string[],
    options: RunOptions
  ): Promise<void> {
    this.output.write(`[${track}] ${verbs.start}: ${strCommand(argv)}`);
    const span = this.commandSpan(track, argv);
    const handle = await this.launchCommand(track, span, argv, options, sinks);
    let code: number;
    let spent: number;
    try {
      code = await handle.wait();
    } finally {
      spent = span.end();
    }
    if (code !== 0) {
      this.output.write(`[${track}] exit ${code} in ${spent.toFixed(2)} secs.`);
      throw new CommandFailedError(argv, code);
    }
    if (spent > this.config.slow_command_seconds) {
      this.output.write(`[${track}] ${verbs.done} in ${spent.toFixed(2)} secs.`);
    }
  }

  private async launchCommand(
    track: Track,
    span: Span,
    argv: readonly string[],
    options: RunOptions,
    handlers: LaunchHandlers
  ): Promise<ProcessHandle> {
    const { input, ...launchOptions } = options;
    try {
      return await this.launcher.launch({ argv, input, options: launchOptions }, handlers);
    } catch (err) {
      span.end();
      this.output.write(`[${track}] ${errorMessage(err)}`);
      throw err;
    }
  }

  private popenDone(track: Track, span: Span, handle: ProcessHandle): void {
    span.end();
    const code = handle.poll();
    if (code !== null) {
      this.output.write(`[${track}] exit ${code}`);
    }
  }

  private async reportEnvironment(): Promise<void> {
    for (const probe of this.config.startup_probes) {
      try {
        await this.popen(probe);
      } catch (err) {
        // A missing tool is worth a log line (already written), not a failure.
        if (!isSpawnFailure(err)) throw err;
      }
    }
    this.output.write(`Node ${process.version}`);
  }
}
