export { Runner } from './runner/runner.js';
export type { RunOptions, CaptureOptions, RunnerDeps, RunnerOpenOptions } from './runner/runner.js';
export { TrackLogger } from './runner/track-logger.js';

export { Launcher, toSpawnRequest } from './process/launcher.js';
export type { LaunchHandlers } from './process/launcher.js';
export { ProcessHandle } from './process/process-handle.js';
export { CaptureBuffer } from './process/capture-buffer.js';
export { pumpLines } from './process/stream-pump.js';
export { TrackSequencer, formatTrack } from './process/track-sequencer.js';
export { execaSpawner, toReturnCode } from './process/spawner.js';
export type {
  Track,
  StdioMode,
  LaunchOptions,
  LaunchSpec,
  LineSink,
  ExitStatus,
  SpawnRequest,
  SpawnedProcess,
  Spawner,
} from './process/types.js';

export { Output, DEFAULT_PREFIX, fileDestination, stdoutDestination } from './output/output.js';
export type { LogDestination, OutputOptions } from './output/output.js';
export { Tracer, Span } from './tracing/span.js';
export type { SpanOptions } from './tracing/span.js';
export { Cache } from './cache/cache.js';
export type { JsonValue } from './cache/cache.js';

export { buildKubectlArgv } from './kubectl/command-builder.js';
export type { KubectlTool, KubectlTarget } from './kubectl/command-builder.js';
export { loadConfig, withOverrides, DEFAULT_CONFIG } from './config/loader.js';
export type { ConfigResult } from './config/loader.js';
export type { RunnerConfig } from './types/config.js';

export { strCommand, quoteArg } from './shared/command-string.js';
export {
  RunnerError,
  RunnerErrorCode,
  SpawnFailedError,
  CommandFailedError,
  isSpawnFailure,
  errorCode,
  errorMessage,
} from './shared/errors.js';
export { logger } from './logger.js';
