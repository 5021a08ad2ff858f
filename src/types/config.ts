import type { KubectlTool } from '../kubectl/command-builder.js';

/** Runner configuration as written in config.yaml. */
export interface RunnerConfig {
  kubectl_command: KubectlTool;
  verbose: boolean;
  /** Session log path, or "-" for stdout. */
  logfile: string;
  log_tail_lines: number;
  /** Successful commands slower than this are logged with their duration. */
  slow_command_seconds: number;
  read_logs_settle_ms: number;
  cache: {
    dir: string;
    ttl_seconds: number;
  };
  /** Commands launched at startup to record tool versions; missing tools are skipped. */
  startup_probes: string[][];
}
