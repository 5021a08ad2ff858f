// Config loader: reads ~/.config/tracked-runner/config.yaml and deep-merges it over
// DEFAULT_CONFIG. Unset keys inherit defaults. A file that does not parse or does not
// validate is reported and ignored, so a broken config never stops a run.
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { RunnerConfig } from '../types/config.js';
import { logger } from '../logger.js';
import { RunnerError, RunnerErrorCode } from '../shared/errors.js';

const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'tracked-runner', 'config.yaml');

export const DEFAULT_CONFIG: RunnerConfig = {
  kubectl_command: 'kubectl',
  verbose: false,
  logfile: 'tracked-runner.log',
  log_tail_lines: 25,
  slow_command_seconds: 1,
  read_logs_settle_ms: 2000,
  cache: {
    dir: join(homedir(), '.cache', 'tracked-runner'),
    ttl_seconds: 12 * 60 * 60,
  },
  startup_probes: [
    ['kubectl', 'version', '--client'],
    ['oc', 'version'],
    ['uname', '-a'],
  ],
};

const configSchema: z.ZodType<RunnerConfig> = z.object({
  kubectl_command: z.enum(['kubectl', 'oc']),
  verbose: z.boolean(),
  logfile: z.string().min(1),
  log_tail_lines: z.number().int().positive(),
  slow_command_seconds: z.number().nonnegative(),
  read_logs_settle_ms: z.number().int().nonnegative(),
  cache: z.object({
    dir: z.string().min(1),
    ttl_seconds: z.number().nonnegative(),
  }),
  startup_probes: z.array(z.array(z.string()).min(1)),
});

const yamlObjectSchema = z.record(z.unknown());

export interface ConfigResult {
  config: RunnerConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;
  const defaults = { config: cloneDefaults(), configPath, fromFile: false };

  if (!existsSync(configPath)) {
    logger.debug({ configPath }, 'No config file found; using defaults');
    return defaults;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    logger.error({ configPath, err }, 'Failed to parse config; using defaults');
    return defaults;
  }

  const overrides = yamlObjectSchema.safeParse(parsed ?? {});
  if (!overrides.success) {
    logger.error({ configPath }, 'Config file is not a mapping; using defaults');
    return defaults;
  }

  const merged = configSchema.safeParse(deepMerge(toRecord(DEFAULT_CONFIG), overrides.data));
  if (!merged.success) {
    logger.error({ configPath, issues: merged.error.issues }, 'Invalid config; using defaults');
    return defaults;
  }
  return { config: merged.data, configPath, fromFile: true };
}

/** Applies programmatic overrides on top of an already loaded config. */
export function withOverrides(config: RunnerConfig, overrides: Partial<RunnerConfig>): RunnerConfig {
  const merged = configSchema.safeParse(deepMerge(toRecord(config), toRecord(overrides)));
  if (!merged.success) {
    throw new RunnerError(RunnerErrorCode.CONFIG_INVALID, 'Invalid config override', {
      issues: merged.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return merged.data;
}

function cloneDefaults(): RunnerConfig {
  return configSchema.parse(structuredClone(DEFAULT_CONFIG));
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
