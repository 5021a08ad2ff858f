import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { DEFAULT_CONFIG, loadConfig, withOverrides } from '../../../src/config/loader.js';
import { RunnerError, RunnerErrorCode } from '../../../src/shared/errors.js';

describe('loadConfig', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tracked-runner-config-'));
    configPath = path.join(tmpDir, 'config.yaml');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('returns defaults when the file does not exist', () => {
    const result = loadConfig(configPath);
    expect(result).toEqual({ config: DEFAULT_CONFIG, configPath, fromFile: false });
  });

  it('does not create a config file', async () => {
    loadConfig(configPath);
    await expect(fs.access(configPath)).rejects.toThrow();
  });

  it('merges a partial file over the defaults', async () => {
    await fs.writeFile(configPath, 'kubectl_command: oc\ncache:\n  ttl_seconds: 60\n');

    const result = loadConfig(configPath);

    expect(result.fromFile).toBe(true);
    expect(result.config.kubectl_command).toBe('oc');
    expect(result.config.cache).toEqual({ dir: DEFAULT_CONFIG.cache.dir, ttl_seconds: 60 });
    expect(result.config.logfile).toBe(DEFAULT_CONFIG.logfile);
  });

  it('treats an empty file as no overrides', async () => {
    await fs.writeFile(configPath, '');
    const result = loadConfig(configPath);
    expect(result.fromFile).toBe(true);
    expect(result.config).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to defaults on unparsable YAML', async () => {
    await fs.writeFile(configPath, 'verbose: [unclosed\n');
    expect(loadConfig(configPath).fromFile).toBe(false);
  });

  it('falls back to defaults when the file is not a mapping', async () => {
    await fs.writeFile(configPath, '- just\n- a list\n');
    expect(loadConfig(configPath).fromFile).toBe(false);
  });

  it('falls back to defaults on invalid values', async () => {
    await fs.writeFile(configPath, 'kubectl_command: helm\n');
    const result = loadConfig(configPath);
    expect(result.fromFile).toBe(false);
    expect(result.config.kubectl_command).toBe('kubectl');
  });

  it('returns a copy that callers can change freely', () => {
    const result = loadConfig(configPath);
    result.config.startup_probes.push(['whoami']);
    expect(DEFAULT_CONFIG.startup_probes).toHaveLength(3);
  });
});

describe('withOverrides', () => {
  it('applies nested overrides', () => {
    const config = withOverrides(DEFAULT_CONFIG, { verbose: true, startup_probes: [] });
    expect(config.verbose).toBe(true);
    expect(config.startup_probes).toEqual([]);
    expect(config.cache).toEqual(DEFAULT_CONFIG.cache);
  });

  it('rejects overrides that fail validation', () => {
    let caught: unknown;
    try {
      withOverrides(DEFAULT_CONFIG, { log_tail_lines: 0 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RunnerError);
    expect(caught instanceof RunnerError && caught.code).toBe(RunnerErrorCode.CONFIG_INVALID);
  });
});
