import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { z } from 'zod';
import { Cache } from '../../../src/cache/cache.js';

describe('Cache', () => {
  let tmpDir: string;
  let cachePath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tracked-runner-cache-'));
    cachePath = path.join(tmpDir, 'cache.json');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('starts empty when the file does not exist', () => {
    expect(Cache.load(cachePath).size).toBe(0);
  });

  it('computes a value once and serves it afterwards', async () => {
    const cache = Cache.load(cachePath);
    const compute = jest.fn(async () => 'v1.30.0');

    await expect(cache.lookup('kubectl-version', z.string(), compute)).resolves.toBe('v1.30.0');
    await expect(cache.lookup('kubectl-version', z.string(), compute)).resolves.toBe('v1.30.0');
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('persists values across loads', async () => {
    const first = Cache.load(cachePath);
    await first.lookup('answer', z.number(), async () => 42);

    const second = Cache.load(cachePath);
    const compute = jest.fn(async () => 0);
    await expect(second.lookup('answer', z.number(), compute)).resolves.toBe(42);
    expect(compute).not.toHaveBeenCalled();
  });

  it('recomputes a stored value of the wrong shape', async () => {
    await fs.writeFile(cachePath, JSON.stringify({ answer: 'not a number' }));
    const cache = Cache.load(cachePath);
    await expect(cache.lookup('answer', z.number(), async () => 7)).resolves.toBe(7);
  });

  it('clears entries older than the ttl', async () => {
    await fs.writeFile(cachePath, JSON.stringify({ _created: 1000, stale: true }));
    const cache = Cache.load(cachePath);

    await expect(cache.invalidate(60, 1_100_000)).resolves.toBe(true);

    expect(cache.has('stale')).toBe(false);
    expect(JSON.parse(await fs.readFile(cachePath, 'utf-8'))).toEqual({ _created: 1100 });
  });

  it('keeps entries younger than the ttl', async () => {
    await fs.writeFile(cachePath, JSON.stringify({ _created: 1000, fresh: true }));
    const cache = Cache.load(cachePath);

    await expect(cache.invalidate(60, 1_030_000)).resolves.toBe(false);
    expect(cache.has('fresh')).toBe(true);
  });

  it('treats a corrupt file as empty', async () => {
    await fs.writeFile(cachePath, '{not json');
    expect(Cache.load(cachePath).size).toBe(0);
  });

  it('treats a JSON file that is not an object as empty', async () => {
    await fs.writeFile(cachePath, '[1, 2, 3]');
    expect(Cache.load(cachePath).size).toBe(0);
  });

  it('stores child caches inside the root file', async () => {
    const cache = Cache.load(cachePath);
    const child = cache.child('cluster-a');
    await child.lookup('server', z.string(), async () => 'https://cluster-a.example');

    expect(JSON.parse(await fs.readFile(cachePath, 'utf-8'))).toEqual({
      'cluster-a': { server: 'https://cluster-a.example' },
    });
  });
});
