import { readFileSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { logger } from '../logger.js';
import { RunnerError, RunnerErrorCode, errorCode, errorMessage } from '../shared/errors.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
type JsonObject = { [key: string]: JsonValue };

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);
const cacheFileSchema = z.record(jsonValue);

const CREATED_KEY = '_created';

/**
 * A small JSON-backed memo table. Entries live until the whole file is
 * older than the ttl passed to invalidate().
 */
export class Cache {
  private constructor(
    private readonly values: JsonObject,
    readonly filePath: string,
    private readonly root: Cache | null
  ) {}

  static load(filePath: string): Cache {
    return new Cache(readValues(filePath), filePath, null);
  }

  get size(): number {
    return Object.keys(this.values).filter((key) => key !== CREATED_KEY).length;
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, key);
  }

  async invalidate(ttlSeconds: number, nowMs: number = Date.now()): Promise<boolean> {
    const now = nowMs / 1000;
    const created = this.values[CREATED_KEY];
    if (typeof created === 'number' && now - created <= ttlSeconds) {
      return false;
    }
    // Cleared in place: child caches share this object with their root.
    for (const key of Object.keys(this.values)) {
      delete this.values[key];
    }
    this.values[CREATED_KEY] = now;
    await this.save();
    return true;
  }

  /**
   * Returns the stored value for `key` when it still matches `schema`;
   * otherwise computes, stores and saves a fresh one.
   */
  async lookup<T extends JsonValue>(key: string, schema: z.ZodType<T>, compute: () => Promise<T>): Promise<T> {
    if (this.has(key)) {
      const stored = schema.safeParse(this.values[key]);
      if (stored.success) return stored.data;
      logger.debug({ key, file: this.filePath }, 'Cached value has an unexpected shape; recomputing');
    }
    const value = await compute();
    this.values[key] = value;
    await this.save();
    return value;
  }

  /** A nested cache stored under `key`, persisted with this one. */
  child(key: string): Cache {
    const existing = this.values[key];
    let nested: JsonObject;
    if (existing !== null && typeof existing === 'object' && !Array.isArray(existing)) {
      nested = existing;
    } else {
      nested = {};
      this.values[key] = nested;
    }
    return new Cache(nested, this.filePath, this.root ?? this);
  }

  async save(): Promise<void> {
    if (this.root) {
      await this.root.save();
      return;
    }
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(this.values, null, 2), 'utf-8');
    } catch (err) {
      throw new RunnerError(RunnerErrorCode.CACHE_ERROR, `Could not save cache: ${this.filePath}`, {
        cause: errorMessage(err),
      });
    }
  }
}

function readValues(filePath: string): JsonObject {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return {};
    throw new RunnerError(RunnerErrorCode.CACHE_ERROR, `Could not read cache: ${filePath}`, {
      cause: errorMessage(err),
    });
  }
  try {
    const parsed = cacheFileSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn({ file: filePath }, 'Cache file is not a JSON object; starting empty');
  } catch (err) {
    logger.warn({ err, file: filePath }, 'Cache file is not valid JSON; starting empty');
  }
  return {};
}
