import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { PersistenceError, errorMessage } from '../control-plane/errors.js';
import { sha256 } from '../utils/hash.js';
import type { Schema } from '../utils/schema.js';

export type CacheParams = Record<string, string | number | boolean>;

export interface CacheKeyParts {
  /** Raw input text; hashed before it reaches the key. */
  content: string;
  stage: string;
  model: string;
  params?: CacheParams;
}

const CacheFileSchema = z.object({
  key: z.string(),
  value: z.unknown(),
});

function sanitize(key: string): string {
  return key.replace(/[^a-zA-Z0-9_-]/g, '_');
}

/**
 * Derives a cache key from the content hash, the stage, the model and every tunable
 * parameter that affects the result. Parameter order does not matter.
 */
export function cacheKey(parts: CacheKeyParts): string {
  const params = Object.entries(parts.params ?? {}).sort(([a], [b]) => a.localeCompare(b));
  const material = JSON.stringify([sha256(parts.content), parts.stage, parts.model, params]);
  return `${sanitize(parts.stage)}_${sha256(material)}`;
}

/**
 * Content-addressed store for embeddings and LLM responses. One JSON file per entry,
 * written through a temp file and renamed into place before `put` returns.
 */
export class ContentCache {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  get<T>(key: string, schema: Schema<T>): T | undefined {
    const path = this.pathFor(key);
    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch {
      return undefined;
    }
    return decode(raw, key, schema);
  }

  /** @throws PersistenceError when the entry cannot be written. */
  put(key: string, value: unknown): void {
    const path = this.pathFor(key);
    const tempPath = `${path}.tmp.${process.pid}`;
    try {
      mkdirSync(this.dir, { recursive: true });
      writeFileSync(tempPath, JSON.stringify({ key, value }), 'utf-8');
      renameSync(tempPath, path);
    } catch (err) {
      if (existsSync(tempPath)) rmSync(tempPath, { recursive: true, force: true });
      throw new PersistenceError(path, `cannot write cache entry: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Drops every entry. The only removal path; entries never expire on their own. */
  clear(): void {
    rmSync(this.dir, { recursive: true, force: true });
  }

  private pathFor(key: string): string {
    return join(this.dir, `${sanitize(key)}.json`);
  }
}

function decode<T>(raw: string, key: string, schema: Schema<T>): T | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const file = CacheFileSchema.safeParse(parsed);
  if (!file.success || file.data.key !== key) return undefined;
  const value = schema.safeParse(file.data.value);
  return value.success ? value.data : undefined;
}
