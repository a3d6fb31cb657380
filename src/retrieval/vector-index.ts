import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { InvalidationError, PersistenceError, errorMessage } from '../control-plane/errors.js';
import type { MatchResult } from '../control-plane/types.js';
import { sha256 } from '../utils/hash.js';

export interface VectorIndexItem {
  handle: number;
  embedding: number[];
}

export interface VectorIndex {
  corpusId: string;
  buildId: string;
  model: string;
  dimension: number;
  handles: number[];
  vectors: number[][];
}

export interface BuildOrLoadResult {
  index: VectorIndex;
  rebuilt: boolean;
  /** Why a persisted index was not reused; absent when it was, or when none existed. */
  reason?: string;
}

const INDEX_FORMAT = 1;

const IndexFileSchema = z.object({
  format: z.literal(INDEX_FORMAT),
  corpusId: z.string(),
  buildId: z.string(),
  model: z.string(),
  dimension: z.number().int().nonnegative(),
  handles: z.array(z.number().int()),
  vectors: z.array(z.array(z.number())),
});

/**
 * Identity of one index build: the embedding model plus the ordered chunk hashes.
 * Any change to the chunk set changes the build id.
 */
export function corpusBuildId(model: string, chunkHashes: readonly string[]): string {
  return sha256(JSON.stringify([model, chunkHashes]));
}

/**
 * Exact nearest-neighbour index over one corpus, persisted as a single JSON artifact
 * per corpus. Indexes are never patched: a changed chunk set means a new build.
 */
export class VectorIndexStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  buildOrLoad(
    corpusId: string,
    buildId: string,
    model: string,
    items: readonly VectorIndexItem[],
    options: { force?: boolean } = {}
  ): BuildOrLoadResult {
    const dimension = items.length > 0 ? items[0].embedding.length : 0;
    for (const item of items) {
      if (item.embedding.length !== dimension) {
        throw new InvalidationError(
          `embedding for chunk ${item.handle} has ${item.embedding.length} dimensions, expected ${dimension}`
        );
      }
    }

    let reason: string | undefined;
    if (options.force) {
      reason = 'source documents changed';
    } else {
      const loaded = this.load(corpusId);
      if (loaded.index && matches(loaded.index, buildId, model, items)) {
        return { index: loaded.index, rebuilt: false };
      }
      reason = loaded.index ? 'persisted index does not match the current corpus' : loaded.reason;
    }

    const index: VectorIndex = {
      corpusId,
      buildId,
      model,
      dimension,
      handles: items.map((item) => item.handle),
      vectors: items.map((item) => [...item.embedding]),
    };
    this.save(index);
    return { index, rebuilt: true, reason };
  }

  private load(corpusId: string): { index?: VectorIndex; reason?: string } {
    let raw: string;
    try {
      raw = readFileSync(this.pathFor(corpusId), 'utf-8');
    } catch {
      return {};
    }
    try {
      const parsed = IndexFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) return { reason: 'persisted index is malformed' };
      const { format: _format, ...index } = parsed.data;
      return { index };
    } catch (err) {
      return { reason: `persisted index is unreadable: ${errorMessage(err)}` };
    }
  }

  private save(index: VectorIndex): void {
    const path = this.pathFor(index.corpusId);
    const tempPath = `${path}.tmp.${process.pid}`;
    try {
      mkdirSync(this.dir, { recursive: true });
      writeFileSync(tempPath, JSON.stringify({ format: INDEX_FORMAT, ...index }), 'utf-8');
      renameSync(tempPath, path);
    } catch (err) {
      throw new PersistenceError(path, `could not write vector index: ${errorMessage(err)}`, { cause: err });
    }
  }

  private pathFor(corpusId: string): string {
    return join(this.dir, `${corpusId.replace(/[^a-zA-Z0-9_-]/g, '_')}.index.json`);
  }
}

function matches(
  index: VectorIndex,
  buildId: string,
  model: string,
  items: readonly VectorIndexItem[]
): boolean {
  if (index.buildId !== buildId || index.model !== model) return false;
  if (index.handles.length !== items.length || index.vectors.length !== items.length) return false;
  return items.every((item, i) => index.handles[i] === item.handle);
}

/**
 * Top `k` chunks by cosine similarity, best first. Equal scores keep insertion order,
 * so repeated queries against the same build return identical results.
 */
export function query(index: VectorIndex, embedding: readonly number[], k: number): MatchResult[] {
  if (k <= 0 || index.handles.length === 0) return [];
  if (embedding.length !== index.dimension) {
    throw new InvalidationError(
      `query has ${embedding.length} dimensions but index ${index.corpusId} has ${index.dimension}`
    );
  }

  const scored = index.vectors.map((vector, position) => ({
    position,
    score: cosineSimilarity(embedding, vector),
  }));
  scored.sort((a, b) => b.score - a.score || a.position - b.position);

  return scored.slice(0, k).map(({ position, score }) => ({
    chunk: index.handles[position],
    score,
  }));
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
