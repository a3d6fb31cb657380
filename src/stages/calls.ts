import { z } from 'zod';
import { ParseError, PersistenceError, PipelineError, errorMessage } from '../control-plane/errors.js';
import { withBackoff } from '../providers/retry.js';
import { cacheKey, type CacheParams } from '../tools/cache.js';
import type { Schema } from '../utils/schema.js';
import type { StageContext } from './context.js';

export interface CallOutcome<T> {
  value: T;
  /** Provider calls made, retries and corrections included. 0 on a cache hit. */
  calls: number;
}

export interface StructuredCall<T> {
  stage: string;
  model: string;
  prompt: string;
  schema: Schema<T>;
  /** Re-prompt used once when the first reply does not parse. */
  corrective: (error: ParseError) => string;
  /** Cache identity; defaults to the prompt itself. */
  cacheContent?: string;
  params?: CacheParams;
}

/**
 * Cache-checked structured LLM call. Provider failures back off and retry; a reply that
 * does not parse is retried once with the corrective prompt, then the ParseError
 * propagates. Only a successful value is written to the cache.
 */
export async function cachedCompletion<T>(ctx: StageContext, call: StructuredCall<T>): Promise<CallOutcome<T>> {
  const key = cacheKey({
    content: call.cacheContent ?? call.prompt,
    stage: call.stage,
    model: call.model,
    params: call.params,
  });
  const hit = ctx.cache.get(key, call.schema);
  if (hit !== undefined) return { value: hit, calls: 0 };

  let calls = 0;
  const attempt = (prompt: string): Promise<T> =>
    withBackoff(
      () => {
        calls++;
        return ctx.llm.complete({ prompt, model: call.model, schema: call.schema });
      },
      ctx.settings.retry,
      ctx.sleep
    );

  const value = await attempt(call.prompt)
    .catch((err: unknown) => {
      if (!(err instanceof ParseError)) throw err;
      ctx.logger.warn(`${call.stage}: unparseable reply, re-prompting (${err.message})`);
      return attempt(call.corrective(err));
    })
    .catch((err: unknown) => {
      throw withCalls(err, calls);
    });

  store(ctx, key, value);
  return { value, calls };
}

const EmbeddingSchema = z.array(z.number());

/** Cache-checked embedding keyed by the text's hash and the embedding model. */
export async function cachedEmbedding(ctx: StageContext, text: string): Promise<CallOutcome<number[]>> {
  const model = ctx.settings.models.embedding;
  const key = cacheKey({ content: text, stage: 'embed', model });
  const hit = ctx.cache.get(key, EmbeddingSchema);
  if (hit !== undefined) return { value: hit, calls: 0 };

  let calls = 0;
  const value = await withBackoff(
    () => {
      calls++;
      return ctx.embedder.embed(text, model);
    },
    ctx.settings.retry,
    ctx.sleep
  ).catch((err: unknown) => {
    throw withCalls(err, calls);
  });
  store(ctx, key, value);
  return { value, calls };
}

function withCalls(err: unknown, calls: number): unknown {
  if (err instanceof PipelineError) err.calls = calls;
  return err;
}

/** A cache entry that cannot be written only costs a recomputation on the next run. */
function store(ctx: StageContext, key: string, value: unknown): void {
  try {
    ctx.cache.put(key, value);
  } catch (err) {
    if (!(err instanceof PersistenceError)) throw err;
    ctx.logger.warn(`cache write skipped: ${errorMessage(err)}`);
  }
}
