import { z } from 'zod';
import type { PipelineSettings } from '../control-plane/types.js';

export const DEFAULT_SETTINGS: PipelineSettings = {
  models: {
    needCheck: 'gpt-4o-mini',
    auditPlan: 'gpt-4o-mini',
    judge: 'gpt-4o',
    embedding: 'text-embedding-3-small',
  },
  topK: 5,
  chunkMaxTokens: 200,
  maxTasksPerClause: 8,
  concurrency: 4,
  retry: { attempts: 3, baseDelayMs: 500 },
};

const SettingsSchema = z.object({
  models: z.object({
    needCheck: z.string().min(1),
    auditPlan: z.string().min(1),
    judge: z.string().min(1),
    embedding: z.string().min(1),
  }),
  topK: z.number().int().min(1).max(100),
  chunkMaxTokens: z.number().int().min(16).max(8192),
  maxTasksPerClause: z.number().int().min(1).max(50),
  concurrency: z.number().int().min(1).max(64),
  retry: z.object({
    attempts: z.number().int().min(1).max(10),
    baseDelayMs: z.number().int().min(0),
  }),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
});

export interface SettingsOverrides {
  topK?: number;
  concurrency?: number;
  chunkMaxTokens?: number;
  maxTasksPerClause?: number;
}

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function envString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Resolves run settings from defaults, then `REGAUDIT_*` / `OPENAI_*` environment
 * variables, then explicit overrides. The result is validated and frozen.
 */
export function resolveSettings(env: Env = process.env, overrides: SettingsOverrides = {}): Readonly<PipelineSettings> {
  const d = DEFAULT_SETTINGS;
  const candidate = {
    models: {
      needCheck: envString(env, 'REGAUDIT_MODEL_NEED_CHECK') ?? d.models.needCheck,
      auditPlan: envString(env, 'REGAUDIT_MODEL_AUDIT_PLAN') ?? d.models.auditPlan,
      judge: envString(env, 'REGAUDIT_MODEL_JUDGE') ?? d.models.judge,
      embedding: envString(env, 'REGAUDIT_MODEL_EMBEDDING') ?? d.models.embedding,
    },
    topK: overrides.topK ?? envInt(env, 'REGAUDIT_TOP_K') ?? d.topK,
    chunkMaxTokens: overrides.chunkMaxTokens ?? envInt(env, 'REGAUDIT_CHUNK_MAX_TOKENS') ?? d.chunkMaxTokens,
    maxTasksPerClause:
      overrides.maxTasksPerClause ?? envInt(env, 'REGAUDIT_MAX_TASKS') ?? d.maxTasksPerClause,
    concurrency: overrides.concurrency ?? envInt(env, 'REGAUDIT_CONCURRENCY') ?? d.concurrency,
    retry: {
      attempts: envInt(env, 'REGAUDIT_RETRY_ATTEMPTS') ?? d.retry.attempts,
      baseDelayMs: envInt(env, 'REGAUDIT_RETRY_BASE_MS') ?? d.retry.baseDelayMs,
    },
    apiKey: envString(env, 'OPENAI_API_KEY'),
    baseUrl: envString(env, 'OPENAI_BASE_URL'),
  };

  const parsed = SettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid settings: ${issues}`);
  }
  return deepFreeze(parsed.data);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const inners: unknown[] = Object.values(value);
  for (const inner of inners) {
    if (inner !== null && typeof inner === 'object') deepFreeze(inner);
  }
  return Object.freeze(value);
}
