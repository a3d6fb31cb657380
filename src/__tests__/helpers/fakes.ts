import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { PipelineSettings, ProgressEvent, Project, RunState } from '../../control-plane/types.js';
import type { EmbeddingService } from '../../providers/embedding.js';
import { parseStructured, type CompletionRequest, type LlmService } from '../../providers/llm.js';
import { VectorIndexStore } from '../../retrieval/vector-index.js';
import type { StageContext } from '../../stages/context.js';
import { RunSession, RunStateStore, emptyRunState } from '../../state/run-state.js';
import { ContentCache } from '../../tools/cache.js';
import { silentLogger } from '../../utils/logger.js';

export const MODELS = {
  needCheck: 'need-model',
  auditPlan: 'plan-model',
  judge: 'judge-model',
  embedding: 'embed-model',
};

export function testSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    models: { ...MODELS },
    topK: 3,
    chunkMaxTokens: 200,
    maxTasksPerClause: 4,
    concurrency: 2,
    retry: { attempts: 2, baseDelayMs: 0 },
    apiKey: 'test-secret',
    ...overrides,
  };
}

export const noSleep = async (): Promise<void> => {};

export interface RecordedRequest {
  model: string;
  prompt: string;
}

/** Returns the raw reply text for a request; may throw to simulate a provider failure. */
export type Responder = (request: RecordedRequest, callIndex: number) => string;

/** Scripted LLM. Replies go through the real structured-output parser. */
export class FakeLlm implements LlmService {
  readonly requests: RecordedRequest[] = [];
  private readonly responder: Responder;

  constructor(responder: Responder) {
    this.responder = responder;
  }

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    const recorded = { model: request.model, prompt: request.prompt };
    this.requests.push(recorded);
    return parseStructured(this.responder(recorded, this.requests.length - 1), request.schema);
  }

  callsFor(model: string): RecordedRequest[] {
    return this.requests.filter((r) => r.model === model);
  }
}

const DIMENSIONS = 64;

function bucket(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619) >>> 0;
  }
  return hash % DIMENSIONS;
}

/** Deterministic bag-of-words vector: texts sharing words score higher. */
export function bagOfWords(text: string): number[] {
  const vector = new Array<number>(DIMENSIONS).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    vector[bucket(token)] += 1;
  }
  return vector;
}

export class FakeEmbedder implements EmbeddingService {
  readonly texts: string[] = [];
  private readonly fail?: (text: string) => Error | undefined;
  private readonly delayMs?: (text: string) => number;

  constructor(fail?: (text: string) => Error | undefined, delayMs?: (text: string) => number) {
    this.fail = fail;
    this.delayMs = delayMs;
  }

  async embed(text: string): Promise<number[]> {
    this.texts.push(text);
    const delay = this.delayMs?.(text) ?? 0;
    if (delay > 0) await new Promise<void>((resolve) => setTimeout(resolve, delay));
    const error = this.fail?.(text);
    if (error) throw error;
    return bagOfWords(text);
  }
}

/** The clause id and text a stage prompt was built for. */
export function promptClause(prompt: string): { id: string; text: string } {
  const match = /^Clause (\S+): "(.*)"$/m.exec(prompt);
  return match ? { id: match[1], text: match[2] } : { id: '', text: '' };
}

export interface TempDir {
  path: string;
  cleanup: () => void;
}

export function makeTempDir(prefix = 'regaudit-test-'): TempDir {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

export function testProject(dir: string, procedurePaths: string[] = []): Project {
  return {
    id: 'acme',
    name: 'Acme',
    regulationPath: join(dir, 'regulation.json'),
    procedurePaths,
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

export interface StageHarness {
  ctx: StageContext;
  state: RunState;
  events: ProgressEvent[];
}

/** A stage context over a temp directory, for driving one stage at a time. */
export function stageHarness(
  dir: string,
  llm: LlmService,
  embedder: EmbeddingService,
  options: { settings?: PipelineSettings; state?: RunState; procedurePaths?: string[] } = {}
): StageHarness {
  const store = new RunStateStore(join(dir, 'run.json'), silentLogger);
  const state = options.state ?? emptyRunState('acme');
  const events: ProgressEvent[] = [];
  const ctx: StageContext = {
    project: testProject(dir, options.procedurePaths),
    settings: options.settings ?? testSettings(),
    session: new RunSession(store, state),
    cache: new ContentCache(join(dir, 'cache')),
    llm,
    embedder,
    indexStore: new VectorIndexStore(join(dir, 'index')),
    logger: silentLogger,
    emit: (event) => events.push(event),
    isCancelled: () => false,
    sleep: noSleep,
  };
  return { ctx, state, events };
}
