import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { PersistenceError, errorMessage } from '../control-plane/errors.js';
import type {
  AuditTask,
  Logger,
  RegulationClause,
  RunState,
} from '../control-plane/types.js';
import { sha256 } from '../utils/hash.js';
import type { SourceClause } from './regulation.js';

export const RUN_STATE_SCHEMA_VERSION = 1;

const StageNameSchema = z.enum(['need_check', 'audit_plan', 'search', 'judge']);

const ItemErrorSchema = z.object({
  stage: StageNameSchema,
  kind: z.enum(['ingestion', 'provider', 'parse', 'invalidation', 'persistence', 'internal']),
  message: z.string(),
});

const MatchResultSchema = z.object({
  chunk: z.number().int().nonnegative(),
  score: z.number(),
});

const AuditTaskSchema = z.object({
  id: z.string(),
  sentence: z.string(),
  matches: z.array(MatchResultSchema).nullable(),
  indexBuild: z.string().nullable(),
  finding: z.enum(['supported', 'gap', 'ambiguous', 'none']).nullable(),
  error: ItemErrorSchema.nullable(),
});

const ClauseVerdictSchema = z.object({
  status: z.enum(['compliant', 'non_compliant', 'inconclusive', 'no_evidence']),
  compliant: z.boolean().nullable(),
  confidence: z.number().nullable(),
  description: z.string(),
  suggestions: z.string(),
  evidence: z.array(z.number().int()),
  indexBuild: z.string(),
  judgedAt: z.string(),
});

const RegulationClauseSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  parentId: z.string().optional(),
  text: z.string(),
  sourceHash: z.string(),
  status: z.enum(['pending', 'need_checked', 'skipped', 'planned', 'searched', 'judged', 'failed']),
  needsProcedure: z.boolean().nullable(),
  tasks: z.array(AuditTaskSchema),
  verdict: ClauseVerdictSchema.nullable(),
  error: ItemErrorSchema.nullable(),
});

const ProcedureChunkSchema = z.object({
  handle: z.number().int().nonnegative(),
  documentPath: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  text: z.string(),
  contentHash: z.string(),
});

const RunStateSchema = z.object({
  schemaVersion: z.literal(RUN_STATE_SCHEMA_VERSION),
  projectId: z.string(),
  revision: z.number().int().nonnegative(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  clauseOrder: z.array(z.string()),
  clauses: z.record(z.string(), RegulationClauseSchema),
  documents: z.record(
    z.string(),
    z.object({
      path: z.string(),
      status: z.enum(['ingested', 'failed']),
      mtimeMs: z.number().nullable(),
      contentHash: z.string().nullable(),
      chunkHashes: z.array(z.string()),
      error: z.string().optional(),
    })
  ),
  corpus: z
    .object({
      corpusId: z.string(),
      buildId: z.string(),
      embeddingModel: z.string(),
      chunks: z.array(ProcedureChunkSchema),
    })
    .nullable(),
});

export function emptyRunState(projectId: string): RunState {
  return {
    schemaVersion: RUN_STATE_SCHEMA_VERSION,
    projectId,
    revision: 0,
    updatedAt: new Date().toISOString(),
    completedAt: null,
    clauseOrder: [],
    clauses: {},
    documents: {},
    corpus: null,
  };
}

export function newClause(source: SourceClause): RegulationClause {
  const clause: RegulationClause = {
    id: source.id,
    text: source.text,
    sourceHash: sha256(source.text),
    status: 'pending',
    needsProcedure: null,
    tasks: [],
    verdict: null,
    error: null,
  };
  if (source.title) clause.title = source.title;
  if (source.parentId) clause.parentId = source.parentId;
  return clause;
}

export function newTask(id: string, sentence: string): AuditTask {
  return { id, sentence, matches: null, indexBuild: null, finding: null, error: null };
}

/**
 * Single-writer persistence for one project's run state. Every `save` replaces the file
 * atomically, so the file on disk is always a complete snapshot.
 */
export class RunStateStore {
  readonly path: string;
  private readonly logger: Logger;

  constructor(path: string, logger: Logger) {
    this.path = path;
    this.logger = logger;
  }

  /** Loads the snapshot, or a fresh state when none exists or it cannot be used. */
  load(projectId: string): RunState {
    if (!existsSync(this.path)) return emptyRunState(projectId);

    let reason: string;
    try {
      const parsed = RunStateSchema.safeParse(JSON.parse(readFileSync(this.path, 'utf-8')));
      if (parsed.success && parsed.data.projectId === projectId) return parsed.data;
      reason = parsed.success
        ? `belongs to project "${parsed.data.projectId}"`
        : `does not match schema version ${RUN_STATE_SCHEMA_VERSION}`;
    } catch (err) {
      reason = `is unreadable (${errorMessage(err)})`;
    }

    const backup = `${this.path}.invalid-${Date.now()}`;
    this.logger.warn(`run state ${this.path} ${reason}; moved to ${backup} and starting fresh`);
    try {
      renameSync(this.path, backup);
    } catch (err) {
      throw new PersistenceError(this.path, `cannot set aside invalid run state: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return emptyRunState(projectId);
  }

  save(state: RunState): void {
    state.revision += 1;
    state.updatedAt = new Date().toISOString();
    const tempPath = `${this.path}.tmp.${process.pid}`;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tempPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
      renameSync(tempPath, this.path);
    } catch (err) {
      if (existsSync(tempPath)) rmSync(tempPath, { recursive: true, force: true });
      throw new PersistenceError(this.path, `cannot write run state: ${errorMessage(err)}`, { cause: err });
    }
  }

  clear(): boolean {
    if (!existsSync(this.path)) return false;
    rmSync(this.path);
    return true;
  }
}

/**
 * The in-memory run state of one pipeline run plus its store. `update` applies a
 * mutation and flushes before returning, which makes each unit of work durable.
 */
export class RunSession {
  readonly store: RunStateStore;
  readonly state: RunState;

  constructor(store: RunStateStore, state: RunState) {
    this.store = store;
    this.state = state;
  }

  clauses(): RegulationClause[] {
    return this.state.clauseOrder.map((id) => this.state.clauses[id]).filter((c) => c !== undefined);
  }

  update(mutate: (state: RunState) => void): void {
    mutate(this.state);
    this.store.save(this.state);
  }
}

/**
 * Reconciles the stored clauses with the regulation source. Source order wins; clauses
 * whose text changed, and clauses that failed last time, start over; clauses no longer
 * in the source are dropped. Returns whether anything changed.
 */
export function mergeClauses(state: RunState, source: readonly SourceClause[], logger: Logger): boolean {
  let changed = false;
  const next: Record<string, RegulationClause> = {};

  for (const entry of source) {
    const existing = state.clauses[entry.id];
    const fresh = newClause(entry);

    if (!existing) {
      next[entry.id] = fresh;
      changed = true;
    } else if (existing.sourceHash !== fresh.sourceHash) {
      logger.info(`    clause ${entry.id} text changed; re-evaluating`);
      next[entry.id] = fresh;
      changed = true;
    } else if (existing.status === 'failed') {
      next[entry.id] = fresh;
      changed = true;
    } else {
      if (existing.title !== entry.title || existing.parentId !== entry.parentId) {
        existing.title = entry.title;
        existing.parentId = entry.parentId;
        changed = true;
      }
      next[entry.id] = existing;
    }
  }

  for (const id of state.clauseOrder) {
    if (!(id in next)) {
      logger.warn(`clause ${id} is no longer in the regulation source; dropping its results`);
      changed = true;
    }
  }

  const order = source.map((c) => c.id);
  if (order.join('\n') !== state.clauseOrder.join('\n')) changed = true;

  state.clauseOrder = order;
  state.clauses = next;
  return changed;
}
