import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ProjectPaths } from '../config/paths.js';
import { buildLedger } from '../ledger/ledger.js';
import type { RunLedger } from '../ledger/types.js';
import type { EmbeddingService } from '../providers/embedding.js';
import type { LlmService } from '../providers/llm.js';
import type { Sleep } from '../providers/retry.js';
import { renderMarkdown } from '../report/markdown.js';
import { buildReport } from '../report/report.js';
import { VectorIndexStore } from '../retrieval/vector-index.js';
import type { StageContext } from '../stages/context.js';
import { loadRegulation, type SourceClause } from '../state/regulation.js';
import { RunSession, RunStateStore, mergeClauses } from '../state/run-state.js';
import type { ContentCache } from '../tools/cache.js';
import { silentLogger } from '../utils/logger.js';
import { StepTimer } from '../utils/timer.js';
import { errorMessage } from './errors.js';
import { buildWorkflow } from './workflow.js';
import type {
  Logger,
  PipelineSettings,
  ProgressCallback,
  ProgressEvent,
  Project,
  RunState,
} from './types.js';

export interface PipelineDeps {
  llm: LlmService;
  embedder: EmbeddingService;
  cache: ContentCache;
  paths: ProjectPaths;
  logger?: Logger;
  /** Cancellation is honoured between work items. */
  signal?: AbortSignal;
  sleep?: Sleep;
}

/**
 * Runs Need-Check, Audit-Plan, Search and Judge over one project, resuming from its
 * persisted run state. Every finished unit is flushed before the next starts, so an
 * interrupted run resumes where it stopped. Only a storage failure aborts the run;
 * item failures are recorded on the item.
 */
export async function runPipeline(
  project: Project,
  settings: Readonly<PipelineSettings>,
  onProgress: ProgressCallback,
  deps: PipelineDeps
): Promise<RunState> {
  const logger = deps.logger ?? silentLogger;
  const isCancelled = (): boolean => deps.signal?.aborted ?? false;
  const runTimer = new StepTimer();
  const timer = new StepTimer();

  onProgress({ stage: 'load', status: 'started' });
  const store = new RunStateStore(deps.paths.runState, logger);
  const state = store.load(project.id);
  let source: SourceClause[];
  try {
    source = await loadRegulation(project.regulationPath, logger);
  } catch (err) {
    onProgress({ stage: 'load', status: 'failed', detail: errorMessage(err), durationMs: timer.elapsed() });
    throw err;
  }

  const session = new RunSession(store, state);
  if (mergeClauses(state, source, logger)) {
    session.update((s) => {
      s.completedAt = null;
    });
  }
  const startRevision = state.revision;
  onProgress({
    stage: 'load',
    status: 'completed',
    detail: `${state.clauseOrder.length} clause(s)`,
    durationMs: timer.elapsed(),
  });

  const ctx: StageContext = {
    project,
    settings,
    session,
    cache: deps.cache,
    llm: deps.llm,
    embedder: deps.embedder,
    indexStore: new VectorIndexStore(deps.paths.indexDir),
    logger,
    emit: onProgress,
    isCancelled,
    sleep: deps.sleep,
  };

  for (const step of buildWorkflow().steps) {
    if (isCancelled()) break;
    timer.begin();
    onProgress({ stage: step.name, status: 'started' });
    try {
      await step.execute(ctx);
    } catch (err) {
      onProgress({ stage: step.name, status: 'failed', detail: errorMessage(err), durationMs: timer.elapsed() });
      throw err;
    }
    onProgress({
      stage: step.name,
      status: isCancelled() ? 'cancelled' : 'completed',
      durationMs: timer.elapsed(),
    });
  }

  if (isCancelled()) {
    onProgress({ stage: 'pipeline', status: 'cancelled', durationMs: runTimer.elapsed() });
    return state;
  }

  if (state.completedAt === null || state.revision !== startRevision) {
    session.update((s) => {
      s.completedAt = new Date().toISOString();
    });
  }
  onProgress({ stage: 'pipeline', status: 'completed', durationMs: runTimer.elapsed() });
  return state;
}

export type ReportFormat = 'md' | 'json';

export interface RunOutputs {
  ledgerPath: string;
  reportPath: string;
  ledger: RunLedger;
}

/** Writes `<runId>-ledger.json` and `<runId>-report.<format>` into `outDir`. */
export async function emitOutputs(
  outDir: string,
  runId: string,
  project: Project,
  state: RunState,
  events: readonly ProgressEvent[],
  format: ReportFormat,
  failureReason?: string
): Promise<RunOutputs> {
  await mkdir(outDir, { recursive: true });

  const ledger = buildLedger({ runId, state, events, passed: failureReason === undefined, failureReason });
  const ledgerPath = join(outDir, `${runId}-ledger.json`);
  await writeFile(ledgerPath, JSON.stringify(ledger, null, 2));

  const report = buildReport(project, state);
  const reportPath = join(outDir, `${runId}-report.${format}`);
  await writeFile(reportPath, format === 'md' ? renderMarkdown(report) : JSON.stringify(report, null, 2));

  return { ledgerPath, reportPath, ledger };
}
