import { InvalidationError, PersistenceError, callsSpent, errorMessage, toItemError } from '../control-plane/errors.js';
import type { AuditTask, RegulationClause } from '../control-plane/types.js';
import { query } from '../retrieval/vector-index.js';
import { runWithConcurrency } from '../utils/pool.js';
import { StepTimer } from '../utils/timer.js';
import { cachedEmbedding } from './calls.js';
import type { StageContext } from './context.js';
import { prepareCorpus, type PreparedCorpus } from './corpus.js';

const SEARCHABLE = new Set(['planned', 'searched', 'judged']);

/** Clauses with a plan whose tasks may need (re)searching against the current build. */
export function searchCandidates(clauses: readonly RegulationClause[]): RegulationClause[] {
  return clauses.filter((c) => SEARCHABLE.has(c.status) && c.tasks.length > 0);
}

function taskIsCurrent(task: AuditTask, buildId: string): boolean {
  return task.matches !== null && task.indexBuild === buildId;
}

/**
 * Prepares the corpus index, then retrieves the top-K chunks for every task whose
 * results are missing or belong to an older build. A clause whose tasks are all current
 * moves to `searched`; a verdict from an older build is dropped so Judge runs again.
 */
export async function runSearch(ctx: StageContext): Promise<void> {
  const candidates = searchCandidates(ctx.session.clauses());
  if (candidates.length === 0) {
    ctx.emit({ stage: 'search', status: 'skipped', detail: 'no planned clauses' });
    return;
  }

  let corpus: PreparedCorpus | undefined;
  try {
    corpus = await prepareCorpus(ctx);
  } catch (err) {
    if (!(err instanceof InvalidationError)) throw err;
    failClauses(ctx, candidates, err);
    return;
  }
  if (!corpus) return;
  const { index } = corpus;
  const buildId = index.buildId;

  const work = candidates.flatMap((clause) =>
    clause.tasks.filter((task) => !taskIsCurrent(task, buildId)).map((task) => ({ clause, task }))
  );
  let completed = 0;

  await runWithConcurrency(
    work,
    ctx.settings.concurrency,
    async ({ clause, task }) => {
      if (clause.status === 'failed') {
        completed++;
        ctx.emit({
          stage: 'search',
          status: 'skipped',
          clauseId: clause.id,
          taskId: task.id,
          detail: 'clause already failed',
          completed,
          total: work.length,
        });
        return;
      }
      let calls = 0;
      try {
        const timer = new StepTimer();
        const embedded = await cachedEmbedding(ctx, task.sentence);
        calls = embedded.calls;
        const matches = query(index, embedded.value, ctx.settings.topK);
        const durationMs = timer.elapsed();

        // A sibling task may have failed the clause while this one was in flight.
        ctx.session.update(() => {
          task.matches = matches;
          task.indexBuild = buildId;
          task.finding = null;
          task.error = null;
          if (clause.status !== 'planned' && clause.status !== 'failed') {
            clause.status = 'planned';
            clause.verdict = null;
          }
        });
        completed++;
        ctx.emit({
          stage: 'search',
          status: calls === 0 ? 'cached' : 'done',
          clauseId: clause.id,
          taskId: task.id,
          detail: `${matches.length} match(es)`,
          durationMs,
          calls,
          completed,
          total: work.length,
        });
      } catch (err) {
        if (err instanceof PersistenceError) throw err;
        const error = toItemError('search', err);
        ctx.session.update(() => {
          task.error = error;
          clause.status = 'failed';
          clause.error = error;
        });
        completed++;
        ctx.emit({
          stage: 'search',
          status: 'failed',
          clauseId: clause.id,
          taskId: task.id,
          detail: errorMessage(err),
          calls: Math.max(calls, callsSpent(err)),
          completed,
          total: work.length,
        });
      }
    },
    ctx.isCancelled
  );
  if (ctx.isCancelled()) return;

  for (const clause of candidates) {
    if (clause.status === 'failed') continue;
    if (!clause.tasks.every((task) => taskIsCurrent(task, buildId))) continue;

    const verdictCurrent = clause.verdict !== null && clause.verdict.indexBuild === buildId;
    if (clause.status === 'judged' && verdictCurrent) continue;
    if (clause.status === 'searched' && clause.verdict === null) continue;

    ctx.session.update(() => {
      clause.status = 'searched';
      clause.verdict = null;
      for (const task of clause.tasks) task.finding = null;
    });
  }
}

/** The corpus could not be indexed consistently; none of its dependents can be searched. */
function failClauses(ctx: StageContext, clauses: readonly RegulationClause[], err: InvalidationError): void {
  const error = toItemError('search', err);
  ctx.session.update(() => {
    for (const clause of clauses) {
      clause.status = 'failed';
      clause.error = error;
    }
  });
  for (const clause of clauses) {
    ctx.emit({ stage: 'search', status: 'failed', clauseId: clause.id, detail: err.message });
  }
}
