import { z } from 'zod';
import { PersistenceError, callsSpent, errorMessage, toItemError } from '../control-plane/errors.js';
import type {
  ClauseVerdict,
  MatchResult,
  ProcedureChunk,
  RegulationClause,
  TaskFinding,
  VerdictStatus,
} from '../control-plane/types.js';
import { runWithConcurrency } from '../utils/pool.js';
import { StepTimer } from '../utils/timer.js';
import { cachedCompletion } from './calls.js';
import type { StageContext } from './context.js';
import { PROMPT_VERSION, judgeCorrection, judgePrompt, type EvidenceItem } from './prompts.js';

const JudgeSchema = z.object({
  compliant: z.boolean(),
  description: z.string(),
  suggestions: z.string().default(''),
  confidence: z.number().min(0).max(1).optional(),
  tasks: z
    .array(
      z.object({
        id: z.string(),
        finding: z.enum(['supported', 'gap', 'ambiguous']),
      })
    )
    .optional(),
});

type JudgeReply = z.infer<typeof JudgeSchema>;

/**
 * Folds task findings into a clause verdict. Any gap wins, even over tasks that found
 * nothing; all supported is compliant; nothing retrieved anywhere is no_evidence;
 * every other mix is inconclusive.
 */
export function aggregateVerdict(findings: readonly TaskFinding[]): VerdictStatus {
  if (findings.includes('gap')) return 'non_compliant';
  if (findings.length > 0 && findings.every((f) => f === 'supported')) return 'compliant';
  if (findings.every((f) => f === 'none')) return 'no_evidence';
  return 'inconclusive';
}

/** Unique evidence across tasks, best score first, ties by handle. */
export function collectEvidence(matchLists: readonly (readonly MatchResult[])[]): MatchResult[] {
  const best = new Map<number, number>();
  for (const matches of matchLists) {
    for (const match of matches) {
      const seen = best.get(match.chunk);
      if (seen === undefined || match.score > seen) best.set(match.chunk, match.score);
    }
  }
  return [...best.entries()]
    .map(([chunk, score]) => ({ chunk, score }))
    .sort((a, b) => b.score - a.score || a.chunk - b.chunk);
}

/** Clauses whose tasks have all been searched and that carry no verdict yet. */
export function judgePending(clauses: readonly RegulationClause[]): RegulationClause[] {
  return clauses.filter((c) => c.status === 'searched');
}

/**
 * Produces a verdict for every searched clause. A clause with no retrieved evidence
 * is settled as no_evidence without a model call.
 */
export async function runJudge(ctx: StageContext): Promise<void> {
  const pending = judgePending(ctx.session.clauses());
  const arena = new Map<number, ProcedureChunk>();
  for (const chunk of ctx.session.state.corpus?.chunks ?? []) arena.set(chunk.handle, chunk);
  let completed = 0;

  await runWithConcurrency(
    pending,
    ctx.settings.concurrency,
    async (clause) => {
      try {
        const timer = new StepTimer();
        const { verdict, findings, calls } = await judgeClause(ctx, clause, arena);
        const durationMs = timer.elapsed();

        ctx.session.update(() => {
          clause.tasks.forEach((task, i) => {
            task.finding = findings[i];
          });
          clause.verdict = verdict;
          clause.status = 'judged';
          clause.error = null;
        });
        completed++;
        ctx.emit({
          stage: 'judge',
          status: calls === 0 ? 'cached' : 'done',
          clauseId: clause.id,
          detail: verdict.status,
          durationMs,
          calls,
          completed,
          total: pending.length,
        });
      } catch (err) {
        if (err instanceof PersistenceError) throw err;
        ctx.session.update(() => {
          clause.status = 'failed';
          clause.error = toItemError('judge', err);
        });
        completed++;
        ctx.emit({
          stage: 'judge',
          status: 'failed',
          clauseId: clause.id,
          detail: errorMessage(err),
          calls: callsSpent(err),
          completed,
          total: pending.length,
        });
      }
    },
    ctx.isCancelled
  );
}

interface JudgeOutcome {
  verdict: ClauseVerdict;
  findings: TaskFinding[];
  calls: number;
}

async function judgeClause(
  ctx: StageContext,
  clause: RegulationClause,
  arena: ReadonlyMap<number, ProcedureChunk>
): Promise<JudgeOutcome> {
  const indexBuild = ctx.session.state.corpus?.buildId ?? '';
  const matchLists = clause.tasks.map((task) => (task.matches ?? []).filter((m) => arena.has(m.chunk)));
  const evidence = collectEvidence(matchLists);

  if (evidence.length === 0) {
    return {
      verdict: {
        status: 'no_evidence',
        compliant: null,
        confidence: null,
        description: 'No passage in the procedure documents was retrieved for this clause.',
        suggestions: 'Add a procedure that addresses this requirement.',
        evidence: [],
        indexBuild,
        judgedAt: new Date().toISOString(),
      },
      findings: clause.tasks.map((): TaskFinding => 'none'),
      calls: 0,
    };
  }

  const labels = new Map<number, string>();
  const items: EvidenceItem[] = [];
  evidence.forEach((match, i) => {
    const chunk = arena.get(match.chunk);
    if (!chunk) return;
    const label = `E${i + 1}`;
    labels.set(match.chunk, label);
    items.push({ label, chunk });
  });

  const prompt = judgePrompt(
    clause,
    clause.tasks.map((task, i) => ({
      task,
      labels: matchLists[i].map((m) => labels.get(m.chunk) ?? '').filter((l) => l.length > 0),
    })),
    items
  );

  const { value: reply, calls } = await cachedCompletion(ctx, {
    stage: 'judge',
    model: ctx.settings.models.judge,
    prompt,
    schema: JudgeSchema,
    corrective: (err) => judgeCorrection(prompt, err.message),
    params: { prompt: PROMPT_VERSION },
  });

  const findings = taskFindings(clause, matchLists, reply);
  const status = aggregateVerdict(findings);
  return {
    verdict: {
      status,
      compliant: status === 'compliant' ? true : status === 'non_compliant' ? false : null,
      confidence: reply.confidence ?? null,
      description: reply.description,
      suggestions: reply.suggestions,
      evidence: evidence.map((m) => m.chunk),
      indexBuild,
      judgedAt: new Date().toISOString(),
    },
    findings,
    calls,
  };
}

/**
 * Per-task findings from the reply. A task with no matches is `none` whatever the model
 * says; an evidenced task the model did not grade takes its reading from the overall flag.
 */
function taskFindings(
  clause: RegulationClause,
  matchLists: readonly (readonly MatchResult[])[],
  reply: JudgeReply
): TaskFinding[] {
  const graded = new Map<string, TaskFinding>();
  for (const entry of reply.tasks ?? []) graded.set(entry.id, entry.finding);
  const fallback: TaskFinding = reply.compliant ? 'supported' : 'gap';

  return clause.tasks.map((task, i): TaskFinding => {
    if (matchLists[i].length === 0) return 'none';
    return graded.get(task.id) ?? fallback;
  });
}
