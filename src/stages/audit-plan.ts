import { z } from 'zod';
import { PersistenceError, callsSpent, errorMessage, toItemError } from '../control-plane/errors.js';
import type { RegulationClause } from '../control-plane/types.js';
import { newTask } from '../state/run-state.js';
import { runWithConcurrency } from '../utils/pool.js';
import { StepTimer } from '../utils/timer.js';
import { cachedCompletion } from './calls.js';
import type { StageContext } from './context.js';
import { PROMPT_VERSION, auditPlanCorrection, auditPlanPrompt } from './prompts.js';

function planSchema(maxTasks: number) {
  return z.object({
    audit_tasks: z
      .array(
        z.object({
          id: z.string().optional(),
          sentence: z.string().trim().min(1),
        })
      )
      .min(1, 'at least one audit task is required')
      .max(maxTasks, `no more than ${maxTasks} audit tasks are allowed`),
  });
}

export function taskId(clauseId: string, index: number): string {
  return `${clauseId}-T${String(index + 1).padStart(2, '0')}`;
}

/** Clauses that need a procedure and have no persisted plan yet. */
export function auditPlanPending(clauses: readonly RegulationClause[]): RegulationClause[] {
  return clauses.filter(
    (c) => c.needsProcedure === true && c.status !== 'failed' && c.tasks.length === 0
  );
}

/**
 * Decomposes each relevant clause into ordered audit tasks. A reply with zero tasks or
 * more than `maxTasksPerClause` is rejected and re-prompted once. The plan is persisted
 * before Search sees it.
 */
export async function runAuditPlan(ctx: StageContext): Promise<void> {
  const pending = auditPlanPending(ctx.session.clauses());
  const maxTasks = ctx.settings.maxTasksPerClause;
  const schema = planSchema(maxTasks);
  let completed = 0;

  await runWithConcurrency(
    pending,
    ctx.settings.concurrency,
    async (clause) => {
      try {
        const { value: outcome, durationMs } = await new StepTimer().measure(() =>
          cachedCompletion(ctx, {
            stage: 'audit_plan',
            model: ctx.settings.models.auditPlan,
            prompt: auditPlanPrompt(clause, maxTasks),
            schema,
            corrective: (err) => auditPlanCorrection(clause, maxTasks, err.message),
            cacheContent: clause.text,
            params: { maxTasks, prompt: PROMPT_VERSION },
          })
        );
        const sentences = outcome.value.audit_tasks.map((t) => t.sentence);
        ctx.session.update(() => {
          clause.tasks = sentences.map((sentence, i) => newTask(taskId(clause.id, i), sentence));
          clause.verdict = null;
          clause.status = 'planned';
          clause.error = null;
        });
        completed++;
        ctx.emit({
          stage: 'audit_plan',
          status: outcome.calls === 0 ? 'cached' : 'done',
          clauseId: clause.id,
          detail: `${sentences.length} task(s)`,
          durationMs,
          calls: outcome.calls,
          completed,
          total: pending.length,
        });
      } catch (err) {
        if (err instanceof PersistenceError) throw err;
        ctx.session.update(() => {
          clause.status = 'failed';
          clause.error = toItemError('audit_plan', err);
        });
        completed++;
        ctx.emit({
          stage: 'audit_plan',
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
