import { z } from 'zod';
import { PersistenceError, callsSpent, errorMessage, toItemError } from '../control-plane/errors.js';
import type { RegulationClause } from '../control-plane/types.js';
import { runWithConcurrency } from '../utils/pool.js';
import { StepTimer } from '../utils/timer.js';
import { cachedCompletion } from './calls.js';
import type { StageContext } from './context.js';
import { PROMPT_VERSION, needCheckCorrection, needCheckPrompt } from './prompts.js';

const NeedCheckSchema = z.object({
  requires_procedure: z.boolean(),
  reason: z.string().optional(),
});

/** Clauses still waiting for a need-check decision. */
export function needCheckPending(clauses: readonly RegulationClause[]): RegulationClause[] {
  return clauses.filter((c) => c.status === 'pending' && c.needsProcedure === null);
}

/**
 * Asks whether each pending clause needs an internal procedure. Clauses that do not
 * are marked skipped and never reach the later stages. Each decision is persisted as
 * soon as it is made.
 */
export async function runNeedCheck(ctx: StageContext): Promise<void> {
  const pending = needCheckPending(ctx.session.clauses());
  let completed = 0;

  await runWithConcurrency(
    pending,
    ctx.settings.concurrency,
    async (clause) => {
      const model = ctx.settings.models.needCheck;
      try {
        const { value: outcome, durationMs } = await new StepTimer().measure(() =>
          cachedCompletion(ctx, {
            stage: 'need_check',
            model,
            prompt: needCheckPrompt(clause),
            schema: NeedCheckSchema,
            corrective: (err) => needCheckCorrection(clause, err.message),
            params: { prompt: PROMPT_VERSION },
          })
        );
        const required = outcome.value.requires_procedure;
        ctx.session.update(() => {
          clause.needsProcedure = required;
          clause.status = required ? 'need_checked' : 'skipped';
          clause.error = null;
        });
        completed++;
        ctx.emit({
          stage: 'need_check',
          status: outcome.calls === 0 ? 'cached' : 'done',
          clauseId: clause.id,
          detail: required ? 'procedure required' : 'no procedure required',
          durationMs,
          calls: outcome.calls,
          completed,
          total: pending.length,
        });
      } catch (err) {
        if (err instanceof PersistenceError) throw err;
        ctx.session.update(() => {
          clause.status = 'failed';
          clause.error = toItemError('need_check', err);
        });
        completed++;
        ctx.emit({
          stage: 'need_check',
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
