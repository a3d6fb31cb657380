import { runAuditPlan } from '../stages/audit-plan.js';
import type { StageContext } from '../stages/context.js';
import { runJudge } from '../stages/judge.js';
import { runNeedCheck } from '../stages/need-check.js';
import { runSearch } from '../stages/search.js';
import type { StageName } from './types.js';

export interface WorkflowStep {
  name: StageName;
  execute: (ctx: StageContext) => Promise<void>;
}

export interface WorkflowPlan {
  steps: WorkflowStep[];
}

/**
 * The four stages in order. Each one only picks up clauses in the state it consumes,
 * so re-running the plan over a finished run does no work.
 */
export function buildWorkflow(): WorkflowPlan {
  const steps: WorkflowStep[] = [
    { name: 'need_check', execute: runNeedCheck },
    { name: 'audit_plan', execute: runAuditPlan },
    { name: 'search', execute: runSearch },
    { name: 'judge', execute: runJudge },
  ];
  return { steps };
}
