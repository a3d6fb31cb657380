import type { ProgressEvent, RunState, StageName, VerdictStatus } from '../control-plane/types.js';
import type { FailedItem, RunLedger, StageActivity } from './types.js';

export const ALL_STAGES: StageName[] = ['need_check', 'audit_plan', 'search', 'judge'];

export interface LedgerInput {
  runId: string;
  state: RunState;
  events: readonly ProgressEvent[];
  passed: boolean;
  failureReason?: string;
}

function isStageName(stage: string): stage is StageName {
  return ALL_STAGES.some((s) => s === stage);
}

function isUnitEvent(event: ProgressEvent): boolean {
  return event.clauseId !== undefined || event.taskId !== undefined || event.documentPath !== undefined;
}

export function buildLedger(input: LedgerInput): RunLedger {
  const { state, events } = input;
  const durationsMs: Record<string, number> = {};
  const executedStages: StageName[] = [];
  const cancelledStages: StageName[] = [];
  const activity: RunLedger['activity'] = {};
  let providerCalls = 0;

  for (const event of events) {
    if (isStageName(event.stage) && !isUnitEvent(event)) {
      if (event.status === 'completed' || event.status === 'failed') {
        executedStages.push(event.stage);
        durationsMs[event.stage] = event.durationMs ?? 0;
        continue;
      }
      if (event.status === 'cancelled') {
        cancelledStages.push(event.stage);
        durationsMs[event.stage] = event.durationMs ?? 0;
        continue;
      }
    }
    if (event.stage === 'pipeline' && event.durationMs !== undefined) {
      durationsMs.total = event.durationMs;
      continue;
    }
    if (event.status !== 'done' && event.status !== 'cached' && event.status !== 'failed') continue;

    const entry: StageActivity = activity[event.stage] ?? { done: 0, cached: 0, failed: 0, providerCalls: 0 };
    entry[event.status] += 1;
    entry.providerCalls += event.calls ?? 0;
    providerCalls += event.calls ?? 0;
    activity[event.stage] = entry;
  }

  const verdicts: Record<VerdictStatus, number> = {
    compliant: 0,
    non_compliant: 0,
    inconclusive: 0,
    no_evidence: 0,
  };
  const skippedClauses: string[] = [];
  const pendingClauses: string[] = [];
  const failedItems: FailedItem[] = [];

  for (const id of state.clauseOrder) {
    const clause = state.clauses[id];
    if (!clause) continue;
    if (clause.verdict && clause.status === 'judged') verdicts[clause.verdict.status] += 1;
    else if (clause.status === 'skipped') skippedClauses.push(id);
    else if (clause.status === 'failed') {
      failedItems.push({
        stage: clause.error?.stage ?? 'unknown',
        clauseId: id,
        taskId: clause.tasks.find((t) => t.error !== null)?.id,
        message: clause.error?.message ?? 'failed',
      });
    } else pendingClauses.push(id);
  }
  for (const doc of Object.values(state.documents)) {
    if (doc.status === 'failed') {
      failedItems.push({ stage: 'ingest', documentPath: doc.path, message: doc.error ?? 'failed' });
    }
  }

  return {
    runId: input.runId,
    projectId: state.projectId,
    timestamp: new Date().toISOString(),
    requiredStages: ALL_STAGES,
    executedStages,
    cancelledStages,
    durationsMs,
    activity,
    providerCalls,
    verdicts,
    skippedClauses,
    pendingClauses,
    failedItems,
    complete: state.completedAt !== null,
    passed: input.passed,
    failureReason: input.failureReason,
  };
}
