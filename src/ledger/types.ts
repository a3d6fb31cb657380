import type { ProgressStage, StageName, VerdictStatus } from '../control-plane/types.js';

export interface StageActivity {
  /** Units finished with a provider call. */
  done: number;
  /** Units served entirely from the cache or prior state. */
  cached: number;
  failed: number;
  providerCalls: number;
}

export interface FailedItem {
  stage: string;
  clauseId?: string;
  taskId?: string;
  documentPath?: string;
  message: string;
}

export interface RunLedger {
  runId: string;
  projectId: string;
  timestamp: string;
  requiredStages: StageName[];
  executedStages: StageName[];
  cancelledStages: StageName[];
  durationsMs: Record<string, number>;
  activity: Partial<Record<ProgressStage, StageActivity>>;
  providerCalls: number;
  verdicts: Record<VerdictStatus, number>;
  skippedClauses: string[];
  pendingClauses: string[];
  failedItems: FailedItem[];
  complete: boolean;
  passed: boolean;
  failureReason?: string;
}
