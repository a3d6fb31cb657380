import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { RegulationClause, RunState } from '../control-plane/types.js';
import { runAuditPlan, taskId } from '../stages/audit-plan.js';
import { emptyRunState, newClause } from '../state/run-state.js';
import { FakeEmbedder, FakeLlm, makeTempDir, stageHarness, type TempDir } from './helpers/fakes.js';

function checked(id: string, text: string, needsProcedure = true): RegulationClause {
  return {
    ...newClause({ id, text }),
    status: needsProcedure ? 'need_checked' : 'skipped',
    needsProcedure,
  };
}

function stateWith(...clauses: RegulationClause[]): RunState {
  const state = emptyRunState('acme');
  for (const clause of clauses) {
    state.clauseOrder.push(clause.id);
    state.clauses[clause.id] = clause;
  }
  return state;
}

const plan = (...sentences: string[]): string =>
  JSON.stringify({ audit_tasks: sentences.map((sentence) => ({ sentence })) });

describe('taskId', () => {
  it('numbers tasks from 01 under the clause id', () => {
    expect(taskId('A.5.24', 0)).toBe('A.5.24-T01');
    expect(taskId('A.5.24', 11)).toBe('A.5.24-T12');
  });
});

describe('runAuditPlan', () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => tmp.cleanup());

  it('stores ordered, unsearched tasks and moves the clause to planned', async () => {
    const llm = new FakeLlm(() => plan('Restore tests are scheduled monthly.', 'Restore results are recorded.'));
    const { ctx, state } = stageHarness(tmp.path, llm, new FakeEmbedder(), {
      state: stateWith(checked('C1', 'Backups must be restored in a test at least monthly.')),
    });

    await runAuditPlan(ctx);

    expect(state.clauses.C1.status).toBe('planned');
    expect(state.clauses.C1.tasks).toEqual([
      { id: 'C1-T01', sentence: 'Restore tests are scheduled monthly.', matches: null, indexBuild: null, finding: null, error: null },
      { id: 'C1-T02', sentence: 'Restore results are recorded.', matches: null, indexBuild: null, finding: null, error: null },
    ]);
  });

  it('rejects an empty plan and accepts the corrected one', async () => {
    const llm = new FakeLlm((_, index) => (index === 0 ? plan() : plan('Restore tests are scheduled monthly.')));
    const { ctx, state } = stageHarness(tmp.path, llm, new FakeEmbedder(), {
      state: stateWith(checked('C1', 'Backups must be restored in a test at least monthly.')),
    });

    await runAuditPlan(ctx);

    expect(llm.requests).toHaveLength(2);
    expect(llm.requests[1].prompt).toContain('audit_tasks: at least one audit task is required');
    expect(state.clauses.C1.tasks.map((t) => t.id)).toEqual(['C1-T01']);
  });

  it('fails the clause when the plan keeps exceeding the task limit', async () => {
    const llm = new FakeLlm(() => plan('a one', 'a two', 'a three', 'a four', 'a five'));
    const { ctx, state } = stageHarness(tmp.path, llm, new FakeEmbedder(), {
      state: stateWith(checked('C1', 'Backups must be restored in a test at least monthly.')),
    });

    await runAuditPlan(ctx);

    expect(llm.requests).toHaveLength(2);
    expect(state.clauses.C1.status).toBe('failed');
    expect(state.clauses.C1.tasks).toEqual([]);
    expect(state.clauses.C1.error).toMatchObject({ stage: 'audit_plan', kind: 'parse' });
    expect(state.clauses.C1.error?.message).toContain('no more than 4 audit tasks are allowed');
  });

  it('only plans clauses that need a procedure and have no plan yet', async () => {
    const planned = checked('C3', 'Logs must be retained for a year.');
    planned.status = 'planned';
    planned.tasks = [
      { id: 'C3-T01', sentence: 'Log retention is one year.', matches: null, indexBuild: null, finding: null, error: null },
    ];
    const llm = new FakeLlm(() => plan('Restore tests are scheduled monthly.'));
    const { ctx, state } = stageHarness(tmp.path, llm, new FakeEmbedder(), {
      state: stateWith(
        checked('C1', 'Backups must be restored in a test at least monthly.'),
        checked('C2', 'Definitions: a backup is a copy.', false),
        planned
      ),
    });

    await runAuditPlan(ctx);

    expect(llm.requests).toHaveLength(1);
    expect(state.clauses.C2.tasks).toEqual([]);
    expect(state.clauses.C3.tasks.map((t) => t.sentence)).toEqual(['Log retention is one year.']);
  });
});
