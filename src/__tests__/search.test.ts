import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PersistenceError, ProviderError } from '../control-plane/errors.js';
import type { RegulationClause, RunState } from '../control-plane/types.js';
import type { EmbeddingService } from '../providers/embedding.js';
import { runSearch } from '../stages/search.js';
import { emptyRunState, newClause } from '../state/run-state.js';
import { FakeEmbedder, FakeLlm, bagOfWords, makeTempDir, stageHarness, testSettings, type TempDir } from './helpers/fakes.js';

const PROCEDURE = 'Incidents are classified into three levels.';
const BAD = 'restore drills happen monthly';

function plannedClause(id: string, ...sentences: string[]): RegulationClause {
  return {
    ...newClause({ id, text: `${id} requirement` }),
    status: 'planned',
    needsProcedure: true,
    tasks: sentences.map((sentence, i) => ({
      id: `${id}-T0${i + 1}`,
      sentence,
      matches: null,
      indexBuild: null,
      finding: null,
      error: null,
    })),
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

const failOn =
  (sentence: string) =>
  (text: string): Error | undefined =>
    text === sentence ? new ProviderError('embedding service down') : undefined;

const noLlm = (): FakeLlm =>
  new FakeLlm(() => {
    throw new Error('search makes no completion calls');
  });

describe('runSearch', () => {
  let tmp: TempDir;
  let docPath: string;

  beforeEach(() => {
    tmp = makeTempDir();
    docPath = join(tmp.path, 'incident.txt');
    writeFileSync(docPath, PROCEDURE);
  });

  afterEach(() => tmp.cleanup());

  it('moves a clause to searched once every task has matches from the current build', async () => {
    const { ctx, state } = stageHarness(tmp.path, noLlm(), new FakeEmbedder(), {
      state: stateWith(plannedClause('C1', 'incident classification levels')),
      procedurePaths: [docPath],
    });

    await runSearch(ctx);

    const clause = state.clauses.C1;
    expect(clause.status).toBe('searched');
    expect(clause.tasks[0].matches).toHaveLength(1);
    expect(clause.tasks[0].matches?.[0].chunk).toBe(0);
    expect(clause.tasks[0].indexBuild).toBe(state.corpus?.buildId);
  });

  it('fails only the clause whose task could not be embedded', async () => {
    const { ctx, state, events } = stageHarness(tmp.path, noLlm(), new FakeEmbedder(failOn(BAD)), {
      state: stateWith(plannedClause('C1', BAD), plannedClause('C2', 'incident classification levels')),
      procedurePaths: [docPath],
    });

    await runSearch(ctx);

    expect(state.clauses.C1.status).toBe('failed');
    expect(state.clauses.C1.error).toEqual({ stage: 'search', kind: 'provider', message: 'embedding service down' });
    expect(state.clauses.C1.tasks[0].error).toEqual(state.clauses.C1.error);
    expect(state.clauses.C2.status).toBe('searched');
    expect(events.find((e) => e.stage === 'search' && e.status === 'failed')).toMatchObject({
      clauseId: 'C1',
      taskId: 'C1-T01',
      calls: 2,
    });
  });

  it('keeps a clause failed when a sibling task finishes after the failure', async () => {
    const slow = 'incident classification levels';
    const embedder = new FakeEmbedder(failOn(BAD), (text) => (text === slow ? 30 : 0));
    const { ctx, state } = stageHarness(tmp.path, noLlm(), embedder, {
      state: stateWith(plannedClause('C1', slow, BAD)),
      procedurePaths: [docPath],
    });

    await runSearch(ctx);

    const clause = state.clauses.C1;
    expect(clause.status).toBe('failed');
    expect(clause.error?.message).toBe('embedding service down');
    expect(clause.tasks[0].matches).toHaveLength(1);
    expect(clause.tasks[0].indexBuild).toBe(state.corpus?.buildId);
    expect(clause.tasks[1].error?.kind).toBe('provider');
  });

  it('reports tasks of an already failed clause as skipped and counts them', async () => {
    const later = 'incident classification levels';
    const embedder = new FakeEmbedder(failOn(BAD));
    const { ctx, events } = stageHarness(tmp.path, noLlm(), embedder, {
      settings: testSettings({ concurrency: 1 }),
      state: stateWith(plannedClause('C1', BAD, later)),
      procedurePaths: [docPath],
    });

    await runSearch(ctx);

    const taskEvents = events.filter((e) => e.stage === 'search' && e.taskId !== undefined);
    expect(taskEvents.map((e) => [e.taskId, e.status, e.completed, e.total])).toEqual([
      ['C1-T01', 'failed', 1, 2],
      ['C1-T02', 'skipped', 2, 2],
    ]);
    expect(embedder.texts).not.toContain(later);
  });

  it('fails every candidate clause when the corpus embeddings disagree on dimension', async () => {
    const backups = join(tmp.path, 'backups.txt');
    writeFileSync(backups, 'Backups are copied offsite.');
    const embedder: EmbeddingService = {
      embed: async (text) => (text.includes('Backups') ? [1, 0] : bagOfWords(text)),
    };
    const { ctx, state, events } = stageHarness(tmp.path, noLlm(), embedder, {
      state: stateWith(plannedClause('C1', 'incident levels'), plannedClause('C2', 'offsite backups')),
      procedurePaths: [docPath, backups],
    });

    await runSearch(ctx);

    const error = {
      stage: 'search',
      kind: 'invalidation',
      message: 'embedding for chunk 1 has 2 dimensions, expected 64',
    };
    expect(state.clauses.C1.status).toBe('failed');
    expect(state.clauses.C1.error).toEqual(error);
    expect(state.clauses.C2.error).toEqual(error);
    expect(
      events.filter((e) => e.stage === 'search' && e.status === 'failed').map((e) => e.clauseId)
    ).toEqual(['C1', 'C2']);
  });

  it('leaves a judged clause alone while its verdict matches the build', async () => {
    const first = stageHarness(tmp.path, noLlm(), new FakeEmbedder(), {
      state: stateWith(plannedClause('C1', 'incident classification levels')),
      procedurePaths: [docPath],
    });
    await runSearch(first.ctx);
    const state = first.state;
    const clause = state.clauses.C1;
    const buildId = state.corpus?.buildId ?? '';
    clause.status = 'judged';
    clause.tasks[0].finding = 'supported';
    clause.verdict = {
      status: 'compliant',
      compliant: true,
      confidence: 0.8,
      description: 'covered',
      suggestions: '',
      evidence: [0],
      indexBuild: buildId,
      judgedAt: '2026-03-01T11:00:00.000Z',
    };

    const second = stageHarness(tmp.path, noLlm(), new FakeEmbedder(), { state, procedurePaths: [docPath] });
    await runSearch(second.ctx);

    expect(clause.status).toBe('judged');
    expect(clause.verdict?.status).toBe('compliant');
    expect(second.events.filter((e) => e.stage === 'search')).toEqual([]);
  });

  it('searches a judged clause again and drops its verdict after the documents change', async () => {
    const first = stageHarness(tmp.path, noLlm(), new FakeEmbedder(), {
      state: stateWith(plannedClause('C1', 'incident classification levels')),
      procedurePaths: [docPath],
    });
    await runSearch(first.ctx);
    const state = first.state;
    const clause = state.clauses.C1;
    const oldBuild = state.corpus?.buildId ?? '';
    clause.status = 'judged';
    clause.tasks[0].finding = 'gap';
    clause.verdict = {
      status: 'non_compliant',
      compliant: false,
      confidence: 0.9,
      description: 'three levels only',
      suggestions: 'add a fourth level',
      evidence: [0],
      indexBuild: oldBuild,
      judgedAt: '2026-03-01T11:00:00.000Z',
    };

    writeFileSync(docPath, 'Incidents are classified into four levels.');
    const second = stageHarness(tmp.path, noLlm(), new FakeEmbedder(), { state, procedurePaths: [docPath] });
    await runSearch(second.ctx);

    expect(state.corpus?.buildId).not.toBe(oldBuild);
    expect(clause.status).toBe('searched');
    expect(clause.verdict).toBeNull();
    expect(clause.tasks[0].finding).toBeNull();
    expect(clause.tasks[0].indexBuild).toBe(state.corpus?.buildId);
    expect(second.events.find((e) => e.taskId === 'C1-T01')).toMatchObject({ status: 'cached', calls: 0 });
  });

  it('aborts on a run state write failure without starting further tasks', async () => {
    const first = 'incident classification levels';
    const second = 'incident response levels';
    const blocker = join(tmp.path, `run.json.tmp.${process.pid}`);
    const embedder = new FakeEmbedder((text) => {
      if (text === first) mkdirSync(blocker);
      return undefined;
    });
    const { ctx } = stageHarness(tmp.path, noLlm(), embedder, {
      settings: testSettings({ concurrency: 1 }),
      state: stateWith(plannedClause('C1', first), plannedClause('C2', second)),
      procedurePaths: [docPath],
    });

    await expect(runSearch(ctx)).rejects.toBeInstanceOf(PersistenceError);
    expect(embedder.texts).toContain(first);
    expect(embedder.texts).not.toContain(second);
  });
});
