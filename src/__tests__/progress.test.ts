import { describe, expect, it } from 'vitest';
import { formatProgress } from '../cli/progress.js';

describe('formatProgress', () => {
  it('formats stage boundaries', () => {
    expect(formatProgress({ stage: 'judge', status: 'started' })).toBe('  [run]  judge...');
    expect(formatProgress({ stage: 'judge', status: 'completed', durationMs: 120 })).toBe('  [pass] judge (120ms)');
    expect(formatProgress({ stage: 'search', status: 'cancelled', durationMs: 3 })).toBe('  [stop] search (3ms)');
    expect(formatProgress({ stage: 'search', status: 'skipped', detail: 'no planned clauses' })).toBe(
      '  [skip] search: no planned clauses'
    );
  });

  it('formats unit progress with a counter', () => {
    expect(
      formatProgress({
        stage: 'need_check',
        status: 'done',
        clauseId: 'C1',
        detail: 'requires procedure',
        completed: 1,
        total: 3,
        durationMs: 40,
      })
    ).toBe('    [done] 1/3 C1: requires procedure (40ms)');
    expect(formatProgress({ stage: 'search', status: 'cached', clauseId: 'C1', taskId: 'C1-T02' })).toBe(
      '    [cache] C1-T02'
    );
  });

  it('tells unit failures from stage failures', () => {
    expect(
      formatProgress({ stage: 'ingest', status: 'failed', documentPath: '/docs/a.docx', detail: 'unsupported' })
    ).toBe('    [FAIL] /docs/a.docx: unsupported');
    expect(formatProgress({ stage: 'judge', status: 'failed', detail: 'disk full' })).toBe('  [FAIL] judge: disk full');
  });

  it('formats the end of the pipeline', () => {
    expect(formatProgress({ stage: 'pipeline', status: 'completed', durationMs: 900 })).toBe(
      '\n[regaudit] pipeline finished (900ms)'
    );
    expect(formatProgress({ stage: 'pipeline', status: 'cancelled', durationMs: 10 })).toBe(
      '\n[regaudit] cancelled; completed work is saved (10ms)'
    );
  });
});
