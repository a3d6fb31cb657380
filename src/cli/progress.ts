import type { ProgressEvent } from '../control-plane/types.js';

function subject(event: ProgressEvent): string {
  return event.taskId ?? event.clauseId ?? event.documentPath ?? event.stage;
}

function counter(event: ProgressEvent): string {
  return event.completed !== undefined && event.total !== undefined ? ` ${event.completed}/${event.total}` : '';
}

/** One console line per progress event, or undefined for events not worth printing. */
export function formatProgress(event: ProgressEvent): string | undefined {
  const detail = event.detail ? `: ${event.detail}` : '';
  const duration = event.durationMs !== undefined ? ` (${event.durationMs}ms)` : '';

  if (event.stage === 'pipeline') {
    return event.status === 'cancelled'
      ? `\n[regaudit] cancelled; completed work is saved${duration}`
      : `\n[regaudit] pipeline finished${duration}`;
  }

  const isUnit = event.clauseId !== undefined || event.documentPath !== undefined;
  switch (event.status) {
    case 'started':
      return `  [run]  ${event.stage}...`;
    case 'completed':
      return `  [pass] ${event.stage}${duration}`;
    case 'cancelled':
      return `  [stop] ${event.stage}${duration}`;
    case 'failed':
      return isUnit ? `    [FAIL] ${subject(event)}${detail}` : `  [FAIL] ${event.stage}${detail}`;
    case 'skipped':
      return `  [skip] ${event.stage}${detail}`;
    case 'cached':
      return `    [cache]${counter(event)} ${subject(event)}${detail}`;
    case 'done':
      return `    [done]${counter(event)} ${subject(event)}${detail}${duration}`;
  }
}
