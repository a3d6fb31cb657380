import type { AuditTask, ProcedureChunk, RegulationClause } from '../control-plane/types.js';

/** Bumped whenever a prompt changes meaning, so cached replies to the old wording are not reused. */
export const PROMPT_VERSION = 1;

export function needCheckPrompt(clause: RegulationClause): string {
  return [
    'Decide whether the following regulation clause requires the organisation to have a',
    'documented internal procedure in order to comply. Definitions, scope statements and',
    'purely informative text do not.',
    '',
    'Reply with a JSON object: {"requires_procedure": true | false, "reason": "<one sentence>"}.',
    '',
    `Clause ${clause.id}: "${clause.text}"`,
  ].join('\n');
}

export function needCheckCorrection(clause: RegulationClause, problem: string): string {
  return [
    needCheckPrompt(clause),
    '',
    `Your previous reply was rejected: ${problem}`,
    'Reply with exactly one JSON object whose "requires_procedure" field is a boolean. No prose.',
  ].join('\n');
}

export function auditPlanPrompt(clause: RegulationClause, maxTasks: number): string {
  return [
    'Break the following regulation clause into concrete audit tasks. Each task is one',
    'declarative sentence describing what an internal procedure document must state for the',
    'clause to be satisfied; it will be used as a search query against procedure documents.',
    `Produce between 1 and ${maxTasks} tasks, most important first.`,
    '',
    'Reply with a JSON object: {"audit_tasks": [{"sentence": "<task>"}]}.',
    '',
    `Clause ${clause.id}: "${clause.text}"`,
  ].join('\n');
}

export function auditPlanCorrection(clause: RegulationClause, maxTasks: number, problem: string): string {
  return [
    auditPlanPrompt(clause, maxTasks),
    '',
    `Your previous reply was rejected: ${problem}`,
    `"audit_tasks" must be a non-empty array of at most ${maxTasks} objects, each with a non-empty "sentence" string.`,
  ].join('\n');
}

export interface EvidenceItem {
  label: string;
  chunk: ProcedureChunk;
}

export function judgePrompt(
  clause: RegulationClause,
  tasks: readonly { task: AuditTask; labels: string[] }[],
  evidence: readonly EvidenceItem[]
): string {
  const taskLines = tasks.map(({ task, labels }) =>
    `- ${task.id}: ${task.sentence} (evidence: ${labels.length > 0 ? labels.join(', ') : 'none'})`
  );
  const evidenceBlocks = evidence.map(({ label, chunk }) =>
    `[${label}] ${chunk.documentPath} (chars ${chunk.start}-${chunk.end})\n${chunk.text}`
  );

  return [
    'Assess whether the organisation\'s procedures satisfy the regulation clause, using only',
    'the evidence excerpts below. For every audit task state whether its evidence is',
    '"supported" (the procedure fully covers it), "gap" (the evidence shows the procedure',
    'falls short or contradicts it) or "ambiguous" (related but not conclusive).',
    '',
    'Reply with a JSON object:',
    '{"compliant": true | false, "confidence": <0..1>, "description": "<finding>",',
    ' "suggestions": "<how to close any gap>", "tasks": [{"id": "<task id>", "finding": "supported" | "gap" | "ambiguous"}]}',
    '',
    `Clause ${clause.id}: "${clause.text}"`,
    '',
    'Audit tasks:',
    ...taskLines,
    '',
    'Evidence:',
    evidenceBlocks.join('\n\n'),
  ].join('\n');
}

export function judgeCorrection(basePrompt: string, problem: string): string {
  return [
    basePrompt,
    '',
    `Your previous reply was rejected: ${problem}`,
    'Reply with exactly one JSON object with boolean "compliant", string "description" and string "suggestions".',
  ].join('\n');
}
