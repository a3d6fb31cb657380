import type { TaskFinding, VerdictStatus } from '../control-plane/types.js';
import type { ComplianceReport, ReportClause, SummaryKey } from './report.js';

const VERDICT_LABELS: Record<VerdictStatus, string> = {
  compliant: 'Compliant',
  non_compliant: 'Non-compliant',
  inconclusive: 'Inconclusive',
  no_evidence: 'No evidence',
};

const SUMMARY_ROWS: [SummaryKey, string][] = [
  ['compliant', 'Compliant'],
  ['non_compliant', 'Non-compliant'],
  ['inconclusive', 'Inconclusive'],
  ['no_evidence', 'No evidence'],
  ['skipped', 'Skipped (no procedure required)'],
  ['failed', 'Failed'],
  ['pending', 'Not yet evaluated'],
];

function heading(clause: ReportClause): string {
  return clause.title ? `${clause.id} ${clause.title}` : clause.id;
}

function findingLabel(finding: TaskFinding | null): string {
  return finding ?? 'not judged';
}

export function renderMarkdown(report: ComplianceReport): string {
  const lines: string[] = [
    `# Compliance Report: ${report.projectName}`,
    '',
    `**Project:** ${report.projectId}`,
    report.complete
      ? `**Status:** Complete (${report.completedAt ?? ''})`
      : '**Status:** PARTIAL: the run has not finished; results below are incomplete',
    `**Generated:** ${report.generatedAt}`,
    '',
    '## Summary',
    '',
    '| Result | Clauses |',
    '| --- | --- |',
  ];
  for (const [key, label] of SUMMARY_ROWS) {
    lines.push(`| ${label} | ${report.summary[key]} |`);
  }
  lines.push('');

  const judged = report.clauses.filter((c) => c.verdict !== undefined);
  if (judged.length > 0) {
    lines.push('## Findings');
    lines.push('');
    for (const clause of judged) renderJudged(lines, clause);
  }

  const failed = report.clauses.filter((c) => c.status === 'failed');
  if (failed.length > 0) {
    lines.push('## Failed Clauses');
    lines.push('');
    for (const clause of failed) lines.push(`- **${clause.id}**: ${clause.error ?? 'failed'}`);
    lines.push('');
  }

  const skipped = report.clauses.filter((c) => c.status === 'skipped');
  if (skipped.length > 0) {
    lines.push('## Skipped Clauses');
    lines.push('');
    for (const clause of skipped) lines.push(`- ${heading(clause)}`);
    lines.push('');
  }

  const badDocs = report.documents.filter((d) => d.status === 'failed');
  if (badDocs.length > 0) {
    lines.push('## Unreadable Documents');
    lines.push('');
    for (const doc of badDocs) lines.push(`- \`${doc.path}\`: ${doc.error ?? 'failed'}`);
    lines.push('');
  }

  return lines.join('\n');
}

function renderJudged(lines: string[], clause: ReportClause): void {
  const verdict = clause.verdict;
  if (!verdict) return;

  lines.push(`### ${heading(clause)}`);
  lines.push('');
  lines.push(`> ${clause.text}`);
  lines.push('');
  const confidence = verdict.confidence === null ? 'n/a' : verdict.confidence.toFixed(2);
  lines.push(`**Verdict:** ${VERDICT_LABELS[verdict.status]} | **Confidence:** ${confidence}`);
  lines.push('');
  if (verdict.description) {
    lines.push(verdict.description);
    lines.push('');
  }
  if (verdict.suggestions) {
    lines.push(`**Suggestions:** ${verdict.suggestions}`);
    lines.push('');
  }
  if (clause.tasks.length > 0) {
    lines.push('#### Audit Tasks');
    for (const task of clause.tasks) {
      lines.push(`- ${task.id}: ${task.sentence} (${findingLabel(task.finding)})`);
    }
    lines.push('');
  }
  if (clause.evidence.length > 0) {
    lines.push('#### Evidence');
    for (const e of clause.evidence) {
      lines.push(`- \`${e.documentPath}\` chars ${e.start}-${e.end} (score ${e.score.toFixed(2)})`);
      lines.push(`  > ${e.excerpt}`);
    }
    lines.push('');
  }
}
