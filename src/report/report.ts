import type {
  ClauseStatus,
  DocumentStatus,
  ProcedureChunk,
  Project,
  RunState,
  TaskFinding,
  VerdictStatus,
} from '../control-plane/types.js';
import { collectEvidence } from '../stages/judge.js';

const EXCERPT_CHARS = 160;

export interface Citation {
  documentPath: string;
  start: number;
  end: number;
  score: number;
  excerpt: string;
}

export interface ReportClause {
  id: string;
  title?: string;
  parentId?: string;
  text: string;
  status: ClauseStatus;
  verdict?: {
    status: VerdictStatus;
    compliant: boolean | null;
    confidence: number | null;
    description: string;
    suggestions: string;
  };
  tasks: { id: string; sentence: string; finding: TaskFinding | null }[];
  evidence: Citation[];
  error?: string;
}

export type SummaryKey = VerdictStatus | 'skipped' | 'failed' | 'pending';

export interface ComplianceReport {
  projectId: string;
  projectName: string;
  generatedAt: string;
  complete: boolean;
  completedAt: string | null;
  summary: Record<SummaryKey, number>;
  clauses: ReportClause[];
  documents: { path: string; status: DocumentStatus; error?: string }[];
}

export function excerpt(text: string, max: number = EXCERPT_CHARS): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length <= max ? flat : `${flat.slice(0, max - 3).trimEnd()}...`;
}

/** Report view of a run state. Citations locate each excerpt in its source document. */
export function buildReport(project: Project, state: RunState, now: Date = new Date()): ComplianceReport {
  const arena = new Map<number, ProcedureChunk>();
  for (const chunk of state.corpus?.chunks ?? []) arena.set(chunk.handle, chunk);

  const summary: Record<SummaryKey, number> = {
    compliant: 0,
    non_compliant: 0,
    inconclusive: 0,
    no_evidence: 0,
    skipped: 0,
    failed: 0,
    pending: 0,
  };

  const clauses: ReportClause[] = [];
  for (const id of state.clauseOrder) {
    const clause = state.clauses[id];
    if (!clause) continue;

    const entry: ReportClause = {
      id: clause.id,
      title: clause.title,
      parentId: clause.parentId,
      text: clause.text,
      status: clause.status,
      tasks: clause.tasks.map((t) => ({ id: t.id, sentence: t.sentence, finding: t.finding })),
      evidence: [],
    };

    const verdict = clause.status === 'judged' ? clause.verdict : null;
    if (verdict) {
      summary[verdict.status] += 1;
      entry.verdict = {
        status: verdict.status,
        compliant: verdict.compliant,
        confidence: verdict.confidence,
        description: verdict.description,
        suggestions: verdict.suggestions,
      };
      const scores = new Map<number, number>();
      for (const match of collectEvidence(clause.tasks.map((t) => t.matches ?? []))) {
        scores.set(match.chunk, match.score);
      }
      for (const handle of verdict.evidence) {
        const chunk = arena.get(handle);
        if (!chunk) continue;
        entry.evidence.push({
          documentPath: chunk.documentPath,
          start: chunk.start,
          end: chunk.end,
          score: scores.get(handle) ?? 0,
          excerpt: excerpt(chunk.text),
        });
      }
    } else if (clause.status === 'skipped') {
      summary.skipped += 1;
    } else if (clause.status === 'failed') {
      summary.failed += 1;
      entry.error = clause.error
        ? `${clause.error.stage} (${clause.error.kind}): ${clause.error.message}`
        : 'failed';
    } else {
      summary.pending += 1;
    }
    clauses.push(entry);
  }

  return {
    projectId: project.id,
    projectName: project.name,
    generatedAt: now.toISOString(),
    complete: state.completedAt !== null,
    completedAt: state.completedAt,
    summary,
    clauses,
    documents: Object.values(state.documents).map((d) => ({
      path: d.path,
      status: d.status,
      ...(d.error ? { error: d.error } : {}),
    })),
  };
}
