export type StageName = 'need_check' | 'audit_plan' | 'search' | 'judge';

export type ClauseStatus =
  | 'pending'
  | 'need_checked'
  | 'skipped'
  | 'planned'
  | 'searched'
  | 'judged'
  | 'failed';

export type VerdictStatus = 'compliant' | 'non_compliant' | 'inconclusive' | 'no_evidence';

/** Task-level reading of the retrieved evidence. `none` means nothing was retrieved. */
export type TaskFinding = 'supported' | 'gap' | 'ambiguous' | 'none';

export type ErrorKind =
  | 'ingestion'
  | 'provider'
  | 'parse'
  | 'invalidation'
  | 'persistence'
  | 'internal';

export interface ItemError {
  stage: StageName;
  kind: ErrorKind;
  message: string;
}

/** Back-reference into the corpus chunk arena; `chunk` is the chunk's handle. */
export interface MatchResult {
  chunk: number;
  score: number;
}

export interface AuditTask {
  id: string;
  sentence: string;
  /** null until searched against the index build named by `indexBuild`. */
  matches: MatchResult[] | null;
  indexBuild: string | null;
  finding: TaskFinding | null;
  error: ItemError | null;
}

export interface ClauseVerdict {
  status: VerdictStatus;
  compliant: boolean | null;
  confidence: number | null;
  description: string;
  suggestions: string;
  /** Chunk handles cited as evidence, best first. */
  evidence: number[];
  indexBuild: string;
  judgedAt: string;
}

export interface RegulationClause {
  id: string;
  title?: string;
  parentId?: string;
  text: string;
  sourceHash: string;
  status: ClauseStatus;
  needsProcedure: boolean | null;
  tasks: AuditTask[];
  verdict: ClauseVerdict | null;
  error: ItemError | null;
}

export interface ProcedureChunk {
  handle: number;
  documentPath: string;
  /** UTF-16 character range in the document's extracted NFC text. */
  start: number;
  end: number;
  text: string;
  contentHash: string;
}

export type DocumentStatus = 'ingested' | 'failed';

export interface DocumentRecord {
  path: string;
  status: DocumentStatus;
  mtimeMs: number | null;
  contentHash: string | null;
  chunkHashes: string[];
  error?: string;
}

export interface CorpusSnapshot {
  corpusId: string;
  buildId: string;
  embeddingModel: string;
  chunks: ProcedureChunk[];
}

export interface RunState {
  schemaVersion: number;
  projectId: string;
  revision: number;
  updatedAt: string;
  completedAt: string | null;
  clauseOrder: string[];
  clauses: Record<string, RegulationClause>;
  documents: Record<string, DocumentRecord>;
  corpus: CorpusSnapshot | null;
}

export interface Project {
  id: string;
  name: string;
  regulationPath: string;
  procedurePaths: string[];
  createdAt: string;
}

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export interface ModelSettings {
  needCheck: string;
  auditPlan: string;
  judge: string;
  embedding: string;
}

export interface PipelineSettings {
  models: ModelSettings;
  topK: number;
  chunkMaxTokens: number;
  maxTasksPerClause: number;
  concurrency: number;
  retry: RetryPolicy;
  apiKey?: string;
  baseUrl?: string;
}

export type ProgressStatus =
  | 'started'
  | 'done'
  | 'cached'
  | 'skipped'
  | 'failed'
  | 'cancelled'
  | 'completed';

export type ProgressStage = StageName | 'load' | 'ingest' | 'embed' | 'index' | 'pipeline';

export interface ProgressEvent {
  stage: ProgressStage;
  status: ProgressStatus;
  clauseId?: string;
  taskId?: string;
  documentPath?: string;
  detail?: string;
  durationMs?: number;
  completed?: number;
  total?: number;
  /** Provider calls made for this unit, retries included. */
  calls?: number;
}

export type ProgressCallback = (event: ProgressEvent) => void;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
