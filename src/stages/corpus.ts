import { callsSpent, errorMessage } from '../control-plane/errors.js';
import type { DocumentRecord, ProcedureChunk } from '../control-plane/types.js';
import { chunk, type ChunkDraft } from '../ingest/chunker.js';
import { ingest } from '../ingest/ingestor.js';
import { normalize } from '../ingest/normalizer.js';
import { corpusBuildId, type VectorIndex } from '../retrieval/vector-index.js';
import { runWithConcurrency } from '../utils/pool.js';
import { StepTimer } from '../utils/timer.js';
import { cachedEmbedding } from './calls.js';
import type { StageContext } from './context.js';

interface DocumentDraft {
  record: DocumentRecord;
  chunks: ChunkDraft[];
}

interface EmbeddedChunk {
  doc: number;
  embedding?: number[];
  error?: string;
  calls: number;
}

export interface PreparedCorpus {
  index: VectorIndex;
  chunks: ProcedureChunk[];
  /** Whether the documents or the build differ from the stored run state. */
  changed: boolean;
}

/**
 * Ingests, chunks and embeds the project's procedure documents, then builds or loads
 * the corpus index. Returns undefined when the run was cancelled part way through.
 * A document that cannot be read or embedded is recorded as failed and left out.
 */
export async function prepareCorpus(ctx: StageContext): Promise<PreparedCorpus | undefined> {
  const drafts = await ingestDocuments(ctx);
  const embedded = await embedChunks(ctx, drafts);
  if (!embedded) return undefined;

  const chunks: ProcedureChunk[] = [];
  const vectors: number[][] = [];
  drafts.forEach((draft, docIndex) => {
    if (draft.record.status !== 'ingested') return;
    draft.chunks.forEach((c, i) => {
      const embedding = embedded[docIndex][i];
      if (!embedding) return;
      chunks.push({ handle: chunks.length, ...c });
      vectors.push(embedding);
    });
  });

  const records: Record<string, DocumentRecord> = {};
  for (const draft of drafts) records[draft.record.path] = draft.record;

  const model = ctx.settings.models.embedding;
  const buildId = corpusBuildId(model, chunks.map((c) => c.contentHash));
  const state = ctx.session.state;
  const changed =
    !sameDocuments(state.documents, records) ||
    state.corpus === null ||
    state.corpus.buildId !== buildId ||
    state.corpus.embeddingModel !== model;

  const timer = new StepTimer();
  const result = ctx.indexStore.buildOrLoad(
    ctx.project.id,
    buildId,
    model,
    chunks.map((c, i) => ({ handle: c.handle, embedding: vectors[i] })),
    { force: changed }
  );
  const durationMs = timer.elapsed();
  ctx.emit({
    stage: 'index',
    status: result.rebuilt ? 'done' : 'cached',
    detail: result.rebuilt
      ? `rebuilt over ${chunks.length} chunk(s)${result.reason ? `: ${result.reason}` : ''}`
      : `reused build ${buildId.slice(0, 12)}`,
    durationMs,
  });

  if (changed) {
    ctx.session.update((s) => {
      s.documents = records;
      s.corpus = { corpusId: ctx.project.id, buildId, embeddingModel: model, chunks };
    });
  }

  return { index: result.index, chunks, changed };
}

async function ingestDocuments(ctx: StageContext): Promise<DocumentDraft[]> {
  const results = await ingest(ctx.project.procedurePaths);
  return results.map((result): DocumentDraft => {
    if (!result.ok) {
      ctx.emit({ stage: 'ingest', status: 'failed', documentPath: result.path, detail: result.error.message });
      return {
        record: {
          path: result.path,
          status: 'failed',
          mtimeMs: null,
          contentHash: null,
          chunkHashes: [],
          error: result.error.message,
        },
        chunks: [],
      };
    }

    const chunks = chunk(normalize(result.doc), ctx.settings.chunkMaxTokens);
    ctx.emit({
      stage: 'ingest',
      status: 'done',
      documentPath: result.doc.path,
      detail: `${chunks.length} chunk(s)`,
    });
    return {
      record: {
        path: result.doc.path,
        status: 'ingested',
        mtimeMs: result.doc.mtimeMs,
        contentHash: result.doc.contentHash,
        chunkHashes: chunks.map((c) => c.contentHash),
      },
      chunks,
    };
  });
}

/**
 * Embeds every chunk through the cache. A document with any chunk that cannot be
 * embedded is marked failed. Returns undefined when cancelled before all chunks ran.
 */
async function embedChunks(
  ctx: StageContext,
  drafts: DocumentDraft[]
): Promise<(number[] | undefined)[][] | undefined> {
  const work = drafts.flatMap((draft, doc) => draft.chunks.map((c) => ({ doc, text: c.text })));

  const results = await runWithConcurrency(
    work,
    ctx.settings.concurrency,
    async (item): Promise<EmbeddedChunk> => {
      try {
        const outcome = await cachedEmbedding(ctx, item.text);
        return { doc: item.doc, embedding: outcome.value, calls: outcome.calls };
      } catch (err) {
        return { doc: item.doc, error: errorMessage(err), calls: callsSpent(err) };
      }
    },
    ctx.isCancelled
  );
  if (results.length < work.length) return undefined;

  const byDoc: (number[] | undefined)[][] = drafts.map(() => []);
  const calls = drafts.map(() => 0);
  const errors: (string | undefined)[] = drafts.map(() => undefined);
  for (const result of results) {
    byDoc[result.doc].push(result.embedding);
    calls[result.doc] += result.calls;
    if (result.error && errors[result.doc] === undefined) errors[result.doc] = result.error;
  }

  drafts.forEach((draft, doc) => {
    if (draft.record.status !== 'ingested') return;
    const error = errors[doc];
    if (error !== undefined) {
      draft.record = {
        ...draft.record,
        status: 'failed',
        chunkHashes: [],
        error: `embedding failed: ${error}`,
      };
      ctx.emit({ stage: 'embed', status: 'failed', documentPath: draft.record.path, detail: error, calls: calls[doc] });
      return;
    }
    ctx.emit({
      stage: 'embed',
      status: calls[doc] === 0 ? 'cached' : 'done',
      documentPath: draft.record.path,
      detail: `${draft.chunks.length} chunk(s)`,
      calls: calls[doc],
    });
  });

  return byDoc;
}

function sameDocuments(a: Record<string, DocumentRecord>, b: Record<string, DocumentRecord>): boolean {
  const keys = Object.keys(b);
  if (Object.keys(a).length !== keys.length) return false;
  return keys.every((key) => {
    const x = a[key];
    const y = b[key];
    if (!x) return false;
    return (
      x.status === y.status &&
      x.mtimeMs === y.mtimeMs &&
      x.contentHash === y.contentHash &&
      x.error === y.error &&
      x.chunkHashes.join('\n') === y.chunkHashes.join('\n')
    );
  });
}
