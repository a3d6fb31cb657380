import type {
  Logger,
  PipelineSettings,
  ProgressCallback,
  Project,
} from '../control-plane/types.js';
import type { EmbeddingService } from '../providers/embedding.js';
import type { LlmService } from '../providers/llm.js';
import type { Sleep } from '../providers/retry.js';
import type { VectorIndexStore } from '../retrieval/vector-index.js';
import type { RunSession } from '../state/run-state.js';
import type { ContentCache } from '../tools/cache.js';

export interface StageContext {
  project: Project;
  settings: Readonly<PipelineSettings>;
  session: RunSession;
  cache: ContentCache;
  llm: LlmService;
  embedder: EmbeddingService;
  indexStore: VectorIndexStore;
  logger: Logger;
  emit: ProgressCallback;
  isCancelled: () => boolean;
  sleep?: Sleep;
}
