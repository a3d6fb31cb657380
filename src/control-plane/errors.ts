import type { ErrorKind, ItemError, StageName } from './types.js';

export class PipelineError extends Error {
  readonly kind: ErrorKind;
  /** Provider calls spent on the failed unit of work before this error surfaced. */
  calls = 0;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

export class IngestionError extends PipelineError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('ingestion', `${path}: ${message}`, options);
    this.path = path;
  }
}

export class ProviderError extends PipelineError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('provider', message, options);
    this.status = options?.status;
  }
}

export class ParseError extends PipelineError {
  readonly raw: string;

  constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super('parse', message, options);
    this.raw = raw;
  }
}

export class InvalidationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalidation', message, options);
  }
}

export class PersistenceError extends PipelineError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('persistence', `${path}: ${message}`, options);
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Provider calls an error carries; 0 for errors raised before any call was made. */
export function callsSpent(err: unknown): number {
  return err instanceof PipelineError ? err.calls : 0;
}

/** Item-level record of a failure, stored on the clause or task it belongs to. */
export function toItemError(stage: StageName, err: unknown): ItemError {
  const kind: ErrorKind = err instanceof PipelineError ? err.kind : 'internal';
  return { stage, kind, message: errorMessage(err) };
}
