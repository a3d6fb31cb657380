import { readFile, stat } from 'node:fs/promises';
import { IngestionError, errorMessage } from '../control-plane/errors.js';
import { contentTypeFor, extractText, type ContentType } from '../tools/extractor.js';
import { sha256 } from '../utils/hash.js';

export interface RawDoc {
  path: string;
  contentType: ContentType;
  /** Extracted text in NFC; chunk offsets index into this string. */
  text: string;
  /** Hash of the file bytes. */
  contentHash: string;
  mtimeMs: number;
}

export type IngestResult =
  | { ok: true; doc: RawDoc }
  | { ok: false; path: string; error: IngestionError };

/**
 * Reads every path independently. A missing, unreadable or unsupported file yields a
 * failed result for that path only.
 */
export async function ingest(paths: readonly string[]): Promise<IngestResult[]> {
  const results: IngestResult[] = [];
  for (const path of paths) {
    try {
      results.push({ ok: true, doc: await ingestFile(path) });
    } catch (err) {
      const error = err instanceof IngestionError
        ? err
        : new IngestionError(path, errorMessage(err), { cause: err });
      results.push({ ok: false, path, error });
    }
  }
  return results;
}

async function ingestFile(path: string): Promise<RawDoc> {
  const contentType = contentTypeFor(path);
  if (!contentType) {
    throw new IngestionError(path, 'unsupported file type (expected .txt, .md, .html or .pdf)');
  }

  const info = await stat(path);
  if (!info.isFile()) {
    throw new IngestionError(path, 'not a regular file');
  }

  const raw = await readFile(path);
  const text = (await extractText(raw, contentType)).normalize('NFC');

  return {
    path,
    contentType,
    text,
    contentHash: sha256(raw),
    mtimeMs: info.mtimeMs,
  };
}
