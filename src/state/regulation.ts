import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { IngestionError, errorMessage } from '../control-plane/errors.js';
import type { Logger } from '../control-plane/types.js';

export interface SourceClause {
  id: string;
  title?: string;
  parentId?: string;
  text: string;
}

interface RegulationEntry {
  id?: string | number;
  title?: string;
  text?: string;
  subclauses?: RegulationEntry[];
}

const RegulationEntrySchema: z.ZodType<RegulationEntry> = z.lazy(() =>
  z.object({
    id: z.union([z.string(), z.number()]).optional(),
    title: z.string().optional(),
    text: z.string().optional(),
    subclauses: z.array(RegulationEntrySchema).optional(),
  })
);

const RegulationFileSchema = z.object({
  name: z.string().optional(),
  clauses: z.array(RegulationEntrySchema),
});

/**
 * Reads an external regulation file and flattens nested subclauses depth-first,
 * each child directly after its parent.
 */
export async function loadRegulation(path: string, logger: Logger): Promise<SourceClause[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new IngestionError(path, `cannot read regulation file: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new IngestionError(path, 'regulation file is not valid JSON', { cause: err });
  }

  const parsed = RegulationFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new IngestionError(path, 'regulation file must be an object with a "clauses" array');
  }

  return flattenClauses(parsed.data.clauses, path, logger);
}

export function flattenClauses(
  entries: readonly RegulationEntry[],
  path: string,
  logger: Logger
): SourceClause[] {
  const clauses: SourceClause[] = [];
  const seen = new Set<string>();

  const visit = (list: readonly RegulationEntry[], parentId?: string): void => {
    for (const entry of list) {
      const id = entry.id === undefined ? '' : String(entry.id).trim();
      const text = entry.text?.trim() ?? '';
      if (!id || !text) {
        logger.warn(`skipping clause without id or text in ${path}${id ? ` (${id})` : ''}`);
        continue;
      }
      if (seen.has(id)) {
        throw new IngestionError(path, `duplicate clause id "${id}"`);
      }
      seen.add(id);

      const clause: SourceClause = { id, text };
      if (entry.title) clause.title = entry.title;
      if (parentId) clause.parentId = parentId;
      clauses.push(clause);

      if (entry.subclauses) visit(entry.subclauses, id);
    }
  };

  visit(entries);
  return clauses;
}
