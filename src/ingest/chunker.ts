import type { ProcedureChunk } from '../control-plane/types.js';
import { sha256 } from '../utils/hash.js';
import { sourceRange, type NormDoc } from './normalizer.js';

export type ChunkDraft = Omit<ProcedureChunk, 'handle'>;

interface Span {
  start: number;
  end: number;
}

const CHARS_PER_TOKEN = 4;
const SENTENCE_END = new Set(['.', '!', '?', '。', '！', '？']);

/** Rough token count at four characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Splits a normalized document into retrievable chunks of at most `maxTokens`.
 * Paragraphs are the preferred unit, then sentences; only a sentence that alone exceeds
 * the budget is cut by length. Adjacent units are packed while the packed span fits.
 */
export function chunk(doc: NormDoc, maxTokens: number): ChunkDraft[] {
  const maxChars = Math.max(1, maxTokens) * CHARS_PER_TOKEN;
  const units: Span[] = [];

  for (const paragraph of paragraphSpans(doc.text)) {
    if (paragraph.end - paragraph.start <= maxChars) {
      units.push(paragraph);
      continue;
    }
    for (const sentence of sentenceSpans(doc.text, paragraph)) {
      if (sentence.end - sentence.start <= maxChars) units.push(sentence);
      else units.push(...hardCut(doc.text, sentence, maxChars));
    }
  }

  const packed: Span[] = [];
  for (const unit of units) {
    const last = packed[packed.length - 1];
    if (last && unit.end - last.start <= maxChars) {
      last.end = unit.end;
    } else {
      packed.push({ ...unit });
    }
  }

  return packed.map((span) => {
    const text = doc.text.slice(span.start, span.end);
    const range = sourceRange(doc, span.start, span.end);
    return {
      documentPath: doc.path,
      start: range.start,
      end: range.end,
      text,
      contentHash: sha256(text),
    };
  });
}

function paragraphSpans(text: string): Span[] {
  const spans: Span[] = [];
  let start = 0;
  while (start < text.length) {
    let end = text.indexOf('\n\n', start);
    if (end < 0) end = text.length;
    pushTrimmed(text, spans, start, end);
    start = end + 2;
  }
  return spans;
}

function sentenceSpans(text: string, within: Span): Span[] {
  const spans: Span[] = [];
  let start = within.start;
  for (let i = within.start; i < within.end; i++) {
    if (!SENTENCE_END.has(text[i])) continue;
    const next = i + 1;
    if (next === within.end || /\s/.test(text[next])) {
      pushTrimmed(text, spans, start, next);
      start = next;
    }
  }
  pushTrimmed(text, spans, start, within.end);
  return spans;
}

/** Length cuts, preferring the last space inside each window. */
function hardCut(text: string, span: Span, maxChars: number): Span[] {
  const spans: Span[] = [];
  let start = span.start;
  while (span.end - start > maxChars) {
    let cut = text.lastIndexOf(' ', start + maxChars);
    if (cut <= start) cut = start + maxChars;
    pushTrimmed(text, spans, start, cut);
    start = cut;
  }
  pushTrimmed(text, spans, start, span.end);
  return spans;
}

function pushTrimmed(text: string, spans: Span[], start: number, end: number): void {
  let a = start;
  let b = end;
  while (a < b && /\s/.test(text[a])) a++;
  while (b > a && /\s/.test(text[b - 1])) b--;
  if (a < b) spans.push({ start: a, end: b });
}
