import { describe, it, expect } from 'vitest';
import { chunk, estimateTokens } from '../ingest/chunker.js';
import type { RawDoc } from '../ingest/ingestor.js';
import { normalize, type NormDoc } from '../ingest/normalizer.js';
import { sha256 } from '../utils/hash.js';

function doc(text: string): NormDoc {
  return { path: '/docs/p.txt', text, offsets: Array.from({ length: text.length }, (_, i) => i) };
}

function raw(text: string): RawDoc {
  return { path: '/docs/p.txt', contentType: 'text', text, contentHash: sha256(text), mtimeMs: 1 };
}

describe('estimateTokens', () => {
  it('counts four characters per token, rounding up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('chunk', () => {
  it('keeps a document that fits the budget in one chunk', () => {
    const text = 'Scope\n\nThis procedure applies to all staff.';
    expect(chunk(doc(text), 200)).toEqual([
      { documentPath: '/docs/p.txt', start: 0, end: text.length, text, contentHash: sha256(text) },
    ]);
  });

  it('splits an oversized paragraph on sentence boundaries', () => {
    const chunks = chunk(doc('Alpha beta. Gamma delta.'), 5);
    expect(chunks.map((c) => [c.text, c.start, c.end])).toEqual([
      ['Alpha beta.', 0, 11],
      ['Gamma delta.', 12, 24],
    ]);
  });

  it('packs short paragraphs and cuts an oversized sentence at a space', () => {
    const chunks = chunk(doc('One.\n\nTwo.\n\nThree is longer text here.'), 5);
    expect(chunks.map((c) => c.text)).toEqual(['One.\n\nTwo.', 'Three is longer text', 'here.']);
  });

  it('never produces a chunk over the budget', () => {
    const text = Array.from({ length: 40 }, (_, i) => `Sentence number ${i} says something.`).join(' ');
    for (const c of chunk(doc(text), 16)) {
      expect(c.text.length).toBeLessThanOrEqual(64);
    }
  });

  it('reports ranges as character offsets into the extracted text, not bytes', () => {
    const text = 'Übersicht für Prüfer.\n\nÄnderungen prüft der Eigentümer.';
    const chunks = chunk(normalize(raw(text)), 8);

    expect(Buffer.byteLength(text, 'utf-8')).toBe(61);
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 21],
      [23, 55],
    ]);
    for (const c of chunks) expect(text.slice(c.start, c.end)).toBe(c.text);
  });

  it('maps a normalized chunk back past stripped numbering and collapsed spaces', () => {
    const text = '1.  Prüfung   jährlich.';
    const [only] = chunk(normalize(raw(text)), 200);

    expect(only.text).toBe('Prüfung jährlich.');
    expect([only.start, only.end]).toEqual([4, 23]);
    expect(text.slice(only.start, only.end)).toBe('Prüfung   jährlich.');
  });

  it('returns nothing for an empty document', () => {
    expect(chunk(doc(''), 200)).toEqual([]);
  });
});
