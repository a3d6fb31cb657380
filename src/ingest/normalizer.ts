import type { RawDoc } from './ingestor.js';

export interface NormDoc {
  path: string;
  text: string;
  /**
   * `offsets[i]` is the index in the raw text of normalized character `i`.
   * Separators map to the first character of the line they introduce.
   */
  offsets: number[];
}

// "1.", "2.1", "(3.1)", "4)"; a bare number followed by a space is body text
const SECTION_NUMBER = /^(?:\(?\d+(?:\.\d+)*[.)]|\d+(?:\.\d+)+)\s+/;
const INLINE_SPACE = /[ \t\f\v\r\u00a0]/;

/**
 * Strips formatting noise: trims lines, collapses runs of inline whitespace,
 * drops leading section numbers and folds blank-line runs into one paragraph break.
 */
export function normalize(doc: RawDoc): NormDoc {
  const source = doc.text;
  const chars: string[] = [];
  const offsets: number[] = [];
  let paragraphBreak = false;
  let lineStart = 0;

  while (lineStart <= source.length) {
    let lineEnd = source.indexOf('\n', lineStart);
    if (lineEnd < 0) lineEnd = source.length;

    let a = lineStart;
    let b = lineEnd;
    while (a < b && INLINE_SPACE.test(source[a])) a++;
    while (b > a && INLINE_SPACE.test(source[b - 1])) b--;

    if (a === b) {
      paragraphBreak = chars.length > 0;
    } else {
      const numbering = SECTION_NUMBER.exec(source.slice(a, b));
      if (numbering && numbering[0].length < b - a) a += numbering[0].length;

      if (chars.length > 0) {
        const separator = paragraphBreak ? '\n\n' : '\n';
        for (const ch of separator) {
          chars.push(ch);
          offsets.push(a);
        }
      }
      paragraphBreak = false;

      let inSpace = false;
      for (let i = a; i < b; i++) {
        const ch = source[i];
        if (INLINE_SPACE.test(ch)) {
          if (!inSpace) {
            chars.push(' ');
            offsets.push(i);
          }
          inSpace = true;
        } else {
          chars.push(ch);
          offsets.push(i);
          inSpace = false;
        }
      }
    }

    lineStart = lineEnd + 1;
  }

  return { path: doc.path, text: chars.join(''), offsets };
}

/** Maps a `[start, end)` range of normalized text back to the raw text. */
export function sourceRange(doc: NormDoc, start: number, end: number): { start: number; end: number } {
  if (end <= start) {
    const at = doc.offsets[start] ?? doc.offsets[doc.offsets.length - 1] ?? 0;
    return { start: at, end: at };
  }
  return { start: doc.offsets[start], end: doc.offsets[end - 1] + 1 };
}
