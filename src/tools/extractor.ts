import * as cheerio from 'cheerio';

export type ContentType = 'html' | 'pdf' | 'markdown' | 'text';

const EXTENSION_TYPES: Record<string, ContentType> = {
  '.txt': 'text',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.html': 'html',
  '.htm': 'html',
  '.pdf': 'pdf',
};

/** Content type for a file path by extension, or undefined when unsupported. */
export function contentTypeFor(path: string): ContentType | undefined {
  const dot = path.lastIndexOf('.');
  if (dot < 0) return undefined;
  return EXTENSION_TYPES[path.slice(dot).toLowerCase()];
}

/**
 * Plain text of a procedure document. Paragraph structure survives as blank lines so the
 * chunker can split on it.
 */
export async function extractText(raw: Buffer, contentType: ContentType): Promise<string> {
  switch (contentType) {
    case 'html':
      return extractFromHtml(raw.toString('utf-8'));
    case 'pdf':
      return extractFromPdf(raw);
    case 'markdown':
      return extractFromMarkdown(raw.toString('utf-8'));
    case 'text':
      return raw.toString('utf-8');
  }
}

const BLOCKS = 'p, li, td, th, h1, h2, h3, h4, h5, h6, dt, dd, blockquote, pre';

/** One paragraph per innermost block element. */
function extractFromHtml(html: string): string {
  const $ = cheerio.load(html);

  $('script, style, noscript, meta, link, head').remove();
  $('br').replaceWith(' ');

  const blocks: string[] = [];
  $(BLOCKS).each((_, el) => {
    const node = $(el);
    if (node.find(BLOCKS).length > 0) return;
    const text = node.text().replace(/\s+/g, ' ').trim();
    if (text) blocks.push(text);
  });

  if (blocks.length === 0) {
    return $('body').text().replace(/\s+/g, ' ').trim();
  }
  return blocks.join('\n\n');
}

const MARKDOWN_RULES: [RegExp, string][] = [
  [/^\s{0,3}#{1,6}\s+/, ''],
  [/^\s{0,3}>\s?/, ''],
  [/^\s*[-*+]\s+/, ''],
  [/!\[([^\]]*)\]\([^)]*\)/g, '$1'],
  [/\[([^\]]*)\]\([^)]*\)/g, '$1'],
  [/(\*\*|__)(.+?)\1/g, '$2'],
  [/`([^`]+)`/g, '$1'],
];

/** Drops heading, quote and bullet markers, emphasis, links and code fences; keeps line structure. */
function extractFromMarkdown(markdown: string): string {
  return markdown
    .split('\n')
    .filter((line) => !/^\s*(?:```|~~~)/.test(line))
    .map((line) => MARKDOWN_RULES.reduce((out, [pattern, replacement]) => out.replace(pattern, replacement), line))
    .join('\n');
}

async function extractFromPdf(raw: Buffer): Promise<string> {
  try {
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    const doc = await pdfjs.getDocument({ data: new Uint8Array(raw), useSystemFonts: true }).promise;

    const pages: string[] = [];
    try {
      for (let i = 1; i <= doc.numPages; i++) {
        const page = await doc.getPage(i);
        const content = await page.getTextContent();
        let text = '';
        for (const item of content.items) {
          if (!('str' in item)) continue;
          text += item.str;
          if (item.hasEOL) text += '\n';
        }
        pages.push(text.trim());
      }
    } finally {
      await doc.destroy();
    }

    return pages.filter((p) => p.length > 0).join('\n\n');
  } catch (err) {
    throw new Error(`PDF extraction failed: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
}
