import * as cheerio from 'cheerio';

export type DocumentFormat = 'html' | 'pdf' | 'text';

export function formatForFile(fileName: string): DocumentFormat | null {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.html') || lower.endsWith('.htm')) return 'html';
  if (lower.endsWith('.pdf')) return 'pdf';
  if (lower.endsWith('.txt')) return 'text';
  return null;
}

export async function extractText(raw: Buffer, format: DocumentFormat): Promise<string> {
  switch (format) {
    case 'html':
      return extractFromHtml(raw.toString('utf8'));
    case 'pdf':
      return extractFromPdf(raw);
    case 'text':
      return raw.toString('utf8');
  }
}

export function extractFromHtml(html: string): string {
  const $ = cheerio.load(html);

  $('script, style, noscript, meta, link').remove();

  const lines: string[] = [];

  $('tr, p, li, h1, h2, h3, h4, h5, h6, dt, dd, blockquote').each((_, el) => {
    const node = $(el);
    if (node.is('tr')) {
      const cells = node
        .children('th, td')
        .toArray()
        .map((cell) => $(cell).text().replace(/\s+/g, ' ').trim())
        .filter((cell) => cell.length > 0);
      if (cells.length > 0) lines.push(cells.join(' | '));
      return;
    }
    if (node.closest('tr').length > 0) return;

    const text = node.text().replace(/\s+/g, ' ').trim();
    if (text.length > 0) lines.push(text);
  });

  if (lines.length === 0) {
    return $.root().text().replace(/\s+/g, ' ').trim();
  }

  return lines.join('\n');
}

async function extractFromPdf(raw: Buffer): Promise<string> {
  try {
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

    const doc = await pdfjs.getDocument({ data: new Uint8Array(raw) }).promise;

    const pages: string[] = [];
    for (let i = 1; i <= doc.numPages; i++) {
      const page = await doc.getPage(i);
      const content = await page.getTextContent();
      const pageText = content.items
        .map((item) => ('str' in item ? item.str : ''))
        .filter((s) => s.length > 0)
        .join(' ');
      pages.push(pageText);
    }

    return pages.join('\n\n');
  } catch (error) {
    throw new Error(
      `PDF extraction failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}
