import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { RequestError } from '../control-plane/errors.js';
import { extractText, formatForFile } from './extractor.js';

export interface SourceDocument {
  subject: string;
  path: string;
  text: string;
  price: number | null;
  currency: string | null;
}

export interface DocumentSource {
  load(subject: string): Promise<SourceDocument>;
}

const QuoteSchema = z.object({
  price: z.number().positive().nullable().default(null),
  currency: z.string().min(1).nullable().default(null),
});

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads filings from `<root>/<SUBJECT>/`. The lexicographically last
 * statement file wins, so date-prefixed names pick the latest filing.
 * An optional `quote.json` supplies the share price.
 */
export class FileDocumentStore implements DocumentSource {
  constructor(private readonly rootDir: string) {}

  async load(subject: string): Promise<SourceDocument> {
    const dir = join(this.rootDir, subject);

    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (isMissing(error)) {
        throw new RequestError('UNKNOWN_SUBJECT', `no documents directory for "${subject}" under ${this.rootDir}`);
      }
      throw error;
    }

    const statement = names.filter((name) => formatForFile(name) !== null).sort().pop();
    const format = statement ? formatForFile(statement) : null;
    if (!statement || !format) {
      throw new RequestError('NO_SOURCE_DOCUMENT', `no .html, .htm, .pdf or .txt statement found in ${dir}`);
    }

    const path = join(dir, statement);
    const text = (await extractText(await readFile(path), format)).trim();
    if (text.length === 0) {
      throw new RequestError('NO_SOURCE_DOCUMENT', `${path} contains no extractable text`);
    }

    const quote = names.includes('quote.json') ? await this.readQuote(join(dir, 'quote.json')) : null;

    return {
      subject,
      path,
      text,
      price: quote?.price ?? null,
      currency: quote?.currency ?? null,
    };
  }

  private async readQuote(path: string): Promise<z.infer<typeof QuoteSchema>> {
    const raw = await readFile(path, 'utf8');
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new RequestError('NO_SOURCE_DOCUMENT', `${path} is not valid JSON: ${String(error)}`);
    }
    const parsed = QuoteSchema.safeParse(json);
    if (!parsed.success) {
      const problems = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new RequestError('NO_SOURCE_DOCUMENT', `${path} is not a valid quote: ${problems.join('; ')}`);
    }
    return parsed.data;
  }
}
