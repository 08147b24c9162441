import { createHash } from 'node:crypto';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { summarizeUsage } from '../analysis/usage.js';
import type { Logger } from '../control-plane/types.js';
import { keyId } from '../ledger/key.js';
import { Ledger, LedgerViolation } from '../ledger/ledger.js';
import { CacheEntrySchema } from '../ledger/schema.js';
import type { AnalysisKey, CacheEntry, PipelineState } from '../ledger/types.js';

export type PutOutcome = 'stored' | 'conflict';

export interface ResultCache {
  check(key: AnalysisKey): Promise<CacheEntry | null>;
  put(key: AnalysisKey, state: PipelineState): Promise<PutOutcome>;
  invalidate(key: AnalysisKey): Promise<boolean>;
}

export interface FileResultCacheOptions {
  ttlMs?: number | null;
  logger?: Logger;
  now?: () => Date;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class FileResultCache implements ResultCache {
  private readonly ttlMs: number | null;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly dir: string, options: FileResultCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? null;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  pathFor(key: AnalysisKey): string {
    const hash = createHash('sha256').update(keyId(key)).digest('hex').slice(0, 16);
    return join(this.dir, key.subject, `${hash}.json`);
  }

  async check(key: AnalysisKey): Promise<CacheEntry | null> {
    const path = this.pathFor(key);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return null;
      throw error;
    }

    const entry = this.parse(raw, keyId(key));
    if (!entry) {
      this.logger.warn(`  [warn] discarding corrupt cache entry ${path}`);
      await rm(path, { force: true });
      return null;
    }

    if (this.ttlMs !== null && this.now().getTime() - Date.parse(entry.storedAt) > this.ttlMs) {
      await rm(path, { force: true });
      return null;
    }

    return entry;
  }

  // first writer wins
  async put(key: AnalysisKey, state: PipelineState): Promise<PutOutcome> {
    if (state.status !== 'complete') {
      throw new Error(`refusing to cache a ${state.status} ledger (${state.runId})`);
    }

    const entry: CacheEntry = {
      version: 1,
      keyId: keyId(key),
      storedAt: this.now().toISOString(),
      state,
      usage: summarizeUsage(state.results),
    };

    const path = this.pathFor(key);
    await mkdir(join(this.dir, key.subject), { recursive: true });
    try {
      await writeFile(path, JSON.stringify(entry, null, 2), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (hasCode(error, 'EEXIST')) return 'conflict';
      throw error;
    }
    return 'stored';
  }

  async invalidate(key: AnalysisKey): Promise<boolean> {
    try {
      await rm(this.pathFor(key));
      return true;
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return false;
      throw error;
    }
  }

  private parse(raw: string, expectedKeyId: string): CacheEntry | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = CacheEntrySchema.safeParse(json);
    if (!parsed.success) return null;
    const entry = parsed.data;
    if (entry.keyId !== expectedKeyId || entry.state.status !== 'complete' || !entry.state.report) return null;
    try {
      Ledger.restore(entry.state);
    } catch (error) {
      if (error instanceof LedgerViolation) return null;
      throw error;
    }
    return entry;
  }
}
