import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { keyId } from '../ledger/key.js';
import { FileResultCache } from '../tools/cache.js';
import { completedLedger, completedState, makeTempDir, quietLogger, stageResult, TEST_KEY } from './helpers/fakes.js';
import { Ledger } from '../ledger/ledger.js';

describe('FileResultCache', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('stores one document per key under the subject directory', async () => {
    const cache = new FileResultCache(dir);
    const path = cache.pathFor(TEST_KEY);
    expect(dirname(path)).toBe(join(dir, 'NWND'));
    expect(path).toMatch(/[0-9a-f]{16}\.json$/);

    expect(await cache.put(TEST_KEY, completedState())).toBe('stored');
    const stored = JSON.parse(await readFile(path, 'utf-8'));
    expect(stored.version).toBe(1);
    expect(stored.keyId).toBe('NWND__openai_gpt-4o-mini__openai_gpt-4o');
  });

  it('returns a stored entry with its usage summary', async () => {
    const cache = new FileResultCache(dir, { now: () => new Date('2025-03-02T00:00:00.000Z') });
    await cache.put(TEST_KEY, completedState());

    const entry = await cache.check(TEST_KEY);
    expect(entry?.storedAt).toBe('2025-03-02T00:00:00.000Z');
    expect(entry?.state.status).toBe('complete');
    expect(entry?.state.results).toHaveLength(5);
    expect(entry?.usage.total.calls).toBe(2);
    expect(entry?.usage.total.promptTokens).toBe(3000);
    expect(entry?.usage.total.capability).toBeNull();
  });

  it('returns null for a key that was never stored', async () => {
    const cache = new FileResultCache(dir);
    expect(await cache.check({ ...TEST_KEY, subject: 'OTHER' })).toBeNull();
  });

  it('keeps the first entry and reports a conflict for a second write', async () => {
    const cache = new FileResultCache(dir);
    expect(await cache.put(TEST_KEY, completedState('run_20250301_aaaaaa'))).toBe('stored');
    expect(await cache.put(TEST_KEY, completedState('run_20250301_bbbbbb'))).toBe('conflict');
    expect((await cache.check(TEST_KEY))?.state.runId).toBe('run_20250301_aaaaaa');
  });

  it('refuses to store a ledger that is not complete', async () => {
    const cache = new FileResultCache(dir);
    const ledger = new Ledger('run_20250301_cccccc', TEST_KEY, '2025-03-01T10:00:00.000Z');
    ledger.begin();
    ledger.append(stageResult('extract', null, { error: { kind: 'StageTimeout', message: 'slow' } }));
    ledger.fail();

    await expect(cache.put(TEST_KEY, ledger.snapshot())).rejects.toThrow(
      'refusing to cache a failed ledger (run_20250301_cccccc)'
    );
    expect(await cache.check(TEST_KEY)).toBeNull();
  });

  it('expires entries older than the TTL and deletes them', async () => {
    let now = new Date('2025-03-01T00:00:00.000Z');
    const cache = new FileResultCache(dir, { ttlMs: 60_000, now: () => now });
    await cache.put(TEST_KEY, completedState());

    now = new Date('2025-03-01T00:00:59.000Z');
    expect(await cache.check(TEST_KEY)).not.toBeNull();

    now = new Date('2025-03-01T00:01:01.000Z');
    expect(await cache.check(TEST_KEY)).toBeNull();
    await expect(readFile(cache.pathFor(TEST_KEY), 'utf-8')).rejects.toThrow();
  });

  it('treats a corrupt entry as absent, logs it and lets a new run store', async () => {
    const logger = quietLogger();
    const cache = new FileResultCache(dir, { logger });
    const path = cache.pathFor(TEST_KEY);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, '{"version": 1, "keyId": "truncated');

    expect(await cache.check(TEST_KEY)).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(`  [warn] discarding corrupt cache entry ${path}`);
    expect(await cache.put(TEST_KEY, completedState())).toBe('stored');
  });

  it('treats an entry stored under another key id as corrupt', async () => {
    const cache = new FileResultCache(dir, { logger: quietLogger() });
    await cache.put(TEST_KEY, completedState());
    const path = cache.pathFor(TEST_KEY);
    const stored = JSON.parse(await readFile(path, 'utf-8'));
    await writeFile(path, JSON.stringify({ ...stored, keyId: 'SOMETHING_ELSE' }));

    expect(await cache.check(TEST_KEY)).toBeNull();
  });

  it('invalidates an entry', async () => {
    const cache = new FileResultCache(dir);
    await cache.put(TEST_KEY, completedLedger().snapshot());

    expect(await cache.invalidate(TEST_KEY)).toBe(true);
    expect(await cache.check(TEST_KEY)).toBeNull();
    expect(await cache.invalidate(TEST_KEY)).toBe(false);
  });

  it('keys distinct capability combinations separately', async () => {
    const cache = new FileResultCache(dir);
    const other = { ...TEST_KEY, analysis: 'google/gemini-3-pro-preview' as const };
    expect(cache.pathFor(other)).not.toBe(cache.pathFor(TEST_KEY));
    expect(keyId(other)).toBe('NWND__openai_gpt-4o-mini__google_gemini-3-pro-preview');

    await cache.put(TEST_KEY, completedState());
    expect(await cache.check(other)).toBeNull();
  });
  it('treats a complete entry with missing stages as corrupt and deletes it', async () => {
    const logger = quietLogger();
    const cache = new FileResultCache(dir, { logger });
    await cache.put(TEST_KEY, completedState());
    const path = cache.pathFor(TEST_KEY);
    const stored = JSON.parse(await readFile(path, 'utf-8'));
    await writeFile(path, JSON.stringify({ ...stored, state: { ...stored.state, results: stored.state.results.slice(0, 4) } }));

    expect(await cache.check(TEST_KEY)).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(`  [warn] discarding corrupt cache entry ${path}`);
    await expect(readFile(path, 'utf-8')).rejects.toThrow();
    expect(await cache.put(TEST_KEY, completedState())).toBe('stored');
  });
});
