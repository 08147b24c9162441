import { describe, it, expect } from 'vitest';
import { calculateMetrics } from '../analysis/calculator.js';
import { Ledger, LedgerViolation } from '../ledger/ledger.js';
import { completedLedger, sampleFacts, stageResult, TEST_KEY } from './helpers/fakes.js';

function runningLedger(): Ledger {
  const ledger = new Ledger('run_20250301_000001', TEST_KEY, '2025-03-01T10:00:00.000Z');
  ledger.begin();
  return ledger;
}

const extractResult = () => stageResult('extract', { stage: 'extract', data: sampleFacts() });
const calculateResult = () =>
  stageResult('calculate', { stage: 'calculate', data: calculateMetrics(sampleFacts(), 70) });

describe('Ledger', () => {
  it('starts pending and moves to running', () => {
    const ledger = new Ledger('run_1', TEST_KEY);
    expect(ledger.currentStatus).toBe('pending');
    ledger.begin();
    expect(ledger.currentStatus).toBe('running');
    expect(ledger.isTerminal).toBe(false);
  });

  it('rejects appends before the run begins', () => {
    const ledger = new Ledger('run_1', TEST_KEY);
    expect(() => ledger.append(extractResult())).toThrow(LedgerViolation);
  });

  it('accepts stages in canonical order and freezes them', () => {
    const ledger = runningLedger();
    const stored = ledger.append(extractResult());
    ledger.append(calculateResult());

    expect(ledger.entries.map((r) => r.stage)).toEqual(['extract', 'calculate']);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.usage)).toBe(true);
    expect(Object.isFrozen(stored.output?.data)).toBe(true);
    expect(() => {
      stored.usage.calls = 5;
    }).toThrow(TypeError);
  });

  it('stores a copy, not the caller object', () => {
    const ledger = runningLedger();
    const result = extractResult();
    ledger.append(result);
    result.durationMs = 999;
    expect(ledger.entries[0]?.durationMs).toBe(500);
  });

  it('rejects out-of-order stages', () => {
    const ledger = runningLedger();
    expect(() => ledger.append(calculateResult())).toThrow(
      'out-of-order stage: expected "extract" (#1), got "calculate" (#2)'
    );
  });

  it('rejects an entry whose output belongs to another stage', () => {
    const ledger = runningLedger();
    const mismatched = stageResult('extract', {
      stage: 'calculate',
      data: calculateMetrics(sampleFacts(), 70),
    });
    expect(() => ledger.append(mismatched)).toThrow('"extract" entry carries "calculate" output');
  });

  it('rejects a stage that starts before the previous one finished', () => {
    const ledger = runningLedger();
    ledger.append(extractResult());
    const early = stageResult('calculate', { stage: 'calculate', data: calculateMetrics(sampleFacts(), 70) }, {
      startedAt: '2025-03-01T10:00:01.000Z',
    });
    expect(() => ledger.append(early)).toThrow(LedgerViolation);
  });

  it('records a failure and refuses later stages', () => {
    const ledger = runningLedger();
    ledger.append(
      stageResult('extract', null, { error: { kind: 'SchemaValidationError', message: 'bad shape' } })
    );
    ledger.fail();
    expect(ledger.currentStatus).toBe('failed');
    expect(ledger.isTerminal).toBe(true);
    expect(() => ledger.append(calculateResult())).toThrow(LedgerViolation);
  });

  it('fails only after a failing stage was recorded', () => {
    const ledger = runningLedger();
    ledger.append(extractResult());
    expect(() => ledger.fail()).toThrow('a ledger fails only after recording the failing stage');
  });

  it('completes only with five successful stages', () => {
    const partial = runningLedger();
    partial.append(extractResult());
    const report = completedLedger().finalReport;
    expect(report).not.toBeNull();
    if (report) {
      expect(() => partial.complete(report)).toThrow('a ledger completes only after every stage succeeded');
    }
  });

  it('reaches a terminal status at most once', () => {
    const ledger = completedLedger();
    expect(ledger.currentStatus).toBe('complete');
    expect(() => ledger.begin()).toThrow('illegal status transition complete -> running');
  });

  it('snapshots and restores a complete ledger', () => {
    const original = completedLedger();
    const snapshot = original.snapshot();
    const restored = Ledger.restore(JSON.parse(JSON.stringify(snapshot)));

    expect(restored.currentStatus).toBe('complete');
    expect(restored.entries).toHaveLength(5);
    expect(restored.finalReport?.title).toBe(snapshot.report?.title);
    expect(restored.snapshot()).toEqual(snapshot);
  });

  it('keeps the key immutable', () => {
    const ledger = runningLedger();
    expect(Object.isFrozen(ledger.key)).toBe(true);
    expect(ledger.key).toEqual(TEST_KEY);
  });
  it('aborts a running ledger without a failing stage', () => {
    const ledger = runningLedger();
    ledger.append(extractResult());
    ledger.abort();
    expect(ledger.currentStatus).toBe('failed');
    expect(() => ledger.append(calculateResult())).toThrow(LedgerViolation);

    const restored = Ledger.restore(ledger.snapshot());
    expect(restored.currentStatus).toBe('failed');
    expect(restored.entries).toHaveLength(1);
  });
});
