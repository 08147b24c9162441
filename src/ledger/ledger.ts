import { STAGES, stageOrdinal } from '../control-plane/stages.js';
import { deepFreeze } from '../utils/freeze.js';
import type { FinalReport } from '../analysis/schemas.js';
import type { AnalysisKey, PipelineState, RunStatus, StageResult } from './types.js';

const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  pending: ['running'],
  running: ['complete', 'failed'],
  complete: [],
  failed: [],
};

export class LedgerViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerViolation';
  }
}

/**
 * Append-only record of one run. Entries are frozen copies, accepted only in
 * canonical stage order; status moves pending -> running -> complete|failed
 * and never back.
 */
export class Ledger {
  private status: RunStatus = 'pending';
  private readonly results: StageResult[] = [];
  private report: FinalReport | null = null;
  private updatedAt: string;

  constructor(
    readonly runId: string,
    readonly key: AnalysisKey,
    private readonly createdAt: string = new Date().toISOString()
  ) {
    this.key = deepFreeze({ ...key });
    this.updatedAt = createdAt;
  }

  static restore(state: PipelineState): Ledger {
    const ledger = new Ledger(state.runId, state.key, state.createdAt);
    ledger.status = 'running';
    for (const result of state.results) {
      ledger.append(result);
    }
    if (state.status === 'complete') {
      if (!state.report) throw new LedgerViolation(`complete ledger ${state.runId} has no report`);
      ledger.complete(state.report);
    } else if (state.status === 'failed') {
      if (ledger.results[ledger.results.length - 1]?.error) ledger.fail();
      else ledger.abort();
    } else {
      ledger.status = state.status;
    }
    ledger.updatedAt = state.updatedAt;
    return ledger;
  }

  get currentStatus(): RunStatus {
    return this.status;
  }

  get isTerminal(): boolean {
    return this.status === 'complete' || this.status === 'failed';
  }

  get entries(): readonly StageResult[] {
    return this.results;
  }

  get finalReport(): FinalReport | null {
    return this.report;
  }

  begin(): void {
    this.transition('running');
  }

  append(result: StageResult): StageResult {
    if (this.status !== 'running') {
      throw new LedgerViolation(`cannot append "${result.stage}" to a ${this.status} ledger`);
    }

    const expected = STAGES[this.results.length];
    if (expected === undefined) {
      throw new LedgerViolation(`all ${STAGES.length} stages are already recorded`);
    }
    if (result.stage !== expected || result.ordinal !== stageOrdinal(expected)) {
      throw new LedgerViolation(
        `out-of-order stage: expected "${expected}" (#${stageOrdinal(expected)}), ` +
        `got "${result.stage}" (#${result.ordinal})`
      );
    }
    if (result.output && result.output.stage !== result.stage) {
      throw new LedgerViolation(`"${result.stage}" entry carries "${result.output.stage}" output`);
    }

    const previous = this.results[this.results.length - 1];
    if (previous?.error) {
      throw new LedgerViolation(`"${previous.stage}" failed; no later stage may be recorded`);
    }
    if (previous && result.startedAt < previous.finishedAt) {
      throw new LedgerViolation(`"${result.stage}" starts before "${previous.stage}" finished`);
    }

    const frozen = deepFreeze(structuredClone(result));
    this.results.push(frozen);
    this.updatedAt = result.finishedAt;
    return frozen;
  }

  complete(report: FinalReport): void {
    if (this.results.length !== STAGES.length || this.results.some((r) => r.error !== null)) {
      throw new LedgerViolation('a ledger completes only after every stage succeeded');
    }
    this.transition('complete');
    this.report = deepFreeze(structuredClone(report));
  }

  fail(): void {
    const last = this.results[this.results.length - 1];
    if (!last?.error) {
      throw new LedgerViolation('a ledger fails only after recording the failing stage');
    }
    this.transition('failed');
  }

  // For faults outside any stage, where no failing result could be recorded.
  abort(): void {
    this.transition('failed');
  }

  snapshot(): PipelineState {
    return {
      runId: this.runId,
      key: { ...this.key },
      status: this.status,
      results: [...this.results],
      report: this.report,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  private transition(next: RunStatus): void {
    if (!TRANSITIONS[this.status].includes(next)) {
      throw new LedgerViolation(`illegal status transition ${this.status} -> ${next}`);
    }
    this.status = next;
    this.updatedAt = new Date().toISOString();
  }
}
