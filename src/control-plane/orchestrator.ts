import { emptyUsage, summarizeUsage } from '../analysis/usage.js';
import { DEFAULT_PIPELINE_SETTINGS } from '../config/settings.js';
import type { PipelineSettings } from '../config/settings.js';
import type { FinalReport, UsageSummary } from '../analysis/schemas.js';
import type { StateJournal } from '../ledger/journal.js';
import { buildAnalysisKey, keyId } from '../ledger/key.js';
import { Ledger } from '../ledger/ledger.js';
import type { CacheEntry, PipelineState, StageOutput, StageResult } from '../ledger/types.js';
import type { Capability } from '../tools/capability.js';
import type { ResultCache } from '../tools/cache.js';
import type { DocumentSource, SourceDocument } from '../tools/documents.js';
import { generateRunId } from '../utils/id.js';
import { StepTimer } from '../utils/timer.js';
import { withTimeout } from '../utils/timeout.js';
import { ProgressBroadcaster } from './broadcaster.js';
import {
  ConsistencyContradictionError,
  InternalStageError,
  StageTimeoutError,
  toPipelineError,
} from './errors.js';
import type { PipelineError } from './errors.js';
import { KeyedMutex } from './run-guard.js';
import { STAGES, stageOrdinal } from './stages.js';
import { buildWorkflow } from './workflow.js';
import type {
  AnalysisRequest,
  Logger,
  ProgressEvent,
  RunContext,
  RunHandle,
  StartResult,
  TerminalEvent,
  WorkflowStep,
} from './types.js';

export interface OrchestratorDeps {
  documents: DocumentSource;
  capability: Capability;
  cache: ResultCache;
  journal?: StateJournal | null;
  settings?: PipelineSettings;
  logger?: Logger;
}

interface RunRecord {
  handle: RunHandle;
  ledger: Ledger;
  channel: ProgressBroadcaster<ProgressEvent>;
}

// One run in flight per key; a cached key replays without running a stage.
export class PipelineOrchestrator {
  private readonly documents: DocumentSource;
  private readonly capability: Capability;
  private readonly cache: ResultCache;
  private readonly journal: StateJournal | null;
  private readonly settings: PipelineSettings;
  private readonly logger: Logger;
  private readonly steps: WorkflowStep[] = buildWorkflow();
  private readonly guard = new KeyedMutex();
  private readonly active = new Map<string, RunRecord>();
  private readonly records = new WeakMap<RunHandle, RunRecord>();

  constructor(deps: OrchestratorDeps) {
    this.documents = deps.documents;
    this.capability = deps.capability;
    this.cache = deps.cache;
    this.journal = deps.journal ?? null;
    this.settings = deps.settings ?? DEFAULT_PIPELINE_SETTINGS;
    this.logger = deps.logger ?? console;
  }

  async start(request: AnalysisRequest): Promise<StartResult> {
    const key = buildAnalysisKey(request, this.settings.defaults);
    const id = keyId(key);

    return this.guard.run(id, async (): Promise<StartResult> => {
      const inFlight = this.active.get(id);
      if (inFlight && inFlight.ledger.currentStatus !== 'failed') {
        this.logger.log(`[finlens] attached to in-flight run ${inFlight.handle.runId} for ${id}`);
        return { handle: inFlight.handle, origin: 'attached' };
      }

      const cached = await this.cache.check(key);
      if (cached) {
        this.logger.log(`[finlens] cache hit for ${id} (stored ${cached.storedAt})`);
        return { handle: this.replay(cached), origin: 'cache' };
      }

      const document = await this.documents.load(key.subject);

      const handle: RunHandle = Object.freeze({ runId: generateRunId(), key, keyId: id });
      const ledger = new Ledger(handle.runId, key);
      ledger.begin();
      const record: RunRecord = { handle, ledger, channel: new ProgressBroadcaster<ProgressEvent>() };
      this.records.set(handle, record);
      this.active.set(id, record);

      this.logger.log(
        `\n[finlens] run=${handle.runId} subject=${key.subject} ` +
        `extraction=${key.extraction} analysis=${key.analysis}`
      );
      void this.execute(record, document);

      return { handle, origin: 'started' };
    });
  }

  subscribe(handle: RunHandle): AsyncIterableIterator<ProgressEvent> {
    return this.recordFor(handle).channel.subscribe();
  }

  getState(handle: RunHandle): PipelineState {
    return this.recordFor(handle).ledger.snapshot();
  }

  async settled(handle: RunHandle): Promise<PipelineState> {
    const stream = this.subscribe(handle);
    for await (const event of stream) {
      if (event.type === 'terminal') break;
    }
    return this.getState(handle);
  }

  async check(request: AnalysisRequest): Promise<CacheEntry | null> {
    return this.cache.check(buildAnalysisKey(request, this.settings.defaults));
  }

  async result(request: AnalysisRequest): Promise<{ report: FinalReport; usage: UsageSummary } | null> {
    const entry = await this.check(request);
    if (!entry?.state.report) return null;
    return { report: entry.state.report, usage: entry.usage };
  }

  async invalidate(request: AnalysisRequest): Promise<boolean> {
    const key = buildAnalysisKey(request, this.settings.defaults);
    const id = keyId(key);
    return this.guard.run(id, async () => {
      const removed = await this.cache.invalidate(key);
      this.logger.log(`[finlens] ${removed ? 'evicted' : 'no cache entry for'} ${id}`);
      return removed;
    });
  }

  isActive(handle: RunHandle): boolean {
    return this.active.get(handle.keyId)?.handle === handle;
  }

  private recordFor(handle: RunHandle): RunRecord {
    const record = this.records.get(handle);
    if (!record) throw new Error(`unknown run handle ${handle.runId}`);
    return record;
  }

  private replay(entry: CacheEntry): RunHandle {
    const ledger = Ledger.restore(entry.state);
    const handle: RunHandle = Object.freeze({ runId: ledger.runId, key: ledger.key, keyId: entry.keyId });
    const channel = new ProgressBroadcaster<ProgressEvent>();
    for (const result of ledger.entries) {
      channel.publish(this.stageEvent(result));
    }
    const report = ledger.finalReport;
    if (!report) throw new InternalStageError(`cached run ${ledger.runId} has no report`);
    channel.close({
      type: 'terminal',
      status: 'complete',
      payload: { report, usage: entry.usage },
      timestamp: entry.storedAt,
    });
    this.records.set(handle, { handle, ledger, channel });
    return handle;
  }

  // never rejects
  private async execute(record: RunRecord, document: SourceDocument): Promise<void> {
    let terminal: TerminalEvent;
    try {
      terminal = await this.drive(record, document);
    } catch (error) {
      const failure = toPipelineError(error);
      if (!record.ledger.isTerminal) record.ledger.abort();
      const entries = record.ledger.entries;
      const stage = entries[entries.length - 1]?.stage ?? STAGES[0];
      this.logger.error(`  [FAIL] ${record.handle.runId}: ${failure.message}`);
      terminal = {
        type: 'terminal',
        status: 'failed',
        payload: { stage, error: failure.toStageError() },
        timestamp: new Date().toISOString(),
      };
    }

    await this.retire(record);
    record.channel.close(terminal);

    if (terminal.status === 'complete') {
      this.logger.log(`[finlens] run ${record.handle.runId} complete`);
    } else {
      this.logger.error(
        `[finlens] run ${record.handle.runId} failed at "${terminal.payload.stage}": ${terminal.payload.error.message}`
      );
    }
  }

  private async drive(record: RunRecord, document: SourceDocument): Promise<TerminalEvent> {
    const { ledger } = record;

    for (const step of this.steps) {
      const result = await this.runStep(record, step, document);
      if (result.error) {
        ledger.fail();
        return {
          type: 'terminal',
          status: 'failed',
          payload: { stage: result.stage, error: result.error },
          timestamp: new Date().toISOString(),
        };
      }
    }

    const formatted = ledger.entries[STAGES.length - 1]?.output;
    if (formatted?.stage !== 'format') {
      throw new InternalStageError('format stage produced no report');
    }
    ledger.complete(formatted.data);
    return {
      type: 'terminal',
      status: 'complete',
      payload: { report: formatted.data, usage: summarizeUsage(ledger.entries) },
      timestamp: new Date().toISOString(),
    };
  }

  private async runStep(record: RunRecord, step: WorkflowStep, document: SourceDocument): Promise<StageResult> {
    const { ledger } = record;
    const ctx: RunContext = {
      key: ledger.key,
      document,
      results: ledger.entries,
      settings: this.settings,
      capability: this.capability,
    };
    const timeoutMs = this.settings.timeouts[step.name];
    const timer = new StepTimer();
    const startedAt = timer.begin().toISOString();
    this.logger.log(`  [run]  ${step.name}...`);

    let output: StageOutput | null = null;
    let usage = emptyUsage();
    let failure: PipelineError | null = null;

    try {
      const outcome = await withTimeout(
        (signal) => step.execute(ctx, signal),
        timeoutMs,
        () => new StageTimeoutError(step.name, timeoutMs)
      );
      if (outcome.output.stage !== step.name) {
        throw new InternalStageError(`"${step.name}" returned "${outcome.output.stage}" output`);
      }
      output = outcome.output;
      usage = outcome.usage;
    } catch (error) {
      failure = toPipelineError(error);
      usage = failure.usage ?? emptyUsage();
      if (failure instanceof ConsistencyContradictionError) {
        output = { stage: 'validate', data: failure.report };
      }
    }

    const durationMs = timer.elapsed();
    const result = ledger.append({
      stage: step.name,
      ordinal: stageOrdinal(step.name),
      output,
      error: failure ? failure.toStageError() : null,
      startedAt,
      finishedAt: new Date().toISOString(),
      durationMs,
      usage,
    });

    if (failure) {
      this.logger.error(`  [FAIL] ${step.name}: ${failure.message}`);
      for (const issue of failure.issues ?? []) this.logger.error(`         - ${issue}`);
    } else {
      this.logger.log(`  [pass] ${step.name} (${durationMs}ms)`);
    }

    await this.writeJournal(record, result);
    record.channel.publish(this.stageEvent(result));
    return result;
  }

  private async writeJournal(record: RunRecord, result: StageResult): Promise<void> {
    if (!this.journal) return;
    try {
      await this.journal.record(record.handle.keyId, result, record.ledger.snapshot());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`  [warn] state journal write failed: ${message}`);
    }
  }

  private async retire(record: RunRecord): Promise<void> {
    const { handle, ledger } = record;
    await this.guard.run(handle.keyId, async () => {
      if (ledger.currentStatus === 'complete') {
        try {
          const outcome = await this.cache.put(handle.key, ledger.snapshot());
          if (outcome === 'conflict') {
            this.logger.warn(`  [warn] cache entry for ${handle.keyId} already exists; keeping the first`);
          }
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`  [warn] could not cache ${handle.keyId}: ${message}`);
        }
      }
      if (this.active.get(handle.keyId) === record) this.active.delete(handle.keyId);
    });
  }

  private stageEvent(result: StageResult): ProgressEvent {
    return {
      type: 'stage',
      stage: result.stage,
      ordinal: result.ordinal,
      total: STAGES.length,
      payload: result,
      timestamp: result.finishedAt,
    };
  }
}
