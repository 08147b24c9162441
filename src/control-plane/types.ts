import type { PipelineSettings } from '../config/settings.js';
import type { FinalReport, UsageCounters, UsageSummary } from '../analysis/schemas.js';
import type { Capability } from '../tools/capability.js';
import type { SourceDocument } from '../tools/documents.js';
import type { AnalysisKey, StageError, StageOutput, StageResult } from '../ledger/types.js';
import type { StageName } from './stages.js';

export type OutputFormat = 'json' | 'md';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

// capability choices may be omitted or `auto`
export interface AnalysisRequest {
  subject: string;
  extraction?: string;
  analysis?: string;
}

export interface StageEvent {
  type: 'stage';
  stage: StageName;
  ordinal: number;
  total: number;
  payload: StageResult;
  timestamp: string;
}

export interface CompleteEvent {
  type: 'terminal';
  status: 'complete';
  payload: { report: FinalReport; usage: UsageSummary };
  timestamp: string;
}

export interface FailedEvent {
  type: 'terminal';
  status: 'failed';
  payload: { stage: StageName; error: StageError };
  timestamp: string;
}

export type TerminalEvent = CompleteEvent | FailedEvent;
export type ProgressEvent = StageEvent | TerminalEvent;

export type StartOrigin = 'cache' | 'attached' | 'started';

export interface RunHandle {
  readonly runId: string;
  readonly key: AnalysisKey;
  readonly keyId: string;
}

export interface StartResult {
  handle: RunHandle;
  origin: StartOrigin;
}

export interface RunContext {
  readonly key: AnalysisKey;
  readonly document: SourceDocument;
  readonly results: readonly StageResult[];
  readonly settings: PipelineSettings;
  readonly capability: Capability;
}

export interface StepOutcome {
  output: StageOutput;
  usage: UsageCounters;
}

export interface WorkflowStep {
  name: StageName;
  execute: (ctx: RunContext, signal: AbortSignal) => Promise<StepOutcome>;
}
