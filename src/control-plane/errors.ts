import type { StageName } from './stages.js';
import type { UsageCounters, ValidationReport } from '../analysis/schemas.js';
import type { StageError } from '../ledger/types.js';

export type ErrorKind = StageError['kind'];

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;
  usage?: UsageCounters;

  get issues(): string[] | undefined {
    return undefined;
  }

  toStageError(): StageError {
    const issues = this.issues;
    return issues && issues.length > 0
      ? { kind: this.kind, message: this.message, issues }
      : { kind: this.kind, message: this.message };
  }
}

export class UpstreamCapabilityError extends PipelineError {
  readonly kind = 'UpstreamCapabilityError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamCapabilityError';
  }
}

export class SchemaValidationError extends PipelineError {
  readonly kind = 'SchemaValidationError';
  private readonly problems: string[];

  constructor(message: string, problems: string[] = [], usage?: UsageCounters) {
    super(message);
    this.name = 'SchemaValidationError';
    this.problems = problems;
    this.usage = usage;
  }

  override get issues(): string[] {
    return this.problems;
  }
}

export class CalculationError extends PipelineError {
  readonly kind = 'CalculationError';

  constructor(message: string) {
    super(message);
    this.name = 'CalculationError';
  }
}

export class ConsistencyContradictionError extends PipelineError {
  readonly kind = 'ConsistencyContradiction';

  constructor(readonly report: ValidationReport) {
    const contradictions = report.findings.filter((f) => f.severity === 'contradiction');
    super(
      `${contradictions.length} consistency contradiction(s): ` +
      contradictions.map((f) => f.check).join(', ')
    );
    this.name = 'ConsistencyContradictionError';
  }

  override get issues(): string[] {
    return this.report.findings
      .filter((f) => f.severity === 'contradiction')
      .map((f) => f.message);
  }
}

export class StageTimeoutError extends PipelineError {
  readonly kind = 'StageTimeout';

  constructor(readonly stage: StageName, readonly timeoutMs: number) {
    super(`Stage "${stage}" exceeded its ${timeoutMs}ms limit`);
    this.name = 'StageTimeoutError';
  }
}

export class InternalStageError extends PipelineError {
  readonly kind = 'InternalError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InternalStageError';
  }
}

export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new InternalStageError(message, { cause: error });
}

export type RequestErrorCode =
  | 'INVALID_SUBJECT'
  | 'INVALID_OPTION'
  | 'UNKNOWN_SUBJECT'
  | 'NO_SOURCE_DOCUMENT';

// Raised before a run exists.
export class RequestError extends Error {
  constructor(readonly code: RequestErrorCode, message: string) {
    super(message);
    this.name = 'RequestError';
  }
}
