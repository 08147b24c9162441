import { z } from 'zod';
import { CapabilityIdSchema } from '../config/capabilities.js';
import { STAGES } from '../control-plane/stages.js';
import {
  CalculatedMetricsSchema,
  ExtractedFactsSchema,
  FinalReportSchema,
  InvestorAnalysisSchema,
  UsageCountersSchema,
  UsageSummarySchema,
  ValidationReportSchema,
} from '../analysis/schemas.js';

export const AnalysisKeySchema = z.object({
  subject: z.string().min(1),
  extraction: CapabilityIdSchema,
  analysis: CapabilityIdSchema,
});

export const StageErrorSchema = z.object({
  kind: z.enum([
    'UpstreamCapabilityError',
    'SchemaValidationError',
    'CalculationError',
    'ConsistencyContradiction',
    'StageTimeout',
    'InternalError',
  ]),
  message: z.string(),
  issues: z.array(z.string()).optional(),
});

export const StageOutputSchema = z.discriminatedUnion('stage', [
  z.object({ stage: z.literal('extract'), data: ExtractedFactsSchema }),
  z.object({ stage: z.literal('calculate'), data: CalculatedMetricsSchema }),
  z.object({ stage: z.literal('validate'), data: ValidationReportSchema }),
  z.object({ stage: z.literal('analyze'), data: InvestorAnalysisSchema }),
  z.object({ stage: z.literal('format'), data: FinalReportSchema }),
]);

export const StageResultSchema = z.object({
  stage: z.enum(STAGES),
  ordinal: z.number().int().min(1).max(STAGES.length),
  output: StageOutputSchema.nullable(),
  error: StageErrorSchema.nullable(),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number().min(0),
  usage: UsageCountersSchema,
});

export const RunStatusSchema = z.enum(['pending', 'running', 'complete', 'failed']);

export const PipelineStateSchema = z.object({
  runId: z.string(),
  key: AnalysisKeySchema,
  status: RunStatusSchema,
  results: z.array(StageResultSchema),
  report: FinalReportSchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const CacheEntrySchema = z.object({
  version: z.literal(1),
  keyId: z.string(),
  storedAt: z.string(),
  state: PipelineStateSchema,
  usage: UsageSummarySchema,
});
