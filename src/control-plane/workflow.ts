import { calculateMetrics } from '../analysis/calculator.js';
import { checkConsistency } from '../analysis/consistency.js';
import { extractFacts } from '../analysis/extraction.js';
import { analyzeFacts } from '../analysis/narrative.js';
import { formatReport } from '../analysis/report.js';
import { emptyUsage, summarizeUsage } from '../analysis/usage.js';
import type {
  CalculatedMetrics,
  ExtractedFacts,
  InvestorAnalysis,
  ValidationReport,
} from '../analysis/schemas.js';
import type { StageOutput } from '../ledger/types.js';
import { ConsistencyContradictionError, InternalStageError } from './errors.js';
import type { StageName } from './stages.js';
import type { RunContext, WorkflowStep } from './types.js';

function priorOutput(ctx: RunContext, stage: StageName): StageOutput {
  const output = ctx.results.find((r) => r.stage === stage)?.output;
  if (!output) throw new InternalStageError(`"${stage}" output is missing from the ledger`);
  return output;
}

function factsOf(ctx: RunContext): ExtractedFacts {
  const output = priorOutput(ctx, 'extract');
  if (output.stage !== 'extract') throw new InternalStageError('ledger holds no extracted facts');
  return output.data;
}

function metricsOf(ctx: RunContext): CalculatedMetrics {
  const output = priorOutput(ctx, 'calculate');
  if (output.stage !== 'calculate') throw new InternalStageError('ledger holds no calculated metrics');
  return output.data;
}

function validationOf(ctx: RunContext): ValidationReport {
  const output = priorOutput(ctx, 'validate');
  if (output.stage !== 'validate') throw new InternalStageError('ledger holds no validation report');
  return output.data;
}

function analysisOf(ctx: RunContext): InvestorAnalysis {
  const output = priorOutput(ctx, 'analyze');
  if (output.stage !== 'analyze') throw new InternalStageError('ledger holds no investor analysis');
  return output.data;
}

export function buildWorkflow(): WorkflowStep[] {
  return [
    {
      name: 'extract',
      execute: async (ctx, signal) => {
        const { facts, usage } = await extractFacts(ctx.capability, ctx.key.extraction, ctx.document, signal);
        return { output: { stage: 'extract', data: facts }, usage };
      },
    },
    {
      name: 'calculate',
      execute: async (ctx) => {
        const metrics = calculateMetrics(factsOf(ctx), ctx.document.price);
        return { output: { stage: 'calculate', data: metrics }, usage: emptyUsage() };
      },
    },
    {
      name: 'validate',
      execute: async (ctx) => {
        const report = checkConsistency(factsOf(ctx), metricsOf(ctx), ctx.settings.consistency);
        if (report.contradictions > 0) {
          throw new ConsistencyContradictionError(report);
        }
        return { output: { stage: 'validate', data: report }, usage: emptyUsage() };
      },
    },
    {
      name: 'analyze',
      execute: async (ctx, signal) => {
        const input = { facts: factsOf(ctx), metrics: metricsOf(ctx), validation: validationOf(ctx) };
        const { analysis, usage } = await analyzeFacts(ctx.capability, ctx.key.analysis, input, signal);
        return { output: { stage: 'analyze', data: analysis }, usage };
      },
    },
    {
      name: 'format',
      execute: async (ctx) => {
        const report = formatReport({
          key: ctx.key,
          facts: factsOf(ctx),
          metrics: metricsOf(ctx),
          validation: validationOf(ctx),
          analysis: analysisOf(ctx),
          usage: summarizeUsage(ctx.results),
          generatedAt: new Date().toISOString(),
        });
        return { output: { stage: 'format', data: report }, usage: emptyUsage() };
      },
    },
  ];
}
