import { SchemaValidationError, UpstreamCapabilityError } from '../control-plane/errors.js';
import type { CapabilityId } from '../config/capabilities.js';
import type { Capability } from '../tools/capability.js';
import { ANALYST_SYSTEM_PROMPT } from './extraction.js';
import { InvestorAnalysisSchema } from './schemas.js';
import type {
  CalculatedMetrics,
  ExtractedFacts,
  InvestorAnalysis,
  UsageCounters,
  ValidationReport,
} from './schemas.js';
import { parseJsonPayload, validatePayload } from './schema-validator.js';
import { usageFromCall } from './usage.js';

const FIGURE_TOLERANCE = 0.005;

const ANALYSIS_INSTRUCTIONS = `Write an investor-focused analysis of the company from the extracted data and calculated metrics below.

Return ONLY a JSON object with these keys:
- companyType: "operating" | "holding" | "mixed"
- outlook: "positive" | "neutral" | "negative"
- investmentTrend: "increasing" | "stable" | "decreasing" | "unknown"
- investorSummary: string
- growthAreas, lossCausingAreas, initiatives, redFlags: [string]
- dividend: { "strategy": string | null, "commentary": string | null }
- segmentCommentary: [{ "segment": string, "revenue": number | null, "commentary": string }]
- otherIncomeCommentary: [{ "label": string, "amount": number | null, "commentary": string }]

Rules:
1. Only discuss segments and other-income lines that appear in the extracted data, using their exact names.
2. Any revenue or amount you cite must be copied from the extracted data. Never split a total into parts.
3. Treat null values as unknown; do not estimate them.`;

export interface AnalysisInput {
  facts: ExtractedFacts;
  metrics: CalculatedMetrics;
  validation: ValidationReport;
}

export function buildAnalysisPrompt(input: AnalysisInput): string {
  const notes: string[] = [];
  if (input.facts.segments.length === 0) {
    notes.push('The statements contain no segment breakdown: return "segmentCommentary": [].');
  }
  if (input.facts.otherIncome.length === 0) {
    notes.push('The statements itemize no other income: return "otherIncomeCommentary": [].');
  }
  const findings = input.validation.findings.map((f) => `- [${f.severity}] ${f.message}`);

  return [
    ANALYSIS_INSTRUCTIONS,
    ...(notes.length > 0 ? ['', ...notes] : []),
    '',
    'Extracted data:',
    JSON.stringify(input.facts, null, 2),
    '',
    'Calculated metrics:',
    JSON.stringify(input.metrics, null, 2),
    '',
    'Consistency findings:',
    findings.length > 0 ? findings.join('\n') : '- none',
  ].join('\n');
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

function sameFigure(cited: number, extracted: number | null): boolean {
  if (extracted === null) return false;
  if (extracted === 0) return cited === 0;
  return Math.abs(cited - extracted) / Math.abs(extracted) <= FIGURE_TOLERANCE;
}

export function findUngroundedFigures(analysis: InvestorAnalysis, facts: ExtractedFacts): string[] {
  const issues: string[] = [];

  const segments = new Map(facts.segments.map((s) => [normalizeName(s.name), s]));
  for (const entry of analysis.segmentCommentary) {
    const segment = segments.get(normalizeName(entry.segment));
    if (!segment) {
      issues.push(`segmentCommentary: "${entry.segment}" is not a segment in the extracted statements`);
    } else if (entry.revenue !== null && !sameFigure(entry.revenue, segment.revenue)) {
      issues.push(
        `segmentCommentary: revenue ${entry.revenue} for "${entry.segment}" ` +
        `does not match the extracted ${segment.revenue ?? 'unknown'}`
      );
    }
  }

  const lines = new Map(facts.otherIncome.map((l) => [normalizeName(l.label), l]));
  for (const entry of analysis.otherIncomeCommentary) {
    const line = lines.get(normalizeName(entry.label));
    if (!line) {
      issues.push(`otherIncomeCommentary: "${entry.label}" is not an itemized line in the extracted statements`);
    } else if (entry.amount !== null && !sameFigure(entry.amount, line.amount)) {
      issues.push(
        `otherIncomeCommentary: amount ${entry.amount} for "${entry.label}" ` +
        `does not match the extracted ${line.amount ?? 'unknown'}`
      );
    }
  }

  return issues;
}

export interface AnalysisOutcome {
  analysis: InvestorAnalysis;
  usage: UsageCounters;
}

export async function analyzeFacts(
  capability: Capability,
  capabilityId: CapabilityId,
  input: AnalysisInput,
  signal?: AbortSignal
): Promise<AnalysisOutcome> {
  const response = await capability
    .invoke({
      capability: capabilityId,
      system: ANALYST_SYSTEM_PROMPT,
      prompt: buildAnalysisPrompt(input),
      signal,
    })
    .catch((error: unknown) => {
      if (error instanceof UpstreamCapabilityError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamCapabilityError(`analysis via ${capabilityId} failed: ${message}`, { cause: error });
    });

  const usage = usageFromCall(capabilityId, response.tokens);

  const json = parseJsonPayload(response.content, 'analysis');
  if (!json.ok) {
    json.error.usage = usage;
    throw json.error;
  }

  const parsed = validatePayload(InvestorAnalysisSchema, json.value, 'analysis');
  if (!parsed.ok) {
    throw new SchemaValidationError(parsed.error.message, parsed.error.issues, usage);
  }

  const ungrounded = findUngroundedFigures(parsed.value, input.facts);
  if (ungrounded.length > 0) {
    throw new SchemaValidationError(
      'analysis: narrative cites breakdowns absent from the extracted statements',
      ungrounded,
      usage
    );
  }

  return { analysis: parsed.value, usage };
}
