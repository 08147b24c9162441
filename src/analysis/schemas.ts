import { z } from 'zod';
import { CapabilityIdSchema } from '../config/capabilities.js';
import { STAGES } from '../control-plane/stages.js';

const UNKNOWN_MARKERS = new Set(['unknown', 'n/a', 'na', 'null', 'none', '']);

function isUnknownMarker(value: unknown): boolean {
  return typeof value === 'string' && UNKNOWN_MARKERS.has(value.trim().toLowerCase());
}

// "1,200" is rejected, not parsed.
function fact() {
  return z
    .preprocess((v) => (isUnknownMarker(v) ? null : v), z.number().finite().nullable())
    .default(null);
}

function text() {
  return z
    .preprocess((v) => {
      if (isUnknownMarker(v)) return null;
      if (typeof v === 'number') return String(v);
      return v;
    }, z.string().nullable())
    .default(null);
}

function list<T extends z.ZodTypeAny>(item: T) {
  return z.array(item).default([]);
}

// ── Extract ─────────────────────────────────────────────────────────

export const SegmentSchema = z.object({
  name: z.string().trim().min(1),
  revenue: fact(),
  operatingIncome: fact(),
});

export const OtherIncomeLineSchema = z.object({
  label: z.string().trim().min(1),
  amount: fact(),
});

export const BusinessLineSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string(),
});

const RevenueSchema = z.preprocess(
  (v) => (typeof v === 'number' ? { current: v, previous: null } : v),
  z.object({ current: fact(), previous: fact() })
);

export const ExtractedFactsSchema = z.object({
  companyName: text(),
  fiscalYear: text(),
  periodEnd: text(),
  currency: text(),

  revenue: RevenueSchema,
  netIncome: fact(),
  netIncomePrevious: fact(),
  eps: fact(),
  sharesOutstanding: fact(),
  bookValuePerShare: fact(),

  shareholdersEquity: fact(),
  totalAssets: fact(),
  totalLiabilities: fact(),
  currentAssets: fact(),
  currentLiabilities: fact(),
  cash: fact(),
  totalDebt: fact(),
  accountsReceivable: fact(),

  cogs: fact(),
  operatingIncome: fact(),
  interestExpense: fact(),
  ebitda: fact(),

  operatingCashFlow: fact(),
  capitalExpenditures: fact(),
  freeCashFlow: fact(),
  dividendsPaid: fact(),
  beginningCash: fact(),
  netChangeCash: fact(),
  endingCash: fact(),
  cashFlowNetIncome: fact(),

  segments: z.array(SegmentSchema),
  otherIncome: z.array(OtherIncomeLineSchema),
  businessModel: list(BusinessLineSchema),
  investorStatements: list(z.string()),
});

export type ExtractedFacts = z.infer<typeof ExtractedFactsSchema>;
export type Segment = z.infer<typeof SegmentSchema>;

// ── Calculate ───────────────────────────────────────────────────────

const metric = z.number().nullable();

export const SegmentCompositionSchema = z.object({
  name: z.string(),
  revenue: metric,
  operatingIncome: metric,
  revenueSharePct: metric,
  operatingIncomeSharePct: metric,
});

export const OtherIncomeCompositionSchema = z.object({
  label: z.string(),
  amount: metric,
  netIncomeSharePct: metric,
});

export const CalculatedMetricsSchema = z.object({
  price: metric,
  sharesOutstanding: metric,
  marketCap: metric,
  bookValuePerShare: metric,
  peRatio: metric,
  pbRatio: metric,
  psRatio: metric,
  enterpriseValue: metric,
  evEbitda: metric,
  fcfYieldPct: metric,
  revenueGrowthPct: metric,
  netIncomeGrowthPct: metric,
  roePct: metric,
  roaPct: metric,
  debtToEquity: metric,
  currentRatio: metric,
  workingCapital: metric,
  operatingMarginPct: metric,
  netMarginPct: metric,
  capexPctRevenue: metric,
  payoutRatioPct: metric,
  fcfCoverage: metric,
  cashPerShare: metric,
  debtToAssets: metric,
  quickRatio: metric,
  grossMarginPct: metric,
  interestCoverage: metric,
  derivedFreeCashFlow: metric,
  segments: z.array(SegmentCompositionSchema),
  otherIncome: z.array(OtherIncomeCompositionSchema),
  derived: z.array(z.string()),
});

export type CalculatedMetrics = z.infer<typeof CalculatedMetricsSchema>;

// ── Validate ────────────────────────────────────────────────────────

export const FindingSeveritySchema = z.enum(['warning', 'contradiction']);
export type FindingSeverity = z.infer<typeof FindingSeveritySchema>;

export const FindingSchema = z.object({
  check: z.string(),
  severity: FindingSeveritySchema,
  message: z.string(),
  expected: metric,
  actual: metric,
  difference: metric,
});

export type Finding = z.infer<typeof FindingSchema>;

export const ValidationReportSchema = z.object({
  findings: z.array(FindingSchema),
  skipped: z.array(z.string()),
  warnings: z.number().int().min(0),
  contradictions: z.number().int().min(0),
});

export type ValidationReport = z.infer<typeof ValidationReportSchema>;

// ── Analyze ─────────────────────────────────────────────────────────

export const InvestorAnalysisSchema = z.object({
  companyType: z.enum(['operating', 'holding', 'mixed']),
  outlook: z.enum(['positive', 'neutral', 'negative']),
  investmentTrend: z.enum(['increasing', 'stable', 'decreasing', 'unknown']).default('unknown'),
  investorSummary: z.string().trim().min(1),
  growthAreas: list(z.string()),
  lossCausingAreas: list(z.string()),
  initiatives: list(z.string()),
  redFlags: list(z.string()),
  dividend: z
    .object({ strategy: text(), commentary: text() })
    .default({ strategy: null, commentary: null }),
  segmentCommentary: list(
    z.object({ segment: z.string().trim().min(1), revenue: fact(), commentary: z.string() })
  ),
  otherIncomeCommentary: list(
    z.object({ label: z.string().trim().min(1), amount: fact(), commentary: z.string() })
  ),
});

export type InvestorAnalysis = z.infer<typeof InvestorAnalysisSchema>;

// ── Usage ───────────────────────────────────────────────────────────

export const UsageCountersSchema = z.object({
  capability: CapabilityIdSchema.nullable(),
  calls: z.number().int().min(0),
  promptTokens: z.number().int().min(0),
  completionTokens: z.number().int().min(0),
  totalTokens: z.number().int().min(0),
  costUsd: z.number().min(0),
});

export type UsageCounters = z.infer<typeof UsageCountersSchema>;

export const UsageSummarySchema = z.object({
  byStage: z.array(z.object({ stage: z.enum(STAGES), usage: UsageCountersSchema })),
  total: UsageCountersSchema,
});

export type UsageSummary = z.infer<typeof UsageSummarySchema>;

// ── Format ──────────────────────────────────────────────────────────

export const FinalReportSchema = z.object({
  title: z.string(),
  markdown: z.string(),
  findings: z.array(FindingSchema),
  usage: UsageSummarySchema,
  generatedAt: z.string(),
});

export type FinalReport = z.infer<typeof FinalReportSchema>;
