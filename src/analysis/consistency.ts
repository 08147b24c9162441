import type { ConsistencyPolicy } from '../config/settings.js';
import type {
  CalculatedMetrics,
  ExtractedFacts,
  Finding,
  FindingSeverity,
  ValidationReport,
} from './schemas.js';

type Figure = number | null;

interface Comparison {
  check: string;
  expected: number;
  actual: number;
  base: number;
  // never escalates past a warning
  ceiling: FindingSeverity;
  describe: (difference: number) => string;
}

function classify(cmp: Comparison, policy: ConsistencyPolicy): Finding | null {
  const difference = Math.abs(cmp.actual - cmp.expected);
  let severity: FindingSeverity | null;

  if (cmp.base === 0) {
    severity = difference <= policy.absoluteFloor ? null : cmp.ceiling;
  } else {
    const relative = difference / Math.abs(cmp.base);
    if (relative <= policy.warningTolerance) severity = null;
    else if (relative <= policy.contradictionTolerance) severity = 'warning';
    else severity = cmp.ceiling;
  }

  if (severity === null) return null;
  return {
    check: cmp.check,
    severity,
    message: cmp.describe(difference),
    expected: cmp.expected,
    actual: cmp.actual,
    difference,
  };
}

const CRITICAL_FACTS: Array<[string, (f: ExtractedFacts) => Figure]> = [
  ['revenue', (f) => f.revenue.current],
  ['netIncome', (f) => f.netIncome],
  ['totalAssets', (f) => f.totalAssets],
  ['totalLiabilities', (f) => f.totalLiabilities],
  ['shareholdersEquity', (f) => f.shareholdersEquity],
  ['operatingCashFlow', (f) => f.operatingCashFlow],
  ['freeCashFlow', (f) => f.freeCashFlow],
];

export function checkConsistency(
  facts: ExtractedFacts,
  metrics: CalculatedMetrics,
  policy: ConsistencyPolicy
): ValidationReport {
  const findings: Finding[] = [];
  const skipped: string[] = [];

  const missing = CRITICAL_FACTS.filter(([, read]) => read(facts) === null).map(([name]) => name);
  if (missing.length > 0) {
    findings.push({
      check: 'critical_facts',
      severity: 'warning',
      message: `Missing critical facts: ${missing.join(', ')}`,
      expected: null,
      actual: null,
      difference: null,
    });
  }

  const comparisons: Array<{ check: string; build: () => Comparison | null }> = [
    {
      check: 'balance_sheet',
      build: () => {
        const { totalAssets, totalLiabilities, shareholdersEquity } = facts;
        if (totalAssets === null || totalLiabilities === null || shareholdersEquity === null) return null;
        return {
          check: 'balance_sheet',
          expected: totalAssets - totalLiabilities,
          actual: shareholdersEquity,
          base: totalAssets,
          ceiling: 'contradiction',
          describe: (d) =>
            `Balance sheet does not balance: assets (${totalAssets}) - liabilities (${totalLiabilities}) ` +
            `!= equity (${shareholdersEquity}), difference ${d}`,
        };
      },
    },
    {
      check: 'cash_reconciliation',
      build: () => {
        const { beginningCash, netChangeCash, endingCash } = facts;
        if (beginningCash === null || netChangeCash === null || endingCash === null) return null;
        return {
          check: 'cash_reconciliation',
          expected: beginningCash + netChangeCash,
          actual: endingCash,
          base: beginningCash,
          ceiling: 'contradiction',
          describe: (d) =>
            `Cash flow does not reconcile: beginning (${beginningCash}) + net change (${netChangeCash}) ` +
            `!= ending (${endingCash}), difference ${d}`,
        };
      },
    },
    {
      check: 'free_cash_flow',
      build: () => {
        const { operatingCashFlow, capitalExpenditures, freeCashFlow } = facts;
        const expected = metrics.derivedFreeCashFlow;
        if (operatingCashFlow === null || freeCashFlow === null || expected === null) return null;
        return {
          check: 'free_cash_flow',
          expected,
          actual: freeCashFlow,
          base: operatingCashFlow,
          ceiling: 'contradiction',
          describe: (d) =>
            `Free cash flow mismatch: operating CF (${operatingCashFlow}) - |capex| (${Math.abs(capitalExpenditures ?? 0)}) ` +
            `= ${expected}, reported ${freeCashFlow}, difference ${d}`,
        };
      },
    },
    {
      check: 'net_income_statements',
      build: () => {
        const { netIncome, cashFlowNetIncome } = facts;
        if (netIncome === null || cashFlowNetIncome === null) return null;
        return {
          check: 'net_income_statements',
          expected: netIncome,
          actual: cashFlowNetIncome,
          base: netIncome,
          ceiling: 'warning',
          describe: (d) =>
            `Net income differs between income statement (${netIncome}) and cash flow statement ` +
            `(${cashFlowNetIncome}), difference ${d}`,
        };
      },
    },
    {
      check: 'shares_outstanding',
      build: () => {
        const { sharesOutstanding, netIncome, eps } = facts;
        if (sharesOutstanding === null || netIncome === null || eps === null || eps <= 0) return null;
        const implied = netIncome / eps;
        return {
          check: 'shares_outstanding',
          expected: implied,
          actual: sharesOutstanding,
          base: sharesOutstanding,
          ceiling: 'warning',
          describe: (d) =>
            `Reported shares outstanding (${sharesOutstanding}) differ from net income / EPS (${implied}), ` +
            `difference ${d}`,
        };
      },
    },
    {
      check: 'segment_revenue_total',
      build: () => {
        const total = facts.revenue.current;
        const reported = facts.segments.map((s) => s.revenue).filter((r): r is number => r !== null);
        if (total === null || reported.length === 0) return null;
        const sum = reported.reduce((acc, r) => acc + r, 0);
        // Segments below the total are normal (unallocated revenue); only an excess is suspicious.
        return {
          check: 'segment_revenue_total',
          expected: total,
          actual: Math.max(sum, total),
          base: total,
          ceiling: 'warning',
          describe: (d) => `Segment revenue (${sum}) exceeds reported total revenue (${total}) by ${d}`,
        };
      },
    },
  ];

  for (const { check, build } of comparisons) {
    const cmp = build();
    if (!cmp) {
      skipped.push(check);
      continue;
    }
    const finding = classify(cmp, policy);
    if (finding) findings.push(finding);
  }

  return {
    findings,
    skipped,
    warnings: findings.filter((f) => f.severity === 'warning').length,
    contradictions: findings.filter((f) => f.severity === 'contradiction').length,
  };
}
