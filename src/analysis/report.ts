import type { AnalysisKey } from '../ledger/types.js';
import type {
  CalculatedMetrics,
  ExtractedFacts,
  FinalReport,
  InvestorAnalysis,
  UsageSummary,
  ValidationReport,
} from './schemas.js';

type Figure = number | null;

const NA = 'N/A';

export function formatAmount(value: Figure): string {
  if (value === null) return NA;
  return value.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

export function formatRatio(value: Figure): string {
  if (value === null) return NA;
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatPercent(value: Figure): string {
  return value === null ? NA : `${formatRatio(value)}%`;
}

function orNA(value: string | null): string {
  return value === null || value.trim() === '' ? NA : value;
}

function bulletList(items: readonly string[], empty: string): string[] {
  return items.length > 0 ? items.map((item) => `- ${item}`) : [`- ${empty}`];
}

export interface ReportInput {
  key: AnalysisKey;
  facts: ExtractedFacts;
  metrics: CalculatedMetrics;
  validation: ValidationReport;
  analysis: InvestorAnalysis;
  usage: UsageSummary;
  generatedAt: string;
}

// All rounding happens here.
export function formatReport(input: ReportInput): FinalReport {
  const { key, facts, metrics, validation, analysis, usage } = input;

  const mark = (name: string, text: string) =>
    metrics.derived.includes(name) && text !== NA ? `${text} (derived)` : text;

  const title = `${facts.companyName ?? key.subject} (${key.subject}) Financial Analysis`;
  const lines: string[] = [`# ${title}`, ''];

  lines.push(
    '## Company Information',
    '',
    `- Company: ${orNA(facts.companyName)}`,
    `- Subject: ${key.subject}`,
    `- Fiscal Year: ${orNA(facts.fiscalYear)}`,
    `- Period End: ${orNA(facts.periodEnd)}`,
    `- Currency: ${orNA(facts.currency)}`,
    `- Company Type: ${analysis.companyType}`,
    `- Share Price: ${formatRatio(metrics.price)}`,
    ''
  );

  lines.push('## Business Model', '');
  lines.push(
    ...bulletList(
      facts.businessModel.map((line) => `**${line.name}**: ${line.description}`),
      'Not described in the statements'
    ),
    ''
  );

  lines.push('## Key Investor Statements', '');
  if (facts.investorStatements.length > 0) {
    for (const statement of facts.investorStatements) lines.push(`> ${statement}`, '');
  } else {
    lines.push('- None quoted', '');
  }

  lines.push(
    '## Growth',
    '',
    `- Revenue: ${formatAmount(facts.revenue.current)}`,
    `- Prior-Year Revenue: ${formatAmount(facts.revenue.previous)}`,
    `- Revenue Growth: ${formatPercent(metrics.revenueGrowthPct)}`,
    `- Net Income: ${formatAmount(facts.netIncome)}`,
    `- Prior-Year Net Income: ${formatAmount(facts.netIncomePrevious)}`,
    `- Net Income Growth: ${formatPercent(metrics.netIncomeGrowthPct)}`,
    ''
  );

  lines.push(
    '## Valuation',
    '',
    `- Shares Outstanding: ${mark('sharesOutstanding', formatAmount(metrics.sharesOutstanding))}`,
    `- Market Cap: ${formatAmount(metrics.marketCap)}`,
    `- Book Value per Share: ${mark('bookValuePerShare', formatRatio(metrics.bookValuePerShare))}`,
    `- P/E: ${formatRatio(metrics.peRatio)}`,
    `- P/B: ${formatRatio(metrics.pbRatio)}`,
    `- P/S: ${formatRatio(metrics.psRatio)}`,
    `- Enterprise Value: ${formatAmount(metrics.enterpriseValue)}`,
    `- EV/EBITDA: ${formatRatio(metrics.evEbitda)}`,
    `- FCF Yield: ${formatPercent(metrics.fcfYieldPct)}`,
    ''
  );

  lines.push(
    '## Financial Health',
    '',
    `- ROE: ${formatPercent(metrics.roePct)}`,
    `- ROA: ${formatPercent(metrics.roaPct)}`,
    `- Gross Margin: ${formatPercent(metrics.grossMarginPct)}`,
    `- Operating Margin: ${formatPercent(metrics.operatingMarginPct)}`,
    `- Net Margin: ${formatPercent(metrics.netMarginPct)}`,
    `- Debt/Equity: ${formatRatio(metrics.debtToEquity)}`,
    `- Debt/Assets: ${formatRatio(metrics.debtToAssets)}`,
    `- Current Ratio: ${formatRatio(metrics.currentRatio)}`,
    `- Quick Ratio: ${formatRatio(metrics.quickRatio)}`,
    `- Interest Coverage: ${formatRatio(metrics.interestCoverage)}`,
    `- Working Capital: ${formatAmount(metrics.workingCapital)}`,
    `- Cash per Share: ${formatRatio(metrics.cashPerShare)}`,
    `- Capex % of Revenue: ${formatPercent(metrics.capexPctRevenue)}`,
    `- Free Cash Flow (reported): ${formatAmount(facts.freeCashFlow)}`,
    `- Free Cash Flow: ${mark('derivedFreeCashFlow', formatAmount(metrics.derivedFreeCashFlow))}`,
    ''
  );

  lines.push('## Segment Composition', '');
  if (metrics.segments.length === 0) {
    lines.push('No segment breakdown reported.', '');
  } else {
    lines.push(
      '| Segment | Revenue | Share of Revenue | Operating Income | Share of Operating Income |',
      '|---|---:|---:|---:|---:|'
    );
    for (const s of metrics.segments) {
      lines.push(
        `| ${s.name} | ${formatAmount(s.revenue)} | ${formatPercent(s.revenueSharePct)} | ` +
        `${formatAmount(s.operatingIncome)} | ${formatPercent(s.operatingIncomeSharePct)} |`
      );
    }
    lines.push('');
    for (const c of analysis.segmentCommentary) lines.push(`- **${c.segment}**: ${c.commentary}`);
    if (analysis.segmentCommentary.length > 0) lines.push('');
  }

  lines.push('## Other Income Composition', '');
  if (metrics.otherIncome.length === 0) {
    lines.push('No other income itemized.', '');
  } else {
    lines.push('| Item | Amount | Share of Net Income |', '|---|---:|---:|');
    for (const o of metrics.otherIncome) {
      lines.push(`| ${o.label} | ${formatAmount(o.amount)} | ${formatPercent(o.netIncomeSharePct)} |`);
    }
    lines.push('');
    for (const c of analysis.otherIncomeCommentary) lines.push(`- **${c.label}**: ${c.commentary}`);
    if (analysis.otherIncomeCommentary.length > 0) lines.push('');
  }

  lines.push(
    '## Dividend Analysis',
    '',
    `- Dividends Paid: ${formatAmount(facts.dividendsPaid === null ? null : Math.abs(facts.dividendsPaid))}`,
    `- Payout Ratio: ${formatPercent(metrics.payoutRatioPct)}`,
    `- FCF Coverage: ${formatRatio(metrics.fcfCoverage)}`,
    `- Strategy: ${orNA(analysis.dividend.strategy)}`,
    `- Commentary: ${orNA(analysis.dividend.commentary)}`,
    ''
  );

  lines.push(
    '## Investor Summary',
    '',
    `- Outlook: ${analysis.outlook}`,
    `- Investment Trend: ${analysis.investmentTrend}`,
    '',
    analysis.investorSummary,
    '',
    '### Growth Areas',
    '',
    ...bulletList(analysis.growthAreas, 'None identified'),
    '',
    '### Loss-Causing Areas',
    '',
    ...bulletList(analysis.lossCausingAreas, 'None identified'),
    '',
    '### Initiatives',
    '',
    ...bulletList(analysis.initiatives, 'None identified'),
    '',
    '### Red Flags',
    '',
    ...bulletList(analysis.redFlags, 'None identified'),
    ''
  );

  const warnings = validation.findings.filter((f) => f.severity === 'warning');
  lines.push('## Consistency Findings', '');
  lines.push(...bulletList(warnings.map((f) => `[${f.check}] ${f.message}`), 'No inconsistencies found'));
  if (validation.skipped.length > 0) {
    lines.push(`- Skipped (missing inputs): ${validation.skipped.join(', ')}`);
  }
  lines.push('');

  lines.push(
    '## Usage',
    '',
    '| Stage | Model | Calls | Prompt Tokens | Completion Tokens | Cost (USD) |',
    '|---|---|---:|---:|---:|---:|'
  );
  const rows = [...usage.byStage, { stage: 'total', usage: usage.total }];
  for (const { stage, usage: u } of rows) {
    lines.push(
      `| ${stage} | ${u.capability ?? '-'} | ${u.calls} | ${formatAmount(u.promptTokens)} | ` +
      `${formatAmount(u.completionTokens)} | $${u.costUsd.toFixed(6)} |`
    );
  }

  return {
    title,
    markdown: lines.join('\n') + '\n',
    findings: warnings,
    usage,
    generatedAt: input.generatedAt,
  };
}
