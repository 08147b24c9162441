import { CalculationError } from '../control-plane/errors.js';
import type { CalculatedMetrics, ExtractedFacts } from './schemas.js';

type Figure = number | null;

function divide(numerator: Figure, denominator: Figure): Figure {
  if (numerator === null || denominator === null || denominator === 0) return null;
  return numerator / denominator;
}

// P/E on a loss, ROE on negative equity
function divideByPositive(numerator: Figure, denominator: Figure): Figure {
  if (denominator === null || denominator <= 0) return null;
  return divide(numerator, denominator);
}

function multiply(a: Figure, b: Figure): Figure {
  return a === null || b === null ? null : a * b;
}

function add(a: Figure, b: Figure): Figure {
  return a === null || b === null ? null : a + b;
}

function subtract(a: Figure, b: Figure): Figure {
  return a === null || b === null ? null : a - b;
}

function abs(a: Figure): Figure {
  return a === null ? null : Math.abs(a);
}

function pct(ratio: Figure): Figure {
  return ratio === null ? null : ratio * 100;
}

export function calculateMetrics(facts: ExtractedFacts, price: Figure): CalculatedMetrics {
  const derived: string[] = [];
  const revenue = facts.revenue.current;

  let sharesOutstanding = facts.sharesOutstanding;
  if (sharesOutstanding === null) {
    sharesOutstanding = divideByPositive(facts.netIncome, facts.eps);
    if (sharesOutstanding !== null) derived.push('sharesOutstanding');
  }

  let bookValuePerShare = facts.bookValuePerShare;
  if (bookValuePerShare === null) {
    bookValuePerShare = divideByPositive(facts.shareholdersEquity, sharesOutstanding);
    if (bookValuePerShare !== null) derived.push('bookValuePerShare');
  }

  const marketCap = multiply(price, sharesOutstanding);
  const enterpriseValue = subtract(add(marketCap, facts.totalDebt), facts.cash);
  const derivedFreeCashFlow = subtract(facts.operatingCashFlow, abs(facts.capitalExpenditures));

  const metrics: CalculatedMetrics = {
    price,
    sharesOutstanding,
    marketCap,
    bookValuePerShare,
    peRatio: divideByPositive(price, facts.eps),
    pbRatio: divideByPositive(price, bookValuePerShare),
    psRatio: divideByPositive(marketCap, revenue),
    enterpriseValue,
    evEbitda: divideByPositive(enterpriseValue, facts.ebitda),
    fcfYieldPct: pct(divideByPositive(facts.freeCashFlow, marketCap)),

    revenueGrowthPct: pct(divideByPositive(subtract(revenue, facts.revenue.previous), facts.revenue.previous)),
    netIncomeGrowthPct: pct(
      divideByPositive(subtract(facts.netIncome, facts.netIncomePrevious), facts.netIncomePrevious)
    ),

    roePct: pct(divideByPositive(facts.netIncome, facts.shareholdersEquity)),
    roaPct: pct(divideByPositive(facts.netIncome, facts.totalAssets)),
    debtToEquity: divideByPositive(facts.totalDebt, facts.shareholdersEquity),
    currentRatio: divideByPositive(facts.currentAssets, facts.currentLiabilities),
    workingCapital: subtract(facts.currentAssets, facts.currentLiabilities),
    operatingMarginPct: pct(divideByPositive(facts.operatingIncome, revenue)),
    netMarginPct: pct(divideByPositive(facts.netIncome, revenue)),
    capexPctRevenue: pct(divideByPositive(abs(facts.capitalExpenditures), revenue)),
    payoutRatioPct: pct(divideByPositive(abs(facts.dividendsPaid), facts.netIncome)),
    fcfCoverage: divide(facts.freeCashFlow, abs(facts.dividendsPaid)),
    cashPerShare: divideByPositive(facts.cash, sharesOutstanding),
    debtToAssets: divideByPositive(facts.totalDebt, facts.totalAssets),
    quickRatio: divideByPositive(add(facts.cash, facts.accountsReceivable), facts.currentLiabilities),
    grossMarginPct: pct(divideByPositive(subtract(revenue, facts.cogs), revenue)),
    interestCoverage: divideByPositive(facts.operatingIncome, facts.interestExpense),
    derivedFreeCashFlow,

    segments: facts.segments.map((segment) => ({
      name: segment.name,
      revenue: segment.revenue,
      operatingIncome: segment.operatingIncome,
      revenueSharePct: pct(divideByPositive(segment.revenue, revenue)),
      operatingIncomeSharePct: pct(divide(segment.operatingIncome, facts.operatingIncome)),
    })),
    otherIncome: facts.otherIncome.map((line) => ({
      label: line.label,
      amount: line.amount,
      netIncomeSharePct: pct(divide(line.amount, facts.netIncome)),
    })),
    derived,
  };

  assertFinite(metrics);
  return metrics;
}

function assertFinite(metrics: CalculatedMetrics): void {
  const bad: string[] = [];
  const check = (path: string, value: unknown) => {
    if (typeof value === 'number' && !Number.isFinite(value)) bad.push(path);
  };

  for (const [name, value] of Object.entries(metrics)) {
    check(name, value);
  }
  metrics.segments.forEach((s, i) => {
    check(`segments[${i}].revenueSharePct`, s.revenueSharePct);
    check(`segments[${i}].operatingIncomeSharePct`, s.operatingIncomeSharePct);
  });
  metrics.otherIncome.forEach((l, i) => check(`otherIncome[${i}].netIncomeSharePct`, l.netIncomeSharePct));

  if (bad.length > 0) {
    throw new CalculationError(`Non-finite metric values: ${bad.join(', ')}`);
  }
}
