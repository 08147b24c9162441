import { describe, it, expect } from 'vitest';
import { calculateMetrics } from '../analysis/calculator.js';
import { CalculationError } from '../control-plane/errors.js';
import { sampleFacts } from './helpers/fakes.js';

describe('calculateMetrics', () => {
  it('derives shares outstanding from net income / EPS when not reported', () => {
    const metrics = calculateMetrics(sampleFacts(), 70);
    expect(metrics.sharesOutstanding).toBeCloseTo(42_857_142.857, 2);
    expect(metrics.derived).toEqual(['sharesOutstanding', 'bookValuePerShare']);
  });

  it('prefers reported shares and book value', () => {
    const metrics = calculateMetrics(sampleFacts({ sharesOutstanding: 40_000_000, bookValuePerShare: 16 }), 70);
    expect(metrics.sharesOutstanding).toBe(40_000_000);
    expect(metrics.bookValuePerShare).toBe(16);
    expect(metrics.derived).toEqual([]);
  });

  it('computes valuation metrics from price', () => {
    const metrics = calculateMetrics(sampleFacts(), 70);
    expect(metrics.price).toBe(70);
    expect(metrics.marketCap).toBeCloseTo(3_000_000_000, 0);
    expect(metrics.bookValuePerShare).toBeCloseTo(14, 6);
    expect(metrics.peRatio).toBe(20);
    expect(metrics.pbRatio).toBeCloseTo(5, 6);
    expect(metrics.psRatio).toBeCloseTo(3, 6);
    expect(metrics.enterpriseValue).toBeCloseTo(3_100_000_000, 0);
    expect(metrics.evEbitda).toBeCloseTo(10.3333, 3);
    expect(metrics.fcfYieldPct).toBeCloseTo(5, 6);
  });

  it('computes growth, profitability and health metrics', () => {
    const metrics = calculateMetrics(sampleFacts(), 70);
    expect(metrics.revenueGrowthPct).toBeCloseTo(25, 9);
    expect(metrics.netIncomeGrowthPct).toBeCloseTo(25, 9);
    expect(metrics.roePct).toBeCloseTo(25, 9);
    expect(metrics.roaPct).toBeCloseTo(10, 9);
    expect(metrics.debtToEquity).toBeCloseTo(0.5, 9);
    expect(metrics.currentRatio).toBe(2);
    expect(metrics.workingCapital).toBe(250_000_000);
    expect(metrics.operatingMarginPct).toBeCloseTo(22, 9);
    expect(metrics.netMarginPct).toBeCloseTo(15, 9);
    expect(metrics.grossMarginPct).toBeCloseTo(40, 9);
    expect(metrics.capexPctRevenue).toBeCloseTo(5, 9);
    expect(metrics.payoutRatioPct).toBeCloseTo(40, 9);
    expect(metrics.fcfCoverage).toBe(2.5);
    expect(metrics.quickRatio).toBe(1.2);
    expect(metrics.debtToAssets).toBeCloseTo(0.2, 9);
    expect(metrics.interestCoverage).toBe(11);
    expect(metrics.derivedFreeCashFlow).toBe(150_000_000);
  });

  it('computes segment and other-income composition', () => {
    const metrics = calculateMetrics(sampleFacts(), 70);
    expect(metrics.segments).toHaveLength(2);
    expect(metrics.segments[0]?.name).toBe('Cloud');
    expect(metrics.segments[0]?.revenueSharePct).toBeCloseTo(60, 9);
    expect(metrics.segments[0]?.operatingIncomeSharePct).toBeCloseTo(68.1818, 3);
    expect(metrics.segments[1]?.revenueSharePct).toBeCloseTo(40, 9);
    expect(metrics.otherIncome[0]?.netIncomeSharePct).toBeCloseTo(6.6667, 3);
  });

  it('leaves price-dependent metrics unknown without a price', () => {
    const metrics = calculateMetrics(sampleFacts(), null);
    expect(metrics.marketCap).toBeNull();
    expect(metrics.peRatio).toBeNull();
    expect(metrics.pbRatio).toBeNull();
    expect(metrics.psRatio).toBeNull();
    expect(metrics.enterpriseValue).toBeNull();
    expect(metrics.evEbitda).toBeNull();
    expect(metrics.fcfYieldPct).toBeNull();
    expect(metrics.roePct).toBeCloseTo(25, 9);
  });

  it('returns null for zero or unknown denominators', () => {
    const metrics = calculateMetrics(
      sampleFacts({ eps: 0, currentLiabilities: 0, revenue: { current: null, previous: 800_000_000 } }),
      70
    );
    expect(metrics.sharesOutstanding).toBeNull();
    expect(metrics.marketCap).toBeNull();
    expect(metrics.currentRatio).toBeNull();
    expect(metrics.quickRatio).toBeNull();
    expect(metrics.revenueGrowthPct).toBeNull();
    expect(metrics.netMarginPct).toBeNull();
    expect(metrics.segments[0]?.revenueSharePct).toBeNull();
    expect(metrics.derived).toEqual([]);
  });

  it('treats ratios against a negative base as unknown', () => {
    const metrics = calculateMetrics(sampleFacts({ shareholdersEquity: -50_000_000, eps: -1.2 }), 70);
    expect(metrics.roePct).toBeNull();
    expect(metrics.debtToEquity).toBeNull();
    expect(metrics.peRatio).toBeNull();
  });

  it('does not round results', () => {
    const metrics = calculateMetrics(sampleFacts({ netIncome: 100_000_000, eps: 3 }), 10);
    expect(metrics.sharesOutstanding).toBe(100_000_000 / 3);
  });

  it('raises CalculationError for non-finite results', () => {
    const facts = sampleFacts({ revenue: { current: 1e308, previous: 1e-308 } });
    expect(() => calculateMetrics(facts, 70)).toThrow(CalculationError);
    expect(() => calculateMetrics(facts, 70)).toThrow(/revenueGrowthPct/);
  });
});
