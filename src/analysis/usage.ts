import { CAPABILITY_PRICING } from '../config/capabilities.js';
import type { CapabilityId } from '../config/capabilities.js';
import type { StageResult } from '../ledger/types.js';
import type { UsageCounters, UsageSummary } from './schemas.js';

export interface TokenCounts {
  promptTokens: number;
  completionTokens: number;
  totalTokens?: number;
}

export function emptyUsage(): UsageCounters {
  return {
    capability: null,
    calls: 0,
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    costUsd: 0,
  };
}

export function estimateCostUsd(capability: CapabilityId, tokens: TokenCounts): number {
  const price = CAPABILITY_PRICING[capability];
  const cost =
    (tokens.promptTokens / 1_000_000) * price.prompt +
    (tokens.completionTokens / 1_000_000) * price.completion;
  return Math.round(cost * 1_000_000) / 1_000_000;
}

export function usageFromCall(capability: CapabilityId, tokens: TokenCounts): UsageCounters {
  return {
    capability,
    calls: 1,
    promptTokens: tokens.promptTokens,
    completionTokens: tokens.completionTokens,
    totalTokens: tokens.totalTokens ?? tokens.promptTokens + tokens.completionTokens,
    costUsd: estimateCostUsd(capability, tokens),
  };
}

export function addUsage(a: UsageCounters, b: UsageCounters): UsageCounters {
  return {
    capability: a.capability ?? b.capability,
    calls: a.calls + b.calls,
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
    costUsd: Math.round((a.costUsd + b.costUsd) * 1_000_000) / 1_000_000,
  };
}

// total.capability is null when stages used different models
export function summarizeUsage(results: readonly StageResult[]): UsageSummary {
  const byStage = results.map((r) => ({ stage: r.stage, usage: { ...r.usage } }));
  const used = byStage.filter((s) => s.usage.calls > 0).map((s) => s.usage);
  const models = new Set(used.map((u) => u.capability));

  let total = emptyUsage();
  for (const usage of used) {
    total = addUsage(total, usage);
  }
  total.capability = models.size === 1 ? used[0]?.capability ?? null : null;

  return { byStage, total };
}
