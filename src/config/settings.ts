import { z } from 'zod';
import type { StageName } from '../control-plane/stages.js';
import { CapabilityIdSchema, DEFAULT_CAPABILITIES } from './capabilities.js';
import type { CapabilityDefaults } from './capabilities.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Relative-difference bands used by the consistency checker.
 *
 * A difference at or below `warningTolerance` passes, one at or below
 * `contradictionTolerance` is a warning, anything larger is a contradiction.
 * When the base of a comparison is zero, `absoluteFloor` replaces the
 * relative bands.
 */
export interface ConsistencyPolicy {
  warningTolerance: number;
  contradictionTolerance: number;
  absoluteFloor: number;
}

export const DEFAULT_CONSISTENCY_POLICY: ConsistencyPolicy = {
  warningTolerance: 0.01,
  contradictionTolerance: 0.05,
  absoluteFloor: 1000,
};

export interface PipelineSettings {
  defaults: CapabilityDefaults;
  timeouts: Record<StageName, number>;
  consistency: ConsistencyPolicy;
}

export interface AppSettings {
  apiKey: string | null;
  baseUrl: string;
  documentsDir: string;
  cacheDir: string;
  statesDir: string | null;
  cacheTtlMs: number | null;
  pipeline: PipelineSettings;
}

export function buildTimeouts(capabilityMs: number, stageMs: number): Record<StageName, number> {
  return {
    extract: capabilityMs,
    calculate: stageMs,
    validate: stageMs,
    analyze: capabilityMs,
    format: stageMs,
  };
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  defaults: DEFAULT_CAPABILITIES,
  timeouts: buildTimeouts(120_000, 10_000),
  consistency: DEFAULT_CONSISTENCY_POLICY,
};

const EnvShape = {
  OPENROUTER_API_KEY: z.string().min(1).optional(),
  LLM_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  EXTRACTION_MODEL: CapabilityIdSchema.default(DEFAULT_CAPABILITIES.extraction),
  ANALYSIS_MODEL: CapabilityIdSchema.default(DEFAULT_CAPABILITIES.analysis),
  FINLENS_DOCUMENTS_DIR: z.string().min(1).default('./documents'),
  FINLENS_CACHE_DIR: z.string().min(1).default('./.cache/results'),
  FINLENS_STATES_DIR: z.string().min(1).optional(),
  FINLENS_CACHE_TTL_HOURS: z.coerce.number().min(0).default(0),
  FINLENS_CAPABILITY_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  FINLENS_STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FINLENS_WARNING_TOLERANCE: z.coerce.number().min(0).default(DEFAULT_CONSISTENCY_POLICY.warningTolerance),
  FINLENS_CONTRADICTION_TOLERANCE: z.coerce
    .number()
    .min(0)
    .default(DEFAULT_CONSISTENCY_POLICY.contradictionTolerance),
};

const EnvSchema = z.object(EnvShape);

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvShape)) {
    const value = env[key]?.trim();
    if (value) raw[key] = value;
  }

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }

  const cfg = parsed.data;
  if (cfg.FINLENS_CONTRADICTION_TOLERANCE < cfg.FINLENS_WARNING_TOLERANCE) {
    throw new ConfigError(
      `FINLENS_CONTRADICTION_TOLERANCE (${cfg.FINLENS_CONTRADICTION_TOLERANCE}) ` +
      `must not be below FINLENS_WARNING_TOLERANCE (${cfg.FINLENS_WARNING_TOLERANCE})`
    );
  }

  return {
    apiKey: cfg.OPENROUTER_API_KEY ?? null,
    baseUrl: cfg.LLM_BASE_URL,
    documentsDir: cfg.FINLENS_DOCUMENTS_DIR,
    cacheDir: cfg.FINLENS_CACHE_DIR,
    statesDir: cfg.FINLENS_STATES_DIR ?? null,
    cacheTtlMs: cfg.FINLENS_CACHE_TTL_HOURS > 0 ? cfg.FINLENS_CACHE_TTL_HOURS * 3_600_000 : null,
    pipeline: {
      defaults: { extraction: cfg.EXTRACTION_MODEL, analysis: cfg.ANALYSIS_MODEL },
      timeouts: buildTimeouts(cfg.FINLENS_CAPABILITY_TIMEOUT_MS, cfg.FINLENS_STAGE_TIMEOUT_MS),
      consistency: {
        warningTolerance: cfg.FINLENS_WARNING_TOLERANCE,
        contradictionTolerance: cfg.FINLENS_CONTRADICTION_TOLERANCE,
        absoluteFloor: DEFAULT_CONSISTENCY_POLICY.absoluteFloor,
      },
    },
  };
}
