import type { z } from 'zod';
import type {
  AnalysisKeySchema,
  CacheEntrySchema,
  PipelineStateSchema,
  RunStatusSchema,
  StageErrorSchema,
  StageOutputSchema,
  StageResultSchema,
} from './schema.js';

export type AnalysisKey = z.infer<typeof AnalysisKeySchema>;
export type StageError = z.infer<typeof StageErrorSchema>;
export type StageOutput = z.infer<typeof StageOutputSchema>;
export type StageResult = z.infer<typeof StageResultSchema>;
export type RunStatus = z.infer<typeof RunStatusSchema>;
export type PipelineState = z.infer<typeof PipelineStateSchema>;
export type CacheEntry = z.infer<typeof CacheEntrySchema>;

