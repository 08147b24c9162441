import { z } from 'zod';

export const CAPABILITY_IDS = [
  'openai/gpt-4o-mini',
  'openai/gpt-4o',
  'google/gemini-3-flash-preview',
  'google/gemini-3-pro-preview',
] as const;

export const CapabilityIdSchema = z.enum(CAPABILITY_IDS);
export type CapabilityId = z.infer<typeof CapabilityIdSchema>;

export const CapabilityChoiceSchema = z.union([z.literal('auto'), CapabilityIdSchema]);
export type CapabilityChoice = z.infer<typeof CapabilityChoiceSchema>;

export type CapabilityRole = 'extraction' | 'analysis';

export interface CapabilityDefaults {
  extraction: CapabilityId;
  analysis: CapabilityId;
}

export const DEFAULT_CAPABILITIES: CapabilityDefaults = {
  extraction: 'openai/gpt-4o-mini',
  analysis: 'openai/gpt-4o',
};

// USD per million tokens
export const CAPABILITY_PRICING: Record<CapabilityId, { prompt: number; completion: number }> = {
  'openai/gpt-4o-mini': { prompt: 0.15, completion: 0.6 },
  'openai/gpt-4o': { prompt: 2.5, completion: 10 },
  'google/gemini-3-flash-preview': { prompt: 0.5, completion: 3 },
  'google/gemini-3-pro-preview': { prompt: 2, completion: 12 },
};

export function resolveCapability(
  choice: CapabilityChoice,
  role: CapabilityRole,
  defaults: CapabilityDefaults
): CapabilityId {
  return choice === 'auto' ? defaults[role] : choice;
}
