import { RequestError } from '../control-plane/errors.js';
import type { AnalysisRequest } from '../control-plane/types.js';
import { CapabilityChoiceSchema, resolveCapability } from '../config/capabilities.js';
import type { CapabilityChoice, CapabilityDefaults } from '../config/capabilities.js';
import { deepFreeze } from '../utils/freeze.js';
import type { AnalysisKey } from './types.js';

const SUBJECT_PATTERN = /^[A-Z0-9][A-Z0-9.-]{0,14}$/;

export function normalizeSubject(raw: string): string {
  const subject = raw.trim().toUpperCase();
  if (!SUBJECT_PATTERN.test(subject)) {
    throw new RequestError('INVALID_SUBJECT', `"${raw}" is not a valid subject symbol`);
  }
  return subject;
}

function parseChoice(raw: string | undefined, option: string): CapabilityChoice {
  const parsed = CapabilityChoiceSchema.safeParse(raw?.trim() || 'auto');
  if (!parsed.success) {
    throw new RequestError('INVALID_OPTION', `unknown ${option} capability "${raw}"`);
  }
  return parsed.data;
}

// `auto` resolves before keying
export function buildAnalysisKey(request: AnalysisRequest, defaults: CapabilityDefaults): AnalysisKey {
  return deepFreeze({
    subject: normalizeSubject(request.subject),
    extraction: resolveCapability(parseChoice(request.extraction, 'extraction'), 'extraction', defaults),
    analysis: resolveCapability(parseChoice(request.analysis, 'analysis'), 'analysis', defaults),
  });
}

export function keyId(key: AnalysisKey): string {
  return `${key.subject}__${key.extraction}__${key.analysis}`.replace(/[^A-Za-z0-9_-]/g, '_');
}
