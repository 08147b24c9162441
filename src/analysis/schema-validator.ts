import type { z } from 'zod';
import { SchemaValidationError } from '../control-plane/errors.js';
import { err, ok } from '../utils/result.js';
import type { Result } from '../utils/result.js';

const FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?```\s*$/i;

// Fenced block first, then the outermost braces.
export function parseJsonPayload(text: string, label: string): Result<unknown, SchemaValidationError> {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return err(new SchemaValidationError(`${label}: empty response`));
  }

  const fenced = FENCE.exec(trimmed);
  const candidate = fenced?.[1]?.trim() ?? trimmed;

  try {
    return ok(JSON.parse(candidate));
  } catch {
    // fall through to brace extraction
  }

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start >= 0 && end > start) {
    try {
      return ok(JSON.parse(candidate.slice(start, end + 1)));
    } catch (parseErr) {
      const reason = parseErr instanceof Error ? parseErr.message : String(parseErr);
      return err(new SchemaValidationError(`${label}: response is not valid JSON (${reason})`));
    }
  }

  return err(
    new SchemaValidationError(`${label}: no JSON object found in response: ${JSON.stringify(trimmed.slice(0, 200))}`)
  );
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function validatePayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  label: string
): Result<z.output<S>, SchemaValidationError> {
  const parsed = schema.safeParse(payload);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const issues = formatIssues(parsed.error);
  return err(new SchemaValidationError(`${label}: response does not match the required shape`, issues));
}
