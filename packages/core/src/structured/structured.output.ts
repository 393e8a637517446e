import type { z } from 'zod';
import type { ChatResponse, Confidence } from '@slotrun/shared';
import { extractJsonCandidate, pickResponseText, tryParseJson } from './json.extract.js';
import type { TextSource } from './json.extract.js';
import { repairJson } from './json.repair.js';
import type { RepairFix } from './json.repair.js';

export interface StructuredSuccess<T> {
  ok: true;
  value: T;
  /** `recovered` when repair altered the text or the document came from the reasoning field. */
  confidence: Confidence;
  source: TextSource;
  fixes: RepairFix[];
}

export interface StructuredFailure {
  ok: false;
  reason: string;
  /** The text that failed, for diagnostics and degraded records. */
  raw: string;
}

export type StructuredResult<T> = StructuredSuccess<T> | StructuredFailure;

function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'schema validation failed';
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `schema validation failed at ${where}: ${issue.message}`;
}

/**
 * Turn a model answer into a validated document: pick the answer text,
 * narrow it to a JSON candidate, parse it (with one repair pass if needed),
 * then validate against `schema`.
 */
export function parseStructured<T>(
  response: ChatResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): StructuredResult<T> {
  const picked = pickResponseText(response);
  if (picked === null) {
    return { ok: false, reason: 'empty response', raw: '' };
  }

  const candidate = extractJsonCandidate(picked.text);
  if (candidate === null) {
    return { ok: false, reason: 'no JSON object found', raw: picked.text };
  }

  let value: unknown;
  let fixes: RepairFix[] = [];
  const direct = tryParseJson(candidate);
  if (direct.ok) {
    value = direct.value;
  } else {
    const repaired = repairJson(candidate);
    const reparsed = tryParseJson(repaired.text);
    if (!reparsed.ok) {
      return { ok: false, reason: 'unparseable JSON after repair', raw: picked.text };
    }
    value = reparsed.value;
    fixes = repaired.fixes;
  }

  const validated = schema.safeParse(value);
  if (!validated.success) {
    return { ok: false, reason: describeIssues(validated.error), raw: picked.text };
  }

  return {
    ok: true,
    value: validated.data,
    confidence: fixes.length > 0 || picked.source === 'reasoning' ? 'recovered' : 'native',
    source: picked.source,
    fixes,
  };
}
