import type { ChatResponse } from '@slotrun/shared';

export type TextSource = 'content' | 'reasoning';

export interface PickedText {
  text: string;
  source: TextSource;
}

const JSON_FENCE_RE = /```json\s*\n?([\s\S]*?)```/i;
const ANY_FENCE_RE = /```[a-zA-Z0-9_-]*\s*\n?([\s\S]*?)```/;

export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isObjectLiteral(value: unknown): boolean {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Index of the `}` closing the `{` at `start`, or -1 when it never closes. */
function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** The last balanced `{...}` span in `text` that parses as a JSON object. */
export function lastObjectLiteral(text: string): string | null {
  let found: string | null = null;
  let i = text.indexOf('{');
  while (i !== -1) {
    const end = matchingBrace(text, i);
    if (end === -1) {
      i = text.indexOf('{', i + 1);
      continue;
    }
    const span = text.slice(i, end + 1);
    const parsed = tryParseJson(span);
    if (parsed.ok && isObjectLiteral(parsed.value)) {
      found = span;
      i = text.indexOf('{', end + 1);
    } else {
      i = text.indexOf('{', i + 1);
    }
  }
  return found;
}

export function fencedBlock(text: string, jsonOnly: boolean): string | null {
  const match = (jsonOnly ? JSON_FENCE_RE : ANY_FENCE_RE).exec(text);
  return match ? match[1].trim() : null;
}

/**
 * The text to parse from a model answer: the answer field when it has
 * anything in it, otherwise whatever can be salvaged from the reasoning field.
 */
export function pickResponseText(response: ChatResponse): PickedText | null {
  if (response.content.trim() !== '') {
    return { text: response.content, source: 'content' };
  }
  const reasoning = response.reasoning?.trim() ?? '';
  if (reasoning === '') return null;

  const salvaged = fencedBlock(reasoning, false) ?? lastObjectLiteral(reasoning) ?? reasoning;
  return { text: salvaged, source: 'reasoning' };
}

/**
 * Narrow free text to the span most likely to hold the JSON document.
 * Returns null when the text has no `{` at all.
 */
export function extractJsonCandidate(text: string): string | null {
  const trimmed = text.trim();
  if (tryParseJson(trimmed).ok) return trimmed;

  const fenced = fencedBlock(trimmed, true) ?? fencedBlock(trimmed, false);
  if (fenced !== null && fenced.includes('{')) return fenced;

  const first = trimmed.indexOf('{');
  if (first === -1) return null;
  // An outermost object cut off mid-stream: hand the tail to the repair pass
  // rather than one of its complete children.
  if (matchingBrace(trimmed, first) === -1) return trimmed.slice(first);

  const literal = lastObjectLiteral(trimmed);
  if (literal !== null) return literal;

  return trimmed.slice(first, trimmed.lastIndexOf('}') + 1);
}
