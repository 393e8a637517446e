import type { ToolCall } from '../tools/tool.types.js';

export type ParsedToolCall =
  | { kind: 'none' }
  | { kind: 'call'; call: ToolCall }
  | { kind: 'malformed'; reason: string };

const TOOL_OPEN = '<tool>';
const TOOL_CLOSE = '</tool>';
const ARGS_OPEN = '<args>';
const ARGS_CLOSE = '</args>';
const TOOL_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isObjectPayload(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the first tool call in a model response. The grammar is
 *
 *   <tool>NAME</tool> [<args>{ JSON object }</args>]
 *
 * A response without `<tool>` is a final answer (`none`). Markup that starts
 * a call but does not follow the grammar is `malformed`, with a reason the
 * agent can act on.
 */
export function parseToolCall(response: string): ParsedToolCall {
  const open = response.indexOf(TOOL_OPEN);
  if (open === -1) return { kind: 'none' };

  const nameStart = open + TOOL_OPEN.length;
  const close = response.indexOf(TOOL_CLOSE, nameStart);
  if (close === -1) {
    return { kind: 'malformed', reason: 'missing </tool> closing tag' };
  }

  const name = response.slice(nameStart, close).trim();
  if (!TOOL_NAME_RE.test(name)) {
    return { kind: 'malformed', reason: `invalid tool name "${name}"` };
  }

  const rest = response.slice(close + TOOL_CLOSE.length);
  const argsOpen = rest.indexOf(ARGS_OPEN);
  if (argsOpen === -1) {
    return { kind: 'call', call: { tool: name, parameters: {} } };
  }

  const argsStart = argsOpen + ARGS_OPEN.length;
  const argsClose = rest.indexOf(ARGS_CLOSE, argsStart);
  if (argsClose === -1) {
    return { kind: 'malformed', reason: 'missing </args> closing tag' };
  }

  const payload = rest.slice(argsStart, argsClose).trim();
  if (payload === '') {
    return { kind: 'call', call: { tool: name, parameters: {} } };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { kind: 'malformed', reason: `<args> is not valid JSON (${detail})` };
  }

  if (!isObjectPayload(parsed)) {
    return { kind: 'malformed', reason: '<args> must contain a JSON object' };
  }
  return { kind: 'call', call: { tool: name, parameters: parsed } };
}
