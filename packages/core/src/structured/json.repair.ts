export type RepairFix =
  | 'rogue-quote'
  | 'raw-newlines'
  | 'unterminated-string'
  | 'trailing-comma'
  | 'missing-closers';

export interface RepairResult {
  text: string;
  fixes: RepairFix[];
}

interface ScanState {
  /** Open `{` / `[` in nesting order. */
  stack: string[];
  inString: boolean;
}

function scan(text: string): ScanState {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of text) {
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{' || ch === '[') stack.push(ch);
    else if ((ch === '}' || ch === ']') && stack.length > 0) stack.pop();
  }
  return { stack, inString };
}

/**
 * One bounded recovery pass over almost-JSON emitted by a model. It only ever
 * removes a rogue quote or trailing comma, flattens raw newlines, and appends
 * what is missing at the end. Text that is already balanced gets no closers.
 */
export function repairJson(input: string): RepairResult {
  const fixes: RepairFix[] = [];
  let text = input.trim();

  if (text.includes('}"]')) {
    text = text.replace(/\}"\]/g, '}]');
    fixes.push('rogue-quote');
  }

  if (/[\r\n]/.test(text)) {
    text = text.replace(/\r?\n|\r/g, ' ');
    fixes.push('raw-newlines');
  }

  let state = scan(text);
  if (state.inString) {
    // a dangling backslash would escape the closing quote
    if (text.endsWith('\\')) text = text.slice(0, -1);
    text += '"';
    fixes.push('unterminated-string');
    state = scan(text);
  }

  const trimmed = text.trimEnd();
  if (trimmed.endsWith(',')) {
    text = trimmed.slice(0, -1);
    fixes.push('trailing-comma');
  }

  if (state.stack.length > 0) {
    const closers = [...state.stack]
      .reverse()
      .map((open) => (open === '{' ? '}' : ']'))
      .join('');
    text += closers;
    fixes.push('missing-closers');
  }

  return { text, fixes };
}
