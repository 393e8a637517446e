import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import safeRegex from 'safe-regex2';
import { stringParam } from '../tool.types.js';
import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { resolveAllowedPath } from './path.utils.js';

export const SEARCH_LIMIT = 50;
const MAX_FILE_SIZE = 500_000; // larger files are skipped
const SKIP_DIRS = new Set(['node_modules', '.git', 'dist']);

/**
 * Regex for a search pattern. Invalid patterns, and patterns whose nested
 * quantifiers can backtrack catastrophically, are searched as literal text.
 */
export function buildSearchRegex(pattern: string): RegExp {
  const literal = new RegExp(pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'g');
  if (!safeRegex(pattern)) return literal;
  try {
    return new RegExp(pattern, 'g');
  } catch {
    return literal;
  }
}

async function searchFile(file: string, regex: RegExp, results: string[]): Promise<void> {
  let content: string;
  try {
    const stat = await fs.stat(file);
    if (stat.size > MAX_FILE_SIZE) return;
    content = await fs.readFile(file, 'utf-8');
  } catch {
    return;
  }

  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    // collect one past the limit so the caller knows there were more
    if (results.length > SEARCH_LIMIT) return;
    regex.lastIndex = 0;
    if (regex.test(lines[i])) {
      results.push(`${file}:${i + 1}: ${lines[i].trim()}`);
    }
  }
}

async function searchDir(dir: string, regex: RegExp, results: string[]): Promise<void> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    return;
  }

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (results.length > SEARCH_LIMIT) return;
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (SKIP_DIRS.has(entry.name)) continue;
      await searchDir(fullPath, regex, results);
    } else if (entry.isFile()) {
      await searchFile(fullPath, regex, results);
    }
  }
}

export const searchTool: ToolImpl = {
  definition: {
    name: 'search',
    description:
      'Search file contents for a text or regular expression pattern. ' +
      'Returns matching lines as path:line: text, at most 50 matches.',
    parameters: {
      pattern: {
        type: 'string',
        description: 'Text or regular expression pattern to search for.',
        required: true,
      },
      path: {
        type: 'string',
        description: 'File or directory to search. Defaults to the working directory.',
        required: false,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const pattern = stringParam(params, 'pattern') ?? '';
    const target = (stringParam(params, 'path') ?? '').trim() || '.';
    const resolved = await resolveAllowedPath(target, ctx);

    const regex = buildSearchRegex(pattern);

    const stat = await fs.stat(resolved).catch(() => null);
    if (stat === null) {
      return { tool: 'search', success: false, output: '', error: `Path not found: ${resolved}` };
    }

    const results: string[] = [];
    if (stat.isDirectory()) {
      await searchDir(resolved, regex, results);
    } else {
      await searchFile(resolved, regex, results);
    }

    if (results.length === 0) {
      return { tool: 'search', success: true, output: '(no matches found)' };
    }

    const suffix = results.length > SEARCH_LIMIT ? `\n[TRUNCATED - more than ${SEARCH_LIMIT} matches]` : '';
    return {
      tool: 'search',
      success: true,
      output: `${results.slice(0, SEARCH_LIMIT).join('\n')}${suffix}`,
    };
  },
};
