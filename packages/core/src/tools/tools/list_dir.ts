import * as fs from 'node:fs/promises';
import { stringParam } from '../tool.types.js';
import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { resolveAllowedPath } from './path.utils.js';

export const LIST_LIMIT = 100;

export const listDirTool: ToolImpl = {
  definition: {
    name: 'list_dir',
    description: 'List the entries of one directory (not recursive), directories first. At most 100 entries.',
    parameters: {
      path: {
        type: 'string',
        description: 'Directory to list. Defaults to the working directory.',
        required: false,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const dirParam = (stringParam(params, 'path') ?? '').trim() || '.';
    const resolved = await resolveAllowedPath(dirParam, ctx);

    let entries;
    try {
      entries = await fs.readdir(resolved, { withFileTypes: true });
    } catch {
      return { tool: 'list_dir', success: false, output: '', error: `Directory not found: ${resolved}` };
    }

    if (entries.length === 0) {
      return { tool: 'list_dir', success: true, output: '(empty directory)' };
    }

    const lines = entries
      .map((e) => ({ name: e.name, dir: e.isDirectory() }))
      .sort((a, b) => (a.dir === b.dir ? a.name.localeCompare(b.name) : a.dir ? -1 : 1))
      .slice(0, LIST_LIMIT)
      .map((e) => (e.dir ? `${e.name}/` : e.name));

    const suffix =
      entries.length > LIST_LIMIT ? `\n[TRUNCATED - showing ${LIST_LIMIT} of ${entries.length} entries]` : '';
    return { tool: 'list_dir', success: true, output: lines.join('\n') + suffix };
  },
};
