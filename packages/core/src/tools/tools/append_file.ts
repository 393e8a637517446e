import * as fs from 'node:fs/promises';
import { stringParam } from '../tool.types.js';
import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { resolveAllowedPath } from './path.utils.js';

export const appendFileTool: ToolImpl = {
  definition: {
    name: 'append_file',
    description: 'Append content to the end of an existing file. Fails if the file does not exist.',
    parameters: {
      path: {
        type: 'string',
        description: 'Absolute path to an existing file.',
        required: true,
      },
      content: {
        type: 'string',
        description: 'Text to append.',
        required: true,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const filePath = (stringParam(params, 'path') ?? '').trim();
    const content = stringParam(params, 'content') ?? '';
    const resolved = await resolveAllowedPath(filePath, ctx);

    const exists = await fs
      .stat(resolved)
      .then((s) => s.isFile())
      .catch(() => false);
    if (!exists) {
      return { tool: 'append_file', success: false, output: '', error: `File not found: ${resolved}` };
    }

    await fs.appendFile(resolved, content, 'utf-8');
    return {
      tool: 'append_file',
      success: true,
      output: `SUCCESS: Appended ${Buffer.byteLength(content, 'utf-8')} bytes to ${resolved}`,
    };
  },
};
