import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { stringParam } from '../tool.types.js';
import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { resolveAllowedPath } from './path.utils.js';

export const writeFileTool: ToolImpl = {
  definition: {
    name: 'write_file',
    description: 'Create or overwrite a file with the given content. Parent directories are created.',
    parameters: {
      path: {
        type: 'string',
        description: 'Absolute path to the file to create or overwrite.',
        required: true,
      },
      content: {
        type: 'string',
        description: 'Full content to write to the file.',
        required: true,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const filePath = (stringParam(params, 'path') ?? '').trim();
    const content = stringParam(params, 'content') ?? '';
    const resolved = await resolveAllowedPath(filePath, ctx);

    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, content, 'utf-8');
    return {
      tool: 'write_file',
      success: true,
      output: `SUCCESS: Wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${resolved}`,
    };
  },
};
