import * as fs from 'node:fs/promises';
import { stringParam } from '../tool.types.js';
import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { resolveAllowedPath } from './path.utils.js';

export const READ_LIMIT_BYTES = 50_000;
export const READ_TRUNCATION_MARKER = '\n\n[TRUNCATED - file exceeds 50KB]';

/** Decode a byte prefix, dropping a multi-byte character cut in half at the end. */
export function decodePrefix(bytes: Buffer): string {
  return bytes.toString('utf-8').replace(/\uFFFD+$/, '');
}

export const readFileTool: ToolImpl = {
  definition: {
    name: 'read_file',
    description: 'Read a text file. Files larger than 50KB are cut off with a truncation marker.',
    parameters: {
      path: {
        type: 'string',
        description: 'Absolute path to the file (relative paths resolve against the working directory).',
        required: true,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const filePath = (stringParam(params, 'path') ?? '').trim();
    const resolved = await resolveAllowedPath(filePath, ctx);

    let handle: fs.FileHandle;
    try {
      handle = await fs.open(resolved, 'r');
    } catch {
      return { tool: 'read_file', success: false, output: '', error: `File not found: ${resolved}` };
    }

    try {
      const stat = await handle.stat();
      if (!stat.isFile()) {
        return { tool: 'read_file', success: false, output: '', error: `Not a file: ${resolved}` };
      }
      const length = Math.min(stat.size, READ_LIMIT_BYTES);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      const text = decodePrefix(buffer.subarray(0, bytesRead));
      const truncated = stat.size > READ_LIMIT_BYTES;
      return {
        tool: 'read_file',
        success: true,
        output: truncated ? text + READ_TRUNCATION_MARKER : text,
      };
    } finally {
      await handle.close();
    }
  },
};
