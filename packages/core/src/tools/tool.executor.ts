import { ToolTimeoutError, errorMessage } from '../errors.js';
import type { ToolImpl, ToolCall, ToolResult, ToolContext, ToolDefinition } from './tool.types.js';
import { readFileTool } from './tools/read_file.js';
import { writeFileTool } from './tools/write_file.js';
import { appendFileTool } from './tools/append_file.js';
import { listDirTool } from './tools/list_dir.js';
import { searchTool } from './tools/search.js';

export const ALL_TOOLS: readonly ToolImpl[] = [readFileTool, writeFileTool, appendFileTool, listDirTool, searchTool];

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ToolTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Runs agent tool calls under a per-call timeout. `execute` never throws:
 * unknown tools, missing parameters, access denials, I/O errors and timeouts
 * all come back as failed results for the agent to observe.
 */
export class ToolExecutor {
  private readonly tools = new Map<string, ToolImpl>();

  constructor(
    private readonly timeoutMs: number,
    tools: readonly ToolImpl[] = ALL_TOOLS,
  ) {
    for (const tool of tools) {
      this.tools.set(tool.definition.name, tool);
    }
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }

  async execute(call: ToolCall, ctx: ToolContext): Promise<ToolResult> {
    const impl = this.tools.get(call.tool);
    if (!impl) {
      return {
        tool: call.tool,
        success: false,
        output: '',
        error: `Unknown tool: ${call.tool}. Available tools: ${[...this.tools.keys()].join(', ')}`,
      };
    }

    for (const [name, param] of Object.entries(impl.definition.parameters)) {
      const value = call.parameters[name];
      if (param.required && (value === undefined || value === null || (value === '' && name !== 'content'))) {
        return { tool: call.tool, success: false, output: '', error: `Missing required parameter: ${name}` };
      }
    }

    try {
      return await withTimeout(impl.execute(call.parameters, ctx), this.timeoutMs);
    } catch (err) {
      if (err instanceof ToolTimeoutError) {
        return { tool: call.tool, success: false, output: '', error: err.message, timedOut: true };
      }
      return { tool: call.tool, success: false, output: '', error: errorMessage(err) };
    }
  }
}
