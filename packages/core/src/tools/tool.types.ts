export interface ToolParameter {
  type: 'string' | 'number' | 'boolean';
  description: string;
  required: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ToolParameter>;
}

export interface ToolCall {
  tool: string;
  parameters: Record<string, unknown>;
}

export interface ToolResult {
  tool: string;
  success: boolean;
  output: string;
  error?: string;
  /** Set when the call was abandoned at the tool timeout. */
  timedOut?: boolean;
}

/** Context passed to every tool at execution time */
export interface ToolContext {
  taskId: string;
  /** Relative paths resolve against this directory. */
  workDir: string;
  /** Absolute roots every path must stay inside. */
  allowedRoots: readonly string[];
}

/** A callable tool implementation */
export interface ToolImpl {
  definition: ToolDefinition;
  execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult>;
}

/** Read a string parameter, or undefined when absent or not a scalar. */
export function stringParam(params: Record<string, unknown>, name: string): string | undefined {
  const value = params[name];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}
