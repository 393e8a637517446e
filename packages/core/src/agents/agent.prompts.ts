import type { Phase } from '@slotrun/shared';
import type { ToolDefinition } from '../tools/tool.types.js';

/**
 * Render a list of tool definitions as a compact markdown description
 * the model can use to understand what tools are available.
 */
export function buildToolsDescription(tools: readonly ToolDefinition[]): string {
  return tools
    .map((tool) => {
      const params = Object.entries(tool.parameters)
        .map(([name, p]) => `    - ${name} (${p.type}${p.required ? ', required' : ''}): ${p.description}`)
        .join('\n');
      return `### ${tool.name}\n${tool.description}\nParameters:\n${params || '    (none)'}`;
    })
    .join('\n\n');
}

export const TOOL_INSTRUCTIONS = `\
## How to Use Tools
To call a tool, write the tool name and a JSON object of arguments:
<tool>tool_name</tool>
<args>{"param1": "value1"}</args>

Then stop. The result arrives in the next message, starting with "Observation:".

## How to Finish
When the task is complete, reply with your final answer and no tool markup.
The final answer is saved as this task's output.

Rules:
- One tool call per reply, never more
- Never write "Observation:" yourself
- Use absolute file paths`;

/**
 * Compose the system prompt from the agent's specialization text, the tool
 * definitions and the tool protocol.
 */
export function buildSystemPrompt(agentPrompt: string, tools: readonly ToolDefinition[]): string {
  return `${agentPrompt.trim()}\n\n## Available Tools\n\n${buildToolsDescription(tools)}\n\n${TOOL_INSTRUCTIONS}`;
}

/** The first user message of every agent conversation. */
export function buildTaskMessage(input: {
  phase: Phase;
  workDir: string;
  outputsDir: string;
  description: string;
}): string {
  const { phase, workDir, outputsDir, description } = input;
  return (
    `[Phase: ${phase}] [WorkDir: ${workDir}] ${description}\n\n` +
    `IMPORTANT: Use absolute paths starting with ${workDir} for all file operations.\n` +
    `Output directory: ${outputsDir}`
  );
}

export const EMPTY_RESPONSE_RETRY =
  'Your previous response was empty. Please try again and provide a complete response.';
