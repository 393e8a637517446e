import type { InferenceBackend } from '@slotrun/shared';
import { errorMessage } from '../errors.js';
import { silentLogger } from '../pipeline/pipeline.logger.js';
import type { Logger } from '../pipeline/pipeline.logger.js';
import type { AgentCatalog } from './agent.catalog.js';

const NAME_TIMEOUT_MS = 10_000;
const DEFINITION_TIMEOUT_MS = 30_000;
const MIN_DEFINITION_CHARS = 100;
const EXAMPLE_AGENTS = ['code-generator', 'test-writer'];
const EXAMPLE_LINES = 50;

/** Lowercase, hyphenated, ending in `-agent`; null when nothing usable is left. */
export function sanitizeAgentName(raw: string): string | null {
  const firstLine = raw.trim().split('\n')[0] ?? '';
  const slug = firstLine
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-{2,}/g, '-')
    .replace(/^-|-$/g, '');
  if (slug === '' || slug === 'agent') return null;
  return slug.endsWith('-agent') ? slug : `${slug}-agent`;
}

/**
 * Creates a specialized agent definition on demand when the catalog has
 * nothing for a specialized domain. Never throws; failure returns null.
 */
export class AgentGenerator {
  constructor(
    private readonly backend: InferenceBackend,
    private readonly model: string,
    private readonly catalog: AgentCatalog,
    private readonly logger: Logger = silentLogger,
  ) {}

  async generate(task: string): Promise<string | null> {
    try {
      const name = await this.suggestName(task);
      if (name === null) return null;
      if (this.catalog.has(name)) return name;

      const content = await this.writeDefinition(task, name);
      if (content.length < MIN_DEFINITION_CHARS) {
        this.logger.warn('agents', `generated definition for ${name} too short (${content.length} chars)`);
        return null;
      }
      await this.catalog.register(name, content, task);
      return name;
    } catch (err) {
      this.logger.warn('agents', `agent generation failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private async suggestName(task: string): Promise<string | null> {
    const response = await this.backend.chat({
      model: this.model,
      messages: [
        {
          role: 'user',
          content:
            'Suggest a short, descriptive agent name for this task. Use lowercase with hyphens. ' +
            'End with -agent. Reply with ONLY the name, nothing else.\n\n' +
            `Task: ${task}\n\nAgent name:`,
        },
      ],
      maxTokens: 30,
      temperature: 0.3,
      timeoutMs: NAME_TIMEOUT_MS,
    });
    return sanitizeAgentName(response.content);
  }

  private async writeDefinition(task: string, name: string): Promise<string> {
    const examples = EXAMPLE_AGENTS.map((example) => {
      const definition = this.catalog.get(example);
      if (!definition) return '';
      const head = definition.prompt.split('\n').slice(0, EXAMPLE_LINES).join('\n');
      return `\n---\nExample: ${example}.md\n${head}`;
    }).join('');

    const response = await this.backend.chat({
      model: this.model,
      messages: [
        {
          role: 'user',
          content:
            'Create a new agent definition for the following task. Follow the example format exactly.\n\n' +
            `Task requiring new agent: ${task}\nAgent name: ${name}\n\n` +
            `Existing agent examples for format reference:${examples}\n\n` +
            'Generate a complete agent definition markdown file with:\n' +
            '1. # Agent Name header\n' +
            '2. Clear description of capabilities\n' +
            '3. ## Tools section listing relevant tools\n' +
            '4. ## Instructions section with step-by-step guidance\n\n' +
            'Output ONLY the markdown content, no explanations:',
        },
      ],
      maxTokens: 2000,
      temperature: 0.4,
      timeoutMs: DEFINITION_TIMEOUT_MS,
    });
    return response.content.trim();
  }
}
