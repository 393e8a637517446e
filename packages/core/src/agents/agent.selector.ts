import type { InferenceBackend, MappedTask, Phase, SlotrunConfig } from '@slotrun/shared';
import { errorMessage } from '../errors.js';
import { silentLogger } from '../pipeline/pipeline.logger.js';
import type { Logger } from '../pipeline/pipeline.logger.js';
import { PHASE_DEFAULT_AGENTS } from './agent.catalog.js';
import type { AgentCatalog } from './agent.catalog.js';
import type { AgentGenerator } from './agent.generator.js';

export interface AgentChoice {
  agentName: string;
  agentSource: MappedTask['agentSource'];
}

export interface AgentSelectorOptions {
  catalog: AgentCatalog;
  config: SlotrunConfig['selector'];
  /** Backend asked to pick from the catalog; null skips model selection. */
  backend: InferenceBackend | null;
  model: string;
  generator: AgentGenerator | null;
  logger?: Logger;
}

export function matchesSpecializedDomain(description: string, keywords: readonly string[]): boolean {
  const text = description.toLowerCase();
  return keywords.some((k) => k !== '' && text.includes(k.toLowerCase()));
}

export function buildSelectionPrompt(description: string, phase: Phase, catalog: string): string {
  return (
    'Select the BEST agent for this task. Reply with ONLY the agent name, nothing else.\n\n' +
    `Task: ${description}\nPhase: ${phase}\n\n` +
    `Available agents:\n${catalog}\n\nAgent name:`
  );
}

/**
 * Picks the executing agent for a subtask: model choice from the catalog,
 * then a generated specialist for specialized domains, then the phase default.
 * Every failure falls through to the next rule.
 */
export class AgentSelector {
  private readonly logger: Logger;

  constructor(private readonly options: AgentSelectorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async select(description: string, phase: Phase): Promise<AgentChoice> {
    const { config, generator } = this.options;

    if (config.enabled && description.trim() !== '') {
      const picked = await this.askModel(description, phase);
      if (picked !== null) return { agentName: picked, agentSource: 'selected' };
    }

    if (
      config.generate &&
      generator !== null &&
      matchesSpecializedDomain(description, config.specialized_keywords)
    ) {
      const generated = await generator.generate(description);
      if (generated !== null) return { agentName: generated, agentSource: 'generated' };
    }

    return { agentName: PHASE_DEFAULT_AGENTS[phase], agentSource: 'default' };
  }

  private async askModel(description: string, phase: Phase): Promise<string | null> {
    const { backend, model, catalog, config } = this.options;
    if (backend === null) return null;

    try {
      const response = await backend.chat({
        model,
        messages: [{ role: 'user', content: buildSelectionPrompt(description, phase, catalog.describe()) }],
        maxTokens: 50,
        temperature: 0.1,
        timeoutMs: config.timeout_ms,
      });
      const answer = response.content.trim().split('\n')[0]?.trim().toLowerCase() ?? '';
      const match = /^[a-z0-9_-]+/.exec(answer.replace(/^[`"'*\s]+/, ''));
      if (!match) return null;
      const resolved = catalog.resolve(match[0]);
      if (resolved === null) {
        this.logger.info('map', `model suggested unknown agent "${match[0]}"`);
      }
      return resolved;
    } catch (err) {
      this.logger.warn('map', `agent selection call failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
