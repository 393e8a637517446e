import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Phase } from '@slotrun/shared';
import { silentLogger } from '../pipeline/pipeline.logger.js';
import type { Logger } from '../pipeline/pipeline.logger.js';

export interface AgentDefinition {
  name: string;
  /** One line, at most 100 characters, for the selection catalog. */
  description: string;
  /** Specialization text used as the agent's system prompt. */
  prompt: string;
  source: 'builtin' | 'file' | 'generated';
}

const DESCRIPTION_MAX = 100;

export const PHASE_DEFAULT_AGENTS: Readonly<Record<Phase, string>> = {
  RED: 'test-writer',
  GREEN: 'code-generator',
  REFACTOR: 'code-optimizer',
  ANALYZE: 'code-reviewer',
};

const BUILTIN_PROMPTS: Readonly<Record<string, string>> = {
  'test-writer': `\
# Test Writer
Writes focused, failing tests that pin down one behaviour at a time before any implementation exists.

## Instructions
- Read the files named in the task before writing anything
- Write the smallest test that fails for the right reason
- Prefer the project's existing test framework and naming
- Do not implement production code`,
  'code-generator': `\
# Code Generator
Implements the minimum production code needed to make the existing failing tests pass.

## Instructions
- Read the relevant tests first
- Write only what the tests require, nothing speculative
- Keep functions small and named for what they do`,
  'code-optimizer': `\
# Code Optimizer
Refactors working code for clarity and performance without changing its observable behaviour.

## Instructions
- Read the implementation and its tests
- Remove duplication, simplify control flow, improve names
- Keep every existing test passing`,
  'code-reviewer': `\
# Code Reviewer
Reviews code and tests for correctness, missing cases and maintainability, and reports concrete findings.

## Instructions
- Read every file the task references
- Report bugs, untested edge cases and risky constructs with file and line
- Do not rewrite the code yourself`,
};

/** Drop a leading `---` ... `---` YAML block. */
export function stripFrontMatter(text: string): string {
  const lines = text.split('\n');
  if (lines[0]?.trim() !== '---') return text;
  const end = lines.findIndex((line, i) => i > 0 && line.trim() === '---');
  if (end === -1) return text;
  return lines.slice(end + 1).join('\n').replace(/^\n+/, '');
}

/** First line that is neither blank, a heading, nor an HTML comment. */
export function describeAgent(text: string): string {
  const line = stripFrontMatter(text)
    .split('\n')
    .map((l) => l.trim())
    .find((l) => l !== '' && !l.startsWith('#') && !l.startsWith('<!--'));
  return (line ?? '').slice(0, DESCRIPTION_MAX);
}

function nameVariants(raw: string): string[] {
  const base = raw.trim().toLowerCase();
  const variants = new Set<string>();
  for (const name of [base, base.replace(/_/g, '-'), base.replace(/-/g, '_')]) {
    variants.add(name);
    variants.add(name.replace(/[-_]agent$/, ''));
    if (!/[-_]agent$/.test(name)) {
      variants.add(`${name}-agent`);
      variants.add(`${name}_agent`);
    }
  }
  return [...variants].filter((v) => v !== '');
}

/**
 * Agents available for selection: the four built-in phase defaults plus every
 * `*.md` definition in the agents directory. Files override built-ins of the
 * same name. Generated agents are written back to the directory.
 */
export class AgentCatalog {
  private readonly agents = new Map<string, AgentDefinition>();

  constructor(
    private readonly dir: string,
    private readonly logger: Logger = silentLogger,
  ) {
    for (const [name, prompt] of Object.entries(BUILTIN_PROMPTS)) {
      this.agents.set(name, { name, prompt, description: describeAgent(prompt), source: 'builtin' });
    }
  }

  static async load(dir: string, logger: Logger = silentLogger): Promise<AgentCatalog> {
    const catalog = new AgentCatalog(dir, logger);
    await catalog.reload();
    return catalog;
  }

  /** Read every definition file in the agents directory. A missing directory is empty. */
  async reload(): Promise<void> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return;
      throw err;
    }

    for (const entry of entries.sort()) {
      if (!entry.endsWith('.md') || entry.includes(':Zone.Identifier')) continue;
      const name = entry.slice(0, -'.md'.length);
      try {
        const text = await fs.readFile(path.join(this.dir, entry), 'utf-8');
        const prompt = stripFrontMatter(text).trim();
        this.agents.set(name, { name, prompt, description: describeAgent(text), source: 'file' });
      } catch (err) {
        this.logger.warn('agents', `skipping unreadable agent ${entry}: ${String(err)}`);
      }
    }
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  get(name: string): AgentDefinition | undefined {
    return this.agents.get(name);
  }

  /** Catalog name for a loosely written agent name, tolerating `-agent` and `_`/`-` drift. */
  resolve(raw: string): string | null {
    for (const candidate of nameVariants(raw)) {
      if (this.agents.has(candidate)) return candidate;
    }
    return null;
  }

  names(): string[] {
    return [...this.agents.keys()].sort();
  }

  /** One `- name: description` line per agent, for the selection prompt. */
  describe(): string {
    return this.names()
      .map((name) => `- ${name}: ${this.agents.get(name)?.description ?? ''}`)
      .join('\n');
  }

  /**
   * Persist a generated definition and make it selectable for this and
   * future runs.
   */
  async register(name: string, content: string, task: string): Promise<AgentDefinition> {
    const header =
      `<!-- Generated agent: ${new Date().toISOString()} -->\n` +
      `<!-- Task: ${task.replace(/-->/g, '- ->').replace(/\n/g, ' ')} -->\n\n`;
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(path.join(this.dir, `${name}.md`), header + content.trim() + '\n', 'utf-8');

    const definition: AgentDefinition = {
      name,
      prompt: stripFrontMatter(content).trim(),
      description: describeAgent(content),
      source: 'generated',
    };
    this.agents.set(name, definition);
    this.logger.info('agents', `registered generated agent ${name}`);
    return definition;
  }
}
