import { z } from 'zod';
import type { ChatResponse, DecompositionPlan, Group } from '@slotrun/shared';
import { ConnectivityError, DecompositionError, MalformedOutputError, errorMessage } from '../errors.js';
import { parseStructured } from '../structured/structured.output.js';
import { loadPrompt } from '../prompts/prompt.templates.js';
import { routedBackend } from '../pipeline/pipeline.context.js';
import type { PipelineContext } from '../pipeline/pipeline.context.js';

const PHASES = ['RED', 'GREEN', 'REFACTOR', 'ANALYZE'] as const;

/** Case-insensitive; REVIEW is read as ANALYZE. */
export const phaseSchema = z
  .string()
  .transform((s) => s.trim().toUpperCase())
  .transform((s) => (s === 'REVIEW' ? 'ANALYZE' : s))
  .pipe(z.enum(PHASES, { errorMap: () => ({ message: `must be one of ${PHASES.join(', ')}` }) }));

const wireTaskSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  phase: phaseSchema,
  task: z.string().min(1, 'must describe the task'),
  files: z.array(z.string()).default([]),
});

const wireGroupSchema = z.object({
  group: z.coerce.number().int(),
  description: z.string().default(''),
  tasks: z.array(wireTaskSchema).min(1, 'group has no tasks'),
});

/** The document the decomposition prompt asks for. */
export const planSchema = z.object({
  parallel_groups: z.array(wireGroupSchema).min(1, 'plan has no groups'),
});

export type WirePlan = z.infer<typeof planSchema>;

export function buildDecomposeMessage(task: string, slotBudget: number): string {
  return (
    'RESPOND ONLY WITH VALID JSON. No markdown, no explanation, just the JSON object.\n\n' +
    `Task: ${task}\n\n` +
    `Available worker slots: ${slotBudget}\n\n` +
    'Decompose this task into atomic TDD tasks.'
  );
}

/**
 * Convert the wire plan into groups: sorted by group number, with ids limited
 * to `[A-Za-z0-9._-]` and made unique across the whole plan by suffixing
 * repeats (`t1`, `t1-2`, ...).
 */
export function normalizePlan(wire: WirePlan): Group[] {
  const seen = new Set<string>();
  const uniqueId = (raw: string): string => {
    const id = raw.replace(/[^A-Za-z0-9._-]/g, '_');
    let candidate = id;
    for (let n = 2; seen.has(candidate); n++) candidate = `${id}-${n}`;
    seen.add(candidate);
    return candidate;
  };

  return [...wire.parallel_groups]
    .sort((a, b) => a.group - b.group)
    .map((group) => ({
      groupNumber: group.group,
      description: group.description,
      subtasks: group.tasks.map((t) => ({
        id: uniqueId(t.id),
        phase: t.phase,
        description: t.task,
        referencedFiles: t.files,
      })),
    }));
}

/**
 * Ask the routed backend to split `task` into ordered groups of independent
 * subtasks. Throws DecompositionError when no backend is routed or no attempt
 * yields a valid plan; every other stage degrades instead of throwing.
 */
export async function decompose(
  task: string,
  slotBudget: number,
  ctx: PipelineContext,
): Promise<DecompositionPlan> {
  const { config, logger } = ctx;
  const routed = routedBackend(ctx, ctx.routing.decompositionTarget);
  if (!routed) {
    throw new DecompositionError('no backend available for decomposition', {
      cause: new ConnectivityError('worker and orchestrator are both unreachable'),
    });
  }

  const { backend, status } = routed;
  const maxTokens =
    backend.id === 'orchestrator' && status.throughputClass === 'cpu'
      ? config.decomposer.cpu_max_tokens
      : config.decomposer.max_tokens;
  let systemPrompt: string;
  try {
    systemPrompt = await loadPrompt('decompose', config.paths.prompts_dir);
  } catch (err) {
    throw new DecompositionError(`could not load the decomposition prompt: ${errorMessage(err)}`, { cause: err });
  }

  let lastError: Error = new MalformedOutputError('no attempt made');
  for (let attempt = 1; attempt <= config.decomposer.max_attempts; attempt++) {
    logger.info('decompose', `requesting plan from ${backend.id} (${status.modelId}), attempt ${attempt}`);

    let response: ChatResponse;
    try {
      response = await backend.chat({
        model: status.modelId,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: buildDecomposeMessage(task, slotBudget) },
        ],
        maxTokens,
        temperature: config.decomposer.temperature,
        timeoutMs: config.decomposer.timeout_ms,
      });
    } catch (err) {
      lastError = err instanceof Error ? err : new ConnectivityError(errorMessage(err));
      logger.warn('decompose', `attempt ${attempt} failed: ${lastError.message}`);
      continue;
    }

    const parsed = parseStructured(response, planSchema);
    if (!parsed.ok) {
      lastError = new MalformedOutputError(parsed.reason, parsed.raw);
      logger.warn('decompose', `attempt ${attempt} unusable: ${parsed.reason}`, {
        raw: parsed.raw.slice(0, 2000),
      });
      continue;
    }

    if (parsed.confidence === 'recovered') {
      logger.warn('decompose', 'plan recovered from malformed output', {
        source: parsed.source,
        fixes: parsed.fixes,
      });
    }

    const groups = normalizePlan(parsed.value);
    const taskCount = groups.reduce((n, g) => n + g.subtasks.length, 0);
    logger.info('decompose', `${taskCount} tasks in ${groups.length} groups`);

    return {
      task,
      slotBudget,
      groups,
      confidence: parsed.confidence,
      backend: backend.id,
      model: status.modelId,
    };
  }

  throw new DecompositionError(
    `no valid plan after ${config.decomposer.max_attempts} attempts: ${lastError.message}`,
    { cause: lastError },
  );
}
