import type { DecompositionPlan, MappedBatch, MappedTask, Phase, SlotMapping } from '@slotrun/shared';
import { silentLogger } from '../pipeline/pipeline.logger.js';
import type { Logger } from '../pipeline/pipeline.logger.js';
import type { AgentChoice } from '../agents/agent.selector.js';

/** Anything that can pick an agent for a subtask. */
export interface AgentPicker {
  select(description: string, phase: Phase): Promise<AgentChoice>;
}

/** 1-based slot label for the subtask at `index` within its group. */
export function computeSlot(index: number, slotBudget: number): number {
  return (index % slotBudget) + 1;
}

/**
 * Assign slots and agents. Selection runs one subtask at a time so a
 * generated agent is registered before the next subtask is considered.
 */
export async function mapPlan(
  plan: DecompositionPlan,
  slotBudget: number,
  picker: AgentPicker,
  logger: Logger = silentLogger,
): Promise<SlotMapping> {
  if (!Number.isInteger(slotBudget) || slotBudget < 1) {
    throw new RangeError(`slot budget must be a positive integer, got ${slotBudget}`);
  }

  const batches: MappedBatch[] = [];
  for (const group of plan.groups) {
    const tasks: MappedTask[] = [];
    for (const [index, subtask] of group.subtasks.entries()) {
      const choice = await picker.select(subtask.description, subtask.phase);
      tasks.push(
        Object.freeze({
          ...subtask,
          referencedFiles: [...subtask.referencedFiles],
          slot: computeSlot(index, slotBudget),
          agentName: choice.agentName,
          agentSource: choice.agentSource,
        }),
      );
      logger.info('map', `${subtask.id} -> slot ${computeSlot(index, slotBudget)}, ${choice.agentName} (${choice.agentSource})`);
    }
    batches.push({
      groupNumber: group.groupNumber,
      description: group.description,
      tasks,
      parallelism: Math.min(tasks.length, slotBudget),
    });
  }

  const summary = {
    totalTasks: batches.reduce((n, b) => n + b.tasks.length, 0),
    totalBatches: batches.length,
    maxParallelism: batches.reduce((max, b) => Math.max(max, b.parallelism), 0),
  };
  logger.info('map', `${summary.totalTasks} tasks in ${summary.totalBatches} batches, max parallelism ${summary.maxParallelism}`);

  return { slotBudget, batches, summary };
}
