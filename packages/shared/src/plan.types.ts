import type { BackendId } from './backend.types.js';

export type Phase = 'RED' | 'GREEN' | 'REFACTOR' | 'ANALYZE';

/**
 * How a structured document was obtained from model output.
 * `recovered` means the repair pass had to alter the text before it parsed,
 * so consumers should treat it with lower confidence.
 */
export type Confidence = 'native' | 'recovered';

export interface Subtask {
  /** Unique within a run. */
  id: string;
  phase: Phase;
  description: string;
  /** Ordered path hints. */
  referencedFiles: string[];
}

export interface Group {
  /** Ordering key; groups run strictly in ascending order. */
  groupNumber: number;
  description: string;
  subtasks: Subtask[];
}

export interface DecompositionPlan {
  task: string;
  slotBudget: number;
  groups: Group[];
  confidence: Confidence;
  backend: BackendId;
  model: string;
}

export interface MappedTask extends Subtask {
  /** 1-based slot label. */
  slot: number;
  agentName: string;
  /** How the agent was chosen. */
  agentSource: 'selected' | 'generated' | 'default';
}

export interface MappedBatch {
  groupNumber: number;
  description: string;
  tasks: MappedTask[];
  /** min(tasks in group, slot budget), for reporting. */
  parallelism: number;
}

export interface SlotMapping {
  slotBudget: number;
  batches: MappedBatch[];
  summary: {
    totalTasks: number;
    totalBatches: number;
    maxParallelism: number;
  };
}
