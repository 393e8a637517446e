import type { Phase } from './plan.types.js';

export type AgentRunState =
  | 'awaiting_model'
  | 'tool_call'
  | 'final_answer'
  | 'timeout'
  | 'max_iterations'
  | 'failed';

export type TerminalState = Exclude<AgentRunState, 'awaiting_model' | 'tool_call'>;

export type ExitStatus = 'success' | 'failed';

export interface ExecutionResult {
  taskId: string;
  agentName: string;
  phase: Phase;
  description: string;
  slot: number;
  exitStatus: ExitStatus;
  terminalState: TerminalState;
  /** Bounded in bytes; an explicit marker ends truncated text. */
  outputText: string;
  iterations: number;
  durationMs: number;
  error?: string;
}

export interface BatchResult {
  groupNumber: number;
  description: string;
  successCount: number;
  failedCount: number;
  results: ExecutionResult[];
}

export type OverallStatus = 'success' | 'partial' | 'failed';

export interface PipelineResult {
  overallStatus: OverallStatus;
  totalSuccess: number;
  totalFailed: number;
  batches: BatchResult[];
  outputDir: string;
}
