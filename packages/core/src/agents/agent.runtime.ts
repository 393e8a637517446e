import * as crypto from 'node:crypto';
import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  AgentRunState,
  ChatMessage,
  InferenceBackend,
  Phase,
  SlotrunConfig,
  TerminalState,
  TokenUsage,
} from '@slotrun/shared';
import type { ToolContext } from '../tools/tool.types.js';
import type { ToolExecutor } from '../tools/tool.executor.js';
import type { Logger } from '../pipeline/pipeline.logger.js';
import { silentLogger } from '../pipeline/pipeline.logger.js';
import {
  AgentEmptyResponseError,
  AgentMaxIterationsError,
  AgentRuntimeError,
  AgentTimeoutError,
  errorMessage,
} from '../errors.js';
import { buildSystemPrompt, buildTaskMessage, EMPTY_RESPONSE_RETRY } from './agent.prompts.js';
import { parseToolCall } from './tool.parser.js';

export const OBSERVATION_STOP = 'Observation:';

export interface AgentTask {
  taskId: string;
  agentName: string;
  phase: Phase;
  description: string;
}

export interface AgentRuntimeOptions {
  backend: InferenceBackend;
  model: string;
  /** Specialization text placed ahead of the tool protocol. */
  agentPrompt: string;
  executor: ToolExecutor;
  limits: SlotrunConfig['agent'];
  /** Relative tool paths resolve here. */
  workDir: string;
  outputsDir: string;
  allowedRoots: readonly string[];
  logger?: Logger;
  now?: () => number;
}

export interface AgentRunResult {
  terminalState: TerminalState;
  output: string;
  /** Loop iterations started. */
  iterations: number;
  /** Backend calls made, retries included. */
  modelCalls: number;
  error?: string;
  artifactPath: string;
  tokenUsage?: TokenUsage;
}

export interface AgentStateEvent {
  taskId: string;
  agentName: string;
  state: AgentRunState;
  iteration: number;
  detail: string | null;
}

/**
 * File name stem for a task's artifacts. Safe ids are used as they are; any
 * other id gets a hash of the original appended, so distinct ids never share
 * a stem.
 */
export function taskFileStem(taskId: string): string {
  const safe = taskId.replace(/[^A-Za-z0-9._-]/g, '_');
  if (safe === taskId) return safe;
  return `${safe}-${crypto.createHash('sha256').update(taskId).digest('hex').slice(0, 8)}`;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface AgentRuntime {
  on(event: 'state', listener: (event: AgentStateEvent) => void): this;
  emit(event: 'state', state: AgentStateEvent): boolean;
}

/**
 * One task's ReAct loop: call the model, run the tool it names, feed the
 * observation back, and stop on a reply without tool markup. The total
 * timeout is checked between iterations; a reply that arrives after the
 * deadline is discarded. Counters accumulate, so use one instance per task.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class AgentRuntime extends EventEmitter {
  private readonly logger: Logger;
  private readonly now: () => number;
  private modelCalls = 0;
  private promptTokens = 0;
  private completionTokens = 0;

  constructor(private readonly options: AgentRuntimeOptions) {
    super();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  async run(task: AgentTask): Promise<AgentRunResult> {
    const { limits, executor } = this.options;
    const deadline = this.now() + limits.total_timeout_ms;
    const toolCtx: ToolContext = {
      taskId: task.taskId,
      workDir: this.options.workDir,
      allowedRoots: this.options.allowedRoots,
    };

    const messages: ChatMessage[] = [
      { role: 'system', content: buildSystemPrompt(this.options.agentPrompt, executor.definitions()) },
      {
        role: 'user',
        content: buildTaskMessage({
          phase: task.phase,
          workDir: this.options.workDir,
          outputsDir: this.options.outputsDir,
          description: task.description,
        }),
      },
    ];

    let iteration = 0;
    let lastResponse = '';

    try {
      while (iteration < limits.max_iterations) {
        if (this.now() >= deadline) throw new AgentTimeoutError(limits.total_timeout_ms);
        iteration++;

        this.setState(task, 'awaiting_model', iteration, null);
        const content = await this.callModel(messages, deadline);
        if (this.now() > deadline) throw new AgentTimeoutError(limits.total_timeout_ms);
        lastResponse = content;

        const parsed = parseToolCall(content);
        if (parsed.kind === 'none') {
          this.setState(task, 'final_answer', iteration, null);
          return await this.finish(task, {
            terminalState: 'final_answer',
            output: content.trim(),
            iterations: iteration,
          });
        }

        messages.push({ role: 'assistant', content });

        if (parsed.kind === 'malformed') {
          this.logger.log('debug', 'execute', `${task.taskId}: malformed tool call: ${parsed.reason}`);
          messages.push({ role: 'user', content: `${OBSERVATION_STOP} ERROR: Malformed tool call: ${parsed.reason}` });
          continue;
        }

        this.setState(task, 'tool_call', iteration, parsed.call.tool);
        const result = await executor.execute(parsed.call, toolCtx);
        this.logger.log('debug', 'execute', `${task.taskId}: ${parsed.call.tool} ${result.success ? 'ok' : 'failed'}`);
        messages.push({
          role: 'user',
          content: result.success
            ? `${OBSERVATION_STOP} ${result.output}`
            : `${OBSERVATION_STOP} ERROR: ${result.error ?? 'unknown error'}`,
        });
      }

      const exhausted = new AgentMaxIterationsError(limits.max_iterations);
      this.setState(task, 'max_iterations', iteration, null);
      return await this.finish(task, {
        terminalState: 'max_iterations',
        output: `WARNING: ${exhausted.message}. Last response:\n${lastResponse}`,
        iterations: iteration,
        error: exhausted.message,
      });
    } catch (err) {
      if (!(err instanceof AgentRuntimeError)) throw err;
      this.setState(task, err.terminalState, iteration, err.message);
      return this.finish(task, {
        terminalState: err.terminalState,
        output: `ERROR: ${err.message}`,
        iterations: iteration,
        error: err.message,
      });
    }
  }

  /**
   * One logical model call: up to `1 + max_retries` backend requests until a
   * non-empty reply arrives. A request that throws counts as an empty reply.
   */
  private async callModel(messages: ChatMessage[], deadline: number): Promise<string> {
    const { backend, model, limits } = this.options;
    const attempts = 1 + limits.max_retries;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1 && this.now() >= deadline) throw new AgentTimeoutError(limits.total_timeout_ms);
      this.modelCalls++;

      let content = '';
      try {
        const response = await backend.chat({
          model,
          messages: [...messages],
          maxTokens: limits.max_tokens,
          temperature: limits.temperature,
          stop: [OBSERVATION_STOP],
          timeoutMs: limits.call_timeout_ms,
        });
        if (response.usage) {
          this.promptTokens += response.usage.promptTokens;
          this.completionTokens += response.usage.completionTokens;
        }
        content = response.content;
      } catch (err) {
        this.logger.warn('execute', `model call failed (attempt ${attempt}/${attempts}): ${errorMessage(err)}`);
        continue;
      }

      if (content.trim() !== '') return content;

      this.logger.warn('execute', `empty response (attempt ${attempt}/${attempts})`);
      if (attempt < attempts) {
        messages.push({ role: 'user', content: EMPTY_RESPONSE_RETRY });
      }
    }

    throw new AgentEmptyResponseError(attempts);
  }

  private async finish(
    task: AgentTask,
    outcome: Omit<AgentRunResult, 'modelCalls' | 'artifactPath' | 'tokenUsage'>,
  ): Promise<AgentRunResult> {
    const artifactPath = path.join(this.options.outputsDir, `${taskFileStem(task.taskId)}.md`);
    await fs.mkdir(this.options.outputsDir, { recursive: true });
    await fs.writeFile(artifactPath, `${outcome.output}\n`, 'utf-8');

    const result: AgentRunResult = { ...outcome, modelCalls: this.modelCalls, artifactPath };
    if (this.promptTokens > 0 || this.completionTokens > 0) {
      result.tokenUsage = {
        promptTokens: this.promptTokens,
        completionTokens: this.completionTokens,
        totalTokens: this.promptTokens + this.completionTokens,
      };
    }
    return result;
  }

  private setState(task: AgentTask, state: AgentRunState, iteration: number, detail: string | null): void {
    this.emit('state', { taskId: task.taskId, agentName: task.agentName, state, iteration, detail });
  }
}
