import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  BatchResult,
  ExecutionResult,
  MappedBatch,
  MappedTask,
  OverallStatus,
  PipelineResult,
  SlotMapping,
} from '@slotrun/shared';
import type { PipelineContext } from '../pipeline/pipeline.context.js';
import { routedBackend } from '../pipeline/pipeline.context.js';
import { AgentRuntime, taskFileStem } from '../agents/agent.runtime.js';
import type { AgentRunResult, AgentStateEvent } from '../agents/agent.runtime.js';
import type { AgentCatalog } from '../agents/agent.catalog.js';
import { PHASE_DEFAULT_AGENTS } from '../agents/agent.catalog.js';
import { ToolExecutor } from '../tools/tool.executor.js';
import { defaultAllowedRoots } from '../tools/tools/path.utils.js';
import { ConnectivityError, errorMessage } from '../errors.js';

export const OUTPUT_TRUNCATION_MARKER = '... [truncated]';

/** Runs one mapped task to a terminal state. */
export type TaskRunner = (task: MappedTask) => Promise<AgentRunResult>;

export interface BatchSchedulerOptions {
  catalog: AgentCatalog;
  /** Directory agents work in; relative tool paths resolve here. */
  projectDir: string;
  executor?: ToolExecutor;
  /** Replaces the default AgentRuntime-backed runner. */
  runner?: TaskRunner;
  now?: () => number;
}

/** Cut `text` to at most `limitBytes` of UTF-8, marking the cut. */
export function truncateOutput(text: string, limitBytes: number): string {
  const bytes = Buffer.from(text, 'utf-8');
  if (bytes.length <= limitBytes) return text;
  const prefix = bytes.subarray(0, limitBytes).toString('utf-8').replace(/\uFFFD+$/, '');
  return `${prefix}${OUTPUT_TRUNCATION_MARKER}`;
}

export function overallStatus(totalSuccess: number, totalFailed: number): OverallStatus {
  if (totalSuccess === 0) return 'failed';
  return totalFailed > 0 ? 'partial' : 'success';
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface BatchScheduler {
  on(event: 'batch:start', listener: (batch: MappedBatch) => void): this;
  on(event: 'task:start', listener: (task: MappedTask) => void): this;
  on(event: 'task:complete', listener: (result: ExecutionResult) => void): this;
  on(event: 'batch:complete', listener: (result: BatchResult) => void): this;
  /** Forwarded from each task's AgentRuntime. */
  on(event: 'agent:state', listener: (event: AgentStateEvent) => void): this;

  emit(event: 'batch:start', batch: MappedBatch): boolean;
  emit(event: 'task:start', task: MappedTask): boolean;
  emit(event: 'task:complete', result: ExecutionResult): boolean;
  emit(event: 'batch:complete', result: BatchResult): boolean;
  emit(event: 'agent:state', state: AgentStateEvent): boolean;
}

/**
 * Fork-join executor: batches run one after another, every task in a batch
 * starts at once, and the next batch waits until all of them have a recorded
 * result. A task that fails or whose runner rejects only counts against its
 * own batch.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class BatchScheduler extends EventEmitter {
  private readonly runner: TaskRunner;
  private readonly executor: ToolExecutor;
  private readonly now: () => number;

  constructor(
    private readonly ctx: PipelineContext,
    private readonly options: BatchSchedulerOptions,
  ) {
    super();
    this.executor = options.executor ?? new ToolExecutor(ctx.config.tools.timeout_ms);
    this.runner = options.runner ?? ((task) => this.runAgent(task));
    this.now = options.now ?? Date.now;
  }

  async run(mapping: SlotMapping): Promise<PipelineResult> {
    await fs.mkdir(this.ctx.outputsDir, { recursive: true });

    const batches: BatchResult[] = [];
    for (const batch of mapping.batches) {
      batches.push(await this.runBatch(batch));
    }

    const totalSuccess = batches.reduce((n, b) => n + b.successCount, 0);
    const totalFailed = batches.reduce((n, b) => n + b.failedCount, 0);
    const status = overallStatus(totalSuccess, totalFailed);
    this.ctx.logger.info('execute', `${status}: ${totalSuccess} succeeded, ${totalFailed} failed`);

    return { overallStatus: status, totalSuccess, totalFailed, batches, outputDir: this.ctx.outputsDir };
  }

  private async runBatch(batch: MappedBatch): Promise<BatchResult> {
    const { logger } = this.ctx;
    logger.info('execute', `batch ${batch.groupNumber}: ${batch.description} (${batch.tasks.length} tasks)`);
    this.emit('batch:start', batch);

    const settled = await Promise.allSettled(batch.tasks.map((task) => this.runTask(task)));

    const results = settled.map((outcome, index): ExecutionResult => {
      if (outcome.status === 'fulfilled') return outcome.value;
      // runTask records its own faults; this only catches a failure to record
      const task = batch.tasks[index];
      const message = errorMessage(outcome.reason);
      logger.error('execute', `${task.id}: ${message}`);
      return this.faultResult(task, message, 0);
    });

    const successCount = results.filter((r) => r.exitStatus === 'success').length;
    const batchResult: BatchResult = {
      groupNumber: batch.groupNumber,
      description: batch.description,
      successCount,
      failedCount: results.length - successCount,
      results,
    };
    logger.info(
      'execute',
      `batch ${batch.groupNumber} complete: ${batchResult.successCount} success, ${batchResult.failedCount} failed`,
    );
    this.emit('batch:complete', batchResult);
    return batchResult;
  }

  private async runTask(task: MappedTask): Promise<ExecutionResult> {
    const { logger, config } = this.ctx;
    logger.info('execute', `[${task.id}] slot ${task.slot}: ${task.agentName} (${task.phase})`);
    this.emit('task:start', task);

    const started = this.now();
    let result: ExecutionResult;
    try {
      const run = await this.runner(task);
      result = {
        taskId: task.id,
        agentName: task.agentName,
        phase: task.phase,
        description: task.description,
        slot: task.slot,
        exitStatus: run.terminalState === 'final_answer' ? 'success' : 'failed',
        terminalState: run.terminalState,
        outputText: truncateOutput(run.output, config.agent.output_limit_bytes),
        iterations: run.iterations,
        durationMs: this.now() - started,
      };
      if (run.error !== undefined) result.error = run.error;
    } catch (err) {
      const message = errorMessage(err);
      logger.error('execute', `[${task.id}] runner fault: ${message}`);
      result = this.faultResult(task, message, this.now() - started);
    }

    await fs.writeFile(
      path.join(this.ctx.outputsDir, `${taskFileStem(task.id)}.json`),
      JSON.stringify(result, null, 2),
      'utf-8',
    );
    logger.info('execute', `[${task.id}] ${result.exitStatus} (${result.terminalState})`);
    this.emit('task:complete', result);
    return result;
  }

  private faultResult(task: MappedTask, message: string, durationMs: number): ExecutionResult {
    return {
      taskId: task.id,
      agentName: task.agentName,
      phase: task.phase,
      description: task.description,
      slot: task.slot,
      exitStatus: 'failed',
      terminalState: 'failed',
      outputText: `ERROR: ${message}`,
      iterations: 0,
      durationMs,
      error: message,
    };
  }

  private async runAgent(task: MappedTask): Promise<AgentRunResult> {
    const { ctx, options } = this;
    const routed = routedBackend(ctx, ctx.routing.decompositionTarget);
    if (!routed) {
      throw new ConnectivityError('no backend available for execution');
    }

    const definition = options.catalog.get(task.agentName) ?? options.catalog.get(PHASE_DEFAULT_AGENTS[task.phase]);
    const allowedRoots = ctx.config.tools.allowed_roots.length > 0 ? ctx.config.tools.allowed_roots : defaultAllowedRoots();

    const runtime = new AgentRuntime({
      backend: routed.backend,
      model: routed.status.modelId,
      agentPrompt: definition?.prompt ?? '',
      executor: this.executor,
      limits: ctx.config.agent,
      workDir: options.projectDir,
      outputsDir: ctx.outputsDir,
      allowedRoots,
      logger: ctx.logger,
      now: this.now,
    });
    runtime.on('state', (event) => this.emit('agent:state', event));
    return runtime.run({
      taskId: task.id,
      agentName: task.agentName,
      phase: task.phase,
      description: task.description,
    });
  }
}
