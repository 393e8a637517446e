import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import type {
  BatchResult,
  DecompositionPlan,
  ExecutionResult,
  InferenceBackend,
  PipelineResult,
  QualityRecord,
  SlotMapping,
  SlotrunConfig,
  SynthesisRecord,
} from '@slotrun/shared';
import { createBackends } from '../backends/backend.factory.js';
import { probeBackends } from '../probe/capability.probe.js';
import { decompose } from '../decomposer/task.decomposer.js';
import { mapPlan } from '../mapper/slot.mapper.js';
import { AgentCatalog } from '../agents/agent.catalog.js';
import { AgentGenerator } from '../agents/agent.generator.js';
import { AgentSelector } from '../agents/agent.selector.js';
import type { AgentStateEvent } from '../agents/agent.runtime.js';
import { BatchScheduler } from '../scheduler/batch.scheduler.js';
import type { TaskRunner } from '../scheduler/batch.scheduler.js';
import { reviewResults } from '../review/quality.gate.js';
import { synthesize } from '../review/synthesizer.js';
import { DecompositionError, errorMessage } from '../errors.js';
import { createPipelineContext } from './pipeline.context.js';
import type { PipelineContext } from './pipeline.context.js';
import { PipelineArtifacts } from './pipeline.artifacts.js';
import { PipelineLogger } from './pipeline.logger.js';

export type PipelineStage = 'probe' | 'decompose' | 'map' | 'execute' | 'review' | 'synthesize';

export interface PipelineRunOptions {
  /** Task text, already read from a file if one was given. */
  task: string;
  /** Slot budget override; wins over the probed idle slot count. */
  slots?: number;
}

export interface PipelineOutcome {
  /** `aborted` only when decomposition failed. */
  status: 'completed' | 'aborted';
  runId: string;
  workDir: string;
  synthesis: SynthesisRecord;
  plan: DecompositionPlan | null;
  mapping: SlotMapping | null;
  execution: PipelineResult | null;
  quality: QualityRecord | null;
}

export interface PipelineOrchestratorOptions {
  config: SlotrunConfig;
  /** Defaults to the enabled backends in `config`. */
  backends?: readonly InferenceBackend[];
  /** Directory agents work in. Defaults to the current directory. */
  projectDir?: string;
  /** Latest probe snapshot destination. */
  statusFile?: string;
  /** Echo progress lines to stderr. Defaults to true. */
  echo?: boolean;
  /** Replaces the AgentRuntime-backed task runner. */
  runner?: TaskRunner;
  now?: () => Date;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface PipelineOrchestrator {
  on(event: 'stage', listener: (stage: PipelineStage) => void): this;
  on(event: 'task:complete', listener: (result: ExecutionResult) => void): this;
  on(event: 'batch:complete', listener: (result: BatchResult) => void): this;
  on(event: 'agent:state', listener: (event: AgentStateEvent) => void): this;

  emit(event: 'stage', stage: PipelineStage): boolean;
  emit(event: 'task:complete', result: ExecutionResult): boolean;
  emit(event: 'batch:complete', result: BatchResult): boolean;
  emit(event: 'agent:state', state: AgentStateEvent): boolean;
}

/**
 * Runs one task through every stage in order:
 *
 *   probe → slot budget → decompose → map → execute → review → synthesize
 *
 * Each stage sees only the previous stage's output and the frozen context.
 * Only a failed decomposition stops the run, and even then an error record
 * is written and returned.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class PipelineOrchestrator extends EventEmitter {
  private readonly now: () => Date;

  constructor(private readonly options: PipelineOrchestratorOptions) {
    super();
    this.now = options.now ?? (() => new Date());
  }

  async run(request: PipelineRunOptions): Promise<PipelineOutcome> {
    const { config } = this.options;
    const artifacts = await PipelineArtifacts.create(config.paths.runs_dir, this.now);
    const logger = new PipelineLogger({ file: artifacts.logFile, echo: this.options.echo ?? true, now: this.now });
    logger.info('pipeline', `work directory: ${artifacts.workDir}`);

    try {
      const removed = await PipelineArtifacts.prune(config.paths.runs_dir, config.runs.retention);
      if (removed.length > 0) logger.info('pipeline', `pruned ${removed.length} old runs`);
    } catch (err) {
      logger.warn('pipeline', `could not prune old runs: ${errorMessage(err)}`);
    }

    this.emit('stage', 'probe');
    const backends = this.options.backends ?? createBackends(config);
    const report = await probeBackends(backends, config, {
      slotsOverride: request.slots,
      statusFile: this.options.statusFile,
      logger,
    });

    const ctx = createPipelineContext({
      config,
      backends,
      statuses: report.statuses,
      routing: report.routing,
      slotBudget: report.slotBudget,
      workDir: artifacts.workDir,
      outputsDir: artifacts.outputsDir,
      logger,
    });

    const base = { runId: artifacts.runId, workDir: artifacts.workDir };

    this.emit('stage', 'decompose');
    let plan: DecompositionPlan;
    try {
      plan = await decompose(request.task, ctx.slotBudget, ctx);
    } catch (err) {
      if (!(err instanceof DecompositionError)) throw err;
      const message = `Decomposition failed: ${err.message}`;
      logger.error('decompose', message);
      const synthesis: SynthesisRecord = { kind: 'error', error: message, stage: 'decomposition' };
      await artifacts.save('synthesis', synthesis);
      await logger.flush();
      return { ...base, status: 'aborted', synthesis, plan: null, mapping: null, execution: null, quality: null };
    }
    await artifacts.save('decomposed', plan);

    this.emit('stage', 'map');
    let catalog: AgentCatalog;
    try {
      catalog = await AgentCatalog.load(config.paths.agents_dir, logger);
    } catch (err) {
      logger.warn('map', `could not read agents directory, using built-in agents only: ${errorMessage(err)}`);
      catalog = new AgentCatalog(config.paths.agents_dir, logger);
    }
    const mapping = await mapPlan(plan, ctx.slotBudget, this.buildSelector(ctx, catalog), logger);
    await artifacts.save('mapped', mapping);

    this.emit('stage', 'execute');
    const scheduler = new BatchScheduler(ctx, {
      catalog,
      projectDir: this.options.projectDir ?? process.cwd(),
      runner: this.options.runner,
    });
    scheduler.on('task:complete', (result) => this.emit('task:complete', result));
    scheduler.on('batch:complete', (result) => this.emit('batch:complete', result));
    scheduler.on('agent:state', (event) => this.emit('agent:state', event));
    const execution = await scheduler.run(mapping);
    await artifacts.save('results', execution);

    this.emit('stage', 'review');
    const quality = await reviewResults(execution, ctx);
    await artifacts.save('quality', quality);

    this.emit('stage', 'synthesize');
    const synthesis = await synthesize(execution, quality, ctx);
    await artifacts.save('synthesis', synthesis);

    logger.info('pipeline', `done: ${execution.overallStatus}, results in ${artifacts.workDir}`);
    await logger.flush();
    return { ...base, status: 'completed', synthesis, plan, mapping, execution, quality };
  }

  /** Agent selection asks the worker when it is reachable. */
  private buildSelector(ctx: PipelineContext, catalog: AgentCatalog): AgentSelector {
    const worker = ctx.backends.get('worker');
    const status = ctx.statuses.find((s) => s.id === 'worker');
    const backend = worker && status?.reachable ? worker : null;
    const model = status?.modelId ?? 'worker';
    const generator =
      backend && ctx.config.selector.generate ? new AgentGenerator(backend, model, catalog, ctx.logger) : null;
    return new AgentSelector({
      catalog,
      config: ctx.config.selector,
      backend,
      model,
      generator,
      logger: ctx.logger,
    });
  }
}

/**
 * A task argument is either a path to a file holding the task or the task
 * text itself.
 */
export async function readTaskInput(arg: string): Promise<{ task: string; fromFile: string | null }> {
  try {
    const stat = await fs.stat(arg);
    if (stat.isFile()) {
      return { task: (await fs.readFile(arg, 'utf-8')).trim(), fromFile: arg };
    }
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code !== 'ENOENT' && code !== 'ENAMETOOLONG' && code !== 'ENOTDIR') throw err;
  }
  return { task: arg.trim(), fromFile: null };
}
