import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type {
  BackendStatus,
  ChatResponse,
  ExecutionResult,
  InferenceBackend,
  MappedBatch,
  MappedTask,
  Phase,
  RoutingDecision,
  SlotMapping,
} from '@slotrun/shared';
import { BatchScheduler, overallStatus, truncateOutput } from './batch.scheduler.js';
import type { TaskRunner } from './batch.scheduler.js';
import type { AgentRunResult, AgentStateEvent } from '../agents/agent.runtime.js';
import { AgentCatalog } from '../agents/agent.catalog.js';
import { createPipelineContext } from '../pipeline/pipeline.context.js';
import type { PipelineContext } from '../pipeline/pipeline.context.js';
import { silentLogger } from '../pipeline/pipeline.logger.js';
import { buildDefaultConfig } from '../config/config.defaults.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let tmpDir: string;

function makeTask(id: string, slot: number, phase: Phase = 'GREEN'): MappedTask {
  return {
    id,
    phase,
    description: `do ${id}`,
    referencedFiles: [],
    slot,
    agentName: 'code-generator',
    agentSource: 'default',
  };
}

function makeMapping(groups: MappedTask[][]): SlotMapping {
  const batches: MappedBatch[] = groups.map((tasks, i) => ({
    groupNumber: i + 1,
    description: `group ${i + 1}`,
    tasks,
    parallelism: Math.min(tasks.length, 2),
  }));
  return {
    slotBudget: 2,
    batches,
    summary: { totalTasks: groups.flat().length, totalBatches: batches.length, maxParallelism: 2 },
  };
}

function finalAnswer(output: string): AgentRunResult {
  return { terminalState: 'final_answer', output, iterations: 1, modelCalls: 1, artifactPath: '' };
}

const workerStatus: BackendStatus = {
  id: 'worker',
  endpoint: 'http://localhost:8081',
  reachable: true,
  slotCount: 2,
  totalSlots: 2,
  modelId: 'agents-seed-coder',
  models: ['agents-seed-coder'],
  throughputClass: 'gpu',
  tokensPerSecond: 50,
};

function makeBackend(content: string): InferenceBackend {
  return {
    id: 'worker',
    kind: 'llamacpp',
    endpoint: 'http://localhost:8081',
    health: () => Promise.resolve(true),
    listModels: () => Promise.resolve(['agents-seed-coder']),
    slots: () => Promise.resolve(null),
    chat: (): Promise<ChatResponse> => Promise.resolve({ content, reasoning: null, usage: null }),
  };
}

function makeContext(
  routing: RoutingDecision = { decompositionTarget: 'none', qualityTarget: 'none' },
  backends: InferenceBackend[] = [],
  statuses: BackendStatus[] = [],
): PipelineContext {
  return createPipelineContext({
    config: buildDefaultConfig(tmpDir),
    backends,
    statuses,
    routing,
    slotBudget: 2,
    workDir: tmpDir,
    outputsDir: path.join(tmpDir, 'outputs'),
    logger: silentLogger,
  });
}

async function makeScheduler(ctx: PipelineContext, runner?: TaskRunner): Promise<BatchScheduler> {
  const catalog = await AgentCatalog.load(path.join(tmpDir, 'agents'));
  return new BatchScheduler(ctx, { catalog, projectDir: tmpDir, runner });
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

beforeEach(async () => {
  tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'slotrun-scheduler-')));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('BatchScheduler', () => {
  it('starts no task of a group before every task of the previous group finished', async () => {
    const trace: string[] = [];
    const durations: Record<string, number> = { a: 30, b: 10, c: 0 };
    const runner: TaskRunner = async (task) => {
      trace.push(`start:${task.id}`);
      await delay(durations[task.id] ?? 0);
      trace.push(`end:${task.id}`);
      return finalAnswer(task.id);
    };

    const scheduler = await makeScheduler(makeContext(), runner);
    const result = await scheduler.run(makeMapping([[makeTask('a', 1), makeTask('b', 2)], [makeTask('c', 1)]]));

    expect(trace).toEqual(['start:a', 'start:b', 'end:b', 'end:a', 'start:c', 'end:c']);
    expect(result.overallStatus).toBe('success');
    expect(result.batches.map((b) => b.results.map((r) => r.taskId))).toEqual([['a', 'b'], ['c']]);
  });

  it('isolates failures and rejected runners to their batch', async () => {
    const runner: TaskRunner = (task) => {
      if (task.id === 'boom') return Promise.reject(new Error('runner crashed'));
      if (task.id === 'slow') {
        return Promise.resolve({
          terminalState: 'max_iterations',
          output: 'WARNING: Agent did not complete within 5 iterations. Last response:\n...',
          iterations: 5,
          modelCalls: 5,
          artifactPath: '',
          error: 'Agent did not complete within 5 iterations',
        });
      }
      return Promise.resolve(finalAnswer('ok'));
    };

    const scheduler = await makeScheduler(makeContext(), runner);
    const completed: string[] = [];
    scheduler.on('task:complete', (r) => completed.push(r.taskId));

    const result = await scheduler.run(
      makeMapping([[makeTask('ok-1', 1), makeTask('boom', 2)], [makeTask('slow', 1), makeTask('ok-2', 2)]]),
    );

    expect(result.overallStatus).toBe('partial');
    expect(result.totalSuccess).toBe(2);
    expect(result.totalFailed).toBe(2);
    expect(result.batches.map((b) => [b.successCount, b.failedCount])).toEqual([
      [1, 1],
      [1, 1],
    ]);
    expect(completed.sort()).toEqual(['boom', 'ok-1', 'ok-2', 'slow']);

    const boom = result.batches[0]?.results[1];
    expect(boom?.exitStatus).toBe('failed');
    expect(boom?.terminalState).toBe('failed');
    expect(boom?.error).toBe('runner crashed');
    expect(boom?.outputText).toBe('ERROR: runner crashed');

    const slow = result.batches[1]?.results[0];
    expect(slow?.exitStatus).toBe('failed');
    expect(slow?.terminalState).toBe('max_iterations');
  });

  it('writes one JSON record per task and truncates long output', async () => {
    const runner: TaskRunner = () => Promise.resolve(finalAnswer('x'.repeat(5000)));
    const scheduler = await makeScheduler(makeContext(), runner);

    const result = await scheduler.run(makeMapping([[makeTask('red-1', 1, 'RED')]]));

    const recordText = await fs.readFile(path.join(tmpDir, 'outputs', 'red-1.json'), 'utf-8');
    const record: ExecutionResult = JSON.parse(recordText);
    expect(record.taskId).toBe('red-1');
    expect(record.phase).toBe('RED');
    expect(record.outputText).toBe('x'.repeat(4000) + '... [truncated]');
    expect(result.outputDir).toBe(path.join(tmpDir, 'outputs'));
  });

  it('keeps separate records for ids that differ only in unsafe characters', async () => {
    const runner: TaskRunner = (task) => Promise.resolve(finalAnswer(`done ${task.id}`));
    const scheduler = await makeScheduler(makeContext(), runner);

    await scheduler.run(makeMapping([[makeTask('red/1', 1, 'RED'), makeTask('red_1', 2, 'RED')]]));

    const files = (await fs.readdir(path.join(tmpDir, 'outputs'))).sort();
    expect(files).toHaveLength(2);
    expect(files).toContain('red_1.json');
    const records: ExecutionResult[] = await Promise.all(
      files.map(async (f) => JSON.parse(await fs.readFile(path.join(tmpDir, 'outputs', f), 'utf-8'))),
    );
    expect(records.map((r) => r.outputText).sort()).toEqual(['done red/1', 'done red_1']);
  });

  it('fails a task when no backend is routed for execution', async () => {
    const scheduler = await makeScheduler(makeContext());
    const result = await scheduler.run(makeMapping([[makeTask('green-1', 1)]]));

    expect(result.overallStatus).toBe('failed');
    expect(result.batches[0]?.results[0]?.error).toBe('no backend available for execution');
  });

  it('runs the agent runtime on the routed backend and forwards its state', async () => {
    const ctx = makeContext(
      { decompositionTarget: 'worker', qualityTarget: 'worker' },
      [makeBackend('Implemented.')],
      [workerStatus],
    );
    const scheduler = await makeScheduler(ctx);
    const states: AgentStateEvent[] = [];
    scheduler.on('agent:state', (e) => states.push(e));

    const result = await scheduler.run(makeMapping([[makeTask('green-1', 1)]]));

    expect(result.overallStatus).toBe('success');
    expect(result.batches[0]?.results[0]?.outputText).toBe('Implemented.');
    expect(states.map((s) => s.state)).toEqual(['awaiting_model', 'final_answer']);
    expect(await fs.readFile(path.join(tmpDir, 'outputs', 'green-1.md'), 'utf-8')).toBe('Implemented.\n');
  });
});

describe('truncateOutput', () => {
  it('leaves short text alone', () => {
    expect(truncateOutput('abc', 3)).toBe('abc');
  });

  it('does not split a multi-byte character', () => {
    expect(truncateOutput('aé', 2)).toBe('a... [truncated]');
  });
});

describe('overallStatus', () => {
  it('classifies run outcomes', () => {
    expect(overallStatus(3, 0)).toBe('success');
    expect(overallStatus(2, 1)).toBe('partial');
    expect(overallStatus(0, 3)).toBe('failed');
  });
});
