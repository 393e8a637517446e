import { describe, it, expect } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { BackendId, BackendStatus, ChatRequest, ChatResponse, InferenceBackend, ThroughputClass } from '@slotrun/shared';
import { decompose, buildDecomposeMessage, normalizePlan, planSchema } from './task.decomposer.js';
import { createPipelineContext } from '../pipeline/pipeline.context.js';
import type { PipelineContext } from '../pipeline/pipeline.context.js';
import { decideRouting } from '../probe/capability.probe.js';
import { buildDefaultConfig } from '../config/config.defaults.js';
import { silentLogger } from '../pipeline/pipeline.logger.js';
import { DecompositionError, MalformedOutputError, ConnectivityError } from '../errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Backend that answers chat calls with the given contents in order. */
function makeBackend(id: BackendId, replies: Array<string | Error>) {
  const calls: ChatRequest[] = [];
  let idx = 0;
  const backend: InferenceBackend = {
    id,
    kind: 'llamacpp',
    endpoint: `http://fake-${id}`,
    health: async () => true,
    listModels: async () => [`${id}-model`],
    slots: async () => null,
    chat: async (request): Promise<ChatResponse> => {
      calls.push(request);
      const reply = replies[idx++] ?? '';
      if (reply instanceof Error) throw reply;
      return { content: reply, reasoning: null, usage: null };
    },
  };
  return { backend, calls };
}

function status(id: BackendId, reachable: boolean, throughputClass: ThroughputClass = 'gpu'): BackendStatus {
  return {
    id,
    endpoint: `http://fake-${id}`,
    reachable,
    slotCount: 2,
    totalSlots: 2,
    modelId: `${id}-model`,
    models: [`${id}-model`],
    throughputClass,
    tokensPerSecond: null,
  };
}

function makeContext(backends: InferenceBackend[], statuses: BackendStatus[]): PipelineContext {
  const config = buildDefaultConfig('/tmp/slotrun-decomposer-test');
  config.paths.prompts_dir = '/nonexistent/slotrun-prompts';
  return createPipelineContext({
    config,
    backends,
    statuses,
    routing: decideRouting(statuses),
    slotBudget: 2,
    workDir: '/tmp/slotrun-run',
    outputsDir: '/tmp/slotrun-run/outputs',
    logger: silentLogger,
  });
}

const PRIMALITY_PLAN = JSON.stringify({
  parallel_groups: [
    {
      group: 2,
      description: 'Implement',
      tasks: [{ id: 'green-1', phase: 'GREEN', task: 'Implement is_prime', files: ['prime.py'] }],
    },
    {
      group: 1,
      description: 'Write failing tests',
      tasks: [
        { id: 'red-1', phase: 'RED', task: 'Test small primes', files: ['test_prime.py'] },
        { id: 'red-1', phase: 'red', task: 'Test composites and edge cases', files: ['test_prime.py'] },
      ],
    },
    {
      group: 3,
      description: 'Review',
      tasks: [{ id: 'review-1', phase: 'REVIEW', task: 'Review the implementation' }],
    },
  ],
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('buildDecomposeMessage', () => {
  it('demands JSON and states the slot budget', () => {
    expect(buildDecomposeMessage('Build X', 3)).toBe(
      'RESPOND ONLY WITH VALID JSON. No markdown, no explanation, just the JSON object.\n\n' +
        'Task: Build X\n\nAvailable worker slots: 3\n\nDecompose this task into atomic TDD tasks.',
    );
  });
});

describe('normalizePlan', () => {
  it('suffixes repeated ids so they are unique across the plan', () => {
    const wire = planSchema.parse({
      parallel_groups: [
        { group: 1, tasks: [{ id: 't1', phase: 'RED', task: 'a' }, { id: 't1', phase: 'RED', task: 'b' }] },
        { group: 2, tasks: [{ id: 't1', phase: 'GREEN', task: 'c' }] },
      ],
    });
    const ids = normalizePlan(wire).flatMap((g) => g.subtasks.map((s) => s.id));
    expect(ids).toEqual(['t1', 't1-2', 't1-3']);
  });

  it('limits ids to file-name-safe characters before making them unique', () => {
    const wire = planSchema.parse({
      parallel_groups: [
        { group: 1, tasks: [{ id: 'red/1', phase: 'RED', task: 'a' }, { id: 'red_1', phase: 'RED', task: 'b' }] },
        { group: 2, tasks: [{ id: 'green 1', phase: 'GREEN', task: 'c' }] },
      ],
    });
    const ids = normalizePlan(wire).flatMap((g) => g.subtasks.map((s) => s.id));
    expect(ids).toEqual(['red_1', 'red_1-2', 'green_1']);
  });

  it('rejects an unknown phase', () => {
    const result = planSchema.safeParse({
      parallel_groups: [{ group: 1, tasks: [{ id: 'x', phase: 'DEPLOY', task: 'ship' }] }],
    });
    expect(result.success).toBe(false);
  });

  it('rejects a group without tasks', () => {
    expect(planSchema.safeParse({ parallel_groups: [{ group: 1, tasks: [] }] }).success).toBe(false);
  });
});

describe('decompose', () => {
  it('decomposes a primality task with slot budget 2 into ordered groups', async () => {
    const worker = makeBackend('worker', [PRIMALITY_PLAN]);
    const ctx = makeContext([worker.backend], [status('worker', true)]);

    const plan = await decompose('Create a function to check primality', 2, ctx);

    expect(plan.groups.length).toBeGreaterThanOrEqual(1);
    expect(plan.groups.map((g) => g.groupNumber)).toEqual([1, 2, 3]);
    const ids = plan.groups.flatMap((g) => g.subtasks.map((s) => s.id));
    expect(new Set(ids).size).toBe(ids.length);
    expect(ids).toEqual(['red-1', 'red-1-2', 'green-1', 'review-1']);
    const phases = plan.groups.flatMap((g) => g.subtasks.map((s) => s.phase));
    expect(phases).toEqual(['RED', 'RED', 'GREEN', 'ANALYZE']);
    expect(plan.groups[2].subtasks[0].referencedFiles).toEqual([]);
    expect(plan.confidence).toBe('native');
    expect(plan.backend).toBe('worker');
    expect(plan.model).toBe('worker-model');
    expect(plan.slotBudget).toBe(2);

    const request = worker.calls[0];
    expect(request.temperature).toBe(0.3);
    expect(request.maxTokens).toBe(4096);
    expect(request.messages[1].content).toContain('Available worker slots: 2');
  });

  it('flags a truncated plan as recovered', async () => {
    const truncated = '{"parallel_groups":[{"group":1,"description":"d","tasks":[{"id":"a","phase":"RED","task":"t","files":[]}';
    const worker = makeBackend('worker', [truncated]);
    const ctx = makeContext([worker.backend], [status('worker', true)]);

    const plan = await decompose('Task', 2, ctx);

    expect(plan.confidence).toBe('recovered');
    expect(plan.groups[0].subtasks[0].id).toBe('a');
  });

  it('falls back to a cpu orchestrator with the smaller token budget', async () => {
    const orchestrator = makeBackend('orchestrator', [PRIMALITY_PLAN]);
    const ctx = makeContext(
      [orchestrator.backend],
      [status('worker', false), status('orchestrator', true, 'cpu')],
    );

    const plan = await decompose('Task', 2, ctx);

    expect(plan.backend).toBe('orchestrator');
    expect(orchestrator.calls[0].maxTokens).toBe(1500);
  });

  it('retries once after an unusable answer', async () => {
    const worker = makeBackend('worker', ['I would rather not.', PRIMALITY_PLAN]);
    const ctx = makeContext([worker.backend], [status('worker', true)]);

    const plan = await decompose('Task', 2, ctx);

    expect(worker.calls).toHaveLength(2);
    expect(plan.groups).toHaveLength(3);
  });

  it('throws DecompositionError carrying the parse failure after the last attempt', async () => {
    const worker = makeBackend('worker', ['nope', 'still nope']);
    const ctx = makeContext([worker.backend], [status('worker', true)]);

    const error = await decompose('Task', 2, ctx).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DecompositionError);
    expect(error instanceof DecompositionError && error.cause).toBeInstanceOf(MalformedOutputError);
    expect(error instanceof Error && error.message).toBe(
      'no valid plan after 2 attempts: no JSON object found',
    );
  });

  it('throws DecompositionError when the prompt override cannot be read', async () => {
    const promptsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'slotrun-prompts-'));
    try {
      await fs.mkdir(path.join(promptsDir, 'decompose.md'));
      const worker = makeBackend('worker', [PRIMALITY_PLAN]);
      const ctx = makeContext([worker.backend], [status('worker', true)]);
      ctx.config.paths.prompts_dir = promptsDir;

      const error = await decompose('Task', 2, ctx).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DecompositionError);
      expect(error instanceof Error && error.message).toMatch(/^could not load the decomposition prompt: EISDIR/);
      expect(worker.calls).toHaveLength(0);
    } finally {
      await fs.rm(promptsDir, { recursive: true, force: true });
    }
  });

  it('throws DecompositionError with a connectivity cause when nothing is routed', async () => {
    const ctx = makeContext([], [status('worker', false), status('orchestrator', false)]);

    const error = await decompose('Task', 2, ctx).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DecompositionError);
    expect(error instanceof DecompositionError && error.cause).toBeInstanceOf(ConnectivityError);
  });
});
