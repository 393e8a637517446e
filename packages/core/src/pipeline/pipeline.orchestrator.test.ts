import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type {
  BackendId,
  ChatRequest,
  ChatResponse,
  InferenceBackend,
  MappedTask,
  SlotrunConfig,
} from '@slotrun/shared';
import { buildDefaultConfig } from '../config/config.defaults.js';
import type { AgentRunResult } from '../agents/agent.runtime.js';
import { PipelineOrchestrator, readTaskInput } from './pipeline.orchestrator.js';
import type { PipelineStage } from './pipeline.orchestrator.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PLAN = JSON.stringify({
  parallel_groups: [
    {
      group: 1,
      description: 'tests',
      tasks: [
        { id: 'red-1', phase: 'RED', task: 'Test is_prime on small primes', files: ['tests/test_prime.py'] },
        { id: 'red-2', phase: 'RED', task: 'Test is_prime on composites', files: ['tests/test_prime.py'] },
      ],
    },
    {
      group: 2,
      description: 'implementation',
      tasks: [{ id: 'green-1', phase: 'GREEN', task: 'Implement is_prime', files: ['prime.py'] }],
    },
  ],
});

function reply(content: string): ChatResponse {
  return { content, reasoning: null, usage: { promptTokens: 5, completionTokens: 10, totalTokens: 15 } };
}

/** A worker that answers each pipeline prompt by recognising its opening words. */
function makeBackend(id: BackendId, healthy: boolean): InferenceBackend & { requests: ChatRequest[] } {
  const requests: ChatRequest[] = [];
  return {
    id,
    kind: 'llamacpp',
    endpoint: `http://localhost:${id === 'worker' ? 8081 : 8083}`,
    requests,
    health: () => Promise.resolve(healthy),
    listModels: () => Promise.resolve(['agents-seed-coder']),
    slots: () =>
      Promise.resolve([
        { id: 0, busy: false },
        { id: 1, busy: false },
      ]),
    chat(request: ChatRequest): Promise<ChatResponse> {
      requests.push(request);
      const first = request.messages[0]?.content ?? '';
      const user = request.messages[request.messages.length - 1]?.content ?? '';
      if (first === 'Say hello') return Promise.resolve(reply('Hello!'));
      if (first.startsWith('You are a software task planner')) return Promise.resolve(reply(PLAN));
      if (user.startsWith('Review the following')) {
        return Promise.resolve(reply('{"status": "needs_review", "overall_score": 70}'));
      }
      if (user.startsWith('Synthesize')) {
        return Promise.resolve(reply('{"summary": "Tests written, implementation incomplete"}'));
      }
      return Promise.reject(new Error(`unexpected prompt: ${user.slice(0, 40)}`));
    },
  };
}

function makeRunner(ran: string[]): (task: MappedTask) => Promise<AgentRunResult> {
  return (task) => {
    ran.push(task.id);
    if (task.id === 'green-1') {
      return Promise.resolve({
        terminalState: 'max_iterations',
        output: 'WARNING: Agent did not complete within 5 iterations. Last response:\nstill working',
        iterations: 5,
        modelCalls: 5,
        error: 'Agent did not complete within 5 iterations',
        artifactPath: '',
      });
    }
    return Promise.resolve({
      terminalState: 'final_answer',
      output: `done ${task.id}`,
      iterations: 1,
      modelCalls: 1,
      artifactPath: '',
    });
  };
}

async function readArtifact(workDir: string, kind: string): Promise<{ kind: string; data: unknown }> {
  return JSON.parse(await fs.readFile(path.join(workDir, `${kind}.json`), 'utf-8'));
}

let tmpDir: string;
let config: SlotrunConfig;

beforeEach(async () => {
  tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'slotrun-pipeline-')));
  config = buildDefaultConfig(tmpDir);
  config.paths.runs_dir = path.join(tmpDir, 'runs');
  config.selector.enabled = false;
  config.selector.generate = false;
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('PipelineOrchestrator', () => {
  it('runs every stage and persists each stage document', async () => {
    const worker = makeBackend('worker', true);
    const ran: string[] = [];
    const orchestrator = new PipelineOrchestrator({
      config,
      backends: [worker, makeBackend('orchestrator', false)],
      projectDir: tmpDir,
      statusFile: path.join(tmpDir, 'status.json'),
      echo: false,
      runner: makeRunner(ran),
    });
    const stages: PipelineStage[] = [];
    orchestrator.on('stage', (stage) => stages.push(stage));

    const outcome = await orchestrator.run({ task: 'Write is_prime with tests' });

    expect(stages).toEqual(['probe', 'decompose', 'map', 'execute', 'review', 'synthesize']);
    expect(outcome.status).toBe('completed');
    expect(ran).toEqual(['red-1', 'red-2', 'green-1']);

    expect(outcome.plan?.slotBudget).toBe(2);
    expect(outcome.mapping?.batches.map((b) => b.tasks.map((t) => `${t.id}@${t.slot}:${t.agentName}`))).toEqual([
      ['red-1@1:test-writer', 'red-2@2:test-writer'],
      ['green-1@1:code-generator'],
    ]);
    expect(outcome.execution?.overallStatus).toBe('partial');
    expect(outcome.execution?.totalSuccess).toBe(2);
    expect(outcome.execution?.totalFailed).toBe(1);

    expect(outcome.quality).toEqual({
      kind: 'reviewed',
      status: 'needs_review',
      overallScore: 70,
      confidence: 'native',
      backend: 'worker',
      review: { status: 'needs_review', overall_score: 70 },
    });
    expect(outcome.synthesis).toEqual({
      kind: 'synthesis',
      confidence: 'native',
      backend: 'worker',
      synthesis: { summary: 'Tests written, implementation incomplete' },
    });

    for (const kind of ['decomposed', 'mapped', 'results', 'quality', 'synthesis']) {
      const doc = await readArtifact(outcome.workDir, kind);
      expect(doc.kind).toBe(kind);
    }
    expect((await readArtifact(outcome.workDir, 'synthesis')).data).toEqual(outcome.synthesis);
    expect((await fs.readdir(path.join(outcome.workDir, 'outputs'))).sort()).toEqual([
      'green-1.json',
      'red-1.json',
      'red-2.json',
    ]);
    expect((await fs.readFile(path.join(outcome.workDir, 'pipeline.log'), 'utf-8')).length).toBeGreaterThan(0);

    const status = JSON.parse(await fs.readFile(path.join(tmpDir, 'status.json'), 'utf-8'));
    expect(status.routing).toEqual({ decompositionTarget: 'worker', qualityTarget: 'worker' });
    expect(status.slotBudget).toBe(2);
  });

  it('passes the slot override through to decomposition and mapping', async () => {
    const worker = makeBackend('worker', true);
    const orchestrator = new PipelineOrchestrator({
      config,
      backends: [worker],
      projectDir: tmpDir,
      echo: false,
      runner: makeRunner([]),
    });

    const outcome = await orchestrator.run({ task: 'Write is_prime with tests', slots: 1 });

    const decomposeRequest = worker.requests.find((r) => r.messages[0]?.content.startsWith('You are a software'));
    expect(decomposeRequest?.messages[1]?.content).toContain('Available worker slots: 1\n');
    expect(outcome.mapping?.batches[0]?.tasks.map((t) => t.slot)).toEqual([1, 1]);
    expect(outcome.mapping?.batches[0]?.parallelism).toBe(1);
  });

  it('falls back to the built-in agents when the agents directory is unreadable', async () => {
    const notADir = path.join(tmpDir, 'agents-file');
    await fs.writeFile(notADir, 'not a directory', 'utf-8');
    config.paths.agents_dir = path.join(notADir, 'agents');
    const orchestrator = new PipelineOrchestrator({
      config,
      backends: [makeBackend('worker', true)],
      projectDir: tmpDir,
      echo: false,
      runner: makeRunner([]),
    });

    const outcome = await orchestrator.run({ task: 'Write is_prime with tests' });

    expect(outcome.status).toBe('completed');
    expect(outcome.mapping?.batches[1]?.tasks.map((t) => t.agentName)).toEqual(['code-generator']);
    expect(outcome.synthesis.kind).toBe('synthesis');
  });

  it('still returns review and raw synthesis records when the prompt overrides cannot be read', async () => {
    await fs.mkdir(path.join(config.paths.prompts_dir, 'quality-review.md'), { recursive: true });
    await fs.mkdir(path.join(config.paths.prompts_dir, 'synthesize.md'), { recursive: true });
    const orchestrator = new PipelineOrchestrator({
      config,
      backends: [makeBackend('worker', true)],
      projectDir: tmpDir,
      echo: false,
      runner: makeRunner([]),
    });

    const outcome = await orchestrator.run({ task: 'Write is_prime with tests' });

    expect(outcome.status).toBe('completed');
    expect(outcome.quality?.kind).toBe('degraded');
    expect(outcome.synthesis.kind).toBe('raw');
    if (outcome.synthesis.kind === 'raw') {
      expect(outcome.synthesis.execution).toEqual(outcome.execution);
    }
  });

  it('aborts with an error record when nothing can decompose', async () => {
    const ran: string[] = [];
    const orchestrator = new PipelineOrchestrator({
      config,
      backends: [makeBackend('worker', false), makeBackend('orchestrator', false)],
      projectDir: tmpDir,
      echo: false,
      runner: makeRunner(ran),
    });

    const outcome = await orchestrator.run({ task: 'Write is_prime with tests' });

    expect(outcome.status).toBe('aborted');
    expect(outcome.synthesis).toEqual({
      kind: 'error',
      error: 'Decomposition failed: no backend available for decomposition',
      stage: 'decomposition',
    });
    expect(outcome.plan).toBeNull();
    expect(outcome.execution).toBeNull();
    expect(ran).toEqual([]);
    expect((await readArtifact(outcome.workDir, 'synthesis')).data).toEqual(outcome.synthesis);
    await expect(fs.stat(path.join(outcome.workDir, 'decomposed.json'))).rejects.toThrow();
  });

  it('keeps only the configured number of run directories', async () => {
    config.runs.retention = 1;
    const options = {
      config,
      backends: [makeBackend('worker', false)],
      projectDir: tmpDir,
      echo: false,
    };

    const first = await new PipelineOrchestrator({ ...options, now: () => new Date('2025-01-01T00:00:00Z') }).run({
      task: 'one',
    });
    const second = await new PipelineOrchestrator({ ...options, now: () => new Date('2025-01-02T00:00:00Z') }).run({
      task: 'two',
    });

    const runs = await fs.readdir(config.paths.runs_dir);
    expect(runs).toEqual([path.basename(second.workDir)]);
    expect(runs).not.toContain(path.basename(first.workDir));
  });
});

describe('readTaskInput', () => {
  it('reads the task from a file', async () => {
    const file = path.join(tmpDir, 'task.md');
    await fs.writeFile(file, '\nBuild a CSV parser\n', 'utf-8');
    await expect(readTaskInput(file)).resolves.toEqual({ task: 'Build a CSV parser', fromFile: file });
  });

  it('treats anything that is not a file as the task text', async () => {
    await expect(readTaskInput('  Build a CSV parser ')).resolves.toEqual({
      task: 'Build a CSV parser',
      fromFile: null,
    });
    await expect(readTaskInput(tmpDir)).resolves.toEqual({ task: tmpDir, fromFile: null });
  });
});
