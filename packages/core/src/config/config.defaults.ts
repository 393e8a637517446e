import * as os from 'node:os';
import * as path from 'node:path';
import type { SlotrunConfig } from '@slotrun/shared';

/** Task text matching any of these suggests a specialized agent may be worth generating. */
export const SPECIALIZED_KEYWORDS = [
  'blockchain',
  'kubernetes',
  'terraform',
  'ansible',
  'graphql',
  'grpc',
  'websocket',
  'mqtt',
  'kafka',
  'elasticsearch',
  'redis',
  'mongodb',
  'postgresql',
  'mysql',
  'docker',
  'nginx',
  'aws',
  'azure',
  'gcp',
  'ci/cd',
  'devops',
  'mlops',
  'data pipeline',
  'etl',
  'scraping',
  'crawling',
  'regex',
  'parsing',
  'compiler',
  'interpreter',
  'dsl',
];

export function defaultConfigDir(): string {
  return path.join(os.homedir(), '.slotrun');
}

export function buildDefaultConfig(configDir: string = defaultConfigDir()): SlotrunConfig {
  return {
    backends: {
      worker: { kind: 'llamacpp', host: 'localhost', port: 8081, enabled: true },
      orchestrator: { kind: 'llamacpp', host: 'localhost', port: 8083, enabled: true },
    },
    models: {
      decomposition: {
        preferred: ['agents-seed-coder', 'coding-seed-coder'],
        prefix: 'agents-',
      },
      quality: {
        preferred: ['agents-qwen3-14b', 'agents-nemotron'],
        prefix: 'agents-',
      },
    },
    probe: {
      health_timeout_ms: 3_000,
      throughput_timeout_ms: 10_000,
      throughput_max_tokens: 50,
      gpu_threshold_tps: 30,
    },
    slots: {
      default: 6,
    },
    decomposer: {
      timeout_ms: 60_000,
      max_tokens: 4096,
      cpu_max_tokens: 1500,
      temperature: 0.3,
      max_attempts: 2,
    },
    agent: {
      max_iterations: 5,
      max_retries: 2,
      call_timeout_ms: 45_000,
      total_timeout_ms: 180_000,
      max_tokens: 4096,
      temperature: 0.3,
      output_limit_bytes: 4000,
    },
    tools: {
      timeout_ms: 30_000,
      allowed_roots: [],
    },
    selector: {
      enabled: true,
      timeout_ms: 5_000,
      generate: true,
      specialized_keywords: [...SPECIALIZED_KEYWORDS],
    },
    review: {
      timeout_ms: 60_000,
      max_tokens: 1024,
      fallback_max_tokens: 2048,
      preview_chars: 1000,
    },
    paths: {
      agents_dir: path.join(configDir, 'agents'),
      prompts_dir: path.join(configDir, 'prompts'),
      runs_dir: os.tmpdir(),
    },
    runs: {
      retention: 20,
    },
  };
}

export const DEFAULT_CONFIG: SlotrunConfig = buildDefaultConfig();
