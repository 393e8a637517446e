import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { SlotrunConfig } from '@slotrun/shared';
import { buildDefaultConfig, defaultConfigDir } from './config.defaults.js';

export const CONFIG_FILE = 'config.yaml';

export interface LoadConfigOptions {
  /** Directory holding config.yaml. Defaults to ~/.slotrun */
  dir?: string;
  /** Environment consulted for port and slot overrides. Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

const port = z
  .number({ invalid_type_error: 'must be a valid port number (1-65535)' })
  .int('must be a valid port number (1-65535)')
  .min(1, 'must be a valid port number (1-65535)')
  .max(65535, 'must be a valid port number (1-65535)');

const positiveInt = (label: string) =>
  z.number({ invalid_type_error: `must be ${label}` }).int().min(1, `must be ${label}`);

const backendSchema = z.object({
  kind: z.enum(['llamacpp', 'ollama'], {
    errorMap: () => ({ message: 'must be "llamacpp" or "ollama"' }),
  }),
  host: z.string().min(1, 'must be a non-empty string'),
  port,
  enabled: z.boolean(),
});

const preferenceSchema = z.object({
  preferred: z.array(z.string()),
  prefix: z.string(),
});

const configSchema = z.object({
  backends: z.object({ worker: backendSchema, orchestrator: backendSchema }),
  models: z.object({ decomposition: preferenceSchema, quality: preferenceSchema }),
  probe: z.object({
    health_timeout_ms: positiveInt('>= 1'),
    throughput_timeout_ms: positiveInt('>= 1'),
    throughput_max_tokens: positiveInt('>= 1'),
    gpu_threshold_tps: z.number().positive('must be > 0'),
  }),
  slots: z.object({ default: positiveInt('>= 1') }),
  decomposer: z.object({
    timeout_ms: positiveInt('>= 1'),
    max_tokens: positiveInt('>= 1'),
    cpu_max_tokens: positiveInt('>= 1'),
    temperature: z.number().min(0, 'must be >= 0'),
    max_attempts: positiveInt('>= 1'),
  }),
  agent: z.object({
    max_iterations: positiveInt('>= 1'),
    max_retries: z.number().int().min(0, 'must be >= 0'),
    call_timeout_ms: positiveInt('>= 1'),
    total_timeout_ms: positiveInt('>= 1'),
    max_tokens: positiveInt('>= 1'),
    temperature: z.number().min(0, 'must be >= 0'),
    output_limit_bytes: z.number().int().min(64, 'must be >= 64'),
  }),
  tools: z.object({
    timeout_ms: positiveInt('>= 1'),
    allowed_roots: z.array(z.string().min(1, 'must be a non-empty string')),
  }),
  selector: z.object({
    enabled: z.boolean(),
    timeout_ms: positiveInt('>= 1'),
    generate: z.boolean(),
    specialized_keywords: z.array(z.string()),
  }),
  review: z.object({
    timeout_ms: positiveInt('>= 1'),
    max_tokens: positiveInt('>= 1'),
    fallback_max_tokens: positiveInt('>= 1'),
    preview_chars: positiveInt('>= 1'),
  }),
  paths: z.object({
    agents_dir: z.string().min(1, 'must be a non-empty string'),
    prompts_dir: z.string().min(1, 'must be a non-empty string'),
    runs_dir: z.string().min(1, 'must be a non-empty string'),
  }),
  runs: z.object({ retention: positiveInt('>= 1') }),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, overrideVal] of Object.entries(override)) {
    const baseVal = base[key];
    if (isPlainObject(overrideVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else if (overrideVal !== undefined && overrideVal !== null) {
      result[key] = overrideVal;
    }
  }
  return result;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const num = (value: string | undefined): number | undefined =>
    value !== undefined && value.trim() !== '' ? Number(value) : undefined;

  const workerPort = num(env['SLOTRUN_WORKER_PORT']);
  const orchestratorPort = num(env['SLOTRUN_ORCHESTRATOR_PORT']);
  const slots = num(env['SLOTRUN_SLOTS']);

  if (workerPort !== undefined || orchestratorPort !== undefined) {
    const backends: Record<string, unknown> = {};
    if (workerPort !== undefined) backends['worker'] = { port: workerPort };
    if (orchestratorPort !== undefined) backends['orchestrator'] = { port: orchestratorPort };
    overrides['backends'] = backends;
  }
  if (slots !== undefined) overrides['slots'] = { default: slots };
  return overrides;
}

/**
 * Validate a candidate config. Throws on the first invalid key with a message
 * naming its dotted path.
 */
export function validateConfig(candidate: unknown): SlotrunConfig {
  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '(root)';
    const message = issue ? issue.message : 'invalid';
    throw new Error(`Config validation failed: ${where} ${message}`);
  }
  return parsed.data;
}

export function writeConfig(config: SlotrunConfig, dir: string = defaultConfigDir()): void {
  const valid = validateConfig(config);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, CONFIG_FILE), yaml.dump(valid), 'utf8');
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<SlotrunConfig> {
  const dir = options.dir ?? defaultConfigDir();
  const env = options.env ?? process.env;
  const configPath = path.join(dir, CONFIG_FILE);
  const defaults = buildDefaultConfig(dir);

  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  let userConfig: Record<string, unknown> = {};

  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, 'utf8');
    const parsed: unknown = yaml.load(raw);
    if (isPlainObject(parsed)) {
      userConfig = parsed;
    }
  } else {
    fs.writeFileSync(configPath, yaml.dump(defaults), 'utf8');
    process.stderr.write(`Created default config at ${configPath}\n`);
  }

  const merged = deepMerge(deepMerge({ ...defaults }, userConfig), envOverrides(env));
  return validateConfig(merged);
}
