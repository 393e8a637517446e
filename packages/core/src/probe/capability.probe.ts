import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type {
  BackendId,
  BackendStatus,
  InferenceBackend,
  ModelPreference,
  RouteTarget,
  RoutingDecision,
  SlotrunConfig,
  ThroughputClass,
} from '@slotrun/shared';
import { errorMessage } from '../errors.js';
import { silentLogger } from '../pipeline/pipeline.logger.js';
import type { Logger } from '../pipeline/pipeline.logger.js';

export interface ProbeOptions {
  /** `--slots N` from the command line; wins over anything probed. */
  slotsOverride?: number;
  /** Where to write the latest probe snapshot. Omitted means no snapshot. */
  statusFile?: string;
  logger?: Logger;
  /** Millisecond clock, injectable for throughput tests. */
  now?: () => number;
}

export interface ProbeReport {
  statuses: BackendStatus[];
  routing: RoutingDecision;
  slotBudget: number;
}

export interface ThroughputReading {
  throughputClass: ThroughputClass;
  tokensPerSecond: number | null;
}

const THROUGHPUT_PROMPT = 'Say hello';

/**
 * Pick a model for a role: exact preferred names in order, then the first id
 * carrying the prefix, then whatever the backend lists first.
 */
export function selectModel(models: readonly string[], preference: ModelPreference): string | null {
  for (const name of preference.preferred) {
    if (models.includes(name)) return name;
  }
  if (preference.prefix !== '') {
    const prefixed = models.find((m) => m.startsWith(preference.prefix));
    if (prefixed !== undefined) return prefixed;
  }
  return models[0] ?? null;
}

export function classifyThroughput(
  completionTokens: number,
  elapsedMs: number,
  gpuThresholdTps: number,
): ThroughputReading {
  if (completionTokens <= 0 || elapsedMs <= 0) {
    return { throughputClass: 'unknown', tokensPerSecond: null };
  }
  const rate = completionTokens / (elapsedMs / 1000);
  return { throughputClass: rate > gpuThresholdTps ? 'gpu' : 'cpu', tokensPerSecond: rate };
}

function isReachable(statuses: readonly BackendStatus[], id: BackendId): boolean {
  return statuses.some((s) => s.id === id && s.reachable);
}

/**
 * Decomposition prefers the worker; review prefers the orchestrator. Each
 * falls back to the other reachable backend, then to `none`.
 */
export function decideRouting(statuses: readonly BackendStatus[]): RoutingDecision {
  const worker = isReachable(statuses, 'worker');
  const orchestrator = isReachable(statuses, 'orchestrator');

  const decompositionTarget: RouteTarget = worker ? 'worker' : orchestrator ? 'orchestrator' : 'none';
  const qualityTarget: RouteTarget = orchestrator ? 'orchestrator' : worker ? 'worker' : 'none';

  return Object.freeze({ decompositionTarget, qualityTarget });
}

export function resolveSlotBudget(
  override: number | undefined,
  statuses: readonly BackendStatus[],
  defaultSlots: number,
): number {
  if (override !== undefined && Number.isInteger(override) && override >= 1) {
    return override;
  }
  const worker = statuses.find((s) => s.id === 'worker');
  if (worker && worker.reachable && worker.slotCount > 0) {
    return worker.slotCount;
  }
  return defaultSlots;
}

function preferenceFor(id: BackendId, config: SlotrunConfig): ModelPreference {
  return id === 'worker' ? config.models.decomposition : config.models.quality;
}

async function measureThroughput(
  backend: InferenceBackend,
  model: string,
  config: SlotrunConfig['probe'],
  now: () => number,
  logger: Logger,
): Promise<ThroughputReading> {
  const started = now();
  try {
    const response = await backend.chat({
      model,
      messages: [{ role: 'user', content: THROUGHPUT_PROMPT }],
      maxTokens: config.throughput_max_tokens,
      temperature: 0,
      timeoutMs: config.throughput_timeout_ms,
    });
    const elapsed = now() - started;
    return classifyThroughput(response.usage?.completionTokens ?? 0, elapsed, config.gpu_threshold_tps);
  } catch (err) {
    logger.warn('probe', `${backend.id} throughput probe failed: ${errorMessage(err)}`);
    return { throughputClass: 'unknown', tokensPerSecond: null };
  }
}

export async function probeBackend(
  backend: InferenceBackend,
  config: SlotrunConfig,
  options: Pick<ProbeOptions, 'logger' | 'now'> = {},
): Promise<BackendStatus> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? Date.now;
  const timeout = config.probe.health_timeout_ms;

  const reachable = await backend.health(timeout);
  if (!reachable) {
    logger.warn('probe', `${backend.id} unreachable at ${backend.endpoint}`);
    return {
      id: backend.id,
      endpoint: backend.endpoint,
      reachable: false,
      slotCount: 0,
      totalSlots: 0,
      modelId: backend.id,
      models: [],
      throughputClass: 'unknown',
      tokensPerSecond: null,
    };
  }

  const models = await backend.listModels(timeout);
  const modelId = selectModel(models, preferenceFor(backend.id, config)) ?? backend.id;
  const throughput = await measureThroughput(backend, modelId, config.probe, now, logger);
  const slots = await backend.slots(timeout);
  const slotCount = slots ? slots.filter((s) => !s.busy).length : 0;

  const status: BackendStatus = {
    id: backend.id,
    endpoint: backend.endpoint,
    reachable: true,
    slotCount,
    totalSlots: slots ? slots.length : 0,
    modelId,
    models,
    ...throughput,
  };
  logger.info(
    'probe',
    `${backend.id} ${modelId} ${throughput.throughputClass}` +
      (throughput.tokensPerSecond !== null ? ` ${throughput.tokensPerSecond.toFixed(1)} t/s` : '') +
      `, ${slotCount}/${status.totalSlots} slots idle`,
    { status },
  );
  return status;
}

export async function writeStatusSnapshot(file: string, report: ProbeReport, at: Date): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const snapshot = { probedAt: at.toISOString(), ...report };
  await fs.writeFile(file, JSON.stringify(snapshot, null, 2), 'utf-8');
}

/**
 * Probe every backend concurrently. Unreachable backends are reported, never
 * thrown; a run with nothing reachable still gets a routing decision of `none`.
 */
export async function probeBackends(
  backends: readonly InferenceBackend[],
  config: SlotrunConfig,
  options: ProbeOptions = {},
): Promise<ProbeReport> {
  const logger = options.logger ?? silentLogger;
  const statuses = await Promise.all(backends.map((b) => probeBackend(b, config, options)));
  const routing = decideRouting(statuses);
  const slotBudget = resolveSlotBudget(options.slotsOverride, statuses, config.slots.default);

  logger.info(
    'probe',
    `decomposition -> ${routing.decompositionTarget}, quality -> ${routing.qualityTarget}, ${slotBudget} slots`,
  );

  const report: ProbeReport = { statuses, routing, slotBudget };
  if (options.statusFile !== undefined) {
    try {
      await writeStatusSnapshot(options.statusFile, report, new Date());
    } catch (err) {
      logger.warn('probe', `could not write status snapshot: ${errorMessage(err)}`);
    }
  }
  return report;
}
