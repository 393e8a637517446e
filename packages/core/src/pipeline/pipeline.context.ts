import type {
  BackendId,
  BackendStatus,
  InferenceBackend,
  RouteTarget,
  RoutingDecision,
  SlotrunConfig,
} from '@slotrun/shared';
import type { Logger } from './pipeline.logger.js';

/**
 * Everything a stage may read besides the previous stage's output. Built once
 * per run after probing and frozen; nothing consults the environment after that.
 */
export interface PipelineContext {
  readonly config: SlotrunConfig;
  readonly backends: ReadonlyMap<BackendId, InferenceBackend>;
  readonly statuses: readonly BackendStatus[];
  readonly routing: RoutingDecision;
  readonly slotBudget: number;
  /** Per-run directory holding every artifact. */
  readonly workDir: string;
  /** Where agents put their deliverables, `<workDir>/outputs`. */
  readonly outputsDir: string;
  readonly logger: Logger;
}

export interface RoutedBackend {
  backend: InferenceBackend;
  status: BackendStatus;
}

export function createPipelineContext(parts: {
  config: SlotrunConfig;
  backends: readonly InferenceBackend[];
  statuses: readonly BackendStatus[];
  routing: RoutingDecision;
  slotBudget: number;
  workDir: string;
  outputsDir: string;
  logger: Logger;
}): PipelineContext {
  const backends = new Map<BackendId, InferenceBackend>(parts.backends.map((b) => [b.id, b]));
  return Object.freeze({
    config: parts.config,
    backends,
    statuses: Object.freeze([...parts.statuses]),
    routing: Object.freeze({ ...parts.routing }),
    slotBudget: parts.slotBudget,
    workDir: parts.workDir,
    outputsDir: parts.outputsDir,
    logger: parts.logger,
  });
}

/** The backend and its probe status for a routing target, or null for `none`. */
export function routedBackend(ctx: PipelineContext, target: RouteTarget): RoutedBackend | null {
  if (target === 'none') return null;
  const backend = ctx.backends.get(target);
  const status = ctx.statuses.find((s) => s.id === target);
  if (!backend || !status) return null;
  return { backend, status };
}
