import { z } from 'zod';
import type { ChatResponse, PipelineResult, QualityRecord } from '@slotrun/shared';
import type { PipelineContext } from '../pipeline/pipeline.context.js';
import { routedBackend } from '../pipeline/pipeline.context.js';
import { loadPrompt } from '../prompts/prompt.templates.js';
import { parseStructured } from '../structured/structured.output.js';
import { errorMessage } from '../errors.js';

export const PREVIEW_MARKER = '... [truncated]';
export const DEGRADED_SCORE = 50;

export interface CondensedTask {
  task_id: string;
  agent: string;
  phase: string;
  task: string;
  status: string;
  result: string;
}

export interface CondensedBatch {
  group: number;
  description: string;
  success: number;
  failed: number;
  results: CondensedTask[];
}

export interface CondensedResult {
  status: string;
  total_success: number;
  total_failed: number;
  batches: CondensedBatch[];
}

export const reviewSchema = z
  .object({
    status: z.preprocess(
      (v) => (typeof v === 'string' ? v.trim().toLowerCase().replace(/[\s-]+/g, '_') : v),
      z.enum(['pass', 'fail', 'needs_review']),
    ),
    overall_score: z.coerce.number().min(0).max(100),
  })
  .passthrough();

/** Execution results with every task output cut to `previewChars`. */
export function condenseResults(result: PipelineResult, previewChars: number): CondensedResult {
  return {
    status: result.overallStatus,
    total_success: result.totalSuccess,
    total_failed: result.totalFailed,
    batches: result.batches.map((batch) => ({
      group: batch.groupNumber,
      description: batch.description,
      success: batch.successCount,
      failed: batch.failedCount,
      results: batch.results.map((r) => ({
        task_id: r.taskId,
        agent: r.agentName,
        phase: r.phase,
        task: r.description,
        status: r.exitStatus,
        result: r.outputText.length > previewChars ? r.outputText.slice(0, previewChars) + PREVIEW_MARKER : r.outputText,
      })),
    })),
  };
}

/**
 * Ask the quality backend to review the run. Always returns a record: a
 * manual-review marker when no backend is routed, a degraded record when
 * the call fails or its answer cannot be used.
 */
export async function reviewResults(result: PipelineResult, ctx: PipelineContext): Promise<QualityRecord> {
  const { config, logger } = ctx;
  const routed = routedBackend(ctx, ctx.routing.qualityTarget);
  if (!routed) {
    logger.warn('review', 'no backend available, manual review required');
    return {
      kind: 'manual',
      status: 'manual_review_required',
      overallScore: 0,
      message: 'No inference backend available for quality review',
      manualFallback: true,
      executionSummary: result,
    };
  }

  const { backend, status } = routed;
  const maxTokens = backend.id === 'orchestrator' ? config.review.max_tokens : config.review.fallback_max_tokens;
  const condensed = condenseResults(result, config.review.preview_chars);

  logger.info('review', `reviewing ${result.totalSuccess + result.totalFailed} results on ${backend.id}`);
  let response: ChatResponse;
  try {
    const systemPrompt = await loadPrompt('quality-review', config.paths.prompts_dir);
    response = await backend.chat({
      model: status.modelId,
      messages: [
        { role: 'system', content: systemPrompt },
        {
          role: 'user',
          content:
            `Review the following execution results:\n\n${JSON.stringify(condensed)}\n\n` +
            'Provide a quality assessment in JSON format.',
        },
      ],
      maxTokens,
      temperature: 0.3,
      timeoutMs: config.review.timeout_ms,
    });
  } catch (err) {
    const message = `Quality review call failed: ${errorMessage(err)}`;
    logger.warn('review', message);
    return { kind: 'degraded', status: 'needs_review', overallScore: DEGRADED_SCORE, error: message, rawContent: '' };
  }

  const parsed = parseStructured(response, reviewSchema);
  if (!parsed.ok) {
    const message = `Failed to parse JSON from quality review: ${parsed.reason}`;
    logger.warn('review', message);
    return {
      kind: 'degraded',
      status: 'needs_review',
      overallScore: DEGRADED_SCORE,
      error: message,
      rawContent: parsed.raw,
    };
  }

  if (parsed.confidence === 'recovered') {
    logger.warn('review', 'review recovered from malformed output', { source: parsed.source, fixes: parsed.fixes });
  }
  logger.info('review', `${parsed.value.status}, score ${parsed.value.overall_score}`);

  return {
    kind: 'reviewed',
    status: parsed.value.status,
    overallScore: parsed.value.overall_score,
    confidence: parsed.confidence,
    backend: backend.id,
    review: parsed.value,
  };
}
