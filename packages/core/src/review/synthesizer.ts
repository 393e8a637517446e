import { z } from 'zod';
import type { ChatResponse, PipelineResult, QualityRecord, SynthesisRecord } from '@slotrun/shared';
import type { PipelineContext } from '../pipeline/pipeline.context.js';
import { routedBackend } from '../pipeline/pipeline.context.js';
import { loadPrompt } from '../prompts/prompt.templates.js';
import { parseStructured } from '../structured/structured.output.js';
import { errorMessage } from '../errors.js';

export const SYNTHESIS_FAILED_PREFIX = 'Synthesis failed, returning raw results: ';

export const synthesisSchema = z.object({ summary: z.string().min(1) }).passthrough();

/** Execution summary without task outputs; the review already saw them. */
export function summarizeExecution(result: PipelineResult): Record<string, unknown> {
  return {
    status: result.overallStatus,
    total_success: result.totalSuccess,
    total_failed: result.totalFailed,
    batches: result.batches.map((batch) => ({
      group: batch.groupNumber,
      description: batch.description,
      success: batch.successCount,
      failed: batch.failedCount,
      task_summaries: batch.results.map((r) => ({
        task_id: r.taskId,
        agent: r.agentName,
        task: r.description,
        status: r.exitStatus,
      })),
    })),
  };
}

function qualityForPrompt(quality: QualityRecord): Record<string, unknown> {
  switch (quality.kind) {
    case 'reviewed':
      return quality.review;
    case 'degraded':
      return { status: quality.status, overall_score: quality.overallScore, error: quality.error };
    case 'manual':
      return { status: quality.status, overall_score: quality.overallScore, message: quality.message };
  }
}

/**
 * Combine execution and review into the final record. Any failure returns
 * both inputs unchanged under an explicit error.
 */
export async function synthesize(
  result: PipelineResult,
  quality: QualityRecord,
  ctx: PipelineContext,
): Promise<SynthesisRecord> {
  const { config, logger } = ctx;
  const raw = (reason: string): SynthesisRecord => {
    logger.warn('synthesize', reason);
    return { kind: 'raw', error: SYNTHESIS_FAILED_PREFIX + reason, execution: result, quality };
  };

  const routed = routedBackend(ctx, ctx.routing.qualityTarget);
  if (!routed) return raw('no backend available for synthesis');

  const { backend, status } = routed;
  const combined = { execution: summarizeExecution(result), quality_review: qualityForPrompt(quality) };

  logger.info('synthesize', `synthesizing on ${backend.id}`);
  let response: ChatResponse;
  try {
    const systemPrompt = await loadPrompt('synthesize', config.paths.prompts_dir);
    response = await backend.chat({
      model: status.modelId,
      messages: [
        { role: 'system', content: systemPrompt },
        {
          role: 'user',
          content:
            `Synthesize the following execution results and quality review:\n\n${JSON.stringify(combined)}\n\n` +
            'Produce a final synthesis in JSON format.',
        },
      ],
      maxTokens: backend.id === 'orchestrator' ? config.review.max_tokens : config.review.fallback_max_tokens,
      temperature: 0.3,
      timeoutMs: config.review.timeout_ms,
    });
  } catch (err) {
    return raw(errorMessage(err));
  }

  const parsed = parseStructured(response, synthesisSchema);
  if (!parsed.ok) return raw(parsed.reason);

  if (parsed.confidence === 'recovered') {
    logger.warn('synthesize', 'synthesis recovered from malformed output', {
      source: parsed.source,
      fixes: parsed.fixes,
    });
  }

  return { kind: 'synthesis', confidence: parsed.confidence, backend: backend.id, synthesis: parsed.value };
}
