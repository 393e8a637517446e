import type { Confidence } from './plan.types.js';
import type { BackendId } from './backend.types.js';
import type { PipelineResult } from './execution.types.js';

export type ReviewVerdict = 'pass' | 'fail' | 'needs_review';

/** A review the quality backend produced and that passed validation. */
export interface ReviewedQualityRecord {
  kind: 'reviewed';
  status: ReviewVerdict;
  overallScore: number;
  confidence: Confidence;
  backend: BackendId;
  /** The full review document, keyed however the review prompt asks (per taskId). */
  review: Record<string, unknown>;
}

/** The review backend answered but nothing usable could be extracted, or the call failed. */
export interface DegradedQualityRecord {
  kind: 'degraded';
  status: 'needs_review';
  overallScore: number;
  error: string;
  rawContent: string;
}

/** No backend was available for review at all. */
export interface ManualQualityRecord {
  kind: 'manual';
  status: 'manual_review_required';
  overallScore: 0;
  message: string;
  manualFallback: true;
  executionSummary: PipelineResult;
}

export type QualityRecord = ReviewedQualityRecord | DegradedQualityRecord | ManualQualityRecord;

export interface SynthesizedRecord {
  kind: 'synthesis';
  confidence: Confidence;
  backend: BackendId;
  synthesis: Record<string, unknown>;
}

/** Synthesis could not be obtained; prior records are carried verbatim. */
export interface RawSynthesisRecord {
  kind: 'raw';
  error: string;
  execution: PipelineResult;
  quality: QualityRecord;
}

/** The pipeline aborted before execution (unreachable backend or unparseable plan). */
export interface ErrorSynthesisRecord {
  kind: 'error';
  error: string;
  stage: 'decomposition';
}

export type SynthesisRecord = SynthesizedRecord | RawSynthesisRecord | ErrorSynthesisRecord;
