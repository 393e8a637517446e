// @slotrun/shared: barrel export
export type {
  ChatMessage,
  TokenUsage,
  BackendId,
  BackendKind,
  ChatRequest,
  ChatResponse,
  SlotState,
  InferenceBackend,
  ThroughputClass,
  BackendStatus,
  RouteTarget,
  RoutingDecision,
} from './backend.types.js';
export type {
  Phase,
  Confidence,
  Subtask,
  Group,
  DecompositionPlan,
  MappedTask,
  MappedBatch,
  SlotMapping,
} from './plan.types.js';
export type {
  AgentRunState,
  TerminalState,
  ExitStatus,
  ExecutionResult,
  BatchResult,
  OverallStatus,
  PipelineResult,
} from './execution.types.js';
export type {
  ReviewVerdict,
  ReviewedQualityRecord,
  DegradedQualityRecord,
  ManualQualityRecord,
  QualityRecord,
  SynthesizedRecord,
  RawSynthesisRecord,
  ErrorSynthesisRecord,
  SynthesisRecord,
} from './review.types.js';
export type { BackendConfig, ModelPreference, SlotrunConfig } from './config.types.js';
