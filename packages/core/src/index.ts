// @slotrun/core: entry point
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export * from './errors.js';
// Backends
export { createBackend, createBackends } from './backends/backend.factory.js';
export { LlamaCppBackend } from './backends/llamacpp/llamacpp.adapter.js';
export { OllamaBackend } from './backends/ollama/ollama.adapter.js';
// Structured output
export { parseStructured } from './structured/structured.output.js';
export type { StructuredResult, StructuredSuccess, StructuredFailure } from './structured/structured.output.js';
export { repairJson } from './structured/json.repair.js';
export type { RepairFix, RepairResult } from './structured/json.repair.js';
// Pipeline stages
export * from './probe/capability.probe.js';
export { decompose, normalizePlan, planSchema } from './decomposer/task.decomposer.js';
export { mapPlan, computeSlot } from './mapper/slot.mapper.js';
export type { AgentPicker } from './mapper/slot.mapper.js';
export { AgentCatalog, PHASE_DEFAULT_AGENTS } from './agents/agent.catalog.js';
export type { AgentDefinition } from './agents/agent.catalog.js';
export { AgentSelector } from './agents/agent.selector.js';
export type { AgentChoice, AgentSelectorOptions } from './agents/agent.selector.js';
export { AgentGenerator } from './agents/agent.generator.js';
export { AgentRuntime } from './agents/agent.runtime.js';
export type { AgentRunResult, AgentRuntimeOptions, AgentStateEvent, AgentTask } from './agents/agent.runtime.js';
export { parseToolCall } from './agents/tool.parser.js';
export type { ParsedToolCall } from './agents/tool.parser.js';
export { buildSystemPrompt, buildToolsDescription } from './agents/agent.prompts.js';
export { BatchScheduler, truncateOutput, overallStatus } from './scheduler/batch.scheduler.js';
export type { TaskRunner, BatchSchedulerOptions } from './scheduler/batch.scheduler.js';
export { reviewResults, condenseResults } from './review/quality.gate.js';
export { synthesize } from './review/synthesizer.js';
// Tools
export { ToolExecutor, ALL_TOOLS } from './tools/tool.executor.js';
export type { ToolDefinition, ToolCall, ToolResult, ToolContext, ToolImpl, ToolParameter } from './tools/tool.types.js';
// Orchestration
export { PipelineOrchestrator, readTaskInput } from './pipeline/pipeline.orchestrator.js';
export type { PipelineOutcome, PipelineRunOptions, PipelineStage } from './pipeline/pipeline.orchestrator.js';
export { PipelineArtifacts } from './pipeline/pipeline.artifacts.js';
export { PipelineLogger, silentLogger } from './pipeline/pipeline.logger.js';
export type { Logger, LogLevel } from './pipeline/pipeline.logger.js';
export type { PipelineContext } from './pipeline/pipeline.context.js';
