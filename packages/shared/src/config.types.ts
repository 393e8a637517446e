import type { BackendKind } from './backend.types.js';

export interface BackendConfig {
  kind: BackendKind;
  host: string;
  port: number;
  enabled: boolean;
}

export interface ModelPreference {
  /** Exact model ids, tried in order. */
  preferred: string[];
  /** Prefix match tried after the exact names. Empty string disables it. */
  prefix: string;
}

export interface SlotrunConfig {
  backends: {
    worker: BackendConfig;
    orchestrator: BackendConfig;
  };
  models: {
    decomposition: ModelPreference;
    quality: ModelPreference;
  };
  probe: {
    health_timeout_ms: number;
    throughput_timeout_ms: number;
    throughput_max_tokens: number;
    gpu_threshold_tps: number;
  };
  slots: {
    default: number;
  };
  decomposer: {
    timeout_ms: number;
    max_tokens: number;
    cpu_max_tokens: number;
    temperature: number;
    max_attempts: number;
  };
  agent: {
    max_iterations: number;
    max_retries: number;
    call_timeout_ms: number;
    total_timeout_ms: number;
    max_tokens: number;
    temperature: number;
    output_limit_bytes: number;
  };
  tools: {
    timeout_ms: number;
    /** Empty means the home directory and the OS temp directory. */
    allowed_roots: string[];
  };
  selector: {
    enabled: boolean;
    timeout_ms: number;
    generate: boolean;
    specialized_keywords: string[];
  };
  review: {
    timeout_ms: number;
    max_tokens: number;
    fallback_max_tokens: number;
    preview_chars: number;
  };
  paths: {
    agents_dir: string;
    prompts_dir: string;
    runs_dir: string;
  };
  runs: {
    retention: number;
  };
}
