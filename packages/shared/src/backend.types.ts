export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** The two backend roles an operator can run. */
export type BackendId = 'worker' | 'orchestrator';

export type BackendKind = 'llamacpp' | 'ollama';

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  stop?: string[];
  /** Upper bound for this single request. */
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ChatResponse {
  /** The direct answer field. Empty string when the backend left it blank. */
  content: string;
  /** Separate chain-of-thought field, when the backend returns one. */
  reasoning: string | null;
  usage: TokenUsage | null;
}

export interface SlotState {
  id: number;
  busy: boolean;
}

export interface InferenceBackend {
  readonly id: BackendId;
  readonly kind: BackendKind;
  /** Human-readable base URL, for logs. */
  readonly endpoint: string;
  health(timeoutMs: number): Promise<boolean>;
  listModels(timeoutMs: number): Promise<string[]>;
  /** Per-slot busy flags, or null when the backend exposes no slot probe. */
  slots(timeoutMs: number): Promise<SlotState[] | null>;
  chat(request: ChatRequest): Promise<ChatResponse>;
}

export type ThroughputClass = 'gpu' | 'cpu' | 'unknown';

export interface BackendStatus {
  id: BackendId;
  endpoint: string;
  reachable: boolean;
  /** Idle slots at probe time; 0 when unknown. */
  slotCount: number;
  totalSlots: number;
  modelId: string;
  models: string[];
  throughputClass: ThroughputClass;
  tokensPerSecond: number | null;
}

export type RouteTarget = BackendId | 'none';

export interface RoutingDecision {
  decompositionTarget: RouteTarget;
  qualityTarget: RouteTarget;
}
