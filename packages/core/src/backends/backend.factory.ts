import type { BackendConfig, BackendId, InferenceBackend, SlotrunConfig } from '@slotrun/shared';
import { LlamaCppBackend } from './llamacpp/llamacpp.adapter.js';
import { OllamaBackend } from './ollama/ollama.adapter.js';

export function createBackend(id: BackendId, config: BackendConfig): InferenceBackend {
  switch (config.kind) {
    case 'llamacpp':
      return new LlamaCppBackend(id, config);
    case 'ollama':
      return new OllamaBackend(id, config);
    default: {
      const kind: never = config.kind;
      throw new Error(`Unknown backend kind: ${String(kind)}`);
    }
  }
}

/** Every enabled backend from config, worker first. */
export function createBackends(config: SlotrunConfig): InferenceBackend[] {
  const ids: BackendId[] = ['worker', 'orchestrator'];
  return ids
    .filter((id) => config.backends[id].enabled)
    .map((id) => createBackend(id, config.backends[id]));
}
