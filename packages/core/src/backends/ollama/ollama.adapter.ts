import { Ollama } from 'ollama';
import type { ChatResponse as OllamaChatResponse } from 'ollama';
import type {
  BackendConfig,
  BackendId,
  ChatRequest,
  ChatResponse,
  InferenceBackend,
  SlotState,
} from '@slotrun/shared';
import { ConnectivityError, errorMessage } from '../../errors.js';
import { getWithTimeout } from '../backend.http.js';

/**
 * Ollama server. It queues requests internally and has no slot probe, so
 * `slots()` always reports null and the slot budget falls back to config.
 */
export class OllamaBackend implements InferenceBackend {
  readonly kind = 'ollama' as const;
  readonly endpoint: string;

  constructor(
    readonly id: BackendId,
    config: Pick<BackendConfig, 'host' | 'port'>,
  ) {
    this.endpoint = `http://${config.host}:${config.port}`;
  }

  /** A client whose every request is bound to `signal`. */
  private client(signal?: AbortSignal): Ollama {
    return new Ollama({
      host: this.endpoint,
      fetch: (...args: Parameters<typeof fetch>) => {
        const [input, init] = args;
        return fetch(input, { ...init, signal });
      },
    });
  }

  async health(timeoutMs: number): Promise<boolean> {
    const body = await getWithTimeout(this.endpoint, timeoutMs);
    return body !== null && body.includes('Ollama is running');
  }

  async listModels(timeoutMs: number): Promise<string[]> {
    try {
      const list = await this.client(AbortSignal.timeout(timeoutMs)).list();
      return list.models.map((m) => m.name);
    } catch {
      return [];
    }
  }

  async slots(): Promise<SlotState[] | null> {
    return null;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const timeout = AbortSignal.timeout(request.timeoutMs);
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;

    let response: OllamaChatResponse;
    try {
      response = await this.client(signal).chat({
        model: request.model,
        messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
        stream: false,
        options: {
          num_predict: request.maxTokens,
          temperature: request.temperature,
          ...(request.stop && request.stop.length > 0 ? { stop: request.stop } : {}),
        },
      });
    } catch (err: unknown) {
      throw new ConnectivityError(`${this.id} chat failed: ${errorMessage(err)}`);
    }

    const message = response.message;
    let reasoning: string | null = null;
    if ('thinking' in message && typeof message.thinking === 'string' && message.thinking !== '') {
      reasoning = message.thinking;
    }

    const promptTokens = response.prompt_eval_count ?? 0;
    const completionTokens = response.eval_count ?? 0;
    return {
      content: message.content,
      reasoning,
      usage:
        response.eval_count != null
          ? { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens }
          : null,
    };
  }
}
