import OpenAI from 'openai';
import { z } from 'zod';
import type {
  BackendConfig,
  BackendId,
  ChatRequest,
  ChatResponse,
  InferenceBackend,
  SlotState,
} from '@slotrun/shared';
import { ConnectivityError, errorMessage } from '../../errors.js';
import { getWithTimeout, parseJsonBody } from '../backend.http.js';

const modelsSchema = z.object({ data: z.array(z.object({ id: z.string() })) });
const slotsSchema = z.array(z.object({ id: z.number(), is_processing: z.boolean() }));

/**
 * llama.cpp `llama-server` behind its OpenAI-compatible API. Each server
 * exposes a fixed number of parallel slots, reported by `GET /slots`.
 */
export class LlamaCppBackend implements InferenceBackend {
  readonly kind = 'llamacpp' as const;
  readonly endpoint: string;
  private readonly client: OpenAI;

  constructor(
    readonly id: BackendId,
    config: Pick<BackendConfig, 'host' | 'port'>,
  ) {
    this.endpoint = `http://${config.host}:${config.port}`;
    this.client = new OpenAI({
      // llama-server ignores the key but the SDK insists on one
      apiKey: 'not-needed',
      baseURL: `${this.endpoint}/v1`,
      maxRetries: 0,
    });
  }

  async health(timeoutMs: number): Promise<boolean> {
    const body = await getWithTimeout(`${this.endpoint}/health`, timeoutMs);
    return body !== null && body.includes('ok');
  }

  async listModels(timeoutMs: number): Promise<string[]> {
    const body = await getWithTimeout(`${this.endpoint}/v1/models`, timeoutMs);
    if (body === null) return [];
    const parsed = modelsSchema.safeParse(parseJsonBody(body));
    return parsed.success ? parsed.data.data.map((m) => m.id) : [];
  }

  async slots(timeoutMs: number): Promise<SlotState[] | null> {
    const body = await getWithTimeout(`${this.endpoint}/slots`, timeoutMs);
    if (body === null) return null;
    const parsed = slotsSchema.safeParse(parseJsonBody(body));
    if (!parsed.success) return null;
    return parsed.data.map((slot) => ({ id: slot.id, busy: slot.is_processing }));
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          ...(request.stop && request.stop.length > 0 ? { stop: request.stop } : {}),
          stream: false,
        },
        { signal: request.signal, timeout: request.timeoutMs },
      );
    } catch (err: unknown) {
      throw new ConnectivityError(`${this.id} chat failed: ${errorMessage(err)}`);
    }

    const message = completion.choices[0]?.message;
    const content = message?.content ?? '';
    let reasoning: string | null = null;
    if (message && 'reasoning_content' in message && typeof message.reasoning_content === 'string') {
      reasoning = message.reasoning_content;
    }

    return {
      content,
      reasoning,
      usage: completion.usage
        ? {
            promptTokens: completion.usage.prompt_tokens,
            completionTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : null,
    };
  }
}
