import axios from 'axios';
import type { LLMConfig } from '../config/types.js';
import { logger } from '../observability/logger.js';
import { LLMResponseError, type LLMResponse, type TextGenerator } from './types.js';

export const DEFAULT_OPENAI_URL = 'http://localhost:1234/v1';
export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

export type JsonPoster = (
  url: string,
  body: Record<string, unknown>,
  headers: Record<string, string>,
  timeoutMs: number
) => Promise<unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function count(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function preview(data: unknown): string {
  return JSON.stringify(data ?? null).slice(0, 200);
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export const axiosJsonPoster: JsonPoster = async (url, body, headers, timeoutMs) => {
  const response = await axios.post<unknown>(url, body, {
    headers: { 'Content-Type': 'application/json', ...headers },
    timeout: timeoutMs,
  });
  return response.data;
};

async function post(
  provider: string,
  poster: JsonPoster,
  url: string,
  body: Record<string, unknown>,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<unknown> {
  try {
    return await poster(url, body, headers, timeoutMs);
  } catch (error) {
    if (axios.isAxiosError(error)) {
      logger.error('llm_api', `${provider} API error`, {
        url,
        status: error.response?.status,
        message: error.message,
      });
      throw new Error(`${provider} API failed: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Chat completions on any server that speaks the OpenAI wire format
 * (LM Studio, vLLM, llama.cpp server and the hosted API itself).
 */
export class OpenAICompatibleClient implements TextGenerator {
  private readonly baseUrl: string;

  constructor(
    private readonly config: LLMConfig,
    private readonly apiKey: string | undefined = process.env.OPENAI_API_KEY,
    private readonly poster: JsonPoster = axiosJsonPoster
  ) {
    this.baseUrl = trimSlash(config.apiUrl || process.env.OPENAI_URL || DEFAULT_OPENAI_URL);
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<LLMResponse> {
    const headers: Record<string, string> = this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
    const data = await post('OpenAI-compatible', this.poster, `${this.baseUrl}/chat/completions`, {
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
    }, headers, this.config.timeoutMs);

    const choice = isRecord(data) && Array.isArray(data.choices) ? data.choices[0] : undefined;
    const message = isRecord(choice) ? choice.message : undefined;
    const text = isRecord(message) && typeof message.content === 'string' ? message.content : '';
    if (!isRecord(data) || !isRecord(choice) || !text) {
      throw new LLMResponseError('no text content', preview(data));
    }

    const usage = isRecord(data.usage) ? data.usage : undefined;
    return {
      text,
      stopReason: typeof choice.finish_reason === 'string' ? choice.finish_reason : null,
      usage: usage
        ? { inputTokens: count(usage.prompt_tokens), outputTokens: count(usage.completion_tokens) }
        : undefined,
    };
  }
}

export class OllamaClient implements TextGenerator {
  private readonly baseUrl: string;

  constructor(
    private readonly config: LLMConfig,
    private readonly poster: JsonPoster = axiosJsonPoster
  ) {
    this.baseUrl = trimSlash(config.apiUrl || process.env.OLLAMA_URL || DEFAULT_OLLAMA_URL);
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<LLMResponse> {
    const data = await post('Ollama', this.poster, `${this.baseUrl}/api/chat`, {
      model: this.config.model,
      stream: false,
      format: 'json',
      options: {
        temperature: this.config.temperature,
        num_predict: this.config.maxTokens,
      },
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
    }, {}, this.config.timeoutMs);

    const message = isRecord(data) ? data.message : undefined;
    const text = isRecord(message) && typeof message.content === 'string' ? message.content : '';
    if (!isRecord(data) || !text) {
      throw new LLMResponseError('no text content', preview(data));
    }

    return {
      text,
      stopReason: typeof data.done_reason === 'string' ? data.done_reason : null,
      usage: {
        inputTokens: count(data.prompt_eval_count),
        outputTokens: count(data.eval_count),
      },
    };
  }
}
