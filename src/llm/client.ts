import Anthropic from '@anthropic-ai/sdk';
import type { LLMConfig } from '../config/types.js';
import { logger } from '../observability/logger.js';
import { OllamaClient, OpenAICompatibleClient } from './local-clients.js';
import { LLMResponseError, type LLMResponse, type TextGenerator } from './types.js';

const MAX_RETRIES = 1;

export class ClaudeClient implements TextGenerator {
  private client: Anthropic;

  constructor(
    apiKey: string,
    private readonly config: LLMConfig
  ) {
    if (!apiKey) {
      throw new Error('Anthropic API key is required');
    }

    this.client = new Anthropic({
      apiKey,
      timeout: config.timeoutMs,
      maxRetries: MAX_RETRIES,
    });
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<LLMResponse> {
    try {
      const response = await this.client.messages.create({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        system: systemPrompt,
        messages: [
          {
            role: 'user',
            content: userPrompt,
          },
        ],
      });

      const text = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');

      if (!text) {
        throw new LLMResponseError('no text content', '');
      }

      return {
        text,
        stopReason: response.stop_reason,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        logger.error('llm_api', 'Claude API error', {
          status: error.status,
          message: error.message,
        });
        throw new Error(`Claude API failed: ${error.message}`);
      }
      throw error;
    }
  }
}

export function createClaudeClient(config: LLMConfig): ClaudeClient {
  const apiKey = process.env.ANTHROPIC_API_KEY;

  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable not set');
  }

  return new ClaudeClient(apiKey, config);
}

/**
 * The text generator for the configured provider. Only the Anthropic
 * provider needs an API key up front.
 */
export function createTextGenerator(config: LLMConfig): TextGenerator {
  switch (config.provider) {
    case 'anthropic':
      return createClaudeClient(config);
    case 'openai':
      return new OpenAICompatibleClient(config);
    case 'ollama':
      return new OllamaClient(config);
  }
}
