/**
 * OpenAI LLM Provider
 *
 * Implements LLMProvider over the OpenAI chat completions API
 */

import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { ExternalServiceError, ServiceUnavailableError } from '../../types/errors.js';
import { getEnv } from '../../config/env.js';
import { getOpenAIClient } from './openaiUtils.js';

/**
 * Subset of the OpenAI client this provider calls
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create: (params: {
        model: string;
        messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
        temperature?: number;
        max_tokens?: number;
      }) => Promise<{
        choices: Array<{
          message?: {
            content?: string | null;
          };
        }>;
        model: string;
        usage?: {
          prompt_tokens: number;
          completion_tokens: number;
          total_tokens: number;
        };
      }>;
    };
  };
}

export interface OpenAIProviderConfig {
  apiKey?: string;
  defaultModel?: string;
}

export class OpenAIProvider implements LLMProvider {
  private config: OpenAIProviderConfig;
  private client: ChatCompletionClient | null = null;

  constructor(config?: OpenAIProviderConfig) {
    const env = getEnv();
    this.config = {
      apiKey: env.OPENAI_API_KEY,
      defaultModel: env.AI_MODEL,
      ...config,
    };
  }

  getName(): string {
    return 'openai';
  }

  private getClient(): ChatCompletionClient {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new ServiceUnavailableError('OpenAI is not configured', { missing: ['OPENAI_API_KEY'] });
      }
      this.client = getOpenAIClient(this.config.apiKey);
    }
    return this.client;
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const client = this.getClient();
    const model = options?.model || this.config.defaultModel || 'gpt-4o-mini';
    const temperature = options?.temperature ?? 0;
    const max_tokens = options?.max_tokens;

    try {
      const response = await client.chat.completions.create({
        model,
        messages: messages.map(msg => ({ role: msg.role, content: msg.content })),
        temperature,
        ...(max_tokens && { max_tokens }),
      });

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ExternalServiceError('OpenAI', 'Empty response from OpenAI', {
          reason: 'empty_response',
          provider: 'openai',
          model,
        });
      }

      return {
        content,
        model: response.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      logger.error({ error, model }, 'Error calling OpenAI');
      throw error;
    }
  }

  /**
   * Set OpenAI client (for testing)
   */
  setClient(client: ChatCompletionClient): void {
    this.client = client;
  }
}
