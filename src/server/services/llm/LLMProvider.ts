/**
 * LLM Provider Abstraction
 *
 * Chat-completion capability injected into the reasoning orchestrator, so the
 * orchestrator can run against OpenAI in production and a scripted fake in tests.
 */

import type { TokenUsage } from '../../domain/eligibility/types.js';

export interface LLMProvider {
  /**
   * Generate a completion from the LLM
   * @param messages Conversation (system, user, assistant)
   * @param options Sampling settings; unset fields use the provider defaults
   */
  generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;

  getName(): string;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMGenerateOptions {
  temperature?: number;
  max_tokens?: number;
  model?: string;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: TokenUsage;
}
