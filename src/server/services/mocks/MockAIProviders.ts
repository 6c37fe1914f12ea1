/**
 * Scripted embedding and LLM providers
 *
 * Deterministic stand-ins for the OpenAI providers. Responses are queued or set
 * as a default; errors come from MockServiceBase scenarios or a queued failure.
 */

import { MockServiceBase } from './MockServiceBase.js';
import type { EmbeddingProvider } from '../../embeddings/EmbeddingProvider.js';
import type { LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse } from '../llm/LLMProvider.js';

export class MockEmbeddingProvider extends MockServiceBase implements EmbeddingProvider {
  private queued: Array<number[] | Error> = [];

  constructor(private readonly dims: number = 4) {
    super();
  }

  getServiceName(): string {
    return 'MockEmbeddingProvider';
  }

  /**
   * Queue a vector or failure for the next call; afterwards calls fall back to a unit vector
   */
  enqueue(...items: Array<number[] | Error>): void {
    this.queued.push(...items);
  }

  async generateEmbedding(text: string): Promise<number[]> {
    this.record('generateEmbedding', text);
    const next = this.queued.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? Array.from({ length: this.dims }, (_, i) => (i === 0 ? 1 : 0));
  }

  getName(): string {
    return 'mock';
  }
}

export class MockLLMProvider extends MockServiceBase implements LLMProvider {
  private queued: Array<string | Error> = [];
  private defaultContent: string | null = null;
  readonly requests: Array<{ messages: LLMMessage[]; options?: LLMGenerateOptions }> = [];

  constructor(private readonly model: string = 'mock-model') {
    super();
  }

  getServiceName(): string {
    return 'MockLLMProvider';
  }

  setDefaultContent(content: string): void {
    this.defaultContent = content;
  }

  enqueue(...items: Array<string | Error>): void {
    this.queued.push(...items);
  }

  getName(): string {
    return 'mock';
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    this.record('generate', messages, options);
    this.requests.push({ messages, options });

    const next = this.queued.shift() ?? this.defaultContent;
    if (next instanceof Error) {
      throw next;
    }
    if (next === null) {
      throw new Error('MockLLMProvider has no scripted response');
    }
    return {
      content: next,
      model: this.model,
      usage: { promptTokens: 100, completionTokens: 20, totalTokens: 120 },
    };
  }
}
