import { describe, it, expect, vi } from 'vitest';
import { OpenAIProvider, type ChatCompletionClient } from '../OpenAIProvider.js';
import { ExternalServiceError, ServiceUnavailableError } from '../../../types/errors.js';

type CreateCompletion = ChatCompletionClient['chat']['completions']['create'];

function providerWith(create: CreateCompletion): OpenAIProvider {
  const provider = new OpenAIProvider({ apiKey: 'test-secret', defaultModel: 'gpt-4o-mini' });
  provider.setClient({ chat: { completions: { create } } });
  return provider;
}

describe('OpenAIProvider', () => {
  it('maps the completion and its token usage', async () => {
    const create = vi.fn<CreateCompletion>().mockResolvedValue({
      choices: [{ message: { content: '  OUTCOME: eligible\nCONFIDENCE: 0.9  ' } }],
      model: 'gpt-4o-mini-2024-07-18',
      usage: { prompt_tokens: 310, completion_tokens: 42, total_tokens: 352 },
    });
    const provider = providerWith(create);

    const response = await provider.generate(
      [
        { role: 'system', content: 'You assess visa eligibility.' },
        { role: 'user', content: 'Facts: salary 45000' },
      ],
      { temperature: 0.2, max_tokens: 400 }
    );

    expect(response).toEqual({
      content: 'OUTCOME: eligible\nCONFIDENCE: 0.9',
      model: 'gpt-4o-mini-2024-07-18',
      usage: { promptTokens: 310, completionTokens: 42, totalTokens: 352 },
    });
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'You assess visa eligibility.' },
        { role: 'user', content: 'Facts: salary 45000' },
      ],
      temperature: 0.2,
      max_tokens: 400,
    });
  });

  it('leaves usage undefined when the API reports none', async () => {
    const provider = providerWith(
      vi.fn<CreateCompletion>().mockResolvedValue({ choices: [{ message: { content: 'OUTCOME: eligible' } }], model: 'm' })
    );

    const response = await provider.generate([{ role: 'user', content: 'q' }]);

    expect(response.usage).toBeUndefined();
  });

  it('rejects an empty completion', async () => {
    const provider = providerWith(
      vi.fn<CreateCompletion>().mockResolvedValue({ choices: [{ message: { content: '   ' } }], model: 'gpt-4o-mini' })
    );

    const result = provider.generate([{ role: 'user', content: 'q' }]);

    await expect(result).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(result).rejects.toThrow('External service error (OpenAI): Empty response from OpenAI');
  });

  it('rejects a completion without choices', async () => {
    const provider = providerWith(vi.fn<CreateCompletion>().mockResolvedValue({ choices: [], model: 'gpt-4o-mini' }));

    await expect(provider.generate([{ role: 'user', content: 'q' }])).rejects.toMatchObject({
      code: 'EXTERNAL_SERVICE_ERROR',
      statusCode: 502,
    });
  });

  it('propagates API errors', async () => {
    const apiError = Object.assign(new Error('Rate limit reached'), { status: 429 });
    const provider = providerWith(vi.fn<CreateCompletion>().mockRejectedValue(apiError));

    await expect(provider.generate([{ role: 'user', content: 'q' }])).rejects.toBe(apiError);
  });

  it('is unavailable without an API key', async () => {
    const provider = new OpenAIProvider({ apiKey: undefined });

    const result = provider.generate([{ role: 'user', content: 'q' }]);

    await expect(result).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(result).rejects.toMatchObject({ statusCode: 503, context: { missing: ['OPENAI_API_KEY'] } });
  });
});
