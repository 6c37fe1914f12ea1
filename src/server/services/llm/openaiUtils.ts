import OpenAI from 'openai';

let sharedClient: OpenAI | null = null;
let sharedKey: string | undefined;

/**
 * Returns an OpenAI client for the given key. One client is shared per key so the
 * embedding and completion providers reuse the same HTTP agent.
 *
 * Retries are disabled on the client; callers wrap requests in retryWithBackoff.
 */
export function getOpenAIClient(apiKey: string): OpenAI {
  if (!sharedClient || sharedKey !== apiKey) {
    sharedClient = new OpenAI({ apiKey, maxRetries: 0 });
    sharedKey = apiKey;
  }
  return sharedClient;
}
