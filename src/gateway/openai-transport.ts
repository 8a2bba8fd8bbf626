import OpenAI from 'openai';
import type { ModelTransport } from './gateway.js';

export interface OpenAiTransportOptions {
  apiKey: string;
  endpoint?: string;
  timeoutMs: number;
  /** Prebuilt client; when given, the connection options above are ignored. */
  client?: OpenAI;
}

/**
 * Chat-completions transport. SDK-level retries are disabled: the gateway
 * owns the retry budget and backoff schedule.
 */
export function createOpenAiTransport(options: OpenAiTransportOptions): ModelTransport {
  const client =
    options.client ??
    new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.endpoint || undefined,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });

  return async (request, signal) => {
    try {
      const response = await client.chat.completions.create(
        {
          model: request.model,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          messages: request.messages,
        },
        { signal }
      );
      return { status: 200, body: response.choices[0]?.message?.content ?? '' };
    } catch (err) {
      if (err instanceof OpenAI.APIError && typeof err.status === 'number') {
        return { status: err.status, body: err.message };
      }
      throw err;
    }
  };
}
