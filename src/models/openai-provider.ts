/**
 * Dense embedding provider backed by the OpenAI embeddings API.
 *
 * The SDK's own retries are disabled: retry, backoff and timeout policy
 * belong to DenseEmbedder. SDK errors are mapped onto EmbeddingProviderError
 * with a retryable flag.
 */

import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import type { DenseEmbeddingProvider } from './dense-embedder.js';
import { CancelledError, DuorankError, EmbeddingProviderError, errorMessage } from '../utils/errors.js';

/**
 * The slice of the OpenAI client this provider uses.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string; dimensions?: number; encoding_format?: 'float' },
      options?: { signal?: AbortSignal; maxRetries?: number },
    ): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export type OpenAIProviderOptions =
  | { apiKey: string; baseURL?: string }
  | { client: EmbeddingsClient };

/**
 * Map an SDK failure to the engine's error taxonomy.
 */
export function toProviderError(error: unknown): DuorankError {
  if (error instanceof DuorankError) {
    return error;
  }
  if (error instanceof APIUserAbortError) {
    return new CancelledError('Embedding request aborted', error);
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new EmbeddingProviderError('Embedding request timed out', 'TIMEOUT', {
      retryable: true,
      cause: error,
    });
  }
  if (error instanceof APIConnectionError) {
    return new EmbeddingProviderError(`Connection failed: ${error.message}`, 'NETWORK', {
      retryable: true,
      cause: error,
    });
  }
  if (error instanceof APIError) {
    const status = error.status;
    if (status === 401 || status === 403) {
      return new EmbeddingProviderError(`Authentication failed (${status})`, 'AUTH_FAILED', {
        cause: error,
      });
    }
    if (status === 429) {
      return new EmbeddingProviderError('Rate limited by embedding provider', 'RATE_LIMITED', {
        retryable: true,
        cause: error,
      });
    }
    const retryable = status !== undefined && (status >= 500 || status === 408 || status === 409);
    return new EmbeddingProviderError(
      `Embedding provider error${status !== undefined ? ` (${status})` : ''}: ${error.message}`,
      'PROVIDER_ERROR',
      { retryable, cause: error },
    );
  }
  return new EmbeddingProviderError(`Embedding request failed: ${errorMessage(error)}`, 'PROVIDER_ERROR', {
    cause: error,
  });
}

export class OpenAIEmbeddingProvider implements DenseEmbeddingProvider {
  private readonly client: EmbeddingsClient;

  constructor(options: OpenAIProviderOptions) {
    this.client =
      'client' in options
        ? options.client
        : new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async embedText(
    text: string,
    model: string,
    dimensions: number,
    options: { signal: AbortSignal },
  ): Promise<number[]> {
    let response: { data: Array<{ embedding: number[] }> };
    try {
      response = await this.client.embeddings.create(
        { model, input: text, dimensions, encoding_format: 'float' },
        { signal: options.signal, maxRetries: 0 },
      );
    } catch (error) {
      throw toProviderError(error);
    }

    const first = response.data[0];
    if (!first || !Array.isArray(first.embedding)) {
      throw new EmbeddingProviderError('Embedding response contained no vector', 'BAD_RESPONSE');
    }
    return first.embedding;
  }
}
