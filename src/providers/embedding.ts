import OpenAI from 'openai';
import { ProviderError, errorMessage } from '../control-plane/errors.js';

export interface EmbeddingService {
  /** Throws `ProviderError` when the provider call fails. */
  embed(text: string, model: string): Promise<number[]>;
}

export class OpenAiEmbeddingService implements EmbeddingService {
  private readonly client: OpenAI;

  constructor(options: { apiKey: string; baseUrl?: string }) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
  }

  async embed(text: string, model: string): Promise<number[]> {
    try {
      const response = await this.client.embeddings.create({
        model,
        input: text.replace(/\n/g, ' '),
      });
      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new Error('response carried no embedding');
      }
      return embedding;
    } catch (err) {
      const status = err instanceof OpenAI.APIError ? err.status : undefined;
      throw new ProviderError(`embedding call to ${model} failed: ${errorMessage(err)}`, {
        cause: err,
        status,
      });
    }
  }
}
