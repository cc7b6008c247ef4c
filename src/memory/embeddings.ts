import OpenAI from 'openai';
import { EmbeddingBackendError } from '../errors';

export interface EmbeddingProvider {
  /** Identifies the vector space; vectors from different models are never compared. */
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

export interface OpenAIEmbeddingOptions {
  model: string;
  apiKeyEnv: string;
  baseUrl?: string | undefined;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv | undefined;
}

export function createOpenAIEmbeddingProvider(options: OpenAIEmbeddingOptions): EmbeddingProvider {
  const env = options.env ?? process.env;
  let client: OpenAI | undefined;

  const getClient = (): OpenAI => {
    if (client) return client;
    const apiKey = env[options.apiKeyEnv];
    if (!apiKey) {
      throw new EmbeddingBackendError(`${options.apiKeyEnv} is not set.`);
    }
    client = new OpenAI({
      apiKey,
      ...(options.baseUrl !== undefined ? { baseURL: options.baseUrl } : {}),
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
    return client;
  };

  return {
    model: options.model,
    async embed(text: string) {
      const response = await getClient().embeddings.create({ model: options.model, input: text });
      const vector = response.data[0]?.embedding;
      if (!vector || vector.length === 0) {
        throw new EmbeddingBackendError(`Embedding backend returned no vector for model ${options.model}.`);
      }
      return vector;
    },
  };
}
