import OpenAI, { APIConnectionTimeoutError, APIError, AuthenticationError, RateLimitError } from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { ModelInvocationError, PipelineError, describeError } from '../errors';
import type { ClassificationRequest, ModelClassification } from '../models/classification';
import type { ModelConfig } from '../models/modelConfig';
import { parseModelResponse } from './modelResponse';

export interface ModelClient {
  classify(request: ClassificationRequest, model: ModelConfig): Promise<ModelClassification>;
}

export const CLASSIFICATION_SYSTEM_PROMPT = [
  'You classify line items from Brazilian supermarket receipts (NFC-e).',
  'For the item given, answer with a single JSON object and nothing else:',
  '{"category": string, "confidence": number between 0 and 1,',
  ' "product": {"name": string, "brand": string | null}, "rationale": string}.',
  'Categories are short lower-case Portuguese labels such as "alimentação", "limpeza" or "higiene".',
  'Prefer one of the known categories when it fits. The product name drops sizes,',
  'weights and packaging so that the same product bought in different stores shares it.',
].join('\n');

export function buildClassificationMessages(request: ClassificationRequest): ChatCompletionMessageParam[] {
  const item = {
    description: request.description,
    quantity: request.quantity,
    unit: request.unit,
    total_price: request.totalPrice,
    ...(request.issuerName !== undefined ? { store: request.issuerName } : {}),
    ...(request.issuedAt !== undefined ? { date: request.issuedAt } : {}),
  };
  const known = request.knownCategories.length > 0 ? request.knownCategories.join(', ') : '(none yet)';

  return [
    { role: 'system', content: CLASSIFICATION_SYSTEM_PROMPT },
    { role: 'user', content: `Known categories: ${known}\nItem: ${JSON.stringify(item)}` },
  ];
}

function toInvocationError(error: unknown, modelName: string): ModelInvocationError {
  if (error instanceof ModelInvocationError) return error;
  if (error instanceof APIConnectionTimeoutError) {
    return new ModelInvocationError('timeout', modelName, `${modelName} timed out.`, { cause: error });
  }
  if (error instanceof RateLimitError) {
    return new ModelInvocationError('rate-limit', modelName, `${modelName} is rate limited.`, { cause: error });
  }
  if (error instanceof AuthenticationError) {
    return new ModelInvocationError('credential-missing', modelName, `${modelName} rejected its credentials.`, {
      cause: error,
    });
  }
  if (error instanceof APIError) {
    return new ModelInvocationError('request-failed', modelName, `${modelName} request failed: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof PipelineError) {
    return new ModelInvocationError('request-failed', modelName, error.message, { cause: error });
  }
  return new ModelInvocationError('request-failed', modelName, `${modelName} request failed: ${describeError(error)}`, {
    cause: error,
  });
}

export interface OpenAIModelClientOptions {
  env?: NodeJS.ProcessEnv | undefined;
  temperature?: number | undefined;
}

/** Talks to any OpenAI-compatible chat endpoint; one SDK client per endpoint and key. */
export function createOpenAIModelClient(options: OpenAIModelClientOptions = {}): ModelClient {
  const env = options.env ?? process.env;
  const clients = new Map<string, OpenAI>();

  const clientFor = (model: ModelConfig): OpenAI => {
    const apiKey = env[model.credentialEnvVar];
    if (!apiKey) {
      throw new ModelInvocationError(
        'credential-missing',
        model.name,
        `${model.credentialEnvVar} is not set; cannot call ${model.name}.`,
      );
    }
    const cacheKey = `${model.baseUrl ?? ''}|${apiKey}`;
    let client = clients.get(cacheKey);
    if (!client) {
      client = new OpenAI({
        apiKey,
        ...(model.baseUrl !== undefined ? { baseURL: model.baseUrl } : {}),
        maxRetries: 0,
      });
      clients.set(cacheKey, client);
    }
    return client;
  };

  return {
    async classify(request: ClassificationRequest, model: ModelConfig) {
      const client = clientFor(model);
      const body: ChatCompletionCreateParamsNonStreaming = {
        model: model.apiModel ?? model.name,
        messages: buildClassificationMessages(request),
        temperature: options.temperature ?? 0,
        max_tokens: model.maxTokens,
      };

      let content: string | null | undefined;
      try {
        const completion = await client.chat.completions.create(
          { ...model.extraParams, ...body },
          { timeout: model.timeoutSeconds * 1000 },
        );
        content = completion.choices[0]?.message.content;
      } catch (error) {
        throw toInvocationError(error, model.name);
      }

      if (!content) {
        throw new ModelInvocationError('malformed-response', model.name, `${model.name} returned an empty answer.`);
      }
      return parseModelResponse(content, model.name);
    },
  };
}
