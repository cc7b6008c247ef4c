import { promises as fs } from 'fs';
import { z } from 'zod';
import { ConfigLoadError, describeError } from '../errors';
import type { ModelConfig } from '../models/modelConfig';
import { createLogger } from '../utils/logger';

const log = createLogger('model-config');

export const DEFAULT_MAX_TOKENS = 8000;
export const DEFAULT_MAX_ITEMS = 50;
export const DEFAULT_TIMEOUT_SECONDS = 30;

/** Where the model list comes from; `read` returns the raw JSON document. */
export interface ModelConfigSource {
  readonly description: string;
  read(): Promise<string>;
}

export function createFileConfigSource(filePath: string): ModelConfigSource {
  return {
    description: filePath,
    read() {
      return fs.readFile(filePath, 'utf8');
    },
  };
}

const ModelEntrySchema = z.object({
  name: z.string().trim().min(1),
  credential_env_var: z.string().trim().min(1),
  friendly_name: z.string().trim().min(1).optional(),
  max_tokens: z.number().int().positive().default(DEFAULT_MAX_TOKENS),
  max_items: z.number().int().positive().default(DEFAULT_MAX_ITEMS),
  timeout: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
  base_url: z.string().url().optional(),
  api_model: z.string().trim().min(1).optional(),
  extra_params: z.record(z.unknown()).optional(),
});

type ModelEntry = z.infer<typeof ModelEntrySchema>;

const DocumentSchema = z.union([
  z.object({ models: z.array(z.unknown()) }),
  z.array(z.unknown()),
]);

function toModelConfig(entry: ModelEntry): ModelConfig {
  return {
    name: entry.name,
    ...(entry.friendly_name !== undefined ? { friendlyName: entry.friendly_name } : {}),
    credentialEnvVar: entry.credential_env_var,
    maxTokens: entry.max_tokens,
    maxItems: entry.max_items,
    timeoutSeconds: entry.timeout,
    ...(entry.base_url !== undefined ? { baseUrl: entry.base_url } : {}),
    ...(entry.api_model !== undefined ? { apiModel: entry.api_model } : {}),
    ...(entry.extra_params !== undefined ? { extraParams: entry.extra_params } : {}),
  };
}

/**
 * Parses a model list document. Entries that fail validation are dropped with a
 * warning; a malformed document or an empty result throws ConfigLoadError.
 */
export function parseModelConfigs(raw: string): ModelConfig[] {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ConfigLoadError(`Model configuration is not valid JSON: ${describeError(error)}`, { cause: error });
  }

  const parsed = DocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigLoadError('Model configuration must be a list of models or an object with a "models" list.');
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.models;
  const models: ModelConfig[] = [];
  entries.forEach((entry, index) => {
    const result = ModelEntrySchema.safeParse(entry);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(entry)'}: ${issue.message}`);
      log.warn(`Dropping model entry #${index + 1}`, { issues });
      return;
    }
    models.push(toModelConfig(result.data));
  });

  if (models.length === 0) {
    throw new ConfigLoadError('Model configuration has no valid entries.');
  }
  return models;
}
