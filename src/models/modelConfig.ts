export interface ModelConfig {
  name: string;
  friendlyName?: string | undefined;
  credentialEnvVar: string;
  maxTokens: number;
  /**
   * Upper bound on items in flight against this model at once. Every request carries a
   * single item, so this caps the batch's parallelism rather than the prompt size.
   */
  maxItems: number;
  timeoutSeconds: number;
  baseUrl?: string | undefined;
  /** Model id sent to the provider when it differs from `name`. */
  apiModel?: string | undefined;
  extraParams?: Record<string, unknown> | undefined;
}

export type RegistryStatus = 'unloaded' | 'loading' | 'loaded' | 'fallback';

export type ModelLoadOutcome =
  | { kind: 'loaded'; models: ModelConfig[] }
  | { kind: 'fallback'; models: ModelConfig[]; reason: string };

export interface ModelChoice {
  name: string;
  friendlyName: string;
}
