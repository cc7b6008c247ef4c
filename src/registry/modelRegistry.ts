import { ConfigLoadError, describeError } from '../errors';
import type { ModelChoice, ModelConfig, ModelLoadOutcome, RegistryStatus } from '../models/modelConfig';
import { joinWithTimeout } from '../utils/async';
import { createLogger } from '../utils/logger';
import {
  DEFAULT_MAX_ITEMS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TIMEOUT_SECONDS,
  parseModelConfigs,
  type ModelConfigSource,
} from './configSource';

const log = createLogger('model-registry');

export const FALLBACK_MODEL: Readonly<ModelConfig> = Object.freeze({
  name: 'gemini/gemini-2.5-flash-lite',
  friendlyName: 'Gemini 2.5 Flash Lite (Fallback)',
  credentialEnvVar: 'GEMINI_API_KEY',
  maxTokens: DEFAULT_MAX_TOKENS,
  maxItems: DEFAULT_MAX_ITEMS,
  timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
  baseUrl: 'https://generativelanguage.googleapis.com/v1beta/openai/',
  apiModel: 'gemini-2.5-flash-lite',
});

export function fallbackModels(): ModelConfig[] {
  return [{ ...FALLBACK_MODEL }];
}

/**
 * Shared registry state. `generation` orders loads: only the newest load may
 * publish its result, so a superseded load never overwrites a reload.
 */
export interface RegistryState {
  status: RegistryStatus;
  models: ModelConfig[];
  loading: Promise<ModelLoadOutcome> | null;
  generation: number;
  loadCount: number;
  lastOutcome: ModelLoadOutcome | null;
}

export function createRegistryState(): RegistryState {
  return {
    status: 'unloaded',
    models: [],
    loading: null,
    generation: 0,
    loadCount: 0,
    lastOutcome: null,
  };
}

/** Reads and validates the configuration; every failure resolves to the fallback outcome. */
export async function loadModelConfigs(source: ModelConfigSource): Promise<ModelLoadOutcome> {
  try {
    const raw = await source.read();
    return { kind: 'loaded', models: parseModelConfigs(raw) };
  } catch (error) {
    const reason =
      error instanceof ConfigLoadError
        ? error.message
        : `Could not read model configuration from ${source.description}: ${describeError(error)}`;
    log.warn(`${reason} Using fallback model ${FALLBACK_MODEL.name}.`);
    return { kind: 'fallback', models: fallbackModels(), reason };
  }
}

export interface GetModelsOptions {
  wait?: boolean;
  timeoutMs?: number;
}

export interface ModelRegistry {
  readonly state: RegistryState;
  getLoadedModels(options?: GetModelsOptions): Promise<ModelConfig[]>;
  reload(): Promise<ModelConfig[]>;
  /** Kicks off the first load without waiting for it. */
  startBackgroundLoad(): void;
  listModels(): Promise<ModelChoice[]>;
}

export interface ModelRegistryOptions {
  source: ModelConfigSource;
  state?: RegistryState;
  defaultTimeoutMs?: number;
}

function isSettled(status: RegistryStatus): boolean {
  return status === 'loaded' || status === 'fallback';
}

export function createModelRegistry(options: ModelRegistryOptions): ModelRegistry {
  const state = options.state ?? createRegistryState();
  const defaultTimeoutMs = options.defaultTimeoutMs ?? 5000;

  const beginLoad = (): Promise<ModelLoadOutcome> => {
    state.generation += 1;
    state.loadCount += 1;
    state.status = 'loading';
    const generation = state.generation;

    const task = loadModelConfigs(options.source).then((outcome) => {
      if (generation !== state.generation) {
        log.debug(`Discarding superseded model load (generation ${generation})`);
        return outcome;
      }
      state.models = outcome.models;
      state.status = outcome.kind;
      state.lastOutcome = outcome;
      state.loading = null;
      log.info(`Model registry ${outcome.kind}`, { models: outcome.models.map((model) => model.name) });
      return outcome;
    });
    state.loading = task;
    return task;
  };

  // Fast path reads the published list; the slow path re-checks and either joins
  // the in-flight load or starts the only one.
  const currentOrStartLoad = (): Promise<ModelLoadOutcome> | ModelConfig[] => {
    if (isSettled(state.status)) return [...state.models];
    return state.loading ?? beginLoad();
  };

  const getLoadedModels = async (getOptions: GetModelsOptions = {}): Promise<ModelConfig[]> => {
    if (isSettled(state.status)) return [...state.models];

    const pending = currentOrStartLoad();
    if (Array.isArray(pending)) return pending;
    if (getOptions.wait === false) return fallbackModels();

    const timeoutMs = getOptions.timeoutMs ?? defaultTimeoutMs;
    const joined = await joinWithTimeout(pending, timeoutMs);
    if (joined.kind === 'timeout') {
      log.warn(`Model configuration not ready after ${timeoutMs}ms; using fallback model ${FALLBACK_MODEL.name}`);
      return fallbackModels();
    }
    return isSettled(state.status) ? [...state.models] : [...joined.value.models];
  };

  return {
    state,
    getLoadedModels,
    async reload() {
      log.info('Reloading model configuration');
      const outcome = await beginLoad();
      return [...outcome.models];
    },
    startBackgroundLoad() {
      if (state.status === 'unloaded' && !state.loading) {
        void beginLoad();
      }
    },
    async listModels() {
      const models = await getLoadedModels();
      return models.map((model) => ({ name: model.name, friendlyName: model.friendlyName ?? model.name }));
    },
  };
}
