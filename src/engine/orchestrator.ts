import type { ClassificationStore } from '../memory/classificationRepository';
import type { SemanticIndex } from '../memory/semanticIndex';
import { ModelInvocationError, ValidationError, describeError } from '../errors';
import type {
  ClassificationDecision,
  ClassificationRequest,
  ClassificationResult,
  ModelClassification,
  ReviewInput,
} from '../models/classification';
import type { ModelChoice, ModelConfig } from '../models/modelConfig';
import type { StoredLineItem } from '../models/receipt';
import type { ModelRegistry } from '../registry/modelRegistry';
import { createLogger } from '../utils/logger';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy, type Sleep } from '../utils/retry';
import { mapBounded } from './batch';
import type { ModelClient } from './modelClient';
import { persistClassification } from './persist';
import { isReusableMatch, normalizeCategory } from './policy';

const log = createLogger('orchestrator');

export interface OrchestratorDeps {
  store: ClassificationStore;
  index: SemanticIndex;
  registry: ModelRegistry;
  modelClient: ModelClient;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  concurrency?: number;
  modelsTimeoutMs?: number;
}

export interface ClassifyOptions {
  limit: number;
  confirm?: boolean;
  /** Restricts the batch to one configured model instead of the whole ordered list. */
  model?: string | undefined;
  signal?: AbortSignal | undefined;
}

export interface ReviewOptions {
  confirm?: boolean;
  reviewer?: string | null;
}

export interface ClassificationOrchestrator {
  classifyPending(options: ClassifyOptions): Promise<ClassificationResult[]>;
  registerManualReviews(entries: readonly ReviewInput[], options?: ReviewOptions): Promise<ClassificationResult[]>;
  reloadModels(): Promise<ModelConfig[]>;
  listModels(): Promise<ModelChoice[]>;
}

interface BatchContext {
  models: ModelConfig[];
  knownCategories: string[];
  confirm: boolean;
}

function itemLabel(item: { accessKey: string; sequence: number }): string {
  return `${item.accessKey}#${item.sequence}`;
}

function failed(item: StoredLineItem | ReviewInput, error: string): ClassificationResult {
  return { accessKey: item.accessKey, sequence: item.sequence, status: 'failed', error };
}

function toRequest(item: StoredLineItem, knownCategories: string[]): ClassificationRequest {
  return {
    sequence: item.sequence,
    description: item.description,
    quantity: item.quantity,
    unit: item.unit,
    totalPrice: item.totalPrice,
    ...(item.issuerName !== undefined ? { issuerName: item.issuerName } : {}),
    ...(item.issuedAt !== undefined ? { issuedAt: item.issuedAt } : {}),
    knownCategories,
  };
}

export function createOrchestrator(deps: OrchestratorDeps): ClassificationOrchestrator {
  const retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const persistDeps = { store: deps.store, index: deps.index };

  const selectModels = async (override: string | undefined): Promise<ModelConfig[]> => {
    const models = await deps.registry.getLoadedModels(
      deps.modelsTimeoutMs !== undefined ? { timeoutMs: deps.modelsTimeoutMs } : {},
    );
    if (override === undefined) return models;

    const chosen = models.find((model) => model.name === override);
    if (!chosen) {
      throw new ValidationError(
        `Model "${override}" is not configured. Available: ${models.map((model) => model.name).join(', ')}.`,
      );
    }
    return [chosen];
  };

  const invokeModels = async (
    item: StoredLineItem,
    context: BatchContext,
  ): Promise<{ model: ModelConfig; answer: ModelClassification } | { errors: string[] }> => {
    const request = toRequest(item, context.knownCategories);
    const errors: string[] = [];

    for (const model of context.models) {
      try {
        const answer = await withRetry(() => deps.modelClient.classify(request, model), retryPolicy, {
          label: `${model.name} on ${itemLabel(item)}`,
          shouldRetry: (error) => !(error instanceof ModelInvocationError) || error.retryable,
          ...(deps.sleep ? { sleep: deps.sleep } : {}),
        });
        return { model, answer };
      } catch (error) {
        log.warn(`${model.name} gave up on ${itemLabel(item)}`, { error: describeError(error) });
        errors.push(describeError(error));
      }
    }
    return { errors };
  };

  const classifyItem = async (item: StoredLineItem, context: BatchContext): Promise<ClassificationResult> => {
    try {
      const [match] = await deps.index.query(item.description, 1);
      if (match && isReusableMatch(match)) {
        const product = deps.store.getProduct(match.productId);
        if (product && product.category !== null) {
          const decision: ClassificationDecision = {
            item,
            source: { kind: 'semantic-cache', productId: product.id, score: match.score },
            category: product.category,
            confidence: match.score,
            productName: product.baseName,
            productBrand: product.baseBrand,
          };
          return await persistClassification(persistDeps, decision, { confirm: context.confirm });
        }
        log.debug(`Match ${match.productId} for ${itemLabel(item)} has no usable product category`);
      }

      if (context.models.length === 0) {
        return failed(item, 'No classification model is available.');
      }
      const outcome = await invokeModels(item, context);
      if ('errors' in outcome) {
        return failed(item, outcome.errors.join('; '));
      }

      const { model, answer } = outcome;
      const decision: ClassificationDecision = {
        item,
        source: { kind: 'model', modelName: model.name, rawResponse: answer.rawResponse },
        category: answer.category,
        confidence: answer.confidence,
        productName: answer.productName,
        productBrand: answer.productBrand,
        ...(answer.rationale !== null ? { rationale: answer.rationale } : {}),
      };
      return await persistClassification(persistDeps, decision, { confirm: context.confirm });
    } catch (error) {
      log.error(`Classification of ${itemLabel(item)} failed`, error);
      return failed(item, describeError(error));
    }
  };

  const reviewItem = async (
    entry: ReviewInput,
    options: { confirm: boolean; reviewer: string | null },
  ): Promise<ClassificationResult> => {
    const category = normalizeCategory(entry.category);
    if (category.length === 0) {
      return { accessKey: entry.accessKey, sequence: entry.sequence, status: 'skipped', error: 'Review has no category.' };
    }

    try {
      const item = deps.store.getItem(entry.accessKey, entry.sequence);
      if (!item) {
        return {
          accessKey: entry.accessKey,
          sequence: entry.sequence,
          status: 'skipped',
          error: `Line item ${itemLabel(entry)} does not exist.`,
        };
      }

      const productName = entry.productName?.trim() || null;
      const productBrand = entry.productBrand?.trim() || null;
      const decision: ClassificationDecision = {
        item,
        source: {
          kind: 'manual-review',
          reviewer: options.reviewer,
          notes: entry.notes?.trim() || null,
          updateSuggested: entry.updateSuggested === true,
        },
        category,
        confidence: 1,
        productName,
        productBrand: productName !== null ? productBrand : null,
      };
      return await persistClassification(persistDeps, decision, { confirm: options.confirm });
    } catch (error) {
      log.error(`Review of ${itemLabel(entry)} failed`, error);
      return failed(entry, describeError(error));
    }
  };

  return {
    async classifyPending(options: ClassifyOptions) {
      if (options.limit <= 0) return [];
      const items = deps.store.fetchPendingItems(options.limit);
      if (items.length === 0) return [];

      const models = await selectModels(options.model);
      const context: BatchContext = {
        models,
        knownCategories: deps.store.listCategories(),
        confirm: options.confirm ?? false,
      };
      const firstModel = models[0];
      const parallelism = Math.min(deps.concurrency ?? 1, firstModel ? firstModel.maxItems : 1);

      log.info(`Classifying ${items.length} pending item(s)`, {
        parallelism,
        confirm: context.confirm,
        models: models.map((model) => model.name),
      });
      const results = await mapBounded(items, parallelism, (item) => classifyItem(item, context), options.signal);

      if (results.length < items.length) {
        log.info(`Stopped after ${results.length} of ${items.length} item(s)`);
      }
      const failures = results.filter((result) => result.status === 'failed').length;
      log.info(`Batch finished: ${results.length - failures} classified, ${failures} failed`);
      return results;
    },

    async registerManualReviews(entries: readonly ReviewInput[], options: ReviewOptions = {}) {
      const reviewOptions = { confirm: options.confirm ?? false, reviewer: options.reviewer ?? null };
      const results: ClassificationResult[] = [];
      for (const entry of entries) {
        results.push(await reviewItem(entry, reviewOptions));
      }
      log.info(`Registered ${results.filter((result) => result.status === 'classified').length} manual review(s)`);
      return results;
    },

    reloadModels() {
      return deps.registry.reload();
    },

    listModels() {
      return deps.registry.listModels();
    },
  };
}
