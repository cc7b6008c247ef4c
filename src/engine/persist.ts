import type { ClassificationFields, ClassificationStore } from '../memory/classificationRepository';
import type { SemanticIndex } from '../memory/semanticIndex';
import { MANUAL_REVIEW_SOURCE, SEMANTIC_CACHE_SOURCE } from '../models/audit';
import type { ClassificationDecision, ClassificationResult, ClassificationSource } from '../models/classification';
import type { Product } from '../models/product';
import { createLogger } from '../utils/logger';

const log = createLogger('persist');

export interface PersistDeps {
  store: ClassificationStore;
  index: SemanticIndex;
}

export interface PersistOptions {
  confirm: boolean;
}

export function sourceTag(source: ClassificationSource): string {
  switch (source.kind) {
    case 'semantic-cache':
      return SEMANTIC_CACHE_SOURCE;
    case 'model':
      return source.modelName;
    case 'manual-review':
      return MANUAL_REVIEW_SOURCE;
  }
}

function resolveProduct(store: ClassificationStore, decision: ClassificationDecision): Product {
  const { item, source } = decision;

  if (source.kind === 'semantic-cache') {
    const product = store.getProduct(source.productId);
    if (!product) throw new Error(`Matched product ${source.productId} no longer exists.`);
    return product;
  }

  if (source.kind === 'manual-review') {
    let product: Product | undefined;
    if (decision.productName !== null) {
      product = store.resolveOrCreateProduct({
        name: decision.productName,
        brand: decision.productBrand,
        category: decision.category,
      });
    } else if (item.productId !== null) {
      product = store.getProduct(item.productId);
    }
    product ??= store.resolveOrCreateProduct({ name: item.description, brand: null, category: decision.category });

    if (product.category !== decision.category) {
      store.updateProductCategory(product.id, decision.category);
      product = { ...product, category: decision.category, updatedAt: new Date() };
    }
    return product;
  }

  return store.resolveOrCreateProduct({
    name: decision.productName ?? item.description,
    brand: decision.productBrand,
    category: decision.category,
  });
}

function fieldsFor(decision: ClassificationDecision, productId: string, confirm: boolean): ClassificationFields {
  const base = {
    source: sourceTag(decision.source),
    confidence: decision.confidence,
    productId,
  };

  if (decision.source.kind === 'manual-review') {
    return {
      ...base,
      ...(decision.source.updateSuggested ? { suggested: decision.category } : {}),
      confirmed: decision.category,
      confirmMode: 'overwrite',
    };
  }

  return {
    ...base,
    suggested: decision.category,
    ...(confirm ? { confirmed: decision.category } : {}),
    confirmMode: confirm ? 'if-unset' : 'none',
  };
}

/**
 * Writes one decision: product link, category fields, audit record and (for
 * reviews) the review row commit together. The embedding refresh runs after
 * the commit since it calls out to the embedding backend.
 */
export async function persistClassification(
  deps: PersistDeps,
  decision: ClassificationDecision,
  options: PersistOptions,
): Promise<ClassificationResult> {
  const { store } = deps;
  const { item, source } = decision;
  const tag = sourceTag(source);
  const timestamp = new Date();

  const product = store.transaction(() => {
    const resolved = resolveProduct(store, decision);
    const updated = store.saveClassification(item, fieldsFor(decision, resolved.id, options.confirm));
    if (!updated) {
      throw new Error(`Line item ${item.accessKey}#${item.sequence} no longer exists.`);
    }

    if (options.confirm) {
      store.saveAlias(item.description, resolved.id);
    }

    store.appendAudit({
      accessKey: item.accessKey,
      sequence: item.sequence,
      source: tag,
      modelName: source.kind === 'model' ? source.modelName : null,
      rawResponse: source.kind === 'model' ? source.rawResponse : null,
      confidence: decision.confidence,
      timestamp,
    });

    if (source.kind === 'manual-review') {
      store.saveManualReview({
        accessKey: item.accessKey,
        sequence: item.sequence,
        category: decision.category,
        productName: decision.productName,
        productBrand: decision.productBrand,
        reviewer: source.reviewer,
        notes: source.notes,
        confirmed: options.confirm,
        timestamp,
      });
    }
    return resolved;
  });

  // A cache hit already has a vector for this product. The classification above is
  // committed, so a failed vector write only costs a future cache hit.
  if (options.confirm && source.kind !== 'semantic-cache') {
    try {
      await deps.index.upsert(product.id, item.description);
    } catch (error) {
      log.warn(`Could not index ${item.accessKey}#${item.sequence} for product ${product.id}`, error);
    }
  }

  log.debug(`Persisted ${item.accessKey}#${item.sequence}`, {
    source: tag,
    category: decision.category,
    productId: product.id,
    ...(decision.rationale !== undefined ? { rationale: decision.rationale } : {}),
  });

  return {
    accessKey: item.accessKey,
    sequence: item.sequence,
    status: 'classified',
    source: tag,
    category: decision.category,
    confidence: decision.confidence,
    productId: product.id,
    ...(source.kind === 'model' ? { modelName: source.modelName } : {}),
  };
}
