import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { KEY_A, KEY_B, buildDocument } from '../testing/fakes';
import { createClassificationRepository, type ClassificationStore } from './classificationRepository';
import { openReceiptDatabase, type SqliteDatabase } from './db';
import { createReceiptRepository } from './receiptRepository';
import { productKey } from './text';

describe('createClassificationRepository', () => {
  let db: SqliteDatabase;
  let store: ClassificationStore;

  beforeEach(() => {
    db = openReceiptDatabase(':memory:');
    store = createClassificationRepository(db);
    const receipts = createReceiptRepository(db);
    receipts.saveDocument(buildDocument(KEY_B, [{ description: 'SABAO EM PO 1KG' }]));
    receipts.saveDocument(
      buildDocument(KEY_A, [{ description: 'ARROZ BRANCO 5KG' }, { description: 'FEIJAO PRETO 1KG' }]),
    );
  });

  afterEach(() => {
    db.close();
  });

  describe('pending items', () => {
    it('are fetched by access key then sequence, up to the limit', () => {
      const pending = store.fetchPendingItems(2);

      expect(pending.map((item) => [item.accessKey, item.sequence])).toEqual([
        [KEY_A, 1],
        [KEY_A, 2],
      ]);
      expect(store.fetchPendingItems(10)).toHaveLength(3);
    });

    it('exclude confirmed items', () => {
      store.saveClassification(
        { accessKey: KEY_A, sequence: 1 },
        { source: 'manual-review', confidence: 1, productId: null, confirmed: 'alimentação', confirmMode: 'overwrite' },
      );

      expect(store.fetchPendingItems(10).map((item) => item.description)).toEqual([
        'FEIJAO PRETO 1KG',
        'SABAO EM PO 1KG',
      ]);
    });
  });

  describe('saveClassification', () => {
    const ref = { accessKey: KEY_A, sequence: 1 };

    it('keeps an existing confirmation in if-unset mode while updating the suggestion', () => {
      store.saveClassification(ref, {
        source: 'manual-review',
        confidence: 1,
        productId: null,
        confirmed: 'mercearia',
        confirmMode: 'overwrite',
      });
      store.saveClassification(ref, {
        source: 'model-a',
        confidence: 0.6,
        productId: null,
        suggested: 'alimentação',
        confirmed: 'alimentação',
        confirmMode: 'if-unset',
      });

      expect(store.getItem(KEY_A, 1)).toMatchObject({
        categorySuggested: 'alimentação',
        categoryConfirmed: 'mercearia',
        classificationSource: 'model-a',
        confidence: 0.6,
      });
    });

    it('leaves the suggestion alone when none is given', () => {
      store.saveClassification(ref, {
        source: 'model-a',
        confidence: 0.6,
        productId: null,
        suggested: 'alimentação',
        confirmMode: 'none',
      });
      store.saveClassification(ref, {
        source: 'manual-review',
        confidence: 1,
        productId: null,
        confirmed: 'mercearia',
        confirmMode: 'overwrite',
      });

      expect(store.getItem(KEY_A, 1)).toMatchObject({ categorySuggested: 'alimentação', categoryConfirmed: 'mercearia' });
    });

    it('reports missing items', () => {
      expect(
        store.saveClassification({ accessKey: KEY_A, sequence: 9 }, { source: 'x', confidence: 0, productId: null, confirmMode: 'none' }),
      ).toBe(false);
    });
  });

  describe('products', () => {
    it('are deduplicated by accent- and case-insensitive name and brand', () => {
      const first = store.resolveOrCreateProduct({ name: 'Feijão Preto', brand: 'Camil', category: 'alimentação' });
      const second = store.resolveOrCreateProduct({ name: '  FEIJAO   preto ', brand: 'CAMIL', category: 'outros' });

      expect(second.id).toBe(first.id);
      expect(second.category).toBe('alimentação');
      expect(productKey('Feijão Preto', 'Camil')).toBe('feijao preto|camil');
    });

    it('treat a missing brand as its own identity', () => {
      const branded = store.resolveOrCreateProduct({ name: 'Arroz', brand: 'Tio João', category: null });
      const plain = store.resolveOrCreateProduct({ name: 'Arroz', brand: null, category: null });

      expect(plain.id).not.toBe(branded.id);
    });

    it('change category only through updateProductCategory', () => {
      const product = store.resolveOrCreateProduct({ name: 'Detergente', brand: null, category: 'limpeza' });
      store.updateProductCategory(product.id, 'casa');

      expect(store.getProduct(product.id)?.category).toBe('casa');
    });
  });

  it('overwrites aliases and looks them up by normalized text', () => {
    const first = store.resolveOrCreateProduct({ name: 'Arroz Branco', brand: null, category: 'alimentação' });
    const second = store.resolveOrCreateProduct({ name: 'Arroz Parboilizado', brand: null, category: 'alimentação' });

    store.saveAlias('ARROZ BRANCO 5KG', first.id);
    store.saveAlias('arroz  branco 5kg', second.id);

    expect(store.findProductByAlias('Arroz Branco 5KG')?.id).toBe(second.id);
    expect(store.findProductByAlias('FEIJAO')).toBeUndefined();
  });

  it('lists known categories once, sorted', () => {
    store.resolveOrCreateProduct({ name: 'Sabao', brand: null, category: 'limpeza' });
    store.saveClassification(
      { accessKey: KEY_A, sequence: 1 },
      { source: 'manual-review', confidence: 1, productId: null, confirmed: 'alimentação', confirmMode: 'overwrite' },
    );
    store.saveClassification(
      { accessKey: KEY_B, sequence: 1 },
      { source: 'manual-review', confidence: 1, productId: null, confirmed: 'limpeza', confirmMode: 'overwrite' },
    );

    expect(store.listCategories()).toEqual(['alimentação', 'limpeza']);
  });

  it('appends audit records in order', () => {
    const base = { accessKey: KEY_A, sequence: 1, rawResponse: null, modelName: null };
    store.appendAudit({ ...base, source: 'semantic-cache', confidence: 0.91, timestamp: new Date('2024-03-05T10:00:00Z') });
    store.appendAudit({ ...base, source: 'manual-review', confidence: 1, timestamp: new Date('2024-03-05T09:00:00Z') });
    store.appendAudit({ ...base, sequence: 2, source: 'manual-review', confidence: 1, timestamp: new Date('2024-03-05T11:00:00Z') });

    expect(store.listAudit(KEY_A, 1).map((record) => record.source)).toEqual(['semantic-cache', 'manual-review']);
    expect(store.listAudit(KEY_A)).toHaveLength(3);
    expect(store.listAudit(KEY_A, 1)[0]?.timestamp.toISOString()).toBe('2024-03-05T10:00:00.000Z');
  });

  it('returns the most recent manual reviews first', () => {
    const review = {
      accessKey: KEY_A,
      productName: null,
      productBrand: null,
      reviewer: 'ana',
      notes: null,
      confirmed: true,
      timestamp: new Date('2024-03-06T12:00:00Z'),
    };
    store.saveManualReview({ ...review, sequence: 1, category: 'alimentação' });
    store.saveManualReview({ ...review, sequence: 2, category: 'mercearia', confirmed: false });
    store.saveManualReview({ ...review, sequence: 1, category: 'padaria' });

    const reviews = store.listManualReviews(KEY_A, 2);

    expect(reviews.map((entry) => entry.category)).toEqual(['padaria', 'mercearia']);
    expect(reviews[1]?.confirmed).toBe(false);
  });

  it('rolls back every write of a failed transaction', () => {
    expect(() =>
      store.transaction(() => {
        store.resolveOrCreateProduct({ name: 'Leite', brand: null, category: 'alimentação' });
        store.saveClassification(
          { accessKey: KEY_A, sequence: 1 },
          { source: 'model-a', confidence: 0.5, productId: null, suggested: 'alimentação', confirmMode: 'none' },
        );
        throw new Error('crash');
      }),
    ).toThrow('crash');

    expect(store.listCategories()).toEqual([]);
    expect(store.getItem(KEY_A, 1)?.categorySuggested).toBeNull();
  });
});
