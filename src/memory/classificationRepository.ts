import { v4 as uuidv4 } from 'uuid';
import type { SqliteDatabase } from './db';
import { LINE_ITEM_COLUMNS, mapLineItemRow, type LineItemRow } from './receiptRepository';
import { normalizeDescription, productKey } from './text';
import type { ClassificationRecord, ManualReview } from '../models/audit';
import type { Product } from '../models/product';
import type { StoredLineItem } from '../models/receipt';

export type ConfirmMode = 'none' | 'if-unset' | 'overwrite';

export interface ItemRef {
  accessKey: string;
  sequence: number;
}

export interface ClassificationFields {
  source: string;
  confidence: number;
  productId: string | null;
  /** Left untouched when undefined. */
  suggested?: string | undefined;
  confirmed?: string | undefined;
  confirmMode: ConfirmMode;
}

export interface ProductInput {
  name: string;
  brand: string | null;
  category: string | null;
}

export interface ClassificationStore {
  fetchPendingItems(limit: number): StoredLineItem[];
  getItem(accessKey: string, sequence: number): StoredLineItem | undefined;
  getProduct(id: string): Product | undefined;
  listCategories(): string[];
  saveClassification(item: ItemRef, fields: ClassificationFields): boolean;
  resolveOrCreateProduct(input: ProductInput): Product;
  updateProductCategory(productId: string, category: string): void;
  saveAlias(aliasText: string, productId: string): void;
  findProductByAlias(aliasText: string): Product | undefined;
  appendAudit(record: ClassificationRecord): void;
  listAudit(accessKey: string, sequence?: number): ClassificationRecord[];
  saveManualReview(review: ManualReview): void;
  listManualReviews(accessKey: string, limit?: number): ManualReview[];
  transaction<T>(work: () => T): T;
}

interface ProductRow {
  id: string;
  base_name: string;
  base_brand: string | null;
  category: string | null;
  created_at: string;
  updated_at: string;
}

interface AuditRow {
  access_key: string;
  sequence: number;
  source: string;
  model_name: string | null;
  raw_response: string | null;
  confidence: number;
  timestamp: string;
}

interface ReviewRow {
  access_key: string;
  sequence: number;
  category: string | null;
  product_name: string | null;
  product_brand: string | null;
  reviewer: string | null;
  notes: string | null;
  confirmed: number;
  timestamp: string;
}

function mapProduct(row: ProductRow): Product {
  return {
    id: row.id,
    baseName: row.base_name,
    baseBrand: row.base_brand,
    category: row.category,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

const PRODUCT_COLUMNS = 'id, base_name, base_brand, category, created_at, updated_at';

export function createClassificationRepository(db: SqliteDatabase): ClassificationStore {
  const pendingStmt = db.prepare<[number], LineItemRow>(`
    SELECT ${LINE_ITEM_COLUMNS}
    FROM line_items li JOIN receipts r ON r.access_key = li.access_key
    WHERE li.category_confirmed IS NULL
    ORDER BY li.access_key, li.sequence
    LIMIT ?
  `);
  const getItemStmt = db.prepare<[string, number], LineItemRow>(`
    SELECT ${LINE_ITEM_COLUMNS}
    FROM line_items li JOIN receipts r ON r.access_key = li.access_key
    WHERE li.access_key = ? AND li.sequence = ?
  `);
  const getProductStmt = db.prepare<[string], ProductRow>(`SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ?`);
  const getProductByKeyStmt = db.prepare<[string], ProductRow>(
    `SELECT ${PRODUCT_COLUMNS} FROM products WHERE normalized_key = ?`,
  );
  const insertProductStmt = db.prepare<{
    id: string;
    base_name: string;
    base_brand: string | null;
    normalized_key: string;
    category: string | null;
    now: string;
  }>(`
    INSERT INTO products (id, base_name, base_brand, normalized_key, category, created_at, updated_at)
    VALUES (@id, @base_name, @base_brand, @normalized_key, @category, @now, @now)
  `);
  const updateProductCategoryStmt = db.prepare<[string, string, string]>(
    'UPDATE products SET category = ?, updated_at = ? WHERE id = ?',
  );
  const categoriesStmt = db.prepare<[], { category: string }>(`
    SELECT category_confirmed AS category FROM line_items WHERE category_confirmed IS NOT NULL
    UNION
    SELECT category FROM products WHERE category IS NOT NULL
    ORDER BY category
  `);

  const saveClassificationStmt = db.prepare<{
    access_key: string;
    sequence: number;
    suggested: string | null;
    confirmed: string | null;
    confirm_mode: ConfirmMode;
    source: string;
    confidence: number;
    product_id: string | null;
    now: string;
  }>(`
    UPDATE line_items SET
      category_suggested = COALESCE(@suggested, category_suggested),
      category_confirmed = CASE @confirm_mode
        WHEN 'overwrite' THEN COALESCE(@confirmed, category_confirmed)
        WHEN 'if-unset' THEN COALESCE(category_confirmed, @confirmed)
        ELSE category_confirmed
      END,
      classification_source = @source,
      confidence = @confidence,
      product_id = COALESCE(@product_id, product_id),
      updated_at = @now
    WHERE access_key = @access_key AND sequence = @sequence
  `);

  const upsertAliasStmt = db.prepare<[string, string, string]>(`
    INSERT INTO product_aliases (alias_text, product_id, updated_at) VALUES (?, ?, ?)
    ON CONFLICT(alias_text) DO UPDATE SET
      product_id = excluded.product_id,
      updated_at = excluded.updated_at
  `);
  const productByAliasStmt = db.prepare<[string], ProductRow>(`
    SELECT p.id, p.base_name, p.base_brand, p.category, p.created_at, p.updated_at
    FROM product_aliases a JOIN products p ON p.id = a.product_id
    WHERE a.alias_text = ?
  `);

  const insertAuditStmt = db.prepare<{
    access_key: string;
    sequence: number;
    source: string;
    model_name: string | null;
    raw_response: string | null;
    confidence: number;
    timestamp: string;
  }>(`
    INSERT INTO classification_records (access_key, sequence, source, model_name, raw_response, confidence, timestamp)
    VALUES (@access_key, @sequence, @source, @model_name, @raw_response, @confidence, @timestamp)
  `);
  const auditColumns = 'access_key, sequence, source, model_name, raw_response, confidence, timestamp';
  const auditByReceiptStmt = db.prepare<[string], AuditRow>(
    `SELECT ${auditColumns} FROM classification_records WHERE access_key = ? ORDER BY id`,
  );
  const auditByItemStmt = db.prepare<[string, number], AuditRow>(
    `SELECT ${auditColumns} FROM classification_records WHERE access_key = ? AND sequence = ? ORDER BY id`,
  );

  const insertReviewStmt = db.prepare<{
    access_key: string;
    sequence: number;
    category: string | null;
    product_name: string | null;
    product_brand: string | null;
    reviewer: string | null;
    notes: string | null;
    confirmed: number;
    timestamp: string;
  }>(`
    INSERT INTO manual_reviews (access_key, sequence, category, product_name, product_brand, reviewer, notes, confirmed, timestamp)
    VALUES (@access_key, @sequence, @category, @product_name, @product_brand, @reviewer, @notes, @confirmed, @timestamp)
  `);
  const reviewsStmt = db.prepare<[string, number], ReviewRow>(`
    SELECT access_key, sequence, category, product_name, product_brand, reviewer, notes, confirmed, timestamp
    FROM manual_reviews WHERE access_key = ?
    ORDER BY id DESC
    LIMIT ?
  `);

  return {
    fetchPendingItems(limit: number) {
      return pendingStmt.all(limit).map(mapLineItemRow);
    },
    getItem(accessKey: string, sequence: number) {
      const row = getItemStmt.get(accessKey, sequence);
      return row ? mapLineItemRow(row) : undefined;
    },
    getProduct(id: string) {
      const row = getProductStmt.get(id);
      return row ? mapProduct(row) : undefined;
    },
    listCategories() {
      return categoriesStmt.all().map((row) => row.category);
    },
    saveClassification(item: ItemRef, fields: ClassificationFields) {
      const result = saveClassificationStmt.run({
        access_key: item.accessKey,
        sequence: item.sequence,
        suggested: fields.suggested ?? null,
        confirmed: fields.confirmed ?? null,
        confirm_mode: fields.confirmMode,
        source: fields.source,
        confidence: fields.confidence,
        product_id: fields.productId,
        now: new Date().toISOString(),
      });
      return result.changes > 0;
    },
    resolveOrCreateProduct(input: ProductInput) {
      const key = productKey(input.name, input.brand);
      const existing = getProductByKeyStmt.get(key);
      if (existing) return mapProduct(existing);

      const now = new Date();
      const product: Product = {
        id: uuidv4(),
        baseName: input.name.trim(),
        baseBrand: input.brand !== null ? input.brand.trim() : null,
        category: input.category,
        createdAt: now,
        updatedAt: now,
      };
      insertProductStmt.run({
        id: product.id,
        base_name: product.baseName,
        base_brand: product.baseBrand,
        normalized_key: key,
        category: product.category,
        now: now.toISOString(),
      });
      return product;
    },
    updateProductCategory(productId: string, category: string) {
      updateProductCategoryStmt.run(category, new Date().toISOString(), productId);
    },
    saveAlias(aliasText: string, productId: string) {
      upsertAliasStmt.run(normalizeDescription(aliasText), productId, new Date().toISOString());
    },
    findProductByAlias(aliasText: string) {
      const row = productByAliasStmt.get(normalizeDescription(aliasText));
      return row ? mapProduct(row) : undefined;
    },
    appendAudit(record: ClassificationRecord) {
      insertAuditStmt.run({
        access_key: record.accessKey,
        sequence: record.sequence,
        source: record.source,
        model_name: record.modelName,
        raw_response: record.rawResponse,
        confidence: record.confidence,
        timestamp: record.timestamp.toISOString(),
      });
    },
    listAudit(accessKey: string, sequence?: number) {
      const rows = sequence !== undefined ? auditByItemStmt.all(accessKey, sequence) : auditByReceiptStmt.all(accessKey);
      return rows.map((row) => ({
        accessKey: row.access_key,
        sequence: row.sequence,
        source: row.source,
        modelName: row.model_name,
        rawResponse: row.raw_response,
        confidence: row.confidence,
        timestamp: new Date(row.timestamp),
      }));
    },
    saveManualReview(review: ManualReview) {
      insertReviewStmt.run({
        access_key: review.accessKey,
        sequence: review.sequence,
        category: review.category,
        product_name: review.productName,
        product_brand: review.productBrand,
        reviewer: review.reviewer,
        notes: review.notes,
        confirmed: review.confirmed ? 1 : 0,
        timestamp: review.timestamp.toISOString(),
      });
    },
    listManualReviews(accessKey: string, limit = 20) {
      return reviewsStmt.all(accessKey, limit).map((row) => ({
        accessKey: row.access_key,
        sequence: row.sequence,
        category: row.category,
        productName: row.product_name,
        productBrand: row.product_brand,
        reviewer: row.reviewer,
        notes: row.notes,
        confirmed: row.confirmed === 1,
        timestamp: new Date(row.timestamp),
      }));
    },
    transaction<T>(work: () => T): T {
      return db.transaction(work)();
    },
  };
}
