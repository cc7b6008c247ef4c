import type { SqliteDatabase } from './db';
import type { FiscalDocument, LineItem, Payment, ReceiptSummary, StoredLineItem } from '../models/receipt';

export interface LineItemRow {
  access_key: string;
  sequence: number;
  description: string;
  code: string | null;
  quantity: number;
  unit: string | null;
  unit_price: number;
  total_price: number;
  category_suggested: string | null;
  category_confirmed: string | null;
  classification_source: string | null;
  confidence: number | null;
  product_id: string | null;
  issuer_name: string | null;
  issued_at: string | null;
}

interface ReceiptRow {
  access_key: string;
  issuer_name: string;
  issuer_cnpj: string;
  issuer_address: string | null;
  number: string | null;
  series: string | null;
  issued_at_text: string | null;
  issued_at: string | null;
  consumer_cpf: string | null;
  consumer_name: string | null;
  declared_item_count: number | null;
  total_value: number;
  paid_value: number;
  taxes: number | null;
}

interface SummaryRow {
  access_key: string;
  issuer_name: string;
  issued_at: string | null;
  total_value: number;
  item_count: number;
  pending_items: number;
}

export const LINE_ITEM_COLUMNS = `li.access_key, li.sequence, li.description, li.code, li.quantity, li.unit,
  li.unit_price, li.total_price, li.category_suggested, li.category_confirmed, li.classification_source,
  li.confidence, li.product_id, r.issuer_name, r.issued_at`;

export function mapLineItemRow(row: LineItemRow): StoredLineItem {
  return {
    accessKey: row.access_key,
    sequence: row.sequence,
    description: row.description,
    ...(row.code !== null ? { code: row.code } : {}),
    quantity: row.quantity,
    unit: row.unit,
    unitPrice: row.unit_price,
    totalPrice: row.total_price,
    categorySuggested: row.category_suggested,
    categoryConfirmed: row.category_confirmed,
    classificationSource: row.classification_source,
    confidence: row.confidence,
    productId: row.product_id,
    ...(row.issuer_name !== null ? { issuerName: row.issuer_name } : {}),
    ...(row.issued_at !== null ? { issuedAt: row.issued_at } : {}),
  };
}

export interface ListReceiptsOptions {
  limit?: number;
  offset?: number;
  pendingOnly?: boolean;
}

/** Persistence of parsed receipts; the collaborator that stores what the parser produces. */
export interface ReceiptRepository {
  saveDocument(document: FiscalDocument): void;
  getDocument(accessKey: string): FiscalDocument | undefined;
  listReceipts(options?: ListReceiptsOptions): ReceiptSummary[];
  listItems(accessKey: string, options?: { pendingOnly?: boolean }): StoredLineItem[];
}

export function createReceiptRepository(db: SqliteDatabase): ReceiptRepository {
  const upsertReceiptStmt = db.prepare<{
    access_key: string;
    issuer_name: string;
    issuer_cnpj: string;
    issuer_address: string | null;
    number: string | null;
    series: string | null;
    issued_at_text: string | null;
    issued_at: string | null;
    consumer_cpf: string | null;
    consumer_name: string | null;
    declared_item_count: number | null;
    total_value: number;
    paid_value: number;
    taxes: number | null;
    now: string;
  }>(`
    INSERT INTO receipts (
      access_key, issuer_name, issuer_cnpj, issuer_address, number, series, issued_at_text, issued_at,
      consumer_cpf, consumer_name, declared_item_count, total_value, paid_value, taxes, created_at, updated_at
    ) VALUES (
      @access_key, @issuer_name, @issuer_cnpj, @issuer_address, @number, @series, @issued_at_text, @issued_at,
      @consumer_cpf, @consumer_name, @declared_item_count, @total_value, @paid_value, @taxes, @now, @now
    )
    ON CONFLICT(access_key) DO UPDATE SET
      issuer_name = excluded.issuer_name,
      issuer_cnpj = excluded.issuer_cnpj,
      issuer_address = excluded.issuer_address,
      number = excluded.number,
      series = excluded.series,
      issued_at_text = excluded.issued_at_text,
      issued_at = excluded.issued_at,
      consumer_cpf = excluded.consumer_cpf,
      consumer_name = excluded.consumer_name,
      declared_item_count = excluded.declared_item_count,
      total_value = excluded.total_value,
      paid_value = excluded.paid_value,
      taxes = excluded.taxes,
      updated_at = excluded.updated_at
  `);

  // Re-importing a receipt refreshes the parsed columns. Classification state survives only
  // while the line still carries the same description.
  const upsertItemStmt = db.prepare<{
    access_key: string;
    sequence: number;
    description: string;
    code: string | null;
    quantity: number;
    unit: string | null;
    unit_price: number;
    total_price: number;
    now: string;
  }>(`
    INSERT INTO line_items (
      access_key, sequence, description, code, quantity, unit, unit_price, total_price, updated_at
    ) VALUES (
      @access_key, @sequence, @description, @code, @quantity, @unit, @unit_price, @total_price, @now
    )
    ON CONFLICT(access_key, sequence) DO UPDATE SET
      category_suggested = CASE WHEN line_items.description = excluded.description THEN line_items.category_suggested END,
      category_confirmed = CASE WHEN line_items.description = excluded.description THEN line_items.category_confirmed END,
      classification_source = CASE WHEN line_items.description = excluded.description THEN line_items.classification_source END,
      confidence = CASE WHEN line_items.description = excluded.description THEN line_items.confidence END,
      product_id = CASE WHEN line_items.description = excluded.description THEN line_items.product_id END,
      description = excluded.description,
      code = excluded.code,
      quantity = excluded.quantity,
      unit = excluded.unit,
      unit_price = excluded.unit_price,
      total_price = excluded.total_price,
      updated_at = excluded.updated_at
  `);

  const trimItemsStmt = db.prepare<[string, number]>(
    'DELETE FROM line_items WHERE access_key = ? AND sequence > ?',
  );
  const deletePaymentsStmt = db.prepare<[string]>('DELETE FROM payments WHERE access_key = ?');
  const insertPaymentStmt = db.prepare<[string, number, string, number]>(
    'INSERT INTO payments (access_key, position, method, amount) VALUES (?, ?, ?, ?)',
  );

  const getReceiptStmt = db.prepare<[string], ReceiptRow>(`
    SELECT access_key, issuer_name, issuer_cnpj, issuer_address, number, series, issued_at_text, issued_at,
      consumer_cpf, consumer_name, declared_item_count, total_value, paid_value, taxes
    FROM receipts WHERE access_key = ?
  `);
  const listItemsStmt = db.prepare<[string], LineItemRow>(`
    SELECT ${LINE_ITEM_COLUMNS}
    FROM line_items li JOIN receipts r ON r.access_key = li.access_key
    WHERE li.access_key = ?
    ORDER BY li.sequence
  `);
  const listPendingItemsStmt = db.prepare<[string], LineItemRow>(`
    SELECT ${LINE_ITEM_COLUMNS}
    FROM line_items li JOIN receipts r ON r.access_key = li.access_key
    WHERE li.access_key = ? AND li.category_confirmed IS NULL
    ORDER BY li.sequence
  `);
  const listPaymentsStmt = db.prepare<[string], { method: string; amount: number }>(
    'SELECT method, amount FROM payments WHERE access_key = ? ORDER BY position',
  );
  const listReceiptsStmt = db.prepare<[number, number, number], SummaryRow>(`
    SELECT r.access_key, r.issuer_name, r.issued_at, r.total_value,
      COUNT(li.sequence) AS item_count,
      COALESCE(SUM(CASE WHEN li.sequence IS NOT NULL AND li.category_confirmed IS NULL THEN 1 ELSE 0 END), 0) AS pending_items
    FROM receipts r LEFT JOIN line_items li ON li.access_key = r.access_key
    GROUP BY r.access_key
    HAVING ? = 0 OR pending_items > 0
    ORDER BY r.issued_at IS NULL, r.issued_at DESC, r.updated_at DESC
    LIMIT ? OFFSET ?
  `);

  const saveTx = db.transaction((document: FiscalDocument) => {
    const now = new Date().toISOString();
    upsertReceiptStmt.run({
      access_key: document.accessKey,
      issuer_name: document.issuer.name,
      issuer_cnpj: document.issuer.cnpj,
      issuer_address: document.issuer.address ?? null,
      number: document.number ?? null,
      series: document.series ?? null,
      issued_at_text: document.issuedAtText ?? null,
      issued_at: document.issuedAt ?? null,
      consumer_cpf: document.consumer?.cpf ?? null,
      consumer_name: document.consumer?.name ?? null,
      declared_item_count: document.declaredItemCount ?? null,
      total_value: document.totalValue,
      paid_value: document.paidValue,
      taxes: document.taxes ?? null,
      now,
    });

    for (const item of document.items) {
      upsertItemStmt.run({
        access_key: document.accessKey,
        sequence: item.sequence,
        description: item.description,
        code: item.code ?? null,
        quantity: item.quantity,
        unit: item.unit,
        unit_price: item.unitPrice,
        total_price: item.totalPrice,
        now,
      });
    }
    const lastSequence = document.items.reduce((max, item) => Math.max(max, item.sequence), 0);
    trimItemsStmt.run(document.accessKey, lastSequence);

    deletePaymentsStmt.run(document.accessKey);
    document.payments.forEach((payment, index) => {
      insertPaymentStmt.run(document.accessKey, index + 1, payment.method, payment.amount);
    });
  });

  return {
    saveDocument(document: FiscalDocument) {
      saveTx(document);
    },
    getDocument(accessKey: string) {
      const row = getReceiptStmt.get(accessKey);
      if (!row) return undefined;

      const items: LineItem[] = listItemsStmt.all(accessKey).map((itemRow) => ({
        sequence: itemRow.sequence,
        description: itemRow.description,
        ...(itemRow.code !== null ? { code: itemRow.code } : {}),
        quantity: itemRow.quantity,
        unit: itemRow.unit,
        unitPrice: itemRow.unit_price,
        totalPrice: itemRow.total_price,
      }));
      const payments: Payment[] = listPaymentsStmt.all(accessKey).map((p) => ({ method: p.method, amount: p.amount }));
      const consumer =
        row.consumer_cpf !== null || row.consumer_name !== null
          ? {
              ...(row.consumer_cpf !== null ? { cpf: row.consumer_cpf } : {}),
              ...(row.consumer_name !== null ? { name: row.consumer_name } : {}),
            }
          : undefined;

      return {
        accessKey: row.access_key,
        issuer: {
          name: row.issuer_name,
          cnpj: row.issuer_cnpj,
          ...(row.issuer_address !== null ? { address: row.issuer_address } : {}),
        },
        ...(row.number !== null ? { number: row.number } : {}),
        ...(row.series !== null ? { series: row.series } : {}),
        ...(row.issued_at_text !== null ? { issuedAtText: row.issued_at_text } : {}),
        ...(row.issued_at !== null ? { issuedAt: row.issued_at } : {}),
        ...(consumer ? { consumer } : {}),
        totalValue: row.total_value,
        paidValue: row.paid_value,
        ...(row.taxes !== null ? { taxes: row.taxes } : {}),
        ...(row.declared_item_count !== null ? { declaredItemCount: row.declared_item_count } : {}),
        items,
        payments,
      };
    },
    listReceipts(options: ListReceiptsOptions = {}) {
      const rows = listReceiptsStmt.all(options.pendingOnly ? 1 : 0, options.limit ?? 50, options.offset ?? 0);
      return rows.map((row) => ({
        accessKey: row.access_key,
        issuerName: row.issuer_name,
        ...(row.issued_at !== null ? { issuedAt: row.issued_at } : {}),
        totalValue: row.total_value,
        itemCount: row.item_count,
        pendingItems: row.pending_items,
      }));
    },
    listItems(accessKey: string, options: { pendingOnly?: boolean } = {}) {
      const stmt = options.pendingOnly ? listPendingItemsStmt : listItemsStmt;
      return stmt.all(accessKey).map(mapLineItemRow);
    },
  };
}
