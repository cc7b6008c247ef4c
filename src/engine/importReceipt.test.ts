import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ParseError, ReceiptNotFoundError, ValidationError } from '../errors';
import { openReceiptDatabase, type SqliteDatabase } from '../memory/db';
import { createReceiptRepository, type ReceiptRepository } from '../memory/receiptRepository';
import { KEY_A, KEY_B } from '../testing/fakes';
import { createFileReceiptFetcher, createReceiptImporter, rawReceiptFileName, type ReceiptFetcher } from './importReceipt';

const modernMarkup = fs.readFileSync(path.join(__dirname, '..', 'parser', '__fixtures__', 'nfce-modern.html'), 'utf8');

describe('createReceiptImporter', () => {
  let db: SqliteDatabase;
  let receipts: ReceiptRepository;
  let directory: string;

  beforeEach(() => {
    db = openReceiptDatabase(':memory:');
    receipts = createReceiptRepository(db);
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'receipts-'));
  });

  afterEach(() => {
    db.close();
    fs.rmSync(directory, { recursive: true, force: true });
  });

  it('fetches, parses and stores a receipt saved on disk', async () => {
    fs.writeFileSync(path.join(directory, rawReceiptFileName(KEY_A)), modernMarkup);
    const importer = createReceiptImporter({ fetcher: createFileReceiptFetcher(directory), receipts });

    const document = await importer.importReceipt(`${KEY_A.slice(0, 22)} ${KEY_A.slice(22)}`);

    expect(document.accessKey).toBe(KEY_A);
    expect(document.items).toHaveLength(3);
    expect(receipts.listItems(KEY_A).map((item) => item.description)).toEqual([
      'ARROZ BRANCO 5KG MARCA X',
      'DETERGENTE NEUTRO 500ML',
      'BANANA PRATA KG',
    ]);
  });

  it('rejects a malformed key before fetching', async () => {
    const requested: string[] = [];
    const fetcher: ReceiptFetcher = {
      fetchRawReceipt: async (accessKey) => {
        requested.push(accessKey);
        return modernMarkup;
      },
    };
    const importer = createReceiptImporter({ fetcher, receipts });

    await expect(importer.importReceipt('1234')).rejects.toThrow(ValidationError);
    expect(requested).toEqual([]);
  });

  it('reports a receipt that was never downloaded', async () => {
    const importer = createReceiptImporter({ fetcher: createFileReceiptFetcher(directory), receipts });

    await expect(importer.importReceipt(KEY_B)).rejects.toThrow(ReceiptNotFoundError);
  });

  it('stores nothing when the markup belongs to another receipt', async () => {
    const importer = createReceiptImporter({ fetcher: { fetchRawReceipt: async () => modernMarkup }, receipts });

    await expect(importer.importReceipt(KEY_B)).rejects.toThrow(ParseError);
    expect(receipts.listReceipts()).toEqual([]);
  });
});
