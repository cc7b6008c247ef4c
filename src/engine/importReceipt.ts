import { promises as fs } from 'fs';
import * as path from 'path';
import { ReceiptNotFoundError, describeError } from '../errors';
import type { ReceiptRepository } from '../memory/receiptRepository';
import type { FiscalDocument } from '../models/receipt';
import { normalizeAccessKey, parseReceipt } from '../parser/receiptParser';
import { createLogger } from '../utils/logger';

const log = createLogger('import');

/** Source of raw receipt markup; the network transport lives behind this. */
export interface ReceiptFetcher {
  fetchRawReceipt(accessKey: string): Promise<string>;
}

export function rawReceiptFileName(accessKey: string): string {
  return `nfce_${accessKey}.html`;
}

/** Reads markup saved earlier as `nfce_<key>.html` in `directory`. */
export function createFileReceiptFetcher(directory: string): ReceiptFetcher {
  return {
    async fetchRawReceipt(accessKey: string) {
      const filePath = path.join(directory, rawReceiptFileName(accessKey));
      try {
        return await fs.readFile(filePath, 'utf8');
      } catch (error) {
        throw new ReceiptNotFoundError(accessKey, `Could not read ${filePath}: ${describeError(error)}`, {
          cause: error,
        });
      }
    },
  };
}

export interface ReceiptImporter {
  importReceipt(accessKey: string): Promise<FiscalDocument>;
}

export interface ReceiptImporterDeps {
  fetcher: ReceiptFetcher;
  receipts: ReceiptRepository;
}

export function createReceiptImporter(deps: ReceiptImporterDeps): ReceiptImporter {
  return {
    async importReceipt(accessKey: string) {
      const key = normalizeAccessKey(accessKey);
      const rawMarkup = await deps.fetcher.fetchRawReceipt(key);
      const document = parseReceipt(rawMarkup, key);
      deps.receipts.saveDocument(document);
      log.info(`Imported receipt ${key}`, {
        issuer: document.issuer.name,
        items: document.items.length,
        total: document.totalValue,
      });
      return document;
    },
  };
}
