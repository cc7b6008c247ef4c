import * as fs from 'fs';
import { createReceiptPipeline } from '../pipeline';
import { rawReceiptFileName } from '../engine/importReceipt';
import type { ClassificationResult, StoredLineItem } from '../models';

const RAW_FILE_PATTERN = /^nfce_(\d{44})\.html$/;

function findStoredKey(directory: string): string | undefined {
  if (!fs.existsSync(directory)) return undefined;
  for (const name of fs.readdirSync(directory).sort()) {
    const match = name.match(RAW_FILE_PATTERN);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

function describeResult(result: ClassificationResult, item: StoredLineItem | undefined): string {
  const label = `#${result.sequence} ${item?.description ?? '?'}`;
  if (result.status !== 'classified') {
    return `${label} -> ${result.status}${result.error ? ` (${result.error})` : ''}`;
  }
  const confidence = result.confidence !== undefined ? result.confidence.toFixed(2) : '-';
  return `${label} -> ${result.category ?? '?'} [${result.source ?? '?'}, confidence ${confidence}]`;
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const confirm = argv.includes('--confirm');
  const requestedKey = argv.find((arg) => !arg.startsWith('--'));
  const pipeline = createReceiptPipeline();

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once('SIGINT', stop);

  try {
    const accessKey = requestedKey ?? findStoredKey(pipeline.settings.rawReceiptsDir);
    if (!accessKey) {
      console.log(
        `No receipt to import. Save one as ${pipeline.settings.rawReceiptsDir}/${rawReceiptFileName('<access key>')} or pass its key.`,
      );
      return;
    }

    const document = await pipeline.importer.importReceipt(accessKey);
    console.log('=== Receipt', document.accessKey, '===');
    console.log('Issuer:', document.issuer.name, `(${document.issuer.cnpj})`);
    console.log('Issued at:', document.issuedAt ?? document.issuedAtText ?? 'unknown');
    console.log('Items:', document.items.length, 'Total:', document.totalValue.toFixed(2));

    const models = await pipeline.orchestrator.listModels();
    console.log('Models:', models.map((model) => model.friendlyName).join(', '));

    console.log(`\n--- Classifying pending items (confirm=${confirm}) ---`);
    const results = await pipeline.orchestrator.classifyPending({
      limit: Math.max(document.items.length, 1),
      confirm,
      signal: controller.signal,
    });
    for (const result of results) {
      console.log(describeResult(result, pipeline.store.getItem(result.accessKey, result.sequence)));
    }

    const pending = pipeline.receipts.listReceipts({ pendingOnly: true });
    console.log('\nReceipts still awaiting review:', pending.length);
    for (const summary of pending) {
      console.log(`  ${summary.accessKey} ${summary.issuerName}: ${summary.pendingItems}/${summary.itemCount} item(s)`);
    }
  } finally {
    process.removeListener('SIGINT', stop);
    pipeline.close();
  }
}

if (require.main === module) {
  void main().catch((error) => {
    console.error('Demo runner failed:', error);
    process.exitCode = 1;
  });
}
