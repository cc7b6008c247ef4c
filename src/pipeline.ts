import { loadSettings, type Settings } from './config/settings';
import { createOrchestrator, type ClassificationOrchestrator } from './engine/orchestrator';
import { createOpenAIModelClient, type ModelClient } from './engine/modelClient';
import {
  createFileReceiptFetcher,
  createReceiptImporter,
  type ReceiptFetcher,
  type ReceiptImporter,
} from './engine/importReceipt';
import { openReceiptDatabase, type SqliteDatabase } from './memory/db';
import { createClassificationRepository, type ClassificationStore } from './memory/classificationRepository';
import { createReceiptRepository, type ReceiptRepository } from './memory/receiptRepository';
import { createOpenAIEmbeddingProvider, type EmbeddingProvider } from './memory/embeddings';
import { createSemanticIndex, type SemanticIndex } from './memory/semanticIndex';
import { createFileConfigSource, type ModelConfigSource } from './registry/configSource';
import { createModelRegistry, type ModelRegistry } from './registry/modelRegistry';
import { setLogLevel } from './utils/logger';

export interface ReceiptPipeline {
  settings: Settings;
  db: SqliteDatabase;
  receipts: ReceiptRepository;
  store: ClassificationStore;
  index: SemanticIndex;
  registry: ModelRegistry;
  orchestrator: ClassificationOrchestrator;
  importer: ReceiptImporter;
  close(): void;
}

export interface PipelineOverrides {
  settings?: Settings;
  db?: SqliteDatabase;
  embeddings?: EmbeddingProvider;
  modelClient?: ModelClient;
  configSource?: ModelConfigSource;
  fetcher?: ReceiptFetcher;
}

/** Wires every collaborator from settings; overrides replace the network-facing pieces. */
export function createReceiptPipeline(overrides: PipelineOverrides = {}): ReceiptPipeline {
  const settings = overrides.settings ?? loadSettings();
  setLogLevel(settings.logLevel);

  const db = overrides.db ?? openReceiptDatabase(settings.databasePath);
  const receipts = createReceiptRepository(db);
  const store = createClassificationRepository(db);
  const index = createSemanticIndex(db, overrides.embeddings ?? createOpenAIEmbeddingProvider(settings.embedding));
  const registry = createModelRegistry({
    source: overrides.configSource ?? createFileConfigSource(settings.modelsConfigPath),
    defaultTimeoutMs: settings.modelsLoadTimeoutMs,
  });
  registry.startBackgroundLoad();

  const orchestrator = createOrchestrator({
    store,
    index,
    registry,
    modelClient: overrides.modelClient ?? createOpenAIModelClient(),
    retryPolicy: settings.retry,
    concurrency: settings.concurrency,
    modelsTimeoutMs: settings.modelsLoadTimeoutMs,
  });
  const importer = createReceiptImporter({
    fetcher: overrides.fetcher ?? createFileReceiptFetcher(settings.rawReceiptsDir),
    receipts,
  });

  return {
    settings,
    db,
    receipts,
    store,
    index,
    registry,
    orchestrator,
    importer,
    close() {
      db.close();
    },
  };
}
