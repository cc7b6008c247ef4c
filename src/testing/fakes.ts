import type { EmbeddingProvider } from '../memory/embeddings';
import type { ModelClient } from '../engine/modelClient';
import type { ClassificationRequest, ModelClassification } from '../models/classification';
import type { ModelConfig } from '../models/modelConfig';
import type { FiscalDocument, LineItem } from '../models/receipt';
import type { ModelConfigSource } from '../registry/configSource';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const DIMENSIONS = 256;

function bucket(token: string): number {
  let hash = 7;
  for (const char of token) {
    hash = (hash * 31 + (char.codePointAt(0) ?? 0)) % 1_000_003;
  }
  return hash % DIMENSIONS;
}

/** Bag-of-words vector: equal texts embed identically, unrelated texts barely overlap. */
export function bagOfWords(text: string): number[] {
  const vector = new Array<number>(DIMENSIONS).fill(0);
  for (const token of text.split(/\s+/).filter((part) => part.length > 0)) {
    const index = bucket(token);
    vector[index] = (vector[index] ?? 0) + 1;
  }
  return vector;
}

export interface FakeEmbeddingProvider extends EmbeddingProvider {
  readonly calls: string[];
  failWith: Error | null;
}

export function createFakeEmbeddingProvider(vectors: Record<string, number[]> = {}): FakeEmbeddingProvider {
  const calls: string[] = [];
  const provider: FakeEmbeddingProvider = {
    model: 'fake-embedding',
    calls,
    failWith: null,
    async embed(text: string) {
      calls.push(text);
      if (provider.failWith) throw provider.failWith;
      return vectors[text] ?? bagOfWords(text);
    },
  };
  return provider;
}

export type FakeAnswer = ModelClassification | Error;

export interface FakeModelClient extends ModelClient {
  readonly calls: Array<{ model: string; description: string }>;
}

export function createFakeModelClient(
  respond: (request: ClassificationRequest, model: ModelConfig) => FakeAnswer | Promise<FakeAnswer>,
): FakeModelClient {
  const calls: Array<{ model: string; description: string }> = [];
  return {
    calls,
    async classify(request: ClassificationRequest, model: ModelConfig) {
      calls.push({ model: model.name, description: request.description });
      const answer = await respond(request, model);
      if (answer instanceof Error) throw answer;
      return answer;
    },
  };
}

export function modelAnswer(
  category: string,
  confidence: number,
  productName: string | null = null,
  productBrand: string | null = null,
): ModelClassification {
  const rawResponse = JSON.stringify({ category, confidence, product: { name: productName, brand: productBrand } });
  return { category, confidence, productName, productBrand, rationale: null, rawResponse };
}

export interface MemoryConfigSource extends ModelConfigSource {
  content: string;
  reads: number;
  /** When set, reads wait for it before answering. */
  gate: Promise<void> | null;
}

export function createMemoryConfigSource(content: string): MemoryConfigSource {
  const source: MemoryConfigSource = {
    description: 'memory',
    content,
    reads: 0,
    gate: null,
    async read() {
      source.reads += 1;
      const snapshot = source.content;
      if (source.gate) await source.gate;
      return snapshot;
    },
  };
  return source;
}

export function modelsJson(...names: string[]): string {
  return JSON.stringify({
    models: names.map((name) => ({ name, credential_env_var: 'TEST_MODEL_KEY', friendly_name: `${name} (test)` })),
  });
}

export function buildDocument(
  accessKey: string,
  items: Array<Pick<LineItem, 'description'> & Partial<LineItem>>,
  issuerName = 'MERCADO TESTE LTDA',
): FiscalDocument {
  const lineItems: LineItem[] = items.map((item, index) => ({
    sequence: item.sequence ?? index + 1,
    description: item.description,
    ...(item.code !== undefined ? { code: item.code } : {}),
    quantity: item.quantity ?? 1,
    unit: item.unit ?? 'UN',
    unitPrice: item.unitPrice ?? 10,
    totalPrice: item.totalPrice ?? 10,
  }));
  const total = lineItems.reduce((sum, item) => sum + item.totalPrice, 0);
  return {
    accessKey,
    issuer: { name: issuerName, cnpj: '12.345.678/0001-90' },
    issuedAt: '2024-03-05T18:22:10',
    totalValue: total,
    paidValue: total,
    items: lineItems,
    payments: [{ method: 'Dinheiro', amount: total }],
  };
}

export const KEY_A = '43240312345678000190650010000123451000123456';
export const KEY_B = '43240498765432000110650020000456781000456789';
export const KEY_C = '43240511111111000111650030000789011000789012';
