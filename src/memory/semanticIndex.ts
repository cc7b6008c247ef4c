import type { SqliteDatabase } from './db';
import type { EmbeddingProvider } from './embeddings';
import { normalizeDescription } from './text';
import { EmbeddingBackendError, describeError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('semantic-index');

export interface SemanticMatch {
  productId: string;
  score: number;
}

export interface SemanticIndex {
  upsert(productId: string, description: string): Promise<void>;
  query(description: string, topK?: number): Promise<SemanticMatch[]>;
}

interface EmbeddingRow {
  product_id: string;
  vector: string;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(0, similarity));
}

function parseVector(raw: string): number[] | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!Array.isArray(value)) return undefined;
  const vector: number[] = [];
  for (const entry of value) {
    if (typeof entry !== 'number') return undefined;
    vector.push(entry);
  }
  return vector;
}

/**
 * Similarity lookup over product descriptions. Embedding backend failures are
 * logged and surface as an empty result (query) or a skipped write (upsert).
 */
export function createSemanticIndex(db: SqliteDatabase, provider: EmbeddingProvider): SemanticIndex {
  const upsertStmt = db.prepare<{
    product_id: string;
    description: string;
    model: string;
    vector: string;
    now: string;
  }>(`
    INSERT INTO product_embeddings (product_id, description, model, vector, updated_at)
    VALUES (@product_id, @description, @model, @vector, @now)
    ON CONFLICT(product_id) DO UPDATE SET
      description = excluded.description,
      model = excluded.model,
      vector = excluded.vector,
      updated_at = excluded.updated_at
  `);
  const vectorsStmt = db.prepare<[string], EmbeddingRow>(
    'SELECT product_id, vector FROM product_embeddings WHERE model = ?',
  );

  const embed = async (text: string): Promise<number[] | undefined> => {
    try {
      return await provider.embed(text);
    } catch (error) {
      const wrapped =
        error instanceof EmbeddingBackendError
          ? error
          : new EmbeddingBackendError(`Embedding failed: ${describeError(error)}`, { cause: error });
      log.warn(wrapped.message, { model: provider.model });
      return undefined;
    }
  };

  return {
    async upsert(productId: string, description: string) {
      const text = normalizeDescription(description);
      if (text.length === 0) return;
      const vector = await embed(text);
      if (!vector) return;
      upsertStmt.run({
        product_id: productId,
        description: text,
        model: provider.model,
        vector: JSON.stringify(vector),
        now: new Date().toISOString(),
      });
    },
    async query(description: string, topK = 1) {
      const text = normalizeDescription(description);
      if (text.length === 0 || topK < 1) return [];
      const vector = await embed(text);
      if (!vector) return [];

      const matches: SemanticMatch[] = [];
      for (const row of vectorsStmt.all(provider.model)) {
        const stored = parseVector(row.vector);
        if (!stored) {
          log.warn('Skipping unreadable stored vector', { productId: row.product_id });
          continue;
        }
        matches.push({ productId: row.product_id, score: cosineSimilarity(vector, stored) });
      }
      matches.sort((a, b) => b.score - a.score);
      return matches.slice(0, topK);
    },
  };
}
