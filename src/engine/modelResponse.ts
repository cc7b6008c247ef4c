import { z } from 'zod';
import { ModelInvocationError } from '../errors';
import type { ModelClassification } from '../models/classification';
import { normalizeCategory } from './policy';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(record: JsonRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) return record[key];
  }
  return undefined;
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim() ?? '';
    return trimmed.length > 0 ? trimmed : null;
  });

/** Recorded when a model names a category but gives no readable confidence. */
export const DEFAULT_MODEL_CONFIDENCE = 0;

const FieldsSchema = z.object({
  category: z.string().trim().min(1),
  confidence: z
    .union([
      z.number().finite(),
      z
        .string()
        .trim()
        .regex(/^\d+(?:[.,]\d+)?$/)
        .transform((value) => Number(value.replace(',', '.'))),
    ])
    .optional()
    .catch(undefined),
  productName: optionalText,
  productBrand: optionalText,
  rationale: optionalText,
});

/** Pulls the JSON object out of a reply that may carry code fences or prose around it. */
export function extractJsonObject(raw: string): unknown {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(raw.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

/**
 * Reads a model reply. Accepts English or Portuguese field names, either at the
 * top level or as the first entry of an `items` list.
 */
export function parseModelResponse(raw: string, modelName: string): ModelClassification {
  const document = extractJsonObject(raw);
  if (!isRecord(document)) {
    throw new ModelInvocationError('malformed-response', modelName, `${modelName} did not answer with a JSON object.`);
  }

  const items = document['items'] ?? document['itens'];
  const first: unknown = Array.isArray(items) ? items[0] : undefined;
  const candidate = isRecord(first) ? first : document;
  const product = pick(candidate, ['product', 'produto']);
  const productRecord: JsonRecord = isRecord(product) ? product : {};

  const parsed = FieldsSchema.safeParse({
    category: pick(candidate, ['category', 'categoria']),
    confidence: pick(candidate, ['confidence', 'confianca', 'confiança']),
    productName:
      pick(productRecord, ['name', 'nome']) ?? pick(candidate, ['product_name', 'productName', 'nome_base']),
    productBrand:
      pick(productRecord, ['brand', 'marca']) ?? pick(candidate, ['product_brand', 'productBrand', 'brand', 'marca_base']),
    rationale: pick(candidate, ['rationale', 'justificativa']),
  });

  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ModelInvocationError(
      'malformed-response',
      modelName,
      `${modelName} answered without a usable ${fields}.`,
    );
  }

  const category = normalizeCategory(parsed.data.category);
  return {
    category,
    confidence: Math.min(1, Math.max(0, parsed.data.confidence ?? DEFAULT_MODEL_CONFIDENCE)),
    productName: parsed.data.productName,
    productBrand: parsed.data.productBrand,
    rationale: parsed.data.rationale,
    rawResponse: raw,
  };
}
