import type { StoredLineItem } from './receipt';

export type ClassificationSource =
  | { kind: 'semantic-cache'; productId: string; score: number }
  | { kind: 'model'; modelName: string; rawResponse: string }
  | { kind: 'manual-review'; reviewer: string | null; notes: string | null; updateSuggested: boolean };

export interface ClassificationDecision {
  item: StoredLineItem;
  source: ClassificationSource;
  category: string;
  confidence: number;
  productName: string | null;
  productBrand: string | null;
  rationale?: string | undefined;
}

export type ClassificationStatus = 'classified' | 'failed' | 'skipped';

export interface ClassificationResult {
  accessKey: string;
  sequence: number;
  status: ClassificationStatus;
  source?: string | undefined;
  category?: string | undefined;
  confidence?: number | undefined;
  productId?: string | undefined;
  modelName?: string | undefined;
  error?: string | undefined;
}

export interface ReviewInput {
  accessKey: string;
  sequence: number;
  category: string;
  productName?: string | undefined;
  productBrand?: string | undefined;
  notes?: string | undefined;
  updateSuggested?: boolean | undefined;
}

export interface ModelClassification {
  category: string;
  confidence: number;
  productName: string | null;
  productBrand: string | null;
  rationale: string | null;
  rawResponse: string;
}

export interface ClassificationRequest {
  sequence: number;
  description: string;
  quantity: number;
  unit: string | null;
  totalPrice: number;
  issuerName?: string | undefined;
  issuedAt?: string | undefined;
  knownCategories: string[];
}
