export const SEMANTIC_CACHE_SOURCE = 'semantic-cache';
export const MANUAL_REVIEW_SOURCE = 'manual-review';

export interface ClassificationRecord {
  accessKey: string;
  sequence: number;
  source: string;
  modelName: string | null;
  rawResponse: string | null;
  confidence: number;
  timestamp: Date;
}

export interface ManualReview {
  accessKey: string;
  sequence: number;
  category: string | null;
  productName: string | null;
  productBrand: string | null;
  reviewer: string | null;
  notes: string | null;
  confirmed: boolean;
  timestamp: Date;
}
