import type { SemanticMatch } from '../memory/semanticIndex';

/** Minimum similarity at which a known product is reused without asking a model. */
export const REUSE_THRESHOLD = 0.82;

export function isReusableMatch(match: SemanticMatch): boolean {
  return match.score >= REUSE_THRESHOLD;
}

export function normalizeCategory(category: string): string {
  return category.replace(/\s+/g, ' ').trim().toLowerCase();
}
