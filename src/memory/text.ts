/** Canonical form of an item description for alias and embedding lookups. */
export function normalizeDescription(description: string): string {
  return description.replace(/\s+/g, ' ').trim().toUpperCase();
}

/** Identity key of a canonical product: accent-free, lower-case `name|brand`. */
export function productKey(name: string, brand: string | null): string {
  const fold = (value: string) =>
    value
      .normalize('NFD')
      .replace(/[\u0300-\u036f]/g, '')
      .replace(/\s+/g, ' ')
      .trim()
      .toLowerCase();
  return `${fold(name)}|${brand !== null ? fold(brand) : ''}`;
}
