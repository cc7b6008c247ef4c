const NON_DIGITS = /\D+/g;
const WHITESPACE = /\s+/g;

export const ACCESS_KEY_LENGTH = 44;

export function digitsOnly(value: string): string {
  return value.replace(NON_DIGITS, '');
}

export function collapseWhitespace(value: string): string {
  return value.replace(WHITESPACE, ' ').trim();
}

/** Parses Brazilian-formatted numbers such as `1.234,56`; returns undefined when empty or invalid. */
export function parseBrazilianNumber(value: string): number | undefined {
  const compact = value.replace(WHITESPACE, '').replace(/^R\$/i, '');
  if (!compact) return undefined;
  const normalized = compact.replace(/\./g, '').replace(',', '.');
  if (!/^-?\d+(\.\d+)?$/.test(normalized)) return undefined;
  return Number(normalized);
}

export function formatCnpj(value: string): string | undefined {
  const digits = digitsOnly(value);
  if (digits.length !== 14) return undefined;
  return `${digits.slice(0, 2)}.${digits.slice(2, 5)}.${digits.slice(5, 8)}/${digits.slice(8, 12)}-${digits.slice(12)}`;
}

const CNPJ_PATTERN = /\d{2}\.?\d{3}\.?\d{3}\/?\d{4}-?\d{2}/;

/** Finds a CNPJ inside free text, formatted or bare, and returns it formatted. */
export function extractCnpj(text: string): string | undefined {
  const match = text.match(CNPJ_PATTERN);
  if (match) return formatCnpj(match[0]);
  return formatCnpj(text);
}

/** Collapses whitespace and drops the empty segments the portal leaves between commas. */
export function normalizeAddress(value: string): string {
  return collapseWhitespace(value)
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(', ');
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

const ISSUE_DATE = /^(\d{2})\/(\d{2})\/(\d{4})(?:\s+(\d{2}):(\d{2})(?::(\d{2}))?)?/;

/** `05/03/2024 18:22:10` → `2024-03-05T18:22:10`; undefined when the text has no recognizable date. */
export function toIsoIssueDate(text: string): string | undefined {
  const cleaned = collapseWhitespace(text.replace(/às/g, ' ').replace(/(\d)h(\d)/g, '$1:$2'));
  const match = cleaned.match(ISSUE_DATE);
  if (!match) return undefined;
  const [, dd, mm, yyyy, hh, min, ss] = match;
  const date = `${yyyy}-${mm}-${dd}`;
  if (hh === undefined || min === undefined) return date;
  return `${date}T${hh}:${min}:${ss ?? '00'}`;
}
