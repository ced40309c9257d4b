/**
 * Trims and title-cases a product or customer name: the first letter of every
 * run of letters is upper-cased and the rest lower-cased. Two names that only
 * differ in case or surrounding whitespace normalize to the same value.
 */
export function normalizeName(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

export function normalizeDescription(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Largest value an `INTEGER` column holds. */
export const MAX_INTEGER = 2_147_483_647;

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

/** True when `value` carries no fraction of a cent. */
export function hasWholeCents(value: number): boolean {
  return roundMoney(value) === value;
}
