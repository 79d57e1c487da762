const NON_BREAKING_SPACE = /\u00a0/g;
const NOT_AMOUNT_CHARACTER = /[^0-9.,₹$£]/g;
const CURRENCY_SYMBOL = /[₹$£]/g;

/**
 * Normalizes a raw amount capture to a plain numeral.
 *
 *   "$2,000.00" → "2000.00"
 *   "₹ 1,234"   → "1234"
 *
 * Returns null for an absent capture or when nothing numeric remains.
 */
export function normalizeAmount(raw: string | null): string | null {
  if (!raw) {
    return null;
  }

  const normalized = raw
    .replace(NON_BREAKING_SPACE, ' ')
    .trim()
    .replace(NOT_AMOUNT_CHARACTER, '')
    .replace(/,/g, '')
    .replace(CURRENCY_SYMBOL, '');

  return normalized.length > 0 ? normalized : null;
}
