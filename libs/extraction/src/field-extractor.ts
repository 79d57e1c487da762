import { normalizeAmount } from './amount';
import {
  DATE_PATTERNS,
  INVOICE_NO_PATTERNS,
  TOTAL_PATTERNS,
  VENDOR_PATTERNS,
} from './field-patterns';

/**
 * Structured candidate fields pulled out of a document's text.
 * A field that could not be found is null, never an empty string.
 */
export interface ExtractedFields {
  vendor: string | null;
  invoiceNo: string | null;
  date: string | null;
  total: string | null;
}

export const EMPTY_FIELDS: Readonly<ExtractedFields> = Object.freeze({
  vendor: null,
  invoiceNo: null,
  date: null,
  total: null,
});

/**
 * Collapses line-ending variants to `\n` and runs of spaces/tabs to a
 * single space. Line structure is preserved.
 */
export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(/[ \t]+/g, ' ');
}

/**
 * Returns the value of the first pattern that matches `text`.
 *
 * The value is the first non-empty capture group, or the whole match when
 * the pattern has none; either way it is trimmed. A value that trims to an
 * empty string counts as no value.
 */
export function firstMatch(
  patterns: readonly RegExp[],
  text: string,
): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (!match) {
      continue;
    }

    const group = match.slice(1).find((captured) => Boolean(captured));
    const value = (group ?? match[0]).trim();
    return value.length > 0 ? value : null;
  }

  return null;
}

/**
 * Extracts vendor, invoice number, date and total from raw document text.
 *
 * Pure and total: the same text always yields the same result, and a field
 * that is not found is reported as null rather than as an error.
 */
export function extract(text: string): ExtractedFields {
  if (!text) {
    return { ...EMPTY_FIELDS };
  }

  const normalized = normalizeText(text);

  return {
    vendor: firstMatch(VENDOR_PATTERNS, normalized),
    invoiceNo: firstMatch(INVOICE_NO_PATTERNS, normalized),
    date: firstMatch(DATE_PATTERNS, normalized),
    total: normalizeAmount(firstMatch(TOTAL_PATTERNS, normalized)),
  };
}
