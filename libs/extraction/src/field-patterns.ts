/**
 * Ordered candidate patterns per extracted field.
 *
 * Each list is evaluated front to back against the normalized text and the
 * first pattern that matches wins. Patterns are case-insensitive and carry
 * no `g` flag, so they hold no `lastIndex` state between calls.
 */

/** Amount grammar: optional symbol, optional space, digit groups, optional cents */
const AMOUNT = '[$₹£]?\\s*[0-9,]+(?:\\.[0-9]{2})?';

export const VENDOR_PATTERNS: readonly RegExp[] = [
  /^ ?From: ?(\S.*)$/im,
  /^ ?Vendor: ?(\S.*)$/im,
  /^ ?Bill To: ?(\S.*)$/im,
];

export const INVOICE_NO_PATTERNS: readonly RegExp[] = [
  /Invoice\s*No\b\.?:?\s*([\w\-/]+)/i,
  /Inv\.?\s*#\s*([\w\-/]+)/i,
  /Invoice\s*#\s*([\w\-/]+)/i,
];

export const DATE_PATTERNS: readonly RegExp[] = [
  /(\d{4}-\d{2}-\d{2})/,
  /(\d{2}\/\d{2}\/\d{4})/,
  /(\d{1,2} [a-z]{3,9} \d{4})/i,
];

export const TOTAL_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\bTotal\\s*[:-]?\\s*(${AMOUNT})`, 'i'),
  new RegExp(`\\bAmount\\s*[:-]?\\s*(${AMOUNT})`, 'i'),
  /([$₹£]\s*[0-9,]+(?:\.[0-9]{2})?)/,
];
