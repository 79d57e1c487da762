/**
 * @invoice-intake/extraction
 *
 * Pattern-based field extraction for invoice-like text.
 *
 * Exports:
 *   - extract()         : text → { vendor, invoiceNo, date, total }
 *   - normalizeAmount(): raw amount capture → plain numeral
 *   - normalizeText()   : line-ending / whitespace normalization
 */
export {
  extract,
  firstMatch,
  normalizeText,
  EMPTY_FIELDS,
  ExtractedFields,
} from './field-extractor';
export { normalizeAmount } from './amount';
export {
  VENDOR_PATTERNS,
  INVOICE_NO_PATTERNS,
  DATE_PATTERNS,
  TOTAL_PATTERNS,
} from './field-patterns';
