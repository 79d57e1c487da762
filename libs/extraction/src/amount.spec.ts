import { normalizeAmount } from './amount';

describe('normalizeAmount', () => {
  it.each([
    ['$2,000.00', '2000.00'],
    ['₹ 1,234', '1234'],
    [' £ 12.50 ', '12.50'],
    ['1,000,000', '1000000'],
    ['$\u00a0350', '350'],
  ])('normalizes %j to %j', (raw, expected) => {
    expect(normalizeAmount(raw)).toBe(expected);
  });

  it('returns null for an absent capture', () => {
    expect(normalizeAmount(null)).toBeNull();
    expect(normalizeAmount('')).toBeNull();
  });

  it('returns null when nothing numeric remains', () => {
    expect(normalizeAmount(',')).toBeNull();
    expect(normalizeAmount('USD')).toBeNull();
  });
});
