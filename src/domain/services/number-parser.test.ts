import { NUMERIC_TOKEN, parseLocaleNumber } from './number-parser.js';

describe('parseLocaleNumber', () => {
  it('reads comma-grouped thousands', () => {
    expect(parseLocaleNumber('6,120')).toBe(6120);
    expect(parseLocaleNumber('1,234,567')).toBe(1234567);
  });

  it('reads a lone comma as a decimal mark', () => {
    expect(parseLocaleNumber('1696,92')).toBe(1696.92);
  });

  it('reads a single dot as a decimal mark', () => {
    expect(parseLocaleNumber('1696.92')).toBe(1696.92);
    expect(parseLocaleNumber('6.120')).toBe(6.12);
  });

  it('reads one dot before three digits as grouped thousands when asked', () => {
    expect(parseLocaleNumber('6.120', { dotGroupsThousands: true })).toBe(6120);
    expect(parseLocaleNumber('1696.92', { dotGroupsThousands: true })).toBe(1696.92);
  });

  it('reads repeated dots as grouped thousands', () => {
    expect(parseLocaleNumber('6.120.000')).toBe(6120000);
  });

  it('takes the rightmost separator as the decimal mark when both appear', () => {
    expect(parseLocaleNumber('6.120,50')).toBe(6120.5);
    expect(parseLocaleNumber('6,120.50')).toBe(6120.5);
  });

  it('strips space and no-break-space grouping', () => {
    expect(parseLocaleNumber('6 120')).toBe(6120);
    expect(parseLocaleNumber('6 120')).toBe(6120);
  });

  it('keeps the sign', () => {
    expect(parseLocaleNumber('-42')).toBe(-42);
  });

  it('returns null for tokens that are not numbers', () => {
    expect(parseLocaleNumber('1.2.3,4,5')).toBeNull();
    expect(parseLocaleNumber('abc')).toBeNull();
    expect(parseLocaleNumber('')).toBeNull();
  });

  describe('NUMERIC_TOKEN', () => {
    const tokens = (text: string) => [...text.matchAll(new RegExp(NUMERIC_TOKEN, 'g'))].map((m) => m[0]);

    it('matches grouped and decimal tokens whole', () => {
      expect(tokens('6 120 kWh, 1,696.92 and 6.120,50')).toEqual(['6 120', '1,696.92', '6.120,50']);
    });

    it('matches nothing inside a digit run longer than a token', () => {
      expect(tokens('1'.repeat(40))).toEqual([]);
    });
  });
});
