import { add, parseDecimal, subtract, toDecimal, toPlainString } from './decimal.util';

describe('decimal.util', () => {
  describe('parseDecimal', () => {
    it('should parse plain decimal strings', () => {
      expect(parseDecimal('50000')?.toFixed()).toBe('50000');
      expect(parseDecimal('-2.5')?.toFixed()).toBe('-2.5');
      expect(parseDecimal('+0.0001')?.toFixed()).toBe('0.0001');
      expect(parseDecimal('.5')?.toFixed()).toBe('0.5');
    });

    it('should accept exponent notation', () => {
      expect(parseDecimal('1.5e3')?.toFixed()).toBe('1500');
      expect(parseDecimal('25E-4')?.toFixed()).toBe('0.0025');
    });

    it('should reject non-numeric strings', () => {
      expect(parseDecimal('notanumber')).toBeUndefined();
      expect(parseDecimal('')).toBeUndefined();
      expect(parseDecimal('1,000')).toBeUndefined();
    });

    it('should reject NaN, Infinity and non-decimal literals', () => {
      expect(parseDecimal('NaN')).toBeUndefined();
      expect(parseDecimal('Infinity')).toBeUndefined();
      expect(parseDecimal('0x1f')).toBeUndefined();
      expect(parseDecimal('0b101')).toBeUndefined();
    });

    it('should reject exponents that overflow or underflow', () => {
      expect(parseDecimal('1e9999999999999999')).toBeUndefined();
      expect(parseDecimal('-1e9999999999999999')).toBeUndefined();
      expect(parseDecimal('1e-9999999999999999')).toBeUndefined();
      expect(parseDecimal('1e10000')).toBeUndefined();
    });

    it('should accept four-digit exponents', () => {
      expect(parseDecimal('1e9999')?.isFinite()).toBe(true);
      expect(parseDecimal('1e-9999')?.isZero()).toBe(false);
      expect(parseDecimal('0e-9999')?.isZero()).toBe(true);
    });

    it('should reject values that are not strings', () => {
      expect(parseDecimal(12.5)).toBeUndefined();
      expect(parseDecimal(null)).toBeUndefined();
      expect(parseDecimal(undefined)).toBeUndefined();
      expect(parseDecimal({ value: '1' })).toBeUndefined();
    });
  });

  describe('exact arithmetic', () => {
    it('should not drift where binary floating point does', () => {
      expect(0.1 + 0.2).not.toBe(0.3);
      expect(toPlainString(add(toDecimal('0.1'), toDecimal('0.2')))).toBe('0.3');
    });

    it('should keep every digit across many small additions', () => {
      let sum = toDecimal(0);
      for (let i = 0; i < 10000; i++) {
        sum = add(sum, toDecimal('0.00000001'));
      }
      expect(toPlainString(sum)).toBe('0.0001');
    });

    it('should keep large and tiny magnitudes together', () => {
      const sum = add(toDecimal('123456789012345678901234567890'), toDecimal('0.000000000000000001'));
      expect(toPlainString(sum)).toBe('123456789012345678901234567890.000000000000000001');
    });

    it('should keep magnitudes more than 100 digits apart', () => {
      const sum = add(toDecimal('1e60'), toDecimal('1e-60'));
      expect(toPlainString(sum)).toBe(`1${'0'.repeat(60)}.${'0'.repeat(59)}1`);

      const wide = add(toDecimal('1e150'), toDecimal('1e-150'));
      expect(wide.minus(toDecimal('1e150')).equals(toDecimal('1e-150'))).toBe(true);
      expect(toPlainString(wide)).toHaveLength(1 + 150 + 1 + 150);
    });

    it('should subtract', () => {
      expect(toPlainString(subtract(toDecimal('1000'), toDecimal('12.5')))).toBe('987.5');
    });

    it('should return zero for no operands', () => {
      expect(toPlainString(add())).toBe('0');
    });
  });

  describe('toPlainString', () => {
    it('should never use exponent notation', () => {
      expect(toPlainString(toDecimal('1e-12'))).toBe('0.000000000001');
      expect(toPlainString(toDecimal('1e21'))).toBe('1000000000000000000000');
    });
  });
});
