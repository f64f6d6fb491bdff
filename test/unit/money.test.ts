import { assertPositiveAmount, formatMoney, parseMoney } from '../../src/utils/money';
import { DomainError } from '../../src/utils/errors';

describe('Money Utilities', () => {
  describe('parseMoney', () => {
    it('should convert decimal strings and numbers into minor units', () => {
      expect(parseMoney('500')).toBe(50000);
      expect(parseMoney('500.5')).toBe(50050);
      expect(parseMoney(' 500.25 ')).toBe(50025);
      expect(parseMoney(0.1)).toBe(10);
      expect(parseMoney(1999.99)).toBe(199999);
    });

    it('should reject more than two decimal places', () => {
      expect(() => parseMoney('1.234')).toThrow(DomainError);
      expect(() => parseMoney('1.234')).toThrow('Amount must be a non-negative decimal with at most 2 places, got "1.234"');
    });

    it('should reject negative, empty and non-numeric input', () => {
      expect(() => parseMoney('-1')).toThrow(DomainError);
      expect(() => parseMoney('')).toThrow(DomainError);
      expect(() => parseMoney('abc')).toThrow(DomainError);
      expect(() => parseMoney(null)).toThrow(DomainError);
    });
  });

  describe('formatMoney', () => {
    it('should render minor units with two decimals', () => {
      expect(formatMoney(50000)).toBe('500.00');
      expect(formatMoney(5)).toBe('0.05');
      expect(formatMoney(0)).toBe('0.00');
      expect(formatMoney(-12345)).toBe('-123.45');
    });
  });

  describe('assertPositiveAmount', () => {
    it('should accept positive integers only', () => {
      expect(() => assertPositiveAmount(1)).not.toThrow();
      expect(() => assertPositiveAmount(0)).toThrow('Amount must be greater than zero');
      expect(() => assertPositiveAmount(-100)).toThrow('Amount must be greater than zero');
      expect(() => assertPositiveAmount(10.5)).toThrow('Amount must be greater than zero');
    });
  });
});
