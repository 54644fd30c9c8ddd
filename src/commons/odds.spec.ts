import { americanToDecimal, decimalToAmerican } from './odds';

describe('odds', () => {
  describe('americanToDecimal', () => {
    it('converts underdog lines', () => {
      expect(americanToDecimal('+150')).toBe(2.5);
      expect(americanToDecimal('+100')).toBe(2);
    });

    it('converts favorite lines', () => {
      expect(americanToDecimal('-200')).toBe(1.5);
      expect(americanToDecimal(' -110 ')).toBeCloseTo(1.9091, 4);
    });

    it('rejects malformed lines', () => {
      expect(americanToDecimal('150')).toBeUndefined();
      expect(americanToDecimal('+0')).toBeUndefined();
      expect(americanToDecimal('-1.5')).toBeUndefined();
      expect(americanToDecimal('even')).toBeUndefined();
    });
  });

  describe('decimalToAmerican', () => {
    it('uses a plus line from 2.0 upwards', () => {
      expect(decimalToAmerican(2.0)).toBe('+100');
      expect(decimalToAmerican(4.0)).toBe('+300');
      expect(decimalToAmerican(3.814697265625)).toBe('+281');
    });

    it('uses a minus line below 2.0', () => {
      expect(decimalToAmerican(1.5)).toBe('-200');
      expect(decimalToAmerican(1.25)).toBe('-400');
    });
  });
});
