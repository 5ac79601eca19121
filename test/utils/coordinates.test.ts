import { dmsToDecimal, reduceRational, roundTo, toRational } from '../../src/utils/coordinates';

describe('coordinates', () => {
  describe('dmsToDecimal', () => {
    it('converts north and east references to positive degrees', () => {
      expect(dmsToDecimal([[10, 1], [30, 1], [0, 1]], 'N')).toBe(10.5);
      expect(dmsToDecimal([[10, 1], [30, 1], [0, 1]], 'E')).toBe(10.5);
    });

    it('negates south and west references', () => {
      expect(dmsToDecimal([[10, 1], [30, 1], [0, 1]], 'S')).toBe(-10.5);
      expect(dmsToDecimal([[10, 1], [30, 1], [0, 1]], 'W')).toBe(-10.5);
    });

    it('mirrors N/S for identical magnitudes', () => {
      const dms = [[33, 1], [52, 1], [4, 1]] as const;
      expect(dmsToDecimal(dms, 'S')).toBe(-dmsToDecimal(dms, 'N'));
    });

    it('divides each rational component', () => {
      expect(dmsToDecimal([[20, 2], [60, 2], [720, 4]], 'N')).toBe(10.55);
    });

    it('rounds to six decimal places', () => {
      expect(dmsToDecimal([[12, 1], [34, 1], [56, 1]], 'N')).toBe(12.582222);
      expect(dmsToDecimal([[33, 1], [52, 1], [4, 1]], 'S')).toBe(-33.867778);
    });

    it('fails on a zero denominator', () => {
      expect(() => dmsToDecimal([[10, 0], [0, 1], [0, 1]], 'N')).toThrow(RangeError);
    });
  });

  describe('rational helpers', () => {
    it('reduces and lifts rationals', () => {
      expect(reduceRational([439, 100])).toBe(4.39);
      expect(toRational(271.5)).toEqual([271.5, 1]);
    });

    it('rounds to the requested number of places', () => {
      expect(roundTo(1.23456789)).toBe(1.234568);
      expect(roundTo(2.5, 0)).toBe(3);
    });
  });
});
