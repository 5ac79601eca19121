import { formatCell, formatTable } from '../../src/export/csv';

describe('csv', () => {
  describe('formatCell', () => {
    it('renders absent values as empty', () => {
      expect(formatCell(undefined)).toBe('');
      expect(formatCell(null)).toBe('');
    });

    it('renders numbers and plain text as-is', () => {
      expect(formatCell(-33.867778)).toBe('-33.867778');
      expect(formatCell('2021:03:14 09:26:53')).toBe('2021:03:14 09:26:53');
    });

    it('quotes cells with separators or quotes', () => {
      expect(formatCell('image (1), copy.jpg')).toBe('"image (1), copy.jpg"');
      expect(formatCell('say "cheese"')).toBe('"say ""cheese"""');
      expect(formatCell('two\nlines')).toBe('"two\nlines"');
    });
  });

  describe('formatTable', () => {
    it('writes the header then rows in column order', () => {
      const table = formatTable(
        ['lat', 'lng', 'name'],
        [
          { name: 'a.jpg', lng: 2, lat: 1 },
          { lat: 3, extra: 'ignored' },
        ]
      );

      expect(table).toBe('lat,lng,name\n1,2,a.jpg\n3,,\n');
    });

    it('writes only the header for no rows', () => {
      expect(formatTable(['a', 'b'], [])).toBe('a,b\n');
    });
  });
});
