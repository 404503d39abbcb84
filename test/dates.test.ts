import { SimpleDateParser } from '../src/index';

describe('SimpleDateParser', () => {
  const parser = new SimpleDateParser();

  describe('Dates', () => {
    test('should parse exact dates of every precision', () => {
      expect(parser.parseDate('12 MAR 1901')).toEqual({ modifier: 'exact', start: { year: 1901, month: 3, day: 12 } });
      expect(parser.parseDate('mar 1901')).toEqual({ modifier: 'exact', start: { year: 1901, month: 3 } });
      expect(parser.parseDate('1901')).toEqual({ modifier: 'exact', start: { year: 1901 } });
    });

    test('should parse modifiers and ranges', () => {
      expect(parser.parseDate('ABT 1850')).toEqual({ modifier: 'about', start: { year: 1850 } });
      expect(parser.parseDate('BEF 2 JUN 1850')).toEqual({
        modifier: 'before',
        start: { year: 1850, month: 6, day: 2 },
      });
      expect(parser.parseDate('BET 1850 AND 1860')).toEqual({
        modifier: 'between',
        start: { year: 1850 },
        end: { year: 1860 },
      });
      expect(parser.parseDate('FROM MAR 1900 TO 1905')).toEqual({
        modifier: 'from_to',
        start: { year: 1900, month: 3 },
        end: { year: 1905 },
      });
      expect(parser.parseDate('FROM 1900')).toEqual({ modifier: 'from', start: { year: 1900 } });
      expect(parser.parseDate('TO 1900')).toEqual({ modifier: 'to', start: { year: 1900 } });
    });

    test('should keep calendar, phrase and era', () => {
      expect(parser.parseDate('@#DJULIAN@ 1 JAN 1700')).toEqual({
        modifier: 'exact',
        calendar: 'JULIAN',
        start: { year: 1700, month: 1, day: 1 },
      });
      expect(parser.parseDate('INT 1900 (about nineteen hundred)')).toEqual({
        modifier: 'interpreted',
        start: { year: 1900 },
        phrase: 'about nineteen hundred',
      });
      expect(parser.parseDate('44 B.C.')).toEqual({ modifier: 'exact', start: { year: -44 } });
      expect(parser.parseDate('1699/00')).toEqual({ modifier: 'exact', start: { year: 1699 } });
    });

    test('should report unparsable text as undefined', () => {
      expect(parser.parseDate('')).toBeUndefined();
      expect(parser.parseDate('sometime')).toBeUndefined();
      expect(parser.parseDate('32 JAN 1900')).toBeUndefined();
      expect(parser.parseDate('FOO 1900')).toBeUndefined();
      expect(parser.parseDate('BET 1850')).toBeUndefined();
    });
  });

  describe('Ages', () => {
    test('should parse ages with units and qualifiers', () => {
      expect(parser.parseAge('42y')).toEqual({ qualifier: 'exact', years: 42 });
      expect(parser.parseAge('< 3y 2m')).toEqual({ qualifier: 'less', years: 3, months: 2 });
      expect(parser.parseAge('>10d')).toEqual({ qualifier: 'greater', days: 10 });
    });

    test('should parse age keywords', () => {
      expect(parser.parseAge('INFANT')).toEqual({ qualifier: 'exact', keyword: 'infant' });
      expect(parser.parseAge('> CHILD')).toEqual({ qualifier: 'greater', keyword: 'child' });
    });

    test('should reject ages without units', () => {
      expect(parser.parseAge('5')).toBeUndefined();
      expect(parser.parseAge('')).toBeUndefined();
    });
  });
});
