import { GedcomDatabase, XrefInterner } from '../src/index';
import { xrefPrefix } from '../src/interner';

describe('XrefInterner', () => {
  test('should return the stored id for a repeated substring', () => {
    const interner = new XrefInterner(new GedcomDatabase());

    expect(interner.intern('0 @I1@ INDI', 2, 6)).toBe('@I1@');
    expect(interner.intern('1 HUSB @I1@', 7, 11)).toBe('@I1@');
    expect(interner.size).toBe(1);
  });

  test('should give the same answer whatever the insertion order', () => {
    const interner = new XrefInterner(new GedcomDatabase());
    for (const id of ['@I2@', '@F1@', '@I10@', '@S1@']) {
      interner.intern(id);
    }

    expect(interner.intern('@I10@')).toBe('@I10@');
    expect(interner.intern('@F1@')).toBe('@F1@');
    expect(interner.intern('@I2@')).toBe('@I2@');
    expect(interner.size).toBe(4);
  });

  test('should hand out stable replacements from one counter', () => {
    const interner = new XrefInterner(new GedcomDatabase(), true);

    expect(interner.intern('@I7@')).toBe('@I1@');
    expect(interner.intern('@F3@')).toBe('@F2@');
    expect(interner.intern('@12@')).toBe('@XREF3@');
    expect(interner.intern('x @I7@', 2, 6)).toBe('@I1@');
    expect(interner.intern('@F3@')).toBe('@F2@');
  });

  test('should take the leading letters as prefix', () => {
    expect(xrefPrefix('@NOTE12@')).toBe('NOTE');
    expect(xrefPrefix('I3')).toBe('I');
    expect(xrefPrefix('@_12@')).toBe('XREF');
  });
});
