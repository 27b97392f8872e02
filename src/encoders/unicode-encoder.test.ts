import { describe, test, expect } from 'vitest';
import * as fc from 'fast-check';
import { createNotationContext } from '../context';
import { EncodingTables } from '../encoding-tables';
import { NotationParseError } from '../errors';
import { UnicodeEncoder, UNICODE_TABLES } from './unicode-encoder';

const unicode = createNotationContext().encoders.unicode;

describe('UnicodeEncoder', () => {
  test('renders single-key groups', () => {
    expect(unicode.parse('$greek(alpha)')).toBe('α');
    expect(unicode.parse('$greek(Omega)')).toBe('Ω');
    expect(unicode.parse('$math(<=)')).toBe('≤');
    expect(unicode.parse('$math(-)')).toBe('−');
    expect(unicode.parse('$math(inf)')).toBe('∞');
  });

  test('renders per-character groups', () => {
    expect(unicode.parse('$arabic(2024)')).toBe('٢٠٢٤');
    expect(unicode.parse('$script(AB)')).toBe('𝒜ℬ');
    expect(unicode.parse('$sub(10)')).toBe('₁₀');
    expect(unicode.parse('$sup(2+)')).toBe('²⁺');
  });

  test('ignores blanks around lookup arguments like the other encoders', () => {
    const { encoders } = createNotationContext({ strict: true });
    expect(encoders.unicode.parse('$greek( alpha)')).toBe('α');
    expect(encoders.unicode.parse('$math( <= )')).toBe('≤');
    expect(encoders.unicode.parse('$sub( 2 )')).toBe('₂');
    expect(encoders.html.parse('$greek( alpha)')).toBe('&alpha;');
    expect(encoders.html.parse('$math( <= )')).toBe('&#x2264;');
    expect(encoders.latex.parse('$greek( alpha)')).toBe('\\alpha');
    expect(encoders.plain.parse('$greek( alpha)')).toBe('alpha');
  });

  test('mixes literals and calls', () => {
    expect(unicode.parse('H$sub(2)O')).toBe('H₂O');
    expect(unicode.parse('LiAlSi$sub(2)O$sub(6)$sup(+)')).toBe('LiAlSi₂O₆⁺');
    expect(unicode.parse('$greek(Omega) man and his dog Tri$greek(alpha).')).toBe('Ω man and his dog Triα.');
  });

  test('uses precomposed fractions when available', () => {
    expect(unicode.parse('$frac(1,2)')).toBe('½');
    expect(unicode.parse('$frac(3,4)')).toBe('¾');
    expect(unicode.parse('$frac( 1 , 2 )')).toBe('½');
  });

  test('builds other fractions from super- and subscripts', () => {
    expect(unicode.parse('$frac(3,7)')).toBe('³⁄₇');
    expect(unicode.parse('$frac(12,25)')).toBe('¹²⁄₂₅');
  });

  test('fraction special cases', () => {
    expect(unicode.parse('$frac(5,1)')).toBe('5');
    expect(unicode.parse('$frac(1,0)')).toBe('∞');
    expect(unicode.parse('$frac(x,y)')).toBe('x/y');
    expect(unicode.parse('$frac(x,y)', { strict: true })).toBe('x/y');
  });

  test('translate leaves text unchanged', () => {
    expect(unicode.translate('x\u0302 and 𝒜')).toBe('x\u0302 and 𝒜');
    expect(unicode.parse('x$math(hat)')).toBe('x\u0302');
  });

  test('keys with no subscript form fall back to the argument when lenient', () => {
    expect(unicode.parse('k$sub(B)')).toBe('kB');
  });

  test('keys with no subscript form fail when strict', () => {
    try {
      unicode.parse('$sub(B)', { strict: true });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(NotationParseError);
      if (err instanceof NotationParseError) {
        expect(err.kind).toBe('unknown-key');
        expect(err.message).toBe("sub(B): unicode encoding table 'sub' has no key 'B'");
        expect(err.offset).toBe(7);
      }
    }
  });

  test('constructing the encoder installs every table and the marks', () => {
    const tables = new EncodingTables();
    new UnicodeEncoder(tables);
    expect(tables.listTables('unicode')).toEqual(['arabic', 'frac', 'greek', 'math', 'script', 'sub', 'sup']);
    expect(tables.getNonspacingMarks('unicode')).toHaveLength(6);
    expect(tables.isNonspacingMark('unicode', '\u0302')).toBe(true);
  });

  test('every Greek letter renders to a single code point', () => {
    fc.assert(
      fc.property(fc.constantFrom(...Object.keys(UNICODE_TABLES.greek.mapping)), (name) => {
        expect([...unicode.parse(`$greek(${name})`)]).toHaveLength(1);
      }),
      { numRuns: 100 }
    );
  });

  test('subscripted digit strings keep their length', () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[0-9]{1,8}$/), (digits) => {
        expect([...unicode.parse(`$sub(${digits})`)]).toHaveLength(digits.length);
        expect([...unicode.parse(`$sup(${digits})`)]).toHaveLength(digits.length);
      }),
      { numRuns: 100 }
    );
  });
});
