import { describe, test, expect } from 'vitest';
import { createNotationContext } from './context';
import { EncodingTables } from './encoding-tables';
import { TableNotFoundError } from './errors';
import { asciiEscape, formatLookupTable } from './table-format';

const HAT = '\u0302';

function demoTables(): EncodingTables {
  const tables = new EncodingTables();
  tables.installTable('plain', 'demo', 'demo table', { a: '1', bb: '22' });
  return tables;
}

function accentTables(): EncodingTables {
  const tables = new EncodingTables();
  tables.setNonspacingMarks('unicode', [HAT]);
  tables.installTable('unicode', 'marks', 'accents', { hat: HAT, x: 'x' });
  return tables;
}

describe('asciiEscape', () => {
  test('escapes by code point size', () => {
    expect(asciiEscape('abc')).toBe('abc');
    expect(asciiEscape('°')).toBe('\\xb0');
    expect(asciiEscape('α')).toBe('\\u03b1');
    expect(asciiEscape('𝒜')).toBe('\\U0001d49c');
    expect(asciiEscape('\n')).toBe('\\x0a');
  });
});

describe('formatLookupTable', () => {
  test('prints a title, headers truncated to the column widths and the entries', () => {
    expect(formatLookupTable(demoTables(), 'plain', 'demo').split('\n')).toEqual([
      '  Lookup Table: plain:demo  demo table',
      'ke co      ke co',
      '—— ——      —— ——',
      'a  1' + ' '.repeat(7) + 'bb 22',
    ]);
  });

  test('ascii mode underlines with hyphens', () => {
    const lines = formatLookupTable(demoTables(), 'plain', 'demo', { ascii: true }).split('\n');
    expect(lines[2]).toBe('-- --      -- --');
  });

  test('codes that start with a mark are printed on a space', () => {
    expect(formatLookupTable(accentTables(), 'unicode', 'marks', { width: 10 }).split('\n')).toEqual([
      '  Lookup Table: unicode:marks  accents',
      'key c',
      '——— —',
      'hat  ' + HAT,
      'x   x',
    ]);
  });

  test('ascii mode measures the escaped form', () => {
    expect(formatLookupTable(accentTables(), 'unicode', 'marks', { width: 10, ascii: true }).split('\n')).toEqual([
      '  Lookup Table: unicode:marks  accents',
      'key code',
      '--- ------',
      'hat \\u0302',
      'x   x',
    ]);
  });

  test('lays out several column pairs per row', () => {
    const { tables } = createNotationContext();
    const lines = formatLookupTable(tables, 'unicode', 'greek', { width: 40 }).split('\n');

    expect(lines[0]).toBe('  Lookup Table: unicode:greek  Greek letters');
    expect(lines[1]).toBe(Array(3).fill('key     c').join('      '));
    expect(lines[3]).toBe('alpha   α      beta    β      gamma   γ');
    expect(lines).toHaveLength(3 + 16);
  });

  test('astral code points take one column', () => {
    const { tables } = createNotationContext();
    const lines = formatLookupTable(tables, 'unicode', 'script', { width: 20 }).split('\n');

    expect(lines[3]).toBe('A 𝒜  B ℬ  C 𝒞  D 𝒟');
    expect(lines).toHaveLength(3 + 7);
  });

  test('never prints more than 16 column pairs', () => {
    const tables = new EncodingTables();
    const mapping: Record<string, string> = {};
    for (let i = 0; i < 40; i++) {
      mapping[String.fromCharCode(0x41 + (i % 26)) + (i < 26 ? '' : '2')] = 'c';
    }
    tables.installTable('plain', 'wide', 'wide table', mapping);

    const lines = formatLookupTable(tables, 'plain', 'wide', { width: 200 }).split('\n');
    expect(lines[1]).toBe(Array(16).fill('ke c').join('      '));
    expect(lines).toHaveLength(3 + 3);
  });

  test('unknown tables raise TableNotFoundError', () => {
    expect(() => formatLookupTable(demoTables(), 'plain', 'nope')).toThrow(TableNotFoundError);
  });
});
