// src/table-format.ts - printable key/code listing of an installed table
//
// Entries are laid out as `key code` pairs, several pairs per row. Widths are
// measured in code points so astral glyphs line up; nonspacing marks take no
// column of their own.

import type { EncodingTables } from './encoding-tables';
import type { Representation } from './representation';

export interface LookupTableFormatOptions {
  /** Print codes as `\uXXXX` escapes and underline with '-'. */
  ascii?: boolean;
  /** Output width in columns. Defaults to 80. */
  width?: number;
}

interface ColumnLayout {
  ncols: number;
  kwid: number;
  cwid: number;
  sep: number;
}

const DEFAULT_WIDTH = 80;
const MAX_COLUMN_PAIRS = 16;
const MAX_SEPARATION = 6;

function hex(cp: number, digits: number): string {
  return cp.toString(16).padStart(digits, '0');
}

/** ASCII-only spelling of a code: printable ASCII as is, the rest escaped. */
export function asciiEscape(code: string): string {
  let text = '';
  for (const ch of code) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp >= 0x20 && cp < 0x7f) {
      text += ch;
    } else if (cp <= 0xff) {
      text += '\\x' + hex(cp, 2);
    } else if (cp <= 0xffff) {
      text += '\\u' + hex(cp, 4);
    } else {
      text += '\\U' + hex(cp, 8);
    }
  }
  return text;
}

function codePointLength(text: string): number {
  return [...text].length;
}

function padTo(text: string, width: number, length: number = codePointLength(text)): string {
  return text + ' '.repeat(Math.max(0, width - length));
}

function layoutColumns(keyWidth: number, codeWidth: number, entries: number, maxcols: number): ColumnLayout {
  const pair = keyWidth + 1 + codeWidth;
  let sep = 2;
  let ncols = Math.floor(maxcols / (pair + sep));

  if (ncols === 0) {
    ncols = 1;
    sep = 1;
  } else if (ncols > entries) {
    ncols = Math.max(1, entries);
  }

  // 1, 2, 3, then multiples of 4 up to 16
  if (ncols > 1) {
    const quads = Math.floor(ncols / 4);
    if (quads > 0) {
      ncols = quads * 4;
    }
    ncols = Math.min(ncols, MAX_COLUMN_PAIRS);
    sep = Math.min(Math.floor((maxcols - ncols * pair) / (ncols - 1)), MAX_SEPARATION);
  }

  return { ncols, kwid: keyWidth, cwid: codeWidth, sep };
}

/**
 * Render an installed table for display.
 *
 * @example
 * formatLookupTable(tables, 'unicode', 'greek', { width: 40 })
 * // first line: '  Lookup Table: unicode:greek  Greek letters'
 */
export function formatLookupTable(
  tables: EncodingTables,
  representation: Representation,
  tableId: string,
  options: LookupTableFormatOptions = {}
): string {
  const table = tables.getTable(representation, tableId);
  const ascii = options.ascii ?? false;

  // Display form and visible width of every code
  const entries = [...table.mapping].map(([key, code]) => {
    if (ascii) {
      const shown = asciiEscape(code);
      return { key, shown, width: shown.length };
    }
    const shown = tables.hasLeadingNonspacingMark(representation, code) ? ' ' + code : code;
    return { key, shown, width: codePointLength(shown) - tables.countNonspacingMarks(representation, shown) };
  });

  let keyWidth = 1;
  let codeWidth = 1;
  for (const entry of entries) {
    keyWidth = Math.max(keyWidth, codePointLength(entry.key));
    codeWidth = Math.max(codeWidth, entry.width);
  }

  const { ncols, kwid, cwid, sep } = layoutColumns(keyWidth, codeWidth, entries.length, options.width ?? DEFAULT_WIDTH);
  const gap = ' '.repeat(sep);
  const dash = ascii ? '-' : '—';

  const headerPair = padTo('key'.slice(0, kwid), kwid) + ' ' + padTo('code'.slice(0, cwid), cwid);
  const underlinePair = dash.repeat(kwid) + ' ' + dash.repeat(cwid);

  const lines = [
    `  Lookup Table: ${representation}:${tableId}  ${table.description}`,
    Array<string>(ncols).fill(headerPair).join(gap),
    Array<string>(ncols).fill(underlinePair).join(gap),
  ];

  for (let i = 0; i < entries.length; i += ncols) {
    const row = entries
      .slice(i, i + ncols)
      .map(entry => padTo(entry.key, kwid) + ' ' + padTo(entry.shown, cwid, entry.width));
    lines.push(row.join(gap));
  }

  return lines.map(line => line.trimEnd()).join('\n');
}
