import type { EncodingTables } from '../encoding-tables';
import { UnknownKeyError } from '../errors';
import unicodeData from '../tables/unicode.json';
import { BaseEncoder } from './base-encoder';
import type { EncoderOptions } from './base-encoder';

export const UNICODE_TABLES = {
  arabic: unicodeData.arabic,
  frac: unicodeData.frac,
  greek: unicodeData.greek,
  math: unicodeData.math,
  script: unicodeData.script,
  sub: unicodeData.sub,
  sup: unicodeData.sup,
};

/** Combining diacritics that overlay the previous character. */
export const UNICODE_NONSPACING_MARKS: readonly string[] = unicodeData.nonspacingMarks;

/**
 * Install the built-in Unicode tables without constructing an encoder.
 * Encoders that render through Unicode code points (HTML) depend on them.
 */
export function installUnicodeTables(tables: EncodingTables): void {
  for (const [tableId, table] of Object.entries(UNICODE_TABLES)) {
    tables.installTable('unicode', tableId, table.description, table.mapping);
  }
  tables.setNonspacingMarks('unicode', UNICODE_NONSPACING_MARKS);
}

export class UnicodeEncoder extends BaseEncoder {
  constructor(tables: EncodingTables, options: EncoderOptions = {}) {
    super('unicode', tables, options);

    const concat = (gid: string, args: readonly string[]) => this.concatLookup(gid, args[0].trim());

    this.registerRenderer('arabic', UNICODE_TABLES.arabic.description, {
      render: concat,
      mapping: UNICODE_TABLES.arabic.mapping,
    });
    this.registerRenderer('frac', UNICODE_TABLES.frac.description, {
      render: (gid, [numerator, denominator]) => this.renderFraction(gid, numerator, denominator),
      mapping: UNICODE_TABLES.frac.mapping,
      arity: 2,
    });
    this.registerRenderer('greek', UNICODE_TABLES.greek.description, { mapping: UNICODE_TABLES.greek.mapping });
    this.registerRenderer('math', UNICODE_TABLES.math.description, { mapping: UNICODE_TABLES.math.mapping });
    this.registerRenderer('script', UNICODE_TABLES.script.description, {
      render: concat,
      mapping: UNICODE_TABLES.script.mapping,
    });
    this.registerRenderer('sub', UNICODE_TABLES.sub.description, { render: concat, mapping: UNICODE_TABLES.sub.mapping });
    this.registerRenderer('sup', UNICODE_TABLES.sup.description, { render: concat, mapping: UNICODE_TABLES.sup.mapping });

    this.setNonspacingMarks(UNICODE_NONSPACING_MARKS);
  }

  translate(rendered: string): string {
    return rendered;
  }

  /**
   * Vulgar fraction. A precomposed glyph is used when the table has one;
   * otherwise the fraction is built as superscript, fraction slash, subscript.
   * When the digits have no super/subscript form the plain `n/d` key is kept.
   */
  private renderFraction(groupId: string, numerator: string, denominator: string): string {
    const n = numerator.trim();
    const d = denominator.trim();
    if (d === '1') {
      return n;
    }
    if (d === '0') {
      return this.defaultLookup('math', 'inf');
    }

    const key = `${n}/${d}`;
    try {
      return this.defaultLookup(groupId, key);
    } catch (err) {
      if (!(err instanceof UnknownKeyError)) {
        throw err;
      }
    }
    try {
      return this.concatLookup('sup', n) + this.defaultLookup('math', 'frac') + this.concatLookup('sub', d);
    } catch (err) {
      if (err instanceof UnknownKeyError) {
        return key;
      }
      throw err;
    }
  }
}
