import type { EncodingTables } from '../encoding-tables';
import { UnknownKeyError } from '../errors';
import plainData from '../tables/plain.json';
import { BaseEncoder } from './base-encoder';
import type { EncoderOptions } from './base-encoder';
import { UNICODE_TABLES } from './unicode-encoder';

/** Identity table over the keys of a Unicode table: plain text spells the key out. */
function identityMapping(keys: Iterable<string>): Map<string, string> {
  return new Map([...keys].map(key => [key, key]));
}

export class PlainEncoder extends BaseEncoder {
  constructor(tables: EncodingTables, options: EncoderOptions = {}) {
    super('plain', tables, options);

    const concat = (gid: string, args: readonly string[]) => this.concatLookup(gid, args[0].trim());

    this.registerRenderer('arabic', 'Arabic digits 0-9', {
      render: concat,
      mapping: identityMapping(Object.keys(UNICODE_TABLES.arabic.mapping)),
    });
    this.registerRenderer('frac', 'fractions', {
      render: (_gid, _args, [numerator, denominator]) => numerator.trim() + '/' + denominator.trim(),
      arity: 2,
    });
    this.registerRenderer('greek', 'Greek letters', {
      render: (gid, [name]) => this.defaultLookup(gid, name.trim()),
      mapping: identityMapping(Object.keys(UNICODE_TABLES.greek.mapping)),
    });
    this.registerRenderer('math', plainData.math.description, {
      render: (gid, [symbol]) => this.renderMathSymbol(gid, symbol.trim()),
      mapping: plainData.math.mapping,
    });
    this.registerRenderer('script', 'script capital letters', {
      render: concat,
      mapping: identityMapping(Object.keys(UNICODE_TABLES.script.mapping)),
    });
    this.registerRenderer('sub', 'subscripts', { render: (_gid, _args, [text]) => '_' + text });
    this.registerRenderer('sup', 'superscripts', { render: (_gid, _args, [text]) => '^' + text });
  }

  /**
   * tr: ASCII  -> as is
   *     U+xxxx -> '?'
   */
  translate(rendered: string): string {
    let text = '';
    for (const ch of rendered) {
      text += (ch.codePointAt(0) ?? 0) < 128 ? ch : '?';
    }
    return text;
  }

  /** Symbols that are already ASCII (`<=`, `+-`, ...) have no entry and print as given. */
  private renderMathSymbol(groupId: string, symbol: string): string {
    try {
      return this.defaultLookup(groupId, symbol);
    } catch (err) {
      if (err instanceof UnknownKeyError) {
        return symbol;
      }
      throw err;
    }
  }
}
