import type { EncodingTables } from '../encoding-tables';
import { BaseEncoder } from './base-encoder';
import type { EncoderOptions } from './base-encoder';
import { UNICODE_TABLES, installUnicodeTables } from './unicode-encoder';

/** `&#x3b1;` style numeric character reference for one code point. */
export function characterReference(codePoint: number): string {
  return '&#x' + codePoint.toString(16) + ';';
}

/** Character references for every code point of `text`. */
export function characterReferences(text: string): string {
  let html = '';
  for (const ch of text) {
    html += characterReference(ch.codePointAt(0) ?? 0);
  }
  return html;
}

/** Named entities for the Greek letters, e.g. alpha -> &alpha;. */
const GREEK_ENTITIES: ReadonlyMap<string, string> = new Map(
  Object.keys(UNICODE_TABLES.greek.mapping).map(name => [name, `&${name};`])
);

/**
 * HTML encoder. Symbols without named entities are written as numeric
 * character references of their Unicode code points, so the Unicode tables
 * must be installed in the shared registry.
 */
export class HtmlEncoder extends BaseEncoder {
  constructor(tables: EncodingTables, options: EncoderOptions = {}) {
    super('html', tables, options);

    if (!tables.hasRepresentation('unicode')) {
      installUnicodeTables(tables);
    }

    this.registerRenderer('arabic', 'Arabic digits 0-9', {
      render: (gid, [digits]) => this.renderReferences(gid, digits.trim()),
    });
    this.registerRenderer('frac', 'fractions', {
      render: (_gid, _args, [numerator, denominator]) =>
        `<sup>${numerator.trim()}</sup>/<sub>${denominator.trim()}</sub>`,
      arity: 2,
    });
    this.registerRenderer('greek', 'Greek letters', {
      render: (gid, [name]) => this.defaultLookup(gid, name.trim()),
      mapping: GREEK_ENTITIES,
    });
    this.registerRenderer('math', 'math symbols', {
      render: (gid, [symbol]) => characterReferences(this.lookupIn('unicode', gid, symbol.trim())),
    });
    this.registerRenderer('script', 'script capital letters', {
      render: (gid, [letters]) => this.renderReferences(gid, letters.trim()),
    });
    this.registerRenderer('sub', 'subscripts', { render: (_gid, _args, [text]) => `<sub>${text}</sub>` });
    this.registerRenderer('sup', 'superscripts', { render: (_gid, _args, [text]) => `<sup>${text}</sup>` });
  }

  /**
   * tr: '\n'     -> '<br>'
   *     ASCII    -> as is
   *     U+xxxx   -> '&#xxxxx;'
   */
  translate(rendered: string): string {
    let html = '';
    for (const ch of rendered) {
      const codePoint = ch.codePointAt(0) ?? 0;
      if (ch === '\n') {
        html += '<br>';
      } else if (codePoint < 128) {
        html += ch;
      } else {
        html += characterReference(codePoint);
      }
    }
    return html;
  }

  /** Per-character Unicode lookup in table `tableId`, written as references. */
  private renderReferences(tableId: string, keys: string): string {
    let html = '';
    for (const key of keys) {
      html += characterReferences(this.lookupIn('unicode', tableId, key));
    }
    return html;
  }
}
