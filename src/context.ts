import { EncodingTables } from './encoding-tables';
import type { BaseEncoder } from './encoders/base-encoder';
import { HtmlEncoder } from './encoders/html-encoder';
import { LatexEncoder } from './encoders/latex-encoder';
import { PlainEncoder } from './encoders/plain-encoder';
import { UnicodeEncoder } from './encoders/unicode-encoder';
import { parseRepresentation } from './representation';
import type { Representation } from './representation';

export interface NotationContextOptions {
  /** Strictness of every encoder's parser. Lenient by default. */
  strict?: boolean;
  /** Registry to populate; a fresh one is created when omitted. */
  tables?: EncodingTables;
}

/** The shared table registry and one encoder per representation. */
export interface NotationContext {
  readonly tables: EncodingTables;
  readonly encoders: Readonly<Record<Representation, BaseEncoder>>;
  /** Accepts any case of the representation name. */
  encoder(representation: string): BaseEncoder;
}

export function createNotationContext(options: NotationContextOptions = {}): NotationContext {
  const tables = options.tables ?? new EncodingTables();
  const encoderOptions = { strict: options.strict ?? false };

  // Unicode first: the HTML encoder renders through the Unicode tables.
  const unicode = new UnicodeEncoder(tables, encoderOptions);
  const encoders: Record<Representation, BaseEncoder> = {
    plain: new PlainEncoder(tables, encoderOptions),
    unicode,
    html: new HtmlEncoder(tables, encoderOptions),
    latex: new LatexEncoder(tables, encoderOptions),
  };

  return {
    tables,
    encoders,
    encoder: representation => encoders[parseRepresentation(representation)],
  };
}
