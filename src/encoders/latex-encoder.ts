import type { EncodingTables } from '../encoding-tables';
import type { RenderedFragment } from '../notation-parser';
import latexData from '../tables/latex.json';
import { BaseEncoder } from './base-encoder';
import type { EncoderOptions } from './base-encoder';

/** Accent macros. In LaTeX they precede the character they decorate. */
export const LATEX_NONSPACING_MARKS: readonly string[] = latexData.nonspacingMarks;

/** `\unicode{3b1}`. The macro must be defined by the consuming document. */
function unicodeMacro(codePoint: number): string {
  return '\\unicode{' + codePoint.toString(16) + '}';
}

function braced(text: string): string {
  return text.startsWith('{') ? text : '{' + text + '}';
}

export class LatexEncoder extends BaseEncoder {
  constructor(tables: EncodingTables, options: EncoderOptions = {}) {
    super('latex', tables, options);

    this.registerRenderer('arabic', 'Arabic digits 0-9', { render: (_gid, _args, [digits]) => digits });
    this.registerRenderer('frac', 'fractions', {
      render: (_gid, _args, [numerator, denominator]) => `\\frac{${numerator}}{${denominator}}`,
      arity: 2,
    });
    this.registerRenderer('greek', latexData.greek.description, { mapping: latexData.greek.mapping });
    this.registerRenderer('math', latexData.math.description, { mapping: latexData.math.mapping });
    this.registerRenderer('script', 'script capital letters', {
      render: (_gid, _args, [letters]) => `\\mathcal{${letters.trim()}}`,
    });
    this.registerRenderer('sub', 'subscripts', { render: (_gid, _args, [text]) => `_{${text}}` });
    this.registerRenderer('sup', 'superscripts', { render: (_gid, _args, [text]) => `^{${text}}` });

    this.setNonspacingMarks(LATEX_NONSPACING_MARKS);
  }

  /**
   * tr: nonspacing mark -> moved in front of the unit it decorates
   *     '\n'            -> '\\'
   *     ' '             -> '\ '
   *     ASCII           -> as is
   *     U+xxxx          -> '\unicode{xxxx}'
   *
   * Without a fragment list the whole text is treated as one literal run.
   */
  translate(rendered: string, fragments?: readonly RenderedFragment[]): string {
    const ordered = this.reorderMarks(fragments ?? [{ kind: 'literal', text: rendered }]);
    let latex = '';
    for (const ch of ordered.map(fragment => fragment.text).join('')) {
      const codePoint = ch.codePointAt(0) ?? 0;
      if (ch === '\n') {
        latex += '\\\\';
      } else if (ch === ' ') {
        latex += '\\ ';
      } else if (codePoint < 128) {
        latex += ch;
      } else {
        latex += unicodeMacro(codePoint);
      }
    }
    return latex;
  }

  private reorderMarks(fragments: readonly RenderedFragment[]): RenderedFragment[] {
    const ordered: RenderedFragment[] = [];
    for (const fragment of fragments) {
      const previous = ordered[ordered.length - 1];
      if (fragment.kind !== 'call' || !this.tables.isNonspacingMark(this.representation, fragment.text) || !previous) {
        ordered.push(fragment);
        continue;
      }
      ordered.pop();
      ordered.push(...this.decorate(previous, fragment.text));
    }
    return ordered;
  }

  /**
   * A mark after a literal run decorates the run's last character; a mark
   * after a rendered call decorates the whole call.
   */
  private decorate(target: RenderedFragment, mark: string): RenderedFragment[] {
    if (target.kind === 'call') {
      return [{ kind: 'call', text: mark + braced(target.text) }];
    }
    const chars = [...target.text];
    const last = chars.pop();
    if (last === undefined) {
      return [{ kind: 'call', text: mark }];
    }
    const decorated: RenderedFragment = { kind: 'call', text: mark + '{' + last + '}' };
    return chars.length > 0 ? [{ kind: 'literal', text: chars.join('') }, decorated] : [decorated];
  }
}
