import type MarkdownIt from 'markdown-it';
import { createNotationContext } from '../context';
import type { NotationContext } from '../context';
import { NotationParseError } from '../errors';
import type { ParseOptions } from '../notation-parser';
import { installPhysicsSymbols } from '../physics-symbols';
import { installStandardModelSymbols } from '../standard-model-symbols';

type InlineRule = Parameters<MarkdownIt['inline']['ruler']['before']>[2];
type StateInline = Parameters<InlineRule>[0];

export interface NotationPluginOptions {
  /** Context whose HTML encoder renders the calls. A fresh one (with `$phy` and `$sm`) by default. */
  context?: NotationContext;
  /** Leave unknown calls as source text instead of their arguments. */
  strict?: boolean;
}

const DOLLAR = 0x24;

/**
 * Main plugin function that registers `$name(args)` notation with markdown-it.
 * Each call becomes a `notation` token holding the HTML encoder's output.
 * Unless markdown-it allows raw HTML, text inside a call is escaped like any
 * other text; only the encoder's own markup is emitted as HTML.
 * @param md - The MarkdownIt instance to extend
 */
export function notationMarkdownPlugin(md: MarkdownIt, options: NotationPluginOptions = {}): void {
  const context = options.context ?? createNotationContext();
  if (!options.context) {
    installPhysicsSymbols(context);
    installStandardModelSymbols(context);
  }
  const html = context.encoders.html;

  function parseNotation(state: StateInline, silent: boolean): boolean {
    const start = state.pos;
    if (state.src.charCodeAt(start) !== DOLLAR) return false;

    const parseOptions: ParseOptions = {};
    if (options.strict !== undefined) parseOptions.strict = options.strict;
    if (!md.options.html) parseOptions.escape = md.utils.escapeHtml;

    let rendered: { text: string; end: number };
    try {
      // Calls may not run past the end of the inline block
      rendered = html.renderCallAt(state.src.slice(0, state.posMax), start, parseOptions);
    } catch (err) {
      if (err instanceof NotationParseError) return false;
      throw err;
    }

    if (!silent) {
      const token = state.push('notation', '', 0);
      token.markup = state.src.slice(start, rendered.end);
      token.content = rendered.text;
    }
    state.pos = rendered.end;
    return true;
  }

  // Before emphasis so `$sub(*)` is not read as an emphasis marker
  md.inline.ruler.before('emphasis', 'notation', parseNotation);

  md.renderer.rules.notation = (tokens, idx) => tokens[idx].content;
}
