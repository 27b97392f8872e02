import MarkdownIt from 'markdown-it';
import * as fc from 'fast-check';
import { notationMarkdownPlugin } from './preview/notation-markdown-plugin';
import type { NotationPluginOptions } from './preview/notation-markdown-plugin';

/** Create a MarkdownIt instance with the notation plugin and render input. */
export function renderWithPlugin(input: string, options: NotationPluginOptions = {}): string {
  const md = new MarkdownIt();
  md.use(notationMarkdownPlugin, options);
  return md.render(input);
}

/** Text with no notation in it. Backslashes are only escapes before '$'. */
export const literalText = (text: fc.Arbitrary<string> = fc.string()) =>
  text.filter(s => !s.includes('$'));

/** A Greek letter name from the built-in tables. */
export const greekName = fc.constantFrom(
  'alpha', 'beta', 'gamma', 'delta', 'epsilon', 'theta', 'lambda', 'mu', 'pi', 'sigma', 'omega',
  'Gamma', 'Delta', 'Theta', 'Lambda', 'Pi', 'Sigma', 'Omega'
);
