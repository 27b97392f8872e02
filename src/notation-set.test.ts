import { describe, test, expect } from 'vitest';
import { createNotationContext } from './context';
import { NotationParseError } from './errors';
import { NotationSet, evaluateNotation } from './notation-set';

const context = createNotationContext();

describe('NotationSet', () => {
  test('renders one expression in every representation', () => {
    const set = new NotationSet(context, '$greek(alpha)');
    expect(set.plain).toBe('alpha');
    expect(set.unicode).toBe('α');
    expect(set.html).toBe('&alpha;');
    expect(set.latex).toBe('\\alpha');
  });

  test('the default representation is unicode', () => {
    const set = new NotationSet(context, 'H$sub(2)O');
    expect(set.defaultRepresentation).toBe('unicode');
    expect(set.value).toBe('H₂O');
    expect(String(set)).toBe('H₂O');
  });

  test('the default representation is case-insensitive and can change', () => {
    const set = new NotationSet(context, 'H$sub(2)O', 'HTML');
    expect(set.value).toBe('H<sub>2</sub>O');

    set.defaultRepresentation = 'LaTeX';
    expect(set.defaultRepresentation).toBe('latex');
    expect(set.value).toBe('H_{2}O');
  });

  test('rejects unknown representation names', () => {
    expect(() => new NotationSet(context, 'x', 'tex')).toThrow(
      'Invalid representation "tex". Use plain, unicode, html, or latex'
    );
  });

  test('evaluate re-renders and returns the default output', () => {
    const set = new NotationSet(context);
    expect(set.get('plain')).toBe('');
    expect(set.evaluate('$math(inf)')).toBe('∞');
    expect(set.plain).toBe('inf');
    expect(set.latex).toBe('\\infty');
  });

  test('a failed evaluation keeps every previous rendering', () => {
    const set = new NotationSet(createNotationContext({ strict: true }), '$greek(alpha)');
    // plain passes unknown math symbols through; unicode rejects them
    expect(() => set.evaluate('$math(foo)')).toThrow(NotationParseError);
    expect(set.plain).toBe('alpha');
    expect(set.unicode).toBe('α');
    expect(set.html).toBe('&alpha;');
    expect(set.latex).toBe('\\alpha');
  });

  test('set overrides a single representation', () => {
    const set = new NotationSet(context, '$greek(alpha)');
    set.set('Plain', 'a');
    expect(set.plain).toBe('a');
    expect(set.unicode).toBe('α');
  });

  test('describe lists every representation, aligned and sorted by name', () => {
    const set = new NotationSet(context, '$greek(alpha)');
    expect(set.describe()).toBe(
      'html:    &alpha;\n' +
      'latex:   \\alpha\n' +
      'plain:   alpha\n' +
      'unicode: α'
    );
  });

  test('parse failures propagate', () => {
    expect(() => new NotationSet(context, '$math(>=')).toThrow(NotationParseError);
  });
});

describe('evaluateNotation', () => {
  test('builds a set with the requested default', () => {
    const set = evaluateNotation(context, '$frac(1,2)', 'latex');
    expect(set.value).toBe('\\frac{1}{2}');
    expect(set.unicode).toBe('½');
    expect(set.plain).toBe('1/2');
    expect(set.html).toBe('<sup>1</sup>/<sub>2</sub>');
  });
});
