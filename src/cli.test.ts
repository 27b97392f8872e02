import { test, expect, vi, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { describeError, main, parseArgs, readVersion, runCli } from './cli';
import { NotationParseError } from './errors';

afterEach(() => {
  vi.restoreAllMocks();
});

const argv = (...args: string[]) => ['node', 'notation', ...args];

test('Property 1: Argument parser keeps expressions in order', () => {
  fc.assert(
    fc.property(
      fc.array(fc.stringMatching(/^[a-zA-Z$(][a-zA-Z0-9$(),]{0,9}$/), { minLength: 1, maxLength: 5 }),
      fc.constantFrom('plain', 'unicode', 'html', 'latex', 'all'),
      fc.boolean(),
      (expressions, format, strict) => {
        const args = argv('--format', format, ...expressions);
        if (strict) args.push('--strict');

        const options = parseArgs(args);
        expect(options.expressions).toEqual(expressions);
        expect(options.format).toBe(format);
        expect(options.strict).toBe(strict);
      }
    ),
    { numRuns: 100 }
  );
});

test('defaults to unicode output', () => {
  const options = parseArgs(argv('H$sub(2)O'));
  expect(options.format).toBe('unicode');
  expect(options.strict).toBe(false);
  expect(options.list).toBe(false);
  expect(options.tableId).toBeUndefined();
});

test('format names are case-insensitive', () => {
  expect(parseArgs(argv('--format', 'LaTeX', 'x')).format).toBe('latex');
});

test('argument errors', () => {
  expect(() => parseArgs(argv('--format', 'tex', 'x'))).toThrow('Invalid format "tex". Use plain, unicode, html, latex, or all');
  expect(() => parseArgs(argv('x', '--format'))).toThrow('--format requires a value');
  expect(() => parseArgs(argv('--table', '--list'))).toThrow('--table requires a value');
  expect(() => parseArgs(argv('--width', '0', '--list'))).toThrow('Invalid width "0". Use a positive integer');
  expect(() => parseArgs(argv('--width', 'wide', '--list'))).toThrow('Invalid width "wide". Use a positive integer');
  expect(() => parseArgs(argv('--bogus', 'x'))).toThrow('Unknown option "--bogus"');
  expect(() => parseArgs(argv())).toThrow('No expression specified');
  expect(() => parseArgs(argv('--strict'))).toThrow('No expression specified');
});

test('listing flags need no expression', () => {
  expect(parseArgs(argv('--list')).list).toBe(true);
  expect(parseArgs(argv('--table', 'greek')).tableId).toBe('greek');
  expect(parseArgs(argv('--help')).help).toBe(true);
  expect(parseArgs(argv('--version')).version).toBe(true);
});

test('renders each expression in the chosen format', () => {
  expect(runCli(parseArgs(argv('--format', 'plain', 'H$sub(2)O', '$math(inf)')))).toEqual(['H_2O', 'inf']);
  expect(runCli(parseArgs(argv('$phy(h-bar)')))).toEqual(['\u210f']);
  expect(runCli(parseArgs(argv('--format', 'latex', '$sm(p-bar) + $sm(e-)')))).toEqual(['\\bar{p}\\ +\\ e^{-}']);
});

test('format all prints every representation', () => {
  expect(runCli(parseArgs(argv('--format', 'all', '$greek(alpha)')))).toEqual([
    'html:    &alpha;\nlatex:   \\alpha\nplain:   alpha\nunicode: α',
  ]);
});

test('lists the installed tables of a format', () => {
  expect(runCli(parseArgs(argv('--list', '--format', 'html')))).toEqual([
    'html:greek  Greek letters',
    'html:phy  physics symbols',
    'html:sm  Standard Model symbols',
  ]);
});

test('prints a lookup table', () => {
  const [table] = runCli(parseArgs(argv('--table', 'greek', '--format', 'latex', '--width', '60')));
  expect(table.split('\n')[0]).toBe('  Lookup Table: latex:greek  Greek letters');
});

test('format all prints the table for every representation that has it', () => {
  const tables = runCli(parseArgs(argv('--table', 'math', '--format', 'all', '--width', '80')));
  expect(tables.map(table => table.split('\n')[0])).toEqual([
    '  Lookup Table: plain:math  math symbols',
    '  Lookup Table: unicode:math  math symbols',
    '  Lookup Table: latex:math  math symbols',
  ]);
  expect(() => runCli(parseArgs(argv('--table', 'nope', '--format', 'all')))).toThrow('No table "nope" is installed');
});

test('strict parse failures are reported with a caret', () => {
  try {
    runCli(parseArgs(argv('--strict', '$nope(x)')));
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(NotationParseError);
    expect(describeError(err)).toBe("$nope(x)\n     ^\nunicode call 'nope' not found");
  }
  expect(describeError(new Error('plain failure'))).toBe('plain failure');
});

test('main prints the version from package.json', () => {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  main(argv('--version'));
  expect(log).toHaveBeenCalledWith(readVersion());
  expect(readVersion()).toMatch(/^\d+\.\d+\.\d+/);
});

test('main prints one line per expression', () => {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  main(argv('--format', 'html', 'x$sup(2)', '$greek(pi)'));
  expect(log.mock.calls).toEqual([['x<sup>2</sup>'], ['&pi;']]);
});
