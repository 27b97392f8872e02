// src/notation-parser.ts - recursive-descent parser for $name(args) notation
//
// Grammar:
//   grammar    ::= { expr }
//   expr       ::= '\' '$'                 (* escaped literal dollar *)
//                | '$' call
//                | { char-not-dollar }      (* literal run *)
//   call       ::= identifier '(' [args] ')'
//   args       ::= arg { ',' arg }
//   arg        ::= { esc-seq | '$' call | char-not-comma-not-rparen }
//   esc-seq    ::= '\' any-char
//   identifier ::= (letter | '_') { letter | digit | '_' }
//
// Examples:
//   "$greek(Omega) man and his dog Tri$greek(alpha)."
//   "\$50$math(*)10$sup(9) dollars"
//   "Spodumene cation: LiAlSi$sub(2)O$sub(6)$sup(+)"
//   "M$sub($frac(1,2))"
//
// --- Implementation notes ---
// - One session object per parse call; the parser itself only holds the
//   bound target and the default strictness, so nested or concurrent parses
//   on one encoder never share cursor state.
// - Lenient mode replaces a failed call with its evaluated arguments joined by
//   spaces. Syntax errors and argument-count errors are fatal in both modes.
// - An `escape` option rewrites literal source text on its way to the output.
//   Renderers see each argument twice: as a lookup key with literals untouched,
//   and as output text with literals escaped. Rendered calls appear in both.

import {
  InvalidArgumentTypeError,
  NotationParseError,
  UnknownGroupError,
  UnknownKeyError,
} from './errors';
import type { ParseErrorKind } from './errors';
import type { Representation } from './representation';

/** One top-level piece of a parse: a literal run or a rendered call. */
export interface RenderedFragment {
  kind: 'literal' | 'call';
  text: string;
}

/** The encoder surface the parser drives. */
export interface NotationTarget {
  readonly representation: Representation;
  hasRenderer(groupId: string): boolean;
  invoke(groupId: string, args: readonly string[], text?: readonly string[]): string;
  translate(rendered: string, fragments?: readonly RenderedFragment[]): string;
}

export interface ParseOptions {
  /** Abort on unknown calls and keys instead of falling back to the arguments. */
  strict?: boolean;
  /** Applied to literal source text before it reaches the output, e.g. HTML escaping. */
  escape?: (literal: string) => string;
}

interface ParserSession {
  readonly source: string;
  readonly strict: boolean;
  readonly escape: (literal: string) => string;
  cursor: number;
  output: string;
  fragments: RenderedFragment[];
}

/** One call argument as a lookup key and as output text. */
interface ParsedArgument {
  key: string;
  text: string;
}

const ID_START = /[A-Za-z_]/;
const ID_PART = /[A-Za-z0-9_]/;

// ---------------------------------------------------------------------------
// Cursor primitives
// ---------------------------------------------------------------------------

function atEnd(session: ParserSession): boolean {
  return session.cursor >= session.source.length;
}

/** Next character without advancing; '' at end of source. */
function peek(session: ParserSession): string {
  return atEnd(session) ? '' : session.source[session.cursor];
}

/** Next character, advancing the cursor; '' at end of source. */
function consume(session: ParserSession): string {
  if (atEnd(session)) {
    return '';
  }
  return session.source[session.cursor++];
}

function unconsume(session: ParserSession): void {
  if (session.cursor > 0) {
    session.cursor--;
  }
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export class NotationParser {
  strict: boolean;

  constructor(private readonly target: NotationTarget, options: ParseOptions = {}) {
    this.strict = options.strict ?? false;
  }

  /** Parse a whole expression and return the translated output. */
  parse(expression: string, options: ParseOptions = {}): string {
    const session = this.createSession(expression, 0, options);
    while (!atEnd(session)) {
      const fragment = this.parseSubstring(session);
      session.fragments.push(fragment);
      session.output += fragment.text;
    }
    return this.target.translate(session.output, session.fragments);
  }

  /**
   * Parse the single call whose `$` sits at `offset` and return its
   * translated rendering together with the offset just past its `)`.
   */
  renderCallAt(source: string, offset: number, options: ParseOptions = {}): { text: string; end: number } {
    const session = this.createSession(source, offset, options);
    if (consume(session) !== '$') {
      throw this.error(session, 'syntax', "expected '$' call");
    }
    const fragment: RenderedFragment = { kind: 'call', text: this.parseCall(session) };
    return { text: this.target.translate(fragment.text, [fragment]), end: session.cursor };
  }

  private createSession(source: string, cursor: number, options: ParseOptions): ParserSession {
    return {
      source,
      strict: options.strict ?? this.strict,
      escape: options.escape ?? (literal => literal),
      cursor,
      output: '',
      fragments: [],
    };
  }

  private error(session: ParserSession, kind: ParseErrorKind, message: string): NotationParseError {
    return new NotationParseError(message, kind, session.source, session.cursor);
  }

  private parseSubstring(session: ParserSession): RenderedFragment {
    if (peek(session) === '$') {
      consume(session);
      return { kind: 'call', text: this.parseCall(session) };
    }
    return { kind: 'literal', text: this.parseLiteralRun(session) };
  }

  /** Characters up to the next unescaped '$'. Only `\$` is an escape here. */
  private parseLiteralRun(session: ParserSession): string {
    let text = '';
    while (!atEnd(session)) {
      const ch = consume(session);
      if (ch === '$') {
        unconsume(session);
        break;
      }
      if (ch === '\\' && peek(session) === '$') {
        text += consume(session);
        continue;
      }
      text += ch;
    }
    return session.escape(text);
  }

  private parseIdentifier(session: ParserSession): string {
    let name = '';
    let legal = ID_START;
    while (!atEnd(session)) {
      const ch = consume(session);
      if (!legal.test(ch)) {
        unconsume(session);
        break;
      }
      name += ch;
      legal = ID_PART;
    }
    return name;
  }

  private parseCall(session: ParserSession): string {
    const name = this.parseIdentifier(session);
    if (!name) {
      throw this.error(session, 'syntax', "missing call identifier after '$'");
    }

    const known = this.target.hasRenderer(name);
    if (!known && session.strict) {
      throw this.error(session, 'unknown-group', `${this.target.representation} call '${name}' not found`);
    }

    if (consume(session) !== '(') {
      throw this.error(session, 'syntax', "missing left parenthesis '('");
    }
    const parsed = this.parseArgs(session);
    if (consume(session) !== ')') {
      throw this.error(session, 'syntax', "missing right parenthesis ')'");
    }
    const args = parsed.map(arg => arg.key);
    const text = parsed.map(arg => arg.text);

    if (!known) {
      return text.join(' ');
    }

    try {
      return this.target.invoke(name, args, text);
    } catch (err) {
      if (err instanceof UnknownGroupError || err instanceof UnknownKeyError) {
        if (!session.strict) {
          return text.join(' ');
        }
        const kind: ParseErrorKind = err instanceof UnknownGroupError ? 'unknown-group' : 'unknown-key';
        throw this.error(session, kind, `${name}(${args.join(',')}): ${err.message}`);
      }
      if (err instanceof InvalidArgumentTypeError) {
        throw this.error(session, 'invalid-argument', err.message);
      }
      throw err;
    }
  }

  private parseArgs(session: ParserSession): ParsedArgument[] {
    const args: ParsedArgument[] = [];
    while (!atEnd(session)) {
      const arg = this.parseArg(session);
      if (arg.key.length > 0) {
        args.push(arg);
      }
      if (peek(session) !== ',') {
        break;
      }
      consume(session);
    }
    return args;
  }

  private parseArg(session: ParserSession): ParsedArgument {
    const arg: ParsedArgument = { key: '', text: '' };
    const literal = (ch: string) => {
      arg.key += ch;
      arg.text += session.escape(ch);
    };
    while (!atEnd(session)) {
      const ch = consume(session);
      if (ch === '\\') {
        literal(consume(session));
      } else if (ch === '$') {
        const rendered = this.parseCall(session);
        arg.key += rendered;
        arg.text += rendered;
      } else if (ch === ',' || ch === ')') {
        unconsume(session);
        break;
      } else {
        literal(ch);
      }
    }
    return arg;
  }
}
