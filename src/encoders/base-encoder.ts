// src/encoders/base-encoder.ts - shared renderer registry and lookups for one representation

import type { EncodingTables, Mapping } from '../encoding-tables';
import {
  InvalidArgumentTypeError,
  InvalidKeyError,
  TableNotFoundError,
  UnknownGroupError,
  UnknownKeyError,
} from '../errors';
import { NotationParser } from '../notation-parser';
import type { NotationTarget, ParseOptions, RenderedFragment } from '../notation-parser';
import type { Representation } from '../representation';

/**
 * Turns the parsed arguments of one `$group(...)` call into encoded text.
 * `args` are lookup keys; `text` holds the same arguments as output text,
 * which differs only when the parse escapes literal text.
 */
export type Renderer = (groupId: string, args: readonly string[], text: readonly string[]) => string;

/** Exact argument count, or an inclusive range. */
export type Arity = number | { min: number; max: number };

export interface RendererOptions {
  /** Defaults to a single-key table lookup on the trimmed argument. */
  render?: Renderer;
  /** Installed under this encoder's representation with the group id as table id. */
  mapping?: Mapping;
  /** Defaults to 1. */
  arity?: Arity;
}

export interface RendererRegistration {
  render: Renderer;
  description: string;
  arity: Arity;
}

export interface EncoderOptions {
  strict?: boolean;
}

function arityAccepts(arity: Arity, count: number): boolean {
  if (typeof arity === 'number') {
    return count === arity;
  }
  return count >= arity.min && count <= arity.max;
}

function describeArity(arity: Arity): string {
  if (typeof arity === 'number') {
    return arity === 1 ? '1 argument' : `${arity} arguments`;
  }
  return `${arity.min} to ${arity.max} arguments`;
}

export abstract class BaseEncoder implements NotationTarget {
  private readonly renderers = new Map<string, RendererRegistration>();
  private readonly parser: NotationParser;

  constructor(
    public readonly representation: Representation,
    protected readonly tables: EncodingTables,
    options: EncoderOptions = {}
  ) {
    this.parser = new NotationParser(this, { strict: options.strict ?? false });
  }

  get strict(): boolean {
    return this.parser.strict;
  }

  set strict(value: boolean) {
    this.parser.strict = value;
  }

  toString(): string {
    return this.representation;
  }

  /** Parse an expression into this representation. */
  parse(expression: string, options?: ParseOptions): string {
    return this.parser.parse(expression, options);
  }

  renderCallAt(source: string, offset: number, options?: ParseOptions): { text: string; end: number } {
    return this.parser.renderCallAt(source, offset, options);
  }

  /** Final representation-specific pass over the assembled output of one parse. */
  abstract translate(rendered: string, fragments?: readonly RenderedFragment[]): string;

  // -------------------------------------------------------------------------
  // Renderer registry
  // -------------------------------------------------------------------------

  registerRenderer(groupId: string, description: string, options: RendererOptions = {}): void {
    if (options.mapping !== undefined) {
      this.tables.installTable(this.representation, groupId, description, options.mapping);
    }
    this.renderers.set(groupId, {
      render: options.render ?? ((gid, args) => this.defaultLookup(gid, args[0].trim())),
      description,
      arity: options.arity ?? 1,
    });
  }

  hasRenderer(groupId: string): boolean {
    return this.renderers.has(groupId);
  }

  getRenderer(groupId: string): RendererRegistration | undefined {
    return this.renderers.get(groupId);
  }

  listGroups(): string[] {
    return [...this.renderers.keys()];
  }

  invoke(groupId: string, args: readonly string[], text: readonly string[] = args): string {
    const registration = this.renderers.get(groupId);
    if (!registration) {
      throw new UnknownGroupError(`no ${this.representation} renderer '${groupId}'`, groupId);
    }
    if (!arityAccepts(registration.arity, args.length)) {
      throw new InvalidArgumentTypeError(
        `${this.representation} renderer '${groupId}' takes ${describeArity(registration.arity)}, got ${args.length}`,
        groupId
      );
    }
    return registration.render(groupId, args, text);
  }

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  /** Single-key lookup in this representation's table `groupId`. */
  defaultLookup(groupId: string, key: string): string {
    return this.lookupIn(this.representation, groupId, key);
  }

  /** Look up every code point of `keys` independently and concatenate. */
  concatLookup(groupId: string, keys: string): string {
    let code = '';
    for (const key of keys) {
      code += this.defaultLookup(groupId, key);
    }
    return code;
  }

  /** Registry lookup with registry errors restated as renderer errors. */
  protected lookupIn(representation: Representation, tableId: string, key: string): string {
    try {
      return this.tables.getMapped(representation, tableId, key);
    } catch (err) {
      if (err instanceof TableNotFoundError) {
        throw new UnknownGroupError(`no ${representation} table '${tableId}'`, tableId);
      }
      if (err instanceof InvalidKeyError) {
        throw new UnknownKeyError(`${representation} encoding table '${tableId}' has no key '${key}'`, tableId, key);
      }
      throw err;
    }
  }

  // -------------------------------------------------------------------------
  // Tables and marks
  // -------------------------------------------------------------------------

  installTable(tableId: string, description: string, mapping: Mapping): void {
    this.tables.installTable(this.representation, tableId, description, mapping);
  }

  hasTable(tableId: string): boolean {
    return this.tables.hasTable(this.representation, tableId);
  }

  listTables(): string[] {
    return this.tables.listTables(this.representation);
  }

  get nonspacingMarks(): readonly string[] {
    return this.tables.getNonspacingMarks(this.representation);
  }

  setNonspacingMarks(marks: Iterable<string>): void {
    this.tables.setNonspacingMarks(this.representation, marks);
  }
}
