// src/errors.ts - error types shared by the registry, the encoders and the parser

import type { Representation } from './representation';

// ---------------------------------------------------------------------------
// Registry errors
// ---------------------------------------------------------------------------

/** The representation has no tables, or no table with the requested id. */
export class TableNotFoundError extends Error {
  constructor(
    public readonly representation: Representation,
    public readonly tableId: string,
    representationInstalled: boolean
  ) {
    super(
      representationInstalled
        ? `${representation} has no table '${tableId}'`
        : `no ${representation} tables installed (looking for '${tableId}')`
    );
    this.name = 'TableNotFoundError';
  }
}

/** The table exists but has no entry for the key. */
export class InvalidKeyError extends Error {
  constructor(
    public readonly representation: Representation,
    public readonly tableId: string,
    public readonly key: string
  ) {
    super(`${representation} table '${tableId}' has no key '${key}'`);
    this.name = 'InvalidKeyError';
  }
}

// ---------------------------------------------------------------------------
// Renderer errors
// ---------------------------------------------------------------------------

export class UnknownGroupError extends Error {
  constructor(message: string, public readonly groupId: string) {
    super(message);
    this.name = 'UnknownGroupError';
  }
}

export class UnknownKeyError extends Error {
  constructor(message: string, public readonly groupId: string, public readonly key: string) {
    super(message);
    this.name = 'UnknownKeyError';
  }
}

/** A renderer received arguments it cannot interpret. Never recovered from. */
export class InvalidArgumentTypeError extends Error {
  constructor(message: string, public readonly groupId: string) {
    super(message);
    this.name = 'InvalidArgumentTypeError';
  }
}

// ---------------------------------------------------------------------------
// Parse errors
// ---------------------------------------------------------------------------

export type ParseErrorKind = 'syntax' | 'unknown-group' | 'unknown-key' | 'invalid-argument';

/**
 * Failure while parsing a notation expression.
 *
 * `offset` is the 0-based cursor position when the parser gave up. For a
 * missing closing parenthesis at the end of the input it equals
 * `source.length`.
 */
export class NotationParseError extends Error {
  constructor(
    message: string,
    public readonly kind: ParseErrorKind,
    public readonly source: string,
    public readonly offset: number
  ) {
    super(message);
    this.name = 'NotationParseError';
  }

  /** Source line, a caret under the offending offset, then the message. */
  format(): string {
    return `${this.source}\n${' '.repeat(this.offset)}^\n${this.message}`;
  }
}
