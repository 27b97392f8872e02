// src/symbol-groups.ts - lookup groups whose symbols are defined once as notation
//
// Each symbol is an expression parsed by every encoder at install time, so a
// group renders in plain text, Unicode, HTML or LaTeX without four
// hand-written tables. Parsing is lenient: a piece an encoder has no glyph
// for falls back to its text.

import type { NotationContext } from './context';
import type { BaseEncoder } from './encoders/base-encoder';
import type { Representation } from './representation';

export interface SymbolGroup {
  groupId: string;
  description: string;
  /** Symbol key to notation expression. */
  expressions: ReadonlyMap<string, string>;
  /** Symbols a representation spells differently from the parsed expression. */
  overrides?: Partial<Record<Representation, ReadonlyMap<string, string>>>;
}

export function buildSymbolMapping(encoder: BaseEncoder, group: SymbolGroup): Map<string, string> {
  const overrides = group.overrides?.[encoder.representation];
  const mapping = new Map<string, string>();
  for (const [key, expression] of group.expressions) {
    mapping.set(key, overrides?.get(key) ?? encoder.parse(expression, { strict: false }));
  }
  return mapping;
}

/** Register the group in every encoder of the context that does not have it yet. */
export function installSymbolGroup(context: NotationContext, group: SymbolGroup): void {
  for (const encoder of Object.values(context.encoders)) {
    if (encoder.hasRenderer(group.groupId)) {
      continue;
    }
    encoder.registerRenderer(group.groupId, group.description, { mapping: buildSymbolMapping(encoder, group) });
  }
}
