// src/standard-model-symbols.ts - the `sm` group: quarks, color charges, leptons, bosons, hadrons
//
// Antiparticles carry a combining bar (`p$math(bar)`), which LaTeX moves in
// front of the symbol it decorates: `\bar{p}`.

import type { NotationContext } from './context';
import type { BaseEncoder } from './encoders/base-encoder';
import { buildSymbolMapping, installSymbolGroup } from './symbol-groups';
import type { SymbolGroup } from './symbol-groups';
import standardModelData from './tables/standard-model.json';

export const STANDARD_MODEL_GROUP = 'sm';

export const STANDARD_MODEL_SYMBOL_EXPRESSIONS: ReadonlyMap<string, string> = new Map(
  Object.entries(standardModelData.expressions)
);

const STANDARD_MODEL_SYMBOLS: SymbolGroup = {
  groupId: STANDARD_MODEL_GROUP,
  description: standardModelData.description,
  expressions: STANDARD_MODEL_SYMBOL_EXPRESSIONS,
};

export function buildStandardModelMapping(encoder: BaseEncoder): Map<string, string> {
  return buildSymbolMapping(encoder, STANDARD_MODEL_SYMBOLS);
}

/** Register `$sm(...)` in every encoder of the context. Safe to call twice. */
export function installStandardModelSymbols(context: NotationContext): void {
  installSymbolGroup(context, STANDARD_MODEL_SYMBOLS);
}
