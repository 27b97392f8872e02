// src/physics-symbols.ts - the `phy` group of physics constants
//
// Unicode has no subscript B, so k_B falls back to `kB` there.

import type { NotationContext } from './context';
import type { BaseEncoder } from './encoders/base-encoder';
import { buildSymbolMapping, installSymbolGroup } from './symbol-groups';
import type { SymbolGroup } from './symbol-groups';

export const PHYSICS_GROUP = 'phy';

export const PHYSICS_SYMBOL_EXPRESSIONS: ReadonlyMap<string, string> = new Map([
  ['c', 'c'],                          // speed of light
  ['G', 'G'],                          // gravitational constant
  ['k_B', 'k$sub(B)'],                 // Boltzmann constant
  ['e_0', '$greek(epsilon)$sub(0)'],   // permittivity of vacuum
  ['h', '\u210e'],                     // Planck constant
  ['h-bar', '\u210f'],                 // reduced Planck constant
  ['l_P', 'l$sub(p)'],                 // Planck length
  ['t_P', 't$sub(p)'],                 // Planck time
  ['m_P', 'm$sub(p)'],                 // Planck mass
  ['q_P', 'q$sub(p)'],                 // Planck charge
  ['T_P', 'T$sub(p)'],                 // Planck temperature
  ['alpha', '$greek(alpha)'],          // fine-structure constant
]);

const PHYSICS_SYMBOLS: SymbolGroup = {
  groupId: PHYSICS_GROUP,
  description: 'physics symbols',
  expressions: PHYSICS_SYMBOL_EXPRESSIONS,
  overrides: {
    latex: new Map([['h', 'h'], ['h-bar', '\\hbar']]),
    plain: new Map([['h', 'h'], ['h-bar', 'h-bar']]),
  },
};

export function buildPhysicsMapping(encoder: BaseEncoder): Map<string, string> {
  return buildSymbolMapping(encoder, PHYSICS_SYMBOLS);
}

/** Register `$phy(...)` in every encoder of the context. Safe to call twice. */
export function installPhysicsSymbols(context: NotationContext): void {
  installSymbolGroup(context, PHYSICS_SYMBOLS);
}
