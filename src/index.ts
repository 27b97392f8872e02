export { REPRESENTATIONS, isRepresentation, parseRepresentation } from './representation';
export type { Representation } from './representation';
export {
  InvalidArgumentTypeError,
  InvalidKeyError,
  NotationParseError,
  TableNotFoundError,
  UnknownGroupError,
  UnknownKeyError,
} from './errors';
export type { ParseErrorKind } from './errors';
export { EncodingTables } from './encoding-tables';
export type { EncodingTable, Mapping } from './encoding-tables';
export { NotationParser } from './notation-parser';
export type { NotationTarget, ParseOptions, RenderedFragment } from './notation-parser';
export { BaseEncoder } from './encoders/base-encoder';
export type { Arity, EncoderOptions, Renderer, RendererOptions, RendererRegistration } from './encoders/base-encoder';
export { PlainEncoder } from './encoders/plain-encoder';
export { UnicodeEncoder, installUnicodeTables } from './encoders/unicode-encoder';
export { HtmlEncoder } from './encoders/html-encoder';
export { LatexEncoder } from './encoders/latex-encoder';
export { createNotationContext } from './context';
export type { NotationContext, NotationContextOptions } from './context';
export { NotationSet, evaluateNotation } from './notation-set';
export { formatNumber } from './number-format';
export { formatLookupTable, asciiEscape } from './table-format';
export type { LookupTableFormatOptions } from './table-format';
export { buildSymbolMapping, installSymbolGroup } from './symbol-groups';
export type { SymbolGroup } from './symbol-groups';
export { PHYSICS_GROUP, PHYSICS_SYMBOL_EXPRESSIONS, buildPhysicsMapping, installPhysicsSymbols } from './physics-symbols';
export {
  STANDARD_MODEL_GROUP,
  STANDARD_MODEL_SYMBOL_EXPRESSIONS,
  buildStandardModelMapping,
  installStandardModelSymbols,
} from './standard-model-symbols';
export { notationMarkdownPlugin } from './preview/notation-markdown-plugin';
export type { NotationPluginOptions } from './preview/notation-markdown-plugin';
