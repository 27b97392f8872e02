import type { BaseEncoder } from './encoders/base-encoder';

/**
 * Format a number that may be infinite. Finite values (and NaN) go through
 * `format`; infinities are written with the encoder's infinity symbol.
 *
 * @example
 * formatNumber(Infinity, unicode)          // '∞'
 * formatNumber(-Infinity, plain)           // '-inf'
 * formatNumber(0.5, unicode, n => n.toFixed(2)) // '0.50'
 */
export function formatNumber(
  value: number,
  encoder: BaseEncoder,
  format: (value: number) => string = String
): string {
  if (value === Infinity) {
    return encoder.parse('$math(inf)');
  }
  if (value === -Infinity) {
    return encoder.parse('$math(-)$math(inf)');
  }
  return format(value);
}
