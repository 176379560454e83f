/**
 * Tint arithmetic over the fixed scale
 *
 * Numeric forms work on a bare tint; string forms rewrite only the trailing
 * tint segment of a class token and leave everything before it untouched.
 */

import { TINT_SCALE, isTint, parseTint } from './vocabulary.js';
import type { Tint } from './vocabulary.js';
import { TailColorsError } from './errors.js';

/**
 * Readable text tint for a given background tint.
 * Light backgrounds get a mid-dark tint, dark backgrounds a near-white one.
 */
export const INVERTED_TINTS: Readonly<Record<Tint, Tint>> = {
  50: 500,
  100: 600,
  200: 600,
  300: 700,
  400: 700,
  500: 50,
  600: 50,
  700: 100,
  800: 100,
  900: 200,
  950: 200,
};

/**
 * Move a tint n steps along the scale, clamped to its ends
 *
 * @throws {TailColorsError} INVALID_TINT if the tint is not on the scale,
 *   INVALID_STEP if n is not an integer
 */
export function step(tint: number, n: number): Tint {
  if (!isTint(tint)) {
    throw new TailColorsError(`Tint ${tint} is not on the tint scale`, 'INVALID_TINT', { tint });
  }
  if (!Number.isInteger(n)) {
    throw new TailColorsError(`Step count must be an integer, got ${n}`, 'INVALID_STEP', { n });
  }

  const index = TINT_SCALE.indexOf(tint) + n;
  const clamped = Math.min(Math.max(index, 0), TINT_SCALE.length - 1);
  return TINT_SCALE[clamped];
}

/**
 * Split a token into everything before its tint and the tint itself.
 * Returns null when the token does not end in a scale tint.
 */
function splitTrailingTint(token: string): { head: string; tint: Tint } | null {
  const dash = token.lastIndexOf('-');
  if (dash <= 0) {
    return null;
  }
  const tint = parseTint(token.slice(dash + 1));
  if (tint === null) {
    return null;
  }
  return { head: token.slice(0, dash + 1), tint };
}

/**
 * Apply a tint transform to the trailing tint of a token.
 * Tokens without a trailing tint are returned unchanged.
 *
 * @example
 * replaceTint('bg-silver-hawk-300', t => step(t, 2)) // => 'bg-silver-hawk-500'
 * replaceTint('rounded-xl', t => step(t, 2))         // => 'rounded-xl'
 */
export function replaceTint(token: string, transform: (tint: Tint) => Tint): string {
  const parts = splitTrailingTint(token);
  if (!parts) {
    return token;
  }
  return `${parts.head}${transform(parts.tint)}`;
}

export function darker(tint: number, n?: number): Tint;
export function darker(token: string, n?: number): string;
export function darker(value: number | string, n = 1): Tint | string {
  if (typeof value === 'string') {
    return replaceTint(value, tint => step(tint, n));
  }
  return step(value, n);
}

export function lighter(tint: number, n?: number): Tint;
export function lighter(token: string, n?: number): string;
export function lighter(value: number | string, n = 1): Tint | string {
  if (typeof value === 'string') {
    return replaceTint(value, tint => step(tint, -n));
  }
  return step(value, -n);
}

/**
 * Contrasting tint for legibility. Off-scale values and null pass through.
 *
 * @example
 * invert(200)           // => 600
 * invert(null)          // => null
 * invert('bg-blue-600') // => 'bg-blue-50'
 */
export function invert(tint: Tint): Tint;
export function invert(tint: number | null): number | null;
export function invert(token: string): string;
export function invert(value: number | string | null): number | string | null {
  if (typeof value === 'string') {
    return replaceTint(value, tint => INVERTED_TINTS[tint]);
  }
  if (isTint(value)) {
    return INVERTED_TINTS[value];
  }
  return value;
}
