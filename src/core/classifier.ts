/**
 * Color class classification
 *
 * Tokens look like `[prefix-]color[-tint]`, but hyphens also occur inside
 * prefixes (`ring-offset`) and configured color names (`silver-hawk`), so
 * a fixed-arity split is not enough. `explode` peels off a trailing tint,
 * then searches prefix/color split points for a known color.
 */

import { isColor, parseTint } from './vocabulary.js';
import type { Palette, Tint } from './vocabulary.js';

export interface ExplodedClass {
  prefix: string | null;
  color: string | null;
  tint: Tint | null;
}

const NOT_A_COLOR: ExplodedClass = { prefix: null, color: null, tint: null };

/**
 * Decompose a class token into prefix, color and tint
 *
 * @example
 * explode(palette, 'text-red-400')          // => { prefix: 'text', color: 'red', tint: 400 }
 * explode(palette, 'bg-blue')               // => { prefix: 'bg', color: 'blue', tint: null }
 * explode(palette, 'ring-offset-silver-hawk-200')
 * // => { prefix: 'ring-offset', color: 'silver-hawk', tint: 200 }
 * explode(palette, 'woof-500')              // => { prefix: null, color: null, tint: null }
 */
export function explode(palette: Palette, token: string): ExplodedClass {
  const segments = token.split('-');
  if (segments.some(segment => segment.length === 0)) {
    return { ...NOT_A_COLOR };
  }

  let tint: Tint | null = null;
  if (segments.length > 1) {
    tint = parseTint(segments[segments.length - 1]);
    if (tint !== null) {
      segments.pop();
    }
  }

  // Shortest prefix first, so the longest color name wins
  for (let split = 0; split < segments.length; split++) {
    const color = segments.slice(split).join('-');
    if (isColor(palette, color)) {
      return {
        prefix: split === 0 ? null : segments.slice(0, split).join('-'),
        color,
        tint,
      };
    }
  }

  return { ...NOT_A_COLOR };
}

/**
 * Inverse of explode: build a token from its parts
 *
 * @example
 * compose({ prefix: 'bg', color: 'blue', tint: 600 }) // => 'bg-blue-600'
 * compose({ prefix: null, color: 'red', tint: null }) // => 'red'
 */
export function compose(parts: { prefix?: string | null; color: string; tint?: Tint | null }): string {
  return [parts.prefix, parts.color, parts.tint]
    .filter(part => part !== null && part !== undefined)
    .join('-');
}

export function isColorClass(palette: Palette, token: string): boolean {
  return explode(palette, token).color !== null;
}
