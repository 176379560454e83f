/**
 * Class lookup and color resolution
 *
 * All lookups are first-match-wins over the list order. Absence is never
 * an error: the caller's default (or null) comes back instead.
 */

import { explode, compose } from './classifier.js';
import { tokenize } from './tokenizer.js';
import type { ClassInput } from './tokenizer.js';
import type { Palette, Tint } from './vocabulary.js';

export interface MainColor {
  color: string | null;
  tint: Tint | null;
}

function firstWithPrefix(classes: readonly string[], prefix: string): string | undefined {
  return classes.find(token => token.startsWith(`${prefix}-`));
}

/**
 * Find a class by exact name, then by `name-` prefix; or, given a list of
 * candidates, the first class that is one of them.
 *
 * @example
 * get('thing rounded-xl something', 'rounded')           // => 'rounded-xl'
 * get('thing else', 'rounded', 'rounded-md')             // => 'rounded-md'
 * get('thing box else', ['circle', 'rounded', 'box'])    // => 'box'
 */
export function get(classes: ClassInput, lookup: string | readonly string[], fallback: string): string;
export function get(classes: ClassInput, lookup: string | readonly string[], fallback?: string | null): string | null;
export function get(classes: ClassInput, lookup: string | readonly string[], fallback: string | null = null): string | null {
  const list = tokenize(classes);

  if (typeof lookup === 'string') {
    if (list.includes(lookup)) {
      return lookup;
    }
    return firstWithPrefix(list, lookup) ?? fallback;
  }

  return list.find(token => lookup.includes(token)) ?? fallback;
}

/**
 * Find the first `prefix-color[-tint]` class whose remainder is a known
 * color with an optional scale tint. `bg-monster` and `bg-blue-404` do not
 * match.
 *
 * With a default color and tint, a missing class is synthesized as
 * `prefix-color-tint` and a matched class without a tint gets the default
 * tint appended.
 *
 * @example
 * getColor(palette, 'thing bg-blue-404 else', 'bg')           // => null
 * getColor(palette, 'thing something', 'text', 'blue', 600)   // => 'text-blue-600'
 * getColor(palette, 'p-2 text-red', 'text', 'blue', 600)      // => 'text-red-600'
 */
export function getColor(palette: Palette, classes: ClassInput, prefix: string, fallback?: string | null): string | null;
export function getColor(palette: Palette, classes: ClassInput, prefix: string, defaultColor: string, defaultTint: Tint): string;
export function getColor(
  palette: Palette,
  classes: ClassInput,
  prefix: string,
  fallback: string | null = null,
  defaultTint?: Tint
): string | null {
  const head = `${prefix}-`;
  let match: string | null = null;
  let matchTint: Tint | null = null;

  for (const token of tokenize(classes)) {
    if (!token.startsWith(head)) {
      continue;
    }
    const parts = explode(palette, token.slice(head.length));
    if (parts.color !== null && parts.prefix === null) {
      match = token;
      matchTint = parts.tint;
      break;
    }
  }

  if (defaultTint === undefined) {
    return match ?? fallback;
  }

  if (match === null) {
    return fallback === null ? null : compose({ prefix, color: fallback, tint: defaultTint });
  }
  return matchTint === null ? `${match}-${defaultTint}` : match;
}

/**
 * Find the ambient color of a class list, independent of any prefix:
 * a bare color name (paired with the default tint), else the first
 * `color-tint` class, else the defaults.
 *
 * @example
 * mainColor(palette, 'btn green lg', 'blue', 500)   // => { color: 'green', tint: 500 }
 * mainColor(palette, 'btn red-700 lg', 'blue', 500) // => { color: 'red', tint: 700 }
 */
export function mainColor(
  palette: Palette,
  classes: ClassInput,
  defaultColor: string | null = null,
  defaultTint: Tint | null = null
): MainColor {
  const list = tokenize(classes);

  const bare = list.find(token => palette.colors.has(token));
  if (bare !== undefined) {
    return { color: bare, tint: defaultTint };
  }

  for (const token of list) {
    const parts = explode(palette, token);
    if (parts.prefix === null && parts.color !== null && parts.tint !== null) {
      return { color: parts.color, tint: parts.tint };
    }
  }

  return { color: defaultColor, tint: defaultTint };
}

/**
 * Collect classes scoped under a prefix, with the prefix stripped.
 * Lets a component route a nested group of classes to a child element.
 *
 * @example
 * getPrefix('thing title-text-red-500 something', 'title') // => 'text-red-500'
 */
export function getPrefix(classes: ClassInput, prefix: string): string {
  const head = `${prefix}-`;
  return tokenize(classes)
    .filter(token => token.startsWith(head) && token.length > head.length)
    .map(token => token.slice(head.length))
    .join(' ');
}

/**
 * True when any class starts with str
 */
export function has(classes: ClassInput, str: string): boolean {
  return tokenize(classes).some(token => token.startsWith(str));
}
