/**
 * Class removal filters. Survivors keep their order.
 */

import { tokenize, join } from './tokenizer.js';
import type { ClassInput } from './tokenizer.js';
import type { Palette } from './vocabulary.js';

/**
 * Remove classes listed in removeList. Each entry removes at most one
 * occurrence, so duplicates must be listed as often as they appear.
 *
 * @example
 * clean('thing needle something', 'needle')               // => 'thing something'
 * clean('thing needle haystack something', 'needle haystack') // => 'thing something'
 * clean('a a b', 'a')                                      // => 'a b'
 */
export function clean(classes: ClassInput, removeList: ClassInput): string {
  const remaining = [...tokenize(classes)];

  for (const target of tokenize(removeList)) {
    const index = remaining.indexOf(target);
    if (index !== -1) {
      remaining.splice(index, 1);
    }
  }

  return join(remaining);
}

/**
 * Drop every class that starts with one of the prefixes followed by `-`
 *
 * @example
 * cleanPrefix('thing bg-green-200 text-red-600 something', 'bg text') // => 'thing something'
 */
export function cleanPrefix(classes: ClassInput, prefixes: ClassInput): string {
  const heads = tokenize(prefixes).map(prefix => `${prefix}-`);
  return join(tokenize(classes).filter(token => !heads.some(head => token.startsWith(head))));
}

/**
 * Drop every class that begins with a known color name.
 *
 * Matching is by prefix, so `blue`, `blue-500` and also `blueish` are
 * dropped while `bg-blue-500` stays.
 */
export function cleanColors(palette: Palette, classes: ClassInput): string {
  const colors = [...palette.colors];
  return join(tokenize(classes).filter(token => !colors.some(color => token.startsWith(color))));
}
