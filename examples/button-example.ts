/**
 * Button component usage example
 */

import { createTailColors, loadPalette, clean, cleanPrefix, get, darker, invert } from '../src/index.js';
import type { TailColors } from '../src/index.js';

const SIZES = ['xs', 'sm', 'md', 'lg', 'xl'];

/**
 * Builds the final class string for a button from caller-supplied classes
 */
function buttonClasses(tc: TailColors, classes: string): string {
  const themed = tc.theme(classes);

  const size = get(themed, SIZES, 'md');
  const { color, tint } = tc.mainColor(themed, 'slate', 500);
  const bg = tc.getColor(themed, 'bg', color ?? 'slate', tint ?? 500);
  const text = tc.getColor(themed, 'text', color ?? 'slate', invert(tint ?? 500));
  const hover = `hover:${darker(bg, 1)}`;

  const rest = cleanPrefix(tc.cleanColors(clean(themed, [...SIZES, 'btn'])), 'bg text');

  return [`btn-${size}`, bg, text, hover, rest].filter(part => part.length > 0).join(' ');
}

async function main() {
  const tc = createTailColors(await loadPalette());

  console.log(buttonClasses(tc, 'btn primary lg rounded'));
  console.log(buttonClasses(tc, 'btn bg-success-700 shadow'));
  console.log(buttonClasses(tc, 'btn sm text-error-200'));
}

main().catch(error => {
  console.error('Error:', error);
  process.exit(1);
});
