/**
 * Theme alias substitution (primary → purple, ...)
 */

import { tokenize, join } from './tokenizer.js';
import type { ClassInput } from './tokenizer.js';
import type { Palette } from './vocabulary.js';

/**
 * - `token`: replace aliases only where no letter or digit touches them
 *   (`md:primary`, `bg-primary/50`), in one pass, longest alias first.
 *   `bored` never becomes `bopurple`.
 * - `substring`: raw text replacement in alias insertion order. Results
 *   depend on that order when aliases overlap.
 */
export type ThemeMode = 'token' | 'substring';

export interface ThemeOptions {
  mode?: ThemeMode;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function themeByToken(input: string, aliases: ReadonlyMap<string, string>): string {
  const names = [...aliases.keys()]
    .filter(name => name.length > 0)
    .sort((a, b) => b.length - a.length || a.localeCompare(b));
  if (names.length === 0) {
    return input;
  }

  const pattern = new RegExp(`(^|[^a-zA-Z0-9])(${names.map(escapeRegExp).join('|')})(?=$|[^a-zA-Z0-9])`, 'g');
  return input.replace(pattern, (_match, lead: string, alias: string) => `${lead}${aliases.get(alias) ?? alias}`);
}

function themeBySubstring(input: string, aliases: ReadonlyMap<string, string>): string {
  let output = input;
  for (const [alias, color] of aliases) {
    if (alias.length > 0) {
      output = output.split(alias).join(color);
    }
  }
  return output;
}

/**
 * Substitute theme aliases with their configured color names
 *
 * @example
 * theme(palette, 'bg-primary-500 text-error') // => 'bg-purple-500 text-red'
 */
export function theme(palette: Palette, classes: ClassInput, options: ThemeOptions = {}): string {
  const input = typeof classes === 'string' ? classes : join(tokenize(classes));

  if (options.mode === 'substring') {
    return themeBySubstring(input, palette.aliases);
  }
  return themeByToken(input, palette.aliases);
}
