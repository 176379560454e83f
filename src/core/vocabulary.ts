/**
 * Color vocabulary and tint scale
 *
 * A Palette is built once at startup and passed explicitly to every
 * operation that needs to recognize color names.
 */

/**
 * Ordered tint scale. One index step is one shade darker.
 */
export const TINT_SCALE = [50, 100, 200, 300, 400, 500, 600, 700, 800, 900, 950] as const;

export type Tint = (typeof TINT_SCALE)[number];

/**
 * Tailwind default palette names
 */
export const BUILT_IN_COLORS: readonly string[] = [
  'slate', 'gray', 'zinc', 'neutral', 'stone',
  'red', 'orange', 'amber', 'yellow', 'lime', 'green', 'emerald', 'teal',
  'cyan', 'sky', 'blue', 'indigo', 'violet', 'purple', 'fuchsia', 'pink', 'rose',
  'black', 'white',
];

export interface PaletteOptions {
  /** Extra color names on top of the built-ins (may contain hyphens) */
  colors?: readonly string[];

  /** Theme alias → color name (e.g. primary → purple) */
  themedColors?: Readonly<Record<string, string>>;
}

export interface Palette {
  readonly colors: ReadonlySet<string>;
  readonly aliases: ReadonlyMap<string, string>;
}

/**
 * Build an immutable palette from built-ins plus configured extensions
 */
export function createPalette(options: PaletteOptions = {}): Palette {
  const colors = new Set<string>(BUILT_IN_COLORS);
  for (const color of options.colors ?? []) {
    colors.add(color);
  }

  const aliases = new Map<string, string>(Object.entries(options.themedColors ?? {}));

  return Object.freeze({
    colors,
    aliases,
  });
}

export function isColor(palette: Palette, name: string): boolean {
  return palette.colors.has(name);
}

export function isTint(value: unknown): value is Tint {
  return typeof value === 'number' && TINT_SCALE.some(tint => tint === value);
}

/**
 * Parse a class segment as a tint.
 * Only plain decimal digits count, so "05" or "5e2" are rejected.
 *
 * @example
 * parseTint('500') // => 500
 * parseTint('404') // => null
 * parseTint('xl')  // => null
 */
export function parseTint(segment: string): Tint | null {
  if (!/^[1-9]\d*$/.test(segment)) {
    return null;
  }
  const value = Number(segment);
  return isTint(value) ? value : null;
}
