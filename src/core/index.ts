/**
 * Core module - entry point
 * Pure class-string operations over an explicit palette
 */

// Types
export type { Tint, Palette, PaletteOptions } from './vocabulary.js';
export type { ClassList, ClassInput } from './tokenizer.js';
export type { ExplodedClass } from './classifier.js';
export type { MainColor } from './resolver.js';
export type { ThemeMode, ThemeOptions } from './themer.js';
export type { TailColorsErrorCode } from './errors.js';

// Vocabulary
export {
  TINT_SCALE,
  BUILT_IN_COLORS,
  createPalette,
  isColor,
  isTint,
  parseTint,
} from './vocabulary.js';

// Tokenizer / classifier
export { tokenize, join } from './tokenizer.js';
export { explode, compose, isColorClass } from './classifier.js';

// Resolver
export { get, getColor, mainColor, getPrefix, has } from './resolver.js';

// Tint arithmetic
export { INVERTED_TINTS, step, darker, lighter, invert, replaceTint } from './tints.js';

// Cleaner / themer
export { clean, cleanPrefix, cleanColors } from './cleaner.js';
export { theme } from './themer.js';

// Errors
export { TailColorsError } from './errors.js';
