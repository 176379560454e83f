/**
 * Palette-bound API for component code
 *
 * Components build one engine at startup and call
 * `tc.getColor(classes, 'bg', 'blue', 500)` without threading the palette.
 */

import {
  explode,
  isColorClass,
  getColor,
  mainColor,
  cleanColors,
  theme,
} from './core/index.js';
import type {
  ClassInput,
  ExplodedClass,
  MainColor,
  Palette,
  ThemeOptions,
  Tint,
} from './core/index.js';

export interface TailColors {
  readonly palette: Palette;
  explode(token: string): ExplodedClass;
  isColorClass(token: string): boolean;
  getColor(classes: ClassInput, prefix: string, fallback?: string | null): string | null;
  getColor(classes: ClassInput, prefix: string, defaultColor: string, defaultTint: Tint): string;
  mainColor(classes: ClassInput, defaultColor?: string | null, defaultTint?: Tint | null): MainColor;
  cleanColors(classes: ClassInput): string;
  theme(classes: ClassInput, options?: ThemeOptions): string;
}

export function createTailColors(palette: Palette): TailColors {
  function boundGetColor(classes: ClassInput, prefix: string, fallback?: string | null): string | null;
  function boundGetColor(classes: ClassInput, prefix: string, defaultColor: string, defaultTint: Tint): string;
  function boundGetColor(
    classes: ClassInput,
    prefix: string,
    fallback: string | null = null,
    defaultTint?: Tint
  ): string | null {
    if (defaultTint === undefined || fallback === null) {
      return getColor(palette, classes, prefix, fallback);
    }
    return getColor(palette, classes, prefix, fallback, defaultTint);
  }

  return {
    palette,
    explode: token => explode(palette, token),
    isColorClass: token => isColorClass(palette, token),
    getColor: boundGetColor,
    mainColor: (classes, defaultColor, defaultTint) => mainColor(palette, classes, defaultColor, defaultTint),
    cleanColors: classes => cleanColors(palette, classes),
    theme: (classes, options) => theme(palette, classes, options),
  };
}
