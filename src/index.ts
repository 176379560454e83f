/**
 * tail-colors - read and rewrite Tailwind color classes
 *
 * Components encode intent (color, tint, size, variant) in one class string;
 * this library extracts, overrides, recolors and cleans those classes.
 */

export * from './core/index.js';

export { createTailColors } from './engine.js';
export type { TailColors } from './engine.js';

export {
  loadTailColorsConfig,
  loadTailColorsConfigOrDefault,
  loadPalette,
  validateAndNormalizeConfig,
  findUnknownAliasTargets,
  clearConfigCache,
  formatValidationErrors,
  mergeConfigs,
  ConfigValidationError,
} from './config-loader.js';
export type { AliasWarning } from './config-loader.js';

export { DEFAULT_CONFIG, tailColorsConfigSchema } from './config-schema.js';
export type { TailColorsConfig } from './config-schema.js';
