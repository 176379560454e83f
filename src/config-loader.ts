/**
 * Project configuration loader
 * Uses cosmiconfig to search for configuration in various formats
 */

import { cosmiconfig } from 'cosmiconfig';
import AjvModule from 'ajv';
import { compareTwoStrings } from 'string-similarity';
import { tailColorsConfigSchema, DEFAULT_CONFIG } from './config-schema.js';
import type { TailColorsConfig } from './config-schema.js';
import { BUILT_IN_COLORS, createPalette } from './core/index.js';
import type { Palette } from './core/index.js';

/**
 * Module name for cosmiconfig
 */
const MODULE_NAME = 'tailcolors';

/**
 * Configuration search locations (in priority order)
 */
const SEARCH_PLACES = [
  '.tailcolorsrc.json',
  '.tailcolorsrc.js',
  'tailcolors.config.js',
  '.config/tailcolors.json',
  'package.json'
];

/**
 * Minimum similarity for a "did you mean" suggestion
 */
const SUGGESTION_THRESHOLD = 0.5;

/**
 * AJV validator for configuration schema
 */
const ajv = new AjvModule.default({ allErrors: true });
const validateConfig = ajv.compile<TailColorsConfig>(tailColorsConfigSchema);

const explorer = cosmiconfig(MODULE_NAME, {
  searchPlaces: SEARCH_PLACES
});

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Theme alias pointing at a color the palette does not know
 */
export interface AliasWarning {
  alias: string;
  color: string;
  suggestion: string | null;
}

/**
 * Loads project configuration from filesystem
 *
 * @param searchFrom - Directory to start search from (defaults to current)
 * @returns Found configuration or null if not found
 * @throws {ConfigValidationError} If configuration is invalid
 */
export async function loadTailColorsConfig(
  searchFrom?: string
): Promise<TailColorsConfig | null> {
  try {
    const result = await explorer.search(searchFrom);

    if (!result || result.isEmpty) {
      return null;
    }

    return validateAndNormalizeConfig(result.config, result.filepath);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      throw error;
    }

    // Unreadable or unparseable file - behave as if there were none
    console.error('[config-loader] Configuration loading error:', error);
    return null;
  }
}

/**
 * Loads configuration layered over DEFAULT_CONFIG: configured colors are
 * added to the defaults and configured aliases override default ones
 */
export async function loadTailColorsConfigOrDefault(
  searchFrom?: string
): Promise<TailColorsConfig> {
  const config = await loadTailColorsConfig(searchFrom);
  return mergeConfigs(DEFAULT_CONFIG, config);
}

/**
 * Loads configuration and builds the palette every engine call uses
 */
export async function loadPalette(searchFrom?: string): Promise<Palette> {
  return createPalette(await loadTailColorsConfigOrDefault(searchFrom));
}

/**
 * Validates configuration using AJV and reports alias targets that are not
 * known colors
 *
 * @param config - Raw configuration from file
 * @param filepath - Path to configuration file (for errors)
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function validateAndNormalizeConfig(
  config: unknown,
  filepath: string
): TailColorsConfig {
  if (!validateConfig(config)) {
    const errors = (validateConfig.errors || []).map(err => ({
      path: err.instancePath || '(root)',
      message: err.message || 'Unknown error'
    }));

    throw new ConfigValidationError(
      `Invalid configuration in ${filepath}`,
      errors
    );
  }

  for (const warning of findUnknownAliasTargets(config)) {
    const hint = warning.suggestion ? ` (did you mean "${warning.suggestion}"?)` : '';
    console.warn(
      `[config-loader] ${filepath}: theme alias "${warning.alias}" maps to unknown color "${warning.color}"${hint}`
    );
  }

  return config;
}

/**
 * Lists theme aliases whose target is neither a built-in nor a configured
 * color, with the closest known name as a suggestion
 */
export function findUnknownAliasTargets(config: TailColorsConfig): AliasWarning[] {
  const known = [...BUILT_IN_COLORS, ...(config.colors ?? [])];
  const warnings: AliasWarning[] = [];

  for (const [alias, color] of Object.entries(config.themedColors ?? {})) {
    if (known.includes(color)) {
      continue;
    }

    let best: string | null = null;
    let bestScore = 0;
    for (const candidate of known) {
      const score = compareTwoStrings(color, candidate);
      if (score > bestScore) {
        bestScore = score;
        best = candidate;
      }
    }

    warnings.push({ alias, color, suggestion: bestScore >= SUGGESTION_THRESHOLD ? best : null });
  }

  return warnings;
}

/**
 * Clears cosmiconfig cache (useful for tests)
 */
export function clearConfigCache(): void {
  explorer.clearCaches();
}

/**
 * Formats validation errors for user output
 */
export function formatValidationErrors(error: ConfigValidationError): string {
  const errorList = error.errors
    .map(err => `  - ${err.path}: ${err.message}`)
    .join('\n');

  return `${error.message}\n\nErrors:\n${errorList}`;
}

/**
 * Merges two configs: colors are unioned, override aliases win
 */
export function mergeConfigs(
  base: TailColorsConfig,
  override: TailColorsConfig | null
): TailColorsConfig {
  if (!override) return base;

  return {
    colors: [...new Set([...(base.colors ?? []), ...(override.colors ?? [])])],
    themedColors: { ...base.themedColors, ...override.themedColors }
  };
}
