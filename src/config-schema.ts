/**
 * Project configuration schemas for tail colors
 * Defines TypeScript interfaces and JSON Schema for validation
 */

/**
 * Main project configuration
 */
export interface TailColorsConfig {
  /** Extra color names beyond the Tailwind defaults (e.g. 'silver-hawk') */
  colors?: string[];

  /** Theme alias → color name (e.g. primary → purple) */
  themedColors?: Record<string, string>;
}

/**
 * Lowercase words joined by single hyphens, every word starting with a
 * letter. Rules out names that end in something that parses as a tint.
 */
const NAME_PATTERN = '^[a-z][a-z0-9]*(-[a-z][a-z0-9]*)*$';

/**
 * JSON Schema for configuration validation using AJV
 */
export const tailColorsConfigSchema = {
  type: 'object',
  properties: {
    colors: {
      type: 'array',
      items: { type: 'string', pattern: NAME_PATTERN },
      uniqueItems: true
    },
    themedColors: {
      type: 'object',
      propertyNames: { type: 'string', pattern: NAME_PATTERN },
      additionalProperties: { type: 'string', pattern: NAME_PATTERN }
    }
  },
  additionalProperties: false
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: TailColorsConfig = {
  colors: ['hawthorne', 'burgandy', 'silver-hawk'],
  themedColors: {
    primary: 'purple',
    secondary: 'blue',
    accent: 'yellow',
    info: 'sky',
    success: 'green',
    warning: 'orange',
    error: 'red',
    base: 'slate'
  }
};
