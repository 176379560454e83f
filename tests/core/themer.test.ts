import { describe, it, expect } from 'vitest';
import { theme } from '../../src/core/themer.js';
import { createPalette } from '../../src/core/vocabulary.js';

describe('themer', () => {
  const palette = createPalette({
    themedColors: { primary: 'purple', error: 'red' },
  });

  describe('token mode', () => {
    it('should replace aliases inside classes', () => {
      expect(theme(palette, 'bg-primary-500 text-error')).toBe('bg-purple-500 text-red');
    });

    it('should replace bare aliases', () => {
      expect(theme(palette, 'btn primary')).toBe('btn purple');
    });

    it('should keep surrounding whitespace', () => {
      expect(theme(palette, '  bg-primary   x')).toBe('  bg-purple   x');
    });

    it('should join list input', () => {
      expect(theme(palette, ['bg-primary', 'p-2'])).toBe('bg-purple p-2');
    });

    it('should replace aliases next to variant and opacity separators', () => {
      expect(theme(palette, 'bg-primary/50')).toBe('bg-purple/50');
      expect(theme(palette, 'md:primary')).toBe('md:purple');
      expect(theme(palette, 'hover:bg-error-600 md:text-primary/75')).toBe('hover:bg-red-600 md:text-purple/75');
    });

    it('should not replace inside other words', () => {
      const reds = createPalette({ themedColors: { red: 'rose' } });
      expect(theme(reds, 'bored text-red-500')).toBe('bored text-rose-500');
      expect(theme(reds, 'md:bored red2')).toBe('md:bored red2');
    });

    it('should prefer the longest overlapping alias', () => {
      const brands = createPalette({ themedColors: { brand: 'blue', 'brand-alt': 'pink' } });
      expect(theme(brands, 'bg-brand-alt-500 text-brand')).toBe('bg-pink-500 text-blue');
    });

    it('should not chain substitutions', () => {
      const chained = createPalette({ themedColors: { primary: 'accent', accent: 'yellow' } });
      expect(theme(chained, 'bg-primary')).toBe('bg-accent');
    });

    it('should return the input when there are no aliases', () => {
      expect(theme(createPalette(), 'bg-primary')).toBe('bg-primary');
    });
  });

  describe('substring mode', () => {
    it('should replace raw substrings', () => {
      const reds = createPalette({ themedColors: { red: 'rose' } });
      expect(theme(reds, 'bored text-red-500', { mode: 'substring' })).toBe('borose text-rose-500');
    });

    it('should apply aliases in insertion order', () => {
      const brands = createPalette({ themedColors: { brand: 'blue', 'brand-alt': 'pink' } });
      expect(theme(brands, 'bg-brand-alt-500 text-brand', { mode: 'substring' }))
        .toBe('bg-blue-alt-500 text-blue');

      const chained = createPalette({ themedColors: { primary: 'accent', accent: 'yellow' } });
      expect(theme(chained, 'bg-primary', { mode: 'substring' })).toBe('bg-yellow');
    });
  });
});
