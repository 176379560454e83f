import { describe, it, expect } from 'vitest';
import { explode, compose, isColorClass } from '../../src/core/classifier.js';
import { createPalette } from '../../src/core/vocabulary.js';

describe('classifier', () => {
  const palette = createPalette({ colors: ['hawthorne', 'burgandy', 'silver-hawk'] });

  describe('explode', () => {
    it('should split prefix, color and tint', () => {
      expect(explode(palette, 'text-red-400')).toEqual({ prefix: 'text', color: 'red', tint: 400 });
    });

    it('should allow a missing tint', () => {
      expect(explode(palette, 'bg-blue')).toEqual({ prefix: 'bg', color: 'blue', tint: null });
    });

    it('should allow a missing prefix', () => {
      expect(explode(palette, 'red')).toEqual({ prefix: null, color: 'red', tint: null });
      expect(explode(palette, 'red-500')).toEqual({ prefix: null, color: 'red', tint: 500 });
    });

    it('should reject unknown colors', () => {
      const none = { prefix: null, color: null, tint: null };
      expect(explode(palette, 'woof')).toEqual(none);
      expect(explode(palette, 'woof-500')).toEqual(none);
      expect(explode(palette, 'bg-monster')).toEqual(none);
    });

    it('should reject tints off the scale', () => {
      expect(explode(palette, 'bg-blue-404')).toEqual({ prefix: null, color: null, tint: null });
    });

    it('should reject empty segments', () => {
      expect(explode(palette, '')).toEqual({ prefix: null, color: null, tint: null });
      expect(explode(palette, 'bg--blue')).toEqual({ prefix: null, color: null, tint: null });
    });

    it('should resolve hyphenated color names', () => {
      expect(explode(palette, 'silver-hawk')).toEqual({ prefix: null, color: 'silver-hawk', tint: null });
      expect(explode(palette, 'bg-silver-hawk-300')).toEqual({ prefix: 'bg', color: 'silver-hawk', tint: 300 });
    });

    it('should resolve hyphenated prefixes', () => {
      expect(explode(palette, 'ring-offset-blue-200')).toEqual({ prefix: 'ring-offset', color: 'blue', tint: 200 });
    });

    it('should prefer the longest color name', () => {
      const nested = createPalette({ colors: ['hawk', 'silver-hawk'] });
      expect(explode(nested, 'bg-silver-hawk-500')).toEqual({ prefix: 'bg', color: 'silver-hawk', tint: 500 });
      expect(explode(nested, 'bg-hawk-500')).toEqual({ prefix: 'bg', color: 'hawk', tint: 500 });
    });
  });

  describe('compose', () => {
    it('should join the present parts', () => {
      expect(compose({ prefix: 'bg', color: 'blue', tint: 600 })).toBe('bg-blue-600');
      expect(compose({ prefix: null, color: 'red', tint: null })).toBe('red');
      expect(compose({ color: 'silver-hawk', tint: 50 })).toBe('silver-hawk-50');
    });
  });

  describe('isColorClass', () => {
    it('should report whether a token carries a known color', () => {
      expect(isColorClass(palette, 'border-burgandy-700')).toBe(true);
      expect(isColorClass(palette, 'rounded-xl')).toBe(false);
    });
  });
});
