import { describe, it, expect } from 'vitest';
import { tokenize, join } from '../../src/core/tokenizer.js';

describe('tokenizer', () => {
  describe('tokenize', () => {
    it('should split on runs of whitespace', () => {
      expect(tokenize('  bg-blue-500   text-white\tp-2\n')).toEqual(['bg-blue-500', 'text-white', 'p-2']);
    });

    it('should return an empty list for empty input', () => {
      expect(tokenize('')).toEqual([]);
      expect(tokenize('   ')).toEqual([]);
    });

    it('should pass lists through untouched', () => {
      const list = ['a', 'b'];
      expect(tokenize(list)).toBe(list);
    });

    it('should be idempotent through join', () => {
      const input = ' rounded   bg-red-500 x ';
      expect(tokenize(join(tokenize(input)))).toEqual(tokenize(input));
    });
  });

  describe('join', () => {
    it('should join with single spaces and skip empty tokens', () => {
      expect(join(['a', '', 'b'])).toBe('a b');
      expect(join([])).toBe('');
    });
  });
});
