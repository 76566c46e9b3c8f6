import { describe, it, expect } from 'vitest';
import { parseFeedLimit, parseSearchQuery, queryValue } from '../validation';
import { ValidationError } from '@/utils/errors';

describe('query validation', () => {
  describe('parseFeedLimit', () => {
    it('defaults to 10 when absent or blank', () => {
      expect(parseFeedLimit(undefined)).toBe(10);
      expect(parseFeedLimit('')).toBe(10);
    });

    it('accepts integers from 1 to 20', () => {
      expect(parseFeedLimit('1')).toBe(1);
      expect(parseFeedLimit(' 20 ')).toBe(20);
      expect(parseFeedLimit(['7', '9'])).toBe(7);
    });

    it.each(['0', '21', '-3', '1.5', 'abc', '1e1'])('rejects %s', (value) => {
      expect(() => parseFeedLimit(value)).toThrow(ValidationError);
    });
  });

  describe('parseSearchQuery', () => {
    it('returns the raw query', () => {
      expect(parseSearchQuery(' 42 ')).toBe(' 42 ');
    });

    it('rejects missing and one-character queries', () => {
      expect(() => parseSearchQuery(undefined)).toThrow('q is required and must be at least 2 characters');
      expect(() => parseSearchQuery('x')).toThrow(ValidationError);
    });
  });

  describe('queryValue', () => {
    it('ignores nested objects', () => {
      expect(queryValue({ a: '1' })).toBeUndefined();
    });
  });
});
