/**
 * Tests for value decoders and the attempt helper
 */

import { describe, it, expect } from 'vitest';
import { decoders, DecodingError } from '../src/decoders.js';
import { attempt } from '../src/attempt.js';

describe('decoders', () => {
  describe('number', () => {
    it('decodes integers and decimals', () => {
      expect(decoders.number('42')).toBe(42);
      expect(decoders.number('-1.5')).toBe(-1.5);
    });

    it('rejects non-numeric input', () => {
      expect(() => decoders.number('forty')).toThrow(DecodingError);
    });

    it('rejects blank input instead of returning zero', () => {
      expect(() => decoders.number('  ')).toThrow('Cannot decode "  " as number');
    });
  });

  describe('boolean', () => {
    it('accepts true/false and 1/0', () => {
      expect(decoders.boolean('true')).toBe(true);
      expect(decoders.boolean('TRUE')).toBe(true);
      expect(decoders.boolean('1')).toBe(true);
      expect(decoders.boolean('false')).toBe(false);
      expect(decoders.boolean('0')).toBe(false);
    });

    it('rejects anything else', () => {
      expect(() => decoders.boolean('yes')).toThrow(DecodingError);
    });
  });

  describe('bigint', () => {
    it('decodes large integers', () => {
      expect(decoders.bigint('9007199254740993')).toBe(9007199254740993n);
    });

    it('keeps the underlying error as cause', () => {
      try {
        decoders.bigint('1.5');
        expect.fail('expected bigint decoding to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(DecodingError);
        if (error instanceof DecodingError) {
          expect(error.expected).toBe('bigint');
          expect(error.raw).toBe('1.5');
          expect(error.cause).toBeInstanceOf(SyntaxError);
        }
      }
    });
  });

  describe('date', () => {
    it('decodes ISO timestamps', () => {
      expect(decoders.date('2024-01-02T03:04:05.000Z').toISOString()).toBe('2024-01-02T03:04:05.000Z');
    });

    it('rejects invalid dates', () => {
      expect(() => decoders.date('not-a-date')).toThrow('Cannot decode "not-a-date" as Date');
    });
  });
});

describe('attempt', () => {
  it('returns the value when the operation succeeds', () => {
    expect(attempt(() => 7)).toBe(7);
  });

  it('returns undefined when the operation throws', () => {
    expect(
      attempt(() => {
        throw new Error('bad query');
      })
    ).toBeUndefined();
  });
});
