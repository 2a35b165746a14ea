import type { Decoder } from './host.js';

/**
 * Raised by a decoder when a raw string cannot be converted.
 * Hosts map it to a 400 response.
 */
export class DecodingError extends Error {
  readonly raw: string;
  readonly expected: string;

  constructor(raw: string, expected: string, options?: { cause?: unknown }) {
    super(`Cannot decode "${raw}" as ${expected}`, options);
    this.name = 'DecodingError';
    this.raw = raw;
    this.expected = expected;
  }
}

const TRUE_VALUES = new Set(['true', '1']);
const FALSE_VALUES = new Set(['false', '0']);

/**
 * Decoders referenced by generated extraction code for primitive parameter types.
 * Strings need no decoder.
 */
export const decoders = {
  number(raw: string): number {
    const value = Number(raw);
    if (raw.trim() === '' || Number.isNaN(value)) {
      throw new DecodingError(raw, 'number');
    }
    return value;
  },

  boolean(raw: string): boolean {
    const normalized = raw.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    throw new DecodingError(raw, 'boolean');
  },

  bigint(raw: string): bigint {
    try {
      return BigInt(raw.trim());
    } catch (cause) {
      throw new DecodingError(raw, 'bigint', { cause });
    }
  },

  date(raw: string): Date {
    const value = new Date(raw);
    if (Number.isNaN(value.getTime())) {
      throw new DecodingError(raw, 'Date');
    }
    return value;
  },
} satisfies Record<string, Decoder<unknown>>;
