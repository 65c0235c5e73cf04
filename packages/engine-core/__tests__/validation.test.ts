import { describe, expect, it } from 'vitest';
import { EngineError } from '../src/types.js';
import { validateConstraints } from '../src/validation.js';

describe('validateConstraints', () => {
  it('accepts a seller with ideal above bound', () => {
    expect(validateConstraints({ role: 'SELLER', bound: 600, ideal: 750 })).toBeNull();
  });

  it('accepts a buyer with ideal below bound', () => {
    expect(validateConstraints({ role: 'BUYER', bound: 800, ideal: 650, urgency: 'high' })).toBeNull();
  });

  it('accepts ideal === bound', () => {
    expect(validateConstraints({ role: 'SELLER', bound: 600, ideal: 600 })).toBeNull();
  });

  it('rejects an inverted seller range', () => {
    expect(validateConstraints({ role: 'SELLER', bound: 750, ideal: 600 })).toBe(EngineError.INVERTED_RANGE);
  });

  it('rejects an inverted buyer range', () => {
    expect(validateConstraints({ role: 'BUYER', bound: 650, ideal: 800 })).toBe(EngineError.INVERTED_RANGE);
  });

  it('rejects non-finite values', () => {
    expect(validateConstraints({ role: 'SELLER', bound: Number.NaN, ideal: 750 })).toBe(
      EngineError.NON_FINITE_VALUE,
    );
    expect(validateConstraints({ role: 'BUYER', bound: Infinity, ideal: 650 })).toBe(
      EngineError.NON_FINITE_VALUE,
    );
  });

  it('rejects zero or negative prices', () => {
    expect(validateConstraints({ role: 'SELLER', bound: 0, ideal: 750 })).toBe(EngineError.NON_POSITIVE_VALUE);
    expect(validateConstraints({ role: 'BUYER', bound: 800, ideal: -1 })).toBe(EngineError.NON_POSITIVE_VALUE);
  });
});
