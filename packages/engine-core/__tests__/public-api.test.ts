import { describe, expect, it } from 'vitest';
import * as api from '../src/index.js';

/**
 * Public API surface test.
 * Verifies that every function and enum exported from index.ts
 * is actually accessible at runtime.
 */
describe('Public API (@parley/engine-core)', () => {
  it.each([
    'extractOffer',
    'extractContextOffer',
    'extractBareOffer',
    'hasAcceptanceLanguage',
    'extractAcceptedPrice',
    'validateConstraints',
    'computeZopa',
    'computeOutcomeUtility',
    'satisfactionTier',
    'deriveWinner',
    'priceDirection',
    'counterpartRole',
    'clamp',
  ] as const)('exports %s', (name) => {
    expect(typeof api[name]).toBe('function');
  });

  it('exports EngineError enum', () => {
    expect(api.EngineError.INVERTED_RANGE).toBe('INVERTED_RANGE');
    expect(api.EngineError.NON_FINITE_VALUE).toBe('NON_FINITE_VALUE');
    expect(api.EngineError.NON_POSITIVE_VALUE).toBe('NON_POSITIVE_VALUE');
  });

  it('exports default thresholds and year range', () => {
    expect(api.DEFAULT_SATISFACTION_THRESHOLDS).toEqual({ high: 0.1, medium: 0.5 });
    expect(api.YEAR_RANGE).toEqual({ min: 2000, max: 2030 });
  });

  it('maps roles to price directions', () => {
    expect(api.priceDirection('SELLER')).toBe('MAXIMIZE');
    expect(api.priceDirection('BUYER')).toBe('MINIMIZE');
    expect(api.counterpartRole('SELLER')).toBe('BUYER');
  });
});
