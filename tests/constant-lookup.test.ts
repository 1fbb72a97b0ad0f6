/**
 * Constant Lookup Tests
 *
 * These tests define the contract for physical constant lookup:
 * - Case-sensitive symbols first, then symbols ignoring case
 * - Names and aliases with punctuation ignored
 * - Partial matches scored by shared words
 *
 * The implementation lives in: src/tools/constant-lookup.ts
 */

import { describe, it, expect } from 'vitest';
import { findConstantsInText, lookupConstant } from '../src/tools/constant-lookup.js';
import { captureError } from './helpers.js';

describe('Constant Lookup', () => {
  it('should find a constant by symbol', () => {
    const result = lookupConstant({ query: 'c' });
    expect(result.name).toBe('speed of light');
    expect(result.value).toBe(299792458);
    expect(result.match).toBe('symbol');
    expect(result.formatted).toBe('speed of light (c) = 299792458 m/s');
  });

  it('should keep g and G apart', () => {
    expect(lookupConstant({ query: 'g' }).name).toBe('standard gravity');
    expect(lookupConstant({ query: 'G' }).name).toBe('gravitational constant');
  });

  it('should fall back to a case-insensitive symbol', () => {
    const result = lookupConstant({ query: 'n_a' });
    expect(result.symbol).toBe('N_A');
    expect(result.match).toBe('symbol_case_insensitive');
  });

  it('should match names and aliases ignoring apostrophes', () => {
    expect(lookupConstant({ query: 'PLANCK CONSTANT' })).toMatchObject({ symbol: 'h', match: 'name' });
    expect(lookupConstant({ query: "Planck's constant" })).toMatchObject({ symbol: 'h', match: 'name' });
  });

  it('should score partial matches', () => {
    const result = lookupConstant({ query: 'mass electron' });
    expect(result.symbol).toBe('m_e');
    expect(result.match).toBe('partial');
    expect(result.score).toBe(20);
  });

  it('should report NOT_FOUND when nothing matches', () => {
    expect(captureError(() => lookupConstant({ query: 'flux capacitor' }))).toMatchObject({
      code: 'NOT_FOUND',
      message: "No constant matches 'flux capacitor'",
    });
  });

  it('should find constants named in a question', () => {
    expect(findConstantsInText('What is the speed of light?').map(constant => constant.symbol)).toEqual(['c']);
    expect(findConstantsInText('What is 5 + 3?')).toEqual([]);
  });
});
