/**
 * Molar Mass Tests
 *
 * These tests define the contract for formula parsing and molar mass:
 * - Nested groups and hydrate dots
 * - Composition by mass percent
 * - Mass to moles and moles to mass conversion
 * - INVALID_FORMULA for malformed formulas
 *
 * The implementation lives in: src/tools/molar-mass.ts
 */

import { describe, it, expect } from 'vitest';
import { calculateMolarMass, extractFormulas, parseFormula, tryParseFormula } from '../src/tools/molar-mass.js';
import { captureError } from './helpers.js';

describe('Molar Mass', () => {
  describe('Formula Parsing', () => {
    it('should expand groups', () => {
      expect([...parseFormula('Ca(OH)2')]).toEqual([['Ca', 1], ['O', 2], ['H', 2]]);
    });

    it('should add hydrate parts', () => {
      expect([...parseFormula('CuSO4·5H2O')]).toEqual([['Cu', 1], ['S', 1], ['O', 9], ['H', 10]]);
    });

    it('should reject lowercase symbols', () => {
      expect(captureError(() => parseFormula('nacl'))).toMatchObject({
        code: 'INVALID_FORMULA',
        message: "Invalid formula 'nacl': unexpected 'n'",
      });
    });

    it('should reject unknown elements and unclosed groups', () => {
      expect(captureError(() => parseFormula('Xy2'))).toMatchObject({
        message: "Invalid formula 'Xy2': unknown element 'Xy'",
      });
      expect(captureError(() => parseFormula('Ca(OH'))).toMatchObject({
        message: "Invalid formula 'Ca(OH': missing ')'",
      });
    });

    it('should return null from tryParseFormula instead of throwing', () => {
      expect(tryParseFormula('Qq')).toBeNull();
    });
  });

  describe('Molar Mass', () => {
    it('should compute molar mass and composition', () => {
      const result = calculateMolarMass({ formula: 'H2O' });
      expect(result.molar_mass).toBe(18.015);
      expect(result.composition).toEqual([
        { symbol: 'H', name: 'Hydrogen', count: 2, atomic_mass: 1.008, mass_contribution: 2.016, mass_percent: 11.19 },
        { symbol: 'O', name: 'Oxygen', count: 1, atomic_mass: 15.999, mass_contribution: 15.999, mass_percent: 88.81 },
      ]);
      expect(result.formatted.split('\n')[0]).toBe('Molar mass of H2O: 18.015 g/mol');
    });

    it('should convert moles to grams', () => {
      const result = calculateMolarMass({ formula: 'NaCl', moles: 2 });
      expect(result.molar_mass).toBe(58.44);
      expect(result.conversion).toEqual({ mass_g: 116.88, moles: 2, particles: 1.20443e24 });
    });

    it('should convert grams to moles', () => {
      expect(calculateMolarMass({ formula: 'H2O', mass_g: 36.03 }).conversion?.moles).toBe(2);
    });

    it('should not accept both a mass and an amount', () => {
      expect(captureError(() => calculateMolarMass({ formula: 'H2O', mass_g: 1, moles: 1 }))).toMatchObject({
        code: 'INVALID_INPUT',
      });
    });
  });

  describe('Formula Detection', () => {
    it('should find formulas in a question', () => {
      expect(extractFormulas('What is the molar mass of water (H2O)?')).toEqual(['H2O']);
      expect(extractFormulas('Balance H2 + O2 -> H2O')).toEqual(['H2', 'O2', 'H2O']);
    });

    it('should skip capitalised words and lone symbols', () => {
      expect(extractFormulas('Is He heavier than I think?')).toEqual([]);
    });

    it('should skip all-caps words made of element symbols', () => {
      expect(extractFormulas('SOS, the INPUT was CHON')).toEqual([]);
      expect(extractFormulas('Is CO2 from CaCO3?')).toEqual(['CO2', 'CaCO3']);
    });
  });
});
