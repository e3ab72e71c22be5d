import { describe, it, expect } from 'vitest';

import { concentrationAt, concentrationProfile, twoPointRateConstant } from '../integrated-rate-laws';
import { KineticsInputError } from '../kinetics-errors';

describe('twoPointRateConstant', () => {
  it('uses the integrated rate law of each order', () => {
    expect(twoPointRateConstant('zeroth', 1, 0.5, 10)).toBeCloseTo(0.05, 12);
    expect(twoPointRateConstant('first', 1, 0.5, 10)).toBeCloseTo(Math.LN2 / 10, 12);
    expect(twoPointRateConstant('second', 1, 0.5, 10)).toBeCloseTo(0.1, 12);
  });

  it('allows a fully consumed reactant for zeroth order only', () => {
    expect(twoPointRateConstant('zeroth', 1, 0, 10)).toBeCloseTo(0.1, 12);
    expect(() => twoPointRateConstant('first', 1, 0, 10)).toThrow(
      'Final concentration must be > 0 for the logarithmic form.'
    );
    expect(() => twoPointRateConstant('second', 1, 0, 10)).toThrow(
      'Final concentration must be > 0 for the inverse form.'
    );
  });

  it('rejects a non-positive elapsed time or initial concentration', () => {
    expect(() => twoPointRateConstant('first', 1, 0.5, 0)).toThrow(KineticsInputError);
    expect(() => twoPointRateConstant('first', 0, 0.5, 10)).toThrow(KineticsInputError);
    expect(() => twoPointRateConstant('zeroth', 1, -0.5, 10)).toThrow('Final concentration cannot be negative.');
  });
});

describe('concentrationAt', () => {
  it('clamps zeroth order at full consumption', () => {
    expect(concentrationAt('zeroth', 0.1, 1, 5)).toBeCloseTo(0.5, 12);
    expect(concentrationAt('zeroth', 0.1, 1, 20)).toBe(0);
  });

  it('decays exponentially for first order', () => {
    expect(concentrationAt('first', 0.1, 1, 10)).toBeCloseTo(Math.exp(-1), 12);
  });

  it('follows 1/[A] = kt + 1/[A]0 for second order', () => {
    expect(concentrationAt('second', 0.1, 1, 10)).toBeCloseTo(0.5, 12);
    expect(concentrationAt('second', -0.2, 1, 10)).toBeNaN();
  });
});

describe('concentrationProfile', () => {
  it('spaces points evenly from 0 to tMax', () => {
    const profile = concentrationProfile('first', 0.1, 1, 10, 11);
    expect(profile).toHaveLength(11);
    expect(profile[0]).toEqual([0, 1]);
    expect(profile[5][0]).toBe(5);
    expect(profile[10][0]).toBe(10);
    expect(profile[10][1]).toBeCloseTo(Math.exp(-1), 12);
  });

  it('drops times where the law has no finite value', () => {
    const profile = concentrationProfile('second', -0.2, 1, 10, 11);
    expect(profile.map(([t]) => t)).toEqual([0, 1, 2, 3, 4]);
  });

  it('defaults to 100 points', () => {
    expect(concentrationProfile('zeroth', 0.01, 1, 50)).toHaveLength(100);
  });

  it('returns nothing for an empty range', () => {
    expect(concentrationProfile('first', 0.1, 1, 0)).toEqual([]);
    expect(concentrationProfile('first', 0.1, 1, 10, 1)).toEqual([]);
  });
});
