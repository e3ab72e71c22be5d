import { KineticsInputError } from './kinetics-errors';
import { KINETICS_DEFAULTS } from './kinetics-constants';
import type { ReactionOrder } from './kinetics-types';

/**
 * Rate constant from a single pair of measurements: initial concentration a0,
 * concentration at after elapsed time t.
 *
 *   zeroth: k = (a0 - at) / t
 *   first:  k = ln(a0 / at) / t
 *   second: k = (1/at - 1/a0) / t
 */
export function twoPointRateConstant(order: ReactionOrder, a0: number, at: number, t: number): number {
  if (!(t > 0)) {
    throw new KineticsInputError('Elapsed time must be > 0.');
  }
  if (!(a0 > 0)) {
    throw new KineticsInputError('Initial concentration must be > 0.');
  }
  if (!(at >= 0)) {
    throw new KineticsInputError('Final concentration cannot be negative.');
  }

  switch (order) {
    case 'zeroth':
      return (a0 - at) / t;
    case 'first':
      if (at <= 0) throw new KineticsInputError('Final concentration must be > 0 for the logarithmic form.');
      return Math.log(a0 / at) / t;
    case 'second':
      if (at <= 0) throw new KineticsInputError('Final concentration must be > 0 for the inverse form.');
      return (1 / at - 1 / a0) / t;
  }
}

// [A](t) predicted by each integrated rate law
export function concentrationAt(order: ReactionOrder, k: number, a0: number, t: number): number {
  switch (order) {
    case 'zeroth':
      // Reactant is used up at t = a0/k
      return Math.max(a0 - k * t, 0);
    case 'first':
      return a0 * Math.exp(-k * t);
    case 'second': {
      const inverse = k * t + 1 / a0;
      return inverse > 0 ? 1 / inverse : NaN;
    }
  }
}

export function concentrationProfile(
  order: ReactionOrder,
  k: number,
  a0: number,
  tMax: number,
  points: number = KINETICS_DEFAULTS.profilePoints
): [number, number][] {
  if (points < 2 || !(tMax > 0)) return [];
  const profile: [number, number][] = [];
  for (let i = 0; i < points; i++) {
    const t = (tMax * i) / (points - 1);
    const c = concentrationAt(order, k, a0, t);
    if (Number.isFinite(c)) profile.push([t, c]);
  }
  return profile;
}
