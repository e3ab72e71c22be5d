import type { Delimiter, OrderModel, ReactionOrder } from './kinetics-types';

const isPositive = (c: number) => Number.isFinite(c) && c > 0;

// Evaluation order doubles as the tie-break precedence for the best fit
export const REACTION_ORDERS: readonly ReactionOrder[] = ['zeroth', 'first', 'second'];

export const ORDER_MODELS: Record<ReactionOrder, OrderModel> = {
  zeroth: {
    order: 'zeroth',
    name: 'Zeroth order',
    linearLabel: '[A]',
    units: 'M/s',
    rateSign: -1,
    transform: (c) => c,
    guard: (c) => Number.isFinite(c),
  },
  first: {
    order: 'first',
    name: 'First order',
    linearLabel: 'ln[A]',
    units: '1/s',
    rateSign: -1,
    transform: (c) => Math.log(c),
    guard: (c) => isPositive(c) && Number.isFinite(Math.log(c)),
  },
  second: {
    order: 'second',
    name: 'Second order',
    linearLabel: '1/[A]',
    units: '1/(M·s)',
    rateSign: 1,
    transform: (c) => 1 / c,
    // Subnormal concentrations overflow 1/c
    guard: (c) => isPositive(c) && Number.isFinite(1 / c),
  },
};

interface KineticsDefaults {
  delimiter: Delimiter;
  displayDigits: number;
  rateConstantDigits: number;
  profilePoints: number;
  profileTimeFactor: number;
}

export const KINETICS_DEFAULTS: KineticsDefaults = {
  delimiter: 'auto',
  displayDigits: 4, // intercept, slope and R²
  rateConstantDigits: 5,
  profilePoints: 100,
  profileTimeFactor: 1.5, // profile runs to 1.5x the last measured time
};

export const DELIMITER_OPTIONS: Array<{ value: Delimiter; label: string }> = [
  { value: 'auto', label: 'Auto' },
  { value: 'comma', label: 'Comma' },
  { value: 'tab', label: 'Tab' },
  { value: 'whitespace', label: 'Spaces' },
];

// First-order decay with k ≈ 0.02 1/s
export const EXAMPLE_DATA = `time,concentration
0,1.000
10,0.819
20,0.670
30,0.549
40,0.449
50,0.368`;
