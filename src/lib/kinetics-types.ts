export type ReactionOrder = 'zeroth' | 'first' | 'second';

export type Delimiter = 'auto' | 'comma' | 'tab' | 'whitespace';

export interface Sample {
  time: number; // >= 0
  concentration: number;
}

// Sorted ascending by time, ties kept in input order
export type SampleSet = readonly Sample[];

export type RawField = string | number;
export type RawPair = readonly [RawField, RawField];

export interface OrderModel {
  order: ReactionOrder;
  name: string; // e.g. "First order"
  linearLabel: string; // dependent axis of the linearised plot
  units: string; // units of k with concentrations in M and time in s
  rateSign: 1 | -1;
  transform: (concentration: number) => number;
  guard: (concentration: number) => boolean;
}

export interface RegressionResult {
  slope: number;
  intercept: number;
  rSquared: number;
}

export interface KineticFitResult extends RegressionResult {
  order: ReactionOrder;
  rateConstant: number;
  equation: string;
  linearLabel: string;
  units: string;
  sampleCount: number; // samples that passed the order's guard
  excludedCount: number;
  degenerate: boolean; // fewer than two usable samples, sentinel values
}

export interface KineticsEvaluation {
  zeroth: KineticFitResult;
  first: KineticFitResult;
  second: KineticFitResult;
  best: ReactionOrder;
  sampleCount: number;
}
