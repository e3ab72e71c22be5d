import { InsufficientDataError } from './kinetics-errors';
import { KINETICS_DEFAULTS, ORDER_MODELS, REACTION_ORDERS } from './kinetics-constants';
import type {
  KineticFitResult,
  KineticsEvaluation,
  OrderModel,
  ReactionOrder,
  RegressionResult,
  SampleSet,
} from './kinetics-types';

/**
 * Ordinary least squares of y on x. Returns null with fewer than two points.
 * Zero variance in either variable gives rSquared = 0 (and slope 0) instead of dividing by zero.
 */
export function linearRegression(x: readonly number[], y: readonly number[]): RegressionResult | null {
  const n = Math.min(x.length, y.length);
  if (n < 2) return null;

  let sumX = 0, sumY = 0;
  for (let i = 0; i < n; i++) {
    sumX += x[i];
    sumY += y[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  // Centered sums keep precision when times are large compared to their spread
  let ssXX = 0, ssYY = 0, ssXY = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - meanX;
    const dy = y[i] - meanY;
    ssXX += dx * dx;
    ssYY += dy * dy;
    ssXY += dx * dy;
  }

  if (ssXX === 0) {
    return { slope: 0, intercept: meanY, rSquared: 0 };
  }

  const slope = ssXY / ssXX;
  const intercept = meanY - slope * meanX;
  if (ssYY === 0) {
    return { slope, intercept, rSquared: 0 };
  }

  const r = ssXY / Math.sqrt(ssXX * ssYY);
  if (!Number.isFinite(r)) {
    return { slope, intercept, rSquared: 0 };
  }
  const rSquared = Math.min(1, Math.max(0, r * r));
  return { slope, intercept, rSquared };
}

export function formatKineticsNumber(value: number, digits: number = KINETICS_DEFAULTS.displayDigits): string {
  const abs = Math.abs(value);
  // Rounding residue from the regression, e.g. an intercept of -1e-17
  if (abs < 1e-12) return (0).toFixed(digits);
  if (abs < 1e-3 || abs >= 1e5) {
    return value.toExponential(3);
  }
  return value.toFixed(digits);
}

/** "ln[A] = 0.0000 - 0.0100 t": the operator carries the slope's sign. */
export function formatIntegratedEquation(linearLabel: string, intercept: number, slope: number): string {
  const operator = slope < 0 ? '-' : '+';
  return `${linearLabel} = ${formatKineticsNumber(intercept)} ${operator} ${formatKineticsNumber(Math.abs(slope))} t`;
}

function fitOrder(model: OrderModel, samples: SampleSet): KineticFitResult {
  const usable = samples.filter(s => model.guard(s.concentration));
  const excludedCount = samples.length - usable.length;
  const base = {
    order: model.order,
    linearLabel: model.linearLabel,
    units: model.units,
    sampleCount: usable.length,
    excludedCount,
  };

  const regression = linearRegression(
    usable.map(s => s.time),
    usable.map(s => model.transform(s.concentration))
  );

  if (!regression) {
    console.warn(
      `${model.name}: only ${usable.length} usable data point(s) after excluding ${excludedCount}; reporting R² = 0.`
    );
    return {
      ...base,
      slope: 0,
      intercept: 0,
      rSquared: 0,
      rateConstant: 0,
      equation: `${model.linearLabel}: insufficient data`,
      degenerate: true,
    };
  }

  return {
    ...base,
    ...regression,
    // +0 turns a negated zero slope into a plain 0
    rateConstant: model.rateSign * regression.slope + 0,
    equation: formatIntegratedEquation(model.linearLabel, regression.intercept, regression.slope),
    degenerate: false,
  };
}

/** Highest R² wins; on a tie the earlier of zeroth, first, second is kept. */
export function selectBestOrder(fits: Record<ReactionOrder, KineticFitResult>): ReactionOrder {
  let best: ReactionOrder = REACTION_ORDERS[0];
  for (const order of REACTION_ORDERS) {
    if (fits[order].rSquared > fits[best].rSquared) {
      best = order;
    }
  }
  return best;
}

/**
 * Fits the zeroth, first and second order integrated rate laws to a SampleSet
 * and picks the order whose linearised form has the highest R².
 */
export function evaluateKinetics(samples: SampleSet): KineticsEvaluation {
  if (samples.length < 2) {
    throw new InsufficientDataError(samples.length);
  }

  const fits: Record<ReactionOrder, KineticFitResult> = {
    zeroth: fitOrder(ORDER_MODELS.zeroth, samples),
    first: fitOrder(ORDER_MODELS.first, samples),
    second: fitOrder(ORDER_MODELS.second, samples),
  };

  return {
    ...fits,
    best: selectBestOrder(fits),
    sampleCount: samples.length,
  };
}

export function describeVerdict(evaluation: KineticsEvaluation): string {
  const fit = evaluation[evaluation.best];
  const model = ORDER_MODELS[evaluation.best];
  const k = formatKineticsNumber(fit.rateConstant, KINETICS_DEFAULTS.rateConstantDigits);
  return `${model.name} fits best (R² = ${fit.rSquared.toFixed(KINETICS_DEFAULTS.displayDigits)}, k = ${k} ${fit.units}).`;
}
