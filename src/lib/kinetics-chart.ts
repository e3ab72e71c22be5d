import type { EChartsOption, SeriesOption } from 'echarts';
import { KINETICS_DEFAULTS, ORDER_MODELS } from './kinetics-constants';
import { concentrationProfile } from './integrated-rate-laws';
import { formatKineticsNumber } from './kinetics-fit';
import type { KineticFitResult, KineticsEvaluation, SampleSet } from './kinetics-types';

const chartFont = 'Merriweather Sans, sans-serif';

interface ChartColors {
  text: string;
  muted: string;
  data: string;
  fit: string;
}

function chartColors(theme: string | undefined): ChartColors {
  const dark = theme === 'dark';
  return {
    text: dark ? '#E5E7EB' : '#1F2937',
    muted: dark ? '#9CA3AF' : '#6B7280',
    data: dark ? '#FFFFFF' : '#000000',
    fit: '#EE6666',
  };
}

/** (t, transformed concentration) for the samples the order's fit used. */
export function linearizedPoints(fit: KineticFitResult, samples: SampleSet): [number, number][] {
  const model = ORDER_MODELS[fit.order];
  return samples
    .filter(s => model.guard(s.concentration))
    .map((s): [number, number] => [s.time, model.transform(s.concentration)]);
}

/** Endpoints of the fitted line over the observed time range; empty for a degenerate fit. */
export function regressionLine(fit: KineticFitResult, samples: SampleSet): [number, number][] {
  if (fit.degenerate) return [];
  const times = linearizedPoints(fit, samples).map(([t]) => t);
  const tMin = Math.min(...times);
  const tMax = Math.max(...times);
  return [
    [tMin, fit.slope * tMin + fit.intercept],
    [tMax, fit.slope * tMax + fit.intercept],
  ];
}

/** [A]0 implied by the fitted intercept, or null when the intercept has no physical inverse. */
export function initialConcentrationFromFit(fit: KineticFitResult): number | null {
  if (fit.degenerate) return null;
  switch (fit.order) {
    case 'zeroth':
      return fit.intercept > 0 ? fit.intercept : null;
    case 'first':
      return Math.exp(fit.intercept);
    case 'second':
      return fit.intercept > 0 ? 1 / fit.intercept : null;
  }
}

function baseAxes(colors: ChartColors, xName: string, yName: string): Pick<EChartsOption, 'xAxis' | 'yAxis'> {
  const axisStyle = {
    nameLocation: 'middle' as const,
    nameTextStyle: { color: colors.text, fontSize: 14, fontFamily: chartFont },
    axisLine: { lineStyle: { color: colors.muted } },
    axisTick: { lineStyle: { color: colors.muted } },
    axisLabel: { color: colors.text, fontSize: 12, fontFamily: chartFont },
    splitLine: { show: false },
    scale: true,
  };
  return {
    xAxis: { type: 'value', name: xName, nameGap: 30, ...axisStyle },
    yAxis: { type: 'value', name: yName, nameGap: 50, ...axisStyle },
  };
}

export function buildLinearizedPlotOptions(
  fit: KineticFitResult,
  samples: SampleSet,
  theme: string | undefined
): EChartsOption {
  const colors = chartColors(theme);
  const model = ORDER_MODELS[fit.order];

  const series: SeriesOption[] = [{
    name: 'Measured',
    type: 'scatter',
    data: linearizedPoints(fit, samples),
    color: colors.data,
    symbolSize: 8,
    animation: false,
  }];

  const line = regressionLine(fit, samples);
  if (line.length > 0) {
    series.push({
      name: 'Best Fit Line',
      type: 'line',
      data: line,
      color: colors.fit,
      symbol: 'none',
      lineStyle: { width: 2, type: 'dashed' },
      animation: false,
      z: 10,
    });
  }

  return {
    backgroundColor: 'transparent',
    title: {
      text: `${model.name}: R² = ${fit.rSquared.toFixed(KINETICS_DEFAULTS.displayDigits)}`,
      subtext: fit.equation,
      left: 'center',
      textStyle: { color: colors.text, fontSize: 16, fontFamily: chartFont },
      subtextStyle: { color: colors.muted, fontFamily: chartFont },
    },
    grid: { left: '10%', right: '7%', bottom: '12%', top: '18%', containLabel: true },
    tooltip: { trigger: 'item' },
    legend: { bottom: 0, textStyle: { color: colors.text, fontFamily: chartFont } },
    ...baseAxes(colors, 'Time (s)', model.linearLabel),
    series,
  };
}

/** Measured [A] against time with the best order's integrated rate law drawn through it. */
export function buildProfilePlotOptions(
  evaluation: KineticsEvaluation,
  samples: SampleSet,
  theme: string | undefined
): EChartsOption {
  const colors = chartColors(theme);
  const fit = evaluation[evaluation.best];
  const model = ORDER_MODELS[evaluation.best];

  const series: SeriesOption[] = [{
    name: 'Measured',
    type: 'scatter',
    data: samples.map(s => [s.time, s.concentration]),
    color: colors.data,
    symbolSize: 8,
    animation: false,
  }];

  const a0 = initialConcentrationFromFit(fit);
  const tLast = samples.length > 0 ? samples[samples.length - 1].time : 0;
  if (a0 !== null) {
    series.push({
      name: `${model.name} fit`,
      type: 'line',
      data: concentrationProfile(fit.order, fit.rateConstant, a0, tLast * KINETICS_DEFAULTS.profileTimeFactor),
      color: colors.fit,
      symbol: 'none',
      lineStyle: { width: 2 },
      animation: false,
    });
  }

  return {
    backgroundColor: 'transparent',
    title: {
      text: `Reaction Progress (k = ${formatKineticsNumber(fit.rateConstant)} ${fit.units})`,
      left: 'center',
      textStyle: { color: colors.text, fontSize: 16, fontFamily: chartFont },
    },
    grid: { left: '10%', right: '7%', bottom: '12%', top: '12%', containLabel: true },
    tooltip: { trigger: 'axis' },
    legend: { bottom: 0, textStyle: { color: colors.text, fontFamily: chartFont } },
    ...baseAxes(colors, 'Time (s)', 'Concentration [A] (M)'),
    series,
  };
}
